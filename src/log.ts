/**
 * サーバーログ。テスト実行中（NODE_ENV=test）は info/warn を出さない。error は常に出す
 */
const isQuiet = process.env.NODE_ENV === 'test';

export function logInfo(...args: unknown[]): void {
  if (!isQuiet) {
    console.log(...args);
  }
}

export function logWarn(...args: unknown[]): void {
  if (!isQuiet) {
    console.warn(...args);
  }
}

export function logError(...args: unknown[]): void {
  console.error(...args);
}
