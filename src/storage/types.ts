/**
 * ストレージ抽象（メモリ / SQLite で共有）
 * sessionKey = session:${name} / attendanceKey = attendance:${session}:${participant}
 * 各セグメントは encodeKeySegment 済みなので prefix が他セッションと衝突しない
 */

export interface IAttendanceStorage {
  get(key: string): Promise<unknown>;
  /** upsert */
  put(key: string, value: unknown): Promise<void>;
  /** キーが既にあれば UniqueConstraintError */
  insert(key: string, value: unknown): Promise<void>;
  /** 挿入順 */
  list(prefix: string): Promise<Map<string, unknown>>;
  /** 同じ scope の処理を直列化する。成功・失敗どちらでも解放される */
  transaction<T>(scope: string, fn: () => Promise<T>): Promise<T>;
}

const SESSION_PREFIX = 'session:';
const LONE_SURROGATE_RE = /^[\uD800-\uDFFF]$/u;
const ATTENDANCE_PREFIX = 'attendance:';

/**
 * encodeURIComponent はペアになっていないサロゲートで URIError を投げるため、
 * その文字だけ %uXXXX にする（encodeURIComponent の出力は %XX のみなので衝突しない）
 */
export function encodeKeySegment(value: string): string {
  let out = '';
  for (const ch of value) {
    out += LONE_SURROGATE_RE.test(ch)
      ? `%u${ch.charCodeAt(0).toString(16).toUpperCase()}`
      : encodeURIComponent(ch);
  }
  return out;
}

export function sessionKey(name: string): string {
  return `${SESSION_PREFIX}${encodeKeySegment(name)}`;
}

export function sessionPrefix(): string {
  return SESSION_PREFIX;
}

export function attendanceKey(sessionName: string, participantId: string): string {
  return `${attendancePrefix(sessionName)}${encodeKeySegment(participantId)}`;
}

export function attendancePrefix(sessionName: string): string {
  return `${ATTENDANCE_PREFIX}${encodeKeySegment(sessionName)}:`;
}
