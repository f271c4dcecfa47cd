/**
 * 環境変数からサーバー設定を組み立てる
 * 未設定・不正な値は既定値にフォールバック
 */

export interface Env {
  PORT?: string;
  ATTENDANCE_DB_FILE?: string;
  ROTATION_PERIOD_SECONDS?: string;
  TOKEN_WINDOW_SECONDS?: string;
  CORS_ORIGIN?: string;
}

export interface ServerConfig {
  port: number;
  dbFile: string;
  /** トークンが切り替わる間隔（秒） */
  rotationPeriodSeconds: number;
  /** トークン時刻と現在時刻の許容差（秒、前後対称） */
  validityWindowSeconds: number;
  corsOrigin: string;
}

export const DEFAULT_PORT = 3000;
export const DEFAULT_DB_FILE = 'attendance.db';
export const DEFAULT_ROTATION_PERIOD_SECONDS = 2;
export const DEFAULT_TOKEN_WINDOW_SECONDS = 30;
export const DEFAULT_CORS_ORIGIN = '*';

function parsePositiveInt(value: unknown): number | null {
  if (typeof value === 'string' && /^\d+$/.test(value.trim())) {
    const v = Number.parseInt(value.trim(), 10);
    return v > 0 ? v : null;
  }
  return null;
}

function normalizeText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

export function loadConfig(env: Env = process.env): ServerConfig {
  return {
    port: parsePositiveInt(env.PORT) ?? DEFAULT_PORT,
    dbFile: normalizeText(env.ATTENDANCE_DB_FILE) || DEFAULT_DB_FILE,
    rotationPeriodSeconds: parsePositiveInt(env.ROTATION_PERIOD_SECONDS) ?? DEFAULT_ROTATION_PERIOD_SECONDS,
    validityWindowSeconds: parsePositiveInt(env.TOKEN_WINDOW_SECONDS) ?? DEFAULT_TOKEN_WINDOW_SECONDS,
    corsOrigin: normalizeText(env.CORS_ORIGIN) || DEFAULT_CORS_ORIGIN,
  };
}
