/**
 * セッションの状態管理（active / ended）
 * 同名 1 行。再 start は startedAt を更新し endedAt をクリアする（追記ではなくリスタート）
 */

import type { Clock } from './clock';
import type { SessionRecord } from './types';
import { type IAttendanceStorage, sessionKey, sessionPrefix } from './storage/types';

function parseTimestamp(value: unknown): number | null {
  if (typeof value === 'number' && Number.isFinite(value)) {
    return Math.floor(value);
  }
  return null;
}

/** 保存値 → SessionRecord。壊れた値は null（存在しない扱い） */
export function parseSessionRecord(raw: unknown): SessionRecord | null {
  if (!raw || typeof raw !== 'object') return null;
  const obj = raw as { name?: unknown; startedAt?: unknown; endedAt?: unknown };
  if (typeof obj.name !== 'string' || !obj.name) return null;
  const startedAt = parseTimestamp(obj.startedAt);
  if (startedAt === null) return null;
  const endedAt = parseTimestamp(obj.endedAt);
  return {
    name: obj.name,
    startedAt,
    // 0 は旧形式の「未終了」
    endedAt: endedAt && endedAt > 0 ? endedAt : null,
  };
}

/** start 済みかつ未終了。検証とダッシュボードで同じ定義を使う */
export function isSessionRecordActive(session: SessionRecord | null): session is SessionRecord {
  return session !== null && session.startedAt > 0 && session.endedAt === null;
}

export class SessionStore {
  constructor(private storage: IAttendanceStorage, private clock: Clock) { }

  async get(name: string): Promise<SessionRecord | null> {
    const raw = await this.storage.get(sessionKey(name));
    return parseSessionRecord(raw);
  }

  async start(name: string): Promise<SessionRecord> {
    const key = sessionKey(name);
    return this.storage.transaction(key, async () => {
      const session: SessionRecord = {
        name,
        startedAt: this.clock.now(),
        endedAt: null,
      };
      await this.storage.put(key, session);
      return session;
    });
  }

  /**
   * endedAt を記録する。該当行がなければ何もしない（エラーにしない）。
   * 既に終了済みなら最初の endedAt を保持する（now で上書きしない。
   * 自動終了と手動終了が重なっても終了時刻が動かないようにするための意図的な差分）
   */
  async end(name: string): Promise<SessionRecord | null> {
    const key = sessionKey(name);
    return this.storage.transaction(key, async () => {
      const current = parseSessionRecord(await this.storage.get(key));
      if (!current) return null;
      if (current.endedAt !== null) return current;
      const ended: SessionRecord = { ...current, endedAt: this.clock.now() };
      await this.storage.put(key, ended);
      return ended;
    });
  }

  async exists(name: string): Promise<boolean> {
    return (await this.get(name)) !== null;
  }

  async isActive(name: string): Promise<boolean> {
    return isSessionRecordActive(await this.get(name));
  }

  async hasEnded(name: string): Promise<boolean> {
    const session = await this.get(name);
    return session !== null && session.endedAt !== null;
  }

  async list(): Promise<SessionRecord[]> {
    const map = await this.storage.list(sessionPrefix());
    const out: SessionRecord[] = [];
    map.forEach((value) => {
      const session = parseSessionRecord(value);
      if (session) out.push(session);
    });
    return out;
  }
}
