/**
 * 出席台帳: (session, participant) につき 1 件
 * 存在確認 → insert をトランザクション内で行い、ストレージの一意制約違反も重複として扱う
 */

import type { Clock } from './clock';
import { UniqueConstraintError } from './errors';
import { logWarn } from './log';
import { type IAttendanceStorage, attendanceKey, attendancePrefix } from './storage/types';
import type { AttendanceListItem, AttendanceRecord, RecordAttendanceResult } from './types';

export const DUPLICATE_MESSAGE = 'This registration number has already submitted.';
export const RECORDED_MESSAGE = 'Attendance marked.';

export function parseAttendanceRecord(raw: unknown): AttendanceRecord | null {
  if (!raw || typeof raw !== 'object') return null;
  const obj = raw as {
    sessionName?: unknown;
    participantId?: unknown;
    token?: unknown;
    tokenTs?: unknown;
    submittedAt?: unknown;
  };
  if (typeof obj.sessionName !== 'string' || typeof obj.participantId !== 'string') return null;
  if (typeof obj.submittedAt !== 'number' || !Number.isFinite(obj.submittedAt)) return null;
  return {
    sessionName: obj.sessionName,
    participantId: obj.participantId,
    token: typeof obj.token === 'string' ? obj.token : '',
    tokenTs: typeof obj.tokenTs === 'number' && Number.isFinite(obj.tokenTs) ? obj.tokenTs : 0,
    submittedAt: obj.submittedAt,
  };
}

export class AttendanceLedger {
  constructor(private storage: IAttendanceStorage, private clock: Clock) { }

  async record(
    sessionName: string,
    participantId: string,
    token: string,
    tokenTs: number
  ): Promise<RecordAttendanceResult> {
    if (!participantId) {
      return { ok: false, outcome: 'invalid', message: 'Please enter registration number.' };
    }

    const key = attendanceKey(sessionName, participantId);
    return this.storage.transaction(key, async (): Promise<RecordAttendanceResult> => {
      const existing = await this.storage.get(key);
      if (existing !== undefined) {
        return { ok: false, outcome: 'duplicate', message: DUPLICATE_MESSAGE };
      }

      const record: AttendanceRecord = {
        sessionName,
        participantId,
        token,
        tokenTs,
        submittedAt: this.clock.now(),
      };
      try {
        await this.storage.insert(key, record);
      } catch (e) {
        if (e instanceof UniqueConstraintError) {
          logWarn('[attendance] duplicate caught by unique constraint', { sessionName, participantId });
          return { ok: false, outcome: 'duplicate', message: DUPLICATE_MESSAGE };
        }
        throw e;
      }
      return { ok: true, outcome: 'recorded', message: RECORDED_MESSAGE, record };
    });
  }

  async getRecord(sessionName: string, participantId: string): Promise<AttendanceRecord | null> {
    return parseAttendanceRecord(await this.storage.get(attendanceKey(sessionName, participantId)));
  }

  /** submittedAt 昇順。同時刻は記録順 */
  async listForSession(sessionName: string): Promise<AttendanceListItem[]> {
    const map = await this.storage.list(attendancePrefix(sessionName));
    const out: AttendanceListItem[] = [];
    map.forEach((value) => {
      const record = parseAttendanceRecord(value);
      if (!record || record.sessionName !== sessionName) return;
      out.push({ participantId: record.participantId, submittedAt: record.submittedAt });
    });
    out.sort((a, b) => a.submittedAt - b.submittedAt);
    return out;
  }

  async count(sessionName: string): Promise<number> {
    const list = await this.storage.list(attendancePrefix(sessionName));
    return list.size;
  }
}
