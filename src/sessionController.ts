/**
 * 表示層から直接呼ばれる唯一の窓口
 * 現在のトークンはサーバーに保持せず、呼ばれるたびに時計から再計算する
 */

import { AttendanceLedger } from './attendanceLedger';
import { type Clock, currentInterval, systemClock } from './clock';
import { logInfo } from './log';
import { SessionStore } from './sessionStore';
import type { IAttendanceStorage } from './storage/types';
import { TOKEN_DELIMITER, encodeToken, isValidSessionName } from './tokenCodec';
import { TokenValidator } from './tokenValidator';
import type {
  AttendanceListItem,
  AttendanceSubmission,
  AttendanceSubmissionResult,
  RecordAttendanceResult,
  SessionRecord,
  StartSessionResult,
  TokenValidationResult,
} from './types';

export interface SessionControllerDeps {
  storage: IAttendanceStorage;
  clock?: Clock;
}

export class SessionController {
  readonly clock: Clock;
  private sessions: SessionStore;
  private ledger: AttendanceLedger;
  private validator: TokenValidator;

  constructor(deps: SessionControllerDeps) {
    this.clock = deps.clock ?? systemClock;
    this.sessions = new SessionStore(deps.storage, this.clock);
    this.ledger = new AttendanceLedger(deps.storage, this.clock);
    this.validator = new TokenValidator(this.sessions, this.clock);
  }

  async startSession(name: string): Promise<StartSessionResult> {
    if (!isValidSessionName(name)) {
      return {
        ok: false,
        error: 'invalid_session_name',
        message: name
          ? `Session name must not contain "${TOKEN_DELIMITER}".`
          : 'Session name is required.',
      };
    }
    const session = await this.sessions.start(name);
    logInfo('[session] started', { name, startedAt: session.startedAt });
    return { ok: true, session };
  }

  /** 存在しないセッションでも何もせず成功する。自動終了タイマーから事前確認なしで呼べる */
  async endSession(name: string): Promise<void> {
    const ended = await this.sessions.end(name);
    if (ended) {
      logInfo('[session] ended', { name, endedAt: ended.endedAt });
    }
  }

  async isSessionActive(name: string): Promise<boolean> {
    return this.sessions.isActive(name);
  }

  async getSession(name: string): Promise<SessionRecord | null> {
    return this.sessions.get(name);
  }

  async listSessions(): Promise<SessionRecord[]> {
    return this.sessions.list();
  }

  currentToken(name: string, rotationPeriodSeconds: number): string {
    return encodeToken(name, currentInterval(this.clock, rotationPeriodSeconds));
  }

  async validateToken(
    token: string,
    rotationPeriodSeconds: number,
    validityWindowSeconds: number
  ): Promise<TokenValidationResult> {
    return this.validator.validate(token, rotationPeriodSeconds, validityWindowSeconds);
  }

  async recordAttendance(
    sessionName: string,
    participantId: string,
    token: string,
    tokenTs: number
  ): Promise<RecordAttendanceResult> {
    return this.ledger.record(sessionName, participantId, token, tokenTs);
  }

  async listAttendance(sessionName: string): Promise<AttendanceListItem[]> {
    return this.ledger.listForSession(sessionName);
  }

  async countAttendance(sessionName: string): Promise<number> {
    return this.ledger.count(sessionName);
  }

  /**
   * 参加者の提出フロー（検証 → 記録）
   * sessionName を渡した場合、トークンのセッションと一致しなければ拒否する
   */
  async submitAttendance(
    submission: AttendanceSubmission,
    rotationPeriodSeconds: number,
    validityWindowSeconds: number
  ): Promise<AttendanceSubmissionResult> {
    const participantId = submission.participantId.trim();
    if (!participantId) {
      return { ok: false, error: 'invalid_participant', message: 'Please enter registration number.' };
    }

    const validation = await this.validator.validate(
      submission.token,
      rotationPeriodSeconds,
      validityWindowSeconds
    );
    if (!validation.ok) {
      return { ok: false, error: validation.error, message: validation.message };
    }

    if (submission.sessionName !== undefined && submission.sessionName !== validation.sessionName) {
      return { ok: false, error: 'session_mismatch', message: 'Token does not belong to this session.' };
    }

    const result = await this.ledger.record(
      validation.sessionName,
      participantId,
      submission.token,
      validation.tokenTs
    );
    if (!result.ok) {
      return {
        ok: false,
        error: result.outcome === 'duplicate' ? 'duplicate' : 'invalid_participant',
        message: result.message,
      };
    }
    logInfo('[attendance] recorded', { sessionName: validation.sessionName, participantId });
    return { ok: true, record: result.record, message: result.message };
  }
}
