/**
 * 出席 API 契約型
 */

export interface SessionRecord {
  name: string;
  /** Unix 秒 */
  startedAt: number;
  /** null = 未終了 */
  endedAt: number | null;
}

export interface AttendanceRecord {
  sessionName: string;
  participantId: string;
  /** 提出時のトークン文字列（監査用にそのまま保持） */
  token: string;
  /** トークンが示すローテーション区間の境界時刻（提出時刻ではない） */
  tokenTs: number;
  submittedAt: number;
}

export interface AttendanceListItem {
  participantId: string;
  submittedAt: number;
}

export type TokenValidationErrorCode =
  | 'invalid_format'
  | 'expired'
  | 'session_not_found'
  | 'session_ended';

export interface TokenValidationSuccess {
  ok: true;
  tokenTs: number;
  sessionName: string;
  error: null;
}

export interface TokenValidationFailure {
  ok: false;
  tokenTs: null;
  error: TokenValidationErrorCode;
  message: string;
}

export type TokenValidationResult = TokenValidationSuccess | TokenValidationFailure;

export type RecordAttendanceResult =
  | { ok: true; outcome: 'recorded'; message: string; record: AttendanceRecord }
  | { ok: false; outcome: 'duplicate' | 'invalid'; message: string };

export type StartSessionResult =
  | { ok: true; session: SessionRecord }
  | { ok: false; error: 'invalid_session_name'; message: string };

export type AttendanceSubmissionErrorCode =
  | TokenValidationErrorCode
  | 'invalid_participant'
  | 'session_mismatch'
  | 'duplicate';

export interface AttendanceSubmission {
  token: string;
  participantId: string;
  /** 参加者側 URL に載っていたセッション名。指定時はトークンのセッションと一致必須 */
  sessionName?: string;
}

export type AttendanceSubmissionResult =
  | { ok: true; record: AttendanceRecord; message: string }
  | { ok: false; error: AttendanceSubmissionErrorCode; message: string };
