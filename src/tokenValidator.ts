/**
 * トークン検証（順序固定・最初の失敗で打ち切り）
 * 1. decode 2. tokenTs = interval * period 3. |now - tokenTs| > window → expired
 * 4. セッションなし 5. セッション非 active
 * 副作用なし。同じトークンを何度検証してもよい（時間経過・セッション終了でのみ無効になる）
 */

import { assertPositiveInteger, type Clock } from './clock';
import { isSessionRecordActive, type SessionStore } from './sessionStore';
import { tryDecodeToken } from './tokenCodec';
import type { TokenValidationErrorCode, TokenValidationFailure, TokenValidationResult } from './types';

export const VALIDATION_MESSAGES: Record<TokenValidationErrorCode, string> = {
  invalid_format: 'Invalid token format.',
  expired: 'QR expired, please scan a fresh one.',
  session_not_found: 'Session not found.',
  session_ended: 'Session has ended.',
};

function fail(error: TokenValidationErrorCode): TokenValidationFailure {
  return { ok: false, tokenTs: null, error, message: VALIDATION_MESSAGES[error] };
}

export class TokenValidator {
  constructor(private sessions: SessionStore, private clock: Clock) { }

  async validate(
    token: string,
    rotationPeriodSeconds: number,
    validityWindowSeconds: number
  ): Promise<TokenValidationResult> {
    assertPositiveInteger('rotationPeriodSeconds', rotationPeriodSeconds);
    assertPositiveInteger('validityWindowSeconds', validityWindowSeconds);

    const decoded = tryDecodeToken(token);
    if (!decoded) return fail('invalid_format');

    const tokenTs = decoded.interval * rotationPeriodSeconds;
    // 発行側との時計ずれを許容するため前後対称
    if (Math.abs(this.clock.now() - tokenTs) > validityWindowSeconds) {
      return fail('expired');
    }

    // セッション行は別テーブル扱い。毎回引き直す
    const session = await this.sessions.get(decoded.sessionName);
    if (!session) return fail('session_not_found');
    if (!isSessionRecordActive(session)) return fail('session_ended');

    return { ok: true, tokenTs, sessionName: decoded.sessionName, error: null };
  }
}
