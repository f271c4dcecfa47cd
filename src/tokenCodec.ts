/**
 * トークン形式: `${sessionName}|${interval}`
 * セッション名に区切り文字を含めることはできない（start 時点で拒否）
 */

import { InvalidSessionNameError, MalformedTokenError } from './errors';

export const TOKEN_DELIMITER = '|';

const INTERVAL_RE = /^-?\d+$/;

export interface DecodedToken {
  sessionName: string;
  interval: number;
}

export function isValidSessionName(name: string): boolean {
  return name.length > 0 && !name.includes(TOKEN_DELIMITER);
}

export function encodeToken(sessionName: string, interval: number): string {
  if (sessionName.length === 0) {
    throw new InvalidSessionNameError(sessionName, 'empty');
  }
  if (sessionName.includes(TOKEN_DELIMITER)) {
    throw new InvalidSessionNameError(sessionName, `contains "${TOKEN_DELIMITER}"`);
  }
  if (!Number.isSafeInteger(interval)) {
    throw new RangeError(`interval must be an integer (got ${interval})`);
  }
  return `${sessionName}${TOKEN_DELIMITER}${interval}`;
}

export function decodeToken(token: string): DecodedToken {
  const parts = token.split(TOKEN_DELIMITER);
  if (parts.length !== 2) {
    throw new MalformedTokenError(token, `expected 2 parts, got ${parts.length}`);
  }
  const [sessionName, rawInterval] = parts;
  if (!sessionName) {
    throw new MalformedTokenError(token, 'empty session name');
  }
  if (!INTERVAL_RE.test(rawInterval)) {
    throw new MalformedTokenError(token, 'interval is not an integer');
  }
  const interval = Number.parseInt(rawInterval, 10);
  if (!Number.isSafeInteger(interval)) {
    throw new MalformedTokenError(token, 'interval out of range');
  }
  return { sessionName, interval };
}

export function tryDecodeToken(token: string): DecodedToken | null {
  try {
    return decodeToken(token);
  } catch (e) {
    if (e instanceof MalformedTokenError) return null;
    throw e;
  }
}
