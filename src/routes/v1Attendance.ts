/**
 * v1 出席 API（sessions / token / attendance）
 * 検証・記録の失敗は { success: false, error: { code, message } } で返す
 */

import { Router, Request, Response, NextFunction } from 'express';
import type { SessionController } from '../sessionController';
import type { SessionExpiryScheduler } from '../sessionExpiry';
import type { AttendanceSubmissionErrorCode, SessionRecord } from '../types';
import { isSessionRecordActive } from '../sessionStore';
import { currentInterval } from '../clock';

export interface V1AttendanceDeps {
  controller: SessionController;
  expiry: SessionExpiryScheduler;
  rotationPeriodSeconds: number;
  validityWindowSeconds: number;
}

const SUBMISSION_STATUS: Record<AttendanceSubmissionErrorCode, number> = {
  invalid_format: 400,
  invalid_participant: 400,
  session_mismatch: 400,
  expired: 403,
  session_ended: 403,
  session_not_found: 404,
  duplicate: 409,
};

function normalizeText(value: unknown): string {
  return typeof value === 'string' ? value.trim() : '';
}

function parsePositiveNumber(value: unknown): number | undefined {
  if (typeof value === 'number' && Number.isFinite(value) && value > 0) {
    return value;
  }
  if (typeof value === 'string' && /^\d+(\.\d+)?$/.test(value.trim())) {
    const parsed = Number.parseFloat(value.trim());
    return parsed > 0 ? parsed : undefined;
  }
  return undefined;
}

function toIso(seconds: number | null): string | null {
  return seconds === null ? null : new Date(seconds * 1000).toISOString();
}

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/** async ハンドラの reject を error middleware に流す */
function asyncRoute(handler: AsyncHandler) {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

export function createV1AttendanceRouter(deps: V1AttendanceDeps): Router {
  const router = Router();
  const { controller, expiry, rotationPeriodSeconds, validityWindowSeconds } = deps;

  const toSessionView = (session: SessionRecord) => ({
    name: session.name,
    active: isSessionRecordActive(session),
    startedAt: session.startedAt,
    endedAt: session.endedAt,
    startedAtIso: toIso(session.startedAt),
    endedAtIso: toIso(session.endedAt),
    autoEndsAt: expiry.deadlineOf(session.name),
  });

  const resolveSession = async (res: Response, name: string): Promise<SessionRecord | null> => {
    const session = await controller.getSession(name);
    if (!session) {
      res.status(404).json({ code: 'not_found', message: 'Session not found.' });
      return null;
    }
    return session;
  };

  // POST /v1/sessions
  router.post('/sessions', asyncRoute(async (req, res) => {
    const body = (req.body ?? {}) as { name?: unknown; autoEndMinutes?: unknown };
    const name = normalizeText(body.name);
    const hasAutoEnd = body.autoEndMinutes !== undefined && body.autoEndMinutes !== null;
    const autoEndMinutes = parsePositiveNumber(body.autoEndMinutes);
    if (hasAutoEnd && autoEndMinutes === undefined) {
      res.status(400).json({ code: 'invalid', message: 'autoEndMinutes must be a positive number' });
      return;
    }

    const result = await controller.startSession(name);
    if (!result.ok) {
      res.status(400).json({ code: result.error, message: result.message });
      return;
    }

    // リスタート時は前回の期限を引き継がない
    if (autoEndMinutes !== undefined) {
      expiry.schedule(name, autoEndMinutes);
    } else {
      expiry.cancel(name);
    }
    res.status(201).json(toSessionView(result.session));
  }));

  // GET /v1/sessions
  router.get('/sessions', asyncRoute(async (_req, res) => {
    const sessions = await controller.listSessions();
    res.json({ items: sessions.map(toSessionView) });
  }));

  // GET /v1/sessions/:name
  router.get('/sessions/:name', asyncRoute(async (req, res) => {
    const session = await resolveSession(res, req.params.name);
    if (!session) return;
    const attendanceCount = await controller.countAttendance(session.name);
    res.json({ ...toSessionView(session), attendanceCount });
  }));

  // POST /v1/sessions/:name/end
  router.post('/sessions/:name/end', asyncRoute(async (req, res) => {
    const name = req.params.name;
    expiry.cancel(name);
    await controller.endSession(name);
    const session = await resolveSession(res, name);
    if (!session) return;
    res.json(toSessionView(session));
  }));

  // GET /v1/sessions/:name/token
  router.get('/sessions/:name/token', asyncRoute(async (req, res) => {
    const session = await resolveSession(res, req.params.name);
    if (!session) return;
    if (!isSessionRecordActive(session)) {
      res.status(409).json({ code: 'session_inactive', message: 'Start a session to display the QR.' });
      return;
    }
    const interval = currentInterval(controller.clock, rotationPeriodSeconds);
    res.json({
      sessionName: session.name,
      token: controller.currentToken(session.name, rotationPeriodSeconds),
      interval,
      tokenTs: interval * rotationPeriodSeconds,
      rotationPeriodSeconds,
      validForSeconds: validityWindowSeconds,
    });
  }));

  // POST /v1/attendance/validate
  router.post('/attendance/validate', asyncRoute(async (req, res) => {
    const body = (req.body ?? {}) as { token?: unknown };
    const token = typeof body.token === 'string' ? body.token : '';
    const result = await controller.validateToken(token, rotationPeriodSeconds, validityWindowSeconds);
    res.json(result);
  }));

  // POST /v1/attendance
  router.post('/attendance', asyncRoute(async (req, res) => {
    const body = (req.body ?? {}) as { token?: unknown; participantId?: unknown; sessionName?: unknown };
    const token = typeof body.token === 'string' ? body.token : '';
    const participantId = normalizeText(body.participantId);
    const sessionName = normalizeText(body.sessionName) || undefined;

    if (!token) {
      res.status(400).json({
        success: false,
        error: { code: 'invalid_format', message: 'Invalid or incomplete QR link.' },
      });
      return;
    }

    const result = await controller.submitAttendance(
      { token, participantId, sessionName },
      rotationPeriodSeconds,
      validityWindowSeconds
    );
    if (!result.ok) {
      res.status(SUBMISSION_STATUS[result.error]).json({
        success: false,
        error: { code: result.error, message: result.message },
      });
      return;
    }
    res.status(201).json({
      success: true,
      message: result.message,
      sessionName: result.record.sessionName,
      participantId: result.record.participantId,
      tokenTs: result.record.tokenTs,
      submittedAt: result.record.submittedAt,
    });
  }));

  // GET /v1/sessions/:name/attendance
  router.get('/sessions/:name/attendance', asyncRoute(async (req, res) => {
    const sessionName = req.params.name;
    const items = await controller.listAttendance(sessionName);
    res.json({
      sessionName,
      items: items.map((item) => ({
        participantId: item.participantId,
        submittedAt: item.submittedAt,
        submittedAtIso: toIso(item.submittedAt),
      })),
    });
  }));

  return router;
}
