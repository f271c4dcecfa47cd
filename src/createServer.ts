/**
 * Express アプリ組み立て（ストレージ・時計は注入。テストはメモリストレージで起動）
 */

import express, { Request, Response, NextFunction } from 'express';
import cors from 'cors';
import { type Clock, systemClock } from './clock';
import { type ServerConfig, loadConfig } from './config';
import { StorageFailureError } from './errors';
import { logError } from './log';
import { createV1AttendanceRouter } from './routes/v1Attendance';
import { SessionController } from './sessionController';
import { SessionExpiryScheduler } from './sessionExpiry';
import type { IAttendanceStorage } from './storage/types';

function clientErrorStatus(err: unknown): number | null {
  if (typeof err !== 'object' || err === null) return null;
  const raw = 'status' in err ? err.status : 'statusCode' in err ? err.statusCode : undefined;
  return typeof raw === 'number' && raw >= 400 && raw < 500 ? raw : null;
}

export interface CreateServerDeps {
  storage: IAttendanceStorage;
  clock?: Clock;
  config?: Partial<ServerConfig>;
  /** 省略時は内部で生成。dispose は呼び出し側の責任 */
  expiry?: SessionExpiryScheduler;
}

export function createServer(deps: CreateServerDeps) {
  const config: ServerConfig = { ...loadConfig(), ...deps.config };
  const clock = deps.clock ?? systemClock;
  const controller = new SessionController({ storage: deps.storage, clock });
  const expiry = deps.expiry ?? new SessionExpiryScheduler(controller, clock);

  const app = express();
  app.use(cors({ origin: config.corsOrigin }));
  app.use(express.json({ limit: '16kb' }));

  app.get('/health', (_req: Request, res: Response) => {
    res.json({ ok: true });
  });

  app.use(
    '/v1',
    createV1AttendanceRouter({
      controller,
      expiry,
      rotationPeriodSeconds: config.rotationPeriodSeconds,
      validityWindowSeconds: config.validityWindowSeconds,
    })
  );

  app.use((_req: Request, res: Response) => {
    res.status(404).json({ code: 'not_found', message: 'Not found' });
  });

  // ストレージ障害は致命扱い。リトライは呼び出し側に任せる
  app.use((err: unknown, req: Request, res: Response, _next: NextFunction) => {
    const message = err instanceof Error ? err.message : String(err);
    if (err instanceof StorageFailureError) {
      logError('[server] storage failure', { path: req.path, message });
      res.status(500).json({ code: 'storage_failure', message: 'Storage unavailable' });
      return;
    }
    // body-parser / express が付ける 4xx（413 本文サイズ超過、400 不正 JSON・不正な % エンコード等）
    const status = clientErrorStatus(err);
    if (status !== null) {
      res.status(status).json({ code: 'invalid', message: status === 413 ? 'Request body too large' : 'Malformed request' });
      return;
    }
    logError('[server] unhandled error', { path: req.path, message });
    res.status(500).json({ code: 'internal', message: 'Internal error' });
  });

  return Object.assign(app, { controller, expiry });
}
