/**
 * 出席 API 統合テスト（createServer + MemoryStorage、ネットワーク依存なし）
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import request from 'supertest';
import { createServer } from '../src/createServer';
import { createMemoryStorage } from '../src/storage/MemoryStorage';
import { createManualClock, type ManualClock } from '../src/clock';
import { StorageFailureError } from '../src/errors';
import type { IAttendanceStorage } from '../src/storage/types';

const config = { rotationPeriodSeconds: 2, validityWindowSeconds: 30, corsOrigin: '*' };

describe('attendance API', () => {
  let app: ReturnType<typeof createServer>;
  let clock: ManualClock;

  beforeEach(() => {
    clock = createManualClock(1000);
    app = createServer({ storage: createMemoryStorage(), clock, config });
  });

  afterEach(() => {
    app.expiry.dispose();
  });

  const startLecture = () => request(app).post('/v1/sessions').send({ name: 'Lecture1' });

  it('GET /health', async () => {
    const res = await request(app).get('/health');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({ ok: true });
  });

  it('POST /v1/sessions starts a session', async () => {
    const res = await startLecture();
    expect(res.status).toBe(201);
    expect(res.body).toEqual({
      name: 'Lecture1',
      active: true,
      startedAt: 1000,
      endedAt: null,
      startedAtIso: '1970-01-01T00:16:40.000Z',
      endedAtIso: null,
      autoEndsAt: null,
    });
  });

  it('POST /v1/sessions trims the name and rejects the token delimiter', async () => {
    const trimmed = await request(app).post('/v1/sessions').send({ name: '  Lab 2  ' });
    expect(trimmed.status).toBe(201);
    expect(trimmed.body.name).toBe('Lab 2');

    const bad = await request(app).post('/v1/sessions').send({ name: 'A|B' });
    expect(bad.status).toBe(400);
    expect(bad.body.code).toBe('invalid_session_name');

    const empty = await request(app).post('/v1/sessions').send({});
    expect(empty.status).toBe(400);
    expect(empty.body.code).toBe('invalid_session_name');
  });

  it('POST /v1/sessions with autoEndMinutes arms auto-expiry; restart clears it', async () => {
    const res = await request(app).post('/v1/sessions').send({ name: 'Lecture1', autoEndMinutes: 5 });
    expect(res.status).toBe(201);
    expect(res.body.autoEndsAt).toBe(1300);

    const restart = await startLecture();
    expect(restart.body.autoEndsAt).toBeNull();

    const invalid = await request(app).post('/v1/sessions').send({ name: 'Lecture1', autoEndMinutes: 'soon' });
    expect(invalid.status).toBe(400);
    expect(invalid.body.code).toBe('invalid');
  });

  it('GET /v1/sessions/:name/token returns the current rotating token', async () => {
    await startLecture();
    const res = await request(app).get('/v1/sessions/Lecture1/token');
    expect(res.status).toBe(200);
    expect(res.body).toEqual({
      sessionName: 'Lecture1',
      token: 'Lecture1|500',
      interval: 500,
      tokenTs: 1000,
      rotationPeriodSeconds: 2,
      validForSeconds: 30,
    });

    clock.advance(2);
    const next = await request(app).get('/v1/sessions/Lecture1/token');
    expect(next.body.token).toBe('Lecture1|501');
  });

  it('token endpoint: 404 for unknown, 409 for ended sessions', async () => {
    const unknown = await request(app).get('/v1/sessions/ghost/token');
    expect(unknown.status).toBe(404);

    await startLecture();
    await request(app).post('/v1/sessions/Lecture1/end').send({});
    const ended = await request(app).get('/v1/sessions/Lecture1/token');
    expect(ended.status).toBe(409);
    expect(ended.body.code).toBe('session_inactive');
  });

  it('end-to-end: mark attendance, duplicate, end, rejected', async () => {
    await startLecture();
    const tokenRes = await request(app).get('/v1/sessions/Lecture1/token');
    const token = tokenRes.body.token as string;

    clock.set(1005);
    const mark = await request(app)
      .post('/v1/attendance')
      .send({ token, participantId: ' R001 ', sessionName: 'Lecture1' });
    expect(mark.status).toBe(201);
    expect(mark.body).toEqual({
      success: true,
      message: 'Attendance marked.',
      sessionName: 'Lecture1',
      participantId: 'R001',
      tokenTs: 1000,
      submittedAt: 1005,
    });

    const dup = await request(app).post('/v1/attendance').send({ token, participantId: 'R001' });
    expect(dup.status).toBe(409);
    expect(dup.body).toEqual({
      success: false,
      error: { code: 'duplicate', message: 'This registration number has already submitted.' },
    });

    clock.set(2000);
    const endRes = await request(app).post('/v1/sessions/Lecture1/end').send({});
    expect(endRes.status).toBe(200);
    expect(endRes.body.active).toBe(false);
    expect(endRes.body.endedAt).toBe(2000);

    const late = await request(app).post('/v1/attendance').send({ token: 'Lecture1|1000', participantId: 'R002' });
    expect(late.status).toBe(403);
    expect(late.body.error.code).toBe('session_ended');

    const list = await request(app).get('/v1/sessions/Lecture1/attendance');
    expect(list.status).toBe(200);
    expect(list.body).toEqual({
      sessionName: 'Lecture1',
      items: [{ participantId: 'R001', submittedAt: 1005, submittedAtIso: '1970-01-01T00:16:45.000Z' }],
    });

    const detail = await request(app).get('/v1/sessions/Lecture1');
    expect(detail.body.attendanceCount).toBe(1);
  });

  it('POST /v1/attendance maps failures to status codes', async () => {
    await startLecture();

    const missing = await request(app).post('/v1/attendance').send({ participantId: 'R001' });
    expect(missing.status).toBe(400);
    expect(missing.body.error.code).toBe('invalid_format');

    const malformed = await request(app).post('/v1/attendance').send({ token: 'Lecture1', participantId: 'R001' });
    expect(malformed.status).toBe(400);
    expect(malformed.body.error).toEqual({ code: 'invalid_format', message: 'Invalid token format.' });

    const noParticipant = await request(app).post('/v1/attendance').send({ token: 'Lecture1|500', participantId: ' ' });
    expect(noParticipant.status).toBe(400);
    expect(noParticipant.body.error.code).toBe('invalid_participant');

    const notFound = await request(app).post('/v1/attendance').send({ token: 'Other|500', participantId: 'R001' });
    expect(notFound.status).toBe(404);
    expect(notFound.body.error.code).toBe('session_not_found');

    clock.set(1031);
    const expired = await request(app).post('/v1/attendance').send({ token: 'Lecture1|500', participantId: 'R001' });
    expect(expired.status).toBe(403);
    expect(expired.body.error).toEqual({ code: 'expired', message: 'QR expired, please scan a fresh one.' });
  });

  it('POST /v1/attendance rejects a token from another session', async () => {
    await startLecture();
    await request(app).post('/v1/sessions').send({ name: 'Lecture2' });
    const res = await request(app)
      .post('/v1/attendance')
      .send({ token: 'Lecture2|500', participantId: 'R001', sessionName: 'Lecture1' });
    expect(res.status).toBe(400);
    expect(res.body.error.code).toBe('session_mismatch');
  });

  it('concurrent submissions over HTTP record once', async () => {
    await startLecture();
    const [a, b] = await Promise.all([
      request(app).post('/v1/attendance').send({ token: 'Lecture1|500', participantId: 'A1' }),
      request(app).post('/v1/attendance').send({ token: 'Lecture1|500', participantId: 'A1' }),
    ]);
    expect([a.status, b.status].sort()).toEqual([201, 409]);
  });

  it('POST /v1/attendance/validate returns the validation result', async () => {
    await startLecture();
    const ok = await request(app).post('/v1/attendance/validate').send({ token: 'Lecture1|500' });
    expect(ok.status).toBe(200);
    expect(ok.body).toEqual({ ok: true, tokenTs: 1000, sessionName: 'Lecture1', error: null });

    const bad = await request(app).post('/v1/attendance/validate').send({ token: 'garbage' });
    expect(bad.status).toBe(200);
    expect(bad.body).toEqual({ ok: false, tokenTs: null, error: 'invalid_format', message: 'Invalid token format.' });
  });

  it('POST /v1/sessions/:name/end on unknown session is a no-op 404', async () => {
    const res = await request(app).post('/v1/sessions/ghost/end').send({});
    expect(res.status).toBe(404);
    const list = await request(app).get('/v1/sessions');
    expect(list.body.items).toEqual([]);
  });

  it('GET /v1/sessions lists sessions', async () => {
    await startLecture();
    const res = await request(app).get('/v1/sessions');
    expect(res.status).toBe(200);
    expect(res.body.items.map((s: { name: string }) => s.name)).toEqual(['Lecture1']);
  });

  it('malformed JSON body returns 400', async () => {
    const res = await request(app)
      .post('/v1/attendance')
      .set('Content-Type', 'application/json')
      .send('{"token":');
    expect(res.status).toBe(400);
    expect(res.body.code).toBe('invalid');
  });

  it('body over the JSON size limit returns 413', async () => {
    const res = await request(app)
      .post('/v1/attendance')
      .send({ token: 'x'.repeat(20_000), participantId: 'R001' });
    expect(res.status).toBe(413);
    expect(res.body).toEqual({ code: 'invalid', message: 'Request body too large' });
  });

  it('session names with unpaired surrogates start normally', async () => {
    const res = await request(app).post('/v1/sessions').send({ name: 'X\uD800' });
    expect(res.status).toBe(201);
    expect(res.body.active).toBe(true);
  });

  it('storage failures return 500 storage_failure', async () => {
    const base = createMemoryStorage();
    const broken: IAttendanceStorage = {
      ...base,
      get: async () => {
        throw new StorageFailureError('connection lost');
      },
    };
    const brokenApp = createServer({ storage: broken, clock, config });
    try {
      const res = await request(brokenApp).get('/v1/sessions/Lecture1');
      expect(res.status).toBe(500);
      expect(res.body).toEqual({ code: 'storage_failure', message: 'Storage unavailable' });
    } finally {
      brokenApp.expiry.dispose();
    }
  });
});
