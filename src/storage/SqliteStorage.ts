/**
 * SQLite（better-sqlite3）による永続ストレージ
 * kv.key の PRIMARY KEY が出席記録の一意制約のバックストップになる
 */

import type Database from 'better-sqlite3';
import { StorageFailureError, UniqueConstraintError } from '../errors';
import type { IAttendanceStorage } from './types';
import { createKeyedMutex } from './keyedMutex';

const SCHEMA = `
  CREATE TABLE IF NOT EXISTS kv (
    key TEXT PRIMARY KEY,
    value TEXT NOT NULL
  )
`;

interface KvRow {
  key: string;
  value: string;
}

function sqliteErrorCode(err: unknown): string | null {
  if (typeof err === 'object' && err !== null && 'code' in err && typeof err.code === 'string') {
    return err.code;
  }
  return null;
}

function isUniqueViolation(err: unknown): boolean {
  const code = sqliteErrorCode(err);
  return code === 'SQLITE_CONSTRAINT_PRIMARYKEY' || code === 'SQLITE_CONSTRAINT_UNIQUE';
}

function parseValue(key: string, raw: string): unknown {
  try {
    return JSON.parse(raw);
  } catch (e) {
    throw new StorageFailureError(`corrupt value at ${key}`, e);
  }
}

export function createSqliteStorage(db: Database.Database): IAttendanceStorage {
  db.exec(SCHEMA);

  const selectOne = db.prepare<[string], Pick<KvRow, 'value'>>('SELECT value FROM kv WHERE key = ?');
  const upsert = db.prepare<[string, string]>(
    'INSERT INTO kv (key, value) VALUES (?, ?) ON CONFLICT(key) DO UPDATE SET value = excluded.value'
  );
  const insertOnly = db.prepare<[string, string]>('INSERT INTO kv (key, value) VALUES (?, ?)');
  const selectPrefix = db.prepare<[number, string], KvRow>(
    'SELECT key, value FROM kv WHERE substr(key, 1, ?) = ? ORDER BY rowid'
  );
  const mutex = createKeyedMutex();

  const guard = <T>(op: string, fn: () => T): T => {
    try {
      return fn();
    } catch (e) {
      if (e instanceof StorageFailureError) throw e;
      throw new StorageFailureError(`sqlite ${op} failed`, e);
    }
  };

  return {
    async get(key: string) {
      const row = guard('get', () => selectOne.get(key));
      return row ? parseValue(key, row.value) : undefined;
    },
    async put(key: string, value: unknown) {
      guard('put', () => upsert.run(key, JSON.stringify(value)));
    },
    async insert(key: string, value: unknown) {
      try {
        insertOnly.run(key, JSON.stringify(value));
      } catch (e) {
        if (isUniqueViolation(e)) throw new UniqueConstraintError(key);
        throw new StorageFailureError('sqlite insert failed', e);
      }
    },
    async list(prefix: string) {
      const rows = guard('list', () => selectPrefix.all(prefix.length, prefix));
      const out = new Map<string, unknown>();
      for (const row of rows) {
        out.set(row.key, parseValue(row.key, row.value));
      }
      return out;
    },
    transaction<T>(scope: string, fn: () => Promise<T>): Promise<T> {
      // 1 接続を共有するため BEGIN は使わず scope 単位で直列化する。個々の書き込みは autocommit
      return mutex.run(scope, fn);
    },
  };
}
