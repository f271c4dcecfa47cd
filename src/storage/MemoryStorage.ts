/**
 * メモリストレージ（テスト・単体起動用）
 * latencyMs を指定すると各操作に遅延を入れ、並行提出の競合を再現できる
 */

import { UniqueConstraintError } from '../errors';
import type { IAttendanceStorage } from './types';
import { createKeyedMutex } from './keyedMutex';

export interface MemoryStorageOptions {
  latencyMs?: number;
}

export function createMemoryStorage(options: MemoryStorageOptions = {}): IAttendanceStorage {
  const map = new Map<string, unknown>();
  const mutex = createKeyedMutex();
  const latencyMs = Math.max(0, options.latencyMs ?? 0);

  const delay = async (): Promise<void> => {
    if (latencyMs > 0) {
      await new Promise((r) => setTimeout(r, latencyMs));
    }
  };

  return {
    async get(key: string) {
      await delay();
      const value = map.get(key);
      return value === undefined ? undefined : structuredClone(value);
    },
    async put(key: string, value: unknown) {
      await delay();
      map.set(key, structuredClone(value));
    },
    async insert(key: string, value: unknown) {
      await delay();
      // 存在確認と書き込みの間に await を挟まない
      if (map.has(key)) {
        throw new UniqueConstraintError(key);
      }
      map.set(key, structuredClone(value));
    },
    async list(prefix: string) {
      await delay();
      const out = new Map<string, unknown>();
      for (const [k, v] of map) {
        if (k.startsWith(prefix)) out.set(k, structuredClone(v));
      }
      return out;
    },
    transaction<T>(scope: string, fn: () => Promise<T>): Promise<T> {
      return mutex.run(scope, fn);
    },
  };
}
