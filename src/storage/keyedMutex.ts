/**
 * scope ごとの Promise チェーンによる排他（mutex）
 * 直前のタスクが reject しても後続は実行される
 */

export interface KeyedMutex {
  run<T>(scope: string, fn: () => Promise<T>): Promise<T>;
}

export function createKeyedMutex(): KeyedMutex {
  const locks = new Map<string, Promise<void>>();

  return {
    run<T>(scope: string, fn: () => Promise<T>): Promise<T> {
      const currentLock = locks.get(scope) ?? Promise.resolve();
      const task = currentLock.then(fn);
      const released = task.then(() => { }, () => { });
      locks.set(scope, released);
      void released.then(() => {
        // 後続が積まれていなければ掃除
        if (locks.get(scope) === released) locks.delete(scope);
      });
      return task;
    },
  };
}
