/**
 * 時刻ソース（Unix 秒の整数）
 */

export interface Clock {
  now(): number;
}

export interface ManualClock extends Clock {
  set(seconds: number): void;
  advance(seconds: number): void;
}

export const systemClock: Clock = {
  now() {
    return Math.floor(Date.now() / 1000);
  },
};

/** テスト・シミュレーション用。set/advance でのみ進む */
export function createManualClock(start: number): ManualClock {
  let current = Math.floor(start);
  return {
    now() {
      return current;
    },
    set(seconds: number) {
      current = Math.floor(seconds);
    },
    advance(seconds: number) {
      current += Math.floor(seconds);
    },
  };
}

export function assertPositiveInteger(name: string, value: number): void {
  if (!Number.isInteger(value) || value <= 0) {
    throw new RangeError(`${name} must be a positive integer (got ${value})`);
  }
}

export function currentInterval(clock: Clock, rotationPeriodSeconds: number): number {
  assertPositiveInteger('rotationPeriodSeconds', rotationPeriodSeconds);
  return Math.floor(clock.now() / rotationPeriodSeconds);
}
