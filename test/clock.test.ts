import { describe, it, expect } from 'vitest';
import { createManualClock, currentInterval, systemClock } from '../src/clock';

describe('clock', () => {
  it('current interval is floor(now / period)', () => {
    const clock = createManualClock(1000);
    expect(currentInterval(clock, 2)).toBe(500);
    clock.advance(1);
    expect(currentInterval(clock, 2)).toBe(500);
    clock.advance(1);
    expect(currentInterval(clock, 2)).toBe(501);
    clock.set(59);
    expect(currentInterval(clock, 30)).toBe(1);
  });

  it('rejects non-positive rotation periods', () => {
    const clock = createManualClock(0);
    expect(() => currentInterval(clock, 0)).toThrow(RangeError);
    expect(() => currentInterval(clock, 1.5)).toThrow(RangeError);
  });

  it('system clock returns whole seconds', () => {
    const now = systemClock.now();
    expect(Number.isInteger(now)).toBe(true);
    expect(Math.abs(now - Date.now() / 1000)).toBeLessThan(2);
  });
});
