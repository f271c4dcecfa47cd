/**
 * セッション自動終了（呼び出し側が持つ期限）
 * deadline = start 時点の now + minutes * 60。到達したら endSession を呼ぶ
 */

import type { Clock } from './clock';
import { logError, logInfo } from './log';

export interface SessionEnder {
  endSession(name: string): Promise<void>;
}

/** setTimeout の上限（約 24.8 日）。これより先の期限は分割して張り直す */
export const MAX_TIMER_DELAY_MS = 2 ** 31 - 1;

interface ExpiryEntry {
  deadline: number;
  timer: ReturnType<typeof setTimeout>;
}

export class SessionExpiryScheduler {
  private entries = new Map<string, ExpiryEntry>();

  constructor(private controller: SessionEnder, private clock: Clock) { }

  /** 既存の期限は置き換える。戻り値は deadline（Unix 秒） */
  schedule(name: string, minutes: number): number {
    if (!Number.isFinite(minutes) || minutes <= 0) {
      throw new RangeError(`minutes must be positive (got ${minutes})`);
    }
    this.cancel(name);
    const deadline = this.clock.now() + Math.round(minutes * 60);
    this.entries.set(name, { deadline, timer: this.arm(name, deadline) });
    return deadline;
  }

  cancel(name: string): boolean {
    const entry = this.entries.get(name);
    if (!entry) return false;
    clearTimeout(entry.timer);
    this.entries.delete(name);
    return true;
  }

  deadlineOf(name: string): number | null {
    return this.entries.get(name)?.deadline ?? null;
  }

  /** 期限切れのセッションをまとめて終了する（tick 駆動の呼び出し側向け） */
  async expireDue(): Promise<string[]> {
    const now = this.clock.now();
    const due: string[] = [];
    for (const [name, entry] of this.entries) {
      if (entry.deadline <= now) due.push(name);
    }
    for (const name of due) {
      this.cancel(name);
      await this.controller.endSession(name);
      logInfo('[expiry] session auto-ended', { name });
    }
    return due;
  }

  dispose(): void {
    for (const entry of this.entries.values()) {
      clearTimeout(entry.timer);
    }
    this.entries.clear();
  }

  private arm(name: string, deadline: number): ReturnType<typeof setTimeout> {
    const delayMs = Math.min(MAX_TIMER_DELAY_MS, Math.max(0, (deadline - this.clock.now()) * 1000));
    const timer = setTimeout(() => {
      this.fire(name, deadline);
    }, delayMs);
    timer.unref();
    return timer;
  }

  private fire(name: string, deadline: number): void {
    const entry = this.entries.get(name);
    if (!entry || entry.deadline !== deadline) return;
    if (deadline > this.clock.now()) {
      entry.timer = this.arm(name, deadline);
      return;
    }
    this.entries.delete(name);
    this.controller
      .endSession(name)
      .then(() => {
        logInfo('[expiry] session auto-ended', { name });
      })
      .catch((e: unknown) => {
        logError('[expiry] failed to end session', { name, message: e instanceof Error ? e.message : String(e) });
      });
  }
}
