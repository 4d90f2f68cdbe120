import { getLocalDateString } from '@/lib/date';
import type { DailyCounterStore } from '@/lib/data/dailyCounterStore';
import { fail, lookupErrors, ok, type ActionResult, type RateLimitError } from '@/lib/types';
import { logDebug, logInfo } from '@/lib/logger';

export interface RateLimitConfig {
  windowMs: number;
  maxPerWindow: number;
  maxPerDay: number;
}

export const DEFAULT_RATE_LIMIT: RateLimitConfig = {
  windowMs: 60_000,
  maxPerWindow: 2,
  maxPerDay: 10,
};

/**
 * Two-tier lookup limiter: a short window held in memory for the process
 * lifetime, and a per-calendar-day quota persisted on the device.
 *
 * A rejected attempt never changes any counter. `tryAcquire` calls are
 * serialized, so two concurrent callers cannot both read a stale
 * "under quota" state.
 */
export class RateLimiter {
  private readonly config: RateLimitConfig;
  private lastSearchTime: number | null = null;
  private windowSearchCount = 0;
  private queue: Promise<unknown> = Promise.resolve();

  constructor(
    private readonly dailyStore: DailyCounterStore,
    config: Partial<RateLimitConfig> = {}
  ) {
    this.config = { ...DEFAULT_RATE_LIMIT, ...config };
  }

  private withLock<T>(task: () => Promise<T>): Promise<T> {
    const run = this.queue.then(task, task);
    // Keep the chain alive after a failed task
    this.queue = run.catch(() => undefined);
    return run;
  }

  private async dailyCountFor(now: Date): Promise<number> {
    const record = await this.dailyStore.read();
    if (!record || record.day !== getLocalDateString(now)) {
      return 0;
    }
    return record.count;
  }

  tryAcquire(now: Date = new Date()): Promise<ActionResult<void, RateLimitError>> {
    return this.withLock(async () => {
      const nowMs = now.getTime();

      let windowCount = this.windowSearchCount;
      if (this.lastSearchTime !== null) {
        const elapsed = nowMs - this.lastSearchTime;
        if (elapsed < this.config.windowMs) {
          if (windowCount >= this.config.maxPerWindow) {
            const waitSeconds = Math.floor((this.config.windowMs - elapsed) / 1000);
            logDebug('Lookup window exceeded', { waitSeconds });
            return fail(lookupErrors.windowExceeded(waitSeconds));
          }
        } else {
          windowCount = 0;
        }
      }

      const dailyCount = await this.dailyCountFor(now);
      if (dailyCount >= this.config.maxPerDay) {
        logInfo('Daily lookup quota reached', { dailyCount });
        return fail(lookupErrors.dailyLimitReached(this.config.maxPerDay));
      }

      await this.dailyStore.write({ count: dailyCount + 1, day: getLocalDateString(now) });
      this.lastSearchTime = nowMs;
      this.windowSearchCount = windowCount + 1;

      logDebug('Lookup slot acquired', {
        windowCount: this.windowSearchCount,
        dailyCount: dailyCount + 1,
        maxPerDay: this.config.maxPerDay,
      });
      return ok(undefined);
    });
  }

  /**
   * Lookups left today; a new day has the full quota.
   */
  remainingToday(now: Date = new Date()): Promise<number> {
    return this.withLock(async () => {
      const dailyCount = await this.dailyCountFor(now);
      return Math.max(0, this.config.maxPerDay - dailyCount);
    });
  }
}
