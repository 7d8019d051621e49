import { CancelledError } from "../core/errors";
import { sleep as defaultSleep, type SleepFn } from "../core/sleep";

export interface RateLimiterOptions {
  requestsPerSecond: number;
  burst?: number;
  now?: () => number;
  sleep?: SleepFn;
}

/**
 * Token bucket shared by every fetch path in one process.
 *
 * `acquire` reserves its token synchronously, letting the balance go negative,
 * and then sleeps until the debt it created has been refilled. Callers are
 * therefore released in call order, spaced by `1 / requestsPerSecond`, however
 * many of them arrive at once. A `requestsPerSecond` of zero or less disables
 * limiting; cooldowns still apply.
 */
export class RateLimiter {
  private readonly rate: number;
  private readonly burst: number;
  private readonly now: () => number;
  private readonly sleep: SleepFn;

  private tokens: number;
  private lastRefill: number;
  private cooldownUntil = 0;

  constructor(options: RateLimiterOptions) {
    this.rate = options.requestsPerSecond;
    this.burst = Math.max(1, options.burst ?? 1);
    this.now = options.now ?? Date.now;
    this.sleep = options.sleep ?? defaultSleep;
    this.tokens = this.burst;
    this.lastRefill = this.now();
  }

  get enabled(): boolean {
    return this.rate > 0;
  }

  async acquire(signal?: AbortSignal): Promise<void> {
    if (signal?.aborted) {
      throw new CancelledError();
    }

    const now = this.now();
    if (!this.enabled) {
      const waitMs = this.cooldownUntil - now;
      if (waitMs > 0) {
        await this.sleep(waitMs, signal);
      }
      return;
    }

    this.refill(now);
    this.tokens -= 1;
    const deficitMs = this.tokens < 0 ? (-this.tokens / this.rate) * 1000 : 0;
    const waitMs = Math.max(0, this.lastRefill - now + deficitMs);
    if (waitMs <= 0) {
      return;
    }

    try {
      await this.sleep(waitMs, signal);
    } catch (error) {
      this.tokens = Math.min(this.burst, this.tokens + 1);
      throw error;
    }
  }

  /** Holds every acquisition until `now + ms`; used after the server answers 429. */
  cooldown(ms: number): void {
    if (ms <= 0) {
      return;
    }
    const now = this.now();
    this.cooldownUntil = Math.max(this.cooldownUntil, now + ms);
    if (!this.enabled) {
      return;
    }
    this.refill(now);
    this.tokens = Math.min(this.tokens, 0);
    this.lastRefill = Math.max(this.lastRefill, this.cooldownUntil);
  }

  private refill(now: number): void {
    if (now <= this.lastRefill) {
      return;
    }
    const elapsedSeconds = (now - this.lastRefill) / 1000;
    this.tokens = Math.min(this.burst, this.tokens + elapsedSeconds * this.rate);
    this.lastRefill = now;
  }
}
