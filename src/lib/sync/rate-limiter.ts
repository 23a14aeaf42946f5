import { RateLimitExceeded } from "@/lib/errors";
import type { Backend } from "./types";

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms) => new Promise((resolve) => setTimeout(resolve, ms)),
};

export interface BucketOptions {
  capacity: number;
  refillPerSecond: number;
}

export interface RateLimiterOptions {
  buckets: Record<Backend, BucketOptions>;
  /** Longest a single acquire() may wait before failing. */
  maxWaitMs: number;
  clock?: Clock;
}

export interface RateBudget {
  callsInWindow: number;
  windowStart: number;
  backoffUntil: number;
  tokens: number;
}

class TokenBucket {
  private tokens: number;
  private lastRefill: number;
  private backoffUntil = 0;
  private callsInWindow = 0;
  private windowStart: number;
  private readonly maxTokens: number;
  private readonly refillRate: number; // tokens per ms
  private readonly windowMs: number;

  constructor(options: BucketOptions, now: number) {
    if (options.capacity < 1 || options.refillPerSecond <= 0) {
      throw new RangeError("Rate limiter needs capacity >= 1 and a positive refill rate");
    }
    this.maxTokens = options.capacity;
    this.tokens = options.capacity;
    this.refillRate = options.refillPerSecond / 1000;
    this.windowMs = (options.capacity / options.refillPerSecond) * 1000;
    this.lastRefill = now;
    this.windowStart = now;
  }

  private refill(now: number) {
    if (now < this.backoffUntil) return;
    const from = Math.max(this.lastRefill, this.backoffUntil);
    if (now > from) {
      this.tokens = Math.min(this.maxTokens, this.tokens + (now - from) * this.refillRate);
    }
    this.lastRefill = now;
    if (now - this.windowStart >= this.windowMs) {
      this.windowStart = now;
      this.callsInWindow = 0;
    }
  }

  /** Takes a token, or returns how long to wait before trying again. */
  tryTake(now: number): number {
    this.refill(now);
    if (now < this.backoffUntil) {
      return this.backoffUntil - now;
    }
    if (this.tokens >= 1) {
      this.tokens -= 1;
      this.callsInWindow++;
      return 0;
    }
    return (1 - this.tokens) / this.refillRate;
  }

  backoff(now: number, retryAfterMs: number) {
    const until = now + retryAfterMs;
    if (until <= this.backoffUntil) return;
    this.backoffUntil = until;
    this.tokens = 0;
    this.lastRefill = until;
  }

  snapshot(now: number): RateBudget {
    this.refill(now);
    return {
      callsInWindow: this.callsInWindow,
      windowStart: this.windowStart,
      backoffUntil: this.backoffUntil,
      tokens: this.tokens,
    };
  }
}

/**
 * Token bucket per backend, shared by every caller regardless of which sync
 * direction issued the call. A server-supplied retry-after always overrides
 * the local refill schedule.
 */
export class RateLimiter {
  private readonly buckets: Record<Backend, TokenBucket>;
  private readonly clock: Clock;
  private readonly maxWaitMs: number;

  constructor(options: RateLimiterOptions) {
    this.clock = options.clock ?? systemClock;
    this.maxWaitMs = options.maxWaitMs;
    const now = this.clock.now();
    this.buckets = {
      SHEET: new TokenBucket(options.buckets.SHEET, now),
      CRM: new TokenBucket(options.buckets.CRM, now),
    };
  }

  async acquire(backend: Backend): Promise<void> {
    const bucket = this.buckets[backend];
    let waited = 0;

    for (;;) {
      const wait = bucket.tryTake(this.clock.now());
      if (wait <= 0) return;

      if (waited + wait > this.maxWaitMs) {
        throw new RateLimitExceeded(backend, wait);
      }
      await this.clock.sleep(wait);
      waited += wait;
    }
  }

  onResponse(backend: Backend, retryAfterMs?: number) {
    if (retryAfterMs === undefined || retryAfterMs <= 0) return;
    this.buckets[backend].backoff(this.clock.now(), retryAfterMs);
  }

  budget(backend: Backend): RateBudget {
    return this.buckets[backend].snapshot(this.clock.now());
  }
}
