import { isoNow } from '../utils/time.js';

// ─── Rate limiter types ─────────────────────────────────────────────────────

export interface RateLimiterConfig {
  opsPerMinute: number;
  /** Milliseconds clock, injectable for tests. */
  now?: () => number;
}

export interface RateLimitResult {
  allowed: boolean;
  remaining: number;
  limit: number;
  retryAfterSeconds: number | null;
  checkedAt: string;
}

export interface RateLimitMetrics {
  totalChecks: number;
  totalAllowed: number;
  totalDenied: number;
  deniedByAccount: Record<string, number>;
  trackedAccounts: number;
}

const WINDOW_MS = 60_000;

// ─── Bucket ─────────────────────────────────────────────────────────────────

/** Refills continuously at `capacity` tokens per window. */
class Bucket {
  private tokens: number;

  constructor(private readonly capacity: number, private refilledAt: number) {
    this.tokens = capacity;
  }

  take(now: number): boolean {
    this.refill(now);
    if (this.tokens < 1) return false;
    this.tokens -= 1;
    return true;
  }

  remaining(): number {
    return Math.floor(this.tokens);
  }

  secondsUntilNext(): number {
    return Math.ceil(((1 - this.tokens) / this.capacity) * (WINDOW_MS / 1000));
  }

  isFull(now: number): boolean {
    this.refill(now);
    return this.tokens >= this.capacity;
  }

  private refill(now: number): void {
    const elapsed = now - this.refilledAt;
    this.tokens = Math.min(this.capacity, this.tokens + (elapsed / WINDOW_MS) * this.capacity);
    this.refilledAt = now;
  }
}

// ─── Rate limiter (one bucket per account address) ──────────────────────────

export class RateLimiter {
  private readonly limit: number;
  private readonly now: () => number;
  private readonly buckets: Map<string, Bucket> = new Map();
  private lastSweepAt: number;
  private readonly metrics: Omit<RateLimitMetrics, 'trackedAccounts'> = {
    totalChecks: 0,
    totalAllowed: 0,
    totalDenied: 0,
    deniedByAccount: {},
  };

  constructor(config: RateLimiterConfig) {
    this.limit = config.opsPerMinute;
    this.now = config.now ?? Date.now;
    this.lastSweepAt = this.now();
  }

  /** Spends one operation for `account`; addresses match regardless of case. */
  check(account: string): RateLimitResult {
    const now = this.now();
    this.sweep(now);
    this.metrics.totalChecks += 1;

    const key = account.toLowerCase();
    let bucket = this.buckets.get(key);
    if (!bucket) {
      bucket = new Bucket(this.limit, now);
      this.buckets.set(key, bucket);
    }

    if (bucket.take(now)) {
      this.metrics.totalAllowed += 1;
      return {
        allowed: true,
        remaining: bucket.remaining(),
        limit: this.limit,
        retryAfterSeconds: null,
        checkedAt: isoNow(),
      };
    }

    this.metrics.totalDenied += 1;
    this.metrics.deniedByAccount[key] = (this.metrics.deniedByAccount[key] ?? 0) + 1;
    return {
      allowed: false,
      remaining: 0,
      limit: this.limit,
      retryAfterSeconds: bucket.secondsUntilNext(),
      checkedAt: isoNow(),
    };
  }

  getMetrics(): RateLimitMetrics {
    return { ...structuredClone(this.metrics), trackedAccounts: this.buckets.size };
  }

  /** A full bucket is the same as a new one, so it is dropped. Runs at most once per window. */
  private sweep(now: number): void {
    if (now - this.lastSweepAt < WINDOW_MS) return;
    this.lastSweepAt = now;

    for (const [key, bucket] of this.buckets) {
      if (bucket.isFull(now)) this.buckets.delete(key);
    }
  }
}
