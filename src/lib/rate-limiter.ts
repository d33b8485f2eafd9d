/**
 * In-memory sliding-window rate limiter.
 *
 * Each caller/bucket pair keeps the timestamps of its accepted requests inside
 * the current window. Buckets are independent: exhausting `agents` never
 * affects `classify` for the same caller.
 */

export interface RateLimitBucket {
  /** Maximum accepted requests inside one window */
  maxRequests: number;
  /** Window length in milliseconds */
  windowMs: number;
}

export type RateLimitDecision =
  | { allowed: true; remaining: number }
  | { allowed: false; retryAfterSeconds: number };

export const DEFAULT_BUCKETS = {
  classify: { maxRequests: 30, windowMs: 60_000 },
  agents: { maxRequests: 3, windowMs: 5 * 60_000 },
  api: { maxRequests: 60, windowMs: 60_000 },
} as const satisfies Record<string, RateLimitBucket>;

/** How often `check()` sweeps keys that have aged out */
export const PRUNE_INTERVAL_MS = 60_000;

export class SlidingWindowLimiter {
  private readonly hits = new Map<string, number[]>();
  private readonly now: () => number;
  private lastPrune: number;

  constructor(
    private readonly buckets: Record<string, RateLimitBucket> = DEFAULT_BUCKETS,
    now?: () => number
  ) {
    this.now = now ?? Date.now;
    this.lastPrune = this.now();
  }

  /**
   * Record an attempt by `caller` against `bucketName` and decide whether it passes.
   * Unknown bucket names fall back to the `api` limits.
   */
  check(caller: string, bucketName: string): RateLimitDecision {
    const bucket = this.buckets[bucketName] ?? DEFAULT_BUCKETS.api;
    const key = `${bucketName}:${caller}`;
    const now = this.now();
    if (now - this.lastPrune >= PRUNE_INTERVAL_MS) {
      this.prune();
    }
    const cutoff = now - bucket.windowMs;

    const recent = (this.hits.get(key) ?? []).filter((t) => t > cutoff);

    if (recent.length >= bucket.maxRequests) {
      this.hits.set(key, recent);
      return { allowed: false, retryAfterSeconds: Math.ceil(bucket.windowMs / 1000) };
    }

    recent.push(now);
    this.hits.set(key, recent);
    return { allowed: true, remaining: bucket.maxRequests - recent.length };
  }

  /**
   * Drop keys whose every hit has aged out of its window
   */
  prune(): void {
    const now = this.now();
    this.lastPrune = now;
    for (const [key, times] of this.hits) {
      const bucketName = key.slice(0, key.indexOf(":"));
      const bucket = this.buckets[bucketName] ?? DEFAULT_BUCKETS.api;
      if (times.every((t) => t <= now - bucket.windowMs)) {
        this.hits.delete(key);
      }
    }
  }

  get trackedKeys(): number {
    return this.hits.size;
  }
}
