import { describe, it, expect } from "vitest";

import { SlidingWindowLimiter, DEFAULT_BUCKETS, PRUNE_INTERVAL_MS } from "@/lib/rate-limiter.js";

function clock(start = 1_000_000) {
  let now = start;
  return {
    now: () => now,
    advance: (ms: number) => {
      now += ms;
    },
  };
}

describe("SlidingWindowLimiter", () => {
  it("admits up to the bucket maximum and rejects the next", () => {
    const time = clock();
    const limiter = new SlidingWindowLimiter(DEFAULT_BUCKETS, time.now);

    for (let i = 0; i < 30; i++) {
      expect(limiter.check("10.0.0.1", "classify").allowed).toBe(true);
    }
    expect(limiter.check("10.0.0.1", "classify")).toEqual({ allowed: false, retryAfterSeconds: 60 });
  });

  it("reports the remaining allowance", () => {
    const limiter = new SlidingWindowLimiter(DEFAULT_BUCKETS, clock().now);
    expect(limiter.check("a", "agents")).toEqual({ allowed: true, remaining: 2 });
    expect(limiter.check("a", "agents")).toEqual({ allowed: true, remaining: 1 });
    expect(limiter.check("a", "agents")).toEqual({ allowed: true, remaining: 0 });
    expect(limiter.check("a", "agents")).toEqual({ allowed: false, retryAfterSeconds: 300 });
  });

  it("admits again once old hits leave the window", () => {
    const time = clock();
    const limiter = new SlidingWindowLimiter({ api: { maxRequests: 1, windowMs: 1_000 } }, time.now);

    expect(limiter.check("a", "api").allowed).toBe(true);
    time.advance(999);
    expect(limiter.check("a", "api").allowed).toBe(false);
    time.advance(2);
    expect(limiter.check("a", "api").allowed).toBe(true);
  });

  it("keeps buckets and callers independent", () => {
    const limiter = new SlidingWindowLimiter(DEFAULT_BUCKETS, clock().now);
    for (let i = 0; i < 3; i++) limiter.check("a", "agents");

    expect(limiter.check("a", "agents").allowed).toBe(false);
    expect(limiter.check("a", "classify").allowed).toBe(true);
    expect(limiter.check("b", "agents").allowed).toBe(true);
  });

  it("falls back to the api limits for unknown buckets", () => {
    const limiter = new SlidingWindowLimiter(DEFAULT_BUCKETS, clock().now);
    expect(limiter.check("a", "mystery")).toEqual({ allowed: true, remaining: 59 });
  });

  it("prunes keys whose hits have expired", () => {
    const time = clock();
    const limiter = new SlidingWindowLimiter(DEFAULT_BUCKETS, time.now);
    limiter.check("a", "classify");
    limiter.check("a", "agents");

    time.advance(61_000);
    limiter.prune();
    expect(limiter.trackedKeys).toBe(1);
  });

  it("forgets idle callers as traffic continues", () => {
    const time = clock();
    const limiter = new SlidingWindowLimiter(DEFAULT_BUCKETS, time.now);
    for (let i = 0; i < 10_000; i++) {
      limiter.check(`10.0.${Math.floor(i / 256)}.${i % 256}`, "classify");
    }
    expect(limiter.trackedKeys).toBe(10_000);

    time.advance(10 * 60_000);
    limiter.check("192.0.2.1", "classify");

    expect(limiter.trackedKeys).toBe(1);
  });

  it("sweeps at most once per interval", () => {
    const time = clock();
    const limiter = new SlidingWindowLimiter({ api: { maxRequests: 5, windowMs: 1_000 } }, time.now);
    limiter.check("a", "api");

    time.advance(PRUNE_INTERVAL_MS - 1);
    limiter.check("b", "api");
    expect(limiter.trackedKeys).toBe(2);

    time.advance(1);
    limiter.check("c", "api");
    expect(limiter.trackedKeys).toBe(2);
  });
});
