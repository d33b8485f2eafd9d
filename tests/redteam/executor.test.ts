import { describe, it, expect } from "vitest";

import { runBounded, withTimeout } from "@/redteam/executor.js";

const pause = (ms: number) => new Promise<void>((resolve) => setTimeout(resolve, ms));

describe("runBounded", () => {
  it("never exceeds the concurrency limit", async () => {
    let inFlight = 0;
    let peak = 0;

    await runBounded([1, 2, 3, 4, 5, 6, 7], 3, async () => {
      inFlight++;
      peak = Math.max(peak, inFlight);
      await pause(5);
      inFlight--;
    });

    expect(peak).toBe(3);
  });

  it("keeps results in input order", async () => {
    const results = await runBounded([30, 5, 15], 3, async (ms, index) => {
      await pause(ms);
      return `${index}:${ms}`;
    });
    expect(results).toEqual(["0:30", "1:5", "2:15"]);
  });

  it("handles an empty list", async () => {
    expect(await runBounded([], 3, async () => 1)).toEqual([]);
  });
});

describe("withTimeout", () => {
  it("passes through a fast result", async () => {
    expect(await withTimeout(Promise.resolve(7), 50, "Fast")).toBe(7);
  });

  it("rejects a slow one", async () => {
    await expect(withTimeout(pause(200), 10, "Slow")).rejects.toThrow("Slow timed out after 10ms");
  });
});
