import { describe, it, expect } from "vitest";

import { ok, err, unwrap, unwrapOr, map, mapErr, andThen, all, tryCatch, tryCatchAsync } from "@/lib/result.js";

import type { Result } from "@/lib/result.js";

describe("Result", () => {
  it("ok and err build the two variants", () => {
    expect(ok(42)).toEqual({ success: true, data: 42 });
    expect(err("nope")).toEqual({ success: false, error: "nope" });
  });

  describe("unwrap", () => {
    it("returns data or throws the error", () => {
      expect(unwrap(ok(42))).toBe(42);
      expect(() => unwrap(err(new Error("test")))).toThrow("test");
    });

    it("wraps non-Error failures", () => {
      expect(() => unwrap(err("plain"))).toThrow("plain");
    });
  });

  it("unwrapOr falls back on failure", () => {
    const failed: Result<number, Error> = err(new Error("test"));
    expect(unwrapOr(failed, 0)).toBe(0);
    expect(unwrapOr(ok(5), 0)).toBe(5);
  });

  it("map transforms only successes", () => {
    const failed: Result<number, Error> = err(new Error("test"));
    expect(unwrap(map(ok(21), (x) => x * 2))).toBe(42);
    expect(map(failed, (x) => x * 2).success).toBe(false);
  });

  it("mapErr transforms only failures", () => {
    const failed: Result<number, string> = err("error");
    const mapped = mapErr(failed, (e) => new Error(e));
    expect(mapped.success).toBe(false);
    if (!mapped.success) {
      expect(mapped.error.message).toBe("error");
    }
  });

  it("andThen chains and short-circuits", () => {
    const half = (x: number): Result<number, string> => (x % 2 === 0 ? ok(x / 2) : err(`odd: ${x}`));
    const eight: Result<number, string> = ok(8);
    const six: Result<number, string> = ok(6);
    expect(andThen(andThen(eight, half), half)).toEqual({ success: true, data: 2 });
    expect(andThen(andThen(six, half), half)).toEqual({ success: false, error: "odd: 3" });
  });

  it("all returns the first failure", () => {
    const results: Result<number, string>[] = [ok(1), err("first"), err("second")];
    expect(all(results)).toEqual({ success: false, error: "first" });
    expect(all([ok(1), ok(2)])).toEqual({ success: true, data: [1, 2] });
  });

  it("tryCatch captures throws as Error", () => {
    const result = tryCatch(() => {
      throw "string error";
    });
    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("string error");
    }
  });

  it("tryCatchAsync captures rejections", async () => {
    expect(await tryCatchAsync(async () => 42)).toEqual({ success: true, data: 42 });
    const failed = await tryCatchAsync(async () => {
      throw new Error("async error");
    });
    expect(failed.success).toBe(false);
  });
});
