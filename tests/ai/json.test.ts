import { describe, it, expect } from "vitest";

import { extractJsonArray, extractJsonObject, parseEmbeddedArray, parseEmbeddedObject } from "@/ai/json.js";

describe("embedded JSON extraction", () => {
  it("finds an object wrapped in prose and code fences", () => {
    const text = 'Here you go:\n```json\n{"classification": "SAFE", "confidence": 0.9}\n```\nThanks';
    expect(extractJsonObject(text)).toBe('{"classification": "SAFE", "confidence": 0.9}');
  });

  it("ignores braces inside string values", () => {
    const text = 'x {"reason": "payload had } and { in it", "n": {"a": 1}} y';
    expect(parseEmbeddedObject(text)).toEqual({ reason: "payload had } and { in it", n: { a: 1 } });
  });

  it("handles escaped quotes", () => {
    expect(parseEmbeddedObject('{"q": "say \\"hi\\" }"}')).toEqual({ q: 'say "hi" }' });
  });

  it("retries from the next opener when the first never closes", () => {
    expect(extractJsonObject('{ broken [ {"ok": true}')).toBe('{"ok": true}');
    expect(extractJsonArray('[ unterminated and then ["a", "b"]')).toBe('["a", "b"]');
    expect(extractJsonArray('noise ] then ["a", "b"] end')).toBe('["a", "b"]');
    expect(extractJsonObject("{ never closed")).toBeNull();
  });

  it("returns undefined for spans that are not JSON", () => {
    expect(parseEmbeddedObject("{not json}")).toBeUndefined();
    expect(parseEmbeddedArray("no array here")).toBeUndefined();
  });

  it("parses an embedded array", () => {
    expect(parseEmbeddedArray('Result: [{"name": "a"}, {"name": "b"}]')).toEqual([{ name: "a" }, { name: "b" }]);
  });
});
