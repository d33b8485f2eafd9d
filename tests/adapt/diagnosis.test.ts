import { describe, it, expect } from "vitest";

import { countFailureModes, diagnose, dominantFailureMode, groupBy } from "@/adapt/diagnosis.js";

import type { DiagnosisInput } from "@/adapt/diagnosis.js";

const input = (overrides: Partial<DiagnosisInput> = {}): DiagnosisInput => ({
  category: "path_traversal",
  payload: "GET /files?name=report HTTP/1.1",
  verdict: { classification: "SAFE", confidence: 0.8 },
  ...overrides,
});

describe("diagnose", () => {
  it("flags a recognised attack below the block threshold", () => {
    expect(diagnose(input({ verdict: { classification: "MALICIOUS", confidence: 0.4 } }))).toBe("confidence_underflow");
  });

  it("checks confidence before obfuscation", () => {
    const bypass = input({ payload: "GET /?f=%252e%252e HTTP/1.1", verdict: { classification: "MALICIOUS", confidence: 0.6 } });
    expect(diagnose(bypass)).toBe("confidence_underflow");
  });

  it("detects layered encoding", () => {
    expect(diagnose(input({ payload: "GET /?f=%252e%252e%252f HTTP/1.1" }))).toBe("encoding_evasion");
  });

  it("detects HTML entities and null bytes", () => {
    expect(diagnose(input({ payload: "GET /?q=&lt;svg&gt; HTTP/1.1" }))).toBe("encoding_evasion");
    expect(diagnose(input({ payload: "GET /?f=../etc/passwd%00.png HTTP/1.1" }))).toBe("encoding_evasion");
  });

  it("detects an uninspected delivery context only for SAFE verdicts", () => {
    const payload = "POST /upload HTTP/1.1\nContent-Type: multipart/form-data; boundary=x";
    expect(diagnose(input({ payload }))).toBe("context_blind_spot");
    expect(diagnose(input({ payload, verdict: { classification: "SUSPICIOUS", confidence: 0.5 } }))).toBe("pattern_gap");
  });

  it("calls a SAFE verdict on a well-known class a semantic miss", () => {
    expect(diagnose(input({ category: "xss" }))).toBe("semantic_miss");
    expect(diagnose(input({ category: "rce" }))).toBe("semantic_miss");
  });

  it("falls back to a pattern gap", () => {
    expect(diagnose(input())).toBe("pattern_gap");
    expect(diagnose(input({ category: "sqli", verdict: { classification: "SUSPICIOUS", confidence: 0.5 } }))).toBe(
      "pattern_gap"
    );
  });
});

describe("dominantFailureMode", () => {
  it("picks the largest group", () => {
    const counts = countFailureModes(["pattern_gap", "semantic_miss", "pattern_gap"]);
    expect(counts).toEqual({
      confidence_underflow: 0,
      encoding_evasion: 0,
      context_blind_spot: 0,
      semantic_miss: 1,
      pattern_gap: 2,
    });
    expect(dominantFailureMode(counts)).toBe("pattern_gap");
  });

  it("breaks ties by precedence", () => {
    const counts = countFailureModes(["pattern_gap", "encoding_evasion", "pattern_gap", "encoding_evasion"]);
    expect(dominantFailureMode(counts)).toBe("encoding_evasion");
  });

  it("is null without bypasses", () => {
    expect(dominantFailureMode(countFailureModes([]))).toBeNull();
  });
});

describe("groupBy", () => {
  it("keeps first-seen key order", () => {
    const groups = groupBy(["b1", "a1", "b2"], (s) => s.charAt(0));
    expect([...groups.entries()]).toEqual([
      ["b", ["b1", "b2"]],
      ["a", ["a1"]],
    ]);
  });
});
