import { describe, it, expect } from "vitest";

import { normalizePayload } from "@/scout/normalize.js";

describe("normalizePayload", () => {
  it("lowercases, decodes and collapses whitespace", () => {
    expect(normalizePayload("  GET /?q=%3CScript%3E \n\t HTTP/1.1  ")).toBe("get /?q=<script> http/1.1");
  });

  it("treats encoded and plain variants as the same payload", () => {
    expect(normalizePayload("id=1%27%20OR%201=1")).toBe(normalizePayload("ID=1' or   1=1"));
  });

  it("decodes nested encodings", () => {
    expect(normalizePayload("%252e%252e%252f")).toBe("../");
  });

  it("is idempotent", () => {
    const samples = [
      "%2541%2542",
      "GET /%25%32%35%34%31 HTTP/1.1",
      "A%0AB  C",
      "plain text",
      "%E2%80%A8 separator",
    ];
    for (const sample of samples) {
      const once = normalizePayload(sample);
      expect(normalizePayload(once)).toBe(once);
    }
  });
});
