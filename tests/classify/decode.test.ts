import { describe, it, expect } from "vitest";

import { decodeLayers, percentDecode } from "@/classify/decode.js";

describe("percentDecode", () => {
  it("decodes escape runs as UTF-8", () => {
    expect(percentDecode("%3Cscript%3E")).toBe("<script>");
    expect(percentDecode("caf%C3%A9")).toBe("café");
  });

  it("leaves malformed escapes as written", () => {
    expect(percentDecode("100% sure %zz %4")).toBe("100% sure %zz %4");
  });

  it("replaces invalid byte sequences instead of throwing", () => {
    expect(percentDecode("%C0%AE")).toBe("��");
  });

  it("decodes only one layer per call", () => {
    expect(percentDecode("%252e")).toBe("%2e");
  });
});

describe("decodeLayers", () => {
  it("stops at the layer limit", () => {
    expect(decodeLayers("%25252e", 2)).toBe("%2e");
    expect(decodeLayers("%25252e", 3)).toBe(".");
  });

  it("stops early at a fixed point", () => {
    expect(decodeLayers("plain", 5)).toBe("plain");
  });
});
