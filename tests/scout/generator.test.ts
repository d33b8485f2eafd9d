import { describe, it, expect, vi } from "vitest";

import { serviceForEngine } from "@/ai/service.js";
import { AITechniqueGenerator, createTechniqueGenerator, toCandidates } from "@/scout/generator.js";

import type { FetchLike } from "@/ai/types.js";
import type { ReconBrief } from "@/scout/recon.js";

const brief: ReconBrief = {
  weakCategories: [],
  unexploredCategories: ["ssrf"],
  recentBypasses: [],
  totalTechniques: 0,
  generation: 0,
};

function anthropicReply(text: string): Response {
  return new Response(JSON.stringify({ content: [{ text }] }), { status: 200 });
}

describe("toCandidates", () => {
  it("accepts both key spellings and skips non-objects", () => {
    expect(
      toCandidates([
        { technique_name: "A", category: "sqli", raw_payload: "GET /a", severity: "low" },
        { name: "B", payload: "GET /b" },
        "junk",
        null,
      ])
    ).toEqual([
      { name: "A", category: "sqli", rawPayload: "GET /a", severity: "low" },
      { name: "B", category: undefined, rawPayload: "GET /b", severity: undefined },
    ]);
  });

  it("returns nothing for non-arrays", () => {
    expect(toCandidates({ name: "A" })).toEqual([]);
  });
});

describe("AITechniqueGenerator", () => {
  it("is not created without an API key", () => {
    expect(createTechniqueGenerator({ apiKey: "", timeoutMs: 1_000 })).toBeNull();
  });

  it("parses the JSON array out of the reply", async () => {
    const fetchImpl = vi
      .fn<FetchLike>()
      .mockResolvedValue(
        anthropicReply('Here:\n[{"technique_name": "SSRF via redirect", "category": "ssrf", "raw_payload": "GET /r", "severity": "high"}]')
      );
    const generator = new AITechniqueGenerator(serviceForEngine("anthropic", { apiKey: "test-secret", timeoutMs: 1_000 }, fetchImpl));

    const result = await generator.generate({ strategy: "context_shift", brief, count: 3 });

    expect(result).toEqual({
      success: true,
      data: [{ name: "SSRF via redirect", category: "ssrf", rawPayload: "GET /r", severity: "high" }],
    });
  });

  it("fails when the reply has no array", async () => {
    const fetchImpl = vi.fn<FetchLike>().mockResolvedValue(anthropicReply("I won't do that."));
    const generator = new AITechniqueGenerator(serviceForEngine("anthropic", { apiKey: "test-secret", timeoutMs: 1_000 }, fetchImpl));

    const result = await generator.generate({ strategy: "context_shift", brief, count: 3 });

    expect(result.success).toBe(false);
    if (!result.success) {
      expect(result.error.message).toBe("No JSON array in generation response");
      expect(result.error.engine).toBe("generation");
    }
  });
});
