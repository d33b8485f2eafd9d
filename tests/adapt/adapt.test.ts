import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { Adapt } from "@/adapt/adapt.js";
import { EngineError } from "@/lib/errors.js";
import { err, ok } from "@/lib/result.js";
import { toBypass } from "@/redteam/redteam.js";

import { memoryStorage, newTechnique, outcome } from "../fixtures/storage.js";

import type { RuleGenerationRequest, RuleGenerator, RuleUpdate } from "@/adapt/rule-generator.js";
import type { ClassificationOutcome } from "@/classify/types.js";
import type { Result } from "@/lib/result.js";
import type { ClassificationClient } from "@/redteam/client.js";
import type { BypassResult } from "@/redteam/types.js";
import type { Storage } from "@/store/index.js";
import type { NewTechnique } from "@/store/schema.js";

class ScriptedGenerator implements RuleGenerator {
  readonly requests: RuleGenerationRequest[] = [];

  constructor(private readonly result: Result<RuleUpdate, EngineError>) {}

  async generate(request: RuleGenerationRequest): Promise<Result<RuleUpdate, EngineError>> {
    this.requests.push(request);
    return this.result;
  }
}

/** Blocks payloads containing "fixed"; everything else still passes */
class VerifyingClient implements ClassificationClient {
  readonly seen: string[] = [];

  async classify(rawRequest: string): Promise<ClassificationOutcome> {
    this.seen.push(rawRequest);
    return rawRequest.includes("fixed")
      ? outcome({ classification: "MALICIOUS", confidence: 0.95, blocked: true })
      : outcome();
  }
}

describe("Adapt", () => {
  let storage: Storage;
  let client: VerifyingClient;

  beforeEach(() => {
    storage = memoryStorage();
    client = new VerifyingClient();
  });

  afterEach(() => {
    storage.close();
  });

  const adapt = (generator: RuleGenerator | null) =>
    new Adapt({
      techniques: storage.techniques,
      rules: storage.rules,
      activity: storage.activity,
      client,
      generator,
    });

  async function bypass(overrides: Partial<NewTechnique>, verdict = outcome()): Promise<BypassResult> {
    const stored = await storage.techniques.insert(newTechnique(overrides));
    if (!stored) throw new Error("duplicate technique");
    await storage.techniques.markTested(stored.id, false);
    return toBypass(stored, verdict);
  }

  it("does nothing without bypasses", async () => {
    const report = await adapt(null).run([]);

    expect(report).toMatchObject({ patched: 0, verified: 0, newVersion: 1, heuristic: false, dominantFailureMode: null });
    expect(await storage.rules.history()).toHaveLength(1);
    expect(await storage.activity.recent()).toEqual([]);
  });

  it("falls back to a heuristic version bump without a generator", async () => {
    const a = await bypass({ rawPayload: "GET /?q=one", category: "xss" });
    const b = await bypass({ rawPayload: "GET /?q=two", category: "path_traversal" });

    const report = await adapt(null).run([a, b]);

    expect(report).toMatchObject({ patched: 2, verified: 0, stillBypassingIds: [], newVersion: 2, heuristic: true });
    expect(report.failureModeCounts).toMatchObject({ semantic_miss: 1, pattern_gap: 1 });
    expect(report.dominantFailureMode).toBe("semantic_miss");

    const current = await storage.rules.current();
    const first = await storage.rules.get(1);
    expect(current?.updatedBy).toBe("heuristic");
    expect(current?.fastPrompt).toBe(first?.fastPrompt);

    const techniqueA = await storage.techniques.get(a.techniqueId);
    expect(techniqueA?.blocked).toBe(true);
    expect(techniqueA?.patchedAt).not.toBeNull();

    const [log] = await storage.activity.recent(1);
    expect(log).toMatchObject({ agent: "adapt", action: "heuristic", detail: "v1->v2: Heuristic patch for 2 bypasses." });
    expect(client.seen).toEqual([]);
  });

  it("deploys generated rules and only counts verified blocks", async () => {
    const fixed = await bypass({ rawPayload: "GET /?q=fixed", severity: "critical" });
    const open = await bypass({ rawPayload: "GET /?q=open", severity: "low" });
    const generator = new ScriptedGenerator(
      ok({ fastPrompt: "fast v2", deepPrompt: "deep v2", analysis: "missed quoting", newPatterns: ["quote breakout"] })
    );

    const report = await adapt(generator).run([open, fixed]);

    expect(report).toMatchObject({
      patched: 2,
      verified: 1,
      stillBypassingIds: [open.techniqueId],
      newVersion: 2,
      heuristic: false,
    });
    expect(report.diagnosed.map((d) => d.techniqueId)).toEqual([fixed.techniqueId, open.techniqueId]);
    expect(generator.requests[0]?.failureModes).toEqual(["semantic_miss"]);
    expect(generator.requests[0]?.report).toContain("BYPASS #1:\nTechnique: " + fixed.name);

    expect(await storage.rules.current()).toMatchObject({ version: 2, fastPrompt: "fast v2", updatedBy: "adapt" });
    expect((await storage.techniques.get(fixed.techniqueId))?.blocked).toBe(true);

    const stillOpen = await storage.techniques.get(open.techniqueId);
    expect(stillOpen?.blocked).toBe(false);
    expect(stillOpen?.patchedAt).not.toBeNull();

    const [log] = await storage.activity.recent(1);
    expect(log?.detail).toBe("v1->v2: missed quoting. Patched 2 bypasses, verified 1, 1 new patterns");
  });

  it("verifies only the most dangerous bypasses", async () => {
    const bypasses = [
      await bypass({ rawPayload: "GET /?q=fixed-1", severity: "low" }),
      await bypass({ rawPayload: "GET /?q=fixed-2", severity: "critical" }),
    ];
    const generator = new ScriptedGenerator(ok({ fastPrompt: "f", deepPrompt: "d", analysis: "", newPatterns: [] }));

    const report = await new Adapt({
      techniques: storage.techniques,
      rules: storage.rules,
      activity: storage.activity,
      client,
      generator,
      verificationSample: 1,
    }).run(bypasses);

    expect(client.seen).toEqual(["GET /?q=fixed-2"]);
    expect(report.stillBypassingIds).toEqual([bypasses[0]?.techniqueId]);
  });

  it("takes the heuristic path when generation fails", async () => {
    const one = await bypass({ rawPayload: "GET /?q=x" });
    const generator = new ScriptedGenerator(err(new EngineError("rate limited", "rules")));

    const report = await adapt(generator).run([one]);

    expect(report.heuristic).toBe(true);
    expect((await storage.rules.current())?.updatedBy).toBe("heuristic");
  });

  it("diagnoses low-confidence malicious verdicts as underflow", async () => {
    const weak = await bypass({}, outcome({ classification: "MALICIOUS", confidence: 0.4 }));

    const report = await adapt(null).run([weak]);

    expect(report.dominantFailureMode).toBe("confidence_underflow");
    expect(report.diagnosed[0]?.failureMode).toBe("confidence_underflow");
  });
});
