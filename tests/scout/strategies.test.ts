import { describe, it, expect } from "vitest";

import { applyHint, rotationStrategies, selectStrategies, STRATEGIES } from "@/scout/strategies.js";

import type { Hint } from "@/cycle/types.js";

const hint = (overrides: Partial<Hint> = {}): Hint => ({
  dominantFailureMode: null,
  weakCategories: [],
  stillBypassingIds: [],
  ...overrides,
});

describe("strategy selection", () => {
  it("rotates through the strategies by generation", () => {
    expect(rotationStrategies(0, false)).toEqual(["mutate_bypasses"]);
    expect(rotationStrategies(2, false)).toEqual(["encoding_chains"]);
    expect(rotationStrategies(STRATEGIES.length + 1, false)).toEqual(["cross_category"]);
  });

  it("adds mutate_bypasses when recent bypasses exist", () => {
    expect(rotationStrategies(3, true)).toEqual(["context_shift", "mutate_bypasses"]);
    expect(rotationStrategies(0, true)).toEqual(["mutate_bypasses"]);
  });

  it("puts the counter-strategy for the dominant failure mode first", () => {
    const selected = selectStrategies(1, false, hint({ dominantFailureMode: "encoding_evasion" }));
    expect(selected).toEqual(["encoding_chains", "cross_category"]);
  });

  it("does not duplicate a counter-strategy already chosen by rotation", () => {
    const selected = selectStrategies(3, true, hint({ dominantFailureMode: "context_blind_spot" }));
    expect(selected).toEqual(["context_shift", "mutate_bypasses"]);
  });

  it("forces mutate_bypasses in for unresolved bypasses", () => {
    const selected = applyHint(["emerging_techniques"], hint({ stillBypassingIds: [4] }));
    expect(selected).toEqual(["emerging_techniques", "mutate_bypasses"]);
  });

  it("leaves the rotation alone without a hint", () => {
    expect(applyHint(["target_weak_spots"], null)).toEqual(["target_weak_spots"]);
    expect(applyHint(["target_weak_spots"], hint())).toEqual(["target_weak_spots"]);
  });
});
