/**
 * Generation strategy selection
 */

import type { FailureMode, Hint } from "../cycle/types.js";

export const STRATEGIES = [
  "mutate_bypasses",
  "cross_category",
  "encoding_chains",
  "context_shift",
  "emerging_techniques",
  "target_weak_spots",
] as const;

export type Strategy = (typeof STRATEGIES)[number];

/** Counter-strategy for each diagnosed failure mode */
export const COUNTER_STRATEGY: Record<FailureMode, Strategy> = {
  confidence_underflow: "target_weak_spots",
  pattern_gap: "emerging_techniques",
  encoding_evasion: "encoding_chains",
  context_blind_spot: "context_shift",
  semantic_miss: "cross_category",
};

/**
 * Rotation by generation, plus mutate_bypasses when recent bypasses exist
 */
export function rotationStrategies(generation: number, hasRecentBypasses: boolean): Strategy[] {
  const primary = STRATEGIES[generation % STRATEGIES.length] ?? "mutate_bypasses";
  const selected: Strategy[] = [primary];
  if (hasRecentBypasses && primary !== "mutate_bypasses") {
    selected.push("mutate_bypasses");
  }
  return selected;
}

/**
 * Prepend the counter-strategy for the prior cycle's dominant failure mode.
 * The rotation choices stay, after it; unresolved bypasses force mutate_bypasses in.
 */
export function applyHint(strategies: readonly Strategy[], hint: Hint | null | undefined): Strategy[] {
  if (!hint) {
    return [...strategies];
  }

  let selected: Strategy[] = [...strategies];

  if (hint.dominantFailureMode !== null) {
    const counter = COUNTER_STRATEGY[hint.dominantFailureMode];
    selected = [counter, ...selected.filter((s) => s !== counter)];
  }

  if (hint.stillBypassingIds.length > 0 && !selected.includes("mutate_bypasses")) {
    selected.push("mutate_bypasses");
  }

  return selected;
}

export function selectStrategies(
  generation: number,
  hasRecentBypasses: boolean,
  hint?: Hint | null
): Strategy[] {
  return applyHint(rotationStrategies(generation, hasRecentBypasses), hint);
}
