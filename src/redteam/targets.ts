/**
 * Target selection under a per-cycle budget
 */

import type { Technique } from "../store/schema.js";
import type { TechniqueStore } from "../store/technique-store.js";

export const DEFAULT_BUDGET = 15;
/** Recently patched techniques re-tested per cycle */
export const PATCHED_SAMPLE = 5;

export interface TargetTiers {
  /** Never tested, most recently discovered first */
  neverTested: Technique[];
  /** Confirmed unblocked, oldest test first */
  previouslyBypassing: Technique[];
  /** Patched and blocked, most recent patch first */
  recentlyPatched: Technique[];
}

/**
 * Fill the budget greedily, tier by tier. A later tier only gets what the
 * earlier tiers left over.
 */
export function allocateBudget(tiers: TargetTiers, budget: number): Technique[] {
  const selected: Technique[] = [];
  const seen = new Set<number>();

  for (const tier of [tiers.neverTested, tiers.previouslyBypassing, tiers.recentlyPatched]) {
    for (const technique of tier) {
      if (selected.length >= budget) return selected;
      if (seen.has(technique.id)) continue;
      seen.add(technique.id);
      selected.push(technique);
    }
  }
  return selected;
}

export async function loadTiers(techniques: TechniqueStore, patchedSample = PATCHED_SAMPLE): Promise<TargetTiers> {
  const [neverTested, previouslyBypassing, recentlyPatched] = await Promise.all([
    techniques.neverTested(),
    techniques.previouslyBypassing(),
    techniques.recentlyPatched(patchedSample),
  ]);
  return { neverTested, previouslyBypassing, recentlyPatched };
}
