/**
 * Cross-cycle vocabulary shared by the orchestrator and the agents.
 */

import type { BypassResult } from "../redteam/types.js";

/**
 * Why a bypass got through, in diagnosis precedence order
 */
export const FAILURE_MODES = [
  "confidence_underflow",
  "encoding_evasion",
  "context_blind_spot",
  "semantic_miss",
  "pattern_gap",
] as const;

export type FailureMode = (typeof FAILURE_MODES)[number];

/**
 * Feedback carried from one cycle into the next cycle's strategy selection
 */
export interface Hint {
  dominantFailureMode: FailureMode | null;
  weakCategories: string[];
  stillBypassingIds: number[];
}

/**
 * Ephemeral state of one orchestration pass
 */
export interface CycleContext {
  cycleId: number;
  hint: Hint | null;
  discovered: number;
  tested: number;
  blocked: number;
  errored: number;
  /** Bypasses of the initial Red-Team pass, most dangerous first */
  bypasses: BypassResult[];
  strategiesUsed: string[];
}

export interface CycleSummary {
  cycleId: number;
  discovered: number;
  /** Techniques attempted, including those whose classification failed */
  tested: number;
  blocked: number;
  /** Attempts that produced no verdict */
  errored: number;
  bypasses: number;
  patched: number;
  verified: number;
  patchRounds: number;
  strategiesUsed: string[];
  /** Hint handed to the next cycle */
  hint: Hint;
}
