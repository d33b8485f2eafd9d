import type { ClassificationOutcome } from "../classify/types.js";
import type { FailureMode } from "../cycle/types.js";
import type { AttackCategory, Severity } from "../store/schema.js";

/**
 * A technique the pipeline failed to block, joined with the verdict it got
 */
export interface BypassResult {
  techniqueId: number;
  name: string;
  category: AttackCategory;
  severity: Severity;
  payload: string;
  verdict: ClassificationOutcome;
  danger: number;
  /** Assigned during Adapt's diagnosis */
  failureMode?: FailureMode;
}

export interface CategoryBreakdown {
  tested: number;
  blocked: number;
  bypassed: number;
  errors: number;
}

export interface AttackError {
  techniqueId: number;
  name: string;
  error: string;
}

export interface RedTeamReport {
  /** Techniques attempted, errors included */
  tested: number;
  blocked: number;
  /** Most dangerous first */
  bypasses: BypassResult[];
  errors: AttackError[];
  byCategory: Record<string, CategoryBreakdown>;
}
