import type { AttackCategory } from "../store/schema.js";

export const CLASSIFICATIONS = ["SAFE", "SUSPICIOUS", "MALICIOUS"] as const;
export type Classification = (typeof CLASSIFICATIONS)[number];

/**
 * One stage's judgment of a raw request
 */
export interface Verdict {
  classification: Classification;
  /** 0..1 */
  confidence: number;
  /** Attack category, or "none" */
  attackType: string;
  reason: string;
  /** Which stage produced it: "regex", "fast", "deep" */
  classifier: string;
  responseTimeMs: number;
}

/**
 * Local pattern matcher output
 */
export interface Stage0Result extends Verdict {
  classifier: "regex";
  /** Winning category, or null when nothing matched */
  category: AttackCategory | null;
  /** Number of patterns that matched in the winning category */
  hits: number;
}

/**
 * External engine output. `degraded` marks the conservative fallback
 * produced when the engine failed or answered with something unusable.
 */
export interface EngineResult extends Verdict {
  degraded: boolean;
}

/**
 * Final pipeline answer: the classification request contract
 */
export interface ClassificationOutcome extends Verdict {
  blocked: boolean;
  rulesVersion: number;
}

/**
 * Pluggable external classifier (fast or deep stage)
 */
export interface ClassificationEngine {
  readonly name: string;
  /**
   * Judge `rawRequest` under `instructions`. Never rejects: failures come
   * back as a degraded SUSPICIOUS result.
   */
  classify(instructions: string, rawRequest: string): Promise<EngineResult>;
}

/**
 * Anything that can be classified; satisfied by the pipeline itself
 */
export interface Classifier {
  classify(rawRequest: string): Promise<ClassificationOutcome>;
}

/** Components of a request submitted to the inspect endpoint */
export interface RequestParts {
  method?: string;
  path?: string;
  headers?: Record<string, string>;
  body?: string;
  queryParams?: Record<string, string>;
}
