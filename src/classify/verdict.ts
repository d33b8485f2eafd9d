/**
 * Decoding of external engine answers.
 *
 * Engines are asked for `{classification, confidence, attack_type, reason}`
 * but may wrap it in prose, omit fields, or send nothing usable. Parsing
 * yields a tagged result and callers build the fallback explicitly.
 */

import { z } from "zod";

import { extractJsonObject } from "../ai/json.js";

import { CLASSIFICATIONS, type Classification, type EngineResult } from "./types.js";

/** Verdict used whenever an engine cannot be trusted */
export const FALLBACK_CLASSIFICATION: Classification = "SUSPICIOUS";
export const FALLBACK_CONFIDENCE = 0.5;

const EngineVerdictSchema = z.object({
  classification: z
    .string()
    .transform((value) => value.trim().toUpperCase())
    .pipe(z.enum(CLASSIFICATIONS)),
  confidence: z.coerce.number().min(0).max(1),
  attack_type: z.string().nullish(),
  reason: z.string().nullish(),
});

export interface ParsedVerdict {
  kind: "parsed";
  classification: Classification;
  confidence: number;
  attackType: string;
  reason: string;
}

export interface ParseFailure {
  kind: "failure";
  /** Why the answer was rejected */
  problem: string;
}

export type VerdictParse = ParsedVerdict | ParseFailure;

export function parseEngineVerdict(content: string): VerdictParse {
  const span = extractJsonObject(content);
  if (span === null) {
    return { kind: "failure", problem: "no JSON object in response" };
  }

  let json: unknown;
  try {
    json = JSON.parse(span) as unknown;
  } catch {
    return { kind: "failure", problem: "malformed JSON object in response" };
  }

  const result = EngineVerdictSchema.safeParse(json);
  if (!result.success) {
    const first = result.error.issues[0];
    const where = first ? `${first.path.join(".") || "response"}: ${first.message}` : "unknown shape";
    return { kind: "failure", problem: `unexpected response shape (${where})` };
  }

  const attackType = result.data.attack_type?.trim();
  return {
    kind: "parsed",
    classification: result.data.classification,
    confidence: result.data.confidence,
    attackType: attackType !== undefined && attackType.length > 0 ? attackType : "none",
    reason: result.data.reason ?? "",
  };
}

/**
 * Conservative verdict for a failed or unusable engine call
 */
export function degradedResult(classifier: string, reason: string, responseTimeMs: number): EngineResult {
  return {
    classification: FALLBACK_CLASSIFICATION,
    confidence: FALLBACK_CONFIDENCE,
    attackType: "none",
    reason,
    classifier,
    responseTimeMs,
    degraded: true,
  };
}

/**
 * Turn a parse outcome into an engine result, degrading on failure
 */
export function toEngineResult(parse: VerdictParse, classifier: string, responseTimeMs: number): EngineResult {
  if (parse.kind === "failure") {
    return degradedResult(classifier, `Failed to parse ${classifier} response: ${parse.problem}`, responseTimeMs);
  }
  return {
    classification: parse.classification,
    confidence: parse.confidence,
    attackType: parse.attackType,
    reason: parse.reason,
    classifier,
    responseTimeMs,
    degraded: false,
  };
}
