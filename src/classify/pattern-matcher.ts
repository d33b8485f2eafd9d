/**
 * Stage 0: local pattern matcher.
 *
 * Evaluates one group of regular expressions per attack category against the
 * raw request plus its once- and twice-percent-decoded forms. No network.
 */

import { readFileSync } from "fs";

import { z } from "zod";

import { ValidationError, errorMessage } from "../lib/errors.js";
import { AttackCategorySchema, type AttackCategory } from "../store/schema.js";

import { percentDecode } from "./decode.js";

import type { Stage0Result } from "./types.js";

/** Confidence bump per additional pattern hit within a category */
export const HIT_BONUS = 0.03;
export const MAX_CONFIDENCE = 0.99;
/** Confidence of a SAFE verdict when nothing matched */
export const NO_MATCH_CONFIDENCE = 0.85;

const RuleGroupFileSchema = z.array(
  z.object({
    category: AttackCategorySchema,
    name: z.string().min(1),
    baseConfidence: z.number().min(0).max(1),
    patterns: z
      .array(
        z.object({
          source: z.string().min(1),
          flags: z.string().regex(/^[imsu]*$/).default(""),
        })
      )
      .min(1),
  })
);

export interface RuleGroup {
  category: AttackCategory;
  /** Human-readable attack name used in verdict reasons */
  name: string;
  baseConfidence: number;
  patterns: RegExp[];
}

export const DEFAULT_RULES_FILE = new URL("../../data/stage0-rules.json", import.meta.url);

/**
 * Load and compile rule groups. File order is rule order (the final tie-breaker).
 */
export function loadRuleGroups(file: URL | string = DEFAULT_RULES_FILE): RuleGroup[] {
  let raw: unknown;
  try {
    raw = JSON.parse(readFileSync(file, "utf-8")) as unknown;
  } catch (error) {
    throw new ValidationError(`Failed to read pattern rules: ${errorMessage(error)}`, { file: String(file) });
  }

  const parsed = RuleGroupFileSchema.safeParse(raw);
  if (!parsed.success) {
    throw new ValidationError("Invalid pattern rules file", { issues: parsed.error.issues });
  }

  return parsed.data.map((group) => ({
    category: group.category,
    name: group.name,
    baseConfidence: group.baseConfidence,
    patterns: group.patterns.map((p) => new RegExp(p.source, p.flags)),
  }));
}

/**
 * Forms the patterns run against: raw, decoded once, decoded twice.
 * Each form is matched on its own so no pattern spans two copies.
 */
export function searchForms(raw: string): string[] {
  const once = percentDecode(raw);
  const twice = percentDecode(once);
  return [...new Set([raw, once, twice])];
}

/**
 * Confidence for `hits` matches on a group with `base` confidence
 */
export function scoreHits(base: number, hits: number): number {
  return Math.min(base + HIT_BONUS * (hits - 1), MAX_CONFIDENCE);
}

interface GroupMatch {
  group: RuleGroup;
  order: number;
  hits: number;
  confidence: number;
}

export class PatternMatcher {
  private readonly groups: RuleGroup[];

  constructor(groups?: RuleGroup[]) {
    this.groups = groups ?? loadRuleGroups();
  }

  get ruleGroups(): readonly RuleGroup[] {
    return this.groups;
  }

  match(raw: string): Stage0Result {
    const start = performance.now();
    const forms = searchForms(raw);

    const matches: GroupMatch[] = [];
    this.groups.forEach((group, order) => {
      const hits = group.patterns.filter((pattern) => forms.some((form) => pattern.test(form))).length;
      if (hits > 0) {
        matches.push({ group, order, hits, confidence: scoreHits(group.baseConfidence, hits) });
      }
    });

    const responseTimeMs = performance.now() - start;

    // Highest confidence, then most hits, then rule order
    matches.sort((a, b) => b.confidence - a.confidence || b.hits - a.hits || a.order - b.order);
    const best = matches[0];

    if (!best) {
      return {
        classification: "SAFE",
        confidence: NO_MATCH_CONFIDENCE,
        attackType: "none",
        reason: "No known attack patterns detected",
        classifier: "regex",
        responseTimeMs,
        category: null,
        hits: 0,
      };
    }

    return {
      classification: "MALICIOUS",
      confidence: best.confidence,
      attackType: best.group.category,
      reason: `Detected ${best.group.name} (${best.hits} pattern${best.hits === 1 ? "" : "s"} matched)`,
      classifier: "regex",
      responseTimeMs,
      category: best.group.category,
      hits: best.hits,
    };
  }
}
