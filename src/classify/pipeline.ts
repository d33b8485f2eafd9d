/**
 * Classification Pipeline
 *
 * Stage 0 (local patterns) always runs. Stage 1 (fast engine) is consulted
 * when configured. Stage 2 (deep engine) is consulted when configured and
 * the running verdict is SUSPICIOUS or MALICIOUS. The local matcher is a
 * floor: no external stage can clear a Stage 0 MALICIOUS finding.
 */

import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { EXCERPT_LENGTH } from "../store/request-log.js";

import { PatternMatcher } from "./pattern-matcher.js";
import { DEFAULT_DEEP_PROMPT, DEFAULT_FAST_PROMPT } from "./prompts.js";

import type { EventSink } from "../events/index.js";
import type { NewRequestLogEntry } from "../store/request-log.js";
import type { RuleVersion } from "../store/schema.js";
import type {
  ClassificationEngine,
  ClassificationOutcome,
  Classifier,
  EngineResult,
  RequestParts,
  Stage0Result,
  Verdict,
} from "./types.js";

/** A MALICIOUS verdict blocks only above this confidence */
export const BLOCK_THRESHOLD = 0.6;

/** Characters of the request carried on the live event */
const EVENT_EXCERPT_LENGTH = 120;

export interface RuleSource {
  current(): Promise<RuleVersion | null>;
}

export interface RequestRecorder {
  append(entry: NewRequestLogEntry): Promise<void>;
}

export interface PipelineOptions {
  rules: RuleSource;
  fast?: ClassificationEngine | null;
  deep?: ClassificationEngine | null;
  matcher?: PatternMatcher;
  requestLog?: RequestRecorder;
  events?: EventSink;
  now?: () => number;
}

export function isBlocked(verdict: Pick<Verdict, "classification" | "confidence">): boolean {
  return verdict.classification === "MALICIOUS" && verdict.confidence > BLOCK_THRESHOLD;
}

/**
 * Stage 1 merge: the fast engine supersedes only with MALICIOUS, or with
 * SUSPICIOUS when the local result was not already MALICIOUS.
 */
export function mergeFast(stage0: Verdict, fast: EngineResult): Verdict {
  if (fast.classification === "MALICIOUS") return fast;
  if (fast.classification === "SUSPICIOUS" && stage0.classification !== "MALICIOUS") return fast;
  return stage0;
}

/**
 * Stage 2 merge: the deep engine may escalate to MALICIOUS, and may clear to
 * SAFE only when Stage 0 did not find MALICIOUS on its own.
 */
export function mergeDeep(current: Verdict, stage0: Stage0Result, deep: EngineResult): Verdict {
  switch (deep.classification) {
    case "MALICIOUS":
      return deep;
    case "SAFE":
      return stage0.classification === "MALICIOUS" ? current : deep;
    case "SUSPICIOUS":
      return current.classification === "MALICIOUS" ? current : deep;
  }
}

/**
 * Render inspect-style request parts as one raw request text
 */
export function formatRawRequest(parts: RequestParts): string {
  const method = parts.method ?? "GET";
  const path = parts.path ?? "/";
  const query = Object.entries(parts.queryParams ?? {})
    .map(([key, value]) => `${key}=${value}`)
    .join("&");

  const lines = [`${method} ${path}${query ? `?${query}` : ""} HTTP/1.1`];
  for (const [key, value] of Object.entries(parts.headers ?? {})) {
    lines.push(`${key}: ${value}`);
  }

  const head = lines.join("\n");
  return parts.body ? `${head}\n\n${parts.body}` : head;
}

export class ClassificationPipeline implements Classifier {
  private readonly log = logger.child("[classify]");
  private readonly matcher: PatternMatcher;
  private readonly now: () => number;

  constructor(private readonly options: PipelineOptions) {
    this.matcher = options.matcher ?? new PatternMatcher();
    this.now = options.now ?? (() => performance.now());
  }

  /** Which external stages are active */
  get stages(): { fast: boolean; deep: boolean } {
    return { fast: Boolean(this.options.fast), deep: Boolean(this.options.deep) };
  }

  async classify(rawRequest: string): Promise<ClassificationOutcome> {
    const start = this.now();
    const rules = await this.options.rules.current();
    const fastPrompt = rules?.fastPrompt ?? DEFAULT_FAST_PROMPT;
    const deepPrompt = rules?.deepPrompt ?? DEFAULT_DEEP_PROMPT;

    const stage0 = this.matcher.match(rawRequest);
    let verdict: Verdict = stage0;

    if (this.options.fast) {
      const fast = await this.options.fast.classify(fastPrompt, rawRequest);
      if (fast.degraded) this.log.warn(fast.reason);
      verdict = mergeFast(stage0, fast);
    }

    if (this.options.deep && verdict.classification !== "SAFE") {
      const deep = await this.options.deep.classify(deepPrompt, rawRequest);
      if (deep.degraded) this.log.warn(deep.reason);
      verdict = mergeDeep(verdict, stage0, deep);
    }

    const outcome: ClassificationOutcome = {
      classification: verdict.classification,
      confidence: verdict.confidence,
      attackType: verdict.attackType,
      reason: verdict.reason,
      classifier: verdict.classifier,
      responseTimeMs: this.now() - start,
      blocked: isBlocked(verdict),
      rulesVersion: rules?.version ?? 1,
    };

    await this.record(rawRequest, outcome);
    return outcome;
  }

  private async record(rawRequest: string, outcome: ClassificationOutcome): Promise<void> {
    if (this.options.requestLog) {
      try {
        await this.options.requestLog.append({
          excerpt: rawRequest.slice(0, EXCERPT_LENGTH),
          classification: outcome.classification,
          confidence: outcome.confidence,
          classifier: outcome.classifier,
          blocked: outcome.blocked,
          attackType: outcome.attackType,
          responseTimeMs: outcome.responseTimeMs,
        });
      } catch (error) {
        // The verdict stands even when the log write fails
        this.log.error(`Request log write failed: ${errorMessage(error)}`);
      }
    }

    this.options.events?.emit({
      type: "request",
      timestamp: new Date().toISOString(),
      message: rawRequest.slice(0, EVENT_EXCERPT_LENGTH),
      classification: outcome.classification,
      confidence: outcome.confidence,
      blocked: outcome.blocked,
      classifier: outcome.classifier,
      attackType: outcome.attackType,
    });
  }
}
