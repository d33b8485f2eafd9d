/**
 * Technique candidate generation
 */

import { parseEmbeddedArray } from "../ai/json.js";
import { serviceForEngine, type AIService } from "../ai/service.js";
import { EngineError } from "../lib/errors.js";
import { err, ok } from "../lib/result.js";

import { GENERATION_SYSTEM_PROMPT, buildGenerationPrompt } from "./prompts.js";

import type { FetchLike } from "../ai/types.js";
import type { EngineConfig } from "../config/index.js";
import type { Result } from "../lib/result.js";
import type { ReconBrief } from "./recon.js";
import type { Strategy } from "./strategies.js";

/**
 * Raw candidate as the generator returned it. Category and severity are
 * unvalidated; Scout coerces them.
 */
export interface TechniqueCandidate {
  name: string;
  category: unknown;
  rawPayload: string;
  severity: unknown;
}

export interface GenerationRequest {
  strategy: Strategy;
  brief: ReconBrief;
  count: number;
}

export interface TechniqueGenerator {
  generate(request: GenerationRequest): Promise<Result<TechniqueCandidate[], EngineError>>;
}

function field(item: Record<string, unknown>, ...keys: string[]): string {
  for (const key of keys) {
    const value = item[key];
    if (typeof value === "string") return value;
  }
  return "";
}

/**
 * Keep entries that are objects; missing name or payload become empty
 * strings for Scout to drop
 */
export function toCandidates(value: unknown): TechniqueCandidate[] {
  if (!Array.isArray(value)) return [];
  const candidates: TechniqueCandidate[] = [];
  for (const item of value) {
    if (typeof item !== "object" || item === null || Array.isArray(item)) continue;
    const record: Record<string, unknown> = { ...item };
    candidates.push({
      name: field(record, "technique_name", "name"),
      category: record["category"],
      rawPayload: field(record, "raw_payload", "rawPayload", "payload"),
      severity: record["severity"],
    });
  }
  return candidates;
}

export class AITechniqueGenerator implements TechniqueGenerator {
  constructor(private readonly service: AIService) {}

  async generate(request: GenerationRequest): Promise<Result<TechniqueCandidate[], EngineError>> {
    const response = await this.service.complete({
      systemPrompt: GENERATION_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildGenerationPrompt(request.strategy, request.brief, request.count) }],
      maxTokens: 2500,
      temperature: 0.9,
    });

    if (!response.success) {
      return err(new EngineError(response.error, "generation", { strategy: request.strategy }));
    }

    const parsed = parseEmbeddedArray(response.data);
    if (parsed === undefined) {
      return err(new EngineError("No JSON array in generation response", "generation", { strategy: request.strategy }));
    }
    return ok(toCandidates(parsed));
  }
}

/**
 * Anthropic-backed generator, or null without an API key
 */
export function createTechniqueGenerator(config: EngineConfig, fetchImpl?: FetchLike): TechniqueGenerator | null {
  const service = serviceForEngine("anthropic", config, fetchImpl);
  return service.isConfigured() ? new AITechniqueGenerator(service) : null;
}
