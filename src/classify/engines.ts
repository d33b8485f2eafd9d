/**
 * External classification engines (stages 1 and 2) over the AI service.
 */

import { serviceForEngine, type AIService } from "../ai/service.js";

import { degradedResult, parseEngineVerdict, toEngineResult } from "./verdict.js";

import type { FetchLike } from "../ai/types.js";
import type { EngineConfig } from "../config/index.js";
import type { ClassificationEngine, EngineResult } from "./types.js";

export class AIClassificationEngine implements ClassificationEngine {
  constructor(
    readonly name: string,
    private readonly service: AIService,
    private readonly maxTokens: number
  ) {}

  async classify(instructions: string, rawRequest: string): Promise<EngineResult> {
    const response = await this.service.complete({
      systemPrompt: instructions,
      messages: [{ role: "user", content: rawRequest }],
      maxTokens: this.maxTokens,
      temperature: 0,
    });

    if (!response.success) {
      return degradedResult(this.name, `${this.name} engine error: ${response.error}`, response.durationMs);
    }
    return toEngineResult(parseEngineVerdict(response.data), this.name, response.durationMs);
  }
}

/**
 * Stage 1: OpenAI-compatible chat completions. Null when no key is configured.
 */
export function createFastEngine(config: EngineConfig, fetchImpl?: FetchLike): ClassificationEngine | null {
  const service = serviceForEngine("openai", config, fetchImpl);
  return service.isConfigured() ? new AIClassificationEngine("fast", service, 200) : null;
}

/**
 * Stage 2: Anthropic Messages API. Null when no key is configured.
 */
export function createDeepEngine(config: EngineConfig, fetchImpl?: FetchLike): ClassificationEngine | null {
  const service = serviceForEngine("anthropic", config, fetchImpl);
  return service.isConfigured() ? new AIClassificationEngine("deep", service, 300) : null;
}
