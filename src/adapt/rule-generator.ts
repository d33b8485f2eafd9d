/**
 * Rule generation: asks an engine for a complete replacement rule pair
 */

import { z } from "zod";

import { parseEmbeddedObject } from "../ai/json.js";
import { serviceForEngine, type AIService } from "../ai/service.js";
import { EngineError } from "../lib/errors.js";
import { err, ok } from "../lib/result.js";

import type { FetchLike } from "../ai/types.js";
import type { EngineConfig } from "../config/index.js";
import type { FailureMode } from "../cycle/types.js";
import type { Result } from "../lib/result.js";

export interface RuleGenerationRequest {
  report: string;
  fastPrompt: string;
  deepPrompt: string;
  failureModes: FailureMode[];
}

export interface RuleUpdate {
  fastPrompt: string;
  deepPrompt: string;
  analysis: string;
  newPatterns: string[];
}

export interface RuleGenerator {
  generate(request: RuleGenerationRequest): Promise<Result<RuleUpdate, EngineError>>;
}

const RuleUpdateSchema = z.object({
  analysis: z.string().default(""),
  fast_prompt: z.string().min(1),
  deep_prompt: z.string().min(1),
  new_patterns: z.array(z.string()).default([]),
});

export const RULE_SYSTEM_PROMPT = `You are a web application firewall engineer. You receive bypass reports: HTTP attack payloads that got past the current classifier rules, each with a diagnosed failure mode. Work out why each bypass succeeded and write updated classifier instructions.

The firewall classifies raw HTTP requests with two models: a fast first-pass classifier and a deep second-pass analyst. Their instructions must teach them to recognise SQL injection, XSS, path traversal, command injection, SSRF, RCE, XXE, header injection, auth bypass and encoding evasion.

Failure modes:
- confidence_underflow: the attack was recognised but with too little confidence to block
- encoding_evasion: obfuscation hid the payload
- context_blind_spot: the attack arrived through a part of the request that was not inspected
- semantic_miss: a well-known attack class was judged safe
- pattern_gap: the technique is not covered by the current rules

Output ONLY a JSON object:
{
  "analysis": "what the current rules missed and which evasion was used",
  "fast_prompt": "the COMPLETE updated instructions for the fast classifier",
  "deep_prompt": "the COMPLETE updated instructions for the deep classifier",
  "new_patterns": ["one short description per pattern you added"]
}

The prompts are complete replacements, not patches: keep every existing instruction and add to it.`;

export function buildRulePrompt(request: RuleGenerationRequest): string {
  return `CURRENT FAST PROMPT:
${request.fastPrompt}

CURRENT DEEP PROMPT:
${request.deepPrompt}

DIAGNOSED FAILURE MODES: ${request.failureModes.join(", ")}

BYPASS REPORTS:
${request.report}`;
}

/**
 * Validate a generator answer into a RuleUpdate
 */
export function parseRuleUpdate(content: string): Result<RuleUpdate, EngineError> {
  const json = parseEmbeddedObject(content);
  if (json === undefined) {
    return err(new EngineError("No JSON object in rule generation response", "rules"));
  }
  const parsed = RuleUpdateSchema.safeParse(json);
  if (!parsed.success) {
    const issue = parsed.error.issues[0];
    return err(
      new EngineError(`Unexpected rule update shape: ${issue ? `${issue.path.join(".")} ${issue.message}` : "invalid"}`, "rules")
    );
  }
  return ok({
    fastPrompt: parsed.data.fast_prompt,
    deepPrompt: parsed.data.deep_prompt,
    analysis: parsed.data.analysis,
    newPatterns: parsed.data.new_patterns,
  });
}

export class AIRuleGenerator implements RuleGenerator {
  constructor(private readonly service: AIService) {}

  async generate(request: RuleGenerationRequest): Promise<Result<RuleUpdate, EngineError>> {
    const response = await this.service.complete({
      systemPrompt: RULE_SYSTEM_PROMPT,
      messages: [{ role: "user", content: buildRulePrompt(request) }],
      maxTokens: 4000,
      temperature: 0.2,
    });

    if (!response.success) {
      return err(new EngineError(response.error, "rules"));
    }
    return parseRuleUpdate(response.data);
  }
}

/**
 * Anthropic-backed rule generator, or null without an API key
 */
export function createRuleGenerator(config: EngineConfig, fetchImpl?: FetchLike): RuleGenerator | null {
  const service = serviceForEngine("anthropic", config, fetchImpl);
  return service.isConfigured() ? new AIRuleGenerator(service) : null;
}
