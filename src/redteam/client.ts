/**
 * Ways Red-Team and Adapt reach the classifier under test.
 */

import { z } from "zod";

import { CLASSIFICATIONS } from "../classify/types.js";

import { withTimeout } from "./executor.js";

import type { FetchLike } from "../ai/types.js";
import type { ClassificationOutcome, Classifier } from "../classify/types.js";

export interface ClassificationClient {
  /** Rejects on transport failure, timeout or an unusable response */
  classify(rawRequest: string): Promise<ClassificationOutcome>;
}

/** Wire shape of the classification request contract */
export const ClassifyResponseSchema = z.object({
  classification: z.enum(CLASSIFICATIONS),
  confidence: z.number(),
  attack_type: z.string().default("none"),
  reason: z.string().default(""),
  classifier: z.string().default("unknown"),
  blocked: z.boolean(),
  response_time_ms: z.number().default(0),
  rules_version: z.number().int().default(1),
});

export type ClassifyResponse = z.infer<typeof ClassifyResponseSchema>;

export function toWire(outcome: ClassificationOutcome): ClassifyResponse {
  return {
    classification: outcome.classification,
    confidence: outcome.confidence,
    attack_type: outcome.attackType,
    reason: outcome.reason,
    classifier: outcome.classifier,
    blocked: outcome.blocked,
    response_time_ms: outcome.responseTimeMs,
    rules_version: outcome.rulesVersion,
  };
}

export function fromWire(response: ClassifyResponse): ClassificationOutcome {
  return {
    classification: response.classification,
    confidence: response.confidence,
    attackType: response.attack_type,
    reason: response.reason,
    classifier: response.classifier,
    blocked: response.blocked,
    responseTimeMs: response.response_time_ms,
    rulesVersion: response.rules_version,
  };
}

/**
 * POSTs `{ message }` to a public `/v1/classify` endpoint
 */
export class HttpClassificationClient implements ClassificationClient {
  private readonly endpoint: string;
  private readonly fetchImpl: FetchLike;

  constructor(
    baseUrl: string,
    private readonly timeoutMs = 30_000,
    fetchImpl?: FetchLike
  ) {
    this.endpoint = `${baseUrl.replace(/\/+$/, "")}/v1/classify`;
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  async classify(rawRequest: string): Promise<ClassificationOutcome> {
    const controller = new AbortController();
    const timer = setTimeout(() => controller.abort(), this.timeoutMs);

    try {
      const response = await this.fetchImpl(this.endpoint, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ message: rawRequest }),
        signal: controller.signal,
      });

      if (!response.ok) {
        throw new Error(`HTTP ${response.status}`);
      }

      const parsed = ClassifyResponseSchema.safeParse(await response.json());
      if (!parsed.success) {
        throw new Error(`Unexpected classify response: ${parsed.error.issues[0]?.message ?? "invalid shape"}`);
      }
      return fromWire(parsed.data);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`Classify request timed out after ${this.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timer);
    }
  }
}

/**
 * Calls a pipeline in the same process
 */
export class PipelineClassificationClient implements ClassificationClient {
  constructor(
    private readonly classifier: Classifier,
    private readonly timeoutMs = 30_000
  ) {}

  async classify(rawRequest: string): Promise<ClassificationOutcome> {
    return withTimeout(this.classifier.classify(rawRequest), this.timeoutMs, "Classification");
  }
}
