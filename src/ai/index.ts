/**
 * AI Service Module
 *
 * Completion transport shared by the classification engines, technique
 * generation and rule generation.
 */

export { AIService, createAIService, serviceForEngine, PROVIDER_DEFAULTS } from "./service.js";
export { extractJsonObject, extractJsonArray, parseEmbeddedObject, parseEmbeddedArray } from "./json.js";
export type {
  AIConfig,
  AIProvider,
  AIResponse,
  CompletionRequest,
  FetchLike,
  Message,
  TokenUsage,
} from "./types.js";
