/**
 * AI Service Types
 */

/**
 * Wire protocol of a completion provider.
 * - anthropic: Messages API
 * - openai: Chat Completions API (also any OpenAI-compatible inference host)
 */
export type AIProvider = "anthropic" | "openai";

export interface AIConfig {
  /** AI provider to use */
  provider: AIProvider;
  /** API key; an empty key means the service is not configured */
  apiKey: string;
  /** Model to use (provider-specific) */
  model: string;
  /** Base URL, without the trailing endpoint path */
  baseUrl: string;
  /** Maximum tokens in response */
  maxTokens: number;
  /** Temperature (0-1) */
  temperature: number;
  /** Timeout in milliseconds */
  timeoutMs: number;
}

export interface TokenUsage {
  inputTokens: number;
  outputTokens: number;
}

export type AIResponse<T = string> =
  | { success: true; data: T; usage?: TokenUsage; durationMs: number }
  | { success: false; error: string; durationMs: number };

export interface Message {
  role: "user" | "assistant";
  content: string;
}

export interface CompletionRequest {
  messages: Message[];
  maxTokens?: number;
  temperature?: number;
  systemPrompt?: string;
}

/** Minimal fetch signature so tests can hand in an in-process transport */
export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;
