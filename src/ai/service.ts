/**
 * AI Service Implementation
 *
 * One completion interface over the Anthropic Messages API and
 * OpenAI-compatible chat completion hosts. Never throws: transport and HTTP
 * failures come back as `{ success: false }`.
 */

import { errorMessage } from "../lib/errors.js";

import type {
  AIConfig,
  AIProvider,
  AIResponse,
  CompletionRequest,
  FetchLike,
  TokenUsage,
} from "./types.js";

export const PROVIDER_DEFAULTS: Record<AIProvider, { model: string; baseUrl: string }> = {
  anthropic: {
    model: "claude-sonnet-4-20250514",
    baseUrl: "https://api.anthropic.com/v1",
  },
  openai: {
    model: "gpt-4o-mini",
    baseUrl: "https://api.openai.com/v1",
  },
};

const DEFAULT_CONFIG: Omit<AIConfig, "provider" | "model" | "baseUrl"> = {
  apiKey: "",
  maxTokens: 1024,
  temperature: 0,
  timeoutMs: 30000,
};

/**
 * AI Service for generating completions
 */
export class AIService {
  private readonly config: AIConfig;
  private readonly fetchImpl: FetchLike;

  constructor(config: Partial<AIConfig> & { provider: AIProvider }, fetchImpl?: FetchLike) {
    const defaults = PROVIDER_DEFAULTS[config.provider];
    this.config = {
      ...DEFAULT_CONFIG,
      model: defaults.model,
      baseUrl: defaults.baseUrl,
      ...config,
    };
    this.fetchImpl = fetchImpl ?? ((input, init) => fetch(input, init));
  }

  /**
   * Check if the service is configured with an API key
   */
  isConfigured(): boolean {
    return this.config.apiKey.length > 0;
  }

  getProvider(): AIProvider {
    return this.config.provider;
  }

  getModel(): string {
    return this.config.model;
  }

  /**
   * Generate a completion
   */
  async complete(request: CompletionRequest): Promise<AIResponse<string>> {
    const startTime = Date.now();

    if (!this.isConfigured()) {
      return {
        success: false,
        error: `API key not configured for ${this.config.provider}`,
        durationMs: Date.now() - startTime,
      };
    }

    try {
      const response = await this.callProvider(request);
      return {
        success: true,
        data: response.content,
        usage: response.usage,
        durationMs: Date.now() - startTime,
      };
    } catch (error) {
      return {
        success: false,
        error: errorMessage(error),
        durationMs: Date.now() - startTime,
      };
    }
  }

  private async callProvider(
    request: CompletionRequest
  ): Promise<{ content: string; usage: TokenUsage }> {
    const controller = new AbortController();
    const timeout = setTimeout(() => controller.abort(), this.config.timeoutMs);

    try {
      if (this.config.provider === "anthropic") {
        return await this.callAnthropic(request, controller.signal);
      }
      return await this.callOpenAI(request, controller.signal);
    } catch (error) {
      if (controller.signal.aborted) {
        throw new Error(`${this.config.provider} request timed out after ${this.config.timeoutMs}ms`);
      }
      throw error;
    } finally {
      clearTimeout(timeout);
    }
  }

  private async callAnthropic(
    request: CompletionRequest,
    signal: AbortSignal
  ): Promise<{ content: string; usage: TokenUsage }> {
    const response = await this.fetchImpl(`${this.config.baseUrl}/messages`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        "x-api-key": this.config.apiKey,
        "anthropic-version": "2023-06-01",
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        system: request.systemPrompt,
        messages: request.messages.map((m) => ({ role: m.role, content: m.content })),
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`Anthropic API error: ${response.status} - ${error}`);
    }

    const data = (await response.json()) as {
      content?: Array<{ text?: string }>;
      usage?: { input_tokens?: number; output_tokens?: number };
    };

    return {
      content: data.content?.[0]?.text ?? "",
      usage: {
        inputTokens: data.usage?.input_tokens ?? 0,
        outputTokens: data.usage?.output_tokens ?? 0,
      },
    };
  }

  private async callOpenAI(
    request: CompletionRequest,
    signal: AbortSignal
  ): Promise<{ content: string; usage: TokenUsage }> {
    const messages: Array<{ role: string; content: string }> = [];

    if (request.systemPrompt !== undefined && request.systemPrompt.length > 0) {
      messages.push({ role: "system", content: request.systemPrompt });
    }
    for (const m of request.messages) {
      messages.push({ role: m.role, content: m.content });
    }

    const response = await this.fetchImpl(`${this.config.baseUrl}/chat/completions`, {
      method: "POST",
      headers: {
        "Content-Type": "application/json",
        Authorization: `Bearer ${this.config.apiKey}`,
      },
      body: JSON.stringify({
        model: this.config.model,
        max_tokens: request.maxTokens ?? this.config.maxTokens,
        temperature: request.temperature ?? this.config.temperature,
        messages,
      }),
      signal,
    });

    if (!response.ok) {
      const error = await response.text();
      throw new Error(`OpenAI-compatible API error: ${response.status} - ${error}`);
    }

    const data = (await response.json()) as {
      choices?: Array<{ message?: { content?: string } }>;
      usage?: { prompt_tokens?: number; completion_tokens?: number };
    };

    return {
      content: data.choices?.[0]?.message?.content ?? "",
      usage: {
        inputTokens: data.usage?.prompt_tokens ?? 0,
        outputTokens: data.usage?.completion_tokens ?? 0,
      },
    };
  }
}

/**
 * Create an AI service instance
 */
export function createAIService(
  config: Partial<AIConfig> & { provider: AIProvider },
  fetchImpl?: FetchLike
): AIService {
  return new AIService(config, fetchImpl);
}

/**
 * Build a service for one configured engine slot
 */
export function serviceForEngine(
  provider: AIProvider,
  config: { apiKey: string; timeoutMs: number; model?: string | undefined; baseUrl?: string | undefined },
  fetchImpl?: FetchLike
): AIService {
  return new AIService(
    {
      provider,
      apiKey: config.apiKey,
      timeoutMs: config.timeoutMs,
      ...(config.model !== undefined ? { model: config.model } : {}),
      ...(config.baseUrl !== undefined ? { baseUrl: config.baseUrl } : {}),
    },
    fetchImpl
  );
}
