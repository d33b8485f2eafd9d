/**
 * Base error class for all Riposte errors
 */
export class RiposteError extends Error {
  constructor(
    message: string,
    public readonly code: string,
    public readonly context?: Record<string, unknown>
  ) {
    super(message);
    this.name = "RiposteError";
    Error.captureStackTrace?.(this, this.constructor);
  }

  /**
   * Serialize error for logging or API responses
   */
  toJSON(): Record<string, unknown> {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      context: this.context,
    };
  }
}

/**
 * Error for schema validation failures
 */
export class ValidationError extends RiposteError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "VALIDATION_ERROR", context);
    this.name = "ValidationError";
  }
}

/**
 * Error for configuration issues
 */
export class ConfigError extends RiposteError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "CONFIG_ERROR", context);
    this.name = "ConfigError";
  }
}

/**
 * Persistence failure. Not recoverable locally; surfaces as a cycle failure.
 */
export class StoreError extends RiposteError {
  constructor(message: string, context?: Record<string, unknown>) {
    super(message, "STORE_ERROR", context);
    this.name = "StoreError";
  }
}

/**
 * External engine failure: network error, non-2xx status, or unparsable body
 */
export class EngineError extends RiposteError {
  constructor(
    message: string,
    public readonly engine: string,
    context?: Record<string, unknown>
  ) {
    super(message, "ENGINE_ERROR", { ...context, engine });
    this.name = "EngineError";
  }
}

/**
 * Caller exceeded a rate-limit bucket
 */
export class RateLimitError extends RiposteError {
  constructor(
    public readonly bucket: string,
    public readonly retryAfterSeconds: number
  ) {
    super(`Rate limited on bucket ${bucket}`, "RATE_LIMITED", { bucket, retryAfterSeconds });
    this.name = "RateLimitError";
  }
}

/**
 * A cycle aborted because one of its phases threw
 */
export class CycleError extends RiposteError {
  constructor(message: string, public readonly phase: string, context?: Record<string, unknown>) {
    super(message, "CYCLE_ERROR", { ...context, phase });
    this.name = "CycleError";
  }
}

/**
 * Technique not found in the catalog
 */
export class TechniqueNotFoundError extends RiposteError {
  constructor(techniqueId: number) {
    super(`Technique not found: ${techniqueId}`, "TECHNIQUE_NOT_FOUND", { techniqueId });
    this.name = "TechniqueNotFoundError";
  }
}

/**
 * Render any thrown value as a message string
 */
export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
