// Error classes
export {
  RiposteError,
  ValidationError,
  ConfigError,
  StoreError,
  EngineError,
  RateLimitError,
  CycleError,
  TechniqueNotFoundError,
  errorMessage,
} from "./errors.js";

// Result type and utilities
export {
  ok,
  err,
  unwrap,
  unwrapOr,
  map,
  mapErr,
  andThen,
  all,
  tryCatch,
  tryCatchAsync,
} from "./result.js";
export type { Result } from "./result.js";

// Logger
export { logger, LOG_LEVELS } from "./logger.js";
export type { LogLevel, Logger } from "./logger.js";

// Rate limiting
export { SlidingWindowLimiter, DEFAULT_BUCKETS } from "./rate-limiter.js";
export type { RateLimitBucket, RateLimitDecision } from "./rate-limiter.js";
