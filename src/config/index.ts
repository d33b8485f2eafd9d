/**
 * Configuration Management
 *
 * Settings come from environment variables, optionally overlaid on a YAML
 * file (`riposte.config.yaml` in the working directory, or the path in
 * `RIPOSTE_CONFIG`). Environment variables take precedence.
 */

import { existsSync, readFileSync } from "fs";
import { resolve } from "path";

import YAML from "yaml";
import { z } from "zod";

import { ConfigError, errorMessage } from "../lib/errors.js";

export const DEFAULT_CONFIG_FILE = "riposte.config.yaml";

const LogLevelSchema = z.enum(["debug", "info", "warn", "error", "silent"]);

const BucketSchema = z.object({
  maxRequests: z.coerce.number().int().positive(),
  windowMs: z.coerce.number().int().positive(),
});

const EngineSchema = z.object({
  apiKey: z.string().default(""),
  model: z.string().optional(),
  baseUrl: z.string().url().optional(),
  timeoutMs: z.coerce.number().int().positive().default(15_000),
});

/**
 * Full configuration schema
 */
export const RiposteConfigSchema = z.object({
  databasePath: z.string().min(1).default("data/riposte.db"),
  logLevel: LogLevelSchema.default("info"),
  port: z.coerce.number().int().min(0).max(65535).default(8000),
  /** Public classify endpoint Red-Team fires at; in-process pipeline when unset */
  classifyUrl: z.string().url().optional(),
  engines: z
    .object({
      /** OpenAI-compatible chat completions host */
      fast: EngineSchema.default({}),
      /** Anthropic Messages API */
      deep: EngineSchema.default({}),
      /** Anthropic Messages API; technique and rule generation */
      generation: EngineSchema.extend({ timeoutMs: z.coerce.number().int().positive().default(60_000) }).default({}),
    })
    .default({}),
  cycle: z
    .object({
      delayMs: z.coerce.number().int().min(0).default(30_000),
      startupDelayMs: z.coerce.number().int().min(0).default(5_000),
      redTeamBudget: z.coerce.number().int().positive().default(15),
      concurrency: z.coerce.number().int().positive().default(3),
      attackTimeoutMs: z.coerce.number().int().positive().default(30_000),
      scoutBatchSize: z.coerce.number().int().positive().default(5),
      maxPatchRounds: z.coerce.number().int().min(1).default(2),
      verificationSample: z.coerce.number().int().positive().default(3),
    })
    .default({}),
  rateLimits: z
    .object({
      classify: BucketSchema.default({ maxRequests: 30, windowMs: 60_000 }),
      agents: BucketSchema.default({ maxRequests: 3, windowMs: 300_000 }),
      api: BucketSchema.default({ maxRequests: 60, windowMs: 60_000 }),
    })
    .default({}),
});

export type RiposteConfig = z.infer<typeof RiposteConfigSchema>;
export type EngineConfig = z.infer<typeof EngineSchema>;

type Env = Record<string, string | undefined>;

/** Environment variable → dotted config path */
const ENV_MAPPING: ReadonlyArray<[string, readonly string[]]> = [
  ["RIPOSTE_DB_PATH", ["databasePath"]],
  ["RIPOSTE_LOG_LEVEL", ["logLevel"]],
  ["RIPOSTE_PORT", ["port"]],
  ["RIPOSTE_CLASSIFY_URL", ["classifyUrl"]],
  ["RIPOSTE_FAST_API_KEY", ["engines", "fast", "apiKey"]],
  ["RIPOSTE_FAST_BASE_URL", ["engines", "fast", "baseUrl"]],
  ["RIPOSTE_FAST_MODEL", ["engines", "fast", "model"]],
  ["RIPOSTE_FAST_TIMEOUT_MS", ["engines", "fast", "timeoutMs"]],
  ["ANTHROPIC_API_KEY", ["engines", "deep", "apiKey"]],
  ["RIPOSTE_DEEP_MODEL", ["engines", "deep", "model"]],
  ["RIPOSTE_DEEP_TIMEOUT_MS", ["engines", "deep", "timeoutMs"]],
  ["ANTHROPIC_API_KEY", ["engines", "generation", "apiKey"]],
  ["RIPOSTE_GENERATION_MODEL", ["engines", "generation", "model"]],
  ["RIPOSTE_GENERATION_TIMEOUT_MS", ["engines", "generation", "timeoutMs"]],
  ["RIPOSTE_CYCLE_DELAY_MS", ["cycle", "delayMs"]],
  ["RIPOSTE_STARTUP_DELAY_MS", ["cycle", "startupDelayMs"]],
  ["RIPOSTE_REDTEAM_BUDGET", ["cycle", "redTeamBudget"]],
  ["RIPOSTE_REDTEAM_CONCURRENCY", ["cycle", "concurrency"]],
  ["RIPOSTE_MAX_PATCH_ROUNDS", ["cycle", "maxPatchRounds"]],
];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function setPath(target: Record<string, unknown>, path: readonly string[], value: string): void {
  let node = target;
  for (const [index, key] of path.entries()) {
    if (index === path.length - 1) {
      node[key] = value;
      return;
    }
    const child = node[key];
    if (isRecord(child)) {
      node = child;
    } else {
      const created: Record<string, unknown> = {};
      node[key] = created;
      node = created;
    }
  }
}

/**
 * Read and parse the YAML overlay. Returns an empty object when the file
 * does not exist.
 */
export function readConfigFile(path: string): Record<string, unknown> {
  if (!existsSync(path)) {
    return {};
  }

  let parsed: unknown;
  try {
    parsed = YAML.parse(readFileSync(path, "utf-8"));
  } catch (error) {
    throw new ConfigError(`Failed to parse ${path}: ${errorMessage(error)}`, { path });
  }

  if (parsed === null || parsed === undefined) {
    return {};
  }
  if (!isRecord(parsed)) {
    throw new ConfigError(`${path} must contain a mapping at the top level`, { path });
  }
  return parsed;
}

/**
 * Resolve configuration from a file overlay and the environment.
 * Throws ConfigError listing every invalid key.
 */
export function loadConfig(options: { env?: Env; cwd?: string; file?: string } = {}): RiposteConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();
  const file = options.file ?? env["RIPOSTE_CONFIG"] ?? resolve(cwd, DEFAULT_CONFIG_FILE);

  const raw = readConfigFile(resolve(cwd, file));

  for (const [name, path] of ENV_MAPPING) {
    const value = env[name];
    if (value !== undefined && value.length > 0) {
      setPath(raw, path, value);
    }
  }

  const result = RiposteConfigSchema.safeParse(raw);
  if (!result.success) {
    const issues = result.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, { issues });
  }
  return result.data;
}

/**
 * Mask API key for display (show first/last 4 chars)
 */
export function maskApiKey(key: string): string {
  if (key.length === 0) {
    return "(not set)";
  }
  if (key.length <= 12) {
    return "****";
  }
  return `${key.slice(0, 4)}...${key.slice(-4)}`;
}
