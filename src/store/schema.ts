import { z } from "zod";

/**
 * Closed set of attack categories tracked by the catalog
 */
export const ATTACK_CATEGORIES = [
  "sqli",
  "xss",
  "path_traversal",
  "command_injection",
  "ssrf",
  "rce",
  "header_injection",
  "xxe",
  "auth_bypass",
  "encoding_evasion",
] as const;

export const AttackCategorySchema = z.enum(ATTACK_CATEGORIES);
export type AttackCategory = z.infer<typeof AttackCategorySchema>;

export const SEVERITIES = ["low", "medium", "high", "critical"] as const;
export const SeveritySchema = z.enum(SEVERITIES);
export type Severity = z.infer<typeof SeveritySchema>;

/** Who produced a rule version */
export const RULE_AUTHORS = ["system", "scout", "adapt", "heuristic"] as const;
export const RuleAuthorSchema = z.enum(RULE_AUTHORS);
export type RuleAuthor = z.infer<typeof RuleAuthorSchema>;

export const DEFAULT_CATEGORY: AttackCategory = "encoding_evasion";
export const DEFAULT_SEVERITY: Severity = "medium";

/**
 * Map any value onto the category enum; unknown values degrade to the default
 */
export function coerceCategory(value: unknown): AttackCategory {
  const parsed = AttackCategorySchema.safeParse(typeof value === "string" ? value.trim().toLowerCase() : value);
  return parsed.success ? parsed.data : DEFAULT_CATEGORY;
}

/**
 * Map any value onto the severity enum; unknown values degrade to the default
 */
export function coerceSeverity(value: unknown): Severity {
  const parsed = SeveritySchema.safeParse(typeof value === "string" ? value.trim().toLowerCase() : value);
  return parsed.success ? parsed.data : DEFAULT_SEVERITY;
}

/** A catalogued attack technique */
export interface Technique {
  id: number;
  /** Unique, descriptive name */
  name: string;
  category: AttackCategory;
  /** Where the technique came from, e.g. `owasp/top-10` or `scout/encoding_chains` */
  source: string;
  /** Full synthetic request, headers and body included */
  rawPayload: string;
  severity: Severity;
  discoveredAt: string;
  testedAt: string | null;
  blocked: boolean;
  patchedAt: string | null;
}

/** Fields supplied when cataloguing a new technique */
export interface NewTechnique {
  name: string;
  category: AttackCategory;
  source: string;
  rawPayload: string;
  severity: Severity;
}

/** One immutable version of the classifier instruction pair */
export interface RuleVersion {
  version: number;
  fastPrompt: string;
  deepPrompt: string;
  updatedAt: string;
  updatedBy: RuleAuthor;
}

/** Row of the append-only activity/audit log */
export interface ActivityEntry {
  id: number;
  timestamp: string;
  agent: string;
  action: string;
  detail: string;
  success: boolean;
}

/** Row of the classification request log */
export interface RequestLogEntry {
  id: number;
  timestamp: string;
  excerpt: string;
  classification: string;
  confidence: number;
  classifier: string;
  blocked: boolean;
  attackType: string;
  responseTimeMs: number;
}

/** Per-category outcome counts */
export interface CategoryStats {
  category: string;
  total: number;
  tested: number;
  blocked: number;
}

/** Aggregate counters surfaced to the dashboard and `stats` command */
export interface AggregateStats {
  totalRequests: number;
  blockedRequests: number;
  totalThreats: number;
  threatsBlocked: number;
  /** Percentage of catalogued techniques currently blocked, one decimal */
  blockRate: number;
  rulesVersion: number;
}
