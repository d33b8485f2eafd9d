/**
 * Failure-mode diagnosis. Pure functions: no I/O, no hidden state.
 */

import { FAILURE_MODES, type FailureMode } from "../cycle/types.js";
import { BLOCK_THRESHOLD } from "../classify/pipeline.js";

import type { Classification } from "../classify/types.js";
import type { AttackCategory } from "../store/schema.js";

/** Obfuscation markers that point to an encoding evasion */
export const ENCODING_MARKERS: readonly RegExp[] = [
  // layered percent-encoding
  /%25[0-9a-f]{2}/i,
  // null bytes
  /%00|\\x00|\\u0000|\u0000/i,
  // Unicode escapes
  /\\u[0-9a-f]{4}|%u[0-9a-f]{4}/i,
  // SQL comments
  /\/\*[\s\S]*?\*\/|['"\d)\s]--(?:\s|$)/m,
  // HTML entities
  /&#x?[0-9a-f]+;|&(?:lt|gt|quot|apos|amp);/i,
];

/** Markers of a delivery context the classifier may not inspect */
export const CONTEXT_MARKERS: readonly RegExp[] = [
  /multipart\/form-data/i,
  /content-type:[^\n]*xml/i,
  /x-forwarded-for\s*:/i,
  /graphql/i,
  /upgrade:\s*websocket/i,
  /transfer-encoding:\s*chunked/i,
];

/** Categories the pipeline is expected to catch confidently */
export const HIGH_CONFIDENCE_CATEGORIES: ReadonlySet<AttackCategory> = new Set([
  "sqli",
  "xss",
  "command_injection",
  "rce",
  "ssrf",
]);

export interface DiagnosisInput {
  category: AttackCategory;
  payload: string;
  verdict: { classification: Classification; confidence: number };
}

export function hasEncodingMarkers(payload: string): boolean {
  return ENCODING_MARKERS.some((marker) => marker.test(payload));
}

export function hasContextMarkers(payload: string): boolean {
  return CONTEXT_MARKERS.some((marker) => marker.test(payload));
}

/**
 * Assign exactly one failure mode, first match wins
 */
export function diagnose(bypass: DiagnosisInput): FailureMode {
  const { classification, confidence } = bypass.verdict;

  if (classification === "MALICIOUS" && confidence <= BLOCK_THRESHOLD) {
    return "confidence_underflow";
  }
  if (hasEncodingMarkers(bypass.payload)) {
    return "encoding_evasion";
  }
  if (classification === "SAFE" && hasContextMarkers(bypass.payload)) {
    return "context_blind_spot";
  }
  if (classification === "SAFE" && HIGH_CONFIDENCE_CATEGORIES.has(bypass.category)) {
    return "semantic_miss";
  }
  return "pattern_gap";
}

export function countFailureModes(modes: readonly FailureMode[]): Record<FailureMode, number> {
  const counts: Record<FailureMode, number> = {
    confidence_underflow: 0,
    encoding_evasion: 0,
    context_blind_spot: 0,
    semantic_miss: 0,
    pattern_gap: 0,
  };
  for (const mode of modes) counts[mode]++;
  return counts;
}

/**
 * Largest group; ties go to the earlier mode in precedence order
 */
export function dominantFailureMode(counts: Record<FailureMode, number>): FailureMode | null {
  let best: FailureMode | null = null;
  for (const mode of FAILURE_MODES) {
    if (counts[mode] > 0 && (best === null || counts[mode] > counts[best])) {
      best = mode;
    }
  }
  return best;
}

/**
 * Group items by a key, keeping first-seen key order
 */
export function groupBy<T, K extends string>(items: readonly T[], key: (item: T) => K): Map<K, T[]> {
  const groups = new Map<K, T[]>();
  for (const item of items) {
    const k = key(item);
    const group = groups.get(k);
    if (group) group.push(item);
    else groups.set(k, [item]);
  }
  return groups;
}
