import type { Severity } from "../store/schema.js";

export const SEVERITY_WEIGHT: Record<Severity, number> = {
  critical: 4,
  high: 3,
  medium: 2,
  low: 1,
};

/**
 * How dangerous a bypass is: severe techniques the pipeline was unsure
 * about score highest.
 */
export function dangerScore(severity: Severity, confidence: number): number {
  return SEVERITY_WEIGHT[severity] * (1 + (1 - confidence));
}

/**
 * Most dangerous first; equal scores keep their order
 */
export function rankByDanger<T extends { danger: number }>(items: readonly T[]): T[] {
  return [...items].sort((a, b) => b.danger - a.danger);
}
