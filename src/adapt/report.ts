/**
 * Evidence report handed to the rule generator
 */

import { FAILURE_MODES, type FailureMode } from "../cycle/types.js";
import { toWire } from "../redteam/client.js";

import { groupBy } from "./diagnosis.js";

import type { BypassResult } from "../redteam/types.js";

/** Payload characters quoted per bypass */
export const REPORT_PAYLOAD_LENGTH = 300;

export type DiagnosedBypass = BypassResult & { failureMode: FailureMode };

export function buildEvidenceReport(
  bypasses: readonly DiagnosedBypass[],
  counts: Record<FailureMode, number>
): string {
  const summary = FAILURE_MODES.filter((mode) => counts[mode] > 0)
    .map((mode) => `- ${mode}: ${counts[mode]}`)
    .join("\n");

  const byCategory = [...groupBy(bypasses, (b) => b.category)]
    .map(([category, group]) => `${category}: ${group.length}`)
    .join(", ");

  const entries = bypasses.map((b, i) =>
    [
      `BYPASS #${i + 1}:`,
      `Technique: ${b.name}`,
      `Category: ${b.category}`,
      `Severity: ${b.severity}`,
      `Failure mode: ${b.failureMode}`,
      `Danger: ${b.danger.toFixed(2)}`,
      `Payload: ${b.payload.slice(0, REPORT_PAYLOAD_LENGTH)}`,
      `Classifier said: ${JSON.stringify(toWire(b.verdict))}`,
    ].join("\n")
  );

  return `FAILURE MODES (${bypasses.length} bypasses):\n${summary}\nBY CATEGORY: ${byCategory}\n\n${entries.join("\n\n")}`;
}
