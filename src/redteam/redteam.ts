/**
 * Red-Team: fires catalogued techniques at the classifier and ranks what
 * gets through.
 */

import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { truncateDetail } from "../store/activity-log.js";

import { runBounded } from "./executor.js";
import { dangerScore, rankByDanger } from "./scoring.js";
import { DEFAULT_BUDGET, PATCHED_SAMPLE, allocateBudget, loadTiers } from "./targets.js";

import type { ClassificationOutcome } from "../classify/types.js";
import type { ActivityLog } from "../store/activity-log.js";
import type { Technique } from "../store/schema.js";
import type { TechniqueStore } from "../store/technique-store.js";
import type { ClassificationClient } from "./client.js";
import type { AttackError, BypassResult, CategoryBreakdown, RedTeamReport } from "./types.js";

export const DEFAULT_CONCURRENCY = 3;

export interface RedTeamOptions {
  techniques: TechniqueStore;
  activity: ActivityLog;
  client: ClassificationClient;
  budget?: number;
  concurrency?: number;
  patchedSample?: number;
}

export type AttackOutcome =
  | { kind: "tested"; technique: Technique; verdict: ClassificationOutcome }
  | { kind: "error"; technique: Technique; error: string };

export function toBypass(technique: Technique, verdict: ClassificationOutcome): BypassResult {
  return {
    techniqueId: technique.id,
    name: technique.name,
    category: technique.category,
    severity: technique.severity,
    payload: technique.rawPayload,
    verdict,
    danger: dangerScore(technique.severity, verdict.confidence),
  };
}

/**
 * Split outcomes into blocked, bypassed and errored, per category
 */
export function summarize(outcomes: readonly AttackOutcome[]): RedTeamReport {
  const byCategory: Record<string, CategoryBreakdown> = {};
  const bypasses: BypassResult[] = [];
  const errors: AttackError[] = [];
  let blocked = 0;

  for (const outcome of outcomes) {
    const category = outcome.technique.category;
    const stats = (byCategory[category] ??= { tested: 0, blocked: 0, bypassed: 0, errors: 0 });
    stats.tested++;

    if (outcome.kind === "error") {
      stats.errors++;
      errors.push({ techniqueId: outcome.technique.id, name: outcome.technique.name, error: outcome.error });
    } else if (outcome.verdict.blocked) {
      stats.blocked++;
      blocked++;
    } else {
      stats.bypassed++;
      bypasses.push(toBypass(outcome.technique, outcome.verdict));
    }
  }

  return { tested: outcomes.length, blocked, bypasses: rankByDanger(bypasses), errors, byCategory };
}

export function describeReport(report: RedTeamReport): string {
  const parts = Object.entries(report.byCategory).map(([category, s]) =>
    s.bypassed > 0 ? `${category}: ${s.bypassed}/${s.tested} bypassed` : `${category}: ${s.blocked}/${s.tested} blocked`
  );
  return (
    `Tested ${report.tested} techniques: ${report.blocked} blocked, ` +
    `${report.bypasses.length} bypasses, ${report.errors.length} errors. ` +
    `[${parts.length > 0 ? parts.join("; ") : "no categories tested"}]`
  );
}

export class RedTeam {
  private readonly log = logger.child("[redteam]");

  constructor(private readonly options: RedTeamOptions) {}

  /**
   * Test this cycle's targets. With `scopeIds`, test exactly those
   * techniques instead of the tiered selection.
   */
  async run(params: { scopeIds?: readonly number[] } = {}): Promise<RedTeamReport> {
    const targets = await this.targets(params.scopeIds);

    if (targets.length === 0) {
      await this.options.activity.record("redteam", "red_team", "No techniques to test this cycle");
      this.log.info("No techniques to test this cycle");
      return { tested: 0, blocked: 0, bypasses: [], errors: [], byCategory: {} };
    }

    this.log.debug(`Firing ${targets.length} techniques`);
    const outcomes = await runBounded(targets, this.options.concurrency ?? DEFAULT_CONCURRENCY, (technique) =>
      this.attack(technique)
    );

    const report = summarize(outcomes);
    const detail = describeReport(report);
    await this.options.activity.record("redteam", "red_team", truncateDetail(detail));
    for (const failure of report.errors) {
      await this.options.activity.record("redteam", "error", `Failed to test ${failure.name}: ${failure.error}`, false);
    }
    this.log.info(detail);

    return report;
  }

  private async targets(scopeIds: readonly number[] | undefined): Promise<Technique[]> {
    if (scopeIds !== undefined) {
      return this.options.techniques.byIds(scopeIds);
    }
    const tiers = await loadTiers(this.options.techniques, this.options.patchedSample ?? PATCHED_SAMPLE);
    return allocateBudget(tiers, this.options.budget ?? DEFAULT_BUDGET);
  }

  /**
   * One technique. Never rejects for classifier failures; a failed call
   * becomes an error outcome and leaves the technique untouched.
   */
  private async attack(technique: Technique): Promise<AttackOutcome> {
    let verdict: ClassificationOutcome;
    try {
      verdict = await this.options.client.classify(technique.rawPayload);
    } catch (error) {
      return { kind: "error", technique, error: errorMessage(error) };
    }
    await this.options.techniques.markTested(technique.id, verdict.blocked);
    return { kind: "tested", technique, verdict };
  }
}
