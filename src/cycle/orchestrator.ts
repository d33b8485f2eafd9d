/**
 * Cycle Orchestrator
 *
 * Scout → Red-Team → (no bypasses: idle | Adapt → re-test residual → Adapt,
 * bounded by maxPatchRounds). Returns the hint the next cycle starts from.
 */

import { CycleError, errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import type { AdaptReport } from "../adapt/adapt.js";
import type { AgentStatus, EventSink } from "../events/index.js";
import type { RedTeamReport, BypassResult } from "../redteam/types.js";
import type { ScoutReport } from "../scout/scout.js";
import type { ActivityLog } from "../store/activity-log.js";
import type { StatsReader } from "../store/stats.js";
import type { CycleContext, CycleSummary, Hint } from "./types.js";

export const MAX_PATCH_ROUNDS = 2;

export interface CycleAgents {
  scout: { run(context: { hint?: Hint | null }): Promise<ScoutReport> };
  redTeam: { run(params?: { scopeIds?: readonly number[] }): Promise<RedTeamReport> };
  adapt: { run(bypasses: readonly BypassResult[]): Promise<AdaptReport> };
}

export interface OrchestratorOptions extends CycleAgents {
  activity: ActivityLog;
  events?: EventSink;
  stats?: StatsReader;
  maxPatchRounds?: number;
}

export class CycleOrchestrator {
  private readonly log = logger.child("[cycle]");
  private readonly maxPatchRounds: number;
  private cycleCount = 0;

  constructor(private readonly options: OrchestratorOptions) {
    this.maxPatchRounds = options.maxPatchRounds ?? MAX_PATCH_ROUNDS;
  }

  async runCycle(hint: Hint | null = null): Promise<CycleSummary> {
    const context: CycleContext = {
      cycleId: ++this.cycleCount,
      hint,
      discovered: 0,
      tested: 0,
      blocked: 0,
      errored: 0,
      bypasses: [],
      strategiesUsed: [],
    };
    this.log.info(`Cycle #${context.cycleId} starting${hint?.dominantFailureMode ? ` (hint: ${hint.dominantFailureMode})` : ""}`);

    this.emit("scout", "running", "Scanning for new attack techniques...");
    const scout = await this.phase("scout", () => this.options.scout.run({ hint }));
    context.discovered = scout.discovered;
    context.strategiesUsed = scout.strategiesUsed;
    this.emit("scout", "done", `Found ${scout.discovered} new techniques`);

    this.emit("redteam", "running", "Red-teaming current defences...");
    const initial = await this.phase("redteam", () => this.options.redTeam.run());
    context.tested = initial.tested;
    context.blocked = initial.blocked;
    context.errored = initial.errors.length;
    context.bypasses = initial.bypasses;
    this.emit("redteam", "done", `Found ${initial.bypasses.length} bypasses`);

    let bypasses = context.bypasses;
    let patched = 0;
    let verified = 0;
    let patchRounds = 0;
    let lastAdapt: AdaptReport | null = null;
    let stillBypassing: BypassResult[] = [];

    if (bypasses.length === 0) {
      this.emit("adapt", "idle", "No bypasses to fix");
    }

    while (bypasses.length > 0 && patchRounds < this.maxPatchRounds) {
      patchRounds++;
      this.emit("adapt", "running", `Round ${patchRounds}: patching ${bypasses.length} bypasses...`);
      const round = await this.phase("adapt", () => this.options.adapt.run(bypasses));
      lastAdapt = round;
      patched += round.patched;
      verified += round.verified;
      this.emit("adapt", "done", `Round ${patchRounds}: patched ${round.patched}, verified ${round.verified}`);

      const residual = new Set(round.stillBypassingIds);
      stillBypassing = bypasses.filter((b) => residual.has(b.techniqueId));
      if (stillBypassing.length === 0 || patchRounds >= this.maxPatchRounds) break;

      this.emit("redteam", "running", `Re-testing ${stillBypassing.length} residual bypasses...`);
      const retest = await this.phase("redteam", () =>
        this.options.redTeam.run({ scopeIds: stillBypassing.map((b) => b.techniqueId) })
      );
      this.emit("redteam", "done", `${retest.bypasses.length} still bypassing`);
      bypasses = retest.bypasses;
      stillBypassing = retest.bypasses;
    }

    const nextHint: Hint = {
      dominantFailureMode: lastAdapt?.dominantFailureMode ?? null,
      weakCategories: [...new Set(stillBypassing.map((b) => b.category))].sort(),
      stillBypassingIds: stillBypassing.map((b) => b.techniqueId),
    };

    const summary: CycleSummary = {
      cycleId: context.cycleId,
      discovered: context.discovered,
      tested: context.tested,
      blocked: context.blocked,
      errored: context.errored,
      bypasses: context.bypasses.length,
      patched,
      verified,
      patchRounds,
      strategiesUsed: context.strategiesUsed,
      hint: nextHint,
    };

    await this.phase("summary", () =>
      this.options.activity.record(
        "system",
        "cycle_summary",
        `Cycle #${summary.cycleId}: discovered=${summary.discovered}, tested=${summary.tested}, ` +
          `bypasses=${summary.bypasses}, patched=${summary.patched}, verified=${summary.verified}, ` +
          `rounds=${summary.patchRounds}`
      )
    );
    await this.emitStats();
    this.log.success(`Cycle #${summary.cycleId} complete: ${summary.bypasses} bypasses, ${summary.patchRounds} patch rounds`);

    return summary;
  }

  private async phase<T>(name: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      if (error instanceof CycleError) throw error;
      throw new CycleError(`${name} failed: ${errorMessage(error)}`, name, { cause: errorMessage(error) });
    }
  }

  private emit(agent: string, status: AgentStatus, detail: string): void {
    this.options.events?.emit({ type: "agent", agent, status, detail });
  }

  private async emitStats(): Promise<void> {
    if (!this.options.stats || !this.options.events) return;
    const stats = await this.options.stats.current();
    this.options.events.emit({ type: "stats", ...stats });
  }
}
