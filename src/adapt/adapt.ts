/**
 * Adapt: turns confirmed bypasses into a new rule version.
 *
 * Diagnoses each bypass, asks the rule generator for a replacement rule
 * pair, deploys it, then re-tests the most dangerous bypasses against the
 * live classifier. Without a usable generator it falls back to a heuristic
 * version bump that changes no rule text.
 */

import { DEFAULT_DEEP_PROMPT, DEFAULT_FAST_PROMPT } from "../classify/prompts.js";
import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { rankByDanger } from "../redteam/scoring.js";

import { countFailureModes, diagnose, dominantFailureMode } from "./diagnosis.js";
import { buildEvidenceReport, type DiagnosedBypass } from "./report.js";

import type { FailureMode } from "../cycle/types.js";
import type { ClassificationClient } from "../redteam/client.js";
import type { BypassResult } from "../redteam/types.js";
import type { ActivityLog } from "../store/activity-log.js";
import type { RuleStore } from "../store/rule-store.js";
import type { RuleVersion } from "../store/schema.js";
import type { TechniqueStore } from "../store/technique-store.js";
import type { RuleGenerator, RuleUpdate } from "./rule-generator.js";

export const DEFAULT_VERIFICATION_SAMPLE = 3;

/** Analysis characters kept in the activity row */
const ANALYSIS_PREVIEW_LENGTH = 200;

export interface AdaptOptions {
  techniques: TechniqueStore;
  rules: RuleStore;
  activity: ActivityLog;
  /** Live classification endpoint used for verification */
  client: ClassificationClient;
  generator?: RuleGenerator | null;
  verificationSample?: number;
}

export interface AdaptReport {
  patched: number;
  verified: number;
  stillBypassingIds: number[];
  dominantFailureMode: FailureMode | null;
  failureModeCounts: Record<FailureMode, number>;
  newVersion: number;
  heuristic: boolean;
  /** Diagnosed bypasses, most dangerous first */
  diagnosed: DiagnosedBypass[];
}

export class Adapt {
  private readonly log = logger.child("[adapt]");

  constructor(private readonly options: AdaptOptions) {}

  async run(bypasses: readonly BypassResult[]): Promise<AdaptReport> {
    const diagnosed: DiagnosedBypass[] = rankByDanger(bypasses).map((b) => ({ ...b, failureMode: diagnose(b) }));
    const counts = countFailureModes(diagnosed.map((b) => b.failureMode));
    const dominant = dominantFailureMode(counts);

    const current =
      (await this.options.rules.current()) ??
      (await this.options.rules.bootstrap({ fastPrompt: DEFAULT_FAST_PROMPT, deepPrompt: DEFAULT_DEEP_PROMPT }));

    if (diagnosed.length === 0) {
      return {
        patched: 0,
        verified: 0,
        stillBypassingIds: [],
        dominantFailureMode: null,
        failureModeCounts: counts,
        newVersion: current.version,
        heuristic: false,
        diagnosed,
      };
    }

    const update = await this.requestUpdate(diagnosed, counts, current);
    const base = { dominantFailureMode: dominant, failureModeCounts: counts, diagnosed };

    if (update === null) {
      return { ...base, ...(await this.heuristicPatch(diagnosed, current)) };
    }
    return { ...base, ...(await this.deployAndVerify(diagnosed, current, update)) };
  }

  /**
   * Ask the generator for new rules. Null means: take the heuristic path.
   */
  private async requestUpdate(
    diagnosed: DiagnosedBypass[],
    counts: Record<FailureMode, number>,
    current: RuleVersion
  ): Promise<RuleUpdate | null> {
    const generator = this.options.generator;
    if (!generator) {
      this.log.debug("no rule generation engine configured");
      return null;
    }

    try {
      const result = await generator.generate({
        report: buildEvidenceReport(diagnosed, counts),
        fastPrompt: current.fastPrompt,
        deepPrompt: current.deepPrompt,
        failureModes: [...new Set(diagnosed.map((b) => b.failureMode))],
      });
      if (result.success) return result.data;
      this.log.warn(`Rule generation failed: ${result.error.message}`);
    } catch (error) {
      this.log.warn(`Rule generation failed: ${errorMessage(error)}`);
    }
    return null;
  }

  private async deployAndVerify(
    diagnosed: DiagnosedBypass[],
    current: RuleVersion,
    update: RuleUpdate
  ): Promise<Pick<AdaptReport, "patched" | "verified" | "stillBypassingIds" | "newVersion" | "heuristic">> {
    const deployed = await this.options.rules.deploy({
      fastPrompt: update.fastPrompt,
      deepPrompt: update.deepPrompt,
      updatedBy: "adapt",
    });

    const verifiedIds = await this.verify(diagnosed);

    for (const bypass of diagnosed) {
      await this.options.techniques.markPatched(bypass.techniqueId, { blocked: verifiedIds.has(bypass.techniqueId) });
    }

    const stillBypassingIds = diagnosed.map((b) => b.techniqueId).filter((id) => !verifiedIds.has(id));
    const detail =
      `v${current.version}->v${deployed.version}: ${update.analysis.slice(0, ANALYSIS_PREVIEW_LENGTH)}. ` +
      `Patched ${diagnosed.length} bypasses, verified ${verifiedIds.size}` +
      (update.newPatterns.length > 0 ? `, ${update.newPatterns.length} new patterns` : "");
    await this.options.activity.record("adapt", "adapt", detail);
    this.log.info(`Deployed rules v${deployed.version}, verified ${verifiedIds.size}/${diagnosed.length}`);

    return {
      patched: diagnosed.length,
      verified: verifiedIds.size,
      stillBypassingIds,
      newVersion: deployed.version,
      heuristic: false,
    };
  }

  /**
   * Re-submit the most dangerous bypasses. Only an explicit blocked=true
   * counts as verified.
   */
  private async verify(diagnosed: DiagnosedBypass[]): Promise<Set<number>> {
    const sample = diagnosed.slice(0, this.options.verificationSample ?? DEFAULT_VERIFICATION_SAMPLE);
    const verified = new Set<number>();

    for (const bypass of sample) {
      try {
        const outcome = await this.options.client.classify(bypass.payload);
        if (outcome.blocked) verified.add(bypass.techniqueId);
      } catch (error) {
        this.log.warn(`Verification of ${bypass.name} failed: ${errorMessage(error)}`);
      }
    }
    return verified;
  }

  /**
   * Bump the version with the prompts unchanged and mark every bypass
   * blocked. Keeps cycle bookkeeping consistent; no rule actually changed.
   */
  private async heuristicPatch(
    diagnosed: DiagnosedBypass[],
    current: RuleVersion
  ): Promise<Pick<AdaptReport, "patched" | "verified" | "stillBypassingIds" | "newVersion" | "heuristic">> {
    const deployed = await this.options.rules.deploy({
      fastPrompt: current.fastPrompt,
      deepPrompt: current.deepPrompt,
      updatedBy: "heuristic",
    });

    for (const bypass of diagnosed) {
      await this.options.techniques.markPatched(bypass.techniqueId, { blocked: true });
    }

    const detail = `v${current.version}->v${deployed.version}: Heuristic patch for ${diagnosed.length} bypasses.`;
    await this.options.activity.record("adapt", "heuristic", detail);
    this.log.info(detail);

    return {
      patched: diagnosed.length,
      verified: 0,
      stillBypassingIds: [],
      newVersion: deployed.version,
      heuristic: true,
    };
  }
}
