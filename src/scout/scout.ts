/**
 * Scout: discovers attack techniques and adds them to the catalog.
 *
 * Seeds the catalog on first run, builds a recon brief, picks generation
 * strategies (steered by the previous cycle's hint), asks the generator for
 * candidates and stores the ones that are not duplicates.
 */

import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { coerceCategory, coerceSeverity } from "../store/schema.js";

import { normalizePayload } from "./normalize.js";
import { buildRecon, type ReconBrief } from "./recon.js";
import { loadSeedTechniques } from "./seeds.js";
import { selectStrategies, type Strategy } from "./strategies.js";

import type { Hint } from "../cycle/types.js";
import type { ActivityLog } from "../store/activity-log.js";
import type { AttackCategory, NewTechnique } from "../store/schema.js";
import type { TechniqueStore } from "../store/technique-store.js";
import type { TechniqueCandidate, TechniqueGenerator } from "./generator.js";

export const DEFAULT_BATCH_SIZE = 5;

export interface ScoutOptions {
  techniques: TechniqueStore;
  activity: ActivityLog;
  /** Absent when no generation engine is configured; only seeding runs */
  generator?: TechniqueGenerator | null;
  batchSize?: number;
  seeds?: NewTechnique[];
}

export interface ScoutReport {
  discovered: number;
  strategiesUsed: Strategy[];
  categoriesTouched: AttackCategory[];
  generation: number;
}

/**
 * Names and normalized payloads already in the catalog
 */
class DedupIndex {
  private readonly names = new Set<string>();
  private readonly payloads = new Set<string>();

  add(name: string, payload: string): void {
    this.names.add(name.toLowerCase());
    this.payloads.add(normalizePayload(payload));
  }

  has(name: string, payload: string): boolean {
    return this.names.has(name.toLowerCase()) || this.payloads.has(normalizePayload(payload));
  }
}

export class Scout {
  private readonly log = logger.child("[scout]");
  private readonly batchSize: number;

  constructor(private readonly options: ScoutOptions) {
    this.batchSize = options.batchSize ?? DEFAULT_BATCH_SIZE;
  }

  async run(context: { hint?: Hint | null } = {}): Promise<ScoutReport> {
    const hint = context.hint ?? null;
    let discovered = await this.seed();

    const brief = await buildRecon(this.options.techniques, this.options.activity);
    const strategies = selectStrategies(brief.generation, brief.recentBypasses.length > 0, hint);
    this.log.debug(`generation ${brief.generation}, strategies: ${strategies.join(", ")}`);

    const categories = new Set<AttackCategory>();
    const generator = this.options.generator;

    if (generator) {
      for (const strategy of strategies) {
        const candidates = await this.generate(generator, strategy, brief);
        if (candidates === null) continue;
        const stored = await this.store(candidates, strategy);
        discovered += stored.length;
        for (const category of stored) categories.add(category);
      }
    } else {
      this.log.debug("no generation engine configured, seeding only");
    }

    let detail = `Discovered ${discovered} techniques via ${strategies.join(" + ")}`;
    if (hint?.dominantFailureMode) {
      detail += ` [hint: ${hint.dominantFailureMode}]`;
    }
    await this.options.activity.record("scout", "scan", detail);
    this.log.info(detail);

    return {
      discovered,
      strategiesUsed: strategies,
      categoriesTouched: [...categories].sort(),
      generation: brief.generation,
    };
  }

  /**
   * Insert seed techniques that are absent by name
   */
  private async seed(): Promise<number> {
    const seeds = this.options.seeds ?? loadSeedTechniques();
    let added = 0;
    for (const seed of seeds) {
      if (await this.options.techniques.findByName(seed.name)) continue;
      if (await this.options.techniques.insert(seed)) added++;
    }
    if (added > 0) {
      this.log.info(`Seeded ${added} techniques`);
    }
    return added;
  }

  /**
   * One strategy's batch; null when the strategy failed
   */
  private async generate(
    generator: TechniqueGenerator,
    strategy: Strategy,
    brief: ReconBrief
  ): Promise<TechniqueCandidate[] | null> {
    let message: string;
    try {
      const result = await generator.generate({ strategy, brief, count: this.batchSize });
      if (result.success) return result.data;
      message = result.error.message;
    } catch (error) {
      message = errorMessage(error);
    }

    this.log.warn(`Strategy ${strategy} failed: ${message}`);
    await this.options.activity.record("scout", "generation_error", `Strategy ${strategy} failed: ${message}`, false);
    return null;
  }

  /**
   * Store candidates that are complete and not duplicates. Returns the
   * category of each stored technique.
   */
  async store(candidates: readonly TechniqueCandidate[], strategy: Strategy): Promise<AttackCategory[]> {
    const index = new DedupIndex();
    for (const existing of await this.options.techniques.all()) {
      index.add(existing.name, existing.rawPayload);
    }

    const stored: AttackCategory[] = [];
    for (const candidate of candidates) {
      const name = candidate.name.trim();
      const rawPayload = candidate.rawPayload.trim();
      if (!name || !rawPayload) continue;
      if (index.has(name, rawPayload)) continue;

      const inserted = await this.options.techniques.insert({
        name,
        category: coerceCategory(candidate.category),
        source: `scout/${strategy}`,
        rawPayload,
        severity: coerceSeverity(candidate.severity),
      });
      index.add(name, rawPayload);
      if (inserted) stored.push(inserted.category);
    }
    return stored;
  }
}
