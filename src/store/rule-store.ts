import { StoreError } from "../lib/errors.js";

import { guard, type Connection } from "./database.js";
import { RuleAuthorSchema } from "./schema.js";

import type { RuleAuthor, RuleVersion } from "./schema.js";

interface RuleRow {
  version: number;
  fast_prompt: string;
  deep_prompt: string;
  updated_at: string;
  updated_by: string;
}

function toRuleVersion(row: RuleRow): RuleVersion {
  const author = RuleAuthorSchema.safeParse(row.updated_by);
  return {
    version: row.version,
    fastPrompt: row.fast_prompt,
    deepPrompt: row.deep_prompt,
    updatedAt: row.updated_at,
    updatedBy: author.success ? author.data : "system",
  };
}

export interface RuleDeployment {
  fastPrompt: string;
  deepPrompt: string;
  updatedBy: RuleAuthor;
}

/**
 * Append-only, versioned store of the fast/deep instruction pair.
 *
 * The current version is always MAX(version). Deployments never touch
 * earlier rows, so every past version stays readable for audit.
 */
export class RuleStore {
  constructor(
    private readonly db: Connection,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Seed version 1 when the table is empty. Returns the current version.
   */
  async bootstrap(defaults: { fastPrompt: string; deepPrompt: string }): Promise<RuleVersion> {
    return guard("rules bootstrap", () => {
      const insertSeed = this.db.transaction(() => {
        const existing = this.currentSync();
        if (existing) return existing;
        this.db
          .prepare(
            "INSERT INTO rules (version, fast_prompt, deep_prompt, updated_at, updated_by) VALUES (1, ?, ?, ?, 'system')"
          )
          .run(defaults.fastPrompt, defaults.deepPrompt, this.clock().toISOString());
        return this.requireCurrent();
      });
      return insertSeed();
    });
  }

  /**
   * The version in effect, or null before bootstrap
   */
  async current(): Promise<RuleVersion | null> {
    return guard("rules current", () => this.currentSync());
  }

  /**
   * Append a new version (current + 1) in one atomic write.
   * Prompts are complete replacements, never diffs.
   */
  async deploy(deployment: RuleDeployment): Promise<RuleVersion> {
    return guard("rules deploy", () => {
      const append = this.db.transaction(() => {
        const row = this.db
          .prepare<[], { max: number | null }>("SELECT MAX(version) AS max FROM rules")
          .get();
        const next = (row?.max ?? 0) + 1;
        this.db
          .prepare(
            "INSERT INTO rules (version, fast_prompt, deep_prompt, updated_at, updated_by) VALUES (?, ?, ?, ?, ?)"
          )
          .run(next, deployment.fastPrompt, deployment.deepPrompt, this.clock().toISOString(), deployment.updatedBy);
        return this.requireCurrent();
      });
      return append();
    });
  }

  async get(version: number): Promise<RuleVersion | null> {
    return guard("rules get", () => {
      const row = this.db
        .prepare<[number], RuleRow>(
          "SELECT version, fast_prompt, deep_prompt, updated_at, updated_by FROM rules WHERE version = ?"
        )
        .get(version);
      return row ? toRuleVersion(row) : null;
    });
  }

  /**
   * All versions, newest first
   */
  async history(): Promise<RuleVersion[]> {
    return guard("rules history", () =>
      this.db
        .prepare<[], RuleRow>(
          "SELECT version, fast_prompt, deep_prompt, updated_at, updated_by FROM rules ORDER BY version DESC"
        )
        .all()
        .map(toRuleVersion)
    );
  }

  private currentSync(): RuleVersion | null {
    const row = this.db
      .prepare<[], RuleRow>(
        "SELECT version, fast_prompt, deep_prompt, updated_at, updated_by FROM rules ORDER BY version DESC LIMIT 1"
      )
      .get();
    return row ? toRuleVersion(row) : null;
  }

  private requireCurrent(): RuleVersion {
    const current = this.currentSync();
    if (!current) {
      throw new StoreError("Rule store is empty after write");
    }
    return current;
  }
}
