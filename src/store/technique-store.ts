import { guard, type Connection } from "./database.js";
import { coerceCategory, coerceSeverity } from "./schema.js";

import type { CategoryStats, NewTechnique, Technique } from "./schema.js";

interface TechniqueRow {
  id: number;
  name: string;
  category: string;
  source: string;
  raw_payload: string;
  severity: string;
  discovered_at: string;
  tested_at: string | null;
  blocked: number;
  patched_at: string | null;
}

function toTechnique(row: TechniqueRow): Technique {
  return {
    id: row.id,
    name: row.name,
    category: coerceCategory(row.category),
    source: row.source,
    rawPayload: row.raw_payload,
    severity: coerceSeverity(row.severity),
    discoveredAt: row.discovered_at,
    testedAt: row.tested_at,
    blocked: row.blocked === 1,
    patchedAt: row.patched_at,
  };
}

const COLUMNS =
  "id, name, category, source, raw_payload, severity, discovered_at, tested_at, blocked, patched_at";

/**
 * Persistent catalog of attack techniques.
 *
 * Rows are created by Scout and updated by primary key only (Red-Team marks
 * test outcomes, Adapt marks patches). Nothing is ever deleted.
 */
export class TechniqueStore {
  constructor(
    private readonly db: Connection,
    private readonly clock: () => Date = () => new Date()
  ) {}

  /**
   * Insert a technique. Returns null when the name is already taken.
   */
  async insert(technique: NewTechnique): Promise<Technique | null> {
    return guard("technique insert", () => {
      const info = this.db
        .prepare(
          `INSERT OR IGNORE INTO techniques (name, category, source, raw_payload, severity, discovered_at)
           VALUES (?, ?, ?, ?, ?, ?)`
        )
        .run(
          technique.name,
          coerceCategory(technique.category),
          technique.source,
          technique.rawPayload,
          coerceSeverity(technique.severity),
          this.clock().toISOString()
        );
      if (info.changes === 0) return null;
      return this.getSync(Number(info.lastInsertRowid));
    });
  }

  async get(id: number): Promise<Technique | null> {
    return guard("technique get", () => this.getSync(id));
  }

  private getSync(id: number): Technique | null {
    const row = this.db
      .prepare<[number], TechniqueRow>(`SELECT ${COLUMNS} FROM techniques WHERE id = ?`)
      .get(id);
    return row ? toTechnique(row) : null;
  }

  /**
   * Case-insensitive lookup by name
   */
  async findByName(name: string): Promise<Technique | null> {
    return guard("technique findByName", () => {
      const row = this.db
        .prepare<[string], TechniqueRow>(`SELECT ${COLUMNS} FROM techniques WHERE lower(name) = lower(?)`)
        .get(name);
      return row ? toTechnique(row) : null;
    });
  }

  /**
   * Every technique, newest discovery first
   */
  async all(): Promise<Technique[]> {
    return guard("technique all", () =>
      this.db
        .prepare<[], TechniqueRow>(`SELECT ${COLUMNS} FROM techniques ORDER BY discovered_at DESC, id DESC`)
        .all()
        .map(toTechnique)
    );
  }

  async byIds(ids: readonly number[]): Promise<Technique[]> {
    if (ids.length === 0) return [];
    return guard("technique byIds", () => {
      const placeholders = ids.map(() => "?").join(", ");
      return this.db
        .prepare<number[], TechniqueRow>(`SELECT ${COLUMNS} FROM techniques WHERE id IN (${placeholders}) ORDER BY id`)
        .all(...ids)
        .map(toTechnique);
    });
  }

  async count(): Promise<number> {
    return guard("technique count", () => {
      const row = this.db.prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM techniques").get();
      return row?.cnt ?? 0;
    });
  }

  /**
   * Totals per category. `blocked` counts only tested techniques.
   */
  async categoryStats(): Promise<CategoryStats[]> {
    return guard("technique categoryStats", () =>
      this.db
        .prepare<[], CategoryStats>(
          `SELECT category,
                  COUNT(*) AS total,
                  COALESCE(SUM(CASE WHEN tested_at IS NOT NULL THEN 1 ELSE 0 END), 0) AS tested,
                  COALESCE(SUM(CASE WHEN tested_at IS NOT NULL AND blocked = 1 THEN 1 ELSE 0 END), 0) AS blocked
           FROM techniques GROUP BY category ORDER BY category`
        )
        .all()
    );
  }

  /**
   * Most recently tested techniques that were confirmed unblocked
   */
  async recentBypasses(limit: number): Promise<Technique[]> {
    return guard("technique recentBypasses", () =>
      this.db
        .prepare<[number], TechniqueRow>(
          `SELECT ${COLUMNS} FROM techniques
           WHERE blocked = 0 AND tested_at IS NOT NULL
           ORDER BY tested_at DESC, id DESC LIMIT ?`
        )
        .all(limit)
        .map(toTechnique)
    );
  }

  /** Tier 1: never tested, most recently discovered first */
  async neverTested(): Promise<Technique[]> {
    return guard("technique neverTested", () =>
      this.db
        .prepare<[], TechniqueRow>(
          `SELECT ${COLUMNS} FROM techniques WHERE tested_at IS NULL ORDER BY discovered_at DESC, id DESC`
        )
        .all()
        .map(toTechnique)
    );
  }

  /** Tier 2: confirmed unblocked, oldest test first */
  async previouslyBypassing(): Promise<Technique[]> {
    return guard("technique previouslyBypassing", () =>
      this.db
        .prepare<[], TechniqueRow>(
          `SELECT ${COLUMNS} FROM techniques
           WHERE blocked = 0 AND tested_at IS NOT NULL
           ORDER BY tested_at ASC, id ASC`
        )
        .all()
        .map(toTechnique)
    );
  }

  /** Tier 3: patched and blocked, most recent patch first */
  async recentlyPatched(limit: number): Promise<Technique[]> {
    return guard("technique recentlyPatched", () =>
      this.db
        .prepare<[number], TechniqueRow>(
          `SELECT ${COLUMNS} FROM techniques
           WHERE patched_at IS NOT NULL AND blocked = 1
           ORDER BY patched_at DESC, id DESC LIMIT ?`
        )
        .all(limit)
        .map(toTechnique)
    );
  }

  /**
   * Record a test outcome. Always stamps the test time.
   */
  async markTested(id: number, blocked: boolean): Promise<void> {
    guard("technique markTested", () => {
      this.db
        .prepare("UPDATE techniques SET tested_at = ?, blocked = ? WHERE id = ?")
        .run(this.clock().toISOString(), blocked ? 1 : 0, id);
    });
  }

  /**
   * Record a patch attempt. With `blocked` the flag is set as well; otherwise
   * only the timestamp moves (attempted, not confirmed).
   */
  async markPatched(id: number, options: { blocked: boolean }): Promise<void> {
    guard("technique markPatched", () => {
      const now = this.clock().toISOString();
      if (options.blocked) {
        this.db.prepare("UPDATE techniques SET patched_at = ?, blocked = 1 WHERE id = ?").run(now, id);
      } else {
        this.db.prepare("UPDATE techniques SET patched_at = ? WHERE id = ?").run(now, id);
      }
    });
  }

  async blockedCount(): Promise<number> {
    return guard("technique blockedCount", () => {
      const row = this.db
        .prepare<[], { cnt: number }>("SELECT COUNT(*) AS cnt FROM techniques WHERE blocked = 1")
        .get();
      return row?.cnt ?? 0;
    });
  }
}
