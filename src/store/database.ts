/**
 * SQLite connection and schema bootstrap.
 *
 * better-sqlite3 is synchronous; stores wrap it in async methods so callers
 * treat every read and write as a suspension point and a different engine can
 * sit behind the same interfaces.
 */

import { mkdirSync } from "fs";
import { dirname } from "path";

import Database from "better-sqlite3";

import { StoreError, errorMessage } from "../lib/errors.js";

export type Connection = Database.Database;

const MIGRATIONS: ReadonlyArray<{ id: number; sql: string }> = [
  {
    id: 1,
    sql: `
      CREATE TABLE IF NOT EXISTS techniques (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        name TEXT NOT NULL UNIQUE,
        category TEXT NOT NULL,
        source TEXT NOT NULL DEFAULT '',
        raw_payload TEXT NOT NULL,
        severity TEXT NOT NULL DEFAULT 'medium',
        discovered_at TEXT NOT NULL,
        tested_at TEXT,
        blocked INTEGER NOT NULL DEFAULT 0,
        patched_at TEXT
      );

      CREATE TABLE IF NOT EXISTS rules (
        version INTEGER PRIMARY KEY,
        fast_prompt TEXT NOT NULL,
        deep_prompt TEXT NOT NULL,
        updated_at TEXT NOT NULL,
        updated_by TEXT NOT NULL DEFAULT 'system'
      );

      CREATE TABLE IF NOT EXISTS agent_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        agent TEXT NOT NULL,
        action TEXT NOT NULL,
        detail TEXT NOT NULL DEFAULT '',
        success INTEGER NOT NULL DEFAULT 1
      );

      CREATE TABLE IF NOT EXISTS request_log (
        id INTEGER PRIMARY KEY AUTOINCREMENT,
        timestamp TEXT NOT NULL,
        excerpt TEXT NOT NULL,
        classification TEXT NOT NULL,
        confidence REAL NOT NULL,
        classifier TEXT NOT NULL,
        blocked INTEGER NOT NULL DEFAULT 0,
        attack_type TEXT NOT NULL DEFAULT 'none',
        response_time_ms REAL NOT NULL DEFAULT 0
      );

      CREATE INDEX IF NOT EXISTS idx_techniques_tested ON techniques (tested_at);
      CREATE INDEX IF NOT EXISTS idx_agent_log_agent_action ON agent_log (agent, action);
    `,
  },
];

/**
 * Open (or create) the database at `path` and apply pending migrations.
 * Pass `":memory:"` for an ephemeral database.
 */
export function openDatabase(path: string): Connection {
  try {
    if (path !== ":memory:") {
      mkdirSync(dirname(path), { recursive: true });
    }
    const db = new Database(path);
    db.pragma("journal_mode = WAL");
    db.pragma("foreign_keys = ON");
    migrate(db);
    return db;
  } catch (error) {
    throw new StoreError(`Failed to open database: ${errorMessage(error)}`, { path });
  }
}

function migrate(db: Connection): void {
  db.exec("CREATE TABLE IF NOT EXISTS schema_migrations (id INTEGER PRIMARY KEY, applied_at TEXT NOT NULL)");
  const applied = new Set(
    db.prepare<[], { id: number }>("SELECT id FROM schema_migrations").all().map((row) => row.id)
  );

  for (const migration of MIGRATIONS) {
    if (applied.has(migration.id)) continue;
    db.transaction(() => {
      db.exec(migration.sql);
      db.prepare("INSERT INTO schema_migrations (id, applied_at) VALUES (?, ?)").run(
        migration.id,
        new Date().toISOString()
      );
    })();
  }
}

/**
 * Run a synchronous statement block, converting driver failures to StoreError
 */
export function guard<T>(operation: string, fn: () => T): T {
  try {
    return fn();
  } catch (error) {
    if (error instanceof StoreError) throw error;
    throw new StoreError(`${operation} failed: ${errorMessage(error)}`, { operation });
  }
}
