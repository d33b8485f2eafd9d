import { guard, type Connection } from "./database.js";

import type { RequestLogEntry } from "./schema.js";

/** Characters of the raw request kept in the log */
export const EXCERPT_LENGTH = 500;

interface RequestRow {
  id: number;
  timestamp: string;
  excerpt: string;
  classification: string;
  confidence: number;
  classifier: string;
  blocked: number;
  attack_type: string;
  response_time_ms: number;
}

export type NewRequestLogEntry = Omit<RequestLogEntry, "id" | "timestamp">;

/**
 * Log of every classification the pipeline produced
 */
export class RequestLog {
  constructor(
    private readonly db: Connection,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async append(entry: NewRequestLogEntry): Promise<void> {
    guard("request log append", () => {
      this.db
        .prepare(
          `INSERT INTO request_log (timestamp, excerpt, classification, confidence, classifier, blocked, attack_type, response_time_ms)
           VALUES (?, ?, ?, ?, ?, ?, ?, ?)`
        )
        .run(
          this.clock().toISOString(),
          entry.excerpt.slice(0, EXCERPT_LENGTH),
          entry.classification,
          entry.confidence,
          entry.classifier,
          entry.blocked ? 1 : 0,
          entry.attackType,
          entry.responseTimeMs
        );
    });
  }

  async recent(limit = 100): Promise<RequestLogEntry[]> {
    return guard("request log recent", () =>
      this.db
        .prepare<[number], RequestRow>(
          `SELECT id, timestamp, excerpt, classification, confidence, classifier, blocked, attack_type, response_time_ms
           FROM request_log ORDER BY id DESC LIMIT ?`
        )
        .all(limit)
        .map((row) => ({
          id: row.id,
          timestamp: row.timestamp,
          excerpt: row.excerpt,
          classification: row.classification,
          confidence: row.confidence,
          classifier: row.classifier,
          blocked: row.blocked === 1,
          attackType: row.attack_type,
          responseTimeMs: row.response_time_ms,
        }))
    );
  }

  async totals(): Promise<{ total: number; blocked: number }> {
    return guard("request log totals", () => {
      const row = this.db
        .prepare<[], { total: number; blocked: number | null }>(
          "SELECT COUNT(*) AS total, SUM(blocked) AS blocked FROM request_log"
        )
        .get();
      return { total: row?.total ?? 0, blocked: row?.blocked ?? 0 };
    });
  }
}
