import { guard, type Connection } from "./database.js";

import type { ActivityEntry } from "./schema.js";

/** Agents that write to the activity log */
export type ActivityAgent = "scout" | "redteam" | "adapt" | "system";

interface ActivityRow {
  id: number;
  timestamp: string;
  agent: string;
  action: string;
  detail: string;
  success: number;
}

/** Longest detail text kept per row */
export const MAX_DETAIL_LENGTH = 500;

export function truncateDetail(detail: string, max = MAX_DETAIL_LENGTH): string {
  return detail.length > max ? `${detail.slice(0, max - 3)}...` : detail;
}

/**
 * Append-only audit trail of agent runs and cycle summaries.
 * Also the source of the scan-generation counter.
 */
export class ActivityLog {
  constructor(
    private readonly db: Connection,
    private readonly clock: () => Date = () => new Date()
  ) {}

  async record(agent: ActivityAgent, action: string, detail: string, success = true): Promise<void> {
    guard("activity record", () => {
      this.db
        .prepare("INSERT INTO agent_log (timestamp, agent, action, detail, success) VALUES (?, ?, ?, ?, ?)")
        .run(this.clock().toISOString(), agent, action, truncateDetail(detail), success ? 1 : 0);
    });
  }

  /**
   * Number of rows for an agent/action pair, e.g. prior scout scans
   */
  async count(agent: ActivityAgent, action: string): Promise<number> {
    return guard("activity count", () => {
      const row = this.db
        .prepare<[string, string], { cnt: number }>(
          "SELECT COUNT(*) AS cnt FROM agent_log WHERE agent = ? AND action = ?"
        )
        .get(agent, action);
      return row?.cnt ?? 0;
    });
  }

  async recent(limit = 50): Promise<ActivityEntry[]> {
    return guard("activity recent", () =>
      this.db
        .prepare<[number], ActivityRow>(
          "SELECT id, timestamp, agent, action, detail, success FROM agent_log ORDER BY id DESC LIMIT ?"
        )
        .all(limit)
        .map((row) => ({ ...row, success: row.success === 1 }))
    );
  }
}
