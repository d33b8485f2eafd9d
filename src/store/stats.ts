import type { RequestLog } from "./request-log.js";
import type { RuleStore } from "./rule-store.js";
import type { AggregateStats } from "./schema.js";
import type { TechniqueStore } from "./technique-store.js";

/**
 * Read-side view of the current aggregate counters
 */
export interface StatsReader {
  current(): Promise<AggregateStats>;
}

export class StoreStatsReader implements StatsReader {
  constructor(
    private readonly techniques: TechniqueStore,
    private readonly rules: RuleStore,
    private readonly requests: RequestLog
  ) {}

  async current(): Promise<AggregateStats> {
    const [requestTotals, totalThreats, threatsBlocked, rules] = await Promise.all([
      this.requests.totals(),
      this.techniques.count(),
      this.techniques.blockedCount(),
      this.rules.current(),
    ]);

    return {
      totalRequests: requestTotals.total,
      blockedRequests: requestTotals.blocked,
      totalThreats,
      threatsBlocked,
      blockRate: Math.round((threatsBlocked / Math.max(totalThreats, 1)) * 1000) / 10,
      rulesVersion: rules?.version ?? 1,
    };
  }
}
