/**
 * Persistence layer: technique catalog, versioned rules, audit and request logs.
 */

import { ActivityLog } from "./activity-log.js";
import { openDatabase, type Connection } from "./database.js";
import { RequestLog } from "./request-log.js";
import { RuleStore } from "./rule-store.js";
import { StoreStatsReader } from "./stats.js";
import { TechniqueStore } from "./technique-store.js";

export { openDatabase, guard } from "./database.js";
export type { Connection } from "./database.js";
export { TechniqueStore } from "./technique-store.js";
export { RuleStore } from "./rule-store.js";
export type { RuleDeployment } from "./rule-store.js";
export { ActivityLog, truncateDetail, MAX_DETAIL_LENGTH } from "./activity-log.js";
export type { ActivityAgent } from "./activity-log.js";
export { RequestLog, EXCERPT_LENGTH } from "./request-log.js";
export type { NewRequestLogEntry } from "./request-log.js";
export { StoreStatsReader } from "./stats.js";
export type { StatsReader } from "./stats.js";

export {
  ATTACK_CATEGORIES,
  SEVERITIES,
  RULE_AUTHORS,
  AttackCategorySchema,
  SeveritySchema,
  RuleAuthorSchema,
  DEFAULT_CATEGORY,
  DEFAULT_SEVERITY,
  coerceCategory,
  coerceSeverity,
} from "./schema.js";
export type {
  AttackCategory,
  Severity,
  RuleAuthor,
  Technique,
  NewTechnique,
  RuleVersion,
  ActivityEntry,
  RequestLogEntry,
  CategoryStats,
  AggregateStats,
} from "./schema.js";

/** Every store sharing one connection */
export interface Storage {
  db: Connection;
  techniques: TechniqueStore;
  rules: RuleStore;
  activity: ActivityLog;
  requests: RequestLog;
  stats: StoreStatsReader;
  close(): void;
}

/**
 * Open the database and build the stores on top of it
 */
export function createStorage(path: string, clock?: () => Date): Storage {
  const db = openDatabase(path);
  const techniques = new TechniqueStore(db, clock);
  const rules = new RuleStore(db, clock);
  const activity = new ActivityLog(db, clock);
  const requests = new RequestLog(db, clock);
  return {
    db,
    techniques,
    rules,
    activity,
    requests,
    stats: new StoreStatsReader(techniques, rules, requests),
    close: () => db.close(),
  };
}
