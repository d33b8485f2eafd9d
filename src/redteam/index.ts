export { RedTeam, summarize, describeReport, toBypass, DEFAULT_CONCURRENCY } from "./redteam.js";
export type { RedTeamOptions, AttackOutcome } from "./redteam.js";
export { allocateBudget, loadTiers, DEFAULT_BUDGET, PATCHED_SAMPLE } from "./targets.js";
export type { TargetTiers } from "./targets.js";
export { runBounded, withTimeout } from "./executor.js";
export { dangerScore, rankByDanger, SEVERITY_WEIGHT } from "./scoring.js";
export {
  HttpClassificationClient,
  PipelineClassificationClient,
  ClassifyResponseSchema,
  toWire,
  fromWire,
} from "./client.js";
export type { ClassificationClient, ClassifyResponse } from "./client.js";
export type { BypassResult, RedTeamReport, CategoryBreakdown, AttackError } from "./types.js";
