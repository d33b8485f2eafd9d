export { CycleOrchestrator, MAX_PATCH_ROUNDS } from "./orchestrator.js";
export type { CycleAgents, OrchestratorOptions } from "./orchestrator.js";
export { CycleDriver } from "./driver.js";
export type { CycleDriverOptions } from "./driver.js";
export { FAILURE_MODES } from "./types.js";
export type { FailureMode, Hint, CycleContext, CycleSummary } from "./types.js";
