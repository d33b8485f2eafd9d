/**
 * Wires configuration into a running system: stores, pipeline, agents,
 * orchestrator and background driver.
 */

import { Adapt } from "./adapt/adapt.js";
import { createRuleGenerator, type RuleGenerator } from "./adapt/rule-generator.js";
import { createDeepEngine, createFastEngine } from "./classify/engines.js";
import { ClassificationPipeline } from "./classify/pipeline.js";
import { DEFAULT_DEEP_PROMPT, DEFAULT_FAST_PROMPT } from "./classify/prompts.js";
import { CycleDriver } from "./cycle/driver.js";
import { CycleOrchestrator } from "./cycle/orchestrator.js";
import { LoggerEventSink, type EventSink } from "./events/index.js";
import { SlidingWindowLimiter } from "./lib/rate-limiter.js";
import {
  HttpClassificationClient,
  PipelineClassificationClient,
  type ClassificationClient,
} from "./redteam/client.js";
import { RedTeam } from "./redteam/redteam.js";
import { createTechniqueGenerator, type TechniqueGenerator } from "./scout/generator.js";
import { Scout } from "./scout/scout.js";
import { createStorage, type Storage } from "./store/index.js";

import type { FetchLike } from "./ai/types.js";
import type { ClassificationEngine } from "./classify/types.js";
import type { RiposteConfig } from "./config/index.js";

export interface Runtime {
  config: RiposteConfig;
  storage: Storage;
  events: EventSink;
  pipeline: ClassificationPipeline;
  /** Endpoint Red-Team fires at and Adapt verifies against */
  client: ClassificationClient;
  scout: Scout;
  redTeam: RedTeam;
  adapt: Adapt;
  orchestrator: CycleOrchestrator;
  driver: CycleDriver;
  limiter: SlidingWindowLimiter;
  close(): Promise<void>;
}

/**
 * Replacements for the configured collaborators. A `null` engine or
 * generator disables that component.
 */
export interface RuntimeOverrides {
  storage?: Storage;
  events?: EventSink;
  fast?: ClassificationEngine | null;
  deep?: ClassificationEngine | null;
  techniqueGenerator?: TechniqueGenerator | null;
  ruleGenerator?: RuleGenerator | null;
  client?: ClassificationClient;
  fetchImpl?: FetchLike;
  clock?: () => Date;
}

function pick<T>(override: T | null | undefined, fallback: () => T | null): T | null {
  return override === undefined ? fallback() : override;
}

export async function createRuntime(config: RiposteConfig, overrides: RuntimeOverrides = {}): Promise<Runtime> {
  const storage = overrides.storage ?? createStorage(config.databasePath, overrides.clock);
  await storage.rules.bootstrap({ fastPrompt: DEFAULT_FAST_PROMPT, deepPrompt: DEFAULT_DEEP_PROMPT });

  const events = overrides.events ?? new LoggerEventSink();
  const { fetchImpl } = overrides;
  const { engines, cycle } = config;

  const pipeline = new ClassificationPipeline({
    rules: storage.rules,
    fast: pick(overrides.fast, () => createFastEngine(engines.fast, fetchImpl)),
    deep: pick(overrides.deep, () => createDeepEngine(engines.deep, fetchImpl)),
    requestLog: storage.requests,
    events,
  });

  const client =
    overrides.client ??
    (config.classifyUrl
      ? new HttpClassificationClient(config.classifyUrl, cycle.attackTimeoutMs, fetchImpl)
      : new PipelineClassificationClient(pipeline, cycle.attackTimeoutMs));

  const scout = new Scout({
    techniques: storage.techniques,
    activity: storage.activity,
    generator: pick(overrides.techniqueGenerator, () => createTechniqueGenerator(engines.generation, fetchImpl)),
    batchSize: cycle.scoutBatchSize,
  });

  const redTeam = new RedTeam({
    techniques: storage.techniques,
    activity: storage.activity,
    client,
    budget: cycle.redTeamBudget,
    concurrency: cycle.concurrency,
  });

  const adapt = new Adapt({
    techniques: storage.techniques,
    rules: storage.rules,
    activity: storage.activity,
    client,
    generator: pick(overrides.ruleGenerator, () => createRuleGenerator(engines.generation, fetchImpl)),
    verificationSample: cycle.verificationSample,
  });

  const orchestrator = new CycleOrchestrator({
    scout,
    redTeam,
    adapt,
    activity: storage.activity,
    events,
    stats: storage.stats,
    maxPatchRounds: cycle.maxPatchRounds,
  });

  const driver = new CycleDriver(orchestrator, {
    activity: storage.activity,
    events,
    delayMs: cycle.delayMs,
    startupDelayMs: cycle.startupDelayMs,
  });

  return {
    config,
    storage,
    events,
    pipeline,
    client,
    scout,
    redTeam,
    adapt,
    orchestrator,
    driver,
    limiter: new SlidingWindowLimiter(config.rateLimits),
    async close() {
      await driver.stop();
      storage.close();
    },
  };
}
