export { ClassificationPipeline, formatRawRequest, isBlocked, mergeFast, mergeDeep, BLOCK_THRESHOLD } from "./pipeline.js";
export type { PipelineOptions, RuleSource, RequestRecorder } from "./pipeline.js";
export { PatternMatcher, loadRuleGroups, searchForms, scoreHits, NO_MATCH_CONFIDENCE } from "./pattern-matcher.js";
export type { RuleGroup } from "./pattern-matcher.js";
export { percentDecode, decodeLayers } from "./decode.js";
export { parseEngineVerdict, degradedResult, toEngineResult } from "./verdict.js";
export type { ParsedVerdict, ParseFailure, VerdictParse } from "./verdict.js";
export { AIClassificationEngine, createFastEngine, createDeepEngine } from "./engines.js";
export { DEFAULT_FAST_PROMPT, DEFAULT_DEEP_PROMPT } from "./prompts.js";
export { CLASSIFICATIONS } from "./types.js";
export type {
  Classification,
  Verdict,
  Stage0Result,
  EngineResult,
  ClassificationOutcome,
  ClassificationEngine,
  Classifier,
  RequestParts,
} from "./types.js";
