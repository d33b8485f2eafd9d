export { Adapt, DEFAULT_VERIFICATION_SAMPLE } from "./adapt.js";
export type { AdaptOptions, AdaptReport } from "./adapt.js";
export {
  diagnose,
  countFailureModes,
  dominantFailureMode,
  groupBy,
  hasEncodingMarkers,
  hasContextMarkers,
  ENCODING_MARKERS,
  CONTEXT_MARKERS,
  HIGH_CONFIDENCE_CATEGORIES,
} from "./diagnosis.js";
export type { DiagnosisInput } from "./diagnosis.js";
export { buildEvidenceReport, REPORT_PAYLOAD_LENGTH } from "./report.js";
export type { DiagnosedBypass } from "./report.js";
export { AIRuleGenerator, createRuleGenerator, parseRuleUpdate, buildRulePrompt, RULE_SYSTEM_PROMPT } from "./rule-generator.js";
export type { RuleGenerator, RuleUpdate, RuleGenerationRequest } from "./rule-generator.js";
