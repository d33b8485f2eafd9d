export { Scout, DEFAULT_BATCH_SIZE } from "./scout.js";
export type { ScoutOptions, ScoutReport } from "./scout.js";
export { normalizePayload, MAX_DECODE_LAYERS } from "./normalize.js";
export { STRATEGIES, COUNTER_STRATEGY, selectStrategies, rotationStrategies, applyHint } from "./strategies.js";
export type { Strategy } from "./strategies.js";
export { buildRecon } from "./recon.js";
export type { ReconBrief, WeakCategory } from "./recon.js";
export { loadSeedTechniques } from "./seeds.js";
export { AITechniqueGenerator, createTechniqueGenerator, toCandidates } from "./generator.js";
export type { TechniqueGenerator, TechniqueCandidate, GenerationRequest } from "./generator.js";
export { buildGenerationPrompt, difficultyLabel } from "./prompts.js";
