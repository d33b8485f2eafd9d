/**
 * Riposte
 *
 * Self-adapting web application firewall core: a staged classification
 * pipeline hardened by a Scout → Red-Team → Adapt loop.
 */

export { VERSION } from "./version.js";

export * from "./lib/index.js";
export * from "./ai/index.js";
export * from "./config/index.js";
export * from "./events/index.js";
export * from "./store/index.js";
export * from "./classify/index.js";
export * from "./scout/index.js";
export * from "./redteam/index.js";
export * from "./adapt/index.js";
export * from "./cycle/index.js";

export { createRuntime } from "./runtime.js";
export type { Runtime, RuntimeOverrides } from "./runtime.js";
export { createApp, startServer, rateLimit } from "./server/index.js";
