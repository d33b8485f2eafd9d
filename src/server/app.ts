/**
 * HTTP surface: the public classify/inspect endpoints, read-only views over
 * the stores, and manual agent triggers.
 */

import express, { type NextFunction, type Request, type RequestHandler, type Response } from "express";
import { z } from "zod";

import { formatRawRequest } from "../classify/pipeline.js";
import {
  RateLimitError,
  RiposteError,
  TechniqueNotFoundError,
  ValidationError,
  errorMessage,
} from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import { toWire } from "../redteam/client.js";

import { rateLimit } from "./rate-limit.js";

import type { Runtime } from "../runtime.js";
import type { Technique } from "../store/schema.js";

const log = logger.child("[http]");

/** Payload preview length in technique listings */
export const PAYLOAD_PREVIEW_LENGTH = 200;
/** Excerpt preview length in request listings */
export const MESSAGE_PREVIEW_LENGTH = 100;

const ClassifyBodySchema = z.object({
  message: z.string().min(1),
});

const InspectBodySchema = z.object({
  method: z.string().default("GET"),
  path: z.string().default("/"),
  headers: z.record(z.string()).default({}),
  body: z.string().default(""),
  query_params: z.record(z.string()).default({}),
});

function parseBody<T>(schema: z.ZodType<T, z.ZodTypeDef, unknown>, body: unknown): T {
  const parsed = schema.safeParse(body ?? {});
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`);
    throw new ValidationError(`Invalid request body: ${issues.join("; ")}`, { issues });
  }
  return parsed.data;
}

/** Express 4 does not forward rejected promises to the error handler */
function asyncHandler(handler: (req: Request, res: Response) => Promise<void>): RequestHandler {
  return (req, res, next) => {
    handler(req, res).catch(next);
  };
}

function techniqueView(technique: Technique) {
  return {
    id: technique.id,
    technique_name: technique.name,
    category: technique.category,
    source: technique.source,
    raw_payload: technique.rawPayload.slice(0, PAYLOAD_PREVIEW_LENGTH),
    severity: technique.severity,
    discovered_at: technique.discoveredAt,
    tested_at: technique.testedAt,
    blocked: technique.blocked,
    patched_at: technique.patchedAt,
  };
}

/** 4xx status carried by body-parser errors such as malformed JSON */
function clientStatus(error: unknown): number | null {
  if (typeof error !== "object" || error === null || !("status" in error)) return null;
  const { status } = error;
  return typeof status === "number" && status >= 400 && status < 500 ? status : null;
}

function statusFor(error: unknown): number {
  if (error instanceof RateLimitError) return 429;
  if (error instanceof ValidationError) return 400;
  if (error instanceof TechniqueNotFoundError) return 404;
  return clientStatus(error) ?? 500;
}

export function createApp(runtime: Runtime): express.Express {
  const { storage, pipeline, limiter, driver } = runtime;
  const app = express();
  app.use(express.json({ limit: "1mb" }));

  const classifyLimit = rateLimit(limiter, "classify");
  const agentsLimit = rateLimit(limiter, "agents");
  const apiLimit = rateLimit(limiter, "api");

  app.post(
    "/v1/classify",
    classifyLimit,
    asyncHandler(async (req, res) => {
      const { message } = parseBody(ClassifyBodySchema, req.body);
      const outcome = await pipeline.classify(message);
      res.json(toWire(outcome));
    })
  );

  app.post(
    "/v1/inspect",
    classifyLimit,
    asyncHandler(async (req, res) => {
      const parts = parseBody(InspectBodySchema, req.body);
      const raw = formatRawRequest({ ...parts, queryParams: parts.query_params });
      const outcome = await pipeline.classify(raw);
      res.json({
        verdict: outcome.blocked ? "BLOCKED" : "PASS",
        classification: outcome.classification,
        confidence: outcome.confidence,
        attack_type: outcome.attackType,
        reason: outcome.reason,
        rules_version: outcome.rulesVersion,
      });
    })
  );

  app.get(
    "/api/stats",
    apiLimit,
    asyncHandler(async (_req, res) => {
      const stats = await storage.stats.current();
      res.json({
        total_requests: stats.totalRequests,
        blocked_requests: stats.blockedRequests,
        total_threats: stats.totalThreats,
        threats_blocked: stats.threatsBlocked,
        block_rate: stats.blockRate,
        rules_version: stats.rulesVersion,
      });
    })
  );

  app.get(
    "/api/techniques",
    apiLimit,
    asyncHandler(async (_req, res) => {
      const techniques = await storage.techniques.all();
      res.json(techniques.map(techniqueView));
    })
  );

  app.get(
    "/api/techniques/:id",
    apiLimit,
    asyncHandler(async (req, res) => {
      const id = Number(req.params["id"]);
      const technique = Number.isInteger(id) ? await storage.techniques.get(id) : null;
      if (!technique) {
        throw new TechniqueNotFoundError(id);
      }
      res.json({ ...techniqueView(technique), raw_payload: technique.rawPayload });
    })
  );

  app.get(
    "/api/agents",
    apiLimit,
    asyncHandler(async (_req, res) => {
      res.json(await storage.activity.recent(50));
    })
  );

  app.get(
    "/api/requests",
    apiLimit,
    asyncHandler(async (_req, res) => {
      const entries = await storage.requests.recent(100);
      res.json(
        entries.map((entry) => ({
          id: entry.id,
          timestamp: entry.timestamp,
          message: entry.excerpt.slice(0, MESSAGE_PREVIEW_LENGTH),
          classification: entry.classification,
          confidence: entry.confidence,
          classifier: entry.classifier,
          blocked: entry.blocked,
          attack_type: entry.attackType,
          response_time_ms: entry.responseTimeMs,
        }))
      );
    })
  );

  app.get(
    "/api/rules",
    apiLimit,
    asyncHandler(async (_req, res) => {
      const history = await storage.rules.history();
      res.json(history.map((rule) => ({ version: rule.version, updated_at: rule.updatedAt, updated_by: rule.updatedBy })));
    })
  );

  app.post(
    "/api/agents/scout/run",
    agentsLimit,
    asyncHandler(async (_req, res) => {
      const report = await runtime.scout.run({ hint: driver.currentHint });
      res.json({ discovered: report.discovered, strategies: report.strategiesUsed });
    })
  );

  app.post(
    "/api/agents/redteam/run",
    agentsLimit,
    asyncHandler(async (_req, res) => {
      const report = await runtime.redTeam.run();
      res.json({
        tested: report.tested,
        blocked: report.blocked,
        bypasses: report.bypasses.length,
        details: report.bypasses.map((bypass) => ({
          id: bypass.techniqueId,
          name: bypass.name,
          category: bypass.category,
          severity: bypass.severity,
          danger: bypass.danger,
          verdict: toWire(bypass.verdict),
        })),
        errors: report.errors,
      });
    })
  );

  app.post(
    "/api/agents/cycle",
    agentsLimit,
    asyncHandler(async (_req, res) => {
      const summary = await driver.trigger();
      const stats = await storage.stats.current();
      res.json({ ...summary, stats });
    })
  );

  app.use((error: unknown, _req: Request, res: Response, _next: NextFunction) => {
    const status = statusFor(error);
    if (error instanceof RateLimitError) {
      res
        .status(status)
        .set("Retry-After", String(error.retryAfterSeconds))
        .json({ error: error.message, retry_after_seconds: error.retryAfterSeconds });
      return;
    }
    if (status === 500) {
      log.error(`Request failed: ${errorMessage(error)}`);
    }
    const body = error instanceof RiposteError ? error.toJSON() : { message: errorMessage(error) };
    res.status(status).json({ error: errorMessage(error), details: body });
  });

  return app;
}
