import type { Server } from "http";

import { describe, it, expect, beforeEach, afterEach } from "vitest";

import { RiposteConfigSchema } from "@/config/index.js";
import { MemoryEventSink } from "@/events/index.js";
import { createRuntime, type Runtime } from "@/runtime.js";
import { createApp } from "@/server/app.js";

import { memoryStorage } from "../fixtures/storage.js";

const XSS_REQUEST = "GET /search?q=<script>alert(1)</script> HTTP/1.1";

describe("HTTP API", () => {
  let runtime: Runtime;
  let server: Server;
  let baseUrl: string;

  beforeEach(async () => {
    const config = RiposteConfigSchema.parse({
      databasePath: ":memory:",
      rateLimits: { agents: { maxRequests: 2, windowMs: 60_000 } },
    });
    runtime = await createRuntime(config, {
      storage: memoryStorage(),
      events: new MemoryEventSink(),
      fast: null,
      deep: null,
      techniqueGenerator: null,
      ruleGenerator: null,
    });

    await new Promise<void>((resolve) => {
      server = createApp(runtime).listen(0, "127.0.0.1", () => resolve());
    });
    const address = server.address();
    if (address === null || typeof address === "string") throw new Error("server is not listening on a port");
    baseUrl = `http://127.0.0.1:${address.port}`;
  });

  afterEach(async () => {
    server.closeAllConnections();
    await new Promise<void>((resolve) => server.close(() => resolve()));
    await runtime.close();
  });

  const post = (path: string, body: unknown = {}) =>
    fetch(`${baseUrl}${path}`, {
      method: "POST",
      headers: { "Content-Type": "application/json" },
      body: JSON.stringify(body),
    });

  describe("POST /v1/classify", () => {
    it("classifies and logs the request", async () => {
      const res = await post("/v1/classify", { message: XSS_REQUEST });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        classification: "MALICIOUS",
        attack_type: "xss",
        classifier: "regex",
        blocked: true,
        rules_version: 1,
      });

      const stats = await fetch(`${baseUrl}/api/stats`);
      expect(await stats.json()).toMatchObject({ total_requests: 1, blocked_requests: 1 });
    });

    it("rejects an empty message", async () => {
      const res = await post("/v1/classify", { message: "" });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({
        error: expect.stringMatching(/^Invalid request body: message: /),
        details: { code: "VALIDATION_ERROR" },
      });
    });
  });

  describe("malformed bodies", () => {
    it.each(["/v1/classify", "/v1/inspect", "/api/agents/cycle"])("answers 400 on %s", async (path) => {
      const res = await fetch(`${baseUrl}${path}`, {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: "{not json",
      });

      expect(res.status).toBe(400);
      expect(await res.json()).toMatchObject({ error: expect.any(String) });
      expect(await runtime.storage.activity.recent()).toEqual([]);
    });
  });

  describe("POST /v1/inspect", () => {
    it("assembles the request from its parts", async () => {
      const res = await post("/v1/inspect", { path: "/files", query_params: { name: "../../etc/passwd" } });

      expect(res.status).toBe(200);
      expect(await res.json()).toMatchObject({
        verdict: "BLOCKED",
        classification: "MALICIOUS",
        attack_type: "path_traversal",
        rules_version: 1,
      });
    });

    it("passes a harmless request", async () => {
      const res = await post("/v1/inspect", { path: "/about" });
      expect(await res.json()).toMatchObject({ verdict: "PASS", classification: "SAFE", attack_type: "none" });
    });
  });

  describe("read-only views", () => {
    it("lists the rule history", async () => {
      const res = await fetch(`${baseUrl}/api/rules`);
      expect(await res.json()).toEqual([{ version: 1, updated_at: expect.any(String), updated_by: "system" }]);
    });

    it("returns 404 for an unknown technique", async () => {
      const res = await fetch(`${baseUrl}/api/techniques/999`);

      expect(res.status).toBe(404);
      expect(await res.json()).toMatchObject({
        error: "Technique not found: 999",
        details: { code: "TECHNIQUE_NOT_FOUND" },
      });
    });

    it("returns the full payload of one technique", async () => {
      const stored = await runtime.storage.techniques.insert({
        name: "Long payload",
        category: "sqli",
        source: "test",
        rawPayload: `GET /?q=${"x".repeat(300)} HTTP/1.1`,
        severity: "high",
      });

      const list = await fetch(`${baseUrl}/api/techniques`);
      expect(await list.json()).toEqual([
        expect.objectContaining({ id: stored?.id, raw_payload: `GET /?q=${"x".repeat(192)}` }),
      ]);

      const one = await fetch(`${baseUrl}/api/techniques/${stored?.id ?? 0}`);
      expect(await one.json()).toMatchObject({ technique_name: "Long payload", raw_payload: stored?.rawPayload });
    });
  });

  describe("agent triggers", () => {
    it("runs Scout and a full cycle", async () => {
      const scout = await post("/api/agents/scout/run");
      expect(await scout.json()).toMatchObject({ discovered: 16 });

      const cycle = await post("/api/agents/cycle");
      expect(cycle.status).toBe(200);
      expect(await cycle.json()).toMatchObject({
        cycleId: 1,
        discovered: 0,
        stats: expect.objectContaining({ totalThreats: 16 }),
      });
    });

    it("rate limits agent triggers per caller", async () => {
      await post("/api/agents/redteam/run");
      await post("/api/agents/redteam/run");
      const res = await post("/api/agents/redteam/run");

      expect(res.status).toBe(429);
      expect(res.headers.get("retry-after")).toBe("60");
      expect(await res.json()).toMatchObject({ retry_after_seconds: 60 });

      const classify = await post("/v1/classify", { message: "GET / HTTP/1.1" });
      expect(classify.status).toBe(200);
    });
  });
});
