import { describe, it, expect } from "vitest";

import { LoggerEventSink, MemoryEventSink } from "@/events/index.js";

describe("MemoryEventSink", () => {
  it("collects events and filters them by type", () => {
    const sink = new MemoryEventSink();
    sink.emit({ type: "agent", agent: "scout", status: "running", detail: "Scanning" });
    sink.emit({
      type: "stats",
      totalRequests: 4,
      blockedRequests: 1,
      totalThreats: 10,
      threatsBlocked: 5,
      blockRate: 50,
      rulesVersion: 3,
    });

    expect(sink.events).toHaveLength(2);
    expect(sink.ofType("agent")).toEqual([{ type: "agent", agent: "scout", status: "running", detail: "Scanning" }]);
    expect(sink.ofType("stats")[0]?.rulesVersion).toBe(3);

    sink.clear();
    expect(sink.events).toEqual([]);
  });
});

describe("LoggerEventSink", () => {
  it("accepts every event type", () => {
    const sink = new LoggerEventSink();
    expect(() => {
      sink.emit({ type: "agent", agent: "adapt", status: "idle", detail: "No bypasses to fix" });
      sink.emit({
        type: "request",
        timestamp: "2024-01-01T00:00:00.000Z",
        message: "GET / HTTP/1.1",
        classification: "SAFE",
        confidence: 0.85,
        blocked: false,
        classifier: "regex",
        attackType: "none",
      });
    }).not.toThrow();
  });
});
