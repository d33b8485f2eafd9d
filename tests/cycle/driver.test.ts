import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";

import { CycleDriver } from "@/cycle/driver.js";
import { CycleOrchestrator } from "@/cycle/orchestrator.js";
import { MemoryEventSink } from "@/events/index.js";

import { memoryStorage } from "../fixtures/storage.js";

import { adaptReport, bypassOf, redTeamReport, scriptedAgents, scoutReport } from "./helpers.js";

import type { Storage } from "@/store/index.js";

describe("CycleDriver", () => {
  let storage: Storage;
  let events: MemoryEventSink;
  let script: ReturnType<typeof scriptedAgents>;
  let driver: CycleDriver;

  beforeEach(() => {
    storage = memoryStorage();
    events = new MemoryEventSink();
    script = scriptedAgents();
    const orchestrator = new CycleOrchestrator({ ...script.agents, activity: storage.activity });
    driver = new CycleDriver(orchestrator, { activity: storage.activity, events, startupDelayMs: 0, delayMs: 60_000 });
  });

  afterEach(async () => {
    await driver.stop();
    storage.close();
  });

  it("hands each cycle the hint the previous one left", async () => {
    const stubborn = bypassOf(4, "xss");
    script.redTeam
      .mockResolvedValueOnce(redTeamReport([stubborn]))
      .mockResolvedValueOnce(redTeamReport([stubborn]));
    script.adapt.mockResolvedValue(
      adaptReport({ patched: 1, stillBypassingIds: [4], dominantFailureMode: "pattern_gap" })
    );

    await driver.trigger();
    const hint = { dominantFailureMode: "pattern_gap", weakCategories: ["xss"], stillBypassingIds: [4] };
    expect(driver.currentHint).toEqual(hint);

    await driver.trigger();
    expect(script.scout).toHaveBeenNthCalledWith(1, { hint: null });
    expect(script.scout).toHaveBeenNthCalledWith(2, { hint });
  });

  it("runs concurrent triggers one after another", async () => {
    let inFlight = 0;
    let maxInFlight = 0;
    script.scout.mockImplementation(async () => {
      inFlight++;
      maxInFlight = Math.max(maxInFlight, inFlight);
      await new Promise((resolve) => setTimeout(resolve, 5));
      inFlight--;
      return scoutReport();
    });

    const summaries = await Promise.all([driver.trigger(), driver.trigger(), driver.trigger()]);

    expect(summaries.map((s) => s.cycleId)).toEqual([1, 2, 3]);
    expect(maxInFlight).toBe(1);
  });

  it("records a failed cycle and rethrows", async () => {
    script.scout.mockRejectedValueOnce(new Error("engine down"));

    await expect(driver.trigger()).rejects.toThrow("scout failed: engine down");

    const [row] = await storage.activity.recent(1);
    expect(row).toMatchObject({ agent: "system", action: "error", detail: "scout failed: engine down", success: false });
    expect(events.ofType("agent")).toContainEqual({
      type: "agent",
      agent: "system",
      status: "error",
      detail: "scout failed: engine down",
    });
    expect(driver.currentHint).toBeNull();

    await expect(driver.trigger()).resolves.toMatchObject({ cycleId: 2 });
  });

  it("runs in the background until stopped", async () => {
    driver.start();
    expect(driver.running).toBe(true);

    await vi.waitFor(() => expect(script.scout).toHaveBeenCalledTimes(1));
    await driver.stop();

    expect(driver.running).toBe(false);
    expect(script.scout).toHaveBeenCalledTimes(1);
  });

  it("keeps looping after a failed cycle", async () => {
    driver = new CycleDriver(
      new CycleOrchestrator({ ...script.agents, activity: storage.activity }),
      { activity: storage.activity, startupDelayMs: 0, delayMs: 1 }
    );
    script.scout.mockRejectedValueOnce(new Error("engine down"));

    driver.start();
    await vi.waitFor(() => expect(script.scout.mock.calls.length).toBeGreaterThanOrEqual(2));
    await driver.stop();

    const errors = (await storage.activity.recent()).filter((row) => row.action === "error");
    expect(errors).toHaveLength(1);
  });
});
