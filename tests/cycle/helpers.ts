/**
 * Scripted agents for orchestrator and driver tests
 */

import { vi } from "vitest";

import { countFailureModes } from "@/adapt/diagnosis.js";
import { toBypass } from "@/redteam/redteam.js";

import { outcome, technique } from "../fixtures/storage.js";

import type { AdaptReport } from "@/adapt/adapt.js";
import type { CycleAgents } from "@/cycle/orchestrator.js";
import type { BypassResult, RedTeamReport } from "@/redteam/types.js";
import type { ScoutReport } from "@/scout/scout.js";
import type { AttackCategory } from "@/store/schema.js";

export function bypassOf(id: number, category: AttackCategory = "sqli"): BypassResult {
  return toBypass(technique(id, { category }), outcome());
}

export function redTeamReport(bypasses: BypassResult[] = [], tested = bypasses.length): RedTeamReport {
  return { tested, blocked: tested - bypasses.length, bypasses, errors: [], byCategory: {} };
}

export function scoutReport(discovered = 2): ScoutReport {
  return { discovered, strategiesUsed: ["mutate_bypasses"], categoriesTouched: ["sqli"], generation: 0 };
}

export function adaptReport(overrides: Partial<AdaptReport> = {}): AdaptReport {
  return {
    patched: 0,
    verified: 0,
    stillBypassingIds: [],
    dominantFailureMode: null,
    failureModeCounts: countFailureModes([]),
    newVersion: 2,
    heuristic: false,
    diagnosed: [],
    ...overrides,
  };
}

export function scriptedAgents() {
  const scout = vi.fn<CycleAgents["scout"]["run"]>().mockResolvedValue(scoutReport());
  const redTeam = vi.fn<CycleAgents["redTeam"]["run"]>().mockResolvedValue(redTeamReport());
  const adapt = vi.fn<CycleAgents["adapt"]["run"]>().mockResolvedValue(adaptReport());
  return {
    scout,
    redTeam,
    adapt,
    agents: { scout: { run: scout }, redTeam: { run: redTeam }, adapt: { run: adapt } } satisfies CycleAgents,
  };
}
