/**
 * Live event feed.
 *
 * Components emit fire-and-forget events; what happens to them (dashboard
 * broadcast, logging, collection in tests) is up to the sink.
 */

import { logger } from "../lib/logger.js";

import type { AggregateStats } from "../store/schema.js";

export type AgentStatus = "running" | "done" | "idle" | "error";

export type RiposteEvent =
  | {
      type: "request";
      timestamp: string;
      /** First 120 characters of the raw request */
      message: string;
      classification: string;
      confidence: number;
      blocked: boolean;
      classifier: string;
      attackType: string;
    }
  | { type: "agent"; agent: string; status: AgentStatus; detail: string }
  | ({ type: "stats" } & AggregateStats);

export interface EventSink {
  emit(event: RiposteEvent): void;
}

/**
 * Default sink: writes events to the debug log
 */
export class LoggerEventSink implements EventSink {
  private readonly log = logger.child("[events]");

  emit(event: RiposteEvent): void {
    switch (event.type) {
      case "request":
        this.log.debug(`${event.classification} ${event.confidence.toFixed(2)} via ${event.classifier}`);
        break;
      case "agent":
        this.log.debug(`${event.agent} ${event.status}: ${event.detail}`);
        break;
      case "stats":
        this.log.debug(`rules v${event.rulesVersion}, block rate ${event.blockRate}%`);
        break;
    }
  }
}

/**
 * Collects events in memory
 */
export class MemoryEventSink implements EventSink {
  readonly events: RiposteEvent[] = [];

  emit(event: RiposteEvent): void {
    this.events.push(event);
  }

  ofType<K extends RiposteEvent["type"]>(type: K): Array<Extract<RiposteEvent, { type: K }>> {
    return this.events.filter((e): e is Extract<RiposteEvent, { type: K }> => e.type === type);
  }

  clear(): void {
    this.events.length = 0;
  }
}
