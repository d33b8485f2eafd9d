/**
 * Background cycle driver: a cancellable scheduled task around the
 * orchestrator. Manual triggers share the same queue, so at most one cycle
 * runs at a time and each picks up the hint the previous one left.
 */

import { setTimeout as delay } from "timers/promises";

import { errorMessage } from "../lib/errors.js";
import { logger } from "../lib/logger.js";

import type { EventSink } from "../events/index.js";
import type { ActivityLog } from "../store/activity-log.js";
import type { CycleOrchestrator } from "./orchestrator.js";
import type { CycleSummary, Hint } from "./types.js";

export interface CycleDriverOptions {
  activity: ActivityLog;
  events?: EventSink;
  delayMs?: number;
  startupDelayMs?: number;
}

export class CycleDriver {
  private readonly log = logger.child("[cycle]");
  private hint: Hint | null = null;
  private tail: Promise<void> = Promise.resolve();
  private loopPromise: Promise<void> | null = null;
  private abort = new AbortController();

  constructor(
    private readonly orchestrator: CycleOrchestrator,
    private readonly options: CycleDriverOptions
  ) {}

  /** Hint the next cycle will receive */
  get currentHint(): Hint | null {
    return this.hint;
  }

  get running(): boolean {
    return this.loopPromise !== null;
  }

  /**
   * Start the background loop. No-op when already running.
   */
  start(): void {
    if (this.loopPromise) return;
    this.abort = new AbortController();
    this.loopPromise = this.loop(this.abort.signal);
  }

  /**
   * Stop at the next sleep boundary. Resolves once an in-flight cycle has finished.
   */
  async stop(): Promise<void> {
    this.abort.abort();
    const loop = this.loopPromise;
    this.loopPromise = null;
    if (loop) await loop;
  }

  /**
   * Run one cycle now, queued behind any cycle in flight. Rejects when the
   * cycle fails; the failure is recorded first.
   */
  async trigger(): Promise<CycleSummary> {
    return this.exclusive(() => this.runOnce());
  }

  private exclusive<T>(fn: () => Promise<T>): Promise<T> {
    const result = this.tail.then(fn);
    this.tail = result.then(
      () => undefined,
      () => undefined
    );
    return result;
  }

  private async loop(signal: AbortSignal): Promise<void> {
    if (!(await this.sleep(this.options.startupDelayMs ?? 5_000, signal))) return;

    while (!signal.aborted) {
      try {
        await this.exclusive(() => this.runOnce());
      } catch (error) {
        this.log.debug(`Waiting for the next scheduled cycle after: ${errorMessage(error)}`);
      }
      if (!(await this.sleep(this.options.delayMs ?? 30_000, signal))) return;
    }
  }

  /**
   * Abortable sleep. False when aborted.
   */
  private async sleep(ms: number, signal: AbortSignal): Promise<boolean> {
    if (signal.aborted) return false;
    try {
      await delay(ms, undefined, { signal });
      return true;
    } catch (error) {
      if (signal.aborted) return false;
      throw error;
    }
  }

  private async runOnce(): Promise<CycleSummary> {
    try {
      const summary = await this.orchestrator.runCycle(this.hint);
      this.hint = summary.hint;
      return summary;
    } catch (error) {
      const message = errorMessage(error);
      this.log.error(`Cycle failed: ${message}`);
      this.options.events?.emit({ type: "agent", agent: "system", status: "error", detail: message });
      try {
        await this.options.activity.record("system", "error", message, false);
      } catch (logError) {
        this.log.error(`Could not record cycle failure: ${errorMessage(logError)}`);
      }
      throw error;
    }
  }
}
