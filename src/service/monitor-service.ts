/**
 * MonitorService — runs poll cycles on an interval.
 *
 * Cycles are serialized in-process through a promise queue: an interval
 * tick that fires while a slow cycle is still running waits for it instead
 * of overlapping. Cross-process exclusion is the state store's lock.
 */

import type { EventLogger } from "../events/logger.js";
import type { MonitorMetrics } from "../metrics/exporter.js";
import { runCycle, type CycleDependencies, type CycleOptions, type CycleOutcome } from "../monitor/cycle.js";
import { errorMessage } from "../errors.js";

/** Maximum time to wait for an in-flight cycle during shutdown (ms). */
const DRAIN_TIMEOUT_MS = 10_000;

export interface MonitorServiceConfig extends CycleOptions {
  pollIntervalMs?: number;
  drainTimeoutMs?: number;
}

export interface MonitorServiceDependencies extends CycleDependencies {
  /** Cycle implementation (tests). */
  runner?: typeof runCycle;
}

export interface MonitorServiceStatus {
  running: boolean;
  lineId: string;
  pollIntervalMs: number;
  cycles: number;
  lastCycleAt?: string;
  lastCycleDurationMs?: number;
  lastOutcome?: CycleOutcome["status"];
  lastError?: string;
}

export class MonitorService {
  private readonly deps: CycleDependencies;
  private readonly runner: typeof runCycle;
  private readonly logger?: EventLogger;
  private readonly metrics?: MonitorMetrics;
  private readonly cycleOptions: CycleOptions;
  private readonly pollIntervalMs: number;
  private readonly drainTimeoutMs: number;

  private running = false;
  private pollTimer?: NodeJS.Timeout;
  private cycleQueue: Promise<void> = Promise.resolve();
  private cycles = 0;
  private lastCycleAt?: string;
  private lastCycleDurationMs?: number;
  private lastOutcome?: CycleOutcome;
  private lastError?: string;

  constructor(deps: MonitorServiceDependencies, config: MonitorServiceConfig) {
    const { runner, ...cycleDeps } = deps;
    this.deps = cycleDeps;
    this.runner = runner ?? runCycle;
    this.logger = deps.logger;
    this.metrics = deps.metrics;
    this.cycleOptions = { fetchTimeoutMs: config.fetchTimeoutMs };
    this.pollIntervalMs = config.pollIntervalMs ?? 300_000;
    this.drainTimeoutMs = config.drainTimeoutMs ?? DRAIN_TIMEOUT_MS;
  }

  async start(): Promise<void> {
    if (this.running) return;
    this.running = true;
    this.metrics?.setUp(true);

    await this.safeLog("monitor.startup", {
      pollIntervalMs: this.pollIntervalMs,
      source: this.deps.source.name,
    });

    await this.triggerCycle();
    if (!this.running) return;

    this.pollTimer = setInterval(() => {
      void this.triggerCycle();
    }, this.pollIntervalMs);
  }

  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    this.metrics?.setUp(false);

    if (this.pollTimer) clearInterval(this.pollTimer);
    this.pollTimer = undefined;

    const drainStart = Date.now();
    let drainTimer: NodeJS.Timeout | undefined;
    try {
      await Promise.race([
        this.cycleQueue,
        new Promise<void>((_, reject) => {
          drainTimer = setTimeout(() => reject(new Error("drain_timeout")), this.drainTimeoutMs);
        }),
      ]);
    } catch (err) {
      if (errorMessage(err) === "drain_timeout") {
        console.warn(`[linewatch] Drain timeout after ${this.drainTimeoutMs}ms, in-flight cycle abandoned`);
      } else {
        console.error(`[linewatch] Drain error: ${errorMessage(err)}`);
      }
    } finally {
      clearTimeout(drainTimer);
    }

    await this.safeLog("monitor.shutdown", { drainMs: Date.now() - drainStart });
  }

  getStatus(): MonitorServiceStatus {
    return {
      running: this.running,
      lineId: this.deps.context.lineId,
      pollIntervalMs: this.pollIntervalMs,
      cycles: this.cycles,
      lastCycleAt: this.lastCycleAt,
      lastCycleDurationMs: this.lastCycleDurationMs,
      lastOutcome: this.lastOutcome?.status,
      lastError: this.lastError,
    };
  }

  /** Last full cycle outcome, if any. */
  getLastOutcome(): CycleOutcome | undefined {
    return this.lastOutcome;
  }

  /** Queue a cycle behind any in-flight one. */
  triggerCycle(): Promise<void> {
    if (!this.running) return Promise.resolve();
    this.cycleQueue = this.cycleQueue.then(() => this.runOnce());
    return this.cycleQueue;
  }

  private async runOnce(): Promise<void> {
    let outcome: CycleOutcome;
    try {
      outcome = await this.runner(this.deps, this.cycleOptions);
    } catch (err) {
      // Keep the queue alive; the next tick retries
      this.lastError = errorMessage(err);
      console.error(`[linewatch] Cycle runner threw: ${this.lastError}`);
      return;
    }
    this.cycles += 1;
    this.lastCycleAt = new Date().toISOString();
    this.lastCycleDurationMs = outcome.durationMs;
    this.lastOutcome = outcome;
    this.lastError =
      outcome.status === "fetch-failed" || outcome.status === "failed"
        ? outcome.error
        : undefined;
  }

  private async safeLog(type: "monitor.startup" | "monitor.shutdown", payload: Record<string, unknown>): Promise<void> {
    if (!this.logger) return;
    try {
      await this.logger.logLifecycle(type, payload);
    } catch (err) {
      console.warn(`[linewatch] Failed to write event ${type}: ${errorMessage(err)}`);
    }
  }
}
