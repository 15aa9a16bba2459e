/**
 * Prometheus metrics for linewatch using prom-client.
 *
 * Served at /metrics by the daemon's HTTP server.
 *
 * Metrics:
 * - linewatch_cycles_total{outcome}                  counter
 * - linewatch_transitions_total{kind}                counter
 * - linewatch_notifications_total{channel,result}    counter
 * - linewatch_active_disruptions                     gauge
 * - linewatch_cycle_duration_seconds                 histogram
 * - linewatch_state_write_failures_total             counter
 * - linewatch_monitor_up                             gauge
 */

import {
  Registry,
  Gauge,
  Counter,
  Histogram,
  collectDefaultMetrics,
} from "prom-client";

export class MonitorMetrics {
  readonly registry: Registry;

  readonly cyclesTotal: Counter;
  readonly transitionsTotal: Counter;
  readonly notificationsTotal: Counter;
  readonly activeDisruptions: Gauge;
  readonly cycleDuration: Histogram;
  readonly stateWriteFailures: Counter;
  readonly monitorUp: Gauge;

  constructor(opts: { collectDefaults?: boolean } = {}) {
    this.registry = new Registry();

    // Node.js default metrics (GC, event loop, etc.)
    if (opts.collectDefaults ?? true) {
      collectDefaultMetrics({ register: this.registry, prefix: "linewatch_" });
    }

    this.cyclesTotal = new Counter({
      name: "linewatch_cycles_total",
      help: "Poll cycles by outcome",
      labelNames: ["outcome"] as const,
      registers: [this.registry],
    });

    this.transitionsTotal = new Counter({
      name: "linewatch_transitions_total",
      help: "Reconciled transitions by kind",
      labelNames: ["kind"] as const,
      registers: [this.registry],
    });

    this.notificationsTotal = new Counter({
      name: "linewatch_notifications_total",
      help: "Notification deliveries by channel and result",
      labelNames: ["channel", "result"] as const,
      registers: [this.registry],
    });

    this.activeDisruptions = new Gauge({
      name: "linewatch_active_disruptions",
      help: "Disruptions in the last reconciled snapshot",
      registers: [this.registry],
    });

    this.cycleDuration = new Histogram({
      name: "linewatch_cycle_duration_seconds",
      help: "Poll cycle duration",
      buckets: [0.05, 0.1, 0.25, 0.5, 1.0, 2.5, 5.0, 10.0, 30.0],
      registers: [this.registry],
    });

    this.stateWriteFailures = new Counter({
      name: "linewatch_state_write_failures_total",
      help: "Failed state persistence attempts",
      registers: [this.registry],
    });

    this.monitorUp = new Gauge({
      name: "linewatch_monitor_up",
      help: "Monitor process status (1=up, 0=down)",
      registers: [this.registry],
    });
  }

  /** Record a finished cycle. */
  recordCycle(outcome: string, durationSeconds: number): void {
    this.cyclesTotal.labels({ outcome }).inc();
    this.cycleDuration.observe(durationSeconds);
  }

  /** Record a reconciled transition and the resulting disruption count. */
  recordTransition(kind: string, activeDisruptions: number): void {
    this.transitionsTotal.labels({ kind }).inc();
    this.activeDisruptions.set(activeDisruptions);
  }

  /** Record one channel's delivery result. */
  recordNotification(channel: string, ok: boolean): void {
    this.notificationsTotal.labels({ channel, result: ok ? "sent" : "failed" }).inc();
  }

  /** Record a state write failure. */
  recordStateWriteFailure(): void {
    this.stateWriteFailures.inc();
  }

  setUp(up: boolean): void {
    this.monitorUp.set(up ? 1 : 0);
  }

  /** Get metrics in Prometheus text format. */
  async getMetrics(): Promise<string> {
    return this.registry.metrics();
  }
}
