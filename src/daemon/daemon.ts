import { join } from "node:path";
import { existsSync, mkdirSync, readFileSync, writeFileSync, unlinkSync } from "node:fs";
import type { Server } from "node:http";
import type { MonitorConfig } from "../schemas/config.js";
import { MonitorService } from "../service/monitor-service.js";
import type { runCycle } from "../monitor/cycle.js";
import { createCycleDependencies, type DependencyOverrides } from "../monitor/factory.js";
import { MonitorMetrics } from "../metrics/exporter.js";
import { isProcessRunning } from "../store/state-lock.js";
import { errorMessage } from "../errors.js";
import { createHealthServer, type DaemonStateProvider } from "./server.js";

export interface MonitorDaemonOptions extends DependencyOverrides {
  config: MonitorConfig;
  runner?: typeof runCycle;
  /** Overrides config.health.enabled. */
  enableHealthServer?: boolean;
  /** Install exit/signal handlers that remove the PID file. Default: true. */
  handleSignals?: boolean;
}

export interface MonitorDaemonContext {
  service: MonitorService;
  metrics: MonitorMetrics;
  healthServer?: Server;
  /** Stop the service, close the server and release the PID file. */
  shutdown(): Promise<void>;
}

export const PID_FILENAME = "daemon.pid";

/** Claim the PID file, failing when another live daemon holds it. */
export function claimPidFile(dataDir: string): string {
  mkdirSync(dataDir, { recursive: true });
  const lockFile = join(dataDir, PID_FILENAME);

  if (existsSync(lockFile)) {
    const pid = parseInt(readFileSync(lockFile, "utf-8").trim(), 10);

    if (!isNaN(pid) && pid !== process.pid && isProcessRunning(pid)) {
      throw new Error(`linewatch daemon already running (PID: ${pid})`);
    }
    // Stale PID file, clean up
    unlinkSync(lockFile);
  }

  writeFileSync(lockFile, String(process.pid));
  return lockFile;
}

function releasePidFile(lockFile: string): void {
  if (existsSync(lockFile)) {
    unlinkSync(lockFile);
  }
}

export async function startMonitorDaemon(opts: MonitorDaemonOptions): Promise<MonitorDaemonContext> {
  const { config } = opts;
  const startedAt = Date.now();
  const metrics = opts.metrics ?? new MonitorMetrics();
  const deps = createCycleDependencies(config, { ...opts, metrics });

  const service = new MonitorService(
    { ...deps, runner: opts.runner },
    { pollIntervalMs: config.pollIntervalMs, fetchTimeoutMs: config.fetchTimeoutMs },
  );

  const lockFile = claimPidFile(config.dataDir);

  await service.start();

  let healthServer: Server | undefined;
  if (opts.enableHealthServer ?? config.health.enabled) {
    const getState: DaemonStateProvider = () => {
      const status = service.getStatus();
      return {
        lineId: status.lineId,
        startedAt,
        pollIntervalMs: status.pollIntervalMs,
        lastCycleAt: status.lastCycleAt ? Date.parse(status.lastCycleAt) : undefined,
        lastOutcome: status.lastOutcome,
        lastError: status.lastError,
      };
    };
    healthServer = createHealthServer(getState, metrics, config.health.port, config.health.bind);
  }

  const shutdown = async (): Promise<void> => {
    if (healthServer) {
      const server = healthServer;
      await new Promise<void>((resolve) => {
        server.close(() => resolve());
      });
    }
    await service.stop();
    releasePidFile(lockFile);
  };

  if (opts.handleSignals ?? true) {
    process.on("exit", () => releasePidFile(lockFile));
    const onSignal = () => {
      shutdown().then(
        () => process.exit(0),
        (err: unknown) => {
          console.error(`[linewatch] Shutdown failed: ${errorMessage(err)}`);
          process.exit(1);
        },
      );
    };
    process.once("SIGTERM", onSignal);
    process.once("SIGINT", onSignal);
  }

  return { service, metrics, healthServer, shutdown };
}
