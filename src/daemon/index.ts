#!/usr/bin/env node

import { resolve } from "node:path";
import { homedir } from "node:os";
import { Command } from "commander";
import { loadConfig } from "../config/index.js";
import type { MonitorConfig } from "../schemas/config.js";
import { errorMessage } from "../errors.js";
import { startMonitorDaemon } from "./daemon.js";

const LINEWATCH_ROOT = process.env["LINEWATCH_ROOT"] ?? resolve(homedir(), ".linewatch");

const program = new Command()
  .name("linewatch-daemon")
  .description("linewatch disruption monitor daemon")
  .option("--root <path>", "linewatch root directory", LINEWATCH_ROOT)
  .option("--config <path>", "Config file (default: <root>/linewatch.yaml)")
  .option("--interval <ms>", "Poll interval in ms (overrides config)");

program.action(async (opts: { root: string; config?: string; interval?: string }) => {
  let config: MonitorConfig;
  try {
    config = await loadConfig({ root: opts.root, configPath: opts.config });
  } catch (err) {
    console.error(errorMessage(err));
    process.exitCode = 1;
    return;
  }

  if (opts.interval !== undefined) {
    const pollIntervalMs = Number(opts.interval);
    if (Number.isNaN(pollIntervalMs) || pollIntervalMs <= 0) {
      console.error("Invalid --interval (must be positive number)");
      process.exitCode = 1;
      return;
    }
    config = { ...config, pollIntervalMs };
  }

  const { healthServer } = await startMonitorDaemon({ config });

  console.log(`[linewatch] Daemon started for line ${config.line.id} (${config.line.name})`);
  if (healthServer) {
    console.log(`[linewatch] Health endpoint: http://${config.health.bind}:${config.health.port}/health`);
  }

});

program.parseAsync().catch((err: unknown) => {
  console.error(err);
  process.exitCode = 1;
});
