/**
 * linewatch CLI — disruption monitor for a single transit line.
 *
 * The program is built here, separate from the entrypoint (index.ts), so
 * tests can construct it without triggering parseAsync.
 */

import { resolve } from "node:path";
import { homedir } from "node:os";
import { Command } from "commander";
import type { DependencyOverrides } from "../monitor/factory.js";
import { registerMonitorCommands } from "./commands/monitor.js";
import { registerConfigCommands } from "./commands/config.js";

export const DEFAULT_ROOT = process.env["LINEWATCH_ROOT"] ?? resolve(homedir(), ".linewatch");

export function createProgram(overrides: DependencyOverrides = {}): Command {
  const program = new Command()
    .name("linewatch")
    .version("0.1.0")
    .description("Watch one transit line and notify when disruptions change")
    .option("--root <path>", "linewatch root directory", DEFAULT_ROOT)
    .option("--config <path>", "Config file (default: <root>/linewatch.yaml)");

  registerMonitorCommands(program, overrides);
  registerConfigCommands(program);

  return program;
}
