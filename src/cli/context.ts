/**
 * Shared helpers for commands: global options and config loading.
 */

import type { Command } from "commander";
import { loadConfig } from "../config/index.js";
import { errorMessage } from "../errors.js";
import type { MonitorConfig } from "../schemas/config.js";

export interface GlobalOptions {
  root: string;
  config?: string;
}

export function globalOptions(program: Command): GlobalOptions {
  return program.opts<GlobalOptions>();
}

/** Load the config named by the global options, or report and set exit code 1. */
export async function loadCliConfig(program: Command): Promise<MonitorConfig | undefined> {
  const opts = globalOptions(program);
  try {
    return await loadConfig({ root: opts.root, configPath: opts.config });
  } catch (err) {
    console.error(`❌ ${errorMessage(err)}`);
    process.exitCode = 1;
    return undefined;
  }
}
