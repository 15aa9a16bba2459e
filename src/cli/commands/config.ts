/**
 * Configuration commands.
 */

import type { Command } from "commander";
import { enabledChannels } from "../../config/index.js";
import { loadCliConfig } from "../context.js";

export function registerConfigCommands(program: Command): void {
  const config = program
    .command("config")
    .description("Configuration management");

  config
    .command("validate")
    .description("Load and validate the configuration")
    .action(async () => {
      const loaded = await loadCliConfig(program);
      if (!loaded) return;

      console.log("✅ Config valid");
      console.log(`  Line:     ${loaded.line.id} (${loaded.line.name}, ${loaded.line.transportMode})`);
      console.log(`  Sources:  ${loaded.sources.map((s) => s.kind).join(" → ")}`);
      const channels = enabledChannels(loaded);
      console.log(`  Channels: ${channels.length > 0 ? channels.join(", ") : "(none)"}`);
      console.log(`  Interval: ${loaded.pollIntervalMs / 1000}s`);
      console.log(`  Data dir: ${loaded.dataDir}`);
    });
}
