/**
 * Monitor commands: check, status, watch, reset.
 */

import type { Command } from "commander";
import { runCycle, type CycleOutcome } from "../../monitor/cycle.js";
import { createCycleDependencies, type DependencyOverrides } from "../../monitor/factory.js";
import { FilesystemStateStore } from "../../store/state-store.js";
import { startMonitorDaemon } from "../../daemon/daemon.js";
import { formatTimestamp } from "../../events/notification-policy/composer.js";
import { loadCliConfig } from "../context.js";

/** Render a cycle outcome as report lines. */
export function formatOutcome(outcome: CycleOutcome): string[] {
  switch (outcome.status) {
    case "fetch-failed":
      return [`⚠️  Fetch failed (${outcome.reason}): ${outcome.error}`, "   State left unchanged."];
    case "skipped":
      return [`⏭️  Cycle skipped (${outcome.reason}): ${outcome.detail}`];
    case "failed":
      return [`❌ Cycle failed: ${outcome.error}`];
    case "completed": {
      const { transition } = outcome;
      const lines = [
        `Classification: ${transition.kind}`,
        `Disruptions:    ${transition.records.length}`,
      ];
      if (transition.newIds.length > 0) lines.push(`New:            ${transition.newIds.join(", ")}`);
      if (transition.resolvedIds.length > 0) lines.push(`Resolved:       ${transition.resolvedIds.join(", ")}`);
      if (outcome.stateStatus === "corrupt") lines.push("⚠️  Previous state was unreadable; started fresh");
      if (outcome.notification) {
        if (outcome.dispatch.length === 0) {
          lines.push(`Notification:   ${outcome.notification.title} (no channels)`);
        } else {
          lines.push(`Notification:   ${outcome.notification.title}`);
          for (const d of outcome.dispatch) {
            lines.push(d.ok ? `  ✓ ${d.channel}` : `  ✗ ${d.channel}: ${d.error ?? "failed"}`);
          }
        }
      }
      if (!outcome.persisted) lines.push("⚠️  State was not saved");
      return lines;
    }
  }
}

/**
 * Register monitor commands. Overrides replace the wired collaborators (tests).
 */
export function registerMonitorCommands(program: Command, overrides: DependencyOverrides = {}): void {
  program
    .command("check")
    .description("Run one poll cycle and report the result")
    .action(async () => {
      const config = await loadCliConfig(program);
      if (!config) return;

      const deps = createCycleDependencies(config, overrides);
      const outcome = await runCycle(deps, { fetchTimeoutMs: config.fetchTimeoutMs });
      for (const line of formatOutcome(outcome)) console.log(line);
    });

  program
    .command("status")
    .description("Show the persisted state for the configured line")
    .option("--json", "Output as JSON", false)
    .action(async (opts: { json: boolean }) => {
      const config = await loadCliConfig(program);
      if (!config) return;

      const store = overrides.store ?? new FilesystemStateStore(config.dataDir, config.line.id);
      const { state, status, error } = await store.load();

      if (opts.json) {
        console.log(JSON.stringify({ status, error, state }, null, 2));
        return;
      }

      console.log(`Line ${config.line.id} (${config.line.name})`);
      if (status === "missing") {
        console.log("No state recorded yet.");
        return;
      }
      if (status === "corrupt") {
        console.log(`⚠️  State unreadable: ${error ?? "unknown error"}`);
        return;
      }

      const snapshot = state.lastSnapshot;
      console.log(`Identity:    ${state.identity}`);
      if (!snapshot) {
        console.log("No snapshot recorded yet.");
        return;
      }
      console.log(`Captured:    ${formatTimestamp(snapshot.capturedAt, config.timeZone)}`);
      console.log(`Disruptions: ${snapshot.records.length}`);
      for (const record of snapshot.records) {
        console.log(`  - ${record.id ? `[${record.id}] ` : ""}${record.header}`);
      }
    });

  program
    .command("watch")
    .description("Run the monitor in the foreground")
    .option("--interval <ms>", "Poll interval in ms (overrides config)")
    .option("--no-health", "Disable the health/metrics HTTP server")
    .action(async (opts: { interval?: string; health: boolean }) => {
      const loaded = await loadCliConfig(program);
      if (!loaded) return;

      let config = loaded;
      if (opts.interval !== undefined) {
        const pollIntervalMs = Number(opts.interval);
        if (Number.isNaN(pollIntervalMs) || pollIntervalMs <= 0) {
          console.error(`❌ Invalid interval: ${opts.interval}`);
          process.exitCode = 1;
          return;
        }
        config = { ...config, pollIntervalMs };
      }

      await startMonitorDaemon({
        ...overrides,
        config,
        enableHealthServer: opts.health && config.health.enabled,
      });
      console.log(`👀 Watching line ${config.line.id} every ${config.pollIntervalMs / 1000}s (Ctrl+C to stop)`);
    });

  program
    .command("reset")
    .description("Delete the persisted state; the next cycle treats everything as new")
    .action(async () => {
      const config = await loadCliConfig(program);
      if (!config) return;

      const store = overrides.store ?? new FilesystemStateStore(config.dataDir, config.line.id);
      await store.withLock(() => store.clear());
      console.log(`✅ State cleared for line ${config.line.id}`);
    });
}
