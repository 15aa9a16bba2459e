/**
 * Full poll lifecycle against the filesystem store, with the HTTP API
 * replaced by an in-process fetch stub.
 */

import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm } from "node:fs/promises";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { parseConfig } from "../../src/config/index.js";
import { createCycleDependencies } from "../../src/monitor/factory.js";
import { runCycle, type CycleDependencies, type CycleOutcome } from "../../src/monitor/cycle.js";
import { MockNotifier } from "../../src/events/notifier.js";
import { FilesystemStateStore } from "../../src/store/state-store.js";
import type { MonitorConfig } from "../../src/schemas/config.js";

type Reply = { ids: number[] } | { status: number };

function responseFor(reply: Reply): Response {
  if ("status" in reply) return new Response("upstream error", { status: reply.status });
  return new Response(
    JSON.stringify({
      StatusCode: 0,
      ResponseData: {
        TrafficTypes: [
          {
            Type: "Bus",
            Events: reply.ids.map((id) => ({
              EventId: id,
              Message: `Line 29: disruption ${id}`,
              Expanded: `Details for ${id}`,
            })),
          },
        ],
      },
    }),
  );
}

describe("monitor lifecycle", () => {
  let tmpDir: string;
  let config: MonitorConfig;
  let desktop: MockNotifier;
  let consoleNotifier: MockNotifier;
  let deps: CycleDependencies;
  let replies: Reply[];

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "linewatch-lifecycle-test-"));
    config = parseConfig(
      {
        line: { id: "29", name: "Harbour Express" },
        sources: [{ kind: "traffic-situation", url: "https://api.example.test/deviations", apiKey: "test-key" }],
      },
      tmpDir,
      {},
    );
    desktop = new MockNotifier();
    consoleNotifier = new MockNotifier();
    deps = createCycleDependencies(config, { notifiers: { desktop, console: consoleNotifier } });
    replies = [];

    vi.stubGlobal(
      "fetch",
      vi.fn(async () => {
        const reply = replies.shift();
        if (!reply) throw new Error("no reply queued");
        return responseFor(reply);
      }),
    );
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(async () => {
    vi.unstubAllGlobals();
    vi.restoreAllMocks();
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function poll(reply: Reply): Promise<CycleOutcome> {
    replies.push(reply);
    return runCycle(deps, { fetchTimeoutMs: config.fetchTimeoutMs });
  }

  function kindOf(outcome: CycleOutcome): string {
    return outcome.status === "completed" ? outcome.transition.kind : outcome.status;
  }

  it("walks through new, ongoing, updated and resolved", async () => {
    const store = new FilesystemStateStore(config.dataDir, "29");

    expect(kindOf(await poll({ ids: [101] }))).toBe("new");
    expect(kindOf(await poll({ ids: [101, 102] }))).toBe("new");
    expect(kindOf(await poll({ status: 500 }))).toBe("fetch-failed");
    expect((await store.load()).state.knownIds).toEqual(["101", "102"]);

    expect(kindOf(await poll({ ids: [102] }))).toBe("updated");
    expect(kindOf(await poll({ ids: [102] }))).toBe("ongoing");
    expect(kindOf(await poll({ ids: [] }))).toBe("resolved");
    expect(kindOf(await poll({ ids: [] }))).toBe("none");

    expect(desktop.sent.map((n) => n.title)).toEqual([
      "⚠️ New disruption on line 29 (Harbour Express)",
      "⚠️ New disruption on line 29 (Harbour Express)",
      "🔄 Updated disruption on line 29",
      "✅ Disruption resolved on line 29",
    ]);
    expect(desktop.sent[1]?.body).toBe("Disruption 1:\n   Line 29: disruption 102\n   Details for 102");
    expect(consoleNotifier.sent).toHaveLength(4);

    const final = await store.load();
    expect(final.status).toBe("loaded");
    expect(final.state.knownIds).toEqual([]);
  });

  it("survives a restart without re-notifying", async () => {
    await poll({ ids: [101] });

    deps = createCycleDependencies(config, { notifiers: { desktop, console: consoleNotifier } });
    const outcome = await poll({ ids: [101] });

    expect(kindOf(outcome)).toBe("ongoing");
    expect(desktop.sent).toHaveLength(1);
  });
});
