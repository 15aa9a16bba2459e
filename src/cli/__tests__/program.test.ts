import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { mkdtemp, rm, writeFile } from "node:fs/promises";
import { existsSync } from "node:fs";
import { join } from "node:path";
import { tmpdir } from "node:os";
import { createProgram } from "../program.js";
import { formatOutcome } from "../commands/monitor.js";
import { MockNotifier } from "../../events/notifier.js";
import type { DisruptionSource } from "../../sources/interfaces.js";
import { FetchFailure } from "../../errors.js";

const CONFIG = [
  "line:",
  "  id: \"29\"",
  "  name: Harbour Express",
  "sources:",
  "  - kind: page-scrape",
  "    url: https://status.example.test",
  "channels:",
  "  desktop:",
  "    enabled: false",
  "",
].join("\n");

function stubSource(): DisruptionSource {
  return {
    name: "stub",
    fetch: vi.fn(async () => ({
      capturedAt: "2026-03-01T08:00:00.000Z",
      records: [{ id: "X", header: "Delay", activePeriods: [] }],
    })),
  };
}

describe("linewatch CLI", () => {
  let tmpDir: string;
  let output: string[];

  beforeEach(async () => {
    tmpDir = await mkdtemp(join(tmpdir(), "linewatch-cli-test-"));
    await writeFile(join(tmpDir, "linewatch.yaml"), CONFIG);
    output = [];
    vi.spyOn(console, "log").mockImplementation((line: unknown) => {
      output.push(String(line));
    });
    vi.spyOn(console, "info").mockImplementation(() => {});
    vi.spyOn(console, "warn").mockImplementation(() => {});
    vi.spyOn(console, "error").mockImplementation((line: unknown) => {
      output.push(String(line));
    });
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    process.exitCode = undefined;
    await rm(tmpDir, { recursive: true, force: true });
  });

  async function run(args: string[], source: DisruptionSource = stubSource()): Promise<void> {
    const program = createProgram({ source, notifiers: { console: new MockNotifier() } });
    await program.parseAsync(["--root", tmpDir, ...args], { from: "user" });
  }

  it("check runs one cycle and reports it", async () => {
    await run(["check"]);

    expect(output).toEqual([
      "Classification: new",
      "Disruptions:    1",
      "New:            X",
      "Notification:   ⚠️ New disruption on line 29 (Harbour Express)",
      "  ✓ console",
    ]);
    expect(existsSync(join(tmpDir, "state", "line-29.json"))).toBe(true);
    expect(process.exitCode).toBeUndefined();
  });

  it("check exits cleanly when the fetch fails", async () => {
    const failing: DisruptionSource = {
      name: "stub",
      fetch: vi.fn(async () => {
        throw new FetchFailure("stub", "status", "HTTP 502");
      }),
    };

    await run(["check"], failing);

    expect(output).toEqual(["⚠️  Fetch failed (status): [stub] HTTP 502", "   State left unchanged."]);
    expect(process.exitCode).toBeUndefined();
    expect(existsSync(join(tmpDir, "state", "line-29.json"))).toBe(false);
  });

  it("status prints the persisted snapshot", async () => {
    await run(["check"]);
    output = [];

    await run(["status"]);

    expect(output).toEqual([
      "Line 29 (Harbour Express)",
      "Identity:    record-id",
      "Captured:    2026-03-01 09:00",
      "Disruptions: 1",
      "  - [X] Delay",
    ]);
  });

  it("status --json prints the load result", async () => {
    await run(["check"]);
    output = [];

    await run(["status", "--json"]);

    const parsed: unknown = JSON.parse(output.join("\n"));
    expect(parsed).toMatchObject({ status: "loaded", state: { lineId: "29", knownIds: ["X"] } });
  });

  it("status reports when nothing was recorded", async () => {
    await run(["status"]);
    expect(output).toEqual(["Line 29 (Harbour Express)", "No state recorded yet."]);
  });

  it("reset clears the persisted state", async () => {
    await run(["check"]);
    output = [];

    await run(["reset"]);

    expect(output).toEqual(["✅ State cleared for line 29"]);
    expect(existsSync(join(tmpDir, "state", "line-29.json"))).toBe(false);
  });

  it("config validate summarizes a valid config", async () => {
    vi.stubEnv("EMAIL_FROM", "");

    await run(["config", "validate"]);

    expect(output).toEqual([
      "✅ Config valid",
      "  Line:     29 (Harbour Express, bus)",
      "  Sources:  page-scrape",
      "  Channels: console",
      "  Interval: 300s",
      `  Data dir: ${tmpDir}`,
    ]);
    vi.unstubAllEnvs();
  });

  it("sets exit code 1 for an invalid config", async () => {
    await writeFile(join(tmpDir, "linewatch.yaml"), "line:\n  id: \"29\"\n  name: Harbour Express\n");

    await run(["check"]);

    expect(output).toEqual(["❌ Invalid configuration\n  - sources: Required"]);
    expect(process.exitCode).toBe(1);
  });
});

describe("formatOutcome", () => {
  it("renders skipped and failed cycles", () => {
    expect(formatOutcome({ status: "skipped", reason: "locked", detail: "held", durationMs: 1 })).toEqual([
      "⏭️  Cycle skipped (locked): held",
    ]);
    expect(formatOutcome({ status: "failed", error: "boom", durationMs: 1 })).toEqual(["❌ Cycle failed: boom"]);
  });
});
