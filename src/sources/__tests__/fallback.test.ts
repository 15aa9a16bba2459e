import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { FallbackSource } from "../fallback.js";
import type { DisruptionSource } from "../interfaces.js";
import { FetchFailure } from "../../errors.js";
import type { Snapshot } from "../../schemas/disruption.js";

const snapshot: Snapshot = { capturedAt: "2026-03-01T08:00:00.000Z", records: [] };

function failing(name: string): DisruptionSource {
  return {
    name,
    fetch: vi.fn(async () => {
      throw new FetchFailure(name, "network", "down");
    }),
  };
}

function working(name: string): DisruptionSource {
  return { name, fetch: vi.fn(async () => snapshot) };
}

describe("FallbackSource", () => {
  beforeEach(() => {
    vi.spyOn(console, "warn").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("names itself after its chain", () => {
    expect(new FallbackSource([working("a"), working("b")]).name).toBe("a → b");
    expect(new FallbackSource([]).name).toBe("fallback");
  });

  it("returns the first successful snapshot", async () => {
    const second = working("b");
    const third = working("c");
    const source = new FallbackSource([failing("a"), second, third]);

    await expect(source.fetch({ timeoutMs: 1_000 })).resolves.toBe(snapshot);
    expect(third.fetch).not.toHaveBeenCalled();
    expect(console.warn).toHaveBeenCalledWith("[linewatch] Source a failed: [a] down");
  });

  it("throws the last failure when every source fails", async () => {
    const source = new FallbackSource([failing("a"), failing("b")]);
    await expect(source.fetch({ timeoutMs: 1_000 })).rejects.toThrow("[b] down");
  });

  it("fails without sources", async () => {
    await expect(new FallbackSource([]).fetch({ timeoutMs: 1_000 })).rejects.toThrow(
      "[fallback] No sources configured",
    );
  });
});
