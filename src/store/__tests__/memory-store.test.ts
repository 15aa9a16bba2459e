import { describe, it, expect } from "vitest";
import { MemoryStateStore } from "../memory-store.js";
import { StateLockedError } from "../state-lock.js";
import { emptyState, reconcile } from "../../reconcile/engine.js";

const state = reconcile(emptyState("42"), {
  capturedAt: "2026-03-01T08:00:00.000Z",
  records: [{ id: "A", header: "Delay", activePeriods: [] }],
}).next;

describe("MemoryStateStore", () => {
  it("starts missing without an initial state", async () => {
    const store = new MemoryStateStore("42");
    expect(await store.load()).toEqual({ state: emptyState("42"), status: "missing" });
  });

  it("returns copies of the saved state", async () => {
    const store = new MemoryStateStore("42");
    await store.save(state);

    const first = await store.load();
    first.state.knownIds.push("mutated");

    expect((await store.load()).state.knownIds).toEqual(["A"]);
  });

  it("rejects re-entrant locking", async () => {
    const store = new MemoryStateStore("42", state);

    await store.withLock(async () => {
      await expect(store.withLock(async () => undefined)).rejects.toBeInstanceOf(StateLockedError);
    });
    await expect(store.withLock(async () => "free")).resolves.toBe("free");
  });
});
