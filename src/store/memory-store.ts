/**
 * In-process state store. Holds a deep copy of the last saved state, so
 * callers cannot mutate what was persisted.
 */

import type { PersistedState } from "../schemas/disruption.js";
import { emptyState } from "../reconcile/engine.js";
import type { IStateStore, StateLoadResult } from "./interfaces.js";
import { StateLockedError } from "./state-lock.js";

export class MemoryStateStore implements IStateStore {
  readonly lineId: string;
  private stored: PersistedState | null;
  private locked = false;

  constructor(lineId: string, initial?: PersistedState) {
    this.lineId = lineId;
    this.stored = initial ? structuredClone(initial) : null;
  }

  async load(): Promise<StateLoadResult> {
    if (!this.stored) return { state: emptyState(this.lineId), status: "missing" };
    return { state: structuredClone(this.stored), status: "loaded" };
  }

  async save(state: PersistedState): Promise<void> {
    this.stored = structuredClone(state);
  }

  async clear(): Promise<void> {
    this.stored = null;
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    if (this.locked) throw new StateLockedError(`memory:${this.lineId}`, process.pid);
    this.locked = true;
    try {
      return await fn();
    } finally {
      this.locked = false;
    }
  }
}
