/**
 * IStateStore — persistence contract for per-line reconciliation state.
 *
 * Current implementations: FilesystemStateStore (JSON file, atomic writes,
 * PID lock) and MemoryStateStore (in-process).
 */

import type { PersistedState } from "../schemas/disruption.js";

/**
 * Result of loading state. Read failures never throw: a missing or corrupt
 * file degrades to the empty state so the next reconciliation reports
 * everything current as new.
 */
export interface StateLoadResult {
  state: PersistedState;
  status: "loaded" | "missing" | "corrupt";
  /** Why a corrupt state was discarded. */
  error?: string;
}

export interface IStateStore {
  /** Line the state belongs to. */
  readonly lineId: string;

  /** Load the last persisted state; fail-open on read errors. */
  load(): Promise<StateLoadResult>;

  /**
   * Persist a new state atomically.
   * Throws on failure; callers log and carry on.
   */
  save(state: PersistedState): Promise<void>;

  /** Remove persisted state. The next load reports "missing". */
  clear(): Promise<void>;

  /**
   * Run `fn` with exclusive write access to this line's state.
   * Throws StateLockedError when another live writer holds it.
   */
  withLock<T>(fn: () => Promise<T>): Promise<T>;
}
