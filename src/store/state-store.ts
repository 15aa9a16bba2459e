/**
 * State store — filesystem-backed persistence of reconciliation state.
 *
 * One JSON file per monitored line:
 *   dataDir/state/line-<lineId>.json
 *
 * Writes go through write-file-atomic (temp file + rename), so a crash
 * mid-write never leaves a truncated state behind. Cycles take the sibling
 * `.lock` file for their read-then-write so overlapping ticks cannot
 * overwrite each other.
 */

import { mkdir, readFile, rm } from "node:fs/promises";
import { join, resolve } from "node:path";
import writeFileAtomic from "write-file-atomic";
import { PersistedState } from "../schemas/disruption.js";
import { emptyState } from "../reconcile/engine.js";
import { errnoCode, errorMessage } from "../errors.js";
import type { IStateStore, StateLoadResult } from "./interfaces.js";
import { acquireLock, releaseLock } from "./state-lock.js";

/** Filesystem-safe form of a line id. */
export function stateFilename(lineId: string): string {
  const safe = lineId.replace(/[^A-Za-z0-9._-]/g, "_");
  return `line-${safe}.json`;
}

export class FilesystemStateStore implements IStateStore {
  readonly lineId: string;
  readonly stateDir: string;
  readonly statePath: string;
  readonly lockPath: string;

  constructor(dataDir: string, lineId: string) {
    this.lineId = lineId;
    this.stateDir = resolve(dataDir, "state");
    this.statePath = join(this.stateDir, stateFilename(lineId));
    this.lockPath = `${this.statePath}.lock`;
  }

  async load(): Promise<StateLoadResult> {
    let content: string;
    try {
      content = await readFile(this.statePath, "utf-8");
    } catch (err) {
      if (errnoCode(err) === "ENOENT") {
        return { state: emptyState(this.lineId), status: "missing" };
      }
      return { state: emptyState(this.lineId), status: "corrupt", error: errorMessage(err) };
    }

    let raw: unknown;
    try {
      raw = JSON.parse(content);
    } catch (err) {
      return { state: emptyState(this.lineId), status: "corrupt", error: `Invalid JSON: ${errorMessage(err)}` };
    }

    const parsed = PersistedState.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
      return { state: emptyState(this.lineId), status: "corrupt", error: issues.join("; ") };
    }
    if (parsed.data.lineId !== this.lineId) {
      return {
        state: emptyState(this.lineId),
        status: "corrupt",
        error: `State belongs to line ${parsed.data.lineId}, expected ${this.lineId}`,
      };
    }

    return { state: parsed.data, status: "loaded" };
  }

  async save(state: PersistedState): Promise<void> {
    await mkdir(this.stateDir, { recursive: true });
    await writeFileAtomic(this.statePath, JSON.stringify(state, null, 2) + "\n");
  }

  async clear(): Promise<void> {
    await rm(this.statePath, { force: true });
  }

  async withLock<T>(fn: () => Promise<T>): Promise<T> {
    await mkdir(this.stateDir, { recursive: true });
    await acquireLock(this.lockPath);
    try {
      return await fn();
    } finally {
      await releaseLock(this.lockPath);
    }
  }
}
