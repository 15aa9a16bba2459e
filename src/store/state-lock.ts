/**
 * State lock — single-writer guard for a state file.
 *
 * The lock is a sibling file holding the owner's PID. It is published with
 * `link()` from a private temp file, so it never exists without its PID.
 * A lock whose owner is no longer running is stale and is reclaimed; the
 * reclaim itself runs under a second `.reclaim` lock so two reclaimers
 * cannot remove each other's fresh lock.
 */

import { randomUUID } from "node:crypto";
import { link, readFile, stat, unlink, writeFile } from "node:fs/promises";
import { errnoCode } from "../errors.js";

/** A lock without a readable PID counts as held until it is this old. */
export const UNREADABLE_LOCK_GRACE_MS = 30_000;

export class StateLockedError extends Error {
  readonly lockPath: string;
  readonly ownerPid: number;

  constructor(lockPath: string, ownerPid: number) {
    super(`State is locked by PID ${ownerPid} (${lockPath})`);
    this.name = "StateLockedError";
    this.lockPath = lockPath;
    this.ownerPid = ownerPid;
  }
}

export function isProcessRunning(pid: number): boolean {
  try {
    process.kill(pid, 0); // Signal 0 checks existence
    return true;
  } catch (err) {
    // EPERM: the process exists but belongs to someone else
    return errnoCode(err) === "EPERM";
  }
}

interface LockHolder {
  held: boolean;
  /** Owner PID, -1 when absent or unreadable. */
  owner: number;
}

async function modifiedAt(path: string): Promise<number | null> {
  try {
    return (await stat(path)).mtimeMs;
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return null;
    throw err;
  }
}

async function lockHolder(path: string): Promise<LockHolder> {
  let content: string;
  try {
    content = await readFile(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") return { held: false, owner: -1 };
    throw err;
  }

  const pid = parseInt(content.trim(), 10);
  if (!Number.isNaN(pid)) {
    // Our own PID means a re-entrant acquire in this process: still held
    return { held: pid === process.pid || isProcessRunning(pid), owner: pid };
  }

  const mtime = await modifiedAt(path);
  return {
    held: mtime !== null && Date.now() - mtime < UNREADABLE_LOCK_GRACE_MS,
    owner: -1,
  };
}

async function tryCreate(path: string): Promise<boolean> {
  const tempPath = `${path}.${randomUUID()}.tmp`;
  await writeFile(tempPath, String(process.pid), { encoding: "utf-8", flag: "wx" });
  try {
    await link(tempPath, path);
    return true;
  } catch (err) {
    if (errnoCode(err) === "EEXIST") return false;
    throw err;
  } finally {
    await unlink(tempPath);
  }
}

async function throwIfHeld(lockPath: string): Promise<void> {
  const holder = await lockHolder(lockPath);
  if (holder.held) throw new StateLockedError(lockPath, holder.owner);
}

async function acquireReclaimGuard(lockPath: string): Promise<string> {
  const guardPath = `${lockPath}.reclaim`;
  if (await tryCreate(guardPath)) return guardPath;

  // Another writer is reclaiming, unless it died mid-reclaim
  if ((await lockHolder(guardPath)).held) {
    throw new StateLockedError(lockPath, (await lockHolder(lockPath)).owner);
  }
  await releaseLock(guardPath);
  if (!(await tryCreate(guardPath))) {
    throw new StateLockedError(lockPath, (await lockHolder(lockPath)).owner);
  }
  return guardPath;
}

/** Acquire the lock or throw StateLockedError. */
export async function acquireLock(lockPath: string): Promise<void> {
  if (await tryCreate(lockPath)) return;
  await throwIfHeld(lockPath);

  const guardPath = await acquireReclaimGuard(lockPath);
  try {
    // The lock may have changed hands since it was first read
    await throwIfHeld(lockPath);
    await releaseLock(lockPath);
    if (!(await tryCreate(lockPath))) {
      throw new StateLockedError(lockPath, (await lockHolder(lockPath)).owner);
    }
  } finally {
    await releaseLock(guardPath);
  }
}

export async function releaseLock(lockPath: string): Promise<void> {
  try {
    await unlink(lockPath);
  } catch (err) {
    if (errnoCode(err) !== "ENOENT") throw err;
  }
}
