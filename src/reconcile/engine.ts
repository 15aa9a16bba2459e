/**
 * Reconciliation engine — classifies what changed between the previous
 * persisted state and a freshly captured snapshot.
 *
 * Pipeline:
 *   (PersistedState, Snapshot) → identity keys → set diff → classify → next state
 *
 * Classification precedence (first match wins):
 *   new → updated → ongoing → resolved → none
 *
 * `new` suppresses `updated` even when some ids also resolved in the same
 * cycle. This ordering is policy; do not reorder.
 *
 * The function is pure: no clock reads, no counters. The next state is
 * derived only from its inputs, so reconciling the same pair twice yields
 * identical results.
 */

import { createHash } from "node:crypto";
import {
  STATE_VERSION,
  type DisruptionRecord,
  type IdentityMode,
  type PersistedState,
  type Snapshot,
  type TransitionKind,
} from "../schemas/disruption.js";

export interface Transition {
  kind: TransitionKind;
  /** Records that explain the transition, in snapshot order. */
  records: DisruptionRecord[];
  /** Identity keys present now but not before. */
  newIds: string[];
  /** Identity keys present before but not now. */
  resolvedIds: string[];
}

export interface ReconcileResult {
  transition: Transition;
  next: PersistedState;
}

/** Prefix of the single identity key used in snapshot-digest mode. */
export const DIGEST_KEY_PREFIX = "snapshot:";

/** State for a line that has never been reconciled. */
export function emptyState(lineId: string): PersistedState {
  return {
    version: STATE_VERSION,
    lineId,
    identity: "record-id",
    lastSnapshot: null,
    knownIds: [],
  };
}

/**
 * Identity mode for a snapshot: per-record ids when every record has one,
 * otherwise the snapshot as a whole is identified by its content digest.
 */
export function identityModeOf(snapshot: Snapshot): IdentityMode {
  return snapshot.records.every((record) => record.id !== undefined)
    ? "record-id"
    : "snapshot-digest";
}

/**
 * Content digest over the records and their count. Record order does not
 * contribute: the same records in any order share a digest.
 */
export function snapshotDigest(records: readonly DisruptionRecord[]): string {
  const canonical = records
    .map((record) => JSON.stringify([
      record.header,
      record.details ?? null,
      record.activePeriods.map((period) => [period.start ?? null, period.end ?? null]),
      record.severity ?? null,
      record.cause ?? null,
      record.effect ?? null,
    ]))
    .sort();
  const hash = createHash("sha256")
    .update(JSON.stringify({ count: records.length, records: canonical }))
    .digest("hex");
  return `${DIGEST_KEY_PREFIX}${hash.slice(0, 16)}`;
}

/** Identity keys for a snapshot under the given mode. */
export function identityKeys(snapshot: Snapshot, mode: IdentityMode): Set<string> {
  if (snapshot.records.length === 0) return new Set();
  if (mode === "snapshot-digest") return new Set([snapshotDigest(snapshot.records)]);

  const keys = new Set<string>();
  for (const record of snapshot.records) {
    if (record.id !== undefined) keys.add(record.id);
  }
  return keys;
}

function difference(a: ReadonlySet<string>, b: ReadonlySet<string>): string[] {
  return [...a].filter((key) => !b.has(key)).sort();
}

function classifyById(
  current: Snapshot,
  previousIds: ReadonlySet<string>,
  currentIds: ReadonlySet<string>,
  newIds: readonly string[],
  resolvedIds: readonly string[],
): Omit<Transition, "newIds" | "resolvedIds"> {
  const hasRecords = current.records.length > 0;

  if (hasRecords && newIds.length > 0) {
    const fresh = new Set(newIds);
    return {
      kind: "new",
      records: current.records.filter((record) => record.id !== undefined && fresh.has(record.id)),
    };
  }
  if (hasRecords && resolvedIds.length > 0 && currentIds.size > 0) {
    return { kind: "updated", records: [...current.records] };
  }
  if (hasRecords) {
    return { kind: "ongoing", records: [...current.records] };
  }
  if (previousIds.size > 0) {
    return { kind: "resolved", records: [] };
  }
  return { kind: "none", records: [] };
}

/**
 * Degraded classification: without per-record ids only "something appeared",
 * "something changed" and "everything went away" can be told apart.
 */
function classifyByDigest(
  current: Snapshot,
  previousIds: ReadonlySet<string>,
  currentIds: ReadonlySet<string>,
): Omit<Transition, "newIds" | "resolvedIds"> {
  const hasRecords = current.records.length > 0;

  if (hasRecords && previousIds.size === 0) {
    return { kind: "new", records: [...current.records] };
  }
  if (hasRecords && [...currentIds].some((key) => !previousIds.has(key))) {
    return { kind: "updated", records: [...current.records] };
  }
  if (hasRecords) {
    return { kind: "ongoing", records: [...current.records] };
  }
  if (previousIds.size > 0) {
    return { kind: "resolved", records: [] };
  }
  return { kind: "none", records: [] };
}

/**
 * Compare the current snapshot against the previous state.
 *
 * The next state is produced unconditionally — the store is rewritten every
 * cycle regardless of classification, so a transient gap heals on the next
 * successful poll.
 */
export function reconcile(previous: Readonly<PersistedState>, current: Snapshot): ReconcileResult {
  const mode = identityModeOf(current);
  const previousIds: ReadonlySet<string> = new Set(previous.knownIds);
  const currentIds = identityKeys(current, mode);

  const newIds = difference(currentIds, previousIds);
  const resolvedIds = difference(previousIds, currentIds);

  const classified = mode === "record-id"
    ? classifyById(current, previousIds, currentIds, newIds, resolvedIds)
    : classifyByDigest(current, previousIds, currentIds);

  return {
    transition: { ...classified, newIds, resolvedIds },
    next: {
      version: STATE_VERSION,
      lineId: previous.lineId,
      identity: mode,
      lastSnapshot: current,
      knownIds: [...currentIds].sort(),
    },
  };
}
