/**
 * Disruption schemas — the normalized record shape every source produces,
 * the snapshot handed to the reconciliation engine, and the state persisted
 * between poll cycles.
 *
 * Snapshots are created once per poll and never mutated afterwards.
 */

import { z } from "zod";

/** Active period of a disruption. Either bound may be absent (open-ended). */
export const ActivePeriod = z.object({
  /** ISO-8601 start timestamp. */
  start: z.string().min(1).optional(),
  /** ISO-8601 end timestamp. */
  end: z.string().min(1).optional(),
});
export type ActivePeriod = z.infer<typeof ActivePeriod>;

/** Opaque classification code, passed through unmodified. */
export const ClassificationCode = z.union([z.number(), z.string()]);
export type ClassificationCode = z.infer<typeof ClassificationCode>;

export const DisruptionRecord = z.object({
  /** Stable upstream identifier. Absent when the source has none. */
  id: z.string().min(1).optional(),
  /** Short human-readable summary. */
  header: z.string(),
  /** Longer free-text description. */
  details: z.string().optional(),
  activePeriods: z.array(ActivePeriod).default([]),
  severity: ClassificationCode.optional(),
  cause: ClassificationCode.optional(),
  effect: ClassificationCode.optional(),
});
export type DisruptionRecord = z.infer<typeof DisruptionRecord>;

/** Full set of reported disruptions for the monitored line at one poll time. */
export const Snapshot = z
  .object({
    capturedAt: z.string().datetime(),
    records: z.array(DisruptionRecord),
  })
  .superRefine((snapshot, ctx) => {
    const seen = new Set<string>();
    snapshot.records.forEach((record, index) => {
      if (record.id === undefined) return;
      if (seen.has(record.id)) {
        ctx.addIssue({
          code: z.ZodIssueCode.custom,
          path: ["records", index, "id"],
          message: `Duplicate disruption id: ${record.id}`,
        });
      }
      seen.add(record.id);
    });
  });
export type Snapshot = z.infer<typeof Snapshot>;

/**
 * How disruptions are identified across polls.
 *   record-id        — per-record upstream ids
 *   snapshot-digest  — no ids available; the whole snapshot is one key
 */
export const IdentityMode = z.enum(["record-id", "snapshot-digest"]);
export type IdentityMode = z.infer<typeof IdentityMode>;

/** Current on-disk state format version. */
export const STATE_VERSION = 1;

export const PersistedState = z.object({
  version: z.literal(STATE_VERSION),
  lineId: z.string().min(1),
  identity: IdentityMode,
  /** Most recently reconciled snapshot; null before the first cycle. */
  lastSnapshot: Snapshot.nullable(),
  /** Identity keys observed in lastSnapshot, sorted. */
  knownIds: z.array(z.string()),
});
export type PersistedState = z.infer<typeof PersistedState>;

/** Transition classification, in precedence order. */
export const TransitionKind = z.enum([
  "none",      // No disruptions before or now
  "new",       // At least one disruption not seen before
  "updated",   // Some disruptions ended while others remain
  "ongoing",   // Same disruptions as last poll
  "resolved",  // Disruptions existed before, none now
]);
export type TransitionKind = z.infer<typeof TransitionKind>;

/** Notification delivery mechanisms. */
export const ChannelKind = z.enum(["desktop", "email", "console"]);
export type ChannelKind = z.infer<typeof ChannelKind>;
