/**
 * Event log schema — JSONL event stream recording every poll cycle.
 *
 * Each cycle, fetch failure, detected transition, and notification attempt
 * is recorded as one event. This feeds:
 * - the operator's audit trail (`linewatch status`, log inspection)
 * - Prometheus counters in daemon mode
 */

import { z } from "zod";

/** Event types — exhaustive list of observable actions. */
export const EventType = z.enum([
  // Lifecycle
  "monitor.startup",
  "monitor.shutdown",

  // Poll cycle
  "cycle.started",
  "cycle.completed",
  "cycle.skipped",
  "fetch.failed",

  // Persistence
  "state.read-failed",
  "state.write-failed",

  // Reconciliation
  "transition.detected",

  // Delivery
  "notification.sent",
  "notification.failed",
]);
export type EventType = z.infer<typeof EventType>;

/** Base event structure. */
export const BaseEvent = z.object({
  /** Monotonic event ID (set by event logger). */
  eventId: z.number().int().positive(),
  /** Event type. */
  type: EventType,
  /** ISO-8601 timestamp. */
  timestamp: z.string().datetime(),
  /** Line identifier the event concerns. */
  lineId: z.string().optional(),
  /** Event-specific payload. */
  payload: z.record(z.string(), z.unknown()).default({}),
});
export type BaseEvent = z.infer<typeof BaseEvent>;
