/**
 * Poll cycle — one pass of fetch → reconcile → compose → dispatch → persist.
 *
 * Failure handling:
 * - Fetch failure: the cycle ends before reconciliation; state untouched.
 * - State read failure: fail open to the empty state (everything is new).
 * - Dispatch failure: isolated per channel; persistence still happens.
 * - State write failure: logged and reported; notifications already went out.
 * - Lock held by another live writer, or a snapshot older than the persisted
 *   one: the cycle is skipped without writing.
 *
 * runCycle never throws. Every outcome is returned to the caller.
 */

import type { Snapshot } from "../schemas/disruption.js";
import type { EventType } from "../schemas/event.js";
import type { IStateStore, StateLoadResult } from "../store/interfaces.js";
import { StateLockedError } from "../store/state-lock.js";
import { reconcile, type Transition } from "../reconcile/engine.js";
import {
  compose,
  channelsFor,
  type ComposedNotification,
  type DispatchOutcome,
  type DispatchPolicy,
  type LineContext,
  type NotificationDispatcher,
} from "../events/notification-policy/index.js";
import type { EventLogger } from "../events/logger.js";
import type { MonitorMetrics } from "../metrics/exporter.js";
import type { DisruptionSource } from "../sources/interfaces.js";
import { FetchFailure, errorMessage, type FetchFailureReason } from "../errors.js";

export interface CycleDependencies {
  source: DisruptionSource;
  store: IStateStore;
  dispatcher: NotificationDispatcher;
  policy: DispatchPolicy;
  context: LineContext;
  logger?: EventLogger;
  metrics?: MonitorMetrics;
  /** Clock for durations (tests). */
  now?: () => number;
}

export interface CycleOptions {
  fetchTimeoutMs: number;
}

export interface CompletedCycle {
  status: "completed";
  capturedAt: string;
  stateStatus: StateLoadResult["status"];
  transition: Transition;
  notification: ComposedNotification | null;
  dispatch: DispatchOutcome[];
  persisted: boolean;
  durationMs: number;
}

export interface FetchFailedCycle {
  status: "fetch-failed";
  reason: FetchFailureReason;
  error: string;
  durationMs: number;
}

export interface SkippedCycle {
  status: "skipped";
  reason: "locked" | "stale-snapshot";
  detail: string;
  durationMs: number;
}

export interface FailedCycle {
  status: "failed";
  error: string;
  durationMs: number;
}

export type CycleOutcome = CompletedCycle | FetchFailedCycle | SkippedCycle | FailedCycle;

type CycleResult = Omit<CompletedCycle, "durationMs"> | Omit<SkippedCycle, "durationMs">;

const LOG_PREFIX = "[linewatch]";

/** Event-log write that never aborts the cycle. */
async function record(
  deps: CycleDependencies,
  type: EventType,
  payload: Record<string, unknown> = {},
): Promise<void> {
  if (!deps.logger) return;
  try {
    await deps.logger.log(type, { lineId: deps.context.lineId, payload });
  } catch (err) {
    console.warn(`${LOG_PREFIX} Failed to write event ${type}: ${errorMessage(err)}`);
  }
}

function summarize(transition: Transition, ctx: LineContext): string {
  const count = transition.records.length;
  switch (transition.kind) {
    case "new":
      return `🆕 ${count} new disruption(s) on line ${ctx.lineId}`;
    case "updated":
      return `🔄 Disruptions updated on line ${ctx.lineId} (${count} active)`;
    case "ongoing":
      return `📊 Ongoing: ${count} disruption(s) on line ${ctx.lineId}`;
    case "resolved":
      return `✅ All disruptions on line ${ctx.lineId} have been resolved`;
    case "none":
      return `✅ No disruptions on line ${ctx.lineId}`;
  }
}

async function fetchSnapshot(deps: CycleDependencies, opts: CycleOptions): Promise<Snapshot> {
  try {
    return await deps.source.fetch({ timeoutMs: opts.fetchTimeoutMs });
  } catch (err) {
    if (err instanceof FetchFailure) throw err;
    throw new FetchFailure(deps.source.name, "network", errorMessage(err), { cause: err });
  }
}

async function reconcileLocked(deps: CycleDependencies, current: Snapshot): Promise<CycleResult> {
  const { store, context } = deps;

  const loaded = await store.load();
  if (loaded.status === "corrupt") {
    console.warn(`${LOG_PREFIX} Could not read previous state, starting fresh: ${loaded.error ?? "unknown error"}`);
    await record(deps, "state.read-failed", { error: loaded.error });
  }

  const previousCapturedAt = loaded.state.lastSnapshot?.capturedAt;
  if (previousCapturedAt && Date.parse(previousCapturedAt) > Date.parse(current.capturedAt)) {
    return {
      status: "skipped",
      reason: "stale-snapshot",
      detail: `Snapshot captured at ${current.capturedAt} is older than persisted ${previousCapturedAt}`,
    };
  }

  const { transition, next } = reconcile(loaded.state, current);
  console.info(`${LOG_PREFIX} ${summarize(transition, context)}`);
  deps.metrics?.recordTransition(transition.kind, current.records.length);
  if (transition.kind !== "none") {
    await record(deps, "transition.detected", {
      kind: transition.kind,
      newIds: transition.newIds,
      resolvedIds: transition.resolvedIds,
      recordCount: transition.records.length,
    });
  }

  const notification = compose(transition.kind, transition.records, context);
  let dispatch: DispatchOutcome[] = [];
  if (notification) {
    const channels = channelsFor(transition.kind, deps.policy, deps.dispatcher.configuredChannels);
    if (channels.length > 0) {
      dispatch = await deps.dispatcher.dispatch({ ...notification, channels });
      for (const outcome of dispatch) {
        deps.metrics?.recordNotification(outcome.channel, outcome.ok);
        await record(deps, outcome.ok ? "notification.sent" : "notification.failed", {
          channel: outcome.channel,
          title: notification.title,
          error: outcome.error,
        });
      }
    }
  }

  let persisted = true;
  try {
    await store.save(next);
  } catch (err) {
    persisted = false;
    deps.metrics?.recordStateWriteFailure();
    console.error(`${LOG_PREFIX} Could not save state (next cycle may notify again): ${errorMessage(err)}`);
    await record(deps, "state.write-failed", { error: errorMessage(err) });
  }

  return {
    status: "completed",
    capturedAt: current.capturedAt,
    stateStatus: loaded.status,
    transition,
    notification,
    dispatch,
    persisted,
  };
}

/** Run one poll cycle for the configured line. */
export async function runCycle(deps: CycleDependencies, opts: CycleOptions): Promise<CycleOutcome> {
  const now = deps.now ?? Date.now;
  const startedAt = now();
  const finish = <T extends object>(result: T): T & { durationMs: number } => {
    const durationMs = now() - startedAt;
    return { ...result, durationMs };
  };

  await record(deps, "cycle.started", { source: deps.source.name });

  let outcome: CycleOutcome;
  try {
    const current = await fetchSnapshot(deps, opts);
    outcome = finish(await deps.store.withLock(() => reconcileLocked(deps, current)));
  } catch (err) {
    if (err instanceof FetchFailure) {
      console.warn(`${LOG_PREFIX} Could not fetch data, retrying next cycle: ${err.message}`);
      await record(deps, "fetch.failed", { source: err.source, reason: err.reason, error: err.message });
      outcome = finish({ status: "fetch-failed" as const, reason: err.reason, error: err.message });
    } else if (err instanceof StateLockedError) {
      outcome = finish({ status: "skipped" as const, reason: "locked" as const, detail: err.message });
    } else {
      console.error(`${LOG_PREFIX} Cycle failed: ${errorMessage(err)}`);
      outcome = finish({ status: "failed" as const, error: errorMessage(err) });
    }
  }

  if (outcome.status === "skipped") {
    console.warn(`${LOG_PREFIX} Cycle skipped (${outcome.reason}): ${outcome.detail}`);
    await record(deps, "cycle.skipped", { reason: outcome.reason, detail: outcome.detail });
  } else if (outcome.status === "completed") {
    await record(deps, "cycle.completed", {
      kind: outcome.transition.kind,
      persisted: outcome.persisted,
      durationMs: outcome.durationMs,
    });
  }

  deps.metrics?.recordCycle(outcome.status, outcome.durationMs / 1000);
  return outcome;
}
