import type { CycleOutcome } from "../monitor/cycle.js";

export interface HealthStatus {
  status: "healthy" | "unhealthy";
  lineId: string;
  uptime: number;
  /** Epoch ms of the last finished cycle, null before the first. */
  lastCycleAt: number | null;
  lastOutcome: CycleOutcome["status"] | null;
  lastError: string | null;
}

export interface DaemonState {
  lineId: string;
  startedAt: number;
  pollIntervalMs: number;
  lastCycleAt?: number;
  lastOutcome?: CycleOutcome["status"];
  lastError?: string;
}

/** A monitor that missed this many intervals is considered stuck. */
export const STALE_INTERVALS = 3;

export function getHealthStatus(state: DaemonState, now: number = Date.now()): HealthStatus {
  const reference = state.lastCycleAt ?? state.startedAt;
  const isStale = now - reference > STALE_INTERVALS * state.pollIntervalMs;

  return {
    status: isStale ? "unhealthy" : "healthy",
    lineId: state.lineId,
    uptime: now - state.startedAt,
    lastCycleAt: state.lastCycleAt ?? null,
    lastOutcome: state.lastOutcome ?? null,
    lastError: state.lastError ?? null,
  };
}
