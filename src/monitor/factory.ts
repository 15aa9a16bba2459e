/**
 * Wiring — builds cycle dependencies from a validated configuration.
 */

import { join } from "node:path";
import type { MonitorConfig } from "../schemas/config.js";
import { FilesystemStateStore } from "../store/state-store.js";
import type { IStateStore } from "../store/interfaces.js";
import { EventLogger } from "../events/logger.js";
import {
  NotificationDispatcher,
  resolveDispatchPolicy,
  type LineContext,
  type NotifierRegistry,
} from "../events/notification-policy/index.js";
import { createNotifiers } from "../adapters/index.js";
import { createSourceChain } from "../sources/index.js";
import type { DisruptionSource } from "../sources/interfaces.js";
import type { MonitorMetrics } from "../metrics/exporter.js";
import type { CycleDependencies } from "./cycle.js";

export interface DependencyOverrides {
  source?: DisruptionSource;
  store?: IStateStore;
  notifiers?: NotifierRegistry;
  logger?: EventLogger;
  metrics?: MonitorMetrics;
}

export function lineContextFrom(config: MonitorConfig): LineContext {
  return {
    lineId: config.line.id,
    lineName: config.line.name,
    statusUrl: config.statusUrl,
    timeZone: config.timeZone,
    detailsLimit: config.detailsLimit,
  };
}

export function createCycleDependencies(
  config: MonitorConfig,
  overrides: DependencyOverrides = {},
): CycleDependencies {
  return {
    source: overrides.source ?? createSourceChain(config),
    store: overrides.store ?? new FilesystemStateStore(config.dataDir, config.line.id),
    dispatcher: new NotificationDispatcher(overrides.notifiers ?? createNotifiers(config.channels), {
      timeoutMs: config.dispatchTimeoutMs,
    }),
    policy: resolveDispatchPolicy(config.dispatchPolicy),
    context: lineContextFrom(config),
    logger: overrides.logger ?? new EventLogger(join(config.dataDir, "events")),
    metrics: overrides.metrics,
  };
}
