/**
 * linewatch — public API.
 */

export * from "./schemas/index.js";
export * from "./reconcile/index.js";
export * from "./events/notification-policy/index.js";
export type { Notifier } from "./events/notifier.js";
export { MockNotifier } from "./events/notifier.js";
export { EventLogger } from "./events/logger.js";
export * from "./store/index.js";
export * from "./sources/index.js";
export { createNotifiers, ConsoleNotifier, DesktopNotifier, EmailNotifier } from "./adapters/index.js";
export { loadConfig, parseConfig, applyEnv, ConfigError, CONFIG_FILENAME } from "./config/index.js";
export { runCycle } from "./monitor/cycle.js";
export type { CycleOutcome, CycleDependencies, CycleOptions } from "./monitor/cycle.js";
export { createCycleDependencies, lineContextFrom } from "./monitor/factory.js";
export { MonitorService } from "./service/monitor-service.js";
export type { MonitorServiceStatus } from "./service/monitor-service.js";
export { MonitorMetrics } from "./metrics/exporter.js";
export { startMonitorDaemon } from "./daemon/daemon.js";
export { FetchFailure } from "./errors.js";
export type { FetchFailureReason } from "./errors.js";
