/**
 * Schema barrel export — all Zod schemas for linewatch.
 */

export {
  ActivePeriod,
  ClassificationCode,
  DisruptionRecord,
  Snapshot,
  IdentityMode,
  PersistedState,
  STATE_VERSION,
  TransitionKind,
  ChannelKind,
} from "./disruption.js";

export {
  EventType,
  BaseEvent,
} from "./event.js";

export {
  LineConfig,
  SourceConfig,
  TrafficSituationSourceConfig,
  GtfsAlertsSourceConfig,
  PageScrapeSourceConfig,
  EmailChannelConfig,
  ChannelsConfig,
  ChannelSelector,
  DispatchPolicyOverrides,
  HealthConfig,
  MonitorConfig,
} from "./config.js";
