/**
 * Notification policy — public surface.
 *
 * Usage:
 *   import { compose, channelsFor, NotificationDispatcher } from "./notification-policy/index.js";
 *
 *   const content = compose(transition.kind, transition.records, ctx);
 *   if (content) {
 *     const channels = channelsFor(transition.kind, policy, dispatcher.configuredChannels);
 *     await dispatcher.dispatch({ ...content, channels });
 *   }
 */

export {
  compose,
  formatRecord,
  formatTimestamp,
  resolvedBody,
  titleFor,
  truncate,
  TRUNCATION_MARKER,
} from "./composer.js";
export type { LineContext, ComposedNotification } from "./composer.js";

export { DEFAULT_DISPATCH_POLICY, resolveDispatchPolicy, channelsFor } from "./policy.js";
export type { DispatchPolicy } from "./policy.js";

export { NotificationDispatcher } from "./dispatcher.js";
export type {
  OutgoingNotification,
  DispatchOutcome,
  DispatcherOptions,
  NotifierRegistry,
} from "./dispatcher.js";
