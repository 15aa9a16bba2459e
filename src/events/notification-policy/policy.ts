/**
 * Dispatch policy — maps transition kinds to notification channels.
 *
 * The table is data, not code: hosts override individual entries from
 * configuration. `ongoing` and `none` never dispatch and cannot be
 * overridden.
 */

import type { ChannelKind, TransitionKind } from "../../schemas/disruption.js";
import type { ChannelSelector, DispatchPolicyOverrides } from "../../schemas/config.js";

export type DispatchPolicy = Readonly<Record<TransitionKind, ChannelSelector>>;

export const DEFAULT_DISPATCH_POLICY: DispatchPolicy = {
  new: "all",
  updated: "all",
  resolved: ["desktop", "console"],
  ongoing: [],
  none: [],
};

/** Merge configuration overrides onto the default table. */
export function resolveDispatchPolicy(
  overrides: DispatchPolicyOverrides = {},
  base: DispatchPolicy = DEFAULT_DISPATCH_POLICY,
): DispatchPolicy {
  return {
    new: overrides.new ?? base.new,
    updated: overrides.updated ?? base.updated,
    resolved: overrides.resolved ?? base.resolved,
    ongoing: [],
    none: [],
  };
}

/**
 * Channels a transition dispatches to: the policy entry intersected with the
 * configured channels, de-duplicated, in configured order.
 */
export function channelsFor(
  kind: TransitionKind,
  policy: DispatchPolicy,
  configured: readonly ChannelKind[],
): ChannelKind[] {
  if (kind === "none" || kind === "ongoing") return [];

  const selector = policy[kind];
  const wanted = new Set<ChannelKind>(selector === "all" ? configured : selector);
  return Array.from(new Set(configured)).filter((channel) => wanted.has(channel));
}
