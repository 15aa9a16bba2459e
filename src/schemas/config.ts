/**
 * Monitor configuration schema (linewatch.yaml).
 *
 * Every field has a default except the line itself, so the smallest valid
 * file names the line and one source.
 */

import { z } from "zod";
import { ChannelKind } from "./disruption.js";

export const LineConfig = z.object({
  /** Line identifier as published by the agency (e.g. "29"). */
  id: z.string().min(1),
  /** Display name used in notifications. */
  name: z.string().min(1),
  /** Traffic type the line belongs to, for sources that group by mode. */
  transportMode: z.string().default("bus"),
  /** Explicit GTFS route ids. When empty, route ids are matched on the line id. */
  routeIds: z.array(z.string()).default([]),
});
export type LineConfig = z.infer<typeof LineConfig>;

export const TrafficSituationSourceConfig = z.object({
  kind: z.literal("traffic-situation"),
  url: z.string().url(),
  apiKey: z.string().optional(),
});

export const GtfsAlertsSourceConfig = z.object({
  kind: z.literal("gtfs-alerts"),
  url: z.string().url(),
  apiKey: z.string().optional(),
  /** Preferred translation language for alert texts. */
  language: z.string().default("sv"),
});

export const PageScrapeSourceConfig = z.object({
  kind: z.literal("page-scrape"),
  url: z.string().url(),
  /** Words that indicate a disruption when found on the page. */
  keywords: z.array(z.string().min(1)).default(["disruption", "delay", "störning", "förseningar"]),
});

export const SourceConfig = z.discriminatedUnion("kind", [
  TrafficSituationSourceConfig,
  GtfsAlertsSourceConfig,
  PageScrapeSourceConfig,
]);
export type SourceConfig = z.infer<typeof SourceConfig>;

export const EmailChannelConfig = z.object({
  enabled: z.boolean().default(false),
  from: z.string().optional(),
  to: z.string().optional(),
  password: z.string().optional(),
  host: z.string().default("smtp.gmail.com"),
  port: z.number().int().positive().default(587),
});
export type EmailChannelConfig = z.infer<typeof EmailChannelConfig>;

export const ChannelsConfig = z.object({
  console: z.object({ enabled: z.boolean().default(true) }).default({}),
  desktop: z.object({ enabled: z.boolean().default(true) }).default({}),
  email: EmailChannelConfig.default({}),
});
export type ChannelsConfig = z.infer<typeof ChannelsConfig>;

/** A policy entry: every configured channel, or an explicit list. */
export const ChannelSelector = z.union([z.literal("all"), z.array(ChannelKind)]);
export type ChannelSelector = z.infer<typeof ChannelSelector>;

/** Only kinds that dispatch can be overridden; ongoing and none never notify. */
export const DispatchPolicyOverrides = z
  .object({ new: ChannelSelector, updated: ChannelSelector, resolved: ChannelSelector })
  .partial()
  .strict();
export type DispatchPolicyOverrides = z.infer<typeof DispatchPolicyOverrides>;

export const HealthConfig = z.object({
  enabled: z.boolean().default(true),
  port: z.number().int().min(0).max(65535).default(18090),
  bind: z.string().default("127.0.0.1"),
});

export const MonitorConfig = z.object({
  line: LineConfig,
  /** Directory for state, events and the daemon PID file. */
  dataDir: z.string().min(1),
  pollIntervalMs: z.number().int().positive().default(300_000),
  fetchTimeoutMs: z.number().int().positive().default(10_000),
  dispatchTimeoutMs: z.number().int().positive().default(15_000),
  /** Maximum characters of details per record before truncation. */
  detailsLimit: z.number().int().positive().default(300),
  /** IANA time zone for rendering active periods. */
  timeZone: z.string().default("Europe/Stockholm"),
  /** Link appended to notification bodies. */
  statusUrl: z.string().url().optional(),
  sources: z.array(SourceConfig).min(1, "At least one source is required"),
  channels: ChannelsConfig.default({}),
  dispatchPolicy: DispatchPolicyOverrides.default({}),
  health: HealthConfig.default({}),
});
export type MonitorConfig = z.infer<typeof MonitorConfig>;
