/**
 * Notification composer — renders title and body for a transition.
 *
 * Pure string formatting. Record order in the body follows the order the
 * reconciliation engine returned them in; nothing is re-sorted here.
 */

import type { ActivePeriod, DisruptionRecord, TransitionKind } from "../../schemas/disruption.js";

/** Line-level parameters injected by the host. */
export interface LineContext {
  lineId: string;
  lineName: string;
  /** Link appended to record-bearing bodies. */
  statusUrl?: string;
  /** IANA time zone for active-period bounds. */
  timeZone: string;
  /** Maximum characters of details per record. */
  detailsLimit: number;
}

export interface ComposedNotification {
  title: string;
  body: string;
}

export const TRUNCATION_MARKER = "...";

/**
 * Cut `text` to `limit` characters, appending the truncation marker when cut.
 * Counts code points, so a cut never splits a surrogate pair.
 */
export function truncate(text: string, limit: number): string {
  const chars = Array.from(text);
  if (chars.length <= limit) return text;
  return chars.slice(0, limit).join("") + TRUNCATION_MARKER;
}

/**
 * Render an ISO timestamp as `YYYY-MM-DD HH:mm` in the given time zone.
 * Unparseable values are returned as-is.
 */
export function formatTimestamp(value: string, timeZone: string): string {
  const date = new Date(value);
  if (Number.isNaN(date.getTime())) return value;

  const parts = new Intl.DateTimeFormat("en-GB", {
    timeZone,
    year: "numeric",
    month: "2-digit",
    day: "2-digit",
    hour: "2-digit",
    minute: "2-digit",
    hourCycle: "h23",
  }).formatToParts(date);

  const part = (type: Intl.DateTimeFormatPartTypes): string =>
    parts.find((p) => p.type === type)?.value ?? "";

  return `${part("year")}-${part("month")}-${part("day")} ${part("hour")}:${part("minute")}`;
}

function formatPeriod(period: ActivePeriod, timeZone: string): string[] {
  const lines: string[] = [];
  if (period.start) lines.push(`   From: ${formatTimestamp(period.start, timeZone)}`);
  if (period.end) lines.push(`   Until: ${formatTimestamp(period.end, timeZone)}`);
  return lines;
}

/** Render one record as its numbered block. */
export function formatRecord(record: DisruptionRecord, index: number, ctx: LineContext): string {
  const lines = [`Disruption ${index}:`, `   ${record.header}`];
  if (record.details) {
    lines.push(`   ${truncate(record.details, ctx.detailsLimit)}`);
  }
  for (const period of record.activePeriods) {
    lines.push(...formatPeriod(period, ctx.timeZone));
  }
  return lines.join("\n");
}

function formatRecordList(records: readonly DisruptionRecord[], ctx: LineContext): string {
  const blocks = records.map((record, i) => formatRecord(record, i + 1, ctx));
  if (ctx.statusUrl) blocks.push(`More information: ${ctx.statusUrl}`);
  return blocks.join("\n\n");
}

/** Notification title for a kind. */
export function titleFor(kind: Exclude<TransitionKind, "none">, ctx: LineContext): string {
  switch (kind) {
    case "new":
      return `⚠️ New disruption on line ${ctx.lineId} (${ctx.lineName})`;
    case "updated":
      return `🔄 Updated disruption on line ${ctx.lineId}`;
    case "ongoing":
      return `ℹ️ Ongoing disruption on line ${ctx.lineId}`;
    case "resolved":
      return `✅ Disruption resolved on line ${ctx.lineId}`;
  }
}

/** Fixed body for the resolved notice. */
export function resolvedBody(ctx: LineContext): string {
  return `All disruptions on line ${ctx.lineId} (${ctx.lineName}) have been resolved!`;
}

/**
 * Compose the notification for a transition.
 * Returns null for `none` — callers skip dispatch entirely.
 */
export function compose(
  kind: TransitionKind,
  records: readonly DisruptionRecord[],
  ctx: LineContext,
): ComposedNotification | null {
  if (kind === "none") return null;
  if (kind === "resolved") {
    return { title: titleFor(kind, ctx), body: resolvedBody(ctx) };
  }
  return { title: titleFor(kind, ctx), body: formatRecordList(records, ctx) };
}
