/**
 * GTFS-Realtime Service Alerts source.
 *
 * Decodes the protobuf feed with gtfs-realtime-bindings and keeps alerts
 * whose informed entities reference one of the line's routes. The feed
 * entity id is the record id.
 */

import GtfsRealtimeBindings from "gtfs-realtime-bindings";
import type { DisruptionRecord, Snapshot } from "../schemas/disruption.js";
import type { LineConfig } from "../schemas/config.js";
import { FetchFailure, errorMessage } from "../errors.js";
import type { DisruptionSource, FetchOptions } from "./interfaces.js";
import { httpGet } from "./http.js";
import { createSnapshot, toRecord } from "./normalize.js";

/** Protobuf int64 values decode as number or Long. */
type Int64 = number | { toNumber(): number };

interface TranslatedText {
  translation?: Array<{ text: string; language?: string | null }> | null;
}

/** The subset of a decoded FeedEntity this source reads. */
export interface AlertEntity {
  id: string;
  alert?: {
    activePeriod?: Array<{ start?: Int64 | null; end?: Int64 | null }> | null;
    informedEntity?: Array<{ routeId?: string | null }> | null;
    cause?: number | null;
    effect?: number | null;
    headerText?: TranslatedText | null;
    descriptionText?: TranslatedText | null;
  } | null;
}

export interface GtfsAlertsSourceOptions {
  url: string;
  apiKey?: string;
  line: LineConfig;
  /** Preferred translation language. */
  language: string;
  now?: () => Date;
}

/** True when a GTFS route id belongs to the line. */
export function routeMatches(routeId: string, line: Pick<LineConfig, "id" | "routeIds">): boolean {
  if (line.routeIds.length > 0) return line.routeIds.includes(routeId);
  return routeId === line.id || routeId.endsWith(`:${line.id}`);
}

/** Text in the preferred language, else the first translation, else "". */
export function pickTranslation(text: TranslatedText | null | undefined, language: string): string {
  const translations = text?.translation ?? [];
  const preferred = translations.find((t) => t.language === language);
  return (preferred ?? translations[0])?.text ?? "";
}

function epochToIso(value: Int64 | null | undefined): string | undefined {
  if (value === null || value === undefined) return undefined;
  const seconds = typeof value === "number" ? value : value.toNumber();
  if (seconds <= 0) return undefined;
  return new Date(seconds * 1000).toISOString();
}

/** Normalize the line's alerts out of decoded feed entities. */
export function extractLineAlerts(
  entities: readonly AlertEntity[],
  line: LineConfig,
  language: string,
): DisruptionRecord[] {
  const records: DisruptionRecord[] = [];

  for (const entity of entities) {
    const alert = entity.alert;
    if (!alert) continue;

    const affectsLine = (alert.informedEntity ?? []).some(
      (informed) => typeof informed.routeId === "string" && routeMatches(informed.routeId, line),
    );
    if (!affectsLine) continue;

    records.push(
      toRecord({
        id: entity.id || undefined,
        header: pickTranslation(alert.headerText, language) || "Disruption",
        details: pickTranslation(alert.descriptionText, language),
        activePeriods: (alert.activePeriod ?? []).map((period) => ({
          start: epochToIso(period.start),
          end: epochToIso(period.end),
        })),
        cause: alert.cause ?? undefined,
        effect: alert.effect ?? undefined,
      }),
    );
  }

  return records;
}

/** Decode a FeedMessage, reporting malformed bytes as a payload failure. */
export function decodeFeed(source: string, bytes: Uint8Array): AlertEntity[] {
  try {
    return GtfsRealtimeBindings.transit_realtime.FeedMessage.decode(bytes).entity;
  } catch (err) {
    throw new FetchFailure(source, "payload", `Invalid GTFS-Realtime feed: ${errorMessage(err)}`);
  }
}

export class GtfsAlertsSource implements DisruptionSource {
  readonly name = "gtfs-alerts";
  private readonly opts: GtfsAlertsSourceOptions;

  constructor(opts: GtfsAlertsSourceOptions) {
    this.opts = opts;
  }

  async fetch({ timeoutMs }: FetchOptions): Promise<Snapshot> {
    const buffer = await httpGet(
      this.name,
      this.opts.url,
      { timeoutMs, query: { key: this.opts.apiKey } },
      (response) => response.arrayBuffer(),
    );

    const entities = decodeFeed(this.name, new Uint8Array(buffer));
    const capturedAt = (this.opts.now ?? (() => new Date()))();
    return createSnapshot(this.name, extractLineAlerts(entities, this.opts.line, this.opts.language), capturedAt);
  }
}
