/**
 * Traffic-situation JSON API source.
 *
 * Payload shape:
 *   { StatusCode, Message, ResponseData: { TrafficTypes: [{ Type, Events: [...] }] } }
 *
 * Events of the line's transport mode whose message text names the line
 * become records. EventId, when the API provides it, is the record id.
 */

import { z } from "zod";
import type { DisruptionRecord, Snapshot } from "../schemas/disruption.js";
import type { LineConfig } from "../schemas/config.js";
import { FetchFailure, errorMessage } from "../errors.js";
import type { DisruptionSource, FetchOptions } from "./interfaces.js";
import { httpGet } from "./http.js";
import { createSnapshot, mentionsLine, toRecord } from "./normalize.js";

const TrafficEvent = z.object({
  EventId: z.union([z.number(), z.string()]).nullish(),
  Message: z.string().nullish(),
  Expanded: z.string().nullish(),
  SeverityCode: z.number().nullish(),
  Created: z.string().nullish(),
});
type TrafficEvent = z.infer<typeof TrafficEvent>;

const TrafficType = z.object({
  Type: z.string(),
  Events: z.array(TrafficEvent).nullish(),
});

export const TrafficSituationResponse = z.object({
  StatusCode: z.number(),
  Message: z.string().nullish(),
  ResponseData: z
    .object({
      TrafficTypes: z.array(TrafficType).nullish(),
    })
    .nullish(),
});
export type TrafficSituationResponse = z.infer<typeof TrafficSituationResponse>;

export interface TrafficSituationSourceOptions {
  url: string;
  apiKey?: string;
  line: LineConfig;
  now?: () => Date;
}

function toDisruption(event: TrafficEvent): DisruptionRecord {
  return toRecord({
    id: event.EventId !== null && event.EventId !== undefined ? String(event.EventId) : undefined,
    header: event.Message || "Disruption",
    details: event.Expanded,
    activePeriods: event.Created ? [{ start: event.Created }] : [],
    severity: event.SeverityCode ?? undefined,
  });
}

/** Pick the line's disruptions out of a parsed response. */
export function extractLineDisruptions(
  response: TrafficSituationResponse,
  line: LineConfig,
): DisruptionRecord[] {
  const records: DisruptionRecord[] = [];
  const mode = line.transportMode.toLowerCase();

  for (const trafficType of response.ResponseData?.TrafficTypes ?? []) {
    if (trafficType.Type.toLowerCase() !== mode) continue;

    for (const event of trafficType.Events ?? []) {
      const text = `${event.Message ?? ""}\n${event.Expanded ?? ""}`;
      if (mentionsLine(text, line)) records.push(toDisruption(event));
    }
  }

  return records;
}

export class TrafficSituationSource implements DisruptionSource {
  readonly name = "traffic-situation";
  private readonly opts: TrafficSituationSourceOptions;

  constructor(opts: TrafficSituationSourceOptions) {
    this.opts = opts;
  }

  async fetch({ timeoutMs }: FetchOptions): Promise<Snapshot> {
    const text = await httpGet(
      this.name,
      this.opts.url,
      { timeoutMs, query: { key: this.opts.apiKey } },
      (response) => response.text(),
    );

    let raw: unknown;
    try {
      raw = JSON.parse(text);
    } catch (err) {
      throw new FetchFailure(this.name, "payload", `Invalid JSON: ${errorMessage(err)}`);
    }

    const parsed = TrafficSituationResponse.safeParse(raw);
    if (!parsed.success) {
      throw new FetchFailure(this.name, "payload", `Unexpected payload: ${parsed.error.issues[0]?.message ?? "invalid"}`);
    }
    if (parsed.data.StatusCode !== 0) {
      throw new FetchFailure(
        this.name,
        "status",
        `API returned StatusCode ${parsed.data.StatusCode}${parsed.data.Message ? `: ${parsed.data.Message}` : ""}`,
      );
    }

    const capturedAt = (this.opts.now ?? (() => new Date()))();
    return createSnapshot(this.name, extractLineDisruptions(parsed.data, this.opts.line), capturedAt);
  }
}
