/**
 * Disruption sources — construction from configuration.
 */

import type { MonitorConfig, SourceConfig } from "../schemas/config.js";
import type { DisruptionSource } from "./interfaces.js";
import { TrafficSituationSource } from "./traffic-situation.js";
import { GtfsAlertsSource } from "./gtfs-alerts.js";
import { PageScrapeSource } from "./page-scrape.js";
import { FallbackSource } from "./fallback.js";

export type { DisruptionSource, FetchOptions } from "./interfaces.js";
export { TrafficSituationSource, extractLineDisruptions } from "./traffic-situation.js";
export { GtfsAlertsSource, extractLineAlerts, routeMatches, pickTranslation, decodeFeed } from "./gtfs-alerts.js";
export { PageScrapeSource, scanPage, POSSIBLE_DISRUPTION_HEADER } from "./page-scrape.js";
export { FallbackSource } from "./fallback.js";
export { mentionsLine, createSnapshot } from "./normalize.js";

export function createSource(source: SourceConfig, line: MonitorConfig["line"]): DisruptionSource {
  switch (source.kind) {
    case "traffic-situation":
      return new TrafficSituationSource({ url: source.url, apiKey: source.apiKey, line });
    case "gtfs-alerts":
      return new GtfsAlertsSource({ url: source.url, apiKey: source.apiKey, line, language: source.language });
    case "page-scrape":
      return new PageScrapeSource({ url: source.url, line, keywords: source.keywords });
  }
}

/** One source, or a fallback chain when several are configured. */
export function createSourceChain(config: Pick<MonitorConfig, "sources" | "line">): DisruptionSource {
  const sources = config.sources.map((source) => createSource(source, config.line));
  const [only] = sources;
  return sources.length === 1 && only ? only : new FallbackSource(sources);
}
