import { describe, it, expect, vi, afterEach } from "vitest";
import GtfsRealtimeBindings from "gtfs-realtime-bindings";
import {
  GtfsAlertsSource,
  decodeFeed,
  extractLineAlerts,
  pickTranslation,
  routeMatches,
  type AlertEntity,
} from "../gtfs-alerts.js";
import { FetchFailure } from "../../errors.js";
import type { LineConfig } from "../../schemas/config.js";

const line: LineConfig = { id: "29", name: "Harbour Express", transportMode: "bus", routeIds: [] };

// 2026-03-01T06:00:00Z and 2026-03-01T09:30:00Z
const START = 1772344800;
const END = 1772357400;

const entities: AlertEntity[] = [
  {
    id: "alert-1",
    alert: {
      informedEntity: [{ routeId: "9011001002900000" }, { routeId: "29" }],
      activePeriod: [{ start: START, end: END }],
      cause: 10,
      effect: 3,
      headerText: {
        translation: [
          { text: "Delays", language: "en" },
          { text: "Förseningar", language: "sv" },
        ],
      },
      descriptionText: { translation: [{ text: "Roadworks", language: "en" }] },
    },
  },
  {
    id: "alert-2",
    alert: { informedEntity: [{ routeId: "129" }], headerText: { translation: [{ text: "Other line" }] } },
  },
  { id: "trip-update", alert: null },
];

describe("routeMatches", () => {
  it("matches the line id exactly or as a suffix", () => {
    expect(routeMatches("29", line)).toBe(true);
    expect(routeMatches("SL:29", line)).toBe(true);
    expect(routeMatches("129", line)).toBe(false);
  });

  it("uses explicit route ids when configured", () => {
    const explicit = { ...line, routeIds: ["9011001002900000"] };
    expect(routeMatches("9011001002900000", explicit)).toBe(true);
    expect(routeMatches("29", explicit)).toBe(false);
  });
});

describe("pickTranslation", () => {
  it("prefers the requested language, then the first translation", () => {
    const text = { translation: [{ text: "Delays", language: "en" }, { text: "Förseningar", language: "sv" }] };
    expect(pickTranslation(text, "sv")).toBe("Förseningar");
    expect(pickTranslation(text, "de")).toBe("Delays");
    expect(pickTranslation(null, "sv")).toBe("");
  });
});

describe("extractLineAlerts", () => {
  it("normalizes alerts that reference the line", () => {
    expect(extractLineAlerts(entities, line, "sv")).toEqual([
      {
        id: "alert-1",
        header: "Förseningar",
        details: "Roadworks",
        activePeriods: [{ start: "2026-03-01T06:00:00.000Z", end: "2026-03-01T09:30:00.000Z" }],
        cause: 10,
        effect: 3,
      },
    ]);
  });

  it("treats zero bounds as open-ended", () => {
    const [record] = extractLineAlerts(
      [{ id: "a", alert: { informedEntity: [{ routeId: "29" }], activePeriod: [{ start: 0, end: END }] } }],
      line,
      "sv",
    );

    expect(record?.header).toBe("Disruption");
    expect(record?.activePeriods).toEqual([{ end: "2026-03-01T09:30:00.000Z" }]);
  });
});

describe("decodeFeed", () => {
  it("reports undecodable bytes as a payload failure", () => {
    const call = () => decodeFeed("gtfs-alerts", new Uint8Array([0xff, 0xff, 0xff, 0xff]));
    expect(call).toThrow(FetchFailure);
  });
});

describe("GtfsAlertsSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("decodes the feed and returns the line's alerts", async () => {
    const bytes = GtfsRealtimeBindings.transit_realtime.FeedMessage.encode({
      header: { gtfsRealtimeVersion: "2.0" },
      entity: [
        {
          id: "alert-1",
          alert: {
            informedEntity: [{ routeId: "29" }],
            activePeriod: [{ start: START }],
            headerText: { translation: [{ text: "Delays", language: "en" }] },
          },
        },
      ],
    }).finish();

    const fetchMock = vi.fn(async (_url: string, _init?: RequestInit) => new Response(bytes));
    vi.stubGlobal("fetch", fetchMock);

    const source = new GtfsAlertsSource({
      url: "https://feeds.example.test/alerts.pb",
      apiKey: "test-key",
      line,
      language: "sv",
      now: () => new Date("2026-03-01T08:00:00.000Z"),
    });
    const snapshot = await source.fetch({ timeoutMs: 1_000 });

    expect(fetchMock.mock.calls[0]?.[0]).toBe("https://feeds.example.test/alerts.pb?key=test-key");
    expect(snapshot.records).toHaveLength(1);
    expect(snapshot.records[0]).toMatchObject({
      id: "alert-1",
      header: "Delays",
      activePeriods: [{ start: "2026-03-01T06:00:00.000Z" }],
    });
    expect(snapshot.records[0]?.activePeriods[0]?.end).toBeUndefined();
  });
});
