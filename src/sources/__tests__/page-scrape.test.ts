import { describe, it, expect, vi, afterEach } from "vitest";
import { PageScrapeSource, extractContext, scanPage, POSSIBLE_DISRUPTION_HEADER } from "../page-scrape.js";
import type { LineConfig } from "../../schemas/config.js";

const line: LineConfig = { id: "29", name: "Harbour Express", transportMode: "bus", routeIds: [] };
const url = "https://status.example.test/traffic";
const keywords = ["störning", "delay"];

describe("scanPage", () => {
  it("reports one anonymous record when the line and a keyword appear", () => {
    expect(scanPage("<p>Störning: bus 29 rerouted</p>", { url, line, keywords })).toEqual([
      {
        header: POSSIBLE_DISRUPTION_HEADER,
        details: "Line 29 (Harbour Express) is mentioned on the status page. Check https://status.example.test/traffic for details.",
        activePeriods: [],
      },
    ]);
  });

  it("needs a keyword", () => {
    expect(scanPage("<p>Bus 29 timetable</p>", { url, line, keywords })).toEqual([]);
  });

  it("needs the line", () => {
    expect(scanPage("<p>Delay on bus 129</p>", { url, line, keywords })).toEqual([]);
  });
});

describe("extractContext", () => {
  const page = [
    "<h2>Traffic</h2>",
    "Störning in the northern area",
    "  Bus 29 is rerouted via Mill Road due to roadworks  ",
    "",
    "Expect delays of around ten minutes",
    "<footer>",
  ].join("\n");

  it("joins the text lines around a mention", () => {
    expect(extractContext(page, line)).toEqual([
      "<h2>Traffic</h2> Störning in the northern area Bus 29 is rerouted via Mill Road due to roadworks Expect delays of around ten minutes",
    ]);
  });

  it("drops snippets of 50 characters or fewer", () => {
    expect(extractContext("Delay\nbus 29\nsee timetable", line)).toEqual([]);
  });

  it("cuts snippets to 300 characters and keeps at most two", () => {
    const long = `Bus 29 ${"x".repeat(400)}`;
    const content = [long, "", "", "", "", "", long, "", "", "", "", "", long].join("\n");

    const snippets = extractContext(content, line);

    expect(snippets).toHaveLength(2);
    expect(snippets[0]).toBe(long.slice(0, 300));
  });
});

describe("scanPage details", () => {
  it("carries the page context into the record details", () => {
    const content = "Störning reported this morning\nBus 29 is rerouted via Mill Road due to roadworks";

    expect(scanPage(content, { url, line, keywords })).toEqual([
      {
        header: POSSIBLE_DISRUPTION_HEADER,
        details: "Störning reported this morning Bus 29 is rerouted via Mill Road due to roadworks",
        activePeriods: [],
      },
    ]);
  });
});

describe("PageScrapeSource", () => {
  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it("scans the fetched page", async () => {
    vi.stubGlobal("fetch", vi.fn(async () => new Response("<h1>Delay</h1><p>Harbour Express</p>")));
    const source = new PageScrapeSource({ url, line, keywords, now: () => new Date("2026-03-01T08:00:00.000Z") });

    const snapshot = await source.fetch({ timeoutMs: 1_000 });

    expect(snapshot.records).toHaveLength(1);
    expect(snapshot.records[0]?.id).toBeUndefined();
  });
});
