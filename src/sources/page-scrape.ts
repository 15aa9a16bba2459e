/**
 * Webpage fallback source.
 *
 * Degraded mode: the page is only searched as text. When it names the line
 * and any disruption keyword, one record without an id is reported, so the
 * reconciliation engine identifies the snapshot by content digest. The
 * record's details carry the page text around the line's mentions.
 */

import type { DisruptionRecord, Snapshot } from "../schemas/disruption.js";
import type { LineConfig } from "../schemas/config.js";
import type { DisruptionSource, FetchOptions } from "./interfaces.js";
import { httpGet } from "./http.js";
import { createSnapshot, mentionsLine, toRecord } from "./normalize.js";

export interface PageScrapeSourceOptions {
  url: string;
  line: LineConfig;
  keywords: string[];
  now?: () => Date;
}

export const POSSIBLE_DISRUPTION_HEADER = "Possible disruption detected";

const CONTEXT_RADIUS = 2;
const CONTEXT_MIN_LENGTH = 50;
const CONTEXT_MAX_LENGTH = 300;
const CONTEXT_MAX_SNIPPETS = 2;

/**
 * Snippets of page text around each line that mentions the line: two text
 * lines either side, joined with spaces. Snippets of 50 characters or fewer
 * are dropped; the rest are cut to 300 characters. At most two are kept.
 */
export function extractContext(content: string, line: LineConfig): string[] {
  const lines = content.split("\n").map((text) => text.trim());
  const snippets: string[] = [];

  for (let i = 0; i < lines.length && snippets.length < CONTEXT_MAX_SNIPPETS; i++) {
    if (!mentionsLine(lines[i] ?? "", line)) continue;
    const context = lines
      .slice(Math.max(0, i - CONTEXT_RADIUS), i + CONTEXT_RADIUS + 1)
      .filter((text) => text.length > 0)
      .join(" ");
    const chars = Array.from(context);
    if (chars.length > CONTEXT_MIN_LENGTH) snippets.push(chars.slice(0, CONTEXT_MAX_LENGTH).join(""));
  }
  return snippets;
}

/** Records the page text implies: zero or one, never with an id. */
export function scanPage(
  content: string,
  opts: Pick<PageScrapeSourceOptions, "url" | "line" | "keywords">,
): DisruptionRecord[] {
  const lower = content.toLowerCase();
  const hasKeyword = opts.keywords.some((keyword) => lower.includes(keyword.toLowerCase()));
  if (!hasKeyword || !mentionsLine(content, opts.line)) return [];

  const snippets = extractContext(content, opts.line);
  const details = snippets.length > 0
    ? snippets.join("\n\n")
    : `Line ${opts.line.id} (${opts.line.name}) is mentioned on the status page. Check ${opts.url} for details.`;

  return [toRecord({ header: POSSIBLE_DISRUPTION_HEADER, details })];
}

export class PageScrapeSource implements DisruptionSource {
  readonly name = "page-scrape";
  private readonly opts: PageScrapeSourceOptions;

  constructor(opts: PageScrapeSourceOptions) {
    this.opts = opts;
  }

  async fetch({ timeoutMs }: FetchOptions): Promise<Snapshot> {
    const content = await httpGet(
      this.name,
      this.opts.url,
      { timeoutMs, headers: { Accept: "text/html" } },
      (response) => response.text(),
    );

    const capturedAt = (this.opts.now ?? (() => new Date()))();
    return createSnapshot(this.name, scanPage(content, this.opts), capturedAt);
  }
}
