/**
 * HTTP helper for sources — global fetch with a hard timeout, mapping every
 * failure onto FetchFailure.
 */

import { FetchFailure, errorMessage } from "../errors.js";

export interface HttpGetOptions {
  timeoutMs: number;
  /** Query parameters appended to the URL. */
  query?: Record<string, string | undefined>;
  headers?: Record<string, string>;
}

export const USER_AGENT = "linewatch/0.1";

export function buildUrl(base: string, query: Record<string, string | undefined> = {}): string {
  const url = new URL(base);
  for (const [key, value] of Object.entries(query)) {
    if (value !== undefined) url.searchParams.set(key, value);
  }
  return url.toString();
}

/**
 * GET a URL. Resolves with the response only for 2xx statuses.
 * The timeout covers the request; callers read the body under the same
 * signal via the returned `read` helper.
 */
export async function httpGet<T>(
  source: string,
  url: string,
  opts: HttpGetOptions,
  read: (response: Response) => Promise<T>,
): Promise<T> {
  const controller = new AbortController();
  const timeout = setTimeout(() => controller.abort(), opts.timeoutMs);

  try {
    const response = await fetch(buildUrl(url, opts.query), {
      signal: controller.signal,
      headers: { "User-Agent": USER_AGENT, ...opts.headers },
    });

    if (!response.ok) {
      throw new FetchFailure(source, "status", `HTTP ${response.status}`);
    }

    return await read(response);
  } catch (error) {
    if (error instanceof FetchFailure) throw error;
    if (error instanceof Error && error.name === "AbortError") {
      throw new FetchFailure(source, "timeout", `Request timed out after ${opts.timeoutMs}ms`, { cause: error });
    }
    throw new FetchFailure(source, "network", errorMessage(error), { cause: error });
  } finally {
    clearTimeout(timeout);
  }
}
