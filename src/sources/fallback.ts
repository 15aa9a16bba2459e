/**
 * FallbackSource — tries sources in order; the first snapshot wins.
 */

import type { Snapshot } from "../schemas/disruption.js";
import { FetchFailure, errorMessage } from "../errors.js";
import type { DisruptionSource, FetchOptions } from "./interfaces.js";

export class FallbackSource implements DisruptionSource {
  readonly name: string;
  private readonly sources: readonly DisruptionSource[];

  constructor(sources: readonly DisruptionSource[]) {
    this.sources = sources;
    this.name = sources.map((s) => s.name).join(" → ") || "fallback";
  }

  /** Throws the last source's failure when every source fails. */
  async fetch(opts: FetchOptions): Promise<Snapshot> {
    let lastError: unknown = new FetchFailure(this.name, "network", "No sources configured");

    for (const source of this.sources) {
      try {
        return await source.fetch(opts);
      } catch (err) {
        lastError = err;
        console.warn(`[linewatch] Source ${source.name} failed: ${errorMessage(err)}`);
      }
    }

    throw lastError;
  }
}
