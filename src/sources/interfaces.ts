/**
 * DisruptionSource — produces a normalized snapshot for the monitored line.
 *
 * Sources own transport and wire-format parsing. Anything that goes wrong
 * is reported as a FetchFailure; the cycle then ends without touching state.
 */

import type { Snapshot } from "../schemas/disruption.js";

export interface FetchOptions {
  /** Abort the request after this many ms. */
  timeoutMs: number;
}

export interface DisruptionSource {
  /** Short name used in logs and errors. */
  readonly name: string;
  fetch(opts: FetchOptions): Promise<Snapshot>;
}
