/**
 * Shared error types and helpers.
 */

/** Why a source could not produce a snapshot. */
export type FetchFailureReason = "network" | "timeout" | "status" | "payload";

/**
 * A source failed to fetch or normalize its payload. Raised before
 * reconciliation runs; persisted state is never touched on this path.
 */
export class FetchFailure extends Error {
  readonly reason: FetchFailureReason;
  readonly source: string;

  constructor(source: string, reason: FetchFailureReason, message: string, options?: { cause?: unknown }) {
    super(`[${source}] ${message}`, options);
    this.name = "FetchFailure";
    this.source = source;
    this.reason = reason;
  }
}

/** Message of any thrown value. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

/** `code` of a Node system error (ENOENT, EEXIST, ...), if any. */
export function errnoCode(err: unknown): string | undefined {
  if (err instanceof Error && "code" in err && typeof err.code === "string") {
    return err.code;
  }
  return undefined;
}
