/**
 * Helpers shared by source normalizers.
 */

import { DisruptionRecord, Snapshot } from "../schemas/disruption.js";
import type { LineConfig } from "../schemas/config.js";
import { FetchFailure } from "../errors.js";

function escapeRegExp(text: string): string {
  return text.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}

/**
 * True when `text` names the line: its id as a whole word ("29" but not
 * "129"), or its display name in any case.
 */
export function mentionsLine(text: string, line: Pick<LineConfig, "id" | "name">): boolean {
  const idPattern = new RegExp(`(^|[^0-9A-Za-z])${escapeRegExp(line.id)}($|[^0-9A-Za-z])`);
  return idPattern.test(text) || text.toLowerCase().includes(line.name.toLowerCase());
}

/**
 * Build a validated snapshot. Records repeating an earlier id are dropped,
 * keeping the first occurrence.
 */
export function createSnapshot(source: string, records: readonly DisruptionRecord[], capturedAt: Date): Snapshot {
  const seen = new Set<string>();
  const unique = records.filter((record) => {
    if (record.id === undefined) return true;
    if (seen.has(record.id)) return false;
    seen.add(record.id);
    return true;
  });

  const parsed = Snapshot.safeParse({ capturedAt: capturedAt.toISOString(), records: unique });
  if (!parsed.success) {
    const detail = parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ");
    throw new FetchFailure(source, "payload", `Normalized records are invalid: ${detail}`);
  }
  return parsed.data;
}

/** Parse one normalized record, dropping empty id and details. */
export function toRecord(fields: {
  id?: string;
  header: string;
  details?: string | null;
  activePeriods?: Array<{ start?: string; end?: string }>;
  severity?: number | string;
  cause?: number | string;
  effect?: number | string;
}): DisruptionRecord {
  return DisruptionRecord.parse({
    ...fields,
    id: fields.id ? fields.id : undefined,
    details: fields.details ? fields.details : undefined,
    activePeriods: fields.activePeriods ?? [],
  });
}
