/**
 * Event logger — append-only JSONL event log.
 *
 * Writes one JSON object per line to events/YYYY-MM-DD.jsonl.
 * Uses the BaseEvent schema from schemas/event.ts.
 */

import { appendFile, mkdir, symlink, unlink, readdir, readFile } from "node:fs/promises";
import { join } from "node:path";
import { BaseEvent, type EventType } from "../schemas/event.js";
import { errnoCode, errorMessage } from "../errors.js";

export type EventCallback = (event: BaseEvent) => void | Promise<void>;

export interface EventLoggerOptions {
  onEvent?: EventCallback;
}

export interface EventFilter {
  type?: EventType;
  lineId?: string;
}

export class EventLogger {
  readonly eventsDir: string;
  private readonly onEvent?: EventCallback;
  private eventCounter: number = 0;

  constructor(eventsDir: string, options?: EventLoggerOptions) {
    this.eventsDir = eventsDir;
    this.onEvent = options?.onEvent;
  }

  /** Append an event to today's JSONL file. */
  async log(
    type: EventType,
    opts?: {
      lineId?: string;
      payload?: Record<string, unknown>;
    },
  ): Promise<BaseEvent> {
    this.eventCounter += 1;

    const event: BaseEvent = {
      eventId: this.eventCounter,
      type,
      timestamp: new Date().toISOString(),
      lineId: opts?.lineId,
      payload: opts?.payload ?? {},
    };

    const date = event.timestamp.slice(0, 10); // YYYY-MM-DD
    const filePath = join(this.eventsDir, `${date}.jsonl`);

    await mkdir(this.eventsDir, { recursive: true });
    await appendFile(filePath, JSON.stringify(event) + "\n", "utf-8");

    await this.updateSymlink(date);

    if (this.onEvent) {
      await Promise.resolve(this.onEvent(event));
    }

    return event;
  }

  /** Update events.jsonl symlink to point to current day's log. */
  private async updateSymlink(date: string): Promise<void> {
    const symlinkPath = join(this.eventsDir, "events.jsonl");

    try {
      await unlink(symlinkPath);
    } catch (err) {
      // First event of the log has nothing to replace
      if (errnoCode(err) !== "ENOENT") {
        console.warn(`[EventLogger] Failed to remove symlink: ${errorMessage(err)}`);
      }
    }

    try {
      await symlink(`${date}.jsonl`, symlinkPath);
    } catch (err) {
      console.warn(`[EventLogger] Failed to update symlink: ${errorMessage(err)}`);
    }
  }

  /** Log monitor lifecycle events. */
  async logLifecycle(
    type: "monitor.startup" | "monitor.shutdown",
    payload?: Record<string, unknown>,
  ): Promise<void> {
    await this.log(type, { payload });
  }

  /**
   * Query events from the log.
   *
   * Reads every daily JSONL file and filters by criteria. Lines that do not
   * parse as events are skipped.
   */
  async query(filter?: EventFilter): Promise<BaseEvent[]> {
    let files: string[];
    try {
      files = await readdir(this.eventsDir);
    } catch (err) {
      if (errnoCode(err) === "ENOENT") return [];
      throw err;
    }
    const jsonlFiles = files.filter((f) => f.endsWith(".jsonl") && f !== "events.jsonl").sort();

    const events: BaseEvent[] = [];

    for (const file of jsonlFiles) {
      const content = await readFile(join(this.eventsDir, file), "utf-8");
      const lines = content.trim().split("\n").filter((line) => line.length > 0);

      for (const line of lines) {
        let raw: unknown;
        try {
          raw = JSON.parse(line);
        } catch {
          continue;
        }
        const parsed = BaseEvent.safeParse(raw);
        if (!parsed.success) continue;

        const event = parsed.data;
        if (filter?.type && event.type !== filter.type) continue;
        if (filter?.lineId && event.lineId !== filter.lineId) continue;

        events.push(event);
      }
    }

    return events;
  }
}
