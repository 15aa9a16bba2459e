/**
 * ConsoleNotifier — Notifier for standalone / daemon mode.
 *
 * Prints notifications as structured console output so they remain
 * visible in service logs without any desktop session or mail account.
 */

import type { Notifier } from "../events/notifier.js";

export class ConsoleNotifier implements Notifier {
  private readonly prefix: string;
  private readonly write: (line: string) => void;

  constructor(opts?: { prefix?: string; write?: (line: string) => void }) {
    this.prefix = opts?.prefix ?? "[linewatch]";
    this.write = opts?.write ?? ((line) => console.info(line));
  }

  async notify(title: string, body: string): Promise<void> {
    this.write(`${this.prefix} [console] ${title}`);
    if (body) this.write(body);
  }
}
