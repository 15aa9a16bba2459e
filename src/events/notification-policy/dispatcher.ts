/**
 * NotificationDispatcher — delivers a composed notification to channels.
 *
 * Processing pipeline:
 *   { title, body, channels } → per-channel notifier.notify() (bounded by timeout)
 *
 * Design constraints:
 * - Fail open — a channel that throws or times out is recorded and skipped
 * - Channels are isolated: one failing never blocks another
 * - Never throws; the caller proceeds to persistence regardless of outcome
 */

import { ChannelKind } from "../../schemas/disruption.js";
import type { Notifier } from "../notifier.js";

export interface OutgoingNotification {
  title: string;
  body: string;
  channels: readonly ChannelKind[];
}

export interface DispatchOutcome {
  channel: ChannelKind;
  ok: boolean;
  error?: string;
}

export interface DispatcherOptions {
  /** Per-channel delivery timeout in ms. Default: 15_000. */
  timeoutMs?: number;
}

export type NotifierRegistry = Partial<Record<ChannelKind, Notifier>>;

function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_, reject) => {
    timer = setTimeout(() => reject(new Error(`${label} timed out after ${timeoutMs}ms`)), timeoutMs);
  });
  return Promise.race([promise, timeout]).finally(() => clearTimeout(timer));
}

export class NotificationDispatcher {
  private readonly notifiers: NotifierRegistry;
  private readonly timeoutMs: number;

  constructor(notifiers: NotifierRegistry, opts: DispatcherOptions = {}) {
    this.notifiers = { ...notifiers };
    this.timeoutMs = opts.timeoutMs ?? 15_000;
  }

  /** Channels that have a notifier registered. */
  get configuredChannels(): ChannelKind[] {
    return ChannelKind.options.filter((channel) => this.notifiers[channel] !== undefined);
  }

  async dispatch(notification: OutgoingNotification): Promise<DispatchOutcome[]> {
    const channels = Array.from(new Set(notification.channels));
    return Promise.all(channels.map((channel) => this.deliver(channel, notification)));
  }

  private async deliver(channel: ChannelKind, notification: OutgoingNotification): Promise<DispatchOutcome> {
    const notifier = this.notifiers[channel];
    if (!notifier) {
      return { channel, ok: false, error: "no notifier registered" };
    }

    try {
      await withTimeout(notifier.notify(notification.title, notification.body), this.timeoutMs, channel);
      return { channel, ok: true };
    } catch (err) {
      const message = err instanceof Error ? err.message : String(err);
      console.error(`[NotificationDispatcher] Failed to deliver notification (${channel}): ${message}`);
      return { channel, ok: false, error: message };
    }
  }
}
