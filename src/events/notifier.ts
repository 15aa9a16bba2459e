/**
 * Notifier capability — one delivery mechanism (desktop alert, email, ...).
 *
 * Adapters are supplied by the host. `notify` resolves on delivery and
 * rejects on failure; the dispatcher isolates failures per channel.
 */

export interface Notifier {
  notify(title: string, body: string): Promise<void>;
}

/** In-memory notifier that records deliveries (for tests and dry runs). */
export class MockNotifier implements Notifier {
  readonly sent: Array<{ title: string; body: string }> = [];

  async notify(title: string, body: string): Promise<void> {
    this.sent.push({ title, body });
  }
}
