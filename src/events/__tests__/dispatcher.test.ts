import { describe, it, expect, vi, beforeEach, afterEach } from "vitest";
import { NotificationDispatcher } from "../notification-policy/dispatcher.js";
import { MockNotifier, type Notifier } from "../notifier.js";

class FailingNotifier implements Notifier {
  async notify(): Promise<void> {
    throw new Error("SMTP unavailable");
  }
}

describe("NotificationDispatcher", () => {
  beforeEach(() => {
    vi.spyOn(console, "error").mockImplementation(() => {});
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.useRealTimers();
  });

  it("reports registered channels in fixed order", () => {
    const dispatcher = new NotificationDispatcher({
      console: new MockNotifier(),
      desktop: new MockNotifier(),
    });
    expect(dispatcher.configuredChannels).toEqual(["desktop", "console"]);
  });

  it("delivers title and body to each requested channel", async () => {
    const desktop = new MockNotifier();
    const email = new MockNotifier();
    const dispatcher = new NotificationDispatcher({ desktop, email });

    const outcomes = await dispatcher.dispatch({ title: "T", body: "B", channels: ["desktop", "email"] });

    expect(outcomes).toEqual([
      { channel: "desktop", ok: true },
      { channel: "email", ok: true },
    ]);
    expect(desktop.sent).toEqual([{ title: "T", body: "B" }]);
    expect(email.sent).toEqual([{ title: "T", body: "B" }]);
  });

  it("only delivers to requested channels", async () => {
    const desktop = new MockNotifier();
    const email = new MockNotifier();
    const dispatcher = new NotificationDispatcher({ desktop, email });

    await dispatcher.dispatch({ title: "T", body: "B", channels: ["desktop"] });

    expect(email.sent).toHaveLength(0);
  });

  it("isolates a failing channel from the others", async () => {
    const desktop = new MockNotifier();
    const dispatcher = new NotificationDispatcher({ desktop, email: new FailingNotifier() });

    const outcomes = await dispatcher.dispatch({ title: "T", body: "B", channels: ["email", "desktop"] });

    expect(outcomes).toEqual([
      { channel: "email", ok: false, error: "SMTP unavailable" },
      { channel: "desktop", ok: true },
    ]);
    expect(desktop.sent).toHaveLength(1);
    expect(console.error).toHaveBeenCalledWith(
      "[NotificationDispatcher] Failed to deliver notification (email): SMTP unavailable",
    );
  });

  it("reports a channel without a notifier as failed", async () => {
    const dispatcher = new NotificationDispatcher({});
    const outcomes = await dispatcher.dispatch({ title: "T", body: "B", channels: ["console"] });
    expect(outcomes).toEqual([{ channel: "console", ok: false, error: "no notifier registered" }]);
  });

  it("times out a hanging channel", async () => {
    vi.useFakeTimers();
    const hanging: Notifier = { notify: () => new Promise<void>(() => {}) };
    const fallback = new MockNotifier();
    const dispatcher = new NotificationDispatcher({ desktop: hanging, console: fallback }, { timeoutMs: 1_000 });

    const pending = dispatcher.dispatch({ title: "T", body: "B", channels: ["desktop", "console"] });
    await vi.advanceTimersByTimeAsync(1_000);
    const outcomes = await pending;

    expect(outcomes).toEqual([
      { channel: "desktop", ok: false, error: "desktop timed out after 1000ms" },
      { channel: "console", ok: true },
    ]);
  });
});
