/**
 * Notifier construction from configuration.
 */

import type { ChannelsConfig } from "../schemas/config.js";
import type { NotifierRegistry } from "../events/notification-policy/index.js";
import { ConsoleNotifier } from "./console-notifier.js";
import { DesktopNotifier } from "./desktop-notifier.js";
import { EmailNotifier } from "./email-notifier.js";

export { ConsoleNotifier } from "./console-notifier.js";
export { DesktopNotifier, desktopCommand, shortenBody } from "./desktop-notifier.js";
export { EmailNotifier } from "./email-notifier.js";

/**
 * Build the notifier registry. Email is registered only when sender,
 * recipient and password are all present.
 */
export function createNotifiers(channels: ChannelsConfig): NotifierRegistry {
  const registry: NotifierRegistry = {};

  if (channels.console.enabled) registry.console = new ConsoleNotifier();
  if (channels.desktop.enabled) registry.desktop = new DesktopNotifier();

  const { email } = channels;
  if (email.enabled && email.from && email.to && email.password) {
    registry.email = new EmailNotifier({
      from: email.from,
      to: email.to,
      password: email.password,
      host: email.host,
      port: email.port,
    });
  }

  return registry;
}
