/**
 * DesktopNotifier — OS notification pop-ups.
 *
 *   darwin  → osascript "display notification"
 *   linux   → notify-send
 *   win32   → PowerShell toast (Windows.UI.Notifications)
 *
 * Commands run through execFile with argument arrays; no shell parses the
 * notification text.
 */

import { execFile } from "node:child_process";
import { promisify } from "node:util";
import type { Notifier } from "../events/notifier.js";

export const execFileAsync = promisify(execFile);

export type CommandRunner = (file: string, args: string[], opts: { timeout: number }) => Promise<unknown>;

export interface DesktopNotifierOptions {
  platform?: NodeJS.Platform;
  run?: CommandRunner;
  timeoutMs?: number;
}

/** Pop-ups show only the start of the body. */
export const DESKTOP_BODY_LINES = 5;
export const DESKTOP_BODY_CHARS = 300;

export function shortenBody(body: string): string {
  const head = body.split("\n").slice(0, DESKTOP_BODY_LINES).join("\n");
  return Array.from(head).slice(0, DESKTOP_BODY_CHARS).join("");
}

/** AppleScript string literal. */
function appleScriptString(text: string): string {
  return `"${text.replace(/\\/g, "\\\\").replace(/"/g, '\\"')}"`;
}

/** PowerShell single-quoted literal. */
function powerShellString(text: string): string {
  return `'${text.replace(/'/g, "''")}'`;
}

function xmlEscape(text: string): string {
  return text
    .replace(/&/g, "&amp;")
    .replace(/</g, "&lt;")
    .replace(/>/g, "&gt;")
    .replace(/"/g, "&quot;");
}

/** Command and arguments for the platform, or null when unsupported. */
export function desktopCommand(
  platform: NodeJS.Platform,
  title: string,
  body: string,
): { file: string; args: string[] } | null {
  switch (platform) {
    case "darwin":
      return {
        file: "osascript",
        args: ["-e", `display notification ${appleScriptString(body)} with title ${appleScriptString(title)}`],
      };
    case "linux":
      return { file: "notify-send", args: [title, body] };
    case "win32": {
      const xml = `<toast><visual><binding template="ToastGeneric"><text>${xmlEscape(title)}</text><text>${xmlEscape(body)}</text></binding></visual></toast>`;
      const script = [
        "[Windows.UI.Notifications.ToastNotificationManager, Windows.UI.Notifications, ContentType = WindowsRuntime] | Out-Null",
        "[Windows.Data.Xml.Dom.XmlDocument, Windows.Data.Xml.Dom.XmlDocument, ContentType = WindowsRuntime] | Out-Null",
        "$doc = New-Object Windows.Data.Xml.Dom.XmlDocument",
        `$doc.LoadXml(${powerShellString(xml)})`,
        "$toast = New-Object Windows.UI.Notifications.ToastNotification $doc",
        "[Windows.UI.Notifications.ToastNotificationManager]::CreateToastNotifier('linewatch').Show($toast)",
      ].join("; ");
      return { file: "powershell.exe", args: ["-NoProfile", "-NonInteractive", "-Command", script] };
    }
    default:
      return null;
  }
}

export class DesktopNotifier implements Notifier {
  private readonly platform: NodeJS.Platform;
  private readonly run: CommandRunner;
  private readonly timeoutMs: number;

  constructor(opts: DesktopNotifierOptions = {}) {
    this.platform = opts.platform ?? process.platform;
    this.run = opts.run ?? ((file, args, runOpts) => execFileAsync(file, args, runOpts));
    this.timeoutMs = opts.timeoutMs ?? 10_000;
  }

  async notify(title: string, body: string): Promise<void> {
    const command = desktopCommand(this.platform, title, shortenBody(body));
    if (!command) {
      throw new Error(`Desktop notifications are not supported on ${this.platform}`);
    }
    await this.run(command.file, command.args, { timeout: this.timeoutMs });
  }
}
