/**
 * Configuration loading — linewatch.yaml plus environment overrides.
 *
 * Resolution:
 *   1. YAML file (`--config`, else <root>/linewatch.yaml)
 *   2. `dataDir` defaults to the root directory
 *   3. Environment: TRANSIT_API_KEY fills keyless sources; EMAIL_FROM,
 *      EMAIL_TO, EMAIL_PASSWORD, SMTP_SERVER, SMTP_PORT configure email
 *   4. zod validation with defaults
 */

import { readFile } from "node:fs/promises";
import { join, resolve } from "node:path";
import { parse as parseYaml } from "yaml";
import { MonitorConfig } from "../schemas/config.js";
import type { ChannelKind } from "../schemas/disruption.js";
import { errnoCode, errorMessage } from "../errors.js";

export const CONFIG_FILENAME = "linewatch.yaml";

export type Env = Record<string, string | undefined>;

export class ConfigError extends Error {
  readonly issues: string[];

  constructor(message: string, issues: string[] = []) {
    super(issues.length > 0 ? `${message}\n  - ${issues.join("\n  - ")}` : message);
    this.name = "ConfigError";
    this.issues = issues;
  }
}

export interface LoadConfigOptions {
  /** Root directory; default home of config and data. */
  root: string;
  /** Explicit config file path. */
  configPath?: string;
  env?: Env;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Apply environment overrides to a validated config. */
export function applyEnv(config: MonitorConfig, env: Env): MonitorConfig {
  const apiKey = env["TRANSIT_API_KEY"];
  const sources = config.sources.map((source) =>
    source.kind !== "page-scrape" && !source.apiKey && apiKey ? { ...source, apiKey } : source,
  );

  const email = { ...config.channels.email };
  if (env["EMAIL_FROM"]) email.from = env["EMAIL_FROM"];
  if (env["EMAIL_TO"]) email.to = env["EMAIL_TO"];
  if (env["EMAIL_PASSWORD"]) email.password = env["EMAIL_PASSWORD"];
  if (env["SMTP_SERVER"]) email.host = env["SMTP_SERVER"];
  if (env["SMTP_PORT"]) {
    const port = parseInt(env["SMTP_PORT"], 10);
    if (Number.isNaN(port) || port <= 0) {
      throw new ConfigError(`Invalid SMTP_PORT: ${env["SMTP_PORT"]}`);
    }
    email.port = port;
  }
  if (env["EMAIL_FROM"] && env["EMAIL_TO"] && env["EMAIL_PASSWORD"]) email.enabled = true;

  return { ...config, sources, channels: { ...config.channels, email } };
}

/** Validate a parsed document. `dataDir` defaults to `root`. */
export function parseConfig(raw: unknown, root: string, env: Env = {}): MonitorConfig {
  const doc = isRecord(raw) ? { dataDir: root, ...raw } : raw;
  const parsed = MonitorConfig.safeParse(doc);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "(root)"}: ${i.message}`);
    throw new ConfigError("Invalid configuration", issues);
  }
  const config = applyEnv(parsed.data, env);
  return { ...config, dataDir: resolve(root, config.dataDir) };
}

export async function loadConfig(opts: LoadConfigOptions): Promise<MonitorConfig> {
  const path = opts.configPath ? resolve(opts.configPath) : join(opts.root, CONFIG_FILENAME);

  let text: string;
  try {
    text = await readFile(path, "utf-8");
  } catch (err) {
    if (errnoCode(err) === "ENOENT") {
      throw new ConfigError(`Config file not found: ${path}`);
    }
    throw new ConfigError(`Cannot read config file ${path}: ${errorMessage(err)}`);
  }

  let raw: unknown;
  try {
    raw = parseYaml(text);
  } catch (err) {
    throw new ConfigError(`Invalid YAML in ${path}: ${errorMessage(err)}`);
  }

  return parseConfig(raw, opts.root, opts.env ?? process.env);
}

/** Channels that are switched on, in the order the dispatcher reports them. */
export function enabledChannels(config: MonitorConfig): ChannelKind[] {
  const channels: ChannelKind[] = [];
  if (config.channels.desktop.enabled) channels.push("desktop");
  const { email } = config.channels;
  if (email.enabled && email.from && email.to && email.password) channels.push("email");
  if (config.channels.console.enabled) channels.push("console");
  return channels;
}
