// Config loader: reads ~/.config/apt-sources/config.yaml and validates it against configSchema.
// On first run (no config file), writes DEFAULT_CONFIG_YAML and returns firstRun: true.
// Users override only the keys they specify; zod fills every unset key with its default.
import { readFileSync, writeFileSync, mkdirSync, existsSync } from "node:fs";
import { join, dirname } from "node:path";
import { homedir } from "node:os";
import { parse as parseYaml } from "yaml";
import { configSchema } from "./schema.js";
import type { AppConfig } from "../types/config.js";
import { ConfigError, messageOf } from "../shared/errors.js";
import { logger } from "../logger.js";

const DEFAULT_CONFIG_PATH = join(homedir(), ".config", "apt-sources", "config.yaml");

/** Default config YAML written on first run. */
export const DEFAULT_CONFIG_YAML = `# apt-sources-mcp configuration
# Generated automatically on first run. All values shown are defaults.

sources:
  main_list: /etc/apt/sources.list
  parts_dir: /etc/apt/sources.list.d
  # Prefix written in front of every deduplicated line. Must start with '#'.
  marker: "#dedup"

backup:
  root: /var/backups/apt-sources

retry:
  max_attempts: 3
  backoff_seconds: 2

lock:
  paths:
    - /var/lib/dpkg/lock-frontend
    - /var/lib/dpkg/lock
    - /var/lib/apt/lists/lock
    - /var/cache/apt/archives/lock
  timeout_seconds: 120
  poll_interval_seconds: 3
  grace_period_seconds: 2

privilege:
  method: sudo

safety:
  confirmation_threshold: high
  dry_run_bypass_confirmation: true
`;

export interface ConfigResult {
  config: AppConfig;
  configPath: string;
  firstRun: boolean;
}

export function defaultConfig(): AppConfig {
  return configSchema.parse({});
}

/** Validate an already-parsed YAML document. Throws CONFIG_INVALID with every issue listed. */
export function parseConfig(raw: unknown): AppConfig {
  const result = configSchema.safeParse(raw ?? {});
  if (!result.success) {
    const issues = result.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`);
    throw new ConfigError(`Invalid configuration: ${issues.join("; ")}`, issues);
  }
  return result.data;
}

export function loadConfig(explicitPath?: string): ConfigResult {
  const configPath = explicitPath ?? DEFAULT_CONFIG_PATH;

  if (!existsSync(configPath)) {
    logger.info({ configPath }, "No config file found, generating defaults (first run)");
    try {
      mkdirSync(dirname(configPath), { recursive: true });
      writeFileSync(configPath, DEFAULT_CONFIG_YAML, "utf-8");
    } catch (err) {
      logger.warn({ configPath, error: messageOf(err) }, "Could not write default config file");
    }
    return { config: defaultConfig(), configPath, firstRun: true };
  }

  try {
    const raw: unknown = parseYaml(readFileSync(configPath, "utf-8"));
    return { config: parseConfig(raw), configPath, firstRun: false };
  } catch (err) {
    logger.error({ configPath, error: messageOf(err) }, "Failed to load config, using defaults");
    return { config: defaultConfig(), configPath, firstRun: false };
  }
}
