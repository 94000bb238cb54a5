/**
 * Configuration constants for MCP Holster.
 * All environment variables and paths are defined here.
 *
 * Environment variables use the HOLSTER_ prefix.
 */

import { join } from "path";
import { homedir } from "os";

import type { LogLevel } from "./logger.js";

// Helper: read env with HOLSTER_ prefix
function env(name: string, fallback?: string): string | undefined {
  return process.env[`HOLSTER_${name}`] ?? fallback;
}

export const SERVER_NAME = "mcp-holster";
export const SERVER_VERSION = "0.3.0";

// --- Host config file ---
export const HOST_CONFIG_FILENAME = "claude_desktop_config.json";

/**
 * Per-user application-support location of the host's config file.
 */
export function resolveDefaultConfigPath(
  platform: NodeJS.Platform,
  environment: Record<string, string | undefined>,
  home: string
): string {
  if (platform === "darwin") {
    return join(home, "Library", "Application Support", "Claude", HOST_CONFIG_FILENAME);
  }
  if (platform === "win32") {
    const appData = environment.APPDATA || join(home, "AppData", "Roaming");
    return join(appData, "Claude", HOST_CONFIG_FILENAME);
  }
  const xdg = environment.XDG_CONFIG_HOME || join(home, ".config");
  return join(xdg, "Claude", HOST_CONFIG_FILENAME);
}

export const HOLSTER_CONFIG_PATH =
  env("CONFIG_PATH") ||
  resolveDefaultConfigPath(process.platform, process.env, homedir());

// --- Logging ---
const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

export function parseLogLevel(value: string | undefined): LogLevel {
  const normalized = (value || "").trim().toLowerCase();
  return LOG_LEVELS.find((level) => level === normalized) ?? "info";
}

export const HOLSTER_LOG_LEVEL = parseLogLevel(env("LOG_LEVEL"));

/**
 * Picks `--config <path>` (or `--config=<path>`) out of argv.
 */
export function parseConfigFlag(argv: readonly string[]): string | undefined {
  for (let i = 0; i < argv.length; i++) {
    const arg = argv[i];
    if (arg === "--config") {
      const value = argv[i + 1];
      return value && !value.startsWith("--") ? value : undefined;
    }
    if (arg.startsWith("--config=")) {
      return arg.slice("--config=".length) || undefined;
    }
  }
  return undefined;
}
