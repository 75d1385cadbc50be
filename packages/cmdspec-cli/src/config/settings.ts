import fs from "node:fs";
import os from "node:os";
import path from "node:path";
import YAML from "yaml";
import { DEFAULT_HELPER_TIMEOUT_MS, parseLogLevel, type LogLevel } from "@cmdspec/core";

export interface Settings {
  helperTimeoutMs: number;
  caseSensitive: boolean;
  logLevel: LogLevel;
  /** Command emitted scripts call back into for runtime completion. */
  completer: string;
}

export type SettingsSources = {
  cwd?: string;
  env?: Record<string, string | undefined>;
  homeDir?: string;
  overrides?: Partial<Settings>;
};

export const DEFAULT_SETTINGS: Readonly<Settings> = {
  helperTimeoutMs: DEFAULT_HELPER_TIMEOUT_MS,
  caseSensitive: true,
  logLevel: "warn",
  completer: "cmdspec",
};

export const PROJECT_CONFIG_FILENAME = "cmdspec.config.yaml";

export function userConfigPath(homeDir = os.homedir()): string {
  return path.join(homeDir, ".config", "cmdspec", "config.yaml");
}

export function parseBoolean(value: unknown): boolean | null {
  if (typeof value === "boolean") {
    return value;
  }
  if (typeof value === "number") {
    if (value === 1) return true;
    if (value === 0) return false;
  }
  if (typeof value === "string") {
    const normalized = value.trim().toLowerCase();
    if (!normalized) return null;
    if (["1", "true", "t", "yes", "y", "on"].includes(normalized)) {
      return true;
    }
    if (["0", "false", "f", "no", "n", "off"].includes(normalized)) {
      return false;
    }
  }
  return null;
}

export function parseTimeout(value: unknown): number | null {
  const parsed = typeof value === "string" && value.trim() ? Number(value) : value;
  if (typeof parsed !== "number" || !Number.isFinite(parsed) || parsed <= 0) {
    return null;
  }
  return Math.floor(parsed);
}

function parseCompleter(value: unknown): string | null {
  return typeof value === "string" && value.trim() ? value.trim() : null;
}

function readYamlFile(filePath: string): unknown {
  try {
    if (!fs.existsSync(filePath)) {
      return null;
    }
    const raw = fs.readFileSync(filePath, "utf8");
    if (!raw.trim()) {
      return null;
    }
    return YAML.parse(raw);
  } catch {
    return null;
  }
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** A config document may nest its keys under `settings:`. */
function settingsBlock(document: unknown): Record<string, unknown> | null {
  if (!isRecord(document)) return null;
  const nested = document.settings;
  return isRecord(nested) ? nested : document;
}

function mergeLayer(settings: Settings, input: Record<string, unknown> | null): void {
  if (!input) return;
  const timeout = parseTimeout(input.helperTimeoutMs);
  if (timeout !== null) settings.helperTimeoutMs = timeout;
  const caseSensitive = parseBoolean(input.caseSensitive);
  if (caseSensitive !== null) settings.caseSensitive = caseSensitive;
  const logLevel = parseLogLevel(input.logLevel);
  if (logLevel !== null) settings.logLevel = logLevel;
  const completer = parseCompleter(input.completer);
  if (completer !== null) settings.completer = completer;
}

/**
 * Settings from every layer, later layers winning: defaults, the user config, the project config,
 * `CMDSPEC_*` environment variables, then explicit overrides from the command line.
 */
export function resolveSettings(sources: SettingsSources = {}): Settings {
  const settings: Settings = { ...DEFAULT_SETTINGS };
  const env = sources.env ?? process.env;
  const cwd = sources.cwd ? path.resolve(sources.cwd) : process.cwd();

  mergeLayer(settings, settingsBlock(readYamlFile(userConfigPath(sources.homeDir))));
  mergeLayer(settings, settingsBlock(readYamlFile(path.join(cwd, PROJECT_CONFIG_FILENAME))));
  mergeLayer(settings, {
    helperTimeoutMs: env.CMDSPEC_HELPER_TIMEOUT_MS,
    caseSensitive: env.CMDSPEC_CASE_SENSITIVE,
    logLevel: env.CMDSPEC_LOG_LEVEL,
    completer: env.CMDSPEC_COMPLETER,
  });

  const overrides = sources.overrides;
  if (overrides) {
    if (overrides.helperTimeoutMs !== undefined) settings.helperTimeoutMs = overrides.helperTimeoutMs;
    if (overrides.caseSensitive !== undefined) settings.caseSensitive = overrides.caseSensitive;
    if (overrides.logLevel !== undefined) settings.logLevel = overrides.logLevel;
    if (overrides.completer !== undefined) settings.completer = overrides.completer;
  }
  return settings;
}
