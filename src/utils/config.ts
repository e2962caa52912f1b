import { existsSync, readFileSync, writeFileSync } from "fs";
import path from "path";
import { isLogLevel, type LogLevel } from "@/utils/logger";

export interface Config {
  androidHome?: string;
  avdHome?: string;
  logLevel?: LogLevel;
  logFile?: string;
  refreshIntervalMs?: number;
  bootTimeoutMs?: number;
}

const CONFIG_FILE = "config.json";

function getConfigFilePath(): string {
  return path.join(process.cwd(), CONFIG_FILE);
}

function readOptionalString(source: Record<string, unknown>, key: string): string | undefined {
  const value = source[key];
  return typeof value === "string" && value.trim() ? value : undefined;
}

function readOptionalNumber(source: Record<string, unknown>, key: string): number | undefined {
  const value = source[key];
  return typeof value === "number" && Number.isFinite(value) && value > 0 ? value : undefined;
}

/** Keeps only the known keys with the expected types. */
export function parseConfig(raw: unknown): Config {
  if (typeof raw !== "object" || raw === null || Array.isArray(raw)) {
    return {};
  }

  const source: Record<string, unknown> = { ...raw };
  const config: Config = {};

  const androidHome = readOptionalString(source, "androidHome");
  if (androidHome) config.androidHome = androidHome;

  const avdHome = readOptionalString(source, "avdHome");
  if (avdHome) config.avdHome = avdHome;

  const logFile = readOptionalString(source, "logFile");
  if (logFile) config.logFile = logFile;

  if (isLogLevel(source.logLevel)) config.logLevel = source.logLevel;

  const refreshIntervalMs = readOptionalNumber(source, "refreshIntervalMs");
  if (refreshIntervalMs) config.refreshIntervalMs = refreshIntervalMs;

  const bootTimeoutMs = readOptionalNumber(source, "bootTimeoutMs");
  if (bootTimeoutMs) config.bootTimeoutMs = bootTimeoutMs;

  return config;
}

export function loadConfig(): Config {
  const configPath = getConfigFilePath();

  if (!existsSync(configPath)) {
    return {};
  }

  try {
    const configData = readFileSync(configPath, "utf-8");
    return parseConfig(JSON.parse(configData));
  } catch (error) {
    console.warn(
      `Warning: Could not parse config.json, using default config (${error instanceof Error ? error.message : String(error)})`
    );
    return {};
  }
}

export function saveConfig(config: Config): void {
  const configPath = getConfigFilePath();

  try {
    writeFileSync(configPath, JSON.stringify(config, null, 2), "utf-8");
  } catch (error) {
    throw new Error(`Failed to save config: ${error}`);
  }
}

export function updateConfig<K extends keyof Config>(key: K, value: Config[K]): void {
  const config = loadConfig();
  if (value === undefined) {
    delete config[key];
  } else {
    config[key] = value;
  }
  saveConfig(config);
}

export function getConfigValue<K extends keyof Config>(key: K): Config[K] {
  const config = loadConfig();
  return config[key];
}

export function resetConfig(): void {
  saveConfig({});
}
