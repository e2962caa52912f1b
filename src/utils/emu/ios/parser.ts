import type { DeviceCategory, DeviceLogLevel, DeviceStatus, IosDevice } from "@/types/device";
import { EmuError } from "@/types/errors";
import type { DeviceTypeInfo, RuntimeInfo } from "./types";

const DEVICE_TYPE_PREFIX = "com.apple.CoreSimulator.SimDeviceType.";
const OS_NAMES = ["iOS", "watchOS", "tvOS", "xrOS", "visionOS"];

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function readString(source: Record<string, unknown>, key: string): string {
  const value = source[key];
  return typeof value === "string" ? value : "";
}

function readBoolean(source: Record<string, unknown>, key: string): boolean {
  return source[key] === true;
}

export function parseJsonOutput(output: string, what: string): Record<string, unknown> {
  let parsed: unknown;
  try {
    parsed = JSON.parse(output);
  } catch (error) {
    throw new EmuError(
      "ParseFailure",
      `Malformed JSON from simctl ${what}`,
      {},
      { cause: error }
    );
  }

  if (!isRecord(parsed)) {
    throw new EmuError("ParseFailure", `Unexpected simctl ${what} output`);
  }
  return parsed;
}

/**
 * OS label and dotted version of a runtime key such as
 * `com.apple.CoreSimulator.SimRuntime.iOS-17-0`.
 */
export function parseRuntimeKey(key: string): { os: string; version: string } {
  const iosIndex = key.lastIndexOf("iOS-");
  if (iosIndex !== -1) {
    const version = key.slice(iosIndex + "iOS-".length).replace(/-/g, ".");
    if (/^\d+(\.\d+)*$/.test(version)) return { os: "iOS", version };
  }

  const runtime = key.slice(key.lastIndexOf(".") + 1);
  for (const os of OS_NAMES) {
    if (runtime.startsWith(`${os}-`)) {
      const version = runtime.slice(os.length + 1).replace(/-/g, ".");
      if (/^\d+(\.\d+)*$/.test(version)) return { os, version };
    }
  }

  return { os: "iOS", version: "Unknown" };
}

export function mapSimctlState(state: string): DeviceStatus {
  switch (state) {
    case "Booted":
      return "Running";
    case "Shutdown":
      return "Stopped";
    default:
      return "Unknown";
  }
}

/** `com.apple.CoreSimulator.SimDeviceType.iPhone-15-Pro` → `iPhone 15 Pro`. */
export function deviceTypeDisplayName(identifier: string): string {
  return identifier
    .replace(DEVICE_TYPE_PREFIX, "")
    .replace(/[-_]/g, " ")
    .replace(/(\d+) (\d+) inch/g, "$1.$2-inch")
    .replace(/\s+/g, " ")
    .trim();
}

export function iosDeviceCategory(name: string): DeviceCategory {
  const lower = name.toLowerCase();
  if (lower.includes("ipad")) return "tablet";
  if (lower.includes("watch")) return "wear";
  if (lower.includes("tv")) return "tv";
  if (lower.includes("vision")) return "desktop";
  return "phone";
}

/**
 * Parses `simctl list devices --json`. Entries missing a name or UDID are
 * skipped; other missing fields default to empty/false.
 */
export function parseSimctlDevices(output: string): IosDevice[] {
  const root = parseJsonOutput(output, "devices");
  const runtimes = root.devices;
  if (!isRecord(runtimes)) return [];

  const devices: IosDevice[] = [];

  for (const [runtimeKey, entries] of Object.entries(runtimes)) {
    if (!Array.isArray(entries)) continue;
    const list: unknown[] = entries;
    const { os, version } = parseRuntimeKey(runtimeKey);

    for (const entry of list) {
      if (!isRecord(entry)) continue;

      const simulatorName = readString(entry, "name").trim();
      const udid = readString(entry, "udid").trim();
      if (!simulatorName || !udid) continue;

      const deviceTypeIdentifier = readString(entry, "deviceTypeIdentifier");
      const status = mapSimctlState(readString(entry, "state"));

      devices.push({
        platform: "ios",
        name: `${simulatorName} (${os} ${version})`,
        identifier: udid,
        deviceType: deviceTypeIdentifier
          ? deviceTypeDisplayName(deviceTypeIdentifier)
          : simulatorName,
        category: iosDeviceCategory(deviceTypeIdentifier || simulatorName),
        iosVersion: version,
        runtimeVersion: runtimeKey,
        isAvailable: readBoolean(entry, "isAvailable"),
        status,
        isRunning: status === "Running",
      });
    }
  }

  return devices;
}

export function parseDeviceTypes(output: string): DeviceTypeInfo[] {
  const root = parseJsonOutput(output, "devicetypes");
  const list: unknown[] = Array.isArray(root.devicetypes) ? root.devicetypes : [];
  const types: DeviceTypeInfo[] = [];

  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const identifier = readString(entry, "identifier");
    if (!identifier) continue;

    const name = readString(entry, "name") || deviceTypeDisplayName(identifier);
    types.push({
      identifier,
      name,
      productFamily: readString(entry, "productFamily"),
      category: iosDeviceCategory(name),
    });
  }

  return types;
}

export function parseRuntimes(output: string): RuntimeInfo[] {
  const root = parseJsonOutput(output, "runtimes");
  const list: unknown[] = Array.isArray(root.runtimes) ? root.runtimes : [];
  const runtimes: RuntimeInfo[] = [];

  for (const entry of list) {
    if (!isRecord(entry)) continue;
    const identifier = readString(entry, "identifier");
    if (!identifier) continue;

    const parsed = parseRuntimeKey(identifier);
    runtimes.push({
      identifier,
      name: readString(entry, "name") || `${parsed.os} ${parsed.version}`,
      version: readString(entry, "version") || parsed.version,
      isAvailable: readBoolean(entry, "isAvailable"),
    });
  }

  return runtimes;
}

export function detectSimulatorLogLevel(line: string): DeviceLogLevel {
  const lower = line.toLowerCase();
  if (lower.includes("error")) return "ERROR";
  if (lower.includes("warning") || lower.includes("fault")) return "WARN";
  if (lower.includes("debug")) return "DEBUG";
  return "INFO";
}
