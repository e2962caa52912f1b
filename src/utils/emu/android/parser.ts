import { INVALID_API_LEVEL, type DeviceCategory, type DeviceLogLevel } from "@/types/device";
import { deviceCategory } from "@/utils/priority";
import type { AvdBlock, DeviceDefinition, SystemImage } from "./types";

// "Based on: Android 14.0" carries only the marketing version.
const ANDROID_MAJOR_TO_API: Record<number, number> = {
  15: 35,
  14: 34,
  13: 33,
  12: 32,
  11: 30,
  10: 29,
  9: 28,
  8: 26,
  7: 24,
  6: 23,
  5: 21,
  4: 15,
};

function field(block: string, label: string): string | undefined {
  const match = block.match(new RegExp(`^\\s*${label}\\s*:[ \\t]*(.*)$`, "m"));
  const value = match?.[1]?.trim();
  return value ? value : undefined;
}

export function splitBlocks(output: string): string[] {
  return output.split(/^\s*-{5,}\s*$/m).filter((block) => block.trim().length > 0);
}

/** Parses `avdmanager list avd`. Blocks without a name are dropped. */
export function parseAvdList(output: string): AvdBlock[] {
  const blocks: AvdBlock[] = [];

  for (const raw of splitBlocks(output)) {
    const name = field(raw, "Name");
    if (!name) continue;

    const device = field(raw, "Device") ?? "";
    blocks.push({
      name,
      deviceType: device.replace(/\s*\(.*\)\s*$/, ""),
      deviceLabel: device,
      path: field(raw, "Path"),
      target: field(raw, "Target"),
      basedOn: field(raw, "Based on"),
      raw,
    });
  }

  return blocks;
}

export function parseConfigIni(text: string): Map<string, string> {
  const entries = new Map<string, string>();

  for (const line of text.split("\n")) {
    const trimmed = line.trim();
    if (!trimmed || trimmed.startsWith("#") || trimmed.startsWith(";")) continue;

    const separator = trimmed.indexOf("=");
    if (separator <= 0) continue;

    entries.set(trimmed.slice(0, separator).trim(), trimmed.slice(separator + 1).trim());
  }

  return entries;
}

/** Rewrites the given keys in config.ini text, appending any that are missing. */
export function updateConfigIni(text: string, updates: Record<string, string>): string {
  const pending = new Map(Object.entries(updates));
  const lines = text.split("\n");

  const rewritten = lines.map((line) => {
    const separator = line.indexOf("=");
    if (separator <= 0) return line;

    const key = line.slice(0, separator).trim();
    const value = pending.get(key);
    if (value === undefined) return line;

    pending.delete(key);
    return `${key}=${value}`;
  });

  while (rewritten.length > 0 && rewritten[rewritten.length - 1]?.trim() === "") {
    rewritten.pop();
  }
  for (const [key, value] of pending) {
    rewritten.push(`${key}=${value}`);
  }

  return `${rewritten.join("\n")}\n`;
}

export function apiLevelFromConfig(config: Map<string, string> | null): number | null {
  if (!config) return null;

  const target = config.get("target")?.match(/android-(\d+)/);
  if (target?.[1]) return parseInt(target[1], 10);

  const sysdir = config.get("image.sysdir.1")?.match(/android-(\d+)/);
  if (sysdir?.[1]) return parseInt(sysdir[1], 10);

  return null;
}

export function apiLevelFromTarget(block: AvdBlock): number | null {
  for (const line of [block.basedOn, block.target]) {
    if (!line) continue;

    const explicit = line.match(/API level (\d+)/i);
    if (explicit?.[1]) return parseInt(explicit[1], 10);

    const version = line.match(/Android\s+(\d+)(?:\.\d+)*/i);
    if (version?.[1]) {
      const api = ANDROID_MAJOR_TO_API[parseInt(version[1], 10)];
      if (api !== undefined) return api;
    }
  }

  return null;
}

export function apiLevelFromText(text: string): number | null {
  const match = text.match(/API level (\d+)/i) ?? text.match(/android-(\d+)/i);
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/**
 * Resolves the API level of an AVD. The first strategy that yields a value
 * wins: config.ini, the Target/Based on lines, then any mention in the
 * block. Unresolved levels stay INVALID_API_LEVEL.
 */
export function resolveApiLevel(block: AvdBlock, config: Map<string, string> | null): number {
  return (
    apiLevelFromConfig(config) ??
    apiLevelFromTarget(block) ??
    apiLevelFromText(block.raw) ??
    INVALID_API_LEVEL
  );
}

export function sanitizeAvdName(name: string): string {
  return name
    .trim()
    .replace(/\s+/g, "_")
    .replace(/[^A-Za-z0-9._-]/g, "_");
}

function categoryFromTag(tag: string | undefined): DeviceCategory | null {
  if (!tag) return null;
  if (tag.includes("android-tv") || tag.includes("google-tv")) return "tv";
  if (tag.includes("android-wear")) return "wear";
  if (tag.includes("android-automotive")) return "automotive";
  if (tag.includes("android-desktop")) return "desktop";
  return null;
}

/** Parses `avdmanager list device`. */
export function parseDeviceDefinitions(output: string): DeviceDefinition[] {
  const definitions: DeviceDefinition[] = [];

  for (const raw of splitBlocks(output)) {
    const id = raw.match(/id:\s*\d+\s+or\s+"([^"]+)"/)?.[1];
    if (!id) continue;

    const displayName = field(raw, "Name") ?? id;
    const oem = field(raw, "OEM") ?? "";
    const tag = field(raw, "Tag");

    definitions.push({
      id,
      displayName,
      oem,
      tag,
      category: categoryFromTag(tag) ?? deviceCategory(id, displayName),
    });
  }

  return definitions;
}

/**
 * Parses the package tables of `sdkmanager --list`. Rows under
 * "Installed packages" are marked installed; an installed row wins over
 * the same package listed as available.
 */
export function parseSystemImages(output: string): SystemImage[] {
  const images = new Map<string, SystemImage>();
  let section: "installed" | "available" | "other" = "other";

  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();

    if (/^Installed packages:/i.test(line)) {
      section = "installed";
      continue;
    }
    if (/^Available Packages:/i.test(line)) {
      section = "available";
      continue;
    }
    if (/^Available Updates:/i.test(line)) {
      section = "other";
      continue;
    }
    if (section === "other") continue;

    const columns = line.split("|").map((column) => column.trim());
    const packageId = columns[0] ?? "";
    const match = packageId.match(/^system-images;android-(\d+)[^;]*;([^;]+);([^;\s]+)$/);
    if (!match?.[1] || !match[2] || !match[3]) continue;

    const existing = images.get(packageId);
    if (existing?.installed) continue;

    images.set(packageId, {
      packageId,
      apiLevel: parseInt(match[1], 10),
      tag: match[2],
      abi: match[3],
      description: columns[2] ?? "",
      installed: section === "installed",
    });
  }

  return [...images.values()];
}

const TAG_PREFERENCE = ["google_apis_playstore", "google_apis", "default"];

function tagRank(tag: string): number {
  const index = TAG_PREFERENCE.indexOf(tag);
  return index === -1 ? TAG_PREFERENCE.length : index;
}

export function preferredAbis(hostArch: string): string[] {
  return hostArch === "arm64" ? ["arm64-v8a", "x86_64"] : ["x86_64", "arm64-v8a"];
}

function abiRank(abi: string, hostArch: string): number {
  const index = preferredAbis(hostArch).indexOf(abi);
  return index === -1 ? 2 : index;
}

/** Picks the installed system image to build an AVD from. */
export function pickSystemImage(
  images: SystemImage[],
  apiLevel: number,
  hostArch: string
): SystemImage | undefined {
  return images
    .filter((image) => image.installed && image.apiLevel === apiLevel)
    .sort(
      (a, b) =>
        tagRank(a.tag) - tagRank(b.tag) || abiRank(a.abi, hostArch) - abiRank(b.abi, hostArch)
    )[0];
}

/** Level of a `logcat -v time` line, e.g. `10-19 12:00:00.123 E/Tag( 99): ...`. */
export function detectLogcatLevel(line: string): DeviceLogLevel {
  const priority = line.match(/\s([VDIWEF])\//)?.[1] ?? line.match(/\s([VDIWEF])\s/)?.[1];

  switch (priority) {
    case "E":
    case "F":
      return "ERROR";
    case "W":
      return "WARN";
    case "I":
      return "INFO";
    case "D":
    case "V":
      return "DEBUG";
  }

  return line.includes("ERROR") ? "ERROR" : "INFO";
}
