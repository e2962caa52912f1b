import { LIMITS } from "@/constants";
import versionTable from "@/data/android-versions.json";
import type { DeviceCategory } from "@/types/device";

const ANDROID_VERSION_NAMES: Record<string, string> = versionTable;

const OTHER_BRANDS = [
  "samsung",
  "galaxy",
  "xiaomi",
  "motorola",
  "moto ",
  "sony",
  "huawei",
  "oppo",
  "vivo",
  "asus",
  "lenovo",
  "nokia",
];

const CATEGORY_KEYWORDS: Array<[DeviceCategory, string[]]> = [
  ["tablet", ["tablet", "ipad"]],
  ["wear", ["wear", "wearos", "watch", "round", "square"]],
  ["tv", ["tv", "1080p", "720p", "4k"]],
  ["automotive", ["automotive", "auto", "car"]],
  ["desktop", ["desktop"]],
  ["phone", ["phone", "pixel", "galaxy", "oneplus", "nexus"]],
];

const ANDROID_CATEGORY_PRIORITY: Record<DeviceCategory, number> = {
  phone: 70,
  tablet: 100,
  tv: 200,
  wear: 300,
  automotive: 400,
  desktop: 500,
};

class BoundedCache<V> {
  private readonly entries = new Map<string, V>();

  constructor(private readonly limit: number) {}

  get(key: string, compute: () => V): V {
    const cached = this.entries.get(key);
    if (cached !== undefined) return cached;

    const value = compute();
    if (this.entries.size >= this.limit) {
      const oldest = this.entries.keys().next();
      if (!oldest.done) this.entries.delete(oldest.value);
    }
    this.entries.set(key, value);
    return value;
  }

  clear(): void {
    this.entries.clear();
  }
}

const androidPriorityCache = new BoundedCache<number>(LIMITS.priorityCacheSize);
const iosPriorityCache = new BoundedCache<number>(LIMITS.priorityCacheSize);
const versionNameCache = new BoundedCache<string>(LIMITS.priorityCacheSize);

function firstNumberAfter(text: string, keyword: string): number | null {
  const match = text.match(new RegExp(`${keyword}[\\s_-]*(\\d+)`));
  return match?.[1] ? parseInt(match[1], 10) : null;
}

/** Keywords match whole words of `text`; `_`, `-` and punctuation separate words. */
export function matchCategory(text: string): DeviceCategory | null {
  const words = new Set(text.toLowerCase().split(/[^a-z0-9]+/).filter(Boolean));
  for (const [category, keywords] of CATEGORY_KEYWORDS) {
    if (keywords.some((keyword) => words.has(keyword))) {
      return category;
    }
  }
  return null;
}

export function deviceCategory(deviceType: string, name: string = ""): DeviceCategory {
  return matchCategory(`${deviceType} ${name}`) ?? "phone";
}

function computeAndroidPriority(deviceId: string, displayName: string): number {
  const combined = `${deviceId} ${displayName}`.toLowerCase();

  if (combined.includes("pixel") && !combined.includes("nexus")) {
    const model = firstNumberAfter(combined, "pixel");
    return model === null ? 30 : 30 - Math.min(model, 9);
  }
  if (combined.includes("nexus")) return 40;
  if (combined.includes("oneplus")) return 50;
  if (OTHER_BRANDS.some((brand) => combined.includes(brand))) return 60;

  const category = matchCategory(combined);
  // Unrecognized devices score 0 and therefore sort first.
  return category ? ANDROID_CATEGORY_PRIORITY[category] : 0;
}

function computeIosPriority(displayName: string): number {
  const name = displayName.toLowerCase();

  if (name.includes("iphone")) {
    if (name.includes("pro max")) return 0;
    if (name.includes("pro")) return 10;
    if (name.includes("plus") || name.includes("max")) return 20;
    if (name.includes("mini")) return 30;
    if (name.includes("se")) return 40;
    const model = firstNumberAfter(name, "iphone");
    return model === null ? 50 : 50 - Math.min(model, 30);
  }

  if (name.includes("ipad")) {
    if (name.includes("pro")) {
      if (name.includes("12.9")) return 100;
      if (name.includes("11")) return 110;
      return 120;
    }
    if (name.includes("air")) return 130;
    if (name.includes("mini")) return 140;
    return 150;
  }

  if (name.includes("tv")) {
    return name.includes("4k") ? 200 : 210;
  }

  if (name.includes("watch")) {
    if (name.includes("ultra")) return 300;
    if (name.includes("series")) {
      const series = firstNumberAfter(name, "series");
      return series === null ? 320 : 310 - Math.min(series, 10);
    }
    if (name.includes("se")) return 330;
    return 340;
  }

  return 0;
}

/** Lower sorts first. Memoized per (deviceId, displayName). */
export function androidDevicePriority(deviceId: string, displayName: string): number {
  return androidPriorityCache.get(`${deviceId}\u0000${displayName}`, () =>
    computeAndroidPriority(deviceId, displayName)
  );
}

export function iosDevicePriority(displayName: string): number {
  return iosPriorityCache.get(displayName, () => computeIosPriority(displayName));
}

export function androidVersionName(apiLevel: number): string {
  return versionNameCache.get(String(apiLevel), () => {
    return ANDROID_VERSION_NAMES[String(apiLevel)] ?? `API ${apiLevel}`;
  });
}

export function clearPriorityCaches(): void {
  androidPriorityCache.clear();
  iosPriorityCache.clear();
  versionNameCache.clear();
}
