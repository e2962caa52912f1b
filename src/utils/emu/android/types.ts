import type { DeviceCategory } from "@/types/device";

export interface AvdBlock {
  name: string;
  deviceType: string;
  deviceLabel: string;
  path?: string;
  target?: string;
  basedOn?: string;
  raw: string;
}

export interface DeviceDefinition {
  id: string;
  displayName: string;
  oem: string;
  tag?: string;
  category: DeviceCategory;
}

/** An installed API level offered as a creation target. */
export interface TargetInfo {
  id: string;
  name: string;
  apiLevel: number;
}

export interface SystemImage {
  packageId: string;
  apiLevel: number;
  tag: string;
  abi: string;
  description: string;
  installed: boolean;
}

export interface ApiLevelInfo {
  apiLevel: number;
  versionName: string;
  installed: boolean;
  images: SystemImage[];
  /** Package the manager installs when this level is chosen. */
  recommendedPackage: string;
}

export interface AndroidManagerOptions {
  androidHome?: string;
  avdHome?: string;
  bootTimeoutMs?: number;
  pollIntervalMs?: number;
  hostArch?: string;
}
