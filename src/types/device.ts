export type Platform = "android" | "ios";

export type DeviceStatus =
  | "Unknown"
  | "Creating"
  | "Starting"
  | "Running"
  | "Stopping"
  | "Stopped"
  | "Error";

export type DeviceCategory =
  | "phone"
  | "tablet"
  | "tv"
  | "wear"
  | "automotive"
  | "desktop";

// Unresolved API level. Kept distinct from any real level.
export const INVALID_API_LEVEL = -1;

interface DeviceCommon {
  name: string;
  identifier: string;
  deviceType: string;
  category: DeviceCategory;
  status: DeviceStatus;
  isRunning: boolean;
}

export interface AndroidDevice extends DeviceCommon {
  platform: "android";
  apiLevel: number;
  ramSize: string;
  storageSize: string;
  path?: string;
}

export interface IosDevice extends DeviceCommon {
  platform: "ios";
  iosVersion: string;
  runtimeVersion: string;
  isAvailable: boolean;
}

export type Device = AndroidDevice | IosDevice;

export interface DeviceConfig {
  name: string;
  deviceType: string;
  version: string;
  ramSize?: string;
  storageSize?: string;
  additionalOptions: Record<string, string>;
}

export interface DeviceDetails {
  name: string;
  identifier: string;
  platform: Platform;
  status: DeviceStatus;
  deviceType: string;
  category: DeviceCategory;
  versionDisplay: string;
  ramSize?: string;
  storageSize?: string;
  resolution?: string;
  density?: string;
  path?: string;
}

/**
 * Returns a copy of the device with `status` replaced and `isRunning`
 * derived from it. Every status change goes through here.
 */
export function withStatus<T extends Device>(device: T, status: DeviceStatus): T {
  return { ...device, status, isRunning: status === "Running" };
}

export function isAndroidDevice(device: Device): device is AndroidDevice {
  return device.platform === "android";
}

export function isIosDevice(device: Device): device is IosDevice {
  return device.platform === "ios";
}

export type DeviceLogLevel = "ERROR" | "WARN" | "INFO" | "DEBUG";
