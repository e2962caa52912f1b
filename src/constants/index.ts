export const APP_NAME = "emu-deck";
export const APP_VERSION = "0.1.0";

export const OPERATION_ORDER = [
  "start-device",
  "stop-device",
  "create-device",
  "wipe-device",
  "delete-device",
  "install-system-image",
  "uninstall-system-image",
] as const;

export type OperationId = (typeof OPERATION_ORDER)[number];

export const TIMEOUTS = {
  command: 30_000,
  sdkmanager: 120_000,
  boot: 180_000,
  bootPollInterval: 2_000,
  waitForDevice: 60_000,
  propertyLookup: 5_000,
} as const;

export const REFRESH = {
  intervalMs: 3_000,
  pendingStartIntervalMs: 1_000,
  catalogFreshMs: 30_000,
  catalogExpiryMs: 300_000,
  tickMs: 250,
} as const;

export const INPUT = {
  pollIntervalMs: 8,
  debounceMs: 8,
  navigationBatchMs: 50,
} as const;

export const LIMITS = {
  maxNotifications: 10,
  maxLogEntries: 1_000,
  maxDeviceNameLength: 50,
  minRamMb: 512,
  maxRamMb: 8_192,
  minStorageMb: 1_024,
  maxStorageMb: 65_536,
  priorityCacheSize: 512,
} as const;

export const DEFAULTS = {
  ramSize: "2048",
  storageSize: "8192",
  notificationDismissMs: 5_000,
  logFile: "emu-deck.log",
} as const;

export const EMULATOR_LAUNCH_FLAGS = [
  "-no-audio",
  "-no-snapshot-save",
  "-no-boot-anim",
  "-netfast",
];

// Files removed from an AVD directory by a wipe.
export const AVD_USER_DATA = [
  "userdata-qemu.img",
  "userdata-qemu.img.qcow2",
  "cache.img",
  "cache.img.qcow2",
  "sdcard.img.qcow2",
  "snapshots",
];
