import type { DeviceLogLevel, Platform } from "@/types/device";

export type Panel = Platform;

export type FocusedPanel = "deviceList" | "logArea";

export type Mode =
  | "Normal"
  | "CreateDevice"
  | "ConfirmDelete"
  | "ConfirmWipe"
  | "ManageApiLevels"
  | "Help";

export type NotificationType = "success" | "error" | "warning" | "info";

export interface Notification {
  id: number;
  message: string;
  type: NotificationType;
  timestamp: number;
  /** null keeps the notification until dismissed. */
  autoDismissAfterMs: number | null;
}

export interface LogEntry {
  timestamp: string;
  level: DeviceLogLevel;
  message: string;
}

export interface LogTarget {
  platform: Platform;
  identifier: string;
}

export interface ConfirmDialog {
  deviceName: string;
  identifier: string;
  platform: Platform;
}

export interface ApiLevelRow {
  apiLevel: number;
  versionName: string;
  installed: boolean;
  packageId: string;
}
