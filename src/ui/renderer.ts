import colors from "picocolors";
import type { AppState } from "@/app/state";
import type { FormField } from "@/app/state/form";
import type { LogEntry, Notification } from "@/app/state/types";
import { APP_NAME, APP_VERSION } from "@/constants";
import type { Device, DeviceStatus } from "@/types/device";

export type Palette = ReturnType<typeof colors.createColors>;

export interface ScreenSize {
  columns: number;
  rows: number;
}

export interface Renderer {
  render(state: Readonly<AppState>): void;
}

const FIELD_LABELS: Record<FormField, string> = {
  ApiLevel: "Version",
  Category: "Category",
  DeviceType: "Device type",
  RamSize: "RAM (MB)",
  StorageSize: "Storage (MB)",
  Name: "Name",
};

const HELP_LINES = [
  "q / Ctrl+C     quit",
  "Tab, h/l       switch Android / iOS panel",
  "Shift+Tab      focus device list / logs",
  "j/k, arrows    move selection or scroll logs",
  "Enter          start or stop the selected device",
  "r              refresh now",
  "c              create a device",
  "d / w          delete / wipe the selected device",
  "a              manage Android system images",
  "f              cycle log filter",
  "F              fullscreen logs",
  "L              clear logs",
  "S              toggle log auto-scroll",
  "Esc            dismiss notifications",
];

function truncate(text: string, width: number): string {
  if (width <= 0) return "";
  return text.length > width ? `${text.slice(0, Math.max(0, width - 1))}…` : text;
}

export function statusBadge(status: DeviceStatus, c: Palette): string {
  switch (status) {
    case "Running":
      return c.green("● running");
    case "Starting":
      return c.yellow("◐ starting");
    case "Stopping":
      return c.yellow("◑ stopping");
    case "Creating":
      return c.cyan("◌ creating");
    case "Stopped":
      return c.gray("○ stopped");
    case "Error":
      return c.red("✕ error");
    case "Unknown":
      return c.gray("? unknown");
  }
}

function deviceVersion(device: Device): string {
  return device.platform === "android"
    ? device.apiLevel > 0
      ? `API ${device.apiLevel}`
      : "API ?"
    : `iOS ${device.iosVersion}`;
}

function logLine(entry: LogEntry, width: number, c: Palette): string {
  const text = truncate(`${entry.timestamp} ${entry.level.padEnd(5)} ${entry.message}`, width);
  switch (entry.level) {
    case "ERROR":
      return c.red(text);
    case "WARN":
      return c.yellow(text);
    case "DEBUG":
      return c.gray(text);
    case "INFO":
      return text;
  }
}

function notificationLine(notification: Notification, c: Palette): string {
  switch (notification.type) {
    case "success":
      return c.green(`[+] ${notification.message}`);
    case "error":
      return c.red(`[X] ${notification.message}`);
    case "warning":
      return c.yellow(`[!] ${notification.message}`);
    case "info":
      return c.cyan(`[~] ${notification.message}`);
  }
}

function deviceLines(state: Readonly<AppState>, width: number, c: Palette): string[] {
  if (state.activePanel === "ios" && !state.iosSupported) {
    return [c.gray("  iOS simulators are only available on macOS")];
  }
  if (state.isInitialLoad) return [c.gray("  Loading devices...")];

  const devices = state.activeDevices;
  if (devices.length === 0) {
    return [c.gray("  No devices. Press 'c' to create one")];
  }

  return devices.map((device, index) => {
    const selected = index === state.selectedIndex;
    const marker = selected ? c.cyan("›") : " ";
    const name = truncate(device.name, Math.max(10, width - 30));
    const line = `${marker} ${name.padEnd(Math.max(10, width - 30))} ${deviceVersion(device).padEnd(9)} ${statusBadge(device.status, c)}`;
    return selected && state.focusedPanel === "deviceList" ? c.bold(line) : line;
  });
}

function detailLines(state: Readonly<AppState>, c: Palette): string[] {
  const details = state.cachedDeviceDetails;
  if (!details) return [];

  const parts = [
    details.deviceType,
    details.versionDisplay,
    details.ramSize ? `RAM ${details.ramSize}` : "",
    details.storageSize ? `Storage ${details.storageSize}` : "",
    details.resolution ?? "",
  ].filter(Boolean);

  return [c.dim(`  ${parts.join(" · ")}`)];
}

function logLines(state: Readonly<AppState>, height: number, width: number, c: Palette): string[] {
  const logs = state.logs;
  const filter = logs.filterLevel ? ` [${logs.filterLevel}]` : "";
  const follow = logs.autoScroll && !logs.manuallyScrolled ? "" : " [paused]";
  const title =
    state.focusedPanel === "logArea" ? c.bold(`Logs${filter}${follow}`) : `Logs${filter}${follow}`;

  if (!state.currentLogDevice) return [title, c.gray("  Select a running device to see its logs")];

  const visible = logs.visible();
  const end = Math.min(visible.length, logs.scrollOffset + 1);
  const start = Math.max(0, end - height);
  return [title, ...visible.slice(start, end).map((entry) => logLine(entry, width, c))];
}

function formLines(state: Readonly<AppState>, c: Palette): string[] {
  const form = state.createDeviceForm;
  const lines = [c.bold(`Create ${form.platform === "android" ? "Android device" : "iOS simulator"}`)];

  if (form.isLoading) return [...lines, c.gray("  Loading options...")];

  const values: Record<FormField, string> = {
    ApiLevel: form.versionDisplay || "-",
    Category: form.category,
    DeviceType: form.deviceType || "-",
    RamSize: form.ramSize,
    StorageSize: form.storageSize,
    Name: form.name,
  };

  for (const field of form.fields) {
    const active = field === form.activeField;
    const label = FIELD_LABELS[field].padEnd(13);
    const value = active ? c.cyan(`‹ ${values[field]} ›`) : values[field];
    lines.push(`${active ? c.cyan("›") : " "} ${label} ${value}`);
  }

  if (form.errorMessage) lines.push(c.red(`  ${form.errorMessage}`));
  lines.push(
    form.isCreating
      ? c.yellow("  Creating...")
      : c.gray("  ↑/↓ field · ←/→ choose · Enter create · Esc cancel")
  );
  return lines;
}

function apiLevelLines(state: Readonly<AppState>, c: Palette): string[] {
  const manager = state.apiLevelManager;
  const lines = [c.bold("Android system images")];

  if (manager.isLoading) return [...lines, c.gray("  Loading...")];
  if (manager.error) lines.push(c.red(`  ${manager.error}`));

  manager.levels.forEach((level, index) => {
    const selected = index === manager.selected;
    const mark = level.installed ? c.green("installed") : c.gray("available");
    lines.push(`${selected ? c.cyan("›") : " "} API ${String(level.apiLevel).padEnd(3)} ${level.versionName.padEnd(12)} ${mark}`);
  });
  lines.push(c.gray("  Enter install/uninstall · Esc close"));
  return lines;
}

/** Builds one full frame as lines. */
export function buildFrame(state: Readonly<AppState>, size: ScreenSize, c: Palette = colors): string[] {
  const width = Math.max(40, size.columns);
  const tabs = (["android", "ios"] as const)
    .map((panel) => {
      const label = panel === "android" ? "Android" : "iOS";
      return panel === state.activePanel ? c.inverse(` ${label} `) : ` ${label} `;
    })
    .join(" ");

  const header = [`${c.bold(APP_NAME)} ${c.dim(`v${APP_VERSION}`)}  ${tabs}`];
  if (state.deviceOperationStatus) header.push(c.yellow(state.deviceOperationStatus));

  const notifications = state.notifications.all.map((n) => notificationLine(n, c));
  const footer = c.dim("? help · q quit");

  let body: string[];
  switch (state.mode) {
    case "CreateDevice":
      body = formLines(state, c);
      break;
    case "ConfirmDelete":
    case "ConfirmWipe": {
      const verb = state.mode === "ConfirmDelete" ? "Delete" : "Wipe data of";
      body = [c.yellow(`${verb} '${state.confirmDialog?.deviceName ?? ""}'? (y/n)`)];
      break;
    }
    case "ManageApiLevels":
      body = apiLevelLines(state, c);
      break;
    case "Help":
      body = [c.bold("Keys"), ...HELP_LINES.map((line) => `  ${line}`), c.gray("  any key to close")];
      break;
    case "Normal": {
      const fixed = header.length + notifications.length + 2;
      if (state.logs.fullscreen) {
        body = logLines(state, Math.max(1, size.rows - fixed - 1), width, c);
      } else {
        const devices = [...deviceLines(state, width, c), ...detailLines(state, c)];
        const logHeight = Math.max(1, size.rows - fixed - devices.length - 2);
        body = [...devices, "", ...logLines(state, logHeight, width, c)];
      }
      break;
    }
  }

  return [...header, "", ...body, ...notifications, footer];
}

export class TerminalRenderer implements Renderer {
  constructor(private readonly output: NodeJS.WriteStream = process.stdout) {}

  render(state: Readonly<AppState>): void {
    const size = {
      columns: this.output.columns || 80,
      rows: this.output.rows || 24,
    };
    const frame = buildFrame(state, size).slice(0, size.rows);
    this.output.write(`\x1b[H\x1b[2J${frame.join("\n")}`);
  }

  enter(): void {
    this.output.write("\x1b[?1049h\x1b[?25l");
  }

  leave(): void {
    this.output.write("\x1b[?25h\x1b[?1049l");
  }
}
