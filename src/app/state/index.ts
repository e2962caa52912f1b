import { REFRESH, type OperationId } from "@/constants";
import {
  withStatus,
  type AndroidDevice,
  type Device,
  type DeviceDetails,
  type DeviceStatus,
  type IosDevice,
  type Platform,
} from "@/types/device";
import { CreateDeviceForm } from "./form";
import { LogBuffer } from "./logs";
import { NotificationQueue, type NotifyOptions } from "./notifications";
import type {
  ApiLevelRow,
  ConfirmDialog,
  FocusedPanel,
  LogTarget,
  Mode,
  NotificationType,
  Panel,
} from "./types";

export interface ApiLevelManagerState {
  levels: ApiLevelRow[];
  selected: number;
  isLoading: boolean;
  error: string | null;
}

export interface AppStateOptions {
  iosSupported?: boolean;
  refreshIntervalMs?: number;
}

function clampSelection(index: number, length: number): number {
  if (length === 0) return 0;
  return Math.min(Math.max(index, 0), length - 1);
}

function sameTarget(a: LogTarget | null, b: LogTarget | null): boolean {
  if (a === null || b === null) return a === b;
  return a.platform === b.platform && a.identifier === b.identifier;
}

export class AppState {
  activePanel: Panel = "android";
  focusedPanel: FocusedPanel = "deviceList";
  selectedAndroid = 0;
  selectedIos = 0;
  androidDevices: AndroidDevice[] = [];
  iosDevices: IosDevice[] = [];

  mode: Mode = "Normal";
  createDeviceForm = new CreateDeviceForm("android");
  confirmDialog: ConfirmDialog | null = null;
  apiLevelManager: ApiLevelManagerState = {
    levels: [],
    selected: 0,
    isLoading: false,
    error: null,
  };

  readonly notifications = new NotificationQueue();
  readonly logs = new LogBuffer();
  currentLogDevice: LogTarget | null = null;
  cachedDeviceDetails: DeviceDetails | null = null;

  readonly pendingDeviceStarts = new Set<string>();
  /** Stopped devices the tools may still briefly report as running. */
  readonly pendingDeviceStops = new Set<string>();
  readonly operationsInFlight = new Map<string, OperationId>();
  deviceOperationStatus: string | null = null;

  lastRefresh = 0;
  isInitialLoad = true;
  readonly iosSupported: boolean;
  private readonly baseRefreshIntervalMs: number;

  constructor(options: AppStateOptions = {}) {
    this.iosSupported = options.iosSupported ?? true;
    this.baseRefreshIntervalMs = options.refreshIntervalMs ?? REFRESH.intervalMs;
  }

  // Devices and selection

  devicesFor(platform: Platform): readonly Device[] {
    return platform === "android" ? this.androidDevices : this.iosDevices;
  }

  get activeDevices(): readonly Device[] {
    return this.devicesFor(this.activePanel);
  }

  get selectedIndex(): number {
    return this.activePanel === "android" ? this.selectedAndroid : this.selectedIos;
  }

  selectedDevice(): Device | undefined {
    return this.activeDevices[this.selectedIndex];
  }

  private setSelectedIndex(index: number): void {
    if (this.activePanel === "android") this.selectedAndroid = index;
    else this.selectedIos = index;
  }

  /**
   * Status to show for a freshly listed device. A pending start shows
   * `Starting` until the tool reports it running; any other operation in
   * flight keeps the status it set; a finished stop shows `Stopped` until
   * the tool stops reporting the device as running.
   */
  private reconcileStatus<T extends Device>(device: T, shown: DeviceStatus | undefined): T {
    const id = device.identifier;

    if (this.pendingDeviceStarts.has(id)) {
      return device.status === "Running" ? device : withStatus(device, "Starting");
    }
    if (this.operationsInFlight.has(id) && shown !== undefined) {
      return shown === device.status ? device : withStatus(device, shown);
    }
    if (this.pendingDeviceStops.has(id)) {
      if (device.status !== "Running") {
        this.pendingDeviceStops.delete(id);
        return device;
      }
      return withStatus(device, "Stopped");
    }
    return device;
  }

  /** Replaces a platform's list wholesale, keeping in-flight statuses. */
  replaceDevices(platform: Platform, devices: Device[]): void {
    const before = platform === this.activePanel ? this.selectedDevice()?.identifier : undefined;
    const shown = new Map(this.devicesFor(platform).map((d) => [d.identifier, d.status]));

    const patched = devices.map((device) =>
      this.reconcileStatus(device, shown.get(device.identifier))
    );
    const listed = new Set(devices.map((d) => d.identifier));
    for (const id of [...this.pendingDeviceStops]) {
      if (shown.has(id) && !listed.has(id)) this.pendingDeviceStops.delete(id);
    }

    if (platform === "android") {
      this.androidDevices = patched.filter((d): d is AndroidDevice => d.platform === "android");
      this.selectedAndroid = clampSelection(this.selectedAndroid, this.androidDevices.length);
    } else {
      this.iosDevices = patched.filter((d): d is IosDevice => d.platform === "ios");
      this.selectedIos = clampSelection(this.selectedIos, this.iosDevices.length);
    }

    if (platform === this.activePanel && this.selectedDevice()?.identifier !== before) {
      this.cachedDeviceDetails = null;
    }
  }

  setDeviceStatus(platform: Platform, identifier: string, status: DeviceStatus): void {
    if (platform === "android") {
      this.androidDevices = this.androidDevices.map((d) =>
        d.identifier === identifier ? withStatus(d, status) : d
      );
    } else {
      this.iosDevices = this.iosDevices.map((d) =>
        d.identifier === identifier ? withStatus(d, status) : d
      );
    }

    if (this.cachedDeviceDetails?.identifier === identifier) {
      this.cachedDeviceDetails = { ...this.cachedDeviceDetails, status };
    }
  }

  removeDevice(platform: Platform, identifier: string): void {
    this.replaceDevices(
      platform,
      this.devicesFor(platform).filter((d) => d.identifier !== identifier)
    );
  }

  moveUp(): void {
    this.moveBy(-1);
  }

  moveDown(): void {
    this.moveBy(1);
  }

  /** Moves the selection, wrapping at both ends. */
  moveBy(delta: number): void {
    const length = this.activeDevices.length;
    if (length === 0 || delta === 0) return;

    const next = (((this.selectedIndex + delta) % length) + length) % length;
    if (next !== this.selectedIndex) {
      this.setSelectedIndex(next);
      this.cachedDeviceDetails = null;
    }
  }

  nextPanel(): void {
    this.switchPanel(this.activePanel === "android" ? "ios" : "android");
  }

  switchPanel(panel: Panel): void {
    if (panel === this.activePanel) return;
    this.activePanel = panel;
    this.cachedDeviceDetails = null;
  }

  toggleFocus(): void {
    this.focusedPanel = this.focusedPanel === "deviceList" ? "logArea" : "deviceList";
  }

  // Modes

  openCreateForm(): CreateDeviceForm {
    this.createDeviceForm = new CreateDeviceForm(this.activePanel);
    this.createDeviceForm.isLoading = true;
    this.mode = "CreateDevice";
    return this.createDeviceForm;
  }

  /** Enters a confirm mode for the selected device; false when none. */
  openConfirm(mode: "ConfirmDelete" | "ConfirmWipe"): boolean {
    const device = this.selectedDevice();
    if (!device) return false;

    this.confirmDialog = {
      deviceName: device.name,
      identifier: device.identifier,
      platform: device.platform,
    };
    this.mode = mode;
    return true;
  }

  openApiLevelManager(): void {
    this.apiLevelManager = { levels: [], selected: 0, isLoading: true, error: null };
    this.mode = "ManageApiLevels";
  }

  setApiLevels(levels: ApiLevelRow[], error: string | null): void {
    this.apiLevelManager = {
      levels,
      selected: clampSelection(this.apiLevelManager.selected, levels.length),
      isLoading: false,
      error,
    };
  }

  moveApiLevelSelection(delta: number): void {
    const length = this.apiLevelManager.levels.length;
    if (length === 0) return;
    this.apiLevelManager.selected =
      (((this.apiLevelManager.selected + delta) % length) + length) % length;
  }

  selectedApiLevel(): ApiLevelRow | undefined {
    return this.apiLevelManager.levels[this.apiLevelManager.selected];
  }

  closeDialog(): void {
    this.mode = "Normal";
    this.confirmDialog = null;
  }

  // Notifications

  notify(message: string, type: NotificationType, options?: NotifyOptions): void {
    this.notifications.push(message, type, options);
  }

  notifySuccess(message: string): void {
    this.notify(message, "success");
  }

  notifyError(message: string): void {
    this.notify(message, "error");
  }

  notifyWarning(message: string): void {
    this.notify(message, "warning");
  }

  notifyInfo(message: string): void {
    this.notify(message, "info");
  }

  // Logs

  /** Points log streaming at a new device; clears logs when it changes. */
  setLogTarget(target: LogTarget | null): boolean {
    if (sameTarget(this.currentLogDevice, target)) return false;
    this.currentLogDevice = target;
    this.logs.clear();
    return true;
  }

  isCurrentLogTarget(target: LogTarget): boolean {
    return sameTarget(this.currentLogDevice, target);
  }

  // Operations

  get operationInFlight(): boolean {
    return this.operationsInFlight.size > 0;
  }

  setOperationStatus(label: string | null): void {
    this.deviceOperationStatus = label;
  }

  /** Clears the headline only if it still shows `label`. */
  clearOperationStatus(label: string): void {
    if (this.deviceOperationStatus === label) this.deviceOperationStatus = null;
  }

  // Refresh

  get refreshIntervalMs(): number {
    return this.pendingDeviceStarts.size > 0
      ? REFRESH.pendingStartIntervalMs
      : this.baseRefreshIntervalMs;
  }

  shouldRefresh(now: number): boolean {
    return now - this.lastRefresh >= this.refreshIntervalMs;
  }

  requestRefresh(): void {
    this.lastRefresh = 0;
  }
}

export { CreateDeviceForm } from "./form";
export { LogBuffer } from "./logs";
export { NotificationQueue } from "./notifications";
export * from "./types";
