import { REFRESH, type OperationId } from "@/constants";
import "@/operations";
import type { StateStore } from "@/app/state/store";
import type { ApiLevelRow, LogTarget } from "@/app/state/types";
import type { Device, Platform } from "@/types/device";
import { formatUserError } from "@/types/errors";
import {
  OperationRegistry,
  type Managers,
  type OperationResult,
  type OperationTarget,
} from "@/types/operation";
import { CatalogCache, type CatalogCacheOptions } from "@/utils/cache";
import type { CatalogResult, CreationCatalog } from "@/utils/emu/abstraction";
import type { ApiLevelInfo } from "@/utils/emu/android/types";
import type { CommandExecutor } from "@/utils/exec";
import { Logger } from "@/utils/logger";
import { LogStreamer } from "./log-stream";

export interface OrchestratorOptions {
  now?: () => number;
  tickMs?: number;
  catalog?: CatalogCacheOptions;
}

const PLATFORM_LABEL: Record<Platform, string> = {
  android: "Android",
  ios: "iOS",
};

function toApiLevelRow(level: ApiLevelInfo): ApiLevelRow {
  const installedImage = level.images.find((image) => image.installed);
  return {
    apiLevel: level.apiLevel,
    versionName: level.versionName,
    installed: level.installed,
    packageId: installedImage?.packageId ?? level.recommendedPackage,
  };
}

/**
 * Runs the background work of the app: periodic refresh, log streaming,
 * catalog loading and device operations. Everything it learns is written
 * through the StateStore.
 */
export class Orchestrator {
  readonly logs: LogStreamer;
  private readonly creationCatalogs: Record<Platform, CatalogCache<CreationCatalog> | null>;
  private readonly apiLevels: CatalogCache<CatalogResult<ApiLevelInfo>> | null;
  private readonly tasks = new Set<Promise<void>>();
  private readonly lastListError: Record<Platform, string | null> = {
    android: null,
    ios: null,
  };
  private detailsRequest: string | null = null;
  private readonly now: () => number;
  private readonly tickMs: number;

  constructor(
    private readonly store: StateStore,
    private readonly managers: Managers,
    executor: CommandExecutor,
    options: OrchestratorOptions = {}
  ) {
    this.now = options.now ?? Date.now;
    this.tickMs = options.tickMs ?? REFRESH.tickMs;
    this.logs = new LogStreamer(store, managers, executor);

    const android = managers.android;
    const ios = managers.ios;
    const cacheOptions = { now: this.now, ...options.catalog };

    this.creationCatalogs = {
      android: android
        ? new CatalogCache("Android catalog", () => android.loadCreationCatalog(), cacheOptions)
        : null,
      ios: ios
        ? new CatalogCache("simulator catalog", () => ios.loadCreationCatalog(), cacheOptions)
        : null,
    };
    this.apiLevels = android
      ? new CatalogCache("API levels", () => android.listApiLevels(), cacheOptions)
      : null;
  }

  /** Runs `promise` in the background; failures are logged. */
  private track(label: string, promise: Promise<unknown>): void {
    const task: Promise<void> = promise.then(
      () => undefined,
      (error: unknown) => {
        Logger.error(`[X] ${label}: ${formatUserError(error)}`);
      }
    );
    this.tasks.add(task);
    task
      .finally(() => {
        this.tasks.delete(task);
      })
      .catch((error: unknown) => {
        Logger.debug(`[~] ${label} cleanup failed: ${String(error)}`);
      });
  }

  /** Waits for every background task started so far. */
  async drain(): Promise<void> {
    while (this.tasks.size > 0) {
      await Promise.all([...this.tasks]);
    }
  }

  // Refresh

  private async listPlatform(platform: Platform): Promise<Device[] | null> {
    const android = this.managers.android;
    const ios = this.managers.ios;

    try {
      let devices: Device[] | null = null;
      if (platform === "android" && android) devices = await android.listDevices();
      if (platform === "ios" && ios) devices = await ios.listDevices();
      this.lastListError[platform] = null;
      return devices;
    } catch (error) {
      const message = formatUserError(error);
      // Repeated failures are reported once.
      if (this.lastListError[platform] !== message) {
        this.lastListError[platform] = message;
        this.store.update((state) =>
          state.notifyError(`${PLATFORM_LABEL[platform]}: ${message}`)
        );
        Logger.error(`[X] Failed to list ${PLATFORM_LABEL[platform]} devices: ${message}`);
      }
      return null;
    }
  }

  async refreshDevices(): Promise<void> {
    const [android, ios] = await Promise.all([
      this.listPlatform("android"),
      this.listPlatform("ios"),
    ]);

    const now = this.now();
    this.store.update((state) => {
      if (android) state.replaceDevices("android", android);
      if (ios) state.replaceDevices("ios", ios);
      state.lastRefresh = now;
      state.isInitialLoad = false;
    });

    this.syncLogStream();
  }

  /** Follows the selected device's log while it runs. */
  syncLogStream(): void {
    const target = this.store.read((state): LogTarget | null => {
      const device = state.selectedDevice();
      return device?.isRunning
        ? { platform: device.platform, identifier: device.identifier }
        : null;
    });
    this.logs.follow(target);
  }

  private async loadDetails(device: Device): Promise<void> {
    const manager = device.platform === "android" ? this.managers.android : this.managers.ios;
    if (!manager) return;

    try {
      const details = await manager.getDeviceDetails(device.identifier);
      this.store.update((state) => {
        if (state.selectedDevice()?.identifier === device.identifier) {
          state.cachedDeviceDetails = details;
        }
      });
    } finally {
      this.detailsRequest = null;
    }
  }

  /** Loads details for the selection when none are cached. */
  ensureDetails(): void {
    const device = this.store.read((state) =>
      state.cachedDeviceDetails === null ? state.selectedDevice() : undefined
    );
    if (!device || this.detailsRequest === device.identifier) return;

    this.detailsRequest = device.identifier;
    this.track(`Details for ${device.name}`, this.loadDetails(device));
  }

  async tick(): Promise<void> {
    const now = this.now();
    const [due, expired] = this.store.read(
      (state) => [state.shouldRefresh(now), state.notifications.hasExpired(now)] as const
    );

    if (expired) {
      this.store.update((state) => state.notifications.dismissExpired(now));
    }
    if (due) {
      await this.refreshDevices();
    }

    this.ensureDetails();
    for (const cache of [this.creationCatalogs.android, this.creationCatalogs.ios]) {
      if (cache && cache.state() !== "fresh" && cache.state() !== "stale") {
        this.track("Catalog warm-up", cache.warm());
      }
    }
  }

  async runLoop(signal: AbortSignal): Promise<void> {
    while (!signal.aborted) {
      try {
        await this.tick();
      } catch (error) {
        Logger.error(`[X] Refresh failed: ${formatUserError(error)}`);
      }
      await new Promise((resolve) => setTimeout(resolve, this.tickMs));
    }
  }

  // Operations

  async runOperation(id: OperationId, target: OperationTarget): Promise<OperationResult> {
    const operation = OperationRegistry.get(id);
    if (!operation) {
      throw new Error(`Operation ${id} is not registered`);
    }

    const result = await operation.run({
      store: this.store,
      managers: this.managers,
      target,
    });

    if (id === "install-system-image" || id === "uninstall-system-image") {
      this.apiLevels?.invalidate();
      this.creationCatalogs.android?.invalidate();
      if (this.store.read((state) => state.mode === "ManageApiLevels")) {
        await this.loadApiLevels();
      }
    }
    if (id === "start-device" && result.success) {
      this.syncLogStream();
    }
    return result;
  }

  startOperation(id: OperationId, target: OperationTarget): void {
    this.track(`${id} ${target.name}`, this.runOperation(id, target));
  }

  /** Starts a stopped selection or stops a running one. */
  toggleSelectedDevice(): void {
    const device = this.store.read((state) => state.selectedDevice());
    if (!device) return;

    const target = { platform: device.platform, identifier: device.identifier, name: device.name };
    switch (device.status) {
      case "Running":
        this.startOperation("stop-device", target);
        break;
      case "Stopping":
      case "Creating":
        this.store.update((state) => state.notifyInfo(`${device.name} is busy`));
        break;
      default:
        this.startOperation("start-device", target);
    }
  }

  /** Carries out the delete or wipe the open confirm dialog asks for. */
  confirmDialog(): void {
    const pending = this.store.update((state) => {
      const dialog = state.confirmDialog;
      const mode = state.mode;
      state.closeDialog();
      return dialog ? { dialog, mode } : null;
    });
    if (!pending) return;

    const { dialog, mode } = pending;
    const target = {
      platform: dialog.platform,
      identifier: dialog.identifier,
      name: dialog.deviceName,
    };
    this.startOperation(mode === "ConfirmWipe" ? "wipe-device" : "delete-device", target);
  }

  // Create form

  openCreateForm(): void {
    const platform = this.store.update((state) => state.openCreateForm().platform);
    this.track("Loading creation catalog", this.loadCreationCatalog(platform));
  }

  async loadCreationCatalog(platform: Platform): Promise<void> {
    const cache = this.creationCatalogs[platform];
    if (!cache) {
      this.store.update((state) => {
        state.createDeviceForm.isLoading = false;
        state.createDeviceForm.errorMessage = `${PLATFORM_LABEL[platform]} tools are not available`;
      });
      return;
    }

    const catalog = await cache.get();
    this.store.update((state) => {
      const form = state.createDeviceForm;
      if (state.mode === "CreateDevice" && form.platform === platform) {
        form.setCatalog(catalog);
      }
    });
  }

  submitCreateForm(): void {
    const submission = this.store.update((state) => {
      const form = state.createDeviceForm;
      if (form.isCreating || form.isLoading) return null;
      if (form.validate()) return null;
      return { platform: form.platform, config: form.toDeviceConfig() };
    });
    if (!submission) return;

    const { platform, config } = submission;
    this.startOperation("create-device", {
      platform,
      identifier: config.name,
      name: config.name,
      config,
    });
  }

  // API levels

  openApiLevelManager(): void {
    if (!this.apiLevels) {
      this.store.update((state) => state.notifyWarning("Android SDK is not configured"));
      return;
    }
    this.store.update((state) => state.openApiLevelManager());
    this.track("Loading API levels", this.loadApiLevels());
  }

  async loadApiLevels(): Promise<void> {
    if (!this.apiLevels) return;
    const result = await this.apiLevels.get();
    this.store.update((state) =>
      state.setApiLevels(
        result.items.map(toApiLevelRow),
        result.error ? formatUserError(result.error) : null
      )
    );
  }

  /** Installs the selected level, or uninstalls it when installed. */
  toggleSelectedApiLevel(): void {
    const row = this.store.read((state) => state.selectedApiLevel());
    if (!row?.packageId) return;

    this.startOperation(row.installed ? "uninstall-system-image" : "install-system-image", {
      platform: "android",
      identifier: row.packageId,
      name: `API ${row.apiLevel}`,
    });
  }

  async shutdown(): Promise<void> {
    await this.logs.stop();
    await this.drain();
  }
}
