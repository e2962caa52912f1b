import { OPERATION_ORDER, type OperationId } from "@/constants";
import type { StateStore } from "@/app/state/store";
import type { DeviceConfig, DeviceStatus, Platform } from "@/types/device";
import { EmuError, formatUserError } from "@/types/errors";
import type { AndroidManager } from "@/utils/emu/android";
import type { IosManager } from "@/utils/emu/ios";
import { Logger } from "@/utils/logger";

export interface Managers {
  android: AndroidManager | null;
  ios: IosManager | null;
}

export interface OperationConfig {
  id: OperationId;
  label: string;
  /** Status written before the command is issued. */
  pendingStatus?: DeviceStatus;
  /** Status written once the command succeeds. */
  finalStatus?: DeviceStatus;
}

export interface OperationTarget {
  platform: Platform;
  /** AVD name, simulator UDID or SDK package path. */
  identifier: string;
  name: string;
  config?: DeviceConfig;
}

export interface OperationResult {
  success: boolean;
  message?: string;
  error?: unknown;
}

export interface OperationContext {
  store: StateStore;
  managers: Managers;
  target: OperationTarget;
}

export function requireAndroid(managers: Managers): AndroidManager {
  if (!managers.android) {
    throw new EmuError("SdkUnavailable", "Android SDK is not configured");
  }
  return managers.android;
}

export function requireIos(managers: Managers): IosManager {
  if (!managers.ios) {
    throw new EmuError("SdkUnavailable", "iOS simulators are only available on macOS");
  }
  return managers.ios;
}

export function managerFor(managers: Managers, platform: Platform): AndroidManager | IosManager {
  return platform === "android" ? requireAndroid(managers) : requireIos(managers);
}

export abstract class BaseOperation {
  protected config: OperationConfig;

  constructor(config: OperationConfig) {
    this.config = config;
  }

  get id(): OperationId {
    return this.config.id;
  }

  get label(): string {
    return this.config.label;
  }

  abstract execute(context: OperationContext): Promise<OperationResult>;

  /** Headline shown while the operation runs. */
  protected progressLabel(target: OperationTarget): string {
    return `${this.label} ${target.name}...`;
  }

  /**
   * Claims the identifier. Throws ConcurrentOperationConflict when another
   * operation already holds it.
   */
  protected claim({ store, target }: OperationContext): void {
    store.update((state) => {
      const running = state.operationsInFlight.get(target.identifier);
      if (running) {
        throw new EmuError(
          "ConcurrentOperationConflict",
          `${target.name} is busy (${running})`,
          { identifier: target.identifier }
        );
      }
      state.operationsInFlight.set(target.identifier, this.id);
    });
  }

  protected release({ store, target }: OperationContext): void {
    store.update((state) => {
      if (state.operationsInFlight.get(target.identifier) === this.id) {
        state.operationsInFlight.delete(target.identifier);
      }
    });
  }

  protected async beforeExecute(context: OperationContext): Promise<void> {
    const { target } = context;
    const pending = this.config.pendingStatus;
    const label = this.progressLabel(target);

    context.store.update((state) => {
      if (pending) state.setDeviceStatus(target.platform, target.identifier, pending);
      state.setOperationStatus(label);
    });
    Logger.info(`[~] ${label}`);
  }

  protected async afterExecute(result: OperationResult, context: OperationContext): Promise<void> {
    const { target } = context;
    const label = this.progressLabel(target);
    let final: DeviceStatus | undefined = this.config.finalStatus;
    if (!result.success) final = this.config.pendingStatus ? "Error" : undefined;

    context.store.update((state) => {
      if (final) state.setDeviceStatus(target.platform, target.identifier, final);
      state.clearOperationStatus(label);

      if (result.success) {
        if (result.message) state.notifySuccess(result.message);
      } else {
        state.notifyError(result.message ?? `${this.label} failed`);
      }
      state.requestRefresh();
    });

    if (result.success) {
      Logger.success(`[+] ${result.message ?? `${this.label} ${target.name}`}`);
    } else {
      Logger.error(`[X] ${this.label} ${target.name}: ${result.message ?? "failed"}`);
    }
  }

  async run(context: OperationContext): Promise<OperationResult> {
    try {
      this.claim(context);
    } catch (error) {
      const message = formatUserError(error);
      context.store.update((state) => state.notifyWarning(message));
      Logger.warning(`[!] ${message}`);
      return { success: false, message, error };
    }

    try {
      await this.beforeExecute(context);
      const result = await this.execute(context);
      await this.afterExecute(result, context);
      return result;
    } catch (error) {
      const errorResult: OperationResult = {
        success: false,
        message: formatUserError(error),
        error,
      };
      await this.afterExecute(errorResult, context);
      return errorResult;
    } finally {
      this.release(context);
    }
  }
}

export class OperationRegistry {
  private static operations: Map<OperationId, BaseOperation> = new Map();

  static register(operation: BaseOperation): void {
    this.operations.set(operation.id, operation);
  }

  static get(id: OperationId): BaseOperation | undefined {
    return this.operations.get(id);
  }

  static getAll(): BaseOperation[] {
    return OPERATION_ORDER.flatMap((id) => {
      const operation = this.operations.get(id);
      return operation ? [operation] : [];
    });
  }
}
