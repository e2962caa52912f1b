import { TIMEOUTS } from "@/constants";
import type { DeviceConfig, DeviceDetails, IosDevice } from "@/types/device";
import { EmuError, classifyToolFailure, isEmuError } from "@/types/errors";
import type { CommandExecutor, CommandOutput } from "@/utils/exec";
import { Logger } from "@/utils/logger";
import { iosDevicePriority } from "@/utils/priority";
import {
  sortDevices,
  type CatalogResult,
  type CreationCatalog,
  type DeviceManager,
  type LogCommand,
} from "@/utils/emu/abstraction";
import {
  detectSimulatorLogLevel,
  parseDeviceTypes,
  parseRuntimes,
  parseSimctlDevices,
} from "./parser";
import type { DeviceTypeInfo, RuntimeInfo } from "./types";

const XCRUN = "xcrun";

function rejectsFlag(result: CommandOutput): boolean {
  return (
    result.exitCode !== 0 &&
    /unrecognized|unknown option|invalid option|usage:/i.test(result.stderr)
  );
}

export class IosManager implements DeviceManager<IosDevice> {
  readonly platform = "ios";

  constructor(private readonly executor: CommandExecutor) {}

  private async simctl(args: string[], identifier?: string): Promise<CommandOutput> {
    const result = await this.executor.run(XCRUN, ["simctl", ...args], {
      timeoutMs: TIMEOUTS.command,
    });

    if (result.exitCode !== 0) {
      throw classifyToolFailure(result.stderr || result.stdout, "CommandExecutionFailure", {
        command: `simctl ${args.join(" ")}`,
        exitCode: result.exitCode,
        identifier,
      });
    }
    return result;
  }

  /** `simctl list <subject>` as JSON; older tools only know `-j`. */
  private async listJson(subject: string): Promise<string> {
    const result = await this.executor.run(XCRUN, ["simctl", "list", subject, "--json"], {
      timeoutMs: TIMEOUTS.command,
    });

    if (rejectsFlag(result)) {
      return (await this.simctl(["list", subject, "-j"])).stdout;
    }
    if (result.exitCode !== 0) {
      throw classifyToolFailure(result.stderr, "CommandExecutionFailure", {
        command: `simctl list ${subject} --json`,
        exitCode: result.exitCode,
      });
    }
    return result.stdout;
  }

  async listDevices(): Promise<IosDevice[]> {
    const devices = parseSimctlDevices(await this.listJson("devices"));
    return sortDevices(devices, (device) => iosDevicePriority(device.name));
  }

  async createDevice(config: DeviceConfig): Promise<void> {
    const name = config.name.trim();
    if (!name) throw new EmuError("CreationFailure", "Device name is required");
    if (!config.deviceType) throw new EmuError("CreationFailure", "Device type is required");
    if (!config.version) throw new EmuError("CreationFailure", "Runtime is required");

    try {
      const result = await this.simctl(["create", name, config.deviceType, config.version]);
      Logger.success(`[+] Created ${name} (${result.stdout.trim()})`);
    } catch (error) {
      if (isEmuError(error, "CommandExecutionFailure")) {
        throw new EmuError("CreationFailure", error.message, error.details, { cause: error });
      }
      throw error;
    }
  }

  async startDevice(identifier: string): Promise<void> {
    const result = await this.executor.run(XCRUN, ["simctl", "boot", identifier], {
      timeoutMs: TIMEOUTS.command,
    });

    if (result.exitCode !== 0 && !result.stderr.includes("current state: Booted")) {
      throw classifyToolFailure(result.stderr, "CommandExecutionFailure", {
        command: "simctl boot",
        exitCode: result.exitCode,
        identifier,
      });
    }

    await this.openSimulatorApp();
  }

  private async openSimulatorApp(): Promise<void> {
    try {
      const opened = await this.executor.run("open", ["-a", "Simulator"], {
        timeoutMs: TIMEOUTS.command,
      });
      if (opened.exitCode !== 0) {
        Logger.warning(`[!] Could not open Simulator.app: ${opened.stderr.trim()}`);
      }
    } catch (error) {
      Logger.warning(
        `[!] Could not open Simulator.app: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async stopDevice(identifier: string): Promise<void> {
    const result = await this.executor.run(XCRUN, ["simctl", "shutdown", identifier], {
      timeoutMs: TIMEOUTS.command,
    });

    if (result.exitCode !== 0 && !result.stderr.includes("current state: Shutdown")) {
      throw classifyToolFailure(result.stderr, "CommandExecutionFailure", {
        command: "simctl shutdown",
        exitCode: result.exitCode,
        identifier,
      });
    }

    await this.quitSimulatorIfIdle();
  }

  /** Quits Simulator.app once no simulator is booted. Never throws. */
  async quitSimulatorIfIdle(): Promise<void> {
    try {
      const devices = await this.listDevices();
      if (devices.some((device) => device.isRunning)) return;

      const quit = await this.executor.run(
        "osascript",
        ["-e", 'tell application "Simulator" to quit'],
        { timeoutMs: TIMEOUTS.command }
      );
      if (quit.exitCode === 0) return;

      Logger.debug(`[~] Simulator.app did not quit gracefully: ${quit.stderr.trim()}`);
      await this.executor.run("killall", ["Simulator"], { timeoutMs: TIMEOUTS.command });
    } catch (error) {
      Logger.warning(
        `[!] Could not quit Simulator.app: ${error instanceof Error ? error.message : String(error)}`
      );
    }
  }

  async deleteDevice(identifier: string): Promise<void> {
    await this.simctl(["delete", identifier], identifier);
    Logger.success(`[+] Deleted simulator ${identifier}`);
  }

  async wipeDevice(identifier: string): Promise<void> {
    const device = (await this.listDevices()).find((d) => d.identifier === identifier);
    if (!device) {
      throw new EmuError("DeviceNotFound", `Simulator ${identifier} not found`, { identifier });
    }

    if (device.status === "Running") {
      await this.simctl(["shutdown", identifier], identifier);
    }
    await this.simctl(["erase", identifier], identifier);
    Logger.success(`[+] Erased ${device.name}`);
  }

  async getDeviceDetails(identifier: string): Promise<DeviceDetails> {
    const device = (await this.listDevices()).find((d) => d.identifier === identifier);
    if (!device) {
      throw new EmuError("DeviceNotFound", `Simulator ${identifier} not found`, { identifier });
    }

    return {
      name: device.name,
      identifier: device.identifier,
      platform: "ios",
      status: device.status,
      deviceType: device.deviceType,
      category: device.category,
      versionDisplay: `iOS ${device.iosVersion}`,
    };
  }

  async getLogCommand(identifier: string): Promise<LogCommand | null> {
    const device = (await this.listDevices()).find((d) => d.identifier === identifier);
    if (!device?.isRunning) return null;

    return {
      program: XCRUN,
      args: ["simctl", "spawn", identifier, "log", "stream", "--style", "compact"],
      detectLevel: detectSimulatorLogLevel,
    };
  }

  private async catalog<T>(label: string, load: () => Promise<T[]>): Promise<CatalogResult<T>> {
    try {
      return { items: await load() };
    } catch (error) {
      const failure = isEmuError(error)
        ? error
        : new EmuError(
            "CommandExecutionFailure",
            error instanceof Error ? error.message : String(error),
            {},
            { cause: error }
          );
      Logger.warning(`[!] Could not load ${label}: ${failure.message}`);
      return { items: [], error: failure };
    }
  }

  listDeviceTypes(): Promise<CatalogResult<DeviceTypeInfo>> {
    return this.catalog("simulator device types", async () =>
      parseDeviceTypes(await this.listJson("devicetypes")).sort(
        (a, b) => iosDevicePriority(a.name) - iosDevicePriority(b.name) || a.name.localeCompare(b.name)
      )
    );
  }

  listRuntimes(): Promise<CatalogResult<RuntimeInfo>> {
    return this.catalog("simulator runtimes", async () =>
      parseRuntimes(await this.listJson("runtimes"))
        .filter((runtime) => runtime.isAvailable)
        .sort((a, b) => b.version.localeCompare(a.version, undefined, { numeric: true }))
    );
  }

  async loadCreationCatalog(): Promise<CreationCatalog> {
    const [runtimes, types] = await Promise.all([this.listRuntimes(), this.listDeviceTypes()]);

    return {
      versions: {
        items: runtimes.items.map((runtime) => ({
          value: runtime.identifier,
          label: runtime.name,
        })),
        error: runtimes.error,
      },
      deviceTypes: {
        items: types.items.map((type) => ({
          value: type.identifier,
          label: type.name,
          category: type.category,
        })),
        error: types.error,
      },
    };
  }
}
