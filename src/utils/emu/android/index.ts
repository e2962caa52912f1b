import { existsSync, readFileSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { AVD_USER_DATA, EMULATOR_LAUNCH_FLAGS, TIMEOUTS } from "@/constants";
import {
  INVALID_API_LEVEL,
  type AndroidDevice,
  type DeviceConfig,
  type DeviceDetails,
} from "@/types/device";
import { EmuError, classifyToolFailure, isEmuError, type EmuErrorKind } from "@/types/errors";
import {
  getRunningAvdNames,
  waitForBootCompleted,
  waitForSerial,
} from "@/utils/adb";
import type { CommandExecutor, CommandOutput, RunOptions } from "@/utils/exec";
import { Logger } from "@/utils/logger";
import { androidDevicePriority, androidVersionName, deviceCategory } from "@/utils/priority";
import { findSdkTool, resolveAndroidHome, resolveAvdHome } from "@/utils/sdk";
import {
  sortDevices,
  type CatalogResult,
  type CreationCatalog,
  type DeviceManager,
  type LogCommand,
} from "@/utils/emu/abstraction";
import {
  detectLogcatLevel,
  parseAvdList,
  parseConfigIni,
  parseDeviceDefinitions,
  parseSystemImages,
  pickSystemImage,
  resolveApiLevel,
  sanitizeAvdName,
  updateConfigIni,
} from "./parser";
import type {
  AndroidManagerOptions,
  ApiLevelInfo,
  AvdBlock,
  DeviceDefinition,
  SystemImage,
  TargetInfo,
} from "./types";

interface AndroidTools {
  avdmanager: string;
  sdkmanager: string;
  adb: string;
  emulator: string;
}

function withStorageUnit(size: string): string {
  return /^\d+$/.test(size) ? `${size}M` : size;
}

export class AndroidManager implements DeviceManager<AndroidDevice> {
  readonly platform = "android";
  readonly androidHome: string;
  private readonly avdHome: string;
  private readonly tools: AndroidTools;
  private readonly bootTimeoutMs: number;
  private readonly pollIntervalMs: number;
  private readonly hostArch: string;

  constructor(
    private readonly executor: CommandExecutor,
    options: AndroidManagerOptions = {}
  ) {
    const androidHome = options.androidHome ?? resolveAndroidHome();

    if (!androidHome) {
      throw new EmuError(
        "SdkUnavailable",
        "Android SDK not found. Set ANDROID_HOME or ANDROID_SDK_ROOT"
      );
    }
    if (!existsSync(androidHome)) {
      throw new EmuError(
        "SdkUnavailable",
        `Android SDK directory does not exist: ${androidHome}`
      );
    }

    this.androidHome = androidHome;
    this.avdHome = options.avdHome ?? resolveAvdHome();
    this.bootTimeoutMs = options.bootTimeoutMs ?? TIMEOUTS.boot;
    this.pollIntervalMs = options.pollIntervalMs ?? TIMEOUTS.bootPollInterval;
    this.hostArch = options.hostArch ?? os.arch();
    this.tools = {
      avdmanager: findSdkTool(androidHome, "avdmanager"),
      sdkmanager: findSdkTool(androidHome, "sdkmanager"),
      adb: findSdkTool(androidHome, "adb"),
      emulator: findSdkTool(androidHome, "emulator"),
    };
  }

  private async runTool(
    program: string,
    args: string[],
    fallbackKind: EmuErrorKind,
    options: RunOptions = {},
    identifier?: string
  ): Promise<CommandOutput> {
    const result = await this.executor.run(program, args, options);

    if (result.exitCode !== 0) {
      throw classifyToolFailure(result.stderr || result.stdout, fallbackKind, {
        command: [path.basename(program), ...args].join(" "),
        exitCode: result.exitCode,
        identifier,
      });
    }

    return result;
  }

  private async listAvdBlocks(): Promise<AvdBlock[]> {
    const result = await this.runTool(
      this.tools.avdmanager,
      ["list", "avd"],
      "CommandExecutionFailure"
    );
    return parseAvdList(result.stdout);
  }

  private configIniPath(name: string, avdPath?: string): string {
    return path.join(avdPath ?? path.join(this.avdHome, `${name}.avd`), "config.ini");
  }

  private readConfigIni(configPath: string): Map<string, string> | null {
    if (!existsSync(configPath)) return null;

    try {
      return parseConfigIni(readFileSync(configPath, "utf-8"));
    } catch (error) {
      Logger.debug(
        `[~] Could not read ${configPath}: ${error instanceof Error ? error.message : String(error)}`
      );
      return null;
    }
  }

  /** Running AVDs by name. adb problems degrade to "nothing running". */
  async getRunningAvdNames(): Promise<Map<string, string>> {
    try {
      return await getRunningAvdNames(this.executor, this.tools.adb);
    } catch (error) {
      Logger.warning(
        `[!] Could not query running emulators: ${error instanceof Error ? error.message : String(error)}`
      );
      return new Map();
    }
  }

  private toDevice(block: AvdBlock, running: Map<string, string>): AndroidDevice {
    const config = this.readConfigIni(this.configIniPath(block.name, block.path));
    const isRunning = running.has(block.name);

    return {
      platform: "android",
      name: block.name,
      identifier: block.name,
      deviceType: block.deviceType,
      category: deviceCategory(block.deviceType, block.name),
      apiLevel: resolveApiLevel(block, config),
      ramSize: config?.get("hw.ramSize") ?? "",
      storageSize: config?.get("disk.dataPartition.size") ?? "",
      path: block.path,
      status: isRunning ? "Running" : "Stopped",
      isRunning,
    };
  }

  async listDevices(): Promise<AndroidDevice[]> {
    const blocks = await this.listAvdBlocks();
    const running = await this.getRunningAvdNames();
    const devices = blocks.map((block) => this.toDevice(block, running));

    return sortDevices(devices, (device) =>
      androidDevicePriority(device.deviceType, device.name)
    );
  }

  async createDevice(config: DeviceConfig): Promise<void> {
    const name = sanitizeAvdName(config.name);
    if (!name) {
      throw new EmuError("CreationFailure", "Device name is required");
    }
    if (!config.deviceType) {
      throw new EmuError("CreationFailure", "Device type is required");
    }

    const apiLevel = parseInt(config.version, 10);
    if (Number.isNaN(apiLevel)) {
      throw new EmuError("CreationFailure", `Invalid API level: ${config.version}`);
    }

    const existing = await this.listAvdBlocks();
    if (existing.some((block) => block.name === name)) {
      throw new EmuError("CreationFailure", `AVD '${name}' already exists`, { identifier: name });
    }

    const images = await this.listAvailableSystemImages();
    if (images.error) {
      throw new EmuError(
        "CreationFailure",
        `Could not list system images: ${images.error.message}`,
        { identifier: name },
        { cause: images.error }
      );
    }

    const image = pickSystemImage(images.items, apiLevel, this.hostArch);
    if (!image) {
      throw new EmuError(
        "CreationFailure",
        `No system image installed for API ${apiLevel}. Install one from the API level manager`,
        { identifier: name }
      );
    }

    Logger.info(`[~] Creating ${name} from ${image.packageId}`);

    await this.runTool(
      this.tools.avdmanager,
      ["create", "avd", "-n", name, "-k", image.packageId, "--device", config.deviceType],
      "CreationFailure",
      { input: "no\n", timeoutMs: TIMEOUTS.sdkmanager },
      name
    );

    const hardware: Record<string, string> = { ...config.additionalOptions };
    if (config.ramSize) hardware["hw.ramSize"] = config.ramSize;
    if (config.storageSize) hardware["disk.dataPartition.size"] = withStorageUnit(config.storageSize);

    const configPath = this.configIniPath(name);
    if (Object.keys(hardware).length > 0 && existsSync(configPath)) {
      writeFileSync(configPath, updateConfigIni(readFileSync(configPath, "utf-8"), hardware), "utf-8");
    }

    Logger.success(`[+] Created ${name}`);
  }

  async startDevice(identifier: string): Promise<void> {
    const running = await this.getRunningAvdNames();
    if (running.has(identifier)) {
      Logger.debug(`[~] ${identifier} is already running`);
      return;
    }

    await this.executor.spawnDetached(this.tools.emulator, [
      "-avd",
      identifier,
      ...EMULATOR_LAUNCH_FLAGS,
    ]);

    const wait = {
      deadline: Date.now() + this.bootTimeoutMs,
      pollIntervalMs: this.pollIntervalMs,
    };
    const serial = await waitForSerial(this.executor, this.tools.adb, identifier, wait);
    await waitForBootCompleted(this.executor, this.tools.adb, serial, wait);

    Logger.success(`[+] ${identifier} booted on ${serial}`);
  }

  async stopDevice(identifier: string): Promise<void> {
    const serial = (await this.getRunningAvdNames()).get(identifier);
    if (!serial) {
      Logger.debug(`[~] ${identifier} is not running`);
      return;
    }

    await this.runTool(
      this.tools.adb,
      ["-s", serial, "emu", "kill"],
      "CommandExecutionFailure",
      { timeoutMs: TIMEOUTS.command },
      identifier
    );
  }

  private async waitUntilStopped(identifier: string): Promise<void> {
    const deadline = Date.now() + TIMEOUTS.command;
    while (Date.now() < deadline) {
      if (!(await this.getRunningAvdNames()).has(identifier)) return;
      await new Promise((resolve) => setTimeout(resolve, this.pollIntervalMs));
    }
    throw new EmuError("Timeout", `${identifier} did not shut down`, { identifier });
  }

  async wipeDevice(identifier: string): Promise<void> {
    const block = (await this.listAvdBlocks()).find((avd) => avd.name === identifier);
    const avdDirectory = block?.path ?? path.join(this.avdHome, `${identifier}.avd`);

    if (!existsSync(avdDirectory)) {
      throw new EmuError("DeviceNotFound", `AVD '${identifier}' not found`, { identifier });
    }

    if ((await this.getRunningAvdNames()).has(identifier)) {
      await this.stopDevice(identifier);
      await this.waitUntilStopped(identifier);
    }

    for (const entry of AVD_USER_DATA) {
      rmSync(path.join(avdDirectory, entry), { recursive: true, force: true });
    }

    Logger.success(`[+] Wiped user data of ${identifier}`);
  }

  async deleteDevice(identifier: string): Promise<void> {
    if ((await this.getRunningAvdNames()).has(identifier)) {
      await this.stopDevice(identifier);
      await this.waitUntilStopped(identifier);
    }

    await this.runTool(
      this.tools.avdmanager,
      ["delete", "avd", "-n", identifier],
      "CommandExecutionFailure",
      { timeoutMs: TIMEOUTS.command },
      identifier
    );

    Logger.success(`[+] Deleted ${identifier}`);
  }

  async getDeviceDetails(identifier: string): Promise<DeviceDetails> {
    const device = (await this.listDevices()).find((d) => d.identifier === identifier);
    if (!device) {
      throw new EmuError("DeviceNotFound", `AVD '${identifier}' not found`, { identifier });
    }

    const config = this.readConfigIni(this.configIniPath(device.name, device.path));
    const width = config?.get("hw.lcd.width");
    const height = config?.get("hw.lcd.height");

    return {
      name: device.name,
      identifier: device.identifier,
      platform: "android",
      status: device.status,
      deviceType: device.deviceType,
      category: device.category,
      versionDisplay:
        device.apiLevel === INVALID_API_LEVEL
          ? "Unknown"
          : `API ${device.apiLevel} (${androidVersionName(device.apiLevel)})`,
      ramSize: device.ramSize || undefined,
      storageSize: device.storageSize || undefined,
      resolution: width && height ? `${width}x${height}` : undefined,
      density: config?.get("hw.lcd.density"),
      path: device.path,
    };
  }

  async getLogCommand(identifier: string): Promise<LogCommand | null> {
    const serial = (await this.getRunningAvdNames()).get(identifier);
    if (!serial) return null;

    return {
      program: this.tools.adb,
      args: ["-s", serial, "logcat", "-v", "time"],
      detectLevel: detectLogcatLevel,
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

  listAvailableDevices(): Promise<CatalogResult<DeviceDefinition>> {
    return this.catalog("device definitions", async () => {
      const result = await this.runTool(
        this.tools.avdmanager,
        ["list", "device"],
        "CommandExecutionFailure"
      );
      return parseDeviceDefinitions(result.stdout).sort(
        (a, b) =>
          androidDevicePriority(a.id, a.displayName) - androidDevicePriority(b.id, b.displayName) ||
          a.displayName.localeCompare(b.displayName)
      );
    });
  }

  listAvailableSystemImages(): Promise<CatalogResult<SystemImage>> {
    return this.catalog("system images", async () => {
      const result = await this.runTool(
        this.tools.sdkmanager,
        ["--list"],
        "CommandExecutionFailure",
        { timeoutMs: TIMEOUTS.sdkmanager }
      );
      return parseSystemImages(result.stdout);
    });
  }

  async listApiLevels(): Promise<CatalogResult<ApiLevelInfo>> {
    const images = await this.listAvailableSystemImages();
    const byLevel = new Map<number, SystemImage[]>();

    for (const image of images.items) {
      byLevel.set(image.apiLevel, [...(byLevel.get(image.apiLevel) ?? []), image]);
    }

    const levels: ApiLevelInfo[] = [];
    for (const [apiLevel, levelImages] of byLevel) {
      const installed = levelImages.some((image) => image.installed);
      const recommended =
        pickSystemImage(levelImages, apiLevel, this.hostArch) ??
        pickSystemImage(
          levelImages.map((image) => ({ ...image, installed: true })),
          apiLevel,
          this.hostArch
        );

      levels.push({
        apiLevel,
        versionName: androidVersionName(apiLevel),
        installed,
        images: levelImages,
        recommendedPackage: recommended?.packageId ?? levelImages[0]?.packageId ?? "",
      });
    }

    levels.sort((a, b) => b.apiLevel - a.apiLevel);
    return { items: levels, error: images.error };
  }

  async installSystemImage(packageId: string): Promise<void> {
    Logger.info(`[~] Installing ${packageId}`);
    await this.runTool(
      this.tools.sdkmanager,
      [packageId],
      "CommandExecutionFailure",
      { input: "y\n", timeoutMs: TIMEOUTS.sdkmanager * 5 }
    );
    Logger.success(`[+] Installed ${packageId}`);
  }

  async uninstallSystemImage(packageId: string): Promise<void> {
    Logger.info(`[~] Uninstalling ${packageId}`);
    await this.runTool(
      this.tools.sdkmanager,
      ["--uninstall", packageId],
      "CommandExecutionFailure",
      { timeoutMs: TIMEOUTS.sdkmanager }
    );
    Logger.success(`[+] Uninstalled ${packageId}`);
  }

  /** API levels with an installed system image, newest first. */
  async listAvailableTargets(): Promise<CatalogResult<TargetInfo>> {
    const levels = await this.listApiLevels();
    return {
      items: levels.items
        .filter((level) => level.installed)
        .map((level) => ({
          id: `android-${level.apiLevel}`,
          name: `API ${level.apiLevel} - ${level.versionName}`,
          apiLevel: level.apiLevel,
        })),
      error: levels.error,
    };
  }

  async loadCreationCatalog(): Promise<CreationCatalog> {
    const [targets, definitions] = await Promise.all([
      this.listAvailableTargets(),
      this.listAvailableDevices(),
    ]);

    return {
      versions: {
        items: targets.items.map((target) => ({
          value: String(target.apiLevel),
          label: target.name,
        })),
        error: targets.error,
      },
      deviceTypes: {
        items: definitions.items.map((definition) => ({
          value: definition.id,
          label: definition.oem
            ? `${definition.displayName} (${definition.oem})`
            : definition.displayName,
          category: definition.category,
        })),
        error: definitions.error,
      },
    };
  }
}
