import { intro, outro, spinner } from "@clack/prompts";
import colors from "picocolors";
import { runApp } from "@/app";
import { APP_NAME, APP_VERSION, DEFAULTS } from "@/constants";
import type { Device } from "@/types/device";
import { formatUserError, isEmuError } from "@/types/errors";
import type { Managers } from "@/types/operation";
import { loadConfig, resetConfig, type Config } from "@/utils/config";
import { AndroidManager } from "@/utils/emu/android";
import { IosManager } from "@/utils/emu/ios";
import { NodeCommandExecutor, type CommandExecutor } from "@/utils/exec";
import { Logger, isLogLevel } from "@/utils/logger";
import { promptForAndroidHome, resolveAndroidHome } from "@/utils/sdk";

const USAGE = `Usage: ${APP_NAME} [options]

Options:
  --list           print Android and iOS devices and exit
  --reset-config   clear config.json and exit
  --help           show this message`;

function configureLogging(config: Config): void {
  const fromEnv = process.env.EMU_DECK_LOG_LEVEL;
  const level = isLogLevel(fromEnv) ? fromEnv : config.logLevel;
  if (level) Logger.configure({ level });
}

async function buildManagers(executor: CommandExecutor, config: Config): Promise<Managers> {
  let androidHome = resolveAndroidHome(process.env, config.androidHome);
  if (!androidHome && process.stdin.isTTY) {
    Logger.warning("[!] Android SDK location is not configured");
    androidHome = (await promptForAndroidHome()) ?? undefined;
  }

  let android: AndroidManager | null = null;
  try {
    android = new AndroidManager(executor, {
      androidHome,
      avdHome: config.avdHome,
      bootTimeoutMs: config.bootTimeoutMs,
    });
  } catch (error) {
    if (!isEmuError(error, "SdkUnavailable")) throw error;
    Logger.error(`[X] ${error.message}`);
  }

  const ios = process.platform === "darwin" ? new IosManager(executor) : null;

  if (!android && !ios) {
    throw new Error("Android SDK not found and iOS simulators need macOS. Set ANDROID_HOME and retry");
  }
  return { android, ios };
}

function printDevices(title: string, devices: Device[]): void {
  Logger.title(title);
  if (devices.length === 0) {
    Logger.muted("No devices", { indent: 1 });
    return;
  }

  for (const device of devices) {
    const state = device.isRunning ? colors.green(device.status) : colors.gray(device.status);
    Logger.info(`${device.name} ${colors.dim(`(${device.identifier})`)} ${state}`, {
      indent: 1,
    });
  }
}

async function listOnce(managers: Managers): Promise<void> {
  const s = spinner();
  s.start("Loading devices");

  const [android, ios] = await Promise.all([
    managers.android?.listDevices() ?? Promise.resolve(null),
    managers.ios?.listDevices() ?? Promise.resolve(null),
  ]);
  s.stop("Devices loaded");

  if (android) printDevices("Android", android);
  if (ios) printDevices("iOS", ios);
  Logger.space();
}

async function main() {
  const args = process.argv.slice(2);

  if (args.includes("--help")) {
    console.log(USAGE);
    return;
  }

  if (args.includes("--reset-config")) {
    resetConfig();
    Logger.success("[+] config.json cleared");
    return;
  }

  const config = loadConfig();
  configureLogging(config);

  intro(colors.bold(colors.magenta("[*] ") + colors.cyan(APP_NAME) + colors.gray(` v${APP_VERSION}`)));

  const executor = new NodeCommandExecutor();

  try {
    const managers = await buildManagers(executor, config);

    if (args.includes("--list")) {
      await listOnce(managers);
      outro(colors.green("Done"));
      return;
    }

    const logFile = config.logFile ?? DEFAULTS.logFile;
    Logger.configure({ file: logFile });
    try {
      await runApp({
        managers,
        executor,
        iosSupported: managers.ios !== null,
        refreshIntervalMs: config.refreshIntervalMs,
      });
    } finally {
      Logger.configure({ file: null });
    }
  } catch (error) {
    Logger.error(`[X] ${formatUserError(error)}`, { spaceBefore: true });
    outro(colors.red(`${APP_NAME} stopped - see ${config.logFile ?? DEFAULTS.logFile} for details`));
    process.exit(1);
  }

  outro(colors.green(`${APP_NAME} closed`));
  process.exit(0);
}

await main();
