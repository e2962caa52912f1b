import { TIMEOUTS } from "@/constants";
import { EmuError } from "@/types/errors";
import type { CommandExecutor } from "@/utils/exec";
import { Logger } from "@/utils/logger";

export interface AdbDevice {
  serial: string;
  state: string;
}

export type AdbStatus = "Running" | "Stopped";

/**
 * `device` is the only state that counts as running; `offline`,
 * `unauthorized` and anything newer adb may print are stopped.
 */
export function mapAdbState(state: string): AdbStatus {
  return state.trim() === "device" ? "Running" : "Stopped";
}

export function parseAdbDevices(output: string): AdbDevice[] {
  const devices: AdbDevice[] = [];

  for (const rawLine of output.split("\n")) {
    const line = rawLine.trim();
    if (!line || line.startsWith("List of devices") || line.startsWith("*")) {
      continue;
    }

    const match = line.match(/^(\S+)\s+(\S+)/);
    if (match?.[1] && match[2]) {
      devices.push({ serial: match[1], state: match[2] });
    }
  }

  return devices;
}

export async function getAdbDevices(
  executor: CommandExecutor,
  adb: string
): Promise<AdbDevice[]> {
  const result = await executor.run(adb, ["devices"], {
    timeoutMs: TIMEOUTS.command,
  });

  if (result.exitCode !== 0) {
    throw new EmuError("CommandExecutionFailure", "adb devices failed", {
      command: "adb devices",
      stderr: result.stderr,
      exitCode: result.exitCode,
    });
  }

  return parseAdbDevices(result.stdout);
}

/** Returns the AVD name behind an emulator serial, or null when unknown. */
export async function getAvdName(
  executor: CommandExecutor,
  adb: string,
  serial: string
): Promise<string | null> {
  try {
    const prop = await executor.run(
      adb,
      ["-s", serial, "shell", "getprop", "ro.kernel.qemu.avd_name"],
      { timeoutMs: TIMEOUTS.propertyLookup }
    );
    if (prop.exitCode !== 0) return null;

    const name = prop.stdout.trim();
    if (name) return name;

    const emuConsole = await executor.run(adb, ["-s", serial, "emu", "avd", "name"], {
      timeoutMs: TIMEOUTS.propertyLookup,
    });
    if (emuConsole.exitCode !== 0) return null;

    const firstLine = emuConsole.stdout.split("\n")[0]?.trim() ?? "";
    return firstLine && firstLine !== "OK" ? firstLine : null;
  } catch (error) {
    Logger.debug(
      `[~] Could not resolve AVD name for ${serial}: ${error instanceof Error ? error.message : String(error)}`
    );
    return null;
  }
}

/**
 * Maps AVD names to the serial of a running emulator. Serials whose name
 * lookup fails are left out.
 */
export async function getRunningAvdNames(
  executor: CommandExecutor,
  adb: string
): Promise<Map<string, string>> {
  const running = new Map<string, string>();
  const devices = await getAdbDevices(executor, adb);

  const lookups = devices
    .filter((device) => mapAdbState(device.state) === "Running")
    .map(async (device) => ({
      serial: device.serial,
      name: await getAvdName(executor, adb, device.serial),
    }));

  for (const { serial, name } of await Promise.all(lookups)) {
    if (!name) continue;
    running.set(name, serial);
    if (name.includes(" ")) running.set(name.replace(/ /g, "_"), serial);
  }

  return running;
}

export interface BootWaitOptions {
  deadline: number;
  pollIntervalMs: number;
}

function remaining(deadline: number): number {
  return Math.max(0, deadline - Date.now());
}

function bootTimeout(serial: string, stage: string): EmuError {
  return new EmuError("Timeout", `${serial} did not finish booting (${stage})`, {
    identifier: serial,
  });
}

export async function waitForBootCompleted(
  executor: CommandExecutor,
  adb: string,
  serial: string,
  options: BootWaitOptions
): Promise<void> {
  const { deadline, pollIntervalMs } = options;

  const waited = await executor.run(adb, ["-s", serial, "wait-for-device"], {
    timeoutMs: Math.max(1, Math.min(remaining(deadline), TIMEOUTS.waitForDevice)),
  });
  if (waited.exitCode !== 0) {
    throw new EmuError("CommandExecutionFailure", `adb wait-for-device failed for ${serial}`, {
      command: "adb wait-for-device",
      stderr: waited.stderr,
      exitCode: waited.exitCode,
      identifier: serial,
    });
  }

  while (Date.now() < deadline) {
    const prop = await executor.run(
      adb,
      ["-s", serial, "shell", "getprop", "sys.boot_completed"],
      { timeoutMs: Math.max(1, Math.min(remaining(deadline), TIMEOUTS.propertyLookup)) }
    );

    if (prop.exitCode === 0 && prop.stdout.trim() === "1") {
      Logger.debug(`[+] ${serial} boot completed`);
      return;
    }

    await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
  }

  throw bootTimeout(serial, "sys.boot_completed");
}

export async function waitForSerial(
  executor: CommandExecutor,
  adb: string,
  avdName: string,
  options: BootWaitOptions
): Promise<string> {
  const { deadline, pollIntervalMs } = options;

  while (Date.now() < deadline) {
    try {
      const serial = (await getRunningAvdNames(executor, adb)).get(avdName);
      if (serial) return serial;
    } catch (error) {
      Logger.debug(
        `[~] adb not ready while waiting for ${avdName}: ${error instanceof Error ? error.message : String(error)}`
      );
    }
    await new Promise((resolve) => setTimeout(resolve, pollIntervalMs));
  }

  throw bootTimeout(avdName, "emulator never appeared in adb devices");
}
