import { text } from "@clack/prompts";
import { existsSync } from "fs";
import os from "os";
import path from "path";
import { getConfigValue, updateConfig } from "@/utils/config";
import { Logger } from "@/utils/logger";

const TOOL_DIRECTORIES: Record<string, string[]> = {
  avdmanager: [path.join("cmdline-tools", "latest", "bin"), path.join("tools", "bin")],
  sdkmanager: [path.join("cmdline-tools", "latest", "bin"), path.join("tools", "bin")],
  adb: ["platform-tools"],
  emulator: ["emulator", "tools"],
};

/** SDK root from the environment, then config.json. */
export function resolveAndroidHome(
  env: NodeJS.ProcessEnv = process.env,
  configured: string | undefined = getConfigValue("androidHome")
): string | undefined {
  const candidates = [env.ANDROID_HOME, env.ANDROID_SDK_ROOT, configured];
  return candidates.find((candidate): candidate is string => Boolean(candidate?.trim()));
}

export function resolveAvdHome(
  env: NodeJS.ProcessEnv = process.env,
  configured: string | undefined = getConfigValue("avdHome")
): string {
  return env.ANDROID_AVD_HOME || configured || path.join(os.homedir(), ".android", "avd");
}

function executableName(tool: string): string {
  if (process.platform !== "win32") return tool;
  return tool === "adb" || tool === "emulator" ? `${tool}.exe` : `${tool}.bat`;
}

/**
 * Full path of an SDK tool when it exists under the SDK root. Falls back
 * to the bare name so PATH lookup still applies.
 */
export function findSdkTool(androidHome: string, tool: string): string {
  const executable = executableName(tool);

  for (const directory of TOOL_DIRECTORIES[tool] ?? []) {
    const candidate = path.join(androidHome, directory, executable);
    if (existsSync(candidate)) return candidate;
  }

  return tool;
}

export async function promptForAndroidHome(): Promise<string | null> {
  const sdkPath = await text({
    message: "Enter the full path to your Android SDK directory:",
    placeholder: path.join(os.homedir(), "Android", "Sdk"),
    validate: (value) => {
      if (!value) return "Path is required";
      if (!existsSync(value)) return "Directory does not exist";
      if (!existsSync(path.join(value, "platform-tools")) && !existsSync(path.join(value, "cmdline-tools"))) {
        return "No platform-tools or cmdline-tools found in this directory";
      }
      return undefined;
    },
  });

  if (!sdkPath || typeof sdkPath === "symbol") return null;

  updateConfig("androidHome", sdkPath);
  Logger.success("[+] Android SDK path saved to config.json");

  return sdkPath;
}
