import { mkdtempSync } from "fs";
import os from "os";
import path from "path";
import { afterEach, describe, expect, it, vi } from "vitest";
import { Orchestrator } from "@/app/orchestrator";
import { AppState } from "@/app/state";
import { StateStore } from "@/app/state/store";
import type { Managers } from "@/types/operation";
import { AndroidManager } from "@/utils/emu/android";
import { IosManager } from "@/utils/emu/ios";
import { iosDevice, simctlDevicesJson } from "../support/devices";
import { MockCommandExecutor } from "../support/mock-executor";

const LIST_JSON = ["simctl", "list", "devices", "--json"];
const LOG_ARGS = ["simctl", "spawn", "UDID-1", "log", "stream", "--style", "compact"];
const NAME = "iPhone 15 Pro (iOS 17.0)";

function simulators(state: "Booted" | "Shutdown"): string {
  return simctlDevicesJson({
    "com.apple.CoreSimulator.SimRuntime.iOS-17-0": [{ name: "iPhone 15 Pro", udid: "UDID-1", state }],
  });
}

class SwitchingExecutor extends MockCommandExecutor {
  store: StateStore | null = null;

  // Another device is selected while the stream is being read.
  override async *streamLines(): AsyncIterable<string> {
    yield "first";
    this.store?.update((state) => {
      state.currentLogDevice = { platform: "ios", identifier: "UDID-2" };
    });
    yield "second";
  }
}

class HangingExecutor extends MockCommandExecutor {
  readonly signals: AbortSignal[] = [];

  override async *streamLines(program: string, args: string[], signal: AbortSignal): AsyncIterable<string> {
    this.calls.push({ kind: "stream", program, args });
    this.signals.push(signal);
    await new Promise<void>((resolve) => {
      signal.addEventListener("abort", () => resolve(), { once: true });
    });
  }
}

function setup<E extends MockCommandExecutor>(executor: E, options: { panel?: "android" | "ios" } = {}) {
  let clock = 10_000;
  const state = new AppState();
  state.switchPanel(options.panel ?? "ios");
  const store = new StateStore(state);
  const managers: Managers = { android: null, ios: new IosManager(executor) };
  const orchestrator = new Orchestrator(store, managers, executor, { now: () => clock });
  return {
    state,
    store,
    executor,
    orchestrator,
    setClock: (ms: number) => {
      clock = ms;
    },
  };
}

let active: Orchestrator | null = null;

afterEach(async () => {
  await active?.shutdown();
  active = null;
});

describe("Orchestrator.refreshDevices", () => {
  it("replaces the device list and records the refresh", async () => {
    const { state, orchestrator } = setup(
      new MockCommandExecutor().respond("xcrun", LIST_JSON, { stdout: simulators("Shutdown") })
    );
    active = orchestrator;

    await orchestrator.refreshDevices();

    expect(state.iosDevices.map((d) => [d.name, d.status])).toEqual([[NAME, "Stopped"]]);
    expect(state.lastRefresh).toBe(10_000);
    expect(state.isInitialLoad).toBe(false);
  });

  it("keeps Starting while a start is still pending", async () => {
    const { state, orchestrator } = setup(
      new MockCommandExecutor().respond("xcrun", LIST_JSON, { stdout: simulators("Shutdown") })
    );
    active = orchestrator;
    state.pendingDeviceStarts.add("UDID-1");

    await orchestrator.refreshDevices();

    expect(state.iosDevices[0]?.status).toBe("Starting");
    expect(state.iosDevices[0]?.isRunning).toBe(false);
  });

  it("reports a repeated listing failure once", async () => {
    const { state, orchestrator } = setup(
      new MockCommandExecutor().respond("xcrun", LIST_JSON, {
        exitCode: 1,
        stderr: "CoreSimulatorService connection became invalid",
      })
    );
    active = orchestrator;
    state.replaceDevices("ios", [iosDevice(NAME, "UDID-1")]);

    await orchestrator.refreshDevices();
    await orchestrator.refreshDevices();

    expect(state.notifications.all.map((n) => [n.type, n.message])).toEqual([
      ["error", "iOS: CoreSimulatorService connection became invalid"],
    ]);
    expect(state.iosDevices).toHaveLength(1);
  });
});

describe("Orchestrator log streaming", () => {
  it("streams the running selection's log with detected levels", async () => {
    const executor = new MockCommandExecutor()
      .respond("xcrun", LIST_JSON, { stdout: simulators("Booted") })
      .respondStream("xcrun", LOG_ARGS, ["first line", "   ", "Error: crash"]);
    const { state, orchestrator } = setup(executor);
    active = orchestrator;

    await orchestrator.refreshDevices();
    await orchestrator.logs.settled();

    expect(state.currentLogDevice).toEqual({ platform: "ios", identifier: "UDID-1" });
    expect(state.logs.all.map((entry) => [entry.level, entry.message])).toEqual([
      ["INFO", "first line"],
      ["ERROR", "Error: crash"],
    ]);
  });

  it("stops reading once another device is being followed", async () => {
    const executor = new SwitchingExecutor().respond("xcrun", LIST_JSON, { stdout: simulators("Booted") });
    const { state, store, orchestrator } = setup(executor);
    executor.store = store;
    active = orchestrator;

    orchestrator.logs.follow({ platform: "ios", identifier: "UDID-1" });
    await orchestrator.logs.settled();

    expect(state.logs.all.map((entry) => entry.message)).toEqual(["first"]);
  });

  it("aborts the log process when following stops", async () => {
    const executor = new HangingExecutor().respond("xcrun", LIST_JSON, { stdout: simulators("Booted") });
    const { state, orchestrator } = setup(executor);
    active = orchestrator;

    orchestrator.logs.follow({ platform: "ios", identifier: "UDID-1" });
    await vi.waitFor(() => {
      expect(executor.signals).toHaveLength(1);
    });
    await orchestrator.logs.stop();

    expect(executor.signals[0]?.aborted).toBe(true);
    expect(state.currentLogDevice).toBeNull();
  });

  it("does not stream a stopped device", async () => {
    const executor = new MockCommandExecutor().respond("xcrun", LIST_JSON, { stdout: simulators("Shutdown") });
    const { orchestrator } = setup(executor);
    active = orchestrator;

    await orchestrator.refreshDevices();

    expect(executor.calls.some((call) => call.kind === "stream")).toBe(false);
  });
});

describe("Orchestrator device actions", () => {
  it("starts a stopped selection", async () => {
    const executor = new MockCommandExecutor()
      .respond("xcrun", LIST_JSON, { stdout: simulators("Booted") })
      .respond("xcrun", ["simctl", "boot", "UDID-1"], {})
      .respond("open", ["-a", "Simulator"], {});
    const { state, orchestrator } = setup(executor);
    active = orchestrator;
    state.replaceDevices("ios", [iosDevice(NAME, "UDID-1")]);

    orchestrator.toggleSelectedDevice();
    await orchestrator.drain();

    expect(state.iosDevices[0]?.status).toBe("Running");
    expect(state.currentLogDevice).toEqual({ platform: "ios", identifier: "UDID-1" });
  });

  it("stops a running selection", async () => {
    const executor = new MockCommandExecutor()
      .respond("xcrun", ["simctl", "shutdown", "UDID-1"], {})
      .respond("xcrun", LIST_JSON, { stdout: simulators("Shutdown") })
      .respond("osascript", ["-e", 'tell application "Simulator" to quit'], {});
    const { state, orchestrator } = setup(executor);
    active = orchestrator;
    state.replaceDevices("ios", [iosDevice(NAME, "UDID-1", { status: "Running", isRunning: true })]);

    orchestrator.toggleSelectedDevice();
    await orchestrator.drain();

    expect(state.iosDevices[0]?.status).toBe("Stopped");
  });

  it("tells the user a busy device cannot be toggled", () => {
    const { state, executor, orchestrator } = setup(new MockCommandExecutor());
    active = orchestrator;
    state.replaceDevices("ios", [iosDevice(NAME, "UDID-1", { status: "Stopping" })]);

    orchestrator.toggleSelectedDevice();

    expect(state.notifications.all.map((n) => n.message)).toEqual([`${NAME} is busy`]);
    expect(executor.calls).toHaveLength(0);
  });

  it("deletes the device named in the confirm dialog", async () => {
    const executor = new MockCommandExecutor().respond("xcrun", ["simctl", "delete", "UDID-1"], {});
    const { state, orchestrator } = setup(executor);
    active = orchestrator;
    state.replaceDevices("ios", [iosDevice(NAME, "UDID-1")]);
    state.openConfirm("ConfirmDelete");

    orchestrator.confirmDialog();
    expect(state.mode).toBe("Normal");
    await orchestrator.drain();

    expect(state.iosDevices).toEqual([]);
    expect(state.notifications.all.map((n) => n.message)).toEqual([`Deleted ${NAME}`]);
  });
});

describe("Orchestrator create form", () => {
  it("fills the form from the simulator catalog", async () => {
    const executor = new MockCommandExecutor()
      .respond("xcrun", ["simctl", "list", "runtimes", "--json"], {
        stdout: JSON.stringify({
          runtimes: [
            { identifier: "com.apple.CoreSimulator.SimRuntime.iOS-17-0", name: "iOS 17.0", version: "17.0", isAvailable: true },
          ],
        }),
      })
      .respond("xcrun", ["simctl", "list", "devicetypes", "--json"], {
        stdout: JSON.stringify({
          devicetypes: [
            { identifier: "com.apple.CoreSimulator.SimDeviceType.iPhone-15-Pro", name: "iPhone 15 Pro", productFamily: "iPhone" },
          ],
        }),
      });
    const { state, orchestrator } = setup(executor);
    active = orchestrator;

    orchestrator.openCreateForm();
    expect(state.createDeviceForm.isLoading).toBe(true);
    await orchestrator.drain();

    const form = state.createDeviceForm;
    expect(state.mode).toBe("CreateDevice");
    expect(form.isLoading).toBe(false);
    expect(form.version).toBe("com.apple.CoreSimulator.SimRuntime.iOS-17-0");
    expect(form.name).toBe("iPhone 15 Pro iOS 17");
  });

  it("explains when the platform has no tools", async () => {
    const { state, orchestrator } = setup(new MockCommandExecutor(), { panel: "android" });
    active = orchestrator;

    orchestrator.openCreateForm();
    await orchestrator.drain();

    expect(state.createDeviceForm.isLoading).toBe(false);
    expect(state.createDeviceForm.errorMessage).toBe("Android tools are not available");
  });

  it("does not submit an invalid form", () => {
    const { state, executor, orchestrator } = setup(new MockCommandExecutor());
    active = orchestrator;
    state.openCreateForm();
    state.createDeviceForm.isLoading = false;

    orchestrator.submitCreateForm();

    expect(state.createDeviceForm.errorMessage).toBe("Select a version");
    expect(state.operationsInFlight.size).toBe(0);
    expect(executor.calls).toHaveLength(0);
  });
});

describe("Orchestrator.tick", () => {
  it("drops expired notifications and refreshes when due", async () => {
    const executor = new MockCommandExecutor().respond("xcrun", LIST_JSON, { stdout: simulators("Shutdown") });
    const { state, orchestrator, setClock } = setup(executor);
    active = orchestrator;
    state.notifications.push("old news", "info", { now: 0 });
    setClock(5_000);

    await orchestrator.tick();
    await orchestrator.drain();

    expect(state.notifications.size).toBe(0);
    expect(state.lastRefresh).toBe(5_000);
    expect(state.iosDevices).toHaveLength(1);
  });
});

describe("Orchestrator API levels", () => {
  const INSTALLED_34 = `Installed packages:
  Path                                        | Version | Description   | Location
  system-images;android-34;google_apis;x86_64 | 12      | Google APIs   | system-images/android-34/google_apis/x86_64

Available Packages:
  Path                                        | Version | Description
  system-images;android-33;default;x86_64     | 3       | Default image
`;
  const INSTALLED_BOTH = `Installed packages:
  Path                                        | Version | Description   | Location
  system-images;android-34;google_apis;x86_64 | 12      | Google APIs   | system-images/android-34/google_apis/x86_64
  system-images;android-33;default;x86_64     | 3       | Default image | system-images/android-33/default/x86_64
`;

  it("warns when no Android SDK is configured", () => {
    const { state, orchestrator } = setup(new MockCommandExecutor());
    active = orchestrator;

    orchestrator.openApiLevelManager();

    expect(state.mode).toBe("Normal");
    expect(state.notifications.all.map((n) => [n.type, n.message])).toEqual([
      ["warning", "Android SDK is not configured"],
    ]);
  });

  it("installs the selected level and reloads the list", async () => {
    const sdk = mkdtempSync(path.join(os.tmpdir(), "emu-sdk-"));
    const executor = new MockCommandExecutor()
      .respond("sdkmanager", ["--list"], { stdout: INSTALLED_34 }, { stdout: INSTALLED_BOTH })
      .respond("sdkmanager", ["system-images;android-33;default;x86_64"], {});
    const state = new AppState();
    const store = new StateStore(state);
    const managers: Managers = {
      android: new AndroidManager(executor, { androidHome: sdk, avdHome: sdk, hostArch: "x64" }),
      ios: null,
    };
    const orchestrator = new Orchestrator(store, managers, executor);
    active = orchestrator;

    orchestrator.openApiLevelManager();
    await orchestrator.drain();
    expect(state.apiLevelManager.levels).toEqual([
      { apiLevel: 34, versionName: "Android 14", installed: true, packageId: "system-images;android-34;google_apis;x86_64" },
      { apiLevel: 33, versionName: "Android 13", installed: false, packageId: "system-images;android-33;default;x86_64" },
    ]);

    state.moveApiLevelSelection(1);
    orchestrator.toggleSelectedApiLevel();
    await orchestrator.drain();

    expect(state.apiLevelManager.levels.map((level) => level.installed)).toEqual([true, true]);
    expect(state.notifications.all.map((n) => n.message)).toEqual(["Installed API 33"]);
  });
});
