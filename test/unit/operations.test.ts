import { describe, expect, it } from "vitest";
import { AppState } from "@/app/state";
import { StateStore } from "@/app/state/store";
import { OPERATION_ORDER, type OperationId } from "@/constants";
import { OperationRegistry } from "@/operations";
import type { BaseOperation, Managers, OperationTarget } from "@/types/operation";
import { IosManager } from "@/utils/emu/ios";
import type { CommandOutput, RunOptions } from "@/utils/exec";
import { iosDevice, simctlDevicesJson } from "../support/devices";
import { MockCommandExecutor } from "../support/mock-executor";

const NAME = "iPhone 15 Pro (iOS 17.0)";
const TARGET: OperationTarget = { platform: "ios", identifier: "UDID-1", name: NAME };
const IDLE = simctlDevicesJson({
  "com.apple.CoreSimulator.SimRuntime.iOS-17-0": [
    { name: "iPhone 15 Pro", udid: "UDID-1", state: "Shutdown" },
  ],
});

/** Records what the UI would show at the moment a simctl subcommand is issued. */
class ObservingExecutor extends MockCommandExecutor {
  readonly observed: Array<{ subcommand: string; status?: string; headline: string | null }> = [];
  store: StateStore | null = null;

  override async run(program: string, args: string[], options?: RunOptions): Promise<CommandOutput> {
    const store = this.store;
    if (store && args[0] === "simctl") {
      this.observed.push(
        store.read((state) => ({
          subcommand: args[1] ?? "",
          status: state.iosDevices[0]?.status,
          headline: state.deviceOperationStatus,
        }))
      );
    }
    return super.run(program, args, options);
  }
}

function setup(executor = new ObservingExecutor()) {
  const state = new AppState();
  state.switchPanel("ios");
  state.replaceDevices("ios", [iosDevice(NAME, "UDID-1")]);
  const store = new StateStore(state);
  executor.store = store;
  const managers: Managers = { android: null, ios: new IosManager(executor) };
  return { state, store, managers, executor };
}

function operation(id: OperationId): BaseOperation {
  const registered = OperationRegistry.get(id);
  if (!registered) throw new Error(`${id} is not registered`);
  return registered;
}

describe("OperationRegistry", () => {
  it("lists every operation in display order", () => {
    expect(OperationRegistry.getAll().map((op) => op.id)).toEqual([...OPERATION_ORDER]);
  });
});

describe("start-device", () => {
  it("shows Starting before the boot command and Running after it", async () => {
    const { state, store, managers, executor } = setup();
    executor.respond("xcrun", ["simctl", "boot", "UDID-1"], {}).respond("open", ["-a", "Simulator"], {});

    const result = await operation("start-device").run({ store, managers, target: TARGET });

    expect(result).toEqual({ success: true, message: `Started ${NAME}` });
    expect(executor.observed).toEqual([
      { subcommand: "boot", status: "Starting", headline: `Starting ${NAME}...` },
    ]);
    expect(state.iosDevices[0]?.status).toBe("Running");
    expect(state.iosDevices[0]?.isRunning).toBe(true);
    expect(state.deviceOperationStatus).toBeNull();
    expect(state.notifications.all.map((n) => [n.type, n.message])).toEqual([
      ["success", `Started ${NAME}`],
    ]);
    expect(state.pendingDeviceStarts.size).toBe(0);
    expect(state.operationsInFlight.size).toBe(0);
  });

  it("marks the device Error and reports the failure", async () => {
    const { state, store, managers } = setup(
      new ObservingExecutor().respond("xcrun", ["simctl", "boot", "UDID-1"], {
        exitCode: 1,
        stderr: "Unable to boot: something broke",
      })
    );

    const result = await operation("start-device").run({ store, managers, target: TARGET });

    expect(result.success).toBe(false);
    expect(result.message).toBe("Unable to boot: something broke");
    expect(state.iosDevices[0]?.status).toBe("Error");
    expect(state.deviceOperationStatus).toBeNull();
    expect(state.notifications.all.map((n) => [n.type, n.message])).toEqual([
      ["error", "Unable to boot: something broke"],
    ]);
    expect(state.pendingDeviceStarts.has("UDID-1")).toBe(false);
  });

  it("refuses a second start of the same device", async () => {
    const { state, store, managers, executor } = setup();
    executor.respond("xcrun", ["simctl", "boot", "UDID-1"], {}).respond("open", ["-a", "Simulator"], {});
    const start = operation("start-device");

    const first = start.run({ store, managers, target: TARGET });
    const second = await start.run({ store, managers, target: TARGET });

    expect(second).toMatchObject({
      success: false,
      message: `Busy: ${NAME} is already starting`,
      error: { kind: "ConcurrentOperationConflict" },
    });
    expect((await first).success).toBe(true);
    expect(executor.callsTo("xcrun")).toHaveLength(1);
    expect(state.notifications.all.map((n) => n.type)).toEqual(["warning", "success"]);
  });

  it("leaves a pending start it did not claim untouched", async () => {
    const { state, store, managers, executor } = setup();
    state.pendingDeviceStarts.add("UDID-1");

    const result = await operation("start-device").run({ store, managers, target: TARGET });

    expect(result.success).toBe(false);
    expect(executor.calls).toHaveLength(0);
    expect(state.pendingDeviceStarts.has("UDID-1")).toBe(true);
  });

  it("fails cleanly without a manager for the platform", async () => {
    const { store } = setup();

    const result = await operation("start-device").run({
      store,
      managers: { android: null, ios: null },
      target: { platform: "android", identifier: "Pixel_7_API_34", name: "Pixel_7_API_34" },
    });

    expect(result.message).toBe("SDK unavailable: Android SDK is not configured");
  });
});

describe("operation conflicts", () => {
  it("rejects an operation while another holds the device", async () => {
    const { state, store, managers, executor } = setup();
    state.operationsInFlight.set("UDID-1", "stop-device");

    const result = await operation("delete-device").run({ store, managers, target: TARGET });

    expect(result.message).toBe(`Busy: ${NAME} is busy (stop-device)`);
    expect(executor.calls).toHaveLength(0);
    expect(state.operationsInFlight.get("UDID-1")).toBe("stop-device");
  });
});

describe("stop-device", () => {
  it("moves through Stopping to Stopped", async () => {
    const { state, store, managers, executor } = setup();
    state.setDeviceStatus("ios", "UDID-1", "Running");
    executor
      .respond("xcrun", ["simctl", "shutdown", "UDID-1"], {})
      .respond("xcrun", ["simctl", "list", "devices", "--json"], { stdout: IDLE })
      .respond("osascript", ["-e", 'tell application "Simulator" to quit'], {});

    await operation("stop-device").run({ store, managers, target: TARGET });

    expect(executor.observed[0]).toEqual({
      subcommand: "shutdown",
      status: "Stopping",
      headline: `Stopping ${NAME}...`,
    });
    expect(state.iosDevices[0]?.status).toBe("Stopped");
  });

  it("stays Stopped while a late listing still reports the device running", async () => {
    const { state, store, managers, executor } = setup();
    state.setDeviceStatus("ios", "UDID-1", "Running");
    executor
      .respond("xcrun", ["simctl", "shutdown", "UDID-1"], {})
      .respond("xcrun", ["simctl", "list", "devices", "--json"], { stdout: IDLE })
      .respond("osascript", ["-e", 'tell application "Simulator" to quit'], {});

    await operation("stop-device").run({ store, managers, target: TARGET });
    state.replaceDevices("ios", [iosDevice(NAME, "UDID-1", { status: "Running", isRunning: true })]);

    expect(state.iosDevices[0]?.status).toBe("Stopped");
    expect(state.pendingDeviceStops.has("UDID-1")).toBe(true);
  });

  it("starting again drops the pending stop", async () => {
    const { state, store, managers, executor } = setup();
    state.pendingDeviceStops.add("UDID-1");
    executor.respond("xcrun", ["simctl", "boot", "UDID-1"], {}).respond("open", ["-a", "Simulator"], {});

    await operation("start-device").run({ store, managers, target: TARGET });

    expect(state.pendingDeviceStops.size).toBe(0);
    expect(state.iosDevices[0]?.status).toBe("Running");
  });
});

describe("delete-device", () => {
  it("removes the device and stops following its log", async () => {
    const { state, store, managers, executor } = setup();
    state.setLogTarget({ platform: "ios", identifier: "UDID-1" });
    executor.respond("xcrun", ["simctl", "delete", "UDID-1"], {});

    const result = await operation("delete-device").run({ store, managers, target: TARGET });

    expect(result.message).toBe(`Deleted ${NAME}`);
    expect(state.iosDevices).toEqual([]);
    expect(state.currentLogDevice).toBeNull();
  });
});

describe("wipe-device", () => {
  it("leaves the device stopped", async () => {
    const { state, store, managers, executor } = setup();
    executor
      .respond("xcrun", ["simctl", "list", "devices", "--json"], { stdout: IDLE })
      .respond("xcrun", ["simctl", "erase", "UDID-1"], {});

    const result = await operation("wipe-device").run({ store, managers, target: TARGET });

    expect(result.message).toBe(`Wiped ${NAME}`);
    expect(state.iosDevices[0]?.status).toBe("Stopped");
  });
});

describe("create-device", () => {
  const config = {
    name: "My Phone",
    deviceType: "com.apple.CoreSimulator.SimDeviceType.iPhone-15-Pro",
    version: "com.apple.CoreSimulator.SimRuntime.iOS-17-0",
    additionalOptions: {},
  };
  const createArgs = ["simctl", "create", config.name, config.deviceType, config.version];
  const target: OperationTarget = { platform: "ios", identifier: "My Phone", name: "My Phone", config };

  it("closes the form on success", async () => {
    const { state, store, managers, executor } = setup();
    state.openCreateForm();
    executor.respond("xcrun", createArgs, { stdout: "NEW-UDID\n" });

    const result = await operation("create-device").run({ store, managers, target });

    expect(result.message).toBe("Created My Phone");
    expect(state.mode).toBe("Normal");
    expect(state.createDeviceForm.isCreating).toBe(false);
    expect(executor.observed[0]?.headline).toBe("Creating My Phone...");
  });

  it("keeps the form open with the error", async () => {
    const { state, store, managers, executor } = setup();
    state.openCreateForm();
    executor.respond("xcrun", createArgs, { exitCode: 1, stderr: "Invalid device type: iPhone-15-Pro" });

    const result = await operation("create-device").run({ store, managers, target });

    expect(result.success).toBe(false);
    expect(state.mode).toBe("CreateDevice");
    expect(state.createDeviceForm.errorMessage).toBe("Invalid device type: iPhone-15-Pro");
    expect(state.createDeviceForm.isCreating).toBe(false);
  });
});
