import {
  BaseOperation,
  OperationRegistry,
  managerFor,
  type OperationContext,
  type OperationResult,
} from "@/types/operation";

// A running device is shut down before its data is erased.
export class WipeDeviceOperation extends BaseOperation {
  constructor() {
    super({
      id: "wipe-device",
      label: "Wiping",
      finalStatus: "Stopped",
    });
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    await managerFor(managers, target.platform).wipeDevice(target.identifier);
    return { success: true, message: `Wiped ${target.name}` };
  }
}

OperationRegistry.register(new WipeDeviceOperation());
