import {
  BaseOperation,
  OperationRegistry,
  managerFor,
  type OperationContext,
  type OperationResult,
} from "@/types/operation";
import { EmuError } from "@/types/errors";

export class StartDeviceOperation extends BaseOperation {
  constructor() {
    super({
      id: "start-device",
      label: "Starting",
      pendingStatus: "Starting",
      finalStatus: "Running",
    });
  }

  protected override claim(context: OperationContext): void {
    const { store, target } = context;
    const pending = store.read((state) => state.pendingDeviceStarts.has(target.identifier));
    if (pending) {
      throw new EmuError(
        "ConcurrentOperationConflict",
        `${target.name} is already starting`,
        { identifier: target.identifier }
      );
    }

    super.claim(context);
    store.update((state) => {
      state.pendingDeviceStarts.add(target.identifier);
      state.pendingDeviceStops.delete(target.identifier);
    });
  }

  protected override release(context: OperationContext): void {
    super.release(context);
    context.store.update((state) => {
      state.pendingDeviceStarts.delete(context.target.identifier);
    });
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    await managerFor(managers, target.platform).startDevice(target.identifier);
    return { success: true, message: `Started ${target.name}` };
  }
}

OperationRegistry.register(new StartDeviceOperation());
