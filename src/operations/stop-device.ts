import {
  BaseOperation,
  OperationRegistry,
  managerFor,
  type OperationContext,
  type OperationResult,
} from "@/types/operation";

export class StopDeviceOperation extends BaseOperation {
  constructor() {
    super({
      id: "stop-device",
      label: "Stopping",
      pendingStatus: "Stopping",
      finalStatus: "Stopped",
    });
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    await managerFor(managers, target.platform).stopDevice(target.identifier);
    return { success: true, message: `Stopped ${target.name}` };
  }

  protected override async afterExecute(
    result: OperationResult,
    context: OperationContext
  ): Promise<void> {
    if (result.success) {
      const { identifier } = context.target;
      context.store.update((state) => {
        state.pendingDeviceStops.add(identifier);
      });
    }
    await super.afterExecute(result, context);
  }
}

OperationRegistry.register(new StopDeviceOperation());
