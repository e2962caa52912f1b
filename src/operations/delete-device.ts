import {
  BaseOperation,
  OperationRegistry,
  managerFor,
  type OperationContext,
  type OperationResult,
} from "@/types/operation";

export class DeleteDeviceOperation extends BaseOperation {
  constructor() {
    super({
      id: "delete-device",
      label: "Deleting",
    });
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    await managerFor(managers, target.platform).deleteDevice(target.identifier);
    return { success: true, message: `Deleted ${target.name}` };
  }

  protected override async afterExecute(
    result: OperationResult,
    context: OperationContext
  ): Promise<void> {
    if (result.success) {
      const { platform, identifier } = context.target;
      context.store.update((state) => {
        state.removeDevice(platform, identifier);
        if (state.currentLogDevice?.identifier === identifier) state.setLogTarget(null);
      });
    }
    await super.afterExecute(result, context);
  }
}

OperationRegistry.register(new DeleteDeviceOperation());
