import {
  BaseOperation,
  OperationRegistry,
  managerFor,
  type OperationContext,
  type OperationResult,
  type OperationTarget,
} from "@/types/operation";
import { EmuError } from "@/types/errors";

export class CreateDeviceOperation extends BaseOperation {
  constructor() {
    super({
      id: "create-device",
      label: "Creating",
    });
  }

  protected override progressLabel(target: OperationTarget): string {
    return `Creating ${target.name}...`;
  }

  protected override async beforeExecute(context: OperationContext): Promise<void> {
    context.store.update((state) => {
      state.createDeviceForm.isCreating = true;
    });
    await super.beforeExecute(context);
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    if (!target.config) {
      throw new EmuError("CreationFailure", "No device configuration given");
    }

    await managerFor(managers, target.platform).createDevice(target.config);
    return { success: true, message: `Created ${target.name}` };
  }

  // The form stays open on failure so the input can be corrected.
  protected override async afterExecute(
    result: OperationResult,
    context: OperationContext
  ): Promise<void> {
    context.store.update((state) => {
      const form = state.createDeviceForm;
      form.isCreating = false;

      if (result.success) {
        if (state.mode === "CreateDevice") state.closeDialog();
      } else {
        form.errorMessage = result.message ?? "Device creation failed";
      }
    });
    await super.afterExecute(result, context);
  }
}

OperationRegistry.register(new CreateDeviceOperation());
