import {
  BaseOperation,
  OperationRegistry,
  requireAndroid,
  type OperationContext,
  type OperationResult,
} from "@/types/operation";

export class UninstallSystemImageOperation extends BaseOperation {
  constructor() {
    super({
      id: "uninstall-system-image",
      label: "Uninstalling",
    });
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    await requireAndroid(managers).uninstallSystemImage(target.identifier);
    return { success: true, message: `Uninstalled ${target.name}` };
  }
}

OperationRegistry.register(new UninstallSystemImageOperation());
