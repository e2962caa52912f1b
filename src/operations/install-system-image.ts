import {
  BaseOperation,
  OperationRegistry,
  requireAndroid,
  type OperationContext,
  type OperationResult,
} from "@/types/operation";

/** Target identifier is the sdkmanager package path. */
export class InstallSystemImageOperation extends BaseOperation {
  constructor() {
    super({
      id: "install-system-image",
      label: "Installing",
    });
  }

  override async execute({ managers, target }: OperationContext): Promise<OperationResult> {
    await requireAndroid(managers).installSystemImage(target.identifier);
    return { success: true, message: `Installed ${target.name}` };
  }
}

OperationRegistry.register(new InstallSystemImageOperation());
