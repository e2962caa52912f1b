import "./start-device";
import "./stop-device";
import "./create-device";
import "./wipe-device";
import "./delete-device";
import "./install-system-image";
import "./uninstall-system-image";

export { OperationRegistry } from "@/types/operation";
