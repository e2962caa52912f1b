import type {
  Device,
  DeviceConfig,
  DeviceDetails,
  DeviceLogLevel,
  Platform,
} from "@/types/device";
import type { EmuError } from "@/types/errors";

export interface CatalogResult<T> {
  items: T[];
  error?: EmuError;
}

export interface LogCommand {
  program: string;
  args: string[];
  detectLevel: (line: string) => DeviceLogLevel;
}

/** One option of a create-device form list. */
export interface FormOption {
  value: string;
  label: string;
  category?: string;
}

export interface CreationCatalog {
  versions: CatalogResult<FormOption>;
  deviceTypes: CatalogResult<FormOption>;
}

export interface DeviceManager<T extends Device = Device> {
  readonly platform: Platform;
  listDevices(): Promise<T[]>;
  createDevice(config: DeviceConfig): Promise<void>;
  startDevice(identifier: string): Promise<void>;
  stopDevice(identifier: string): Promise<void>;
  wipeDevice(identifier: string): Promise<void>;
  deleteDevice(identifier: string): Promise<void>;
  getDeviceDetails(identifier: string): Promise<DeviceDetails>;
  getLogCommand(identifier: string): Promise<LogCommand | null>;
  /** Options for the create-device form. Never throws. */
  loadCreationCatalog(): Promise<CreationCatalog>;
}

export function sortDevices<T extends Device>(
  devices: T[],
  priority: (device: T) => number
): T[] {
  return [...devices].sort(
    (a, b) => priority(a) - priority(b) || a.name.localeCompare(b.name)
  );
}
