import type { DeviceCategory } from "@/types/device";

export interface DeviceTypeInfo {
  identifier: string;
  name: string;
  productFamily: string;
  category: DeviceCategory;
}

export interface RuntimeInfo {
  identifier: string;
  name: string;
  version: string;
  isAvailable: boolean;
}
