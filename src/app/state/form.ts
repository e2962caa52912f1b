import { DEFAULTS, LIMITS } from "@/constants";
import type { DeviceConfig, Platform } from "@/types/device";
import { formatUserError } from "@/types/errors";
import type { CreationCatalog, FormOption } from "@/utils/emu/abstraction";

export type FormField =
  | "ApiLevel"
  | "Category"
  | "DeviceType"
  | "RamSize"
  | "StorageSize"
  | "Name";

const ANDROID_FIELDS: FormField[] = [
  "ApiLevel",
  "Category",
  "DeviceType",
  "RamSize",
  "StorageSize",
  "Name",
];

const IOS_FIELDS: FormField[] = ["ApiLevel", "DeviceType", "Name"];

export const CATEGORY_FILTERS = [
  "all",
  "phone",
  "tablet",
  "wear",
  "tv",
  "automotive",
  "desktop",
] as const;

export type CategoryFilter = (typeof CATEGORY_FILTERS)[number];

const NAME_CHAR = /^[A-Za-z0-9 ._-]$/;
const MAX_SIZE_DIGITS = 6;

function step(fields: FormField[], current: FormField, delta: number): FormField {
  const index = fields.indexOf(current);
  if (index === -1) return "ApiLevel";
  return fields[(index + delta + fields.length) % fields.length] ?? "ApiLevel";
}

function wrapIndex(index: number, delta: number, length: number): number {
  if (length === 0) return 0;
  return (index + delta + length) % length;
}

/** Device-type label reduced to three words, parenthesised text removed. */
function devicePart(label: string): string {
  return label
    .replace(/\([^)]*\)/g, " ")
    .split(/\s+/)
    .filter(Boolean)
    .slice(0, 3)
    .join(" ");
}

function versionPart(label: string, platform: Platform): string {
  if (platform === "android") {
    return label.match(/API \d+/)?.[0] ?? label.split(" - ")[0]?.trim() ?? "";
  }
  const ios = label.match(/iOS (\d+)/);
  return ios ? `iOS ${ios[1]}` : label.trim();
}

function parseSize(value: string): number | null {
  return /^\d+$/.test(value) ? Number(value) : null;
}

export class CreateDeviceForm {
  activeField: FormField = "ApiLevel";
  name = "";
  deviceType = "";
  deviceTypeId = "";
  version = "";
  versionDisplay = "";
  ramSize: string = DEFAULTS.ramSize;
  storageSize: string = DEFAULTS.storageSize;

  availableVersions: FormOption[] = [];
  allDeviceTypes: FormOption[] = [];
  availableDeviceTypes: FormOption[] = [];
  selectedApiLevelIndex = 0;
  selectedCategoryIndex = 0;
  selectedDeviceTypeIndex = 0;

  errorMessage: string | null = null;
  isLoading = false;
  isCreating = false;
  // Whether `name` still holds a generated placeholder.
  private nameGenerated = false;

  constructor(readonly platform: Platform) {}

  get fields(): readonly FormField[] {
    return this.platform === "android" ? ANDROID_FIELDS : IOS_FIELDS;
  }

  get category(): CategoryFilter {
    return CATEGORY_FILTERS[this.selectedCategoryIndex] ?? "all";
  }

  nextField(): void {
    this.activeField = step(ANDROID_FIELDS, this.activeField, 1);
  }

  prevField(): void {
    this.activeField = step(ANDROID_FIELDS, this.activeField, -1);
  }

  nextFieldIos(): void {
    this.activeField = step(IOS_FIELDS, this.activeField, 1);
  }

  prevFieldIos(): void {
    this.activeField = step(IOS_FIELDS, this.activeField, -1);
  }

  /** Next field in this form's own cycle. */
  focusNext(): void {
    if (this.platform === "android") this.nextField();
    else this.nextFieldIos();
  }

  focusPrevious(): void {
    if (this.platform === "android") this.prevField();
    else this.prevFieldIos();
  }

  // Vertical movement inside a field list is not supported.
  moveSelectionUp(): boolean {
    return false;
  }

  moveSelectionDown(): boolean {
    return false;
  }

  selectNext(): boolean {
    return this.moveSelection(1);
  }

  selectPrevious(): boolean {
    return this.moveSelection(-1);
  }

  private moveSelection(delta: number): boolean {
    switch (this.activeField) {
      case "ApiLevel":
        if (this.availableVersions.length === 0) return false;
        this.selectedApiLevelIndex = wrapIndex(
          this.selectedApiLevelIndex,
          delta,
          this.availableVersions.length
        );
        this.updateSelectedApiLevel();
        break;
      case "Category":
        this.selectedCategoryIndex = wrapIndex(
          this.selectedCategoryIndex,
          delta,
          CATEGORY_FILTERS.length
        );
        this.updateSelectedCategory();
        break;
      case "DeviceType":
        if (this.availableDeviceTypes.length === 0) return false;
        this.selectedDeviceTypeIndex = wrapIndex(
          this.selectedDeviceTypeIndex,
          delta,
          this.availableDeviceTypes.length
        );
        this.updateSelectedDeviceType();
        break;
      default:
        return false;
    }

    this.errorMessage = null;
    return true;
  }

  setCatalog(catalog: CreationCatalog): void {
    this.isLoading = false;
    this.availableVersions = catalog.versions.items;
    this.allDeviceTypes = catalog.deviceTypes.items;
    this.selectedApiLevelIndex = 0;
    this.selectedDeviceTypeIndex = 0;

    const failure = catalog.versions.error ?? catalog.deviceTypes.error;
    if (failure) {
      this.errorMessage = formatUserError(failure);
    } else if (this.availableVersions.length === 0) {
      this.errorMessage =
        this.platform === "android"
          ? "No system images installed. Install one with 'a'"
          : "No simulator runtimes available";
    }

    this.updateSelectedApiLevel();
    this.updateSelectedCategory();
  }

  updateSelectedApiLevel(): void {
    const option = this.availableVersions[this.selectedApiLevelIndex];
    this.version = option?.value ?? "";
    this.versionDisplay = option?.label ?? "";
    this.refreshPlaceholderName();
  }

  updateSelectedCategory(): void {
    const category = this.category;
    this.availableDeviceTypes =
      category === "all"
        ? this.allDeviceTypes
        : this.allDeviceTypes.filter((option) => option.category === category);
    this.selectedDeviceTypeIndex = 0;
    this.updateSelectedDeviceType();
  }

  updateSelectedDeviceType(): void {
    const option = this.availableDeviceTypes[this.selectedDeviceTypeIndex];
    this.deviceTypeId = option?.value ?? "";
    this.deviceType = option?.label ?? "";
    this.refreshPlaceholderName();
  }

  private refreshPlaceholderName(): void {
    if (this.name === "" || this.nameGenerated) {
      this.name = "";
      this.generatePlaceholderName();
    }
  }

  /** Fills an empty name from the device type and version. */
  generatePlaceholderName(): void {
    if (this.name !== "") return;

    const parts = [devicePart(this.deviceType), versionPart(this.versionDisplay, this.platform)]
      .filter(Boolean)
      .join(" ");
    const placeholder = parts.slice(0, LIMITS.maxDeviceNameLength).trim();

    this.name = placeholder;
    this.nameGenerated = placeholder !== "";
  }

  inputChar(char: string): boolean {
    switch (this.activeField) {
      case "Name":
        if (!NAME_CHAR.test(char)) {
          this.errorMessage = `'${char}' is not allowed in a device name`;
          return false;
        }
        if (this.name.length >= LIMITS.maxDeviceNameLength) {
          this.errorMessage = `Name is limited to ${LIMITS.maxDeviceNameLength} characters`;
          return false;
        }
        this.name += char;
        this.nameGenerated = false;
        break;
      case "RamSize":
      case "StorageSize": {
        if (!/^\d$/.test(char)) {
          this.errorMessage = "Sizes are whole numbers of MB";
          return false;
        }
        const current = this.activeField === "RamSize" ? this.ramSize : this.storageSize;
        if (current.length >= MAX_SIZE_DIGITS) return false;
        if (this.activeField === "RamSize") this.ramSize = current + char;
        else this.storageSize = current + char;
        break;
      }
      default:
        return false;
    }

    this.errorMessage = null;
    return true;
  }

  backspace(): boolean {
    switch (this.activeField) {
      case "Name":
        if (!this.name) return false;
        this.name = this.name.slice(0, -1);
        this.nameGenerated = false;
        break;
      case "RamSize":
        if (!this.ramSize) return false;
        this.ramSize = this.ramSize.slice(0, -1);
        break;
      case "StorageSize":
        if (!this.storageSize) return false;
        this.storageSize = this.storageSize.slice(0, -1);
        break;
      default:
        return false;
    }

    this.errorMessage = null;
    return true;
  }

  validateField(field: FormField): string | null {
    switch (field) {
      case "Name":
        if (!this.name.trim()) return "Device name is required";
        if (this.name.length > LIMITS.maxDeviceNameLength) {
          return `Name is limited to ${LIMITS.maxDeviceNameLength} characters`;
        }
        return null;
      case "RamSize": {
        const ram = parseSize(this.ramSize);
        if (ram === null || ram < LIMITS.minRamMb || ram > LIMITS.maxRamMb) {
          return `RAM must be between ${LIMITS.minRamMb} and ${LIMITS.maxRamMb} MB`;
        }
        return null;
      }
      case "StorageSize": {
        const storage = parseSize(this.storageSize);
        if (storage === null || storage < LIMITS.minStorageMb || storage > LIMITS.maxStorageMb) {
          return `Storage must be between ${LIMITS.minStorageMb} and ${LIMITS.maxStorageMb} MB`;
        }
        return null;
      }
      case "ApiLevel":
        return this.version ? null : "Select a version";
      case "DeviceType":
        return this.deviceTypeId ? null : "Select a device type";
      case "Category":
        return null;
    }
  }

  /** Validates the fields of this form's cycle; keeps the first failure. */
  validate(): string | null {
    for (const field of this.fields) {
      const message = this.validateField(field);
      if (message) {
        this.errorMessage = message;
        return message;
      }
    }
    this.errorMessage = null;
    return null;
  }

  toDeviceConfig(): DeviceConfig {
    const config: DeviceConfig = {
      name: this.name.trim(),
      deviceType: this.deviceTypeId,
      version: this.version,
      additionalOptions: {},
    };

    if (this.platform === "android") {
      config.ramSize = this.ramSize;
      config.storageSize = this.storageSize;
    }
    return config;
  }
}
