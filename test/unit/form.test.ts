import { describe, expect, it } from "vitest";
import { CreateDeviceForm, type FormField } from "@/app/state/form";
import { EmuError } from "@/types/errors";
import type { CreationCatalog } from "@/utils/emu/abstraction";

const ANDROID_CATALOG: CreationCatalog = {
  versions: {
    items: [
      { value: "34", label: "API 34 - Android 14" },
      { value: "33", label: "API 33 - Android 13" },
    ],
  },
  deviceTypes: {
    items: [
      { value: "pixel_7", label: "Pixel 7 (Google)", category: "phone" },
      { value: "pixel_tablet", label: "Pixel Tablet (Google)", category: "tablet" },
    ],
  },
};

function androidForm(): CreateDeviceForm {
  const form = new CreateDeviceForm("android");
  form.setCatalog(ANDROID_CATALOG);
  return form;
}

describe("CreateDeviceForm field cycle", () => {
  it("visits every Android field and returns to the start", () => {
    const form = new CreateDeviceForm("android");
    const visited: FormField[] = [];
    for (let i = 0; i < 6; i++) {
      form.nextField();
      visited.push(form.activeField);
    }

    expect(visited).toEqual(["Category", "DeviceType", "RamSize", "StorageSize", "Name", "ApiLevel"]);

    form.prevField();
    expect(form.activeField).toBe("Name");
  });

  it("skips hardware fields on iOS", () => {
    const form = new CreateDeviceForm("ios");
    const visited: FormField[] = [];
    for (let i = 0; i < 3; i++) {
      form.focusNext();
      visited.push(form.activeField);
    }

    expect(visited).toEqual(["DeviceType", "Name", "ApiLevel"]);
  });

  it("falls back to the first field from outside the iOS cycle", () => {
    const form = new CreateDeviceForm("ios");
    form.activeField = "RamSize";
    form.nextFieldIos();
    expect(form.activeField).toBe("ApiLevel");

    form.activeField = "Category";
    form.prevFieldIos();
    expect(form.activeField).toBe("ApiLevel");
  });

  it("does not move within a field vertically", () => {
    const form = androidForm();
    expect(form.moveSelectionUp()).toBe(false);
    expect(form.moveSelectionDown()).toBe(false);
    expect(form.selectedApiLevelIndex).toBe(0);
  });
});

describe("CreateDeviceForm catalog", () => {
  it("selects the first options and generates a name", () => {
    const form = androidForm();

    expect(form.isLoading).toBe(false);
    expect([form.version, form.versionDisplay]).toEqual(["34", "API 34 - Android 14"]);
    expect([form.deviceTypeId, form.deviceType]).toEqual(["pixel_7", "Pixel 7 (Google)"]);
    expect(form.name).toBe("Pixel 7 API 34");
    expect(form.errorMessage).toBeNull();
  });

  it("regenerates the placeholder as selections change", () => {
    const form = androidForm();

    form.selectNext();
    expect(form.name).toBe("Pixel 7 API 33");

    form.activeField = "Category";
    form.selectNext();
    expect(form.category).toBe("phone");
    expect(form.availableDeviceTypes.map((option) => option.value)).toEqual(["pixel_7"]);

    form.selectNext();
    expect(form.category).toBe("tablet");
    expect(form.deviceTypeId).toBe("pixel_tablet");
    expect(form.name).toBe("Pixel Tablet API 33");
  });

  it("wraps selections backwards", () => {
    const form = androidForm();
    form.selectPrevious();
    expect(form.version).toBe("33");
  });

  it("keeps a typed name", () => {
    const form = androidForm();
    form.activeField = "Name";
    form.inputChar("X");

    form.activeField = "ApiLevel";
    form.selectNext();

    expect(form.name).toBe("Pixel 7 API 34X");
  });

  it("generates again once the name is erased", () => {
    const form = androidForm();
    form.activeField = "Name";
    while (form.backspace()) {
      // erase
    }
    expect(form.name).toBe("");

    form.activeField = "ApiLevel";
    form.selectNext();
    expect(form.name).toBe("Pixel 7 API 33");
  });

  it("builds iOS names from the runtime major version", () => {
    const form = new CreateDeviceForm("ios");
    form.setCatalog({
      versions: { items: [{ value: "com.apple.CoreSimulator.SimRuntime.iOS-17-0", label: "iOS 17.0" }] },
      deviceTypes: {
        items: [
          {
            value: "com.apple.CoreSimulator.SimDeviceType.iPhone-15-Pro-Max",
            label: "iPhone 15 Pro Max",
            category: "phone",
          },
        ],
      },
    });

    expect(form.name).toBe("iPhone 15 Pro iOS 17");
  });

  it("explains an empty catalog", () => {
    const android = new CreateDeviceForm("android");
    android.setCatalog({ versions: { items: [] }, deviceTypes: { items: [] } });
    expect(android.errorMessage).toBe("No system images installed. Install one with 'a'");

    const ios = new CreateDeviceForm("ios");
    ios.setCatalog({ versions: { items: [] }, deviceTypes: { items: [] } });
    expect(ios.errorMessage).toBe("No simulator runtimes available");
  });

  it("shows a catalog error", () => {
    const form = new CreateDeviceForm("android");
    form.setCatalog({
      versions: { items: [], error: new EmuError("CommandExecutionFailure", "sdkmanager failed") },
      deviceTypes: { items: [] },
    });
    expect(form.errorMessage).toBe("sdkmanager failed");
  });
});

describe("CreateDeviceForm input", () => {
  it("rejects characters outside the name alphabet", () => {
    const form = androidForm();
    form.activeField = "Name";

    expect(form.inputChar("@")).toBe(false);
    expect(form.errorMessage).toBe("'@' is not allowed in a device name");

    expect(form.inputChar("a")).toBe(true);
    expect(form.errorMessage).toBeNull();
  });

  it("caps the name length", () => {
    const form = androidForm();
    form.activeField = "Name";
    form.name = "a".repeat(50);

    expect(form.inputChar("b")).toBe(false);
    expect(form.errorMessage).toBe("Name is limited to 50 characters");
  });

  it("accepts only digits for sizes", () => {
    const form = androidForm();
    form.activeField = "RamSize";

    expect(form.inputChar("x")).toBe(false);
    expect(form.errorMessage).toBe("Sizes are whole numbers of MB");

    form.backspace();
    form.backspace();
    expect(form.inputChar("0")).toBe(true);
    expect(form.ramSize).toBe("200");
  });

  it("ignores text input on list fields", () => {
    const form = androidForm();
    expect(form.inputChar("a")).toBe(false);
    expect(form.backspace()).toBe(false);
  });
});

describe("CreateDeviceForm validation", () => {
  it("reports the first failing field in cycle order", () => {
    const form = androidForm();
    form.ramSize = "256";
    form.storageSize = "100000";
    form.name = "";

    expect(form.validate()).toBe("RAM must be between 512 and 8192 MB");
    form.ramSize = "4096";
    expect(form.validate()).toBe("Storage must be between 1024 and 65536 MB");
    form.storageSize = "8192";
    expect(form.validate()).toBe("Device name is required");
    expect(form.errorMessage).toBe("Device name is required");

    form.name = "Work Phone";
    expect(form.validate()).toBeNull();
    expect(form.errorMessage).toBeNull();
  });

  it("requires a device type", () => {
    const form = androidForm();
    form.activeField = "Category";
    form.selectNext();
    form.selectNext();
    form.selectNext();

    expect(form.category).toBe("wear");
    expect(form.validate()).toBe("Select a device type");
  });

  it("requires a version", () => {
    const form = new CreateDeviceForm("ios");
    expect(form.validate()).toBe("Select a version");
  });

  it("includes hardware only for Android", () => {
    expect(androidForm().toDeviceConfig()).toEqual({
      name: "Pixel 7 API 34",
      deviceType: "pixel_7",
      version: "34",
      ramSize: "2048",
      storageSize: "8192",
      additionalOptions: {},
    });

    const ios = new CreateDeviceForm("ios");
    ios.name = " Phone ";
    expect(ios.toDeviceConfig()).toEqual({
      name: "Phone",
      deviceType: "",
      version: "",
      additionalOptions: {},
    });
  });
});
