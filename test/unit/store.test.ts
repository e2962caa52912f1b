import { describe, expect, it, vi } from "vitest";
import { AppState } from "@/app/state";
import { StateStore } from "@/app/state/store";

describe("StateStore", () => {
  it("notifies subscribers after each update, not after reads", () => {
    const store = new StateStore(new AppState());
    const listener = vi.fn();
    store.subscribe(listener);

    store.read((state) => state.mode);
    expect(listener).not.toHaveBeenCalled();

    const mode = store.update((state) => {
      state.mode = "Help";
      return state.mode;
    });
    expect(mode).toBe("Help");
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it("stops notifying after unsubscribe", () => {
    const store = new StateStore(new AppState());
    const listener = vi.fn();
    const unsubscribe = store.subscribe(listener);

    unsubscribe();
    store.update((state) => state.toggleFocus());

    expect(listener).not.toHaveBeenCalled();
  });

  it("rejects asynchronous callbacks and stays usable", async () => {
    const store = new StateStore(new AppState());

    expect(() => store.update(async () => undefined)).toThrow(
      "StateStore.update callbacks must be synchronous"
    );
    expect(() => store.read(async () => undefined)).toThrow(
      "StateStore.read callbacks must be synchronous"
    );

    store.update((state) => state.notifyInfo("still works"));
    expect(store.read((state) => state.notifications.size)).toBe(1);
  });

  it("rejects nested updates", () => {
    const store = new StateStore(new AppState());

    expect(() =>
      store.update(() => {
        store.update((state) => state.toggleFocus());
      })
    ).toThrow("StateStore.update is not reentrant");
    expect(store.read((state) => state.focusedPanel)).toBe("deviceList");
  });
});
