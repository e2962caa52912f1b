import { describe, expect, it } from "vitest";
import { EventDebouncer } from "@/app/input/debouncer";
import { EventBatcher } from "@/app/input/event-batcher";
import { decodeKeypress, type KeyEvent } from "@/app/input/keys";
import { NavigationBatcher, navigationStep } from "@/app/input/navigation-batcher";

function clock() {
  let t = 0;
  return {
    now: () => t,
    set: (ms: number) => {
      t = ms;
    },
  };
}

const char = (c: string): KeyEvent => ({ key: "char", char: c });
const key = (name: KeyEvent["key"]): KeyEvent => ({ key: name });

describe("decodeKeypress", () => {
  it("maps readline key names", () => {
    expect(decodeKeypress(undefined, { name: "up" })).toEqual({ key: "up" });
    expect(decodeKeypress("\r", { name: "return" })).toEqual({ key: "enter" });
    expect(decodeKeypress("\u007f", { name: "backspace" })).toEqual({ key: "backspace" });
    expect(decodeKeypress("\t", { name: "tab" })).toEqual({ key: "tab" });
    expect(decodeKeypress("\u001b[Z", { name: "tab", shift: true })).toEqual({ key: "backtab" });
  });

  it("keeps typed characters and control chords", () => {
    expect(decodeKeypress("j", { name: "j" })).toEqual({ key: "char", char: "j" });
    expect(decodeKeypress("F", { name: "f", shift: true })).toEqual({ key: "char", char: "F" });
    expect(decodeKeypress("?", undefined)).toEqual({ key: "char", char: "?" });
    expect(decodeKeypress("\u0003", { name: "c", ctrl: true })).toEqual({
      key: "char",
      char: "c",
      ctrl: true,
    });
  });

  it("ignores sequences it does not know", () => {
    expect(decodeKeypress("\u001b[15~", { name: "f5" })).toBeNull();
    expect(decodeKeypress(undefined, undefined)).toBeNull();
  });
});

describe("EventDebouncer", () => {
  it("drops repeats inside the window only", () => {
    const time = clock();
    const debouncer = new EventDebouncer(8, time.now);

    expect(debouncer.accept(char("j"))).toBe(true);
    time.set(5);
    expect(debouncer.accept(char("j"))).toBe(false);
    time.set(8);
    expect(debouncer.accept(char("j"))).toBe(true);
    time.set(9);
    expect(debouncer.accept(char("k"))).toBe(true);
  });

  it("treats a control chord as a different event", () => {
    const debouncer = new EventDebouncer(8, () => 0);
    expect(debouncer.accept(char("c"))).toBe(true);
    expect(debouncer.accept({ key: "char", char: "c", ctrl: true })).toBe(true);
  });
});

describe("navigationStep", () => {
  it("reads arrows always and letters only when allowed", () => {
    expect(navigationStep(key("left"))).toEqual({ dx: -1, dy: 0 });
    expect(navigationStep(char("j"))).toEqual({ dx: 0, dy: 1 });
    expect(navigationStep(char("j"), false)).toBeNull();
    expect(navigationStep(key("down"), false)).toEqual({ dx: 0, dy: 1 });
    expect(navigationStep(key("enter"))).toBeNull();
  });
});

describe("NavigationBatcher", () => {
  it("nets opposite moves to nothing", () => {
    const batcher = new NavigationBatcher(50, () => 0);
    batcher.add({ dx: 0, dy: -1 });
    batcher.add({ dx: 0, dy: 1 });

    expect(batcher.flush()).toBeNull();
    expect(batcher.isPending).toBe(false);
  });

  it("sums moves", () => {
    const batcher = new NavigationBatcher(50, () => 0);
    batcher.add({ dx: 0, dy: 1 });
    batcher.add({ dx: 0, dy: 1 });
    batcher.add({ dx: 0, dy: -1 });
    batcher.add({ dx: 1, dy: 0 });

    expect(batcher.flush()).toEqual({ dx: 1, dy: 1 });
  });

  it("is ready after a quiet window", () => {
    const time = clock();
    const batcher = new NavigationBatcher(50, time.now);
    batcher.add({ dx: 0, dy: 1 });

    time.set(49);
    expect(batcher.isReady()).toBe(false);
    time.set(50);
    expect(batcher.isReady()).toBe(true);
  });

  it("is ready after twice the window while keys keep coming", () => {
    const time = clock();
    const batcher = new NavigationBatcher(50, time.now);
    for (const at of [0, 40, 80]) {
      time.set(at);
      batcher.add({ dx: 0, dy: 1 });
    }

    time.set(90);
    expect(batcher.isReady()).toBe(false);
    time.set(100);
    expect(batcher.isReady()).toBe(true);
  });
});

describe("EventBatcher", () => {
  function batcher(lettersNavigate = true) {
    const time = clock();
    const events = new EventBatcher({
      debouncer: new EventDebouncer(8, time.now),
      navigation: new NavigationBatcher(50, time.now),
      lettersNavigate: () => lettersNavigate,
    });
    return { events, time };
  }

  it("holds navigation until the batch window closes", () => {
    const { events, time } = batcher();

    expect(events.push(char("j"))).toEqual([]);
    time.set(20);
    expect(events.push(char("j"))).toEqual([]);
    time.set(60);
    expect(events.poll()).toEqual([]);
    time.set(70);
    expect(events.poll()).toEqual([{ type: "navigate", step: { dx: 0, dy: 2 } }]);
    expect(events.poll()).toEqual([]);
  });

  it("flushes pending navigation ahead of another key", () => {
    const { events, time } = batcher();

    events.push(key("down"));
    time.set(10);

    expect(events.push(key("enter"))).toEqual([
      { type: "navigate", step: { dx: 0, dy: 1 } },
      { type: "key", event: { key: "enter" } },
    ]);
  });

  it("passes letters through while they do not navigate", () => {
    const { events } = batcher(false);
    expect(events.push(char("j"))).toEqual([{ type: "key", event: { key: "char", char: "j" } }]);
  });

  it("drops a repeat inside the debounce window", () => {
    const { events, time } = batcher();

    expect(events.push(char("x"))).toEqual([{ type: "key", event: { key: "char", char: "x" } }]);
    time.set(3);
    expect(events.push(char("x"))).toEqual([]);
  });

  it("emits nothing for a net-zero batch", () => {
    const { events, time } = batcher();
    events.push(key("up"));
    time.set(10);
    events.push(key("down"));
    time.set(100);

    expect(events.poll()).toEqual([]);
  });
});
