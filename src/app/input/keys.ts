export type KeyName =
  | "up"
  | "down"
  | "left"
  | "right"
  | "enter"
  | "escape"
  | "tab"
  | "backtab"
  | "backspace"
  | "pageup"
  | "pagedown"
  | "home"
  | "end"
  | "char";

export interface KeyEvent {
  key: KeyName;
  /** The typed character when `key` is "char". */
  char?: string;
  ctrl?: boolean;
}

/** Shape of the second argument of a readline "keypress" event. */
export interface RawKeypress {
  name?: string;
  sequence?: string;
  ctrl?: boolean;
  shift?: boolean;
  meta?: boolean;
}

const NAMED_KEYS: Record<string, KeyName> = {
  up: "up",
  down: "down",
  left: "left",
  right: "right",
  return: "enter",
  enter: "enter",
  escape: "escape",
  backspace: "backspace",
  pageup: "pageup",
  pagedown: "pagedown",
  home: "home",
  end: "end",
};

export function decodeKeypress(str: string | undefined, key: RawKeypress | undefined): KeyEvent | null {
  const name = key?.name;

  if (name === "tab") return { key: key?.shift ? "backtab" : "tab" };
  if (name && name in NAMED_KEYS) {
    const mapped = NAMED_KEYS[name];
    if (mapped) return { key: mapped };
  }

  if (key?.ctrl && name && name.length === 1) {
    return { key: "char", char: name, ctrl: true };
  }

  const char = str ?? key?.sequence;
  if (char && char.length === 1 && char >= " " && char !== "\u007f") {
    return { key: "char", char };
  }
  return null;
}

export function isChar(event: KeyEvent, char: string): boolean {
  return event.key === "char" && !event.ctrl && event.char === char;
}

/** Identity used to detect repeated events. */
export function keySignature(event: KeyEvent): string {
  return `${event.ctrl ? "C-" : ""}${event.key}:${event.char ?? ""}`;
}
