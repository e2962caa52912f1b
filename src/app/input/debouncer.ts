import { INPUT } from "@/constants";
import { keySignature, type KeyEvent } from "./keys";

/** Drops an event identical to the previous one inside the window. */
export class EventDebouncer {
  private last: { signature: string; at: number } | null = null;

  constructor(
    private readonly windowMs: number = INPUT.debounceMs,
    private readonly now: () => number = Date.now
  ) {}

  accept(event: KeyEvent): boolean {
    const signature = keySignature(event);
    const at = this.now();

    if (this.last && this.last.signature === signature && at - this.last.at < this.windowMs) {
      return false;
    }

    this.last = { signature, at };
    return true;
  }

  reset(): void {
    this.last = null;
  }
}
