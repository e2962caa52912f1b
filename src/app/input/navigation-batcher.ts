import { INPUT } from "@/constants";
import type { KeyEvent } from "./keys";

export interface NavigationStep {
  dx: number;
  dy: number;
}

const ARROWS: Partial<Record<KeyEvent["key"], NavigationStep>> = {
  up: { dx: 0, dy: -1 },
  down: { dx: 0, dy: 1 },
  left: { dx: -1, dy: 0 },
  right: { dx: 1, dy: 0 },
};

const VIM_KEYS: Record<string, NavigationStep> = {
  k: { dx: 0, dy: -1 },
  j: { dx: 0, dy: 1 },
  h: { dx: -1, dy: 0 },
  l: { dx: 1, dy: 0 },
};

export function navigationStep(event: KeyEvent, allowLetters = true): NavigationStep | null {
  if (event.key === "char") {
    if (!allowLetters || event.ctrl || !event.char) return null;
    return VIM_KEYS[event.char] ?? null;
  }
  return ARROWS[event.key] ?? null;
}

/**
 * Sums navigation keys into one step. A batch is ready once no key arrived
 * for `windowMs`, or `2 * windowMs` after it opened while keys keep coming.
 */
export class NavigationBatcher {
  private dx = 0;
  private dy = 0;
  private openedAt: number | null = null;
  private lastAt = 0;

  constructor(
    private readonly windowMs: number = INPUT.navigationBatchMs,
    private readonly now: () => number = Date.now
  ) {}

  add(step: NavigationStep): void {
    const at = this.now();
    if (this.openedAt === null) this.openedAt = at;
    this.lastAt = at;
    this.dx += step.dx;
    this.dy += step.dy;
  }

  get isPending(): boolean {
    return this.openedAt !== null;
  }

  isReady(): boolean {
    if (this.openedAt === null) return false;
    const at = this.now();
    return at - this.lastAt >= this.windowMs || at - this.openedAt >= this.windowMs * 2;
  }

  /** Closes the batch. A zero net delta yields null. */
  flush(): NavigationStep | null {
    const step = { dx: this.dx, dy: this.dy };
    this.dx = 0;
    this.dy = 0;
    this.openedAt = null;
    return step.dx === 0 && step.dy === 0 ? null : step;
  }
}
