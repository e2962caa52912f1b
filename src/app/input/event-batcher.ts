import { EventDebouncer } from "./debouncer";
import type { KeyEvent } from "./keys";
import { NavigationBatcher, navigationStep, type NavigationStep } from "./navigation-batcher";

export type InputAction =
  | { type: "key"; event: KeyEvent }
  | { type: "navigate"; step: NavigationStep };

export interface EventBatcherOptions {
  debouncer?: EventDebouncer;
  navigation?: NavigationBatcher;
  /** Whether h/j/k/l count as navigation right now. */
  lettersNavigate?: () => boolean;
}

/**
 * Debounces every event and batches navigation. Any other key first flushes
 * pending navigation so actions apply to the selection the user sees.
 */
export class EventBatcher {
  private readonly debouncer: EventDebouncer;
  private readonly navigation: NavigationBatcher;
  private readonly lettersNavigate: () => boolean;

  constructor(options: EventBatcherOptions = {}) {
    this.debouncer = options.debouncer ?? new EventDebouncer();
    this.navigation = options.navigation ?? new NavigationBatcher();
    this.lettersNavigate = options.lettersNavigate ?? (() => true);
  }

  push(event: KeyEvent): InputAction[] {
    if (!this.debouncer.accept(event)) return [];

    const step = navigationStep(event, this.lettersNavigate());
    if (step) {
      this.navigation.add(step);
      return [];
    }

    return [...this.flush(), { type: "key", event }];
  }

  /** Emits pending navigation once its window has closed. */
  poll(): InputAction[] {
    return this.navigation.isReady() ? this.flush() : [];
  }

  flush(): InputAction[] {
    if (!this.navigation.isPending) return [];
    const step = this.navigation.flush();
    return step ? [{ type: "navigate", step }] : [];
  }
}
