import type { AppState } from "./index";

export type StateListener = () => void;

function isPromiseLike(value: unknown): value is PromiseLike<unknown> {
  return (
    typeof value === "object" &&
    value !== null &&
    "then" in value &&
    typeof value.then === "function"
  );
}

/**
 * Owns the AppState. Every access is a synchronous callback, so each call is
 * a critical section on the single event loop. Callbacks that return a
 * promise are rejected, so no update spans an await.
 */
export class StateStore {
  private listeners = new Set<StateListener>();
  private updating = false;

  constructor(private readonly state: AppState) {}

  read<T>(fn: (state: Readonly<AppState>) => T): T {
    const result = fn(this.state);
    if (isPromiseLike(result)) {
      throw new Error("StateStore.read callbacks must be synchronous");
    }
    return result;
  }

  update<T>(fn: (state: AppState) => T): T {
    if (this.updating) {
      throw new Error("StateStore.update is not reentrant");
    }

    this.updating = true;
    let result: T;
    try {
      result = fn(this.state);
      if (isPromiseLike(result)) {
        throw new Error("StateStore.update callbacks must be synchronous");
      }
    } finally {
      this.updating = false;
    }

    this.notify();
    return result;
  }

  subscribe(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private notify(): void {
    for (const listener of this.listeners) {
      listener();
    }
  }
}
