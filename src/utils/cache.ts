import { REFRESH } from "@/constants";
import { Logger } from "@/utils/logger";

export type CacheState = "missing" | "fresh" | "stale" | "expired";

export interface CatalogCacheOptions {
  freshMs?: number;
  expiryMs?: number;
  now?: () => number;
}

/**
 * Single-value cache for expensive catalog queries. Values younger than
 * `freshMs` are served as is; older ones are served while a reload runs in
 * the background; past `expiryMs` a reload is awaited.
 */
export class CatalogCache<T> {
  private value: T | undefined;
  private loadedAt = 0;
  private inFlight: Promise<T> | null = null;
  private readonly freshMs: number;
  private readonly expiryMs: number;
  private readonly now: () => number;

  constructor(
    private readonly label: string,
    private readonly load: () => Promise<T>,
    options: CatalogCacheOptions = {}
  ) {
    this.freshMs = options.freshMs ?? REFRESH.catalogFreshMs;
    this.expiryMs = options.expiryMs ?? REFRESH.catalogExpiryMs;
    this.now = options.now ?? Date.now;
  }

  state(): CacheState {
    if (this.value === undefined) return "missing";
    const age = this.now() - this.loadedAt;
    if (age < this.freshMs) return "fresh";
    if (age < this.expiryMs) return "stale";
    return "expired";
  }

  /** The cached value unless it has expired. */
  peek(): T | undefined {
    const state = this.state();
    return state === "fresh" || state === "stale" ? this.value : undefined;
  }

  reload(): Promise<T> {
    if (this.inFlight) return this.inFlight;

    this.inFlight = this.load()
      .then((value) => {
        this.value = value;
        this.loadedAt = this.now();
        return value;
      })
      .finally(() => {
        this.inFlight = null;
      });

    return this.inFlight;
  }

  async get(): Promise<T> {
    const state = this.state();
    const cached = this.value;

    if (state === "fresh" && cached !== undefined) return cached;
    if (state === "stale" && cached !== undefined) {
      this.reload().catch((error: unknown) => {
        Logger.debug(
          `[~] Background reload of ${this.label} failed: ${error instanceof Error ? error.message : String(error)}`
        );
      });
      return cached;
    }
    return this.reload();
  }

  /** Loads when nothing usable is cached. Used by the refresh loop. */
  async warm(): Promise<void> {
    const state = this.state();
    if (state === "missing" || state === "expired") {
      await this.reload();
    }
  }

  invalidate(): void {
    this.value = undefined;
    this.loadedAt = 0;
  }
}
