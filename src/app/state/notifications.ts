import { DEFAULTS, LIMITS } from "@/constants";
import type { Notification, NotificationType } from "./types";

export interface NotifyOptions {
  persistent?: boolean;
  dismissAfterMs?: number;
  now?: number;
}

function isExpired(notification: Notification, now: number): boolean {
  return (
    notification.autoDismissAfterMs !== null &&
    now - notification.timestamp >= notification.autoDismissAfterMs
  );
}

/** Bounded FIFO; the oldest notification is dropped once full. */
export class NotificationQueue {
  private items: Notification[] = [];
  private nextId = 1;

  constructor(private readonly capacity: number = LIMITS.maxNotifications) {}

  get all(): readonly Notification[] {
    return this.items;
  }

  get size(): number {
    return this.items.length;
  }

  push(message: string, type: NotificationType, options: NotifyOptions = {}): Notification {
    const notification: Notification = {
      id: this.nextId++,
      message,
      type,
      timestamp: options.now ?? Date.now(),
      autoDismissAfterMs: options.persistent
        ? null
        : (options.dismissAfterMs ?? DEFAULTS.notificationDismissMs),
    };

    this.items.push(notification);
    while (this.items.length > this.capacity) {
      this.items.shift();
    }
    return notification;
  }

  hasExpired(now: number = Date.now()): boolean {
    return this.items.some((n) => isExpired(n, now));
  }

  /** Drops expired notifications; returns whether any were removed. */
  dismissExpired(now: number = Date.now()): boolean {
    const before = this.items.length;
    this.items = this.items.filter((n) => !isExpired(n, now));
    return this.items.length !== before;
  }

  dismiss(id: number): void {
    this.items = this.items.filter((n) => n.id !== id);
  }

  clear(): void {
    this.items = [];
  }
}
