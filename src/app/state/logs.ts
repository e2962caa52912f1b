import { LIMITS } from "@/constants";
import type { DeviceLogLevel } from "@/types/device";
import type { LogEntry } from "./types";

export type LogFilterLevel = DeviceLogLevel | null;

const FILTER_CYCLE: LogFilterLevel[] = [null, "ERROR", "WARN", "INFO", "DEBUG"];

export function formatLogTime(date: Date): string {
  const pad = (n: number) => String(n).padStart(2, "0");
  return `${pad(date.getHours())}:${pad(date.getMinutes())}:${pad(date.getSeconds())}`;
}

/**
 * Device log ring buffer with a scroll position. `scrollOffset` indexes the
 * filtered view and follows the newest entry while auto-scroll is on and the
 * user has not scrolled.
 */
export class LogBuffer {
  private entries: LogEntry[] = [];
  scrollOffset = 0;
  autoScroll = true;
  manuallyScrolled = false;
  filterLevel: LogFilterLevel = null;
  fullscreen = false;

  constructor(private readonly capacity: number = LIMITS.maxLogEntries) {}

  get all(): readonly LogEntry[] {
    return this.entries;
  }

  get size(): number {
    return this.entries.length;
  }

  add(level: DeviceLogLevel, message: string, timestamp: string = formatLogTime(new Date())): void {
    this.entries.push({ timestamp, level, message });

    if (this.entries.length > this.capacity) {
      const evicted = this.entries.shift();
      const wasVisible = this.filterLevel === null || evicted?.level === this.filterLevel;
      if (wasVisible && this.manuallyScrolled && this.scrollOffset > 0) {
        this.scrollOffset--;
      }
    }

    if (this.autoScroll && !this.manuallyScrolled) {
      this.scrollOffset = Math.max(0, this.visible().length - 1);
    }
  }

  visible(): LogEntry[] {
    const filter = this.filterLevel;
    if (filter === null) return this.entries;
    return this.entries.filter((entry) => entry.level === filter);
  }

  clear(): void {
    this.entries = [];
    this.scrollOffset = 0;
    this.manuallyScrolled = false;
  }

  scrollUp(lines = 1): void {
    this.scrollOffset = Math.max(0, this.scrollOffset - lines);
    this.manuallyScrolled = true;
  }

  scrollDown(lines = 1): void {
    const last = Math.max(0, this.visible().length - 1);
    this.scrollOffset = Math.min(last, this.scrollOffset + lines);
    this.manuallyScrolled = true;
  }

  scrollToTop(): void {
    this.scrollOffset = 0;
    this.manuallyScrolled = true;
  }

  scrollToBottom(): void {
    this.scrollOffset = Math.max(0, this.visible().length - 1);
    this.manuallyScrolled = false;
  }

  toggleAutoScroll(): void {
    this.autoScroll = !this.autoScroll;
    if (this.autoScroll) this.scrollToBottom();
  }

  /** None → ERROR → WARN → INFO → DEBUG → None. Resets the scroll. */
  cycleFilter(): LogFilterLevel {
    const index = FILTER_CYCLE.indexOf(this.filterLevel);
    this.filterLevel = FILTER_CYCLE[(index + 1) % FILTER_CYCLE.length] ?? null;
    this.manuallyScrolled = false;
    this.scrollOffset = this.autoScroll ? Math.max(0, this.visible().length - 1) : 0;
    return this.filterLevel;
  }

  toggleFullscreen(): void {
    this.fullscreen = !this.fullscreen;
  }
}
