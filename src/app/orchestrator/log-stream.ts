import type { StateStore } from "@/app/state/store";
import type { LogTarget } from "@/app/state/types";
import { formatUserError } from "@/types/errors";
import { managerFor, type Managers } from "@/types/operation";
import type { CommandExecutor } from "@/utils/exec";
import { Logger } from "@/utils/logger";

/**
 * Follows the log of one device at a time. Switching targets aborts the
 * previous tool process; the read loop also exits as soon as
 * `currentLogDevice` stops matching its target.
 */
export class LogStreamer {
  private controller: AbortController | null = null;
  private task: Promise<void> | null = null;

  constructor(
    private readonly store: StateStore,
    private readonly managers: Managers,
    private readonly executor: CommandExecutor
  ) {}

  follow(target: LogTarget | null): void {
    const changed = this.store.update((state) => state.setLogTarget(target));
    if (!changed) return;

    this.controller?.abort();
    this.controller = null;
    if (!target) return;

    const controller = new AbortController();
    this.controller = controller;
    this.task = this.stream(target, controller.signal).catch((error: unknown) => {
      if (controller.signal.aborted) return;
      Logger.warning(`[!] Log stream for ${target.identifier} ended: ${formatUserError(error)}`);
    });
  }

  private isLive(target: LogTarget, signal: AbortSignal): boolean {
    return !signal.aborted && this.store.read((state) => state.isCurrentLogTarget(target));
  }

  private async stream(target: LogTarget, signal: AbortSignal): Promise<void> {
    const command = await managerFor(this.managers, target.platform).getLogCommand(
      target.identifier
    );
    if (!command || !this.isLive(target, signal)) return;

    Logger.debug(`[~] Streaming ${command.program} ${command.args.join(" ")}`);

    for await (const line of this.executor.streamLines(command.program, command.args, signal)) {
      if (!this.isLive(target, signal)) break;

      const message = line.trim();
      if (!message) continue;

      const level = command.detectLevel(message);
      this.store.update((state) => state.logs.add(level, message));
    }
  }

  /** Stops streaming and waits for the read loop to finish. */
  async stop(): Promise<void> {
    this.follow(null);
    await this.task;
    this.task = null;
  }

  /** Resolves when the current read loop has exited. */
  async settled(): Promise<void> {
    await this.task;
  }
}
