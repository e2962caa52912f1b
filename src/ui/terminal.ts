import { emitKeypressEvents } from "readline";
import { decodeKeypress, type KeyEvent, type RawKeypress } from "@/app/input/keys";

/** Raw-mode stdin; decoded keys queue up until drained. */
export class TerminalInput {
  private queue: KeyEvent[] = [];

  private readonly onKeypress = (str: string | undefined, key: RawKeypress | undefined) => {
    const event = decodeKeypress(str, key);
    if (event) this.queue.push(event);
  };

  constructor(private readonly input: NodeJS.ReadStream = process.stdin) {}

  start(): void {
    emitKeypressEvents(this.input);
    if (this.input.isTTY) this.input.setRawMode(true);
    this.input.on("keypress", this.onKeypress);
    this.input.resume();
  }

  stop(): void {
    this.input.off("keypress", this.onKeypress);
    if (this.input.isTTY) this.input.setRawMode(false);
    this.input.pause();
  }

  drain(): KeyEvent[] {
    const events = this.queue;
    this.queue = [];
    return events;
  }
}
