import path from "path";
import type {
  CommandExecutor,
  CommandOutput,
  DetachedProcess,
  RunOptions,
} from "@/utils/exec";

export type MockResponse = Partial<CommandOutput> | Error;

export interface RecordedCall {
  kind: "run" | "detached" | "stream";
  program: string;
  args: string[];
  options?: RunOptions;
}

function callKey(program: string, args: string[]): string {
  return [path.basename(program), ...args].join(" ");
}

/**
 * In-memory executor. Calls are matched by program basename plus exact
 * arguments. Queued responses are consumed in order and the last one
 * repeats. Unmatched calls exit 1.
 */
export class MockCommandExecutor implements CommandExecutor {
  readonly calls: RecordedCall[] = [];
  private readonly responses = new Map<string, MockResponse[]>();
  private readonly streams = new Map<string, string[]>();
  private readonly detachedFailures = new Map<string, Error>();

  respond(program: string, args: string[], ...responses: MockResponse[]): this {
    this.responses.set(callKey(program, args), responses);
    return this;
  }

  respondStream(program: string, args: string[], lines: string[]): this {
    this.streams.set(callKey(program, args), lines);
    return this;
  }

  failDetached(program: string, error: Error): this {
    this.detachedFailures.set(path.basename(program), error);
    return this;
  }

  callsTo(program: string): RecordedCall[] {
    const name = path.basename(program);
    return this.calls.filter((call) => path.basename(call.program) === name);
  }

  ran(program: string, args: string[]): boolean {
    const key = callKey(program, args);
    return this.calls.some((call) => callKey(call.program, call.args) === key);
  }

  async run(program: string, args: string[], options?: RunOptions): Promise<CommandOutput> {
    this.calls.push({ kind: "run", program, args, options });

    const queue = this.responses.get(callKey(program, args));
    const next = queue && queue.length > 1 ? queue.shift() : queue?.[0];

    if (next === undefined) {
      return { stdout: "", stderr: `mock: no response for ${callKey(program, args)}`, exitCode: 1 };
    }
    if (next instanceof Error) throw next;

    return {
      stdout: next.stdout ?? "",
      stderr: next.stderr ?? "",
      exitCode: next.exitCode ?? 0,
    };
  }

  async spawnDetached(program: string, args: string[]): Promise<DetachedProcess> {
    this.calls.push({ kind: "detached", program, args });

    const failure = this.detachedFailures.get(path.basename(program));
    if (failure) throw failure;

    return { pid: 4242 };
  }

  async *streamLines(program: string, args: string[], signal: AbortSignal): AsyncIterable<string> {
    this.calls.push({ kind: "stream", program, args });

    for (const line of this.streams.get(callKey(program, args)) ?? []) {
      if (signal.aborted) return;
      await Promise.resolve();
      yield line;
    }
  }
}
