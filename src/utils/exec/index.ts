import { execFile, spawn } from "child_process";
import { createInterface } from "readline";
import { promisify } from "util";
import { TIMEOUTS } from "@/constants";
import { EmuError } from "@/types/errors";
import { Logger } from "@/utils/logger";

const execFileAsync = promisify(execFile);

export interface CommandOutput {
  stdout: string;
  stderr: string;
  exitCode: number;
}

export interface RunOptions {
  timeoutMs?: number;
  /** Written to stdin, which is then closed. */
  input?: string;
  env?: NodeJS.ProcessEnv;
  signal?: AbortSignal;
}

export interface DetachedProcess {
  pid: number | undefined;
}

/**
 * Boundary to external programs. A non-zero exit is returned as data;
 * only launch failures, timeouts and aborts reject.
 */
export interface CommandExecutor {
  run(program: string, args: string[], options?: RunOptions): Promise<CommandOutput>;
  spawnDetached(program: string, args: string[]): Promise<DetachedProcess>;
  streamLines(program: string, args: string[], signal: AbortSignal): AsyncIterable<string>;
}

interface ExecFailure {
  code?: string | number;
  killed: boolean;
  stdout: string;
  stderr: string;
}

function readExecFailure(error: unknown): ExecFailure {
  const failure: ExecFailure = { killed: false, stdout: "", stderr: "" };
  if (typeof error !== "object" || error === null) return failure;

  if ("code" in error && (typeof error.code === "string" || typeof error.code === "number")) {
    failure.code = error.code;
  }
  if ("killed" in error && error.killed === true) failure.killed = true;
  if ("stdout" in error && typeof error.stdout === "string") failure.stdout = error.stdout;
  if ("stderr" in error && typeof error.stderr === "string") failure.stderr = error.stderr;

  return failure;
}

function errorCode(error: unknown): string | undefined {
  if (typeof error === "object" && error !== null && "code" in error && typeof error.code === "string") {
    return error.code;
  }
  return undefined;
}

export function launchError(error: unknown, command: string): EmuError {
  const code = errorCode(error);
  const reason = error instanceof Error ? error.message : String(error);

  if (code === "ENOENT") {
    return new EmuError("SdkUnavailable", `Command not found: ${command.split(" ")[0]}`, { command }, { cause: error });
  }
  if (code === "EACCES" || code === "EPERM") {
    return new EmuError("PermissionDenied", `Permission denied running ${command.split(" ")[0]}`, { command }, { cause: error });
  }
  return new EmuError("CommandExecutionFailure", `Failed to run ${command}: ${reason}`, { command }, { cause: error });
}

export class NodeCommandExecutor implements CommandExecutor {
  constructor(private readonly defaultTimeoutMs: number = TIMEOUTS.command) {}

  async run(program: string, args: string[], options: RunOptions = {}): Promise<CommandOutput> {
    const command = [program, ...args].join(" ");
    const timeout = options.timeoutMs ?? this.defaultTimeoutMs;

    try {
      const promise = execFileAsync(program, args, {
        encoding: "utf8",
        timeout,
        maxBuffer: 32 * 1024 * 1024,
        env: options.env ? { ...process.env, ...options.env } : process.env,
        signal: options.signal,
      });
      // Interactive tools would otherwise wait on an open stdin until the timeout.
      const stdin = promise.child.stdin;
      if (stdin) {
        // A tool may exit before reading its input; the exit status decides.
        stdin.on("error", (error) => {
          Logger.debug(`[~] ${command}: stdin closed early (${error.message})`);
        });
        stdin.end(options.input ?? "");
      }

      const { stdout, stderr } = await promise;
      return { stdout, stderr, exitCode: 0 };
    } catch (error) {
      const failure = readExecFailure(error);

      if (typeof failure.code === "number") {
        return { stdout: failure.stdout, stderr: failure.stderr, exitCode: failure.code };
      }
      if (failure.killed && !options.signal?.aborted) {
        throw new EmuError(
          "Timeout",
          `${command} did not finish within ${Math.round(timeout / 1000)}s`,
          { command, stderr: failure.stderr },
          { cause: error }
        );
      }
      throw launchError(error, command);
    }
  }

  spawnDetached(program: string, args: string[]): Promise<DetachedProcess> {
    const command = [program, ...args].join(" ");

    return new Promise((resolve, reject) => {
      const child = spawn(program, args, { detached: true, stdio: "ignore" });

      child.once("error", (error) => reject(launchError(error, command)));
      child.once("spawn", () => {
        child.unref();
        resolve({ pid: child.pid });
      });
    });
  }

  async *streamLines(program: string, args: string[], signal: AbortSignal): AsyncIterable<string> {
    const command = [program, ...args].join(" ");
    const child = spawn(program, args, {
      stdio: ["ignore", "pipe", "ignore"],
      signal,
    });
    const lines = createInterface({ input: child.stdout, crlfDelay: Infinity });

    let launchFailure: unknown;
    child.on("error", (error) => {
      if (!signal.aborted) launchFailure = error;
      lines.close();
    });

    try {
      for await (const line of lines) {
        if (signal.aborted) break;
        yield line;
      }
    } finally {
      lines.close();
      if (child.exitCode === null && !child.killed) child.kill();
    }

    if (launchFailure !== undefined) {
      throw launchError(launchFailure, command);
    }
  }
}
