export type EmuErrorKind =
  | "SdkUnavailable"
  | "CommandExecutionFailure"
  | "ParseFailure"
  | "DeviceNotFound"
  | "CreationFailure"
  | "Timeout"
  | "PermissionDenied"
  | "ConcurrentOperationConflict";

export interface EmuErrorDetails {
  command?: string;
  stderr?: string;
  exitCode?: number;
  identifier?: string;
}

export class EmuError extends Error {
  readonly kind: EmuErrorKind;
  readonly details: EmuErrorDetails;

  constructor(
    kind: EmuErrorKind,
    message: string,
    details: EmuErrorDetails = {},
    options?: { cause?: unknown }
  ) {
    super(message, options);
    this.name = "EmuError";
    this.kind = kind;
    this.details = details;
  }
}

export function isEmuError(error: unknown, kind?: EmuErrorKind): error is EmuError {
  return error instanceof EmuError && (kind === undefined || error.kind === kind);
}

const MAX_USER_MESSAGE_LENGTH = 150;

interface FailurePattern {
  test: (text: string) => boolean;
  kind: EmuErrorKind;
  message?: string;
}

const FAILURE_PATTERNS: FailurePattern[] = [
  {
    test: (t) => t.includes("license"),
    kind: "CreationFailure",
    message: "Android SDK licenses not accepted. Run 'sdkmanager --licenses'",
  },
  {
    test: (t) =>
      t.includes("system image") ||
      t.includes("not installed") ||
      t.includes("package path is not valid"),
    kind: "CreationFailure",
  },
  { test: (t) => t.includes("already exists"), kind: "CreationFailure" },
  {
    test: (t) =>
      t.includes("not found") ||
      t.includes("does not exist") ||
      t.includes("invalid device"),
    kind: "DeviceNotFound",
  },
  {
    test: (t) => t.includes("permission denied") || t.includes("eacces"),
    kind: "PermissionDenied",
  },
  {
    test: (t) => t.includes("timed out") || t.includes("timeout"),
    kind: "Timeout",
  },
];

function firstMeaningfulLine(stderr: string): string {
  const lines = stderr
    .split("\n")
    .map((line) => line.trim())
    .filter(Boolean);
  return lines.find((line) => /error/i.test(line)) ?? lines[0] ?? "";
}

/**
 * Maps a tool's stderr onto the error taxonomy. The first matching pattern
 * wins; unmatched output falls back to `fallbackKind`.
 */
export function classifyToolFailure(
  stderr: string,
  fallbackKind: EmuErrorKind,
  details: EmuErrorDetails = {}
): EmuError {
  const lower = stderr.toLowerCase();
  const pattern = FAILURE_PATTERNS.find((p) => p.test(lower));
  const kind = pattern?.kind ?? fallbackKind;
  const line = firstMeaningfulLine(stderr).replace(/^error:\s*/i, "");
  const message =
    pattern?.message ?? (line || `Command failed (${details.command ?? "unknown"})`);

  return new EmuError(kind, message, { ...details, stderr });
}

export function formatUserError(error: unknown): string {
  let message: string;

  if (isEmuError(error)) {
    switch (error.kind) {
      case "SdkUnavailable":
        message = `SDK unavailable: ${error.message}`;
        break;
      case "Timeout":
        message = `Timed out: ${error.message}`;
        break;
      case "ConcurrentOperationConflict":
        message = `Busy: ${error.message}`;
        break;
      default:
        message = error.message;
    }
  } else if (error instanceof Error) {
    message = error.message;
  } else {
    message = String(error);
  }

  message = message.replace(/\s+/g, " ").trim() || "Unknown error";

  if (message.length > MAX_USER_MESSAGE_LENGTH) {
    return `${message.slice(0, MAX_USER_MESSAGE_LENGTH - 3)}...`;
  }
  return message;
}
