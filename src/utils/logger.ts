import { appendFileSync } from "fs";
import colors from "picocolors";

export type LogLevel = "debug" | "info" | "warn" | "error" | "silent";

type Palette = ReturnType<typeof colors.createColors>;
type Colorize = (text: string) => string;

interface LogOptions {
  spaceBefore?: boolean;
  spaceAfter?: boolean;
  indent?: number;
  prefix?: string;
}

const LEVEL_RANK: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
  silent: 100,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && value in LEVEL_RANK;
}

export class Logger {
  private static level: LogLevel = "info";
  private static logFile: string | null = null;
  private static palette: Palette = colors;

  /**
   * Sets the level threshold and, optionally, a file that receives all
   * output instead of the console. Used while the full-screen UI owns the
   * terminal.
   */
  static configure(options: { level?: LogLevel; file?: string | null }): void {
    if (options.level) this.level = options.level;
    if (options.file !== undefined) {
      this.logFile = options.file;
      this.palette = options.file ? colors.createColors(false) : colors;
    }
  }

  static getLevel(): LogLevel {
    return this.level;
  }

  static isEnabled(level: LogLevel): boolean {
    return LEVEL_RANK[level] >= LEVEL_RANK[this.level];
  }

  private static getIndent(level: number): string {
    return "   ".repeat(level);
  }

  private static write(line: string): void {
    if (!this.logFile) {
      console.log(line);
      return;
    }

    try {
      appendFileSync(this.logFile, `${new Date().toISOString()} ${line}\n`, "utf-8");
    } catch (error) {
      process.stderr.write(
        `Failed to write log file ${this.logFile}: ${error instanceof Error ? error.message : String(error)}\n`
      );
      this.configure({ file: null });
      console.log(line);
    }
  }

  private static log(
    level: LogLevel,
    message: string,
    pick: (palette: Palette) => Colorize,
    options: LogOptions = {}
  ): void {
    if (!this.isEnabled(level)) return;

    const {
      spaceBefore = false,
      spaceAfter = false,
      indent = 0,
      prefix = "",
    } = options;
    const blankLines = !this.logFile;

    if (spaceBefore && blankLines) this.write("");

    const indentStr = this.getIndent(indent);
    const prefixStr = prefix ? `${prefix} ` : "";

    this.write(`${indentStr}${prefixStr}${pick(this.palette)(message)}`);

    if (spaceAfter && blankLines) this.write("");
  }

  static success(message: string, options?: LogOptions): void {
    this.log("info", message, (p) => p.green, options);
  }

  static error(message: string, options?: LogOptions): void {
    this.log("error", message, (p) => p.red, options);
  }

  static warning(message: string, options?: LogOptions): void {
    this.log("warn", message, (p) => p.yellow, options);
  }

  static info(message: string, options?: LogOptions): void {
    this.log("info", message, (p) => p.cyan, options);
  }

  static muted(message: string, options?: LogOptions): void {
    this.log("info", message, (p) => p.gray, options);
  }

  static debug(message: string, options?: LogOptions): void {
    this.log("debug", message, (p) => p.dim, options);
  }

  static title(
    message: string,
    options?: Omit<LogOptions, "spaceBefore" | "spaceAfter">
  ): void {
    this.log("info", message, (p) => (text) => p.cyan(p.bold(text)), {
      spaceBefore: true,
      spaceAfter: true,
      ...options,
    });
  }

  static subtitle(message: string, options?: LogOptions): void {
    this.log("info", message, (p) => p.cyan, options);
  }

  static space(): void {
    if (this.isEnabled("info") && !this.logFile) this.write("");
  }

  static divider(): void {
    if (!this.isEnabled("info") || this.logFile) return;
    this.write("");
    this.write(this.palette.gray("─".repeat(50)));
    this.write("");
  }
}
