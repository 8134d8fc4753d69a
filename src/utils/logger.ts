/**
 * Logger Utility
 *
 * Levelled diagnostics for the CLI. Everything goes to stderr by default,
 * because stdout carries converted documents.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/** Where log lines are written. `process.stderr` satisfies this. */
export interface LogSink {
  write(chunk: string): unknown;
  readonly isTTY?: boolean | undefined;
}

export interface LoggerOptions {
  readonly level?: LogLevel | undefined;
  readonly context?: string | undefined;
  readonly silent?: boolean | undefined;
  readonly colors?: boolean | undefined;
  readonly sink?: LogSink | undefined;
}

// ANSI color codes
const colors = {
  reset: "\x1b[0m",
  dim: "\x1b[2m",
  red: "\x1b[31m",
  yellow: "\x1b[33m",
  blue: "\x1b[34m",
  gray: "\x1b[90m",
} as const;

const levelColors: Record<LogLevel, string> = {
  debug: colors.gray,
  info: colors.blue,
  warn: colors.yellow,
  error: colors.red,
};

const levelPriority: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/** `debug` when the `DEBUG` environment variable is set, `info` otherwise. */
export const defaultLogLevel = (
  env: Readonly<Record<string, string | undefined>> = process.env,
): LogLevel => (env["DEBUG"] ? "debug" : "info");

export class Logger {
  private readonly level: LogLevel;
  private readonly context: string;
  private readonly silent: boolean;
  private readonly useColors: boolean;
  private readonly sink: LogSink;

  constructor(options: LoggerOptions = {}) {
    this.sink = options.sink ?? process.stderr;
    this.level = options.level ?? defaultLogLevel();
    this.context = options.context ?? "";
    this.silent = options.silent ?? false;
    this.useColors = options.colors ?? this.sink.isTTY === true;
  }

  private format(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): string {
    const tag = this.useColors
      ? `${levelColors[level]}[${level}]${colors.reset}`
      : `[${level}]`;
    const ctx = this.context === ""
      ? ""
      : this.useColors
        ? ` ${colors.dim}(${this.context})${colors.reset}`
        : ` (${this.context})`;
    const details = data === undefined ? "" : ` ${JSON.stringify(data)}`;
    return `${tag}${ctx} ${message}${details}\n`;
  }

  private shouldLog(level: LogLevel): boolean {
    return !this.silent && levelPriority[level] >= levelPriority[this.level];
  }

  private emit(
    level: LogLevel,
    message: string,
    data?: Record<string, unknown>,
  ): void {
    if (this.shouldLog(level)) {
      this.sink.write(this.format(level, message, data));
    }
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.emit("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.emit("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.emit("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.emit("error", message, data);
  }

  /**
   * Create a child logger with additional context
   */
  child(context: string): Logger {
    return new Logger({
      level: this.level,
      context: this.context ? `${this.context}:${context}` : context,
      silent: this.silent,
      colors: this.useColors,
      sink: this.sink,
    });
  }
}

export const createLogger = (
  context: string,
  options: Omit<LoggerOptions, "context"> = {},
): Logger => new Logger({ ...options, context });
