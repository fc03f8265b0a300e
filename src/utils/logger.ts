/**
 * Structured logging infrastructure.
 * Leveled output with timestamps, scoped context and either a human-readable
 * line or one JSON object per line.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";
export type LogFormat = "pretty" | "json";

export interface LogContext {
  [key: string]: unknown;
}

const LEVELS: LogLevel[] = ["debug", "info", "warn", "error"];

export function isLogLevel(value: string): value is LogLevel {
  return LEVELS.some((level) => level === value);
}

class Logger {
  private minLevel: LogLevel;
  private format: LogFormat;
  private context: LogContext;
  // Children read level/format from the root so setLevel() reaches them.
  private root: Logger | null;

  constructor(minLevel: LogLevel = "info", baseContext: LogContext = {}, root: Logger | null = null) {
    this.minLevel = minLevel;
    this.format = "pretty";
    this.context = baseContext;
    this.root = root;
  }

  /**
   * Create a child logger with additional context.
   */
  child(additionalContext: LogContext): Logger {
    return new Logger(this.minLevel, { ...this.context, ...additionalContext }, this.root ?? this);
  }

  setLevel(level: LogLevel): void {
    (this.root ?? this).minLevel = level;
  }

  setFormat(format: LogFormat): void {
    (this.root ?? this).format = format;
  }

  private shouldLog(level: LogLevel): boolean {
    const min = (this.root ?? this).minLevel;
    return LEVELS.indexOf(level) >= LEVELS.indexOf(min);
  }

  private formatMessage(level: LogLevel, message: string, context: LogContext, error?: Error): string {
    const timestamp = new Date().toISOString();

    if ((this.root ?? this).format === "json") {
      return JSON.stringify({
        timestamp,
        level,
        message,
        ...context,
        ...(error ? { error: { name: error.name, message: error.message, stack: error.stack } } : {}),
      });
    }

    const levelUpper = level.toUpperCase().padEnd(5);
    const contextStr = Object.keys(context).length > 0 ? ` ${JSON.stringify(context)}` : "";
    const errorStr = error ? ` Error: ${error.message}${error.stack ? `\n${error.stack}` : ""}` : "";
    return `[${timestamp}] ${levelUpper} ${message}${contextStr}${errorStr}`;
  }

  private log(level: LogLevel, message: string, context?: LogContext, error?: Error): void {
    if (!this.shouldLog(level)) {
      return;
    }

    const formatted = this.formatMessage(level, message, { ...this.context, ...context }, error);

    switch (level) {
      case "debug":
        console.debug(formatted);
        break;
      case "info":
        console.info(formatted);
        break;
      case "warn":
        console.warn(formatted);
        break;
      case "error":
        console.error(formatted);
        break;
    }
  }

  debug(message: string, context?: LogContext): void {
    this.log("debug", message, context);
  }

  info(message: string, context?: LogContext): void {
    this.log("info", message, context);
  }

  warn(message: string, context?: LogContext): void {
    this.log("warn", message, context);
  }

  error(message: string, error?: unknown, context?: LogContext): void {
    this.log("error", message, context, toError(error));
  }
}

/**
 * Normalize a thrown value into an Error for logging.
 */
export function toError(value: unknown): Error | undefined {
  if (value === undefined) {
    return undefined;
  }
  if (value instanceof Error) {
    return value;
  }
  return new Error(typeof value === "string" ? value : describe(value));
}

function describe(value: unknown): string {
  try {
    // undefined for functions and symbols
    return JSON.stringify(value) ?? String(value);
  } catch {
    // BigInt and circular values
    return String(value);
  }
}

const envLevel = (process.env.LOG_LEVEL ?? "").toLowerCase();

// Default logger instance
export const logger = new Logger(
  isLogLevel(envLevel) ? envLevel : "info",
  { service: "ops-dashboard-realtime" }
);

export { Logger };
