/**
 * Structured JSON logger.
 * One JSON object per line: { ts, level, msg, ...bindings, ...context }.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

export type LogContext = { [key: string]: unknown };

export interface Logger {
  debug(msg: string, context?: LogContext): void;
  info(msg: string, context?: LogContext): void;
  warn(msg: string, context?: LogContext): void;
  error(msg: string, context?: LogContext): void;
  /** Logger that adds the given bindings to every entry */
  child(bindings: LogContext): Logger;
}

export const LOG_LEVELS: readonly LogLevel[] = ["debug", "info", "warn", "error"];

const LEVEL_RANK: { [level in LogLevel]: number } = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

export function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((level) => level === value);
}

export interface LoggerOptions {
  level?: LogLevel;
  bindings?: LogContext;
  /** Sink for serialized lines; defaults to process.stdout */
  write?: (line: string) => void;
  /** Timestamp source; defaults to the current ISO time */
  timestamp?: () => string;
}

class JsonLogger implements Logger {
  constructor(
    private readonly minRank: number,
    private readonly bindings: LogContext,
    private readonly write: (line: string) => void,
    private readonly timestamp: () => string
  ) {}

  debug(msg: string, context?: LogContext): void {
    this.emit("debug", msg, context);
  }

  info(msg: string, context?: LogContext): void {
    this.emit("info", msg, context);
  }

  warn(msg: string, context?: LogContext): void {
    this.emit("warn", msg, context);
  }

  error(msg: string, context?: LogContext): void {
    this.emit("error", msg, context);
  }

  child(bindings: LogContext): Logger {
    return new JsonLogger(
      this.minRank,
      { ...this.bindings, ...bindings },
      this.write,
      this.timestamp
    );
  }

  private emit(level: LogLevel, msg: string, context?: LogContext): void {
    if (LEVEL_RANK[level] < this.minRank) {
      return;
    }
    const entry = { ts: this.timestamp(), level, msg, ...this.bindings, ...context };
    this.write(`${JSON.stringify(entry, replaceErrors)}\n`);
  }
}

function replaceErrors(_key: string, value: unknown): unknown {
  if (value instanceof Error) {
    return { name: value.name, message: value.message };
  }
  return value;
}

/**
 * Create a JSON-lines logger.
 */
export function createLogger(options: LoggerOptions = {}): Logger {
  const write = options.write ?? ((line: string) => process.stdout.write(line));
  return new JsonLogger(
    LEVEL_RANK[options.level ?? "info"],
    options.bindings ?? {},
    write,
    options.timestamp ?? (() => new Date().toISOString())
  );
}

/**
 * Logger that drops everything.
 */
export const silentLogger: Logger = {
  debug: () => undefined,
  info: () => undefined,
  warn: () => undefined,
  error: () => undefined,
  child: () => silentLogger,
};
