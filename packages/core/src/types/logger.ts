// Logger interface for structured logging

export interface Logger {
  debug(message: string, data?: Record<string, unknown>): void;
  info(message: string, data?: Record<string, unknown>): void;
  warn(message: string, data?: Record<string, unknown>): void;
  error(message: string, data?: Record<string, unknown>): void;
  /** Create a child logger with additional context fields. */
  child(context: Record<string, unknown>): Logger;
}

export const LOG_LEVELS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
  silent: 4,
};

type EntryLevel = Exclude<LogLevel, "silent">;

/** Receives one serialized entry per log call. */
export type LogWriter = (level: EntryLevel, line: string) => void;

const consoleWriter: LogWriter = (level, line) => {
  if (level === "error") {
    console.error(line);
  } else if (level === "warn") {
    console.warn(line);
  } else {
    console.log(line);
  }
};

/**
 * Console logger that writes one JSON object per line.
 * Warnings and errors go to stderr.
 */
export class ConsoleLogger implements Logger {
  private readonly context: Record<string, unknown>;
  private readonly minLevel: number;

  constructor(
    private readonly level: LogLevel = "info",
    context: Record<string, unknown> = {},
    private readonly writer: LogWriter = consoleWriter,
  ) {
    this.context = context;
    this.minLevel = LEVEL_ORDER[level];
  }

  debug(message: string, data?: Record<string, unknown>): void {
    this.log("debug", message, data);
  }

  info(message: string, data?: Record<string, unknown>): void {
    this.log("info", message, data);
  }

  warn(message: string, data?: Record<string, unknown>): void {
    this.log("warn", message, data);
  }

  error(message: string, data?: Record<string, unknown>): void {
    this.log("error", message, data);
  }

  child(context: Record<string, unknown>): Logger {
    return new ConsoleLogger(this.level, { ...this.context, ...context }, this.writer);
  }

  private log(level: EntryLevel, message: string, data?: Record<string, unknown>): void {
    if (LEVEL_ORDER[level] < this.minLevel) return;

    const entry = {
      level,
      message,
      timestamp: new Date().toISOString(),
      ...this.context,
      ...data,
    };

    this.writer(level, JSON.stringify(entry));
  }
}
