// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

export type LogLevel = "debug" | "info" | "warn" | "error";

export const LOG_LEVEL_NAMES = ["debug", "info", "warn", "error"] as const satisfies readonly LogLevel[];

export interface LogEntry {
  level: LogLevel;
  message: string;
  timestamp: string;
  [key: string]: unknown;
}

export interface LoggerOptions {
  level: LogLevel;
  json: boolean;
  /** Where formatted lines go; defaults to stderr so stdout stays clean for reports */
  sink?: (line: string) => void;
  /** Clock used for timestamps */
  now?: () => Date;
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
  child(defaultMeta: Record<string, unknown>): Logger;
}

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

// ---------------------------------------------------------------------------
// Logger Implementation
// ---------------------------------------------------------------------------

/**
 * Create a structured logger.
 * Every level goes to the sink (stderr by default); stdout is reserved
 * for the run report and JSON documents.
 */
export function createLogger(options: LoggerOptions): Logger {
  const minLevel = LOG_LEVELS[options.level];
  const sink = options.sink ?? ((line: string) => console.error(line));
  const now = options.now ?? (() => new Date());

  function formatMessage(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown>
  ): string {
    const timestamp = now().toISOString();

    if (options.json) {
      const entry: LogEntry = {
        timestamp,
        level,
        message,
        ...meta,
      };
      return JSON.stringify(entry);
    }

    const prefix = `[${timestamp}] ${level.toUpperCase().padEnd(5)}`;
    const metaStr =
      Object.keys(meta).length > 0 ? ` ${JSON.stringify(meta)}` : "";
    return `${prefix} ${message}${metaStr}`;
  }

  function log(
    level: LogLevel,
    message: string,
    meta: Record<string, unknown> = {},
    defaultMeta: Record<string, unknown> = {}
  ): void {
    if (LOG_LEVELS[level] < minLevel) return;
    sink(formatMessage(level, message, { ...defaultMeta, ...meta }));
  }

  function createLoggerInstance(
    defaultMeta: Record<string, unknown> = {}
  ): Logger {
    return {
      debug: (msg, meta) => log("debug", msg, meta, defaultMeta),
      info: (msg, meta) => log("info", msg, meta, defaultMeta),
      warn: (msg, meta) => log("warn", msg, meta, defaultMeta),
      error: (msg, meta) => log("error", msg, meta, defaultMeta),
      child: (childMeta) =>
        createLoggerInstance({ ...defaultMeta, ...childMeta }),
    };
  }

  return createLoggerInstance();
}

/**
 * Create a no-op logger that discards all messages.
 */
export function createNoopLogger(): Logger {
  const noop = () => {};
  const logger: Logger = {
    debug: noop,
    info: noop,
    warn: noop,
    error: noop,
    child: () => logger,
  };
  return logger;
}
