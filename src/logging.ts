/**
 * Structured logging.
 *
 * Nothing in this package logs to a global: components that log take a
 * {@link Logger} in their options and default to {@link createNoopLogger}.
 *
 * @example
 * ```typescript
 * const logger = createConsoleLogger({ format: "pretty", minLevel: "info" });
 * parseContainer(bytes, decompressors, { logger });
 * ```
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

/**
 * JSON-compatible values allowed in log context.
 */
export type LogContextValue =
  | string
  | number
  | boolean
  | null
  | LogContextValue[]
  | { [key: string]: LogContextValue };

/**
 * Structured context attached to a log entry.
 */
export interface LogContext {
  /** Operation being performed */
  operation?: string;
  /** Byte offset the entry refers to */
  offset?: number;
  /** Number of bytes processed */
  bytesProcessed?: number;
  [key: string]: LogContextValue | undefined;
}

/**
 * A single log entry.
 */
export interface LogEntry {
  level: LogLevel;
  message: string;
  /** Unix timestamp in milliseconds */
  timestamp: number;
  context?: LogContext;
  error?: Error;
}

export interface Logger {
  debug(message: string, context?: LogContext): void;
  info(message: string, context?: LogContext): void;
  warn(message: string, context?: LogContext): void;
  error(message: string, error?: Error, context?: LogContext): void;
}

export interface LoggerConfig {
  /** Minimum level to emit (default: 'debug') */
  minLevel?: LogLevel;
  /** Receives every emitted entry */
  output?: (entry: LogEntry) => void;
}

export interface ConsoleLoggerConfig extends LoggerConfig {
  /** 'json' for one JSON object per line, 'pretty' for human-readable lines */
  format?: "json" | "pretty";
}

/**
 * A logger that keeps its entries for assertions.
 */
export interface TestLogger extends Logger {
  getLogs(): LogEntry[];
  getLogsByLevel(level: LogLevel): LogEntry[];
  clear(): void;
}

const LOG_LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

/**
 * Creates a logger that filters by level and hands entries to `output`.
 */
export function createLogger(config: LoggerConfig = {}): Logger {
  const minLevel = config.minLevel ?? "debug";
  const output = config.output ?? ((): void => {});

  const log = (level: LogLevel, message: string, context?: LogContext, error?: Error): void => {
    if (LOG_LEVEL_ORDER[level] < LOG_LEVEL_ORDER[minLevel]) {
      return;
    }

    const entry: LogEntry = { level, message, timestamp: Date.now() };
    if (context !== undefined) {
      entry.context = context;
    }
    if (error !== undefined) {
      entry.error = error;
    }
    output(entry);
  };

  return {
    debug(message: string, context?: LogContext): void {
      log("debug", message, context);
    },
    info(message: string, context?: LogContext): void {
      log("info", message, context);
    },
    warn(message: string, context?: LogContext): void {
      log("warn", message, context);
    },
    error(message: string, error?: Error, context?: LogContext): void {
      log("error", message, context, error);
    },
  };
}

/**
 * Formats an entry as a single line.
 */
export function formatLogEntry(entry: LogEntry, format: "json" | "pretty"): string {
  if (format === "json") {
    return JSON.stringify({
      level: entry.level,
      message: entry.message,
      timestamp: entry.timestamp,
      ...(entry.context && { context: entry.context }),
      ...(entry.error && {
        error: { name: entry.error.name, message: entry.error.message },
      }),
    });
  }

  const time = new Date(entry.timestamp).toISOString();
  let line = `[${time}] ${entry.level.toUpperCase().padEnd(5)} ${entry.message}`;
  if (entry.context) {
    line += ` ${JSON.stringify(entry.context)}`;
  }
  if (entry.error) {
    line += `\n  Error: ${entry.error.message}`;
  }
  return line;
}

/**
 * Creates a logger that writes to the console (stderr for warnings and errors).
 */
export function createConsoleLogger(config: ConsoleLoggerConfig = {}): Logger {
  const format = config.format ?? "json";

  return createLogger({
    ...config,
    output: (entry) => {
      const line = formatLogEntry(entry, format);
      if (entry.level === "warn" || entry.level === "error") {
        console.error(line);
      } else {
        console.log(line);
      }
    },
  });
}

/**
 * Creates a logger that discards everything.
 */
export function createNoopLogger(): Logger {
  return {
    debug(): void {},
    info(): void {},
    warn(): void {},
    error(): void {},
  };
}

/**
 * Creates a logger that captures entries in memory.
 */
export function createTestLogger(config: Omit<LoggerConfig, "output"> = {}): TestLogger {
  const logs: LogEntry[] = [];
  const logger = createLogger({ ...config, output: (entry) => logs.push(entry) });

  return {
    ...logger,
    getLogs: () => [...logs],
    getLogsByLevel: (level) => logs.filter((entry) => entry.level === level),
    clear: () => {
      logs.length = 0;
    },
  };
}
