/**
 * Structured Logging Utility
 *
 * Provides consistent logging with:
 * - Log levels (debug, info, warn, error)
 * - Environment-based filtering (LOG_LEVEL, or --log-level at startup)
 * - Structured data logging
 *
 * Every line goes to stderr: under the stdio transport stdout carries
 * JSON-RPC frames and must stay clean.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_LEVELS: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

export function isLogLevel(value: string): value is LogLevel {
  return Object.hasOwn(LOG_LEVELS, value);
}

function getInitialLogLevel(): LogLevel {
  const envLevel = process.env.LOG_LEVEL?.toLowerCase();
  if (envLevel && isLogLevel(envLevel)) {
    return envLevel;
  }
  return process.env.NODE_ENV === "test" ? "error" : "info";
}

let minLogLevel: LogLevel = getInitialLogLevel();

export function setLogLevel(level: LogLevel): void {
  minLogLevel = level;
}

export function getLogLevel(): LogLevel {
  return minLogLevel;
}

function shouldLog(level: LogLevel): boolean {
  return LOG_LEVELS[level] >= LOG_LEVELS[minLogLevel];
}

/**
 * Format log message with timestamp and context
 */
export function formatMessage(
  level: LogLevel,
  context: string,
  message: string,
  data?: unknown,
  now: Date = new Date()
): string {
  const levelStr = level.toUpperCase().padEnd(5);

  let formatted = `[${now.toISOString()}] ${levelStr} [${context}] ${message}`;

  if (data !== undefined) {
    formatted += ` ${JSON.stringify(data)}`;
  }

  return formatted;
}

export interface Logger {
  debug(message: string, data?: unknown): void;
  info(message: string, data?: unknown): void;
  warn(message: string, data?: unknown): void;
  error(message: string, data?: unknown): void;
}

/**
 * Create a logger for a specific context/component
 *
 * @example
 * const log = createLogger("Massive");
 * log.info("Fetching snapshots", { tickers: 20 });
 */
export function createLogger(context: string): Logger {
  const write = (level: LogLevel, message: string, data?: unknown) => {
    if (shouldLog(level)) {
      console.error(formatMessage(level, context, message, data));
    }
  };

  return {
    debug: (message, data) => write("debug", message, data),
    info: (message, data) => write("info", message, data),
    warn: (message, data) => write("warn", message, data),
    error: (message, data) => write("error", message, data),
  };
}

/**
 * Writable-like sink for morgan, one access line per request
 */
export function createAccessLogStream(logger: Logger): { write(line: string): void } {
  return {
    write: (line: string) => logger.info(line.trimEnd()),
  };
}
