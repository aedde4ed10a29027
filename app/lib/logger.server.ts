/**
 * Structured console logging shared by the Express server and Remix loaders.
 * The .server.ts suffix ensures this file is never bundled for the client.
 */

export type LogLevel = "debug" | "info" | "warn" | "error";

const LOG_COLORS: Record<LogLevel, string> = {
  debug: "\x1b[90m", // gray
  info: "\x1b[36m",  // cyan
  warn: "\x1b[33m",  // yellow
  error: "\x1b[31m", // red
};
const RESET = "\x1b[0m";

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 10,
  info: 20,
  warn: 30,
  error: 40,
};

function isLogLevel(value: string): value is LogLevel {
  return Object.prototype.hasOwnProperty.call(LEVEL_ORDER, value);
}

/**
 * Minimum level to print, from LOG_LEVEL (defaults to info).
 */
export function getLogThreshold(): LogLevel {
  const value = process.env.LOG_LEVEL?.trim().toLowerCase();
  return value && isLogLevel(value) ? value : "info";
}

export function formatLogLine(
  level: LogLevel,
  message: string,
  meta?: Record<string, unknown>,
  timestamp: string = new Date().toISOString()
): string {
  const color = LOG_COLORS[level];
  const levelStr = level.toUpperCase().padEnd(5);

  let output = `${timestamp} ${color}${levelStr}${RESET} ${message}`;
  if (meta && Object.keys(meta).length > 0) {
    output += ` ${JSON.stringify(meta)}`;
  }
  return output;
}

export function log(level: LogLevel, message: string, meta?: Record<string, unknown>) {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[getLogThreshold()]) return;

  const output = formatLogLine(level, message, meta);
  if (level === "error") {
    console.error(output);
  } else {
    console.log(output);
  }
}

export interface Logger {
  debug(message: string, meta?: Record<string, unknown>): void;
  info(message: string, meta?: Record<string, unknown>): void;
  warn(message: string, meta?: Record<string, unknown>): void;
  error(message: string, meta?: Record<string, unknown>): void;
}

/**
 * Logger that prefixes every message with `[scope]`.
 */
export function createLogger(scope: string): Logger {
  const prefixed =
    (level: LogLevel) => (message: string, meta?: Record<string, unknown>) =>
      log(level, `[${scope}] ${message}`, meta);

  return {
    debug: prefixed("debug"),
    info: prefixed("info"),
    warn: prefixed("warn"),
    error: prefixed("error"),
  };
}
