/**
 * Logger utility
 *
 * Console-based logging with timestamp and log levels.
 *
 * Log levels:
 * - debug: Detailed internal state (token refresh, SSO steps, request URLs)
 * - info: Normal operation progress (login, upload, server start)
 * - warn: Recoverable issues (rejected cached tokens, unreadable token file)
 * - error: Failures answered with an error response or fatal at startup
 *
 * Usage:
 * - Server: LOG_LEVEL env or --log-level debug|info|warn|error
 * - Library: setLogLevel("warn") before creating the app
 */

export const LOG_LEVELS = ["debug", "info", "warn", "error"] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const LEVEL_ORDER: Record<LogLevel, number> = {
  debug: 0,
  info: 1,
  warn: 2,
  error: 3,
};

let currentLevel: LogLevel = "info";

function formatTimestamp(): string {
  return new Date().toISOString().replace("T", " ").slice(0, 19);
}

function log(level: LogLevel, name: string, message: string): void {
  if (LEVEL_ORDER[level] < LEVEL_ORDER[currentLevel]) {
    return;
  }

  const timestamp = formatTimestamp();
  const levelStr = level.toUpperCase().padEnd(5);
  console.log(`[${timestamp}] ${levelStr} [${name}] ${message}`);
}

export interface Logger {
  debug: (message: string) => void;
  info: (message: string) => void;
  warn: (message: string) => void;
  error: (message: string) => void;
}

/**
 * Set global log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLevel = level;
}

export function getLogLevel(): LogLevel {
  return currentLevel;
}

export function isLogLevel(value: string): value is LogLevel {
  return LOG_LEVELS.some((level) => level === value);
}

/**
 * Create a logger instance for a specific module.
 */
export function setupLogger(name: string): Logger {
  return {
    debug: (message: string) => log("debug", name, message),
    info: (message: string) => log("info", name, message),
    warn: (message: string) => log("warn", name, message),
    error: (message: string) => log("error", name, message),
  };
}

/**
 * Mask an account identifier for log output ("jane@example.com" -> "ja***").
 */
export function maskIdentifier(value: string): string {
  return `${value.slice(0, 2)}***`;
}
