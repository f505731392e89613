/**
 * Defines the available log levels.
 */
export enum LogLevel {
  ERROR = 0,
  WARN = 1,
  INFO = 2,
  DEBUG = 3,
}

/**
 * Lowercase names accepted for log levels in configuration (e.g. `LOG_LEVEL=debug`).
 */
export type LogLevelName = "error" | "warn" | "info" | "debug";

const LOG_LEVELS_BY_NAME: Record<LogLevelName, LogLevel> = {
  error: LogLevel.ERROR,
  warn: LogLevel.WARN,
  info: LogLevel.INFO,
  debug: LogLevel.DEBUG,
};

let currentLogLevel: LogLevel = LogLevel.INFO; // Default level

// When stdout carries protocol traffic (MCP over stdio), every level goes to stderr.
let stderrOnly = false;

/**
 * Sets the current logging level for the application.
 * @param level - The desired log level.
 */
export function setLogLevel(level: LogLevel): void {
  currentLogLevel = level;
}

/**
 * Resolves a configured level name to its {@link LogLevel}.
 */
export function logLevelFromName(name: LogLevelName): LogLevel {
  return LOG_LEVELS_BY_NAME[name];
}

/**
 * Routes debug and info output to stderr instead of stdout.
 */
export function setStderrOnly(enabled: boolean): void {
  stderrOnly = enabled;
}

/**
 * Provides logging functionalities with level control.
 */
export const logger = {
  /**
   * Logs a debug message if the current log level is DEBUG or higher.
   * @param message - The message to log.
   */
  debug: (message: string) => {
    if (currentLogLevel >= LogLevel.DEBUG) {
      if (stderrOnly) {
        console.error(message);
      } else {
        console.debug(message);
      }
    }
  },
  /**
   * Logs an info message if the current log level is INFO or higher.
   * @param message - The message to log.
   */
  info: (message: string) => {
    if (currentLogLevel >= LogLevel.INFO) {
      if (stderrOnly) {
        console.error(message);
      } else {
        console.log(message); // Using console.log for INFO
      }
    }
  },
  /**
   * Logs a warning message if the current log level is WARN or higher.
   * @param message - The message to log.
   */
  warn: (message: string) => {
    if (currentLogLevel >= LogLevel.WARN) {
      console.warn(message);
    }
  },
  /**
   * Logs an error message if the current log level is ERROR or higher (always logs).
   * @param message - The message to log.
   */
  error: (message: string) => {
    if (currentLogLevel >= LogLevel.ERROR) {
      console.error(message);
    }
  },
};
