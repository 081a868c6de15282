/**
 * Logging for the dockerfile-kit CLI.
 *
 * Centralizes console output with consistent styling and log levels.
 * Uses picocolors for terminal styling.
 *
 * The Dockerfile builder itself never logs; only the CLI layer does.
 */

import pc from "picocolors";

/** Log levels in order of verbosity (debug is most verbose). */
export enum LogLevel {
  DEBUG = 0,
  INFO = 1,
  WARN = 2,
  ERROR = 3,
  SILENT = 4,
}

interface LoggerConfig {
  level: LogLevel;
  /** If true, prefix messages with [dockerfile-kit] */
  prefix: boolean;
  /** If true, suppress ALL output including errors */
  quiet: boolean;
}

const config: LoggerConfig = {
  level: LogLevel.INFO,
  prefix: false,
  quiet: false,
};

function canOutput(level: LogLevel): boolean {
  return !config.quiet && config.level <= level;
}

/**
 * Enable quiet mode: suppress ALL log output.
 * Only exit codes communicate success/failure.
 */
export function enableQuietMode(): void {
  config.quiet = true;
  config.level = LogLevel.SILENT;
}

/** Disable quiet mode: restore normal output. */
export function disableQuietMode(): void {
  config.quiet = false;
  config.level = LogLevel.INFO;
}

/** Set the minimum log level. Messages below this level are suppressed. */
export function setLogLevel(level: LogLevel): void {
  config.level = level;
}

/** Enable or disable the [dockerfile-kit] prefix on all messages. */
export function setPrefix(enabled: boolean): void {
  config.prefix = enabled;
}

function formatMessage(message: string): string {
  return config.prefix ? `[dockerfile-kit] ${message}` : message;
}

/**
 * Logger object with level-aware methods.
 *
 * Usage:
 *   log.debug("verbose info")
 *   log.info("normal output")
 *   log.warn("warning message")
 *   log.error("error message")
 *   log.success("completed!")
 */
export const log = {
  /** Debug-level message, dim gray. */
  debug(message: string): void {
    if (canOutput(LogLevel.DEBUG)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  info(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(formatMessage(message));
    }
  },

  /** Warning, yellow, to stderr. */
  warn(message: string): void {
    if (canOutput(LogLevel.WARN)) {
      console.warn(pc.yellow(formatMessage(message)));
    }
  },

  /** Error, red, to stderr. */
  error(message: string): void {
    if (canOutput(LogLevel.ERROR)) {
      console.error(pc.red(formatMessage(message)));
    }
  },

  success(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.green(formatMessage(message)));
    }
  },

  dim(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(pc.dim(formatMessage(message)));
    }
  },

  /** Raw output without styling or prefix. Respects log level (info). */
  raw(message: string): void {
    if (canOutput(LogLevel.INFO)) {
      console.log(message);
    }
  },
};

/**
 * Styled string builders (for complex compositions).
 * These return styled strings without printing.
 */
export const style = {
  dim: (text: string) => pc.dim(text),
  bold: (text: string) => pc.bold(text),
  cyan: (text: string) => pc.cyan(text),
};
