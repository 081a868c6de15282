/**
 * Error reporting for the dockerfile-kit CLI.
 *
 * Maps errors to process exit codes and logs them with context.
 */

import { ConfigError, RecipeError, ValidationError } from "./errors.js";
import { log } from "./logger.js";

/** Process exit codes. */
export enum ExitCode {
  SUCCESS = 0,
  /** Unexpected failure (I/O, bugs) */
  FAILURE = 1,
  /** Bad input: invalid recipe, config or argument */
  USAGE = 2,
}

/** Choose the exit code for an error that reached the CLI. */
export function exitCodeFor(error: unknown): ExitCode {
  if (error instanceof ValidationError || error instanceof RecipeError || error instanceof ConfigError) {
    return ExitCode.USAGE;
  }
  return ExitCode.FAILURE;
}

/**
 * Log an error with context.
 *
 * @param error - The error object
 * @param operation - What operation was being performed
 * @param details - Additional context (optional)
 */
export function logError(
  error: unknown,
  operation: string,
  details?: Record<string, unknown>
): void {
  const message = error instanceof Error ? error.message : String(error);

  log.error(`Failed to ${operation}: ${message}`);

  if (details) {
    const detailsStr = Object.entries(details)
      .map(([k, v]) => `${k}=${JSON.stringify(v)}`)
      .join(", ");
    log.dim(`Context: ${detailsStr}`);
  }

  // Stack traces only for unexpected errors, and only in debug mode
  if (exitCodeFor(error) === ExitCode.FAILURE && error instanceof Error && error.stack) {
    log.debug(error.stack);
  }
}
