/**
 * Exception hierarchy for dockerfile-kit.
 *
 * All custom exceptions inherit from DockerfileKitError so the CLI can tell
 * its own failures apart from unexpected ones.
 *
 * Dependency direction:
 *   This module has NO internal dependencies (leaf module).
 *   It may be imported by: all other dockerfile-kit modules.
 */

/**
 * Base exception for all dockerfile-kit errors.
 */
export class DockerfileKitError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DockerfileKitError";
    Error.captureStackTrace?.(this, this.constructor);
  }
}

/**
 * Input validation errors.
 *
 * Examples:
 *   - A directive argument of the wrong shape
 *   - An unknown CLI option value
 */
export class ValidationError extends DockerfileKitError {
  constructor(message: string) {
    super(message);
    this.name = "ValidationError";
  }
}

/** Raised when COPY receives a source that is neither a path nor a list of paths. */
export class ArgumentShapeError extends ValidationError {
  constructor(message = "src must be a string or an array of strings") {
    super(message);
    this.name = "ArgumentShapeError";
  }
}

/**
 * Recipe loading errors.
 *
 * Examples:
 *   - Recipe file missing or not valid JSON
 *   - Step with an unknown directive or a mistyped field
 *   - Include cycle between recipe files
 */
export class RecipeError extends DockerfileKitError {
  constructor(message: string) {
    super(message);
    this.name = "RecipeError";
  }
}

/**
 * Configuration-related errors.
 *
 * Examples:
 *   - Invalid configuration values
 */
export class ConfigError extends DockerfileKitError {
  constructor(message: string) {
    super(message);
    this.name = "ConfigError";
  }
}

/**
 * Extract error details from an unknown error for user-facing messages.
 *
 * Truncates output to maxLength to avoid overwhelming log output.
 */
export function extractErrorDetails(error: unknown, maxLength = 1000): string {
  if (!(error instanceof Error)) {
    return String(error).slice(0, maxLength);
  }
  return error.message.slice(0, maxLength);
}
