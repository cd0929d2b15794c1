import { HttpError, RateLimitError, ResponseValidationError } from '@refdata/http';
import { DocumentParseError, DocumentValidationError, FormatError } from '@refdata/instruments';

/**
 * Semantic exit codes for the CLI.
 * Following POSIX conventions and best practices.
 */
export const ExitCodes = {
  /** Successful execution */
  SUCCESS: 0,

  /** General error (catch-all) */
  GENERAL_ERROR: 1,

  /** Invalid command arguments or options */
  INVALID_ARGS: 2,

  /** Input file not found */
  NOT_FOUND: 4,

  /** Rate limit exceeded */
  RATE_LIMIT: 5,

  /** Network or connectivity error */
  NETWORK_ERROR: 6,

  /** Validation error (segment document or field format) */
  VALIDATION_ERROR: 8,

  /** Configuration error */
  CONFIG_ERROR: 11,
} as const;

export type ExitCode = (typeof ExitCodes)[keyof typeof ExitCodes];

/**
 * Raised when the environment does not validate.
 */
export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

function isNodeError(error: unknown): error is NodeJS.ErrnoException {
  return error instanceof Error && 'code' in error;
}

function isMissingFile(error: Error): boolean {
  const cause: unknown = error.cause;
  return (isNodeError(error) && error.code === 'ENOENT') || (isNodeError(cause) && cause.code === 'ENOENT');
}

/**
 * Pick the exit code for an error surfaced by a command.
 */
export function exitCodeForError(error: Error): ExitCode {
  if (error instanceof ConfigError) return ExitCodes.CONFIG_ERROR;
  if (error instanceof RateLimitError) return ExitCodes.RATE_LIMIT;
  if (error instanceof HttpError) return ExitCodes.NETWORK_ERROR;
  if (
    error instanceof DocumentParseError ||
    error instanceof DocumentValidationError ||
    error instanceof FormatError ||
    error instanceof ResponseValidationError
  ) {
    return ExitCodes.VALIDATION_ERROR;
  }
  if (isMissingFile(error)) return ExitCodes.NOT_FOUND;
  return ExitCodes.GENERAL_ERROR;
}
