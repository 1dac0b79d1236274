/**
 * CLI error handling and exit code mapping
 */

import { EXIT_CODE, InvalidQueryError, LoadError, NotFoundError } from "@dtcref/sdk";

/**
 * Base CLI error class
 */
export class CliError extends Error {
  exitCode: number;

  constructor(message: string, options?: { exitCode?: number; cause?: unknown }) {
    super(message, { cause: options?.cause });
    this.name = "CliError";
    this.exitCode = options?.exitCode ?? EXIT_CODE.INTERNAL_ERROR;
  }
}

/**
 * Map SDK errors to CLI exit codes
 * - 0: success
 * - 1: usage/unknown error
 * - 2: code not found
 * - 3: invalid query
 * - 4: corpus failed to load
 */
export function mapSdkErrorToExitCode(error: unknown): number {
  // Check for CliError first (has exitCode property)
  if (error instanceof CliError) {
    return error.exitCode;
  }

  if (error instanceof NotFoundError) {
    return EXIT_CODE.NOT_FOUND;
  }

  if (error instanceof InvalidQueryError) {
    return EXIT_CODE.INVALID_QUERY;
  }

  if (error instanceof LoadError) {
    return EXIT_CODE.LOAD_FAILED;
  }

  // Usage errors (commander InvalidArgumentError) and anything unknown
  return EXIT_CODE.INTERNAL_ERROR;
}

/**
 * Format an error for CLI output
 */
export function formatCliError(error: unknown, verbose = false): string {
  if (error instanceof Error) {
    let message = error.message;

    // Redact large payloads from error messages
    if (message.length > 2000) {
      message = message.substring(0, 2000) + "... (truncated)";
    }

    if (verbose && error.cause) {
      message += `\n  Cause: ${String(error.cause)}`;
    }

    if (verbose && error.stack) {
      message += `\n${error.stack}`;
    }

    return message;
  }

  return String(error);
}
