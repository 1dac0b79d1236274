/**
 * Error types for diagnostic code database operations
 *
 * Invariants:
 * - All errors have stable `name` and `code` fields for programmatic handling
 * - All errors support a `cause` property for wrapping underlying errors
 * - None of them are fatal to the process; callers decide how to present them
 */

/**
 * Base class for all database errors
 */
export abstract class DtcRefError extends Error {
  abstract readonly code: string;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = this.constructor.name;
    // Maintain proper stack trace in V8 environments
    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, this.constructor);
    }
  }
}

/**
 * Reason a corpus failed to load
 */
export type LoadErrorKind =
  | "duplicate-code"
  | "malformed-code"
  | "empty-description"
  | "unknown-severity"
  | "missing-field"
  | "syntax"
  | "io";

/**
 * Thrown when a corpus cannot be loaded. No store is constructed.
 *
 * `line` is 1-based; 0 means the failure is not tied to a line (unreadable file).
 */
export class LoadError extends DtcRefError {
  readonly code = "E_LOAD";

  constructor(
    public readonly line: number,
    public readonly reason: string,
    public readonly kind: LoadErrorKind,
    public readonly source?: string,
    options?: ErrorOptions
  ) {
    const where = [source, line > 0 ? `at line ${line}` : undefined].filter(Boolean).join(" ");
    super(
      where ? `Failed to load corpus ${where}: ${reason}` : `Failed to load corpus: ${reason}`,
      options
    );
  }

  /**
   * Copy of this error attributed to a corpus file
   */
  withSource(source: string): LoadError {
    return new LoadError(this.line, this.reason, this.kind, source, { cause: this.cause });
  }
}

/**
 * Thrown when a code is not in the store
 */
export class NotFoundError extends DtcRefError {
  readonly code = "E_NOT_FOUND";

  constructor(
    public readonly dtc: string,
    options?: ErrorOptions
  ) {
    super(`Code not found: ${dtc}`, options);
  }
}

/**
 * Thrown when query arguments are rejected
 */
export class InvalidQueryError extends DtcRefError {
  readonly code = "E_INVALID_QUERY";

  constructor(reason: string, options?: ErrorOptions) {
    super(`Invalid query: ${reason}`, options);
  }
}
