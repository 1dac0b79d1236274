/**
 * CLI contracts and exit codes
 */

/**
 * Standard exit codes, one per error taxonomy entry
 */
export const EXIT_CODE = {
  /** Success */
  SUCCESS: 0,
  /** Usage error or unexpected failure */
  INTERNAL_ERROR: 1,
  /** Code not found */
  NOT_FOUND: 2,
  /** Invalid query (empty filter, bad severity, bad limit) */
  INVALID_QUERY: 3,
  /** Corpus failed to load */
  LOAD_FAILED: 4,
} as const;

export type ExitCode = (typeof EXIT_CODE)[keyof typeof EXIT_CODE];

/**
 * CLI invariants:
 *
 * 1. Exit codes:
 *    - 0: Success (including searches with no hits)
 *    - 1: Usage error, bad option value, unexpected failure
 *    - 2: Not found (lookup of an absent code)
 *    - 3: Invalid query (filter without criteria, unknown severity)
 *    - 4: Corpus load failure (unreadable file, malformed record)
 *
 * 2. Output format:
 *    - --json / --format json: all stdout is valid JSON
 *    - Otherwise human-readable text, colored only on a TTY
 *    - Errors and logs always go to stderr
 *
 * 3. Environment:
 *    - DTCREF_CORPUS: corpus path when --corpus is not given
 *    - DTCREF_CLI_DEBUG=1: emit timing metrics to stderr
 *    - DTCREF_LOG_LEVEL: SDK log level (default warn)
 */
