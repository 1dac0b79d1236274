/**
 * CLI testing utilities
 */

import { execa } from "execa";

/**
 * Result of a CLI command execution
 */
export interface CliResult {
  /** Standard output */
  stdout: string;
  /** Standard error */
  stderr: string;
  /** Exit code (null if process was killed by signal) */
  exitCode: number | null;
}

/**
 * Options for CLI execution
 */
export interface CliExecOptions {
  /** Environment variables */
  env?: Record<string, string>;
  /** Input to pass to stdin */
  input?: string;
}

/**
 * Execute the CLI from its TypeScript entry point, loaded through tsx
 *
 * Runs from the current working directory so the tsx loader resolves; pass
 * absolute paths in args.
 * @param cliPath - Path to the CLI entry (.ts)
 * @param args - Command arguments
 * @param options - Execution options
 * @returns CLI result with stdout, stderr, exitCode
 */
export async function runCli(
  cliPath: string,
  args: string[],
  options: CliExecOptions = {}
): Promise<CliResult> {
  const { env, input } = options;

  const result = await execa(process.execPath, ["--import", "tsx", cliPath, ...args], {
    env: { ...process.env, NO_COLOR: "1", ...env },
    input: input ?? "",
    reject: false,
  });

  return {
    stdout: result.stdout,
    stderr: result.stderr,
    exitCode: result.exitCode ?? null,
  };
}

/**
 * Parse JSON output from CLI
 * @param stdout - Standard output from CLI
 * @returns Parsed JSON value
 */
export function parseJsonOutput(stdout: string): unknown {
  return JSON.parse(stdout.trim());
}
