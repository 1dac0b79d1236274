/**
 * I/O helpers for CLI
 */

import * as fs from "node:fs/promises";
import * as path from "node:path";
import { expandTilde } from "./env.js";
import { CliError } from "./errors.js";

/**
 * Write a report file, creating parent directories
 * @returns Absolute path of the written file
 */
export async function writeOutputFile(filePath: string, content: string): Promise<string> {
  const target = path.resolve(expandTilde(filePath));
  try {
    await fs.mkdir(path.dirname(target), { recursive: true });
    await fs.writeFile(target, content, "utf8");
  } catch (err) {
    throw new CliError(
      `Cannot write ${target}: ${err instanceof Error ? err.message : String(err)}`,
      { cause: err }
    );
  }
  return target;
}

/**
 * Write to stderr
 */
export function writeStderr(content: string): void {
  process.stderr.write(content);
}

/**
 * Check if stdin is a TTY (interactive terminal)
 */
export function isStdinTTY(): boolean {
  return process.stdin.isTTY ?? false;
}
