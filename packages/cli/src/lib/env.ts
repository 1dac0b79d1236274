/**
 * Environment and configuration resolution
 */

import * as path from "node:path";
import { homedir } from "node:os";
import { defaultCorpusPath } from "@dtcref/sdk";

/**
 * Expand tilde (~) to home directory
 */
export function expandTilde(input: string): string {
  if (!input.startsWith("~")) {
    return input;
  }

  if (input === "~") {
    return homedir();
  }

  const match = input.match(/^~([\\/]|$)(.*)/);
  if (!match) {
    // "~user" paths are left as written
    return input;
  }

  const rest = match[2] ?? "";
  return path.join(homedir(), rest);
}

/**
 * Resolve the corpus file
 * Priority: CLI option > DTCREF_CORPUS env var > bundled corpus
 */
export function resolveCorpusPath(cliCorpus?: string): string {
  const corpus = cliCorpus ?? process.env.DTCREF_CORPUS;
  if (corpus === undefined || corpus.trim() === "") {
    return defaultCorpusPath();
  }
  return path.resolve(expandTilde(corpus));
}

/**
 * Check if running in verbose mode
 */
export function isVerbose(): boolean {
  return process.env.DTCREF_CLI_DEBUG === "1";
}

/**
 * Check if output is a TTY
 */
export function isTTY(): boolean {
  return process.stdout.isTTY ?? false;
}
