/**
 * Engine adapter for CLI
 * Resolves the corpus and opens a query engine over it
 */

import { openDatabase, SCORERS, type QueryEngine } from "@dtcref/sdk";
import { InvalidArgumentError } from "commander";
import { resolveCorpusPath } from "./env.js";

export type CliEngineOptions = {
  /** --corpus option */
  corpus?: string;
  /** --scorer option */
  scorer?: string;
};

/**
 * Open a query engine for the CLI's global options
 * @throws LoadError if the corpus cannot be loaded
 */
export async function openCliEngine(options: CliEngineOptions = {}): Promise<QueryEngine> {
  const scorer =
    options.scorer !== undefined && Object.hasOwn(SCORERS, options.scorer)
      ? SCORERS[options.scorer]
      : undefined;
  if (options.scorer !== undefined && !scorer) {
    throw new InvalidArgumentError(
      `--scorer must be one of ${Object.keys(SCORERS).join(", ")} (got "${options.scorer}")`
    );
  }

  return openDatabase({ corpusPath: resolveCorpusPath(options.corpus), scorer });
}

/**
 * Global options shared by every command
 */
export type GlobalOptions = CliEngineOptions & {
  verbose?: boolean;
  quiet?: boolean;
};
