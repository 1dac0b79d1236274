/**
 * Opening a query engine from a corpus file
 */

import { readFile } from "node:fs/promises";
import { createRequire } from "node:module";
import * as path from "node:path";
import { detectCorpusFormat } from "./corpus.js";
import { LoadError } from "./errors.js";
import { QueryEngine } from "./query.js";
import { RecordStore } from "./store.js";
import type { CorpusFormat, DatabaseOptions } from "./types.js";
import { logger } from "./observability/logs.js";

const require = createRequire(import.meta.url);

/**
 * Path of the corpus bundled with this package
 */
export function defaultCorpusPath(): string {
  return require.resolve("@dtcref/sdk/data/codes.txt");
}

/**
 * Read and validate a corpus file
 * @throws LoadError (with `source` set) if the file cannot be read or is invalid
 */
export async function loadCorpusFile(filePath: string, format?: CorpusFormat): Promise<RecordStore> {
  const source = path.resolve(filePath);
  const corpusFormat = format ?? detectCorpusFormat(source);

  let text: string;
  try {
    text = await readFile(source, "utf8");
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new LoadError(0, `cannot read file: ${reason}`, "io", source, { cause: err });
  }

  try {
    return RecordStore.load(text, corpusFormat);
  } catch (err) {
    if (err instanceof LoadError) {
      throw err.withSource(source);
    }
    throw err;
  }
}

/**
 * Load a corpus and build a query engine over it
 *
 * @example
 * ```typescript
 * const engine = await openDatabase({ corpusPath: "./codes.txt" });
 * engine.lookupByCode("P0300");
 * ```
 */
export async function openDatabase(options: DatabaseOptions = {}): Promise<QueryEngine> {
  const corpusPath = options.corpusPath ?? defaultCorpusPath();
  const startTime = performance.now();
  logger.info("corpus.load.start", { source: corpusPath });

  let store: RecordStore;
  try {
    store = await loadCorpusFile(corpusPath, options.format);
  } catch (err) {
    if (err instanceof LoadError) {
      logger.error("corpus.load.failed", {
        source: err.source,
        message: err.reason,
        details: { line: err.line, kind: err.kind },
      });
    }
    throw err;
  }

  const engine = new QueryEngine(store, { scorer: options.scorer });

  logger.info("corpus.load.end", {
    source: corpusPath,
    details: {
      durationMs: (performance.now() - startTime).toFixed(2),
      records: store.size,
    },
  });

  return engine;
}
