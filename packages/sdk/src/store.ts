/**
 * Record store: the immutable set of code records loaded at startup
 *
 * Invariants:
 * - Codes are unique after normalization
 * - Loading is all-or-nothing: any bad record fails the whole load with a
 *   LoadError and no store is constructed
 * - Records and the store itself are never mutated after load
 * - Iteration is in ascending code order
 */

import { parseCorpus } from "./corpus.js";
import { LoadError } from "./errors.js";
import { normalizeCode, validateRecord } from "./validation.js";
import type { CodeRecord, CorpusFormat, RawRecord } from "./types.js";

/**
 * Ordinal comparison of two codes
 */
export function compareCodes(a: string, b: string): number {
  if (a < b) return -1;
  if (a > b) return 1;
  return 0;
}

/**
 * Immutable collection of code records
 *
 * @example
 * ```typescript
 * const store = RecordStore.load(await readFile("codes.txt", "utf8"));
 * store.get("p0300")?.description; // "Random/Multiple Cylinder Misfire Detected"
 * ```
 */
export class RecordStore implements Iterable<CodeRecord> {
  readonly #records: ReadonlyMap<string, CodeRecord>;
  readonly #codes: readonly string[];

  private constructor(records: Map<string, CodeRecord>) {
    const entries = [...records.entries()].sort(([a], [b]) => compareCodes(a, b));
    this.#records = new Map(entries);
    this.#codes = Object.freeze(entries.map(([code]) => code));
  }

  /**
   * Parse and validate a corpus
   * @throws LoadError if any record is malformed or duplicated
   */
  static load(corpus: string, format: CorpusFormat = "text"): RecordStore {
    return RecordStore.fromRawRecords(parseCorpus(corpus, format));
  }

  /**
   * Validate already-parsed records
   * @throws LoadError if any record is malformed or duplicated
   */
  static fromRawRecords(rawRecords: readonly RawRecord[]): RecordStore {
    const records = new Map<string, CodeRecord>();
    const firstLine = new Map<string, number>();

    for (const raw of rawRecords) {
      const record = validateRecord(raw);
      const line = raw.lines.code ?? raw.line;
      const previous = firstLine.get(record.code);

      if (previous !== undefined) {
        throw new LoadError(
          line,
          `duplicate code ${record.code} (first defined at line ${previous})`,
          "duplicate-code"
        );
      }

      firstLine.set(record.code, line);
      records.set(record.code, record);
    }

    return new RecordStore(records);
  }

  /**
   * Number of records
   */
  get size(): number {
    return this.#codes.length;
  }

  /**
   * Get a record by code (case-insensitive)
   */
  get(code: string): CodeRecord | undefined {
    return this.#records.get(normalizeCode(code));
  }

  /**
   * Check whether a code is present (case-insensitive)
   */
  has(code: string): boolean {
    return this.#records.has(normalizeCode(code));
  }

  /**
   * All codes, ascending
   */
  codes(): readonly string[] {
    return this.#codes;
  }

  /**
   * Lazily iterate all records in code order; each call starts a new pass
   */
  *all(): Generator<CodeRecord, void, undefined> {
    for (const code of this.#codes) {
      const record = this.#records.get(code);
      if (record) {
        yield record;
      }
    }
  }

  [Symbol.iterator](): Iterator<CodeRecord> {
    return this.all();
  }
}
