/**
 * Query engine: code lookup, attribute filters and ranked keyword search
 *
 * All operations are synchronous, side-effect free (apart from metrics and
 * debug logging) and answered from the indices built at load time.
 */

import { InvalidQueryError, NotFoundError } from "./errors.js";
import { buildIndices } from "./indexes.js";
import { tokenSumScorer } from "./scoring.js";
import { compareCodes } from "./store.js";
import { tokenizeQuery } from "./tokenize.js";
import {
  normalizeCode,
  severityRank,
  systemKey,
  validateSeverityArg,
} from "./validation.js";
import { SEVERITIES } from "./types.js";
import type {
  Category,
  CodeRecord,
  CorpusStats,
  FilterCriteria,
  Indices,
  Posting,
  Scorer,
  SearchHit,
  SearchOptions,
  Severity,
  SystemSummary,
} from "./types.js";
import type { RecordStore } from "./store.js";
import { metrics, type QueryKind } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Store and indices published together
 */
interface Snapshot {
  readonly store: RecordStore;
  readonly indices: Indices;
}

export interface QueryEngineOptions {
  /** Ranking strategy for search (default: token-sum) */
  scorer?: Scorer;
}

/**
 * Intersect ascending code lists
 */
function intersectSorted(lists: ReadonlyArray<readonly string[]>): string[] {
  const [first, ...rest] = [...lists].sort((a, b) => a.length - b.length);
  if (!first) return [];
  const others = rest.map((list) => new Set(list));
  return first.filter((code) => others.every((set) => set.has(code)));
}

/**
 * Answers lookup, filter and search queries over one record store
 *
 * @example
 * ```typescript
 * const engine = new QueryEngine(RecordStore.load(corpus));
 * engine.lookupByCode("p0300").severity;       // "High"
 * engine.filter({ system: "Engine", severity: "High" });
 * engine.search("misfire")[0]?.record.code;    // "P0300"
 * ```
 */
export class QueryEngine {
  #snapshot: Snapshot;
  readonly #scorer: Scorer;

  constructor(store: RecordStore, options: QueryEngineOptions = {}) {
    this.#snapshot = { store, indices: buildIndices(store) };
    this.#scorer = options.scorer ?? tokenSumScorer;
  }

  /**
   * Replace the store. New indices are built in full before the swap, so
   * readers see either the old snapshot or the new one.
   */
  reload(store: RecordStore): void {
    const indices = buildIndices(store);
    this.#snapshot = { store, indices };
  }

  get store(): RecordStore {
    return this.#snapshot.store;
  }

  get indices(): Indices {
    return this.#snapshot.indices;
  }

  get scorer(): Scorer {
    return this.#scorer;
  }

  get size(): number {
    return this.#snapshot.store.size;
  }

  /**
   * Find a record by code without throwing (case-insensitive)
   */
  find(code: string): CodeRecord | undefined {
    return this.#snapshot.store.get(code);
  }

  /**
   * Look up a record by code (case-insensitive)
   * @throws NotFoundError if the code is not in the store
   */
  lookupByCode(code: string): CodeRecord {
    const startTime = performance.now();
    const normalized = normalizeCode(code);
    const record = this.#snapshot.store.get(normalized);
    this.#record("lookup", record !== undefined, startTime);

    if (!record) {
      throw new NotFoundError(normalized);
    }
    return record;
  }

  /**
   * Records matching every given criterion, ordered by code
   * @throws InvalidQueryError if no criterion is given or a value is invalid
   */
  filter(criteria: FilterCriteria): CodeRecord[] {
    const startTime = performance.now();
    const { store, indices } = this.#snapshot;
    const buckets: Array<readonly string[]> = [];

    if (criteria.system !== undefined) {
      const key = systemKey(criteria.system);
      if (key.length === 0) {
        throw new InvalidQueryError("system must not be empty");
      }
      buckets.push(indices.bySystem.get(key) ?? []);
    }

    if (criteria.severity !== undefined) {
      const severity = validateSeverityArg(criteria.severity, "severity");
      buckets.push(indices.bySeverity.get(severity) ?? []);
    }

    if (criteria.minSeverity !== undefined) {
      const min = severityRank(validateSeverityArg(criteria.minSeverity, "minSeverity"));
      const codes = SEVERITIES.filter((severity) => severityRank(severity) >= min)
        .flatMap((severity) => indices.bySeverity.get(severity) ?? [])
        .sort(compareCodes);
      buckets.push(codes);
    }

    if (buckets.length === 0) {
      throw new InvalidQueryError("filter needs a system, severity or minSeverity");
    }

    const records = intersectSorted(buckets).flatMap((code) => {
      const record = store.get(code);
      return record ? [record] : [];
    });

    this.#record("filter", records.length > 0, startTime);
    return records;
  }

  /**
   * Keyword search ranked by score, highest first; ties ordered by code
   *
   * Returns an empty list when no query token matches any record.
   * @throws InvalidQueryError if limit is not a positive integer
   */
  search(query: string, options: SearchOptions = {}): SearchHit[] {
    const startTime = performance.now();
    const { limit } = options;
    if (limit !== undefined && (!Number.isInteger(limit) || limit < 1)) {
      throw new InvalidQueryError(`limit must be a positive integer (got ${limit})`);
    }

    const { store, indices } = this.#snapshot;
    const terms = tokenizeQuery(query);

    // code -> token -> postings of that token in the record
    const candidates = new Map<string, Map<string, Posting[]>>();
    for (const term of terms) {
      for (const posting of indices.tokens.get(term) ?? []) {
        let matches = candidates.get(posting.code);
        if (!matches) {
          matches = new Map();
          candidates.set(posting.code, matches);
        }
        const list = matches.get(term);
        if (list) {
          list.push(posting);
        } else {
          matches.set(term, [posting]);
        }
      }
    }

    const hits: SearchHit[] = [];
    for (const [code, matches] of candidates) {
      const record = store.get(code);
      if (!record) continue;
      const score = this.#scorer.score({ record, terms, matches });
      if (score > 0) {
        hits.push({ record, score });
      }
    }

    hits.sort((a, b) => b.score - a.score || compareCodes(a.record.code, b.record.code));
    const results = limit === undefined ? hits : hits.slice(0, limit);

    logger.debug("query.search", {
      details: { terms, candidates: candidates.size, hits: hits.length, scorer: this.#scorer.name },
    });
    this.#record("search", results.length > 0, startTime);
    return results;
  }

  /**
   * Systems with their code counts, ordered by label
   */
  systems(): SystemSummary[] {
    const { indices } = this.#snapshot;
    return [...indices.bySystem]
      .map(([key, codes]) => ({ system: indices.systemLabels.get(key) ?? key, count: codes.length }))
      .sort((a, b) => compareCodes(a.system.toLowerCase(), b.system.toLowerCase()));
  }

  /**
   * Record counts by severity, category and system
   */
  stats(): CorpusStats {
    const { store, indices } = this.#snapshot;

    const bySeverity: Record<Severity, number> = { Low: 0, Medium: 0, High: 0, Critical: 0 };
    for (const severity of SEVERITIES) {
      bySeverity[severity] = indices.bySeverity.get(severity)?.length ?? 0;
    }

    const byCategory: Record<Category, number> = {
      Powertrain: 0,
      Chassis: 0,
      Body: 0,
      Network: 0,
    };
    for (const record of store.all()) {
      byCategory[record.category]++;
    }

    const bySystem: Record<string, number> = {};
    for (const { system, count } of this.systems()) {
      bySystem[system] = count;
    }

    return { total: store.size, bySeverity, byCategory, bySystem };
  }

  #record(kind: QueryKind, hit: boolean, startTime: number): void {
    metrics.recordQuery(kind, hit, performance.now() - startTime);
  }
}
