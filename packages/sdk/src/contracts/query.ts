/**
 * Query contracts and invariants
 * This module documents the query semantics the engine guarantees
 */

import type { CodeRecord } from "../types.js";

/**
 * Query kinds answered by the engine
 */
export type QueryType = "lookup" | "filter" | "search";

/**
 * One entry of an ordered result set; `score` is present for search hits
 */
export interface ResultItem {
  readonly record: CodeRecord;
  readonly score?: number;
}

/**
 * Query semantics and invariants:
 *
 * 1. Lookup:
 *    - Codes are trimmed and upper-cased before lookup ("p0300" == "P0300")
 *    - A missing code throws NotFoundError carrying the normalized code
 *
 * 2. Filter:
 *    - Criteria: system, severity, minSeverity; given criteria are AND-ed
 *    - No criteria throws InvalidQueryError (no accidental full dump)
 *    - System matching is case-insensitive; unknown systems give []
 *    - Unknown severity strings throw InvalidQueryError
 *    - Results are ordered by code, ascending
 *
 * 3. Search:
 *    - Query tokenized like the corpus, duplicates removed
 *    - Score = sum over matched tokens of the best field weight
 *      (description 3 > causes 2 > actions 1)
 *    - Only records with a positive score are returned; no match gives []
 *    - Ordered by score descending, then code ascending
 *    - Repeated identical calls return identical ordered results
 *
 * 4. Consistency:
 *    - Every query reads one published snapshot (store + indices)
 *    - reload() builds the new indices before swapping the snapshot
 */

