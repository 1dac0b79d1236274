/**
 * Core types for the diagnostic code database
 */

/**
 * Severity levels, lowest first. Array order is the severity order.
 */
export const SEVERITIES = ["Low", "Medium", "High", "Critical"] as const;

/**
 * Ordered criticality label of a code
 */
export type Severity = (typeof SEVERITIES)[number];

/**
 * Code category, derived from the first character of the code
 */
export type Category = "Powertrain" | "Chassis" | "Body" | "Network";

/**
 * Category lookup by code prefix
 */
export const CATEGORY_BY_PREFIX = {
  P: "Powertrain",
  C: "Chassis",
  B: "Body",
  U: "Network",
} as const satisfies Record<string, Category>;

/**
 * Code prefix character
 */
export type CategoryPrefix = keyof typeof CATEGORY_BY_PREFIX;

/**
 * A diagnostic code record as held by the record store
 *
 * Records are frozen once loaded; `causes` and `actions` keep corpus order.
 */
export interface CodeRecord {
  /** Normalized (upper-case) code, e.g. "P0300" */
  readonly code: string;
  /** Category derived from the code prefix */
  readonly category: Category;
  /** Human-readable description, never empty */
  readonly description: string;
  readonly severity: Severity;
  /** Display label of the affected system, e.g. "Engine" */
  readonly system: string;
  /** Possible causes, in corpus order */
  readonly causes: readonly string[];
  /** Recommended actions, in corpus order */
  readonly actions: readonly string[];
}

/**
 * Record fields that feed the token index
 */
export type TextField = "description" | "causes" | "actions";

/**
 * A record as read from a corpus, before validation
 *
 * Line numbers are 1-based positions in the source (for JSON corpora, the
 * record's position in the array).
 */
export interface RawRecord {
  code: string;
  description?: string;
  severity?: string;
  system?: string;
  causes: string[];
  actions: string[];
  /** Line the record starts on */
  line: number;
  /** Line of each field that was present */
  lines: Partial<Record<"code" | "description" | "severity" | "system", number>>;
}

/**
 * Supported corpus encodings
 */
export type CorpusFormat = "text" | "json";

/**
 * A single occurrence of a token in a record field
 */
export interface Posting {
  readonly code: string;
  readonly field: TextField;
  /** Token position within the field; list items are separated by a gap */
  readonly position: number;
}

/**
 * Secondary indices derived from a record store
 *
 * All maps are read-only views built once and never mutated afterwards.
 */
export interface Indices {
  /** Lower-cased system label -> codes, ascending */
  readonly bySystem: ReadonlyMap<string, readonly string[]>;
  /** Severity -> codes, ascending */
  readonly bySeverity: ReadonlyMap<Severity, readonly string[]>;
  /** Token -> postings, ordered by code, field, position */
  readonly tokens: ReadonlyMap<string, readonly Posting[]>;
  /** Lower-cased system label -> display label */
  readonly systemLabels: ReadonlyMap<string, string>;
}

/**
 * Attribute filter criteria. At least one field must be set.
 */
export interface FilterCriteria {
  /** System label, matched case-insensitively */
  system?: string;
  /** Exact severity */
  severity?: Severity | string;
  /** Records at or above this severity */
  minSeverity?: Severity | string;
}

/**
 * Keyword search options
 */
export interface SearchOptions {
  /** Maximum number of hits to return */
  limit?: number;
}

/**
 * A ranked keyword search result
 */
export interface SearchHit {
  readonly record: CodeRecord;
  readonly score: number;
}

/**
 * System label with the number of codes attributed to it
 */
export interface SystemSummary {
  system: string;
  count: number;
}

/**
 * Corpus statistics
 */
export interface CorpusStats {
  total: number;
  bySeverity: Record<Severity, number>;
  byCategory: Record<Category, number>;
  bySystem: Record<string, number>;
}

/**
 * Options for opening a database from a corpus file
 */
export interface DatabaseOptions {
  /** Path to the corpus file (default: bundled corpus) */
  corpusPath?: string;
  /** Corpus encoding (default: picked from the file extension) */
  format?: CorpusFormat;
  /** Replaces the default token-sum scoring */
  scorer?: Scorer;
}

/**
 * Input handed to a scorer for one candidate record
 */
export interface ScoreContext {
  readonly record: CodeRecord;
  /** De-duplicated query tokens, in query order */
  readonly terms: readonly string[];
  /** Postings of this record, per matched query token */
  readonly matches: ReadonlyMap<string, readonly Posting[]>;
}

/**
 * Ranking strategy for keyword search
 *
 * A candidate with a score of 0 or less is dropped from the results.
 */
export interface Scorer {
  readonly name: string;
  score(context: ScoreContext): number;
}
