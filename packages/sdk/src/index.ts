/**
 * Diagnostic code reference SDK
 *
 * Immutable record store, derived indices and a query engine for
 * lookup, attribute filters and ranked keyword search
 */

// Re-export types
export type {
  Severity,
  Category,
  CategoryPrefix,
  CodeRecord,
  TextField,
  RawRecord,
  CorpusFormat,
  Posting,
  Indices,
  FilterCriteria,
  SearchOptions,
  SearchHit,
  SystemSummary,
  CorpusStats,
  DatabaseOptions,
  ScoreContext,
  Scorer,
} from "./types.js";
export { SEVERITIES, CATEGORY_BY_PREFIX } from "./types.js";

// Re-export contracts
export type { QueryType, ResultItem } from "./contracts/query.js";
export type { Formatter, OutputFormat, RenderContext } from "./contracts/formatter.js";
export type { Explainer, ExplainRequest } from "./contracts/explainer.js";
export { EXIT_CODE, type ExitCode } from "./contracts/cli.js";

// Re-export core components
export { RecordStore, compareCodes } from "./store.js";
export { buildIndices, recordTokens } from "./indexes.js";
export { QueryEngine, type QueryEngineOptions } from "./query.js";
export { openDatabase, loadCorpusFile, defaultCorpusPath } from "./database.js";
export { parseCorpus, parseCorpusText, parseCorpusJson, detectCorpusFormat } from "./corpus.js";
export { tokenize, tokenizeQuery } from "./tokenize.js";
export { FIELD_WEIGHTS, tokenSumScorer, phraseProximityScorer, SCORERS } from "./scoring.js";
export { buildExplainRequest, explainCode } from "./explain.js";

// Re-export utilities
export {
  normalizeCode,
  isValidCode,
  parseSeverity,
  severityRank,
  normalizeSystem,
  validateSeverityArg,
} from "./validation.js";

// Re-export observability
export { logger, parseLogLevel, type LogLevel } from "./observability/logs.js";
export { metrics, type QueryKind, type QueryMetrics } from "./observability/metrics.js";

// Re-export errors
export {
  DtcRefError,
  LoadError,
  NotFoundError,
  InvalidQueryError,
  type LoadErrorKind,
} from "./errors.js";
