/**
 * Index builder: secondary indices derived from a record store
 *
 * Indices:
 * - bySystem:   lower-cased system label -> codes
 * - bySeverity: severity -> codes
 * - tokens:     token -> postings (code, field, position)
 *
 * Invariants:
 * - Pure function of the store contents: same corpus, same indices
 * - Every code appears in exactly one system bucket and one severity bucket
 * - Code lists are ascending; postings are ordered by code, field, position
 * - Built completely, then frozen; never updated in place
 */

import { tokenize } from "./tokenize.js";
import { systemKey } from "./validation.js";
import { SEVERITIES } from "./types.js";
import type { CodeRecord, Indices, Posting, Severity, TextField } from "./types.js";
import type { RecordStore } from "./store.js";
import { metrics } from "./observability/metrics.js";
import { logger } from "./observability/logs.js";

/**
 * Position gap between list items so tokens of different items are never adjacent
 */
export const ITEM_POSITION_GAP = 1;

/**
 * Token occurrences for one text field of a record
 */
function fieldPostings(
  code: string,
  field: TextField,
  items: readonly string[]
): Array<[string, Posting]> {
  const occurrences: Array<[string, Posting]> = [];
  let position = 0;

  for (const item of items) {
    for (const token of tokenize(item)) {
      occurrences.push([token, Object.freeze({ code, field, position })]);
      position++;
    }
    position += ITEM_POSITION_GAP;
  }

  return occurrences;
}

/**
 * Tokenize every text field of a record
 * @returns token -> postings for this record, in field order
 */
export function recordTokens(record: CodeRecord): Map<string, Posting[]> {
  const byToken = new Map<string, Posting[]>();
  const fields: Array<[TextField, readonly string[]]> = [
    ["description", [record.description]],
    ["causes", record.causes],
    ["actions", record.actions],
  ];

  for (const [field, items] of fields) {
    for (const [token, posting] of fieldPostings(record.code, field, items)) {
      appendTo(byToken, token, [posting]);
    }
  }

  return byToken;
}

function appendTo<K, V>(map: Map<K, V[]>, key: K, values: V[]): void {
  const list = map.get(key);
  if (list) {
    list.push(...values);
  } else {
    map.set(key, [...values]);
  }
}

/**
 * Build all indices for a store
 */
export function buildIndices(store: RecordStore): Indices {
  const startTime = performance.now();

  const bySystem = new Map<string, string[]>();
  const systemLabels = new Map<string, string>();
  const bySeverity = new Map<Severity, string[]>(SEVERITIES.map((severity) => [severity, []]));
  const tokens = new Map<string, Posting[]>();

  // Store iteration is in code order, so every list below comes out ascending
  for (const record of store.all()) {
    const key = systemKey(record.system);
    appendTo(bySystem, key, [record.code]);
    if (!systemLabels.has(key)) {
      systemLabels.set(key, record.system);
    }

    appendTo(bySeverity, record.severity, [record.code]);

    for (const [token, postings] of recordTokens(record)) {
      appendTo(tokens, token, postings);
    }
  }

  const indices: Indices = Object.freeze({
    bySystem: freezeBuckets(bySystem),
    bySeverity: freezeBuckets(bySeverity),
    tokens: freezeBuckets(tokens),
    systemLabels,
  });

  const duration = performance.now() - startTime;
  metrics.recordIndexBuild(duration);
  logger.info("index.build.end", {
    details: {
      durationMs: duration.toFixed(2),
      records: store.size,
      systems: bySystem.size,
      tokens: tokens.size,
    },
  });

  return indices;
}

function freezeBuckets<K, V>(map: Map<K, V[]>): ReadonlyMap<K, readonly V[]> {
  return new Map([...map].map(([key, values]) => [key, Object.freeze(values)]));
}
