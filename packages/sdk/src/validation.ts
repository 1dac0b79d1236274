/**
 * Validation and normalization for corpus records and query arguments
 */

import {
  SEVERITIES,
  CATEGORY_BY_PREFIX,
  type CodeRecord,
  type RawRecord,
  type Severity,
  type CategoryPrefix,
} from "./types.js";
import { LoadError, InvalidQueryError } from "./errors.js";

/**
 * Valid code: category prefix followed by four hex digits (after upper-casing)
 */
const CODE_PATTERN = /^[PCBU][0-9A-F]{4}$/;

const SEVERITY_BY_LOWER = new Map<string, Severity>(
  SEVERITIES.map((severity) => [severity.toLowerCase(), severity])
);

/**
 * Normalize a code for lookup: trim and upper-case
 */
export function normalizeCode(code: string): string {
  return code.trim().toUpperCase();
}

/**
 * Check whether a normalized code matches the code pattern
 */
export function isValidCode(code: string): boolean {
  return CODE_PATTERN.test(code);
}

function isCategoryPrefix(value: string): value is CategoryPrefix {
  return Object.hasOwn(CATEGORY_BY_PREFIX, value);
}

/**
 * Parse a severity token case-insensitively
 * @returns Canonical severity, or undefined if the token is not a severity
 */
export function parseSeverity(token: string): Severity | undefined {
  return SEVERITY_BY_LOWER.get(token.trim().toLowerCase());
}

/**
 * Position of a severity in the severity order (Low = 0)
 */
export function severityRank(severity: Severity): number {
  return SEVERITIES.indexOf(severity);
}

/**
 * Collapse whitespace in a system label
 */
export function normalizeSystem(system: string): string {
  return system.trim().replace(/\s+/g, " ");
}

/**
 * Index key for a system label
 */
export function systemKey(system: string): string {
  return normalizeSystem(system).toLowerCase();
}

/**
 * Severity argument of a query
 * @throws InvalidQueryError if the value is not a severity
 */
export function validateSeverityArg(value: string, label: string): Severity {
  const severity = parseSeverity(value);
  if (!severity) {
    throw new InvalidQueryError(
      `${label} must be one of ${SEVERITIES.join(", ")} (got "${value}")`
    );
  }
  return severity;
}

/**
 * Validate a raw record and turn it into a frozen CodeRecord
 * @throws LoadError on malformed code, empty description, unknown severity or missing fields
 */
export function validateRecord(raw: RawRecord): CodeRecord {
  const codeLine = raw.lines.code ?? raw.line;
  const code = normalizeCode(raw.code);
  const prefix = code.charAt(0);

  if (!isValidCode(code) || !isCategoryPrefix(prefix)) {
    throw new LoadError(
      codeLine,
      `malformed code "${raw.code}" (expected a P, C, B or U prefix followed by four hex digits)`,
      "malformed-code"
    );
  }

  if (raw.description === undefined) {
    throw new LoadError(raw.line, `record ${code} has no Description`, "missing-field");
  }
  const description = raw.description.trim();
  if (description.length === 0) {
    throw new LoadError(
      raw.lines.description ?? raw.line,
      `record ${code} has an empty description`,
      "empty-description"
    );
  }

  if (raw.severity === undefined) {
    throw new LoadError(raw.line, `record ${code} has no Severity`, "missing-field");
  }
  const severity = parseSeverity(raw.severity);
  if (!severity) {
    throw new LoadError(
      raw.lines.severity ?? raw.line,
      `unrecognized severity "${raw.severity}" for ${code} (expected ${SEVERITIES.join(", ")})`,
      "unknown-severity"
    );
  }

  const system = raw.system === undefined ? "" : normalizeSystem(raw.system);
  if (system.length === 0) {
    throw new LoadError(
      raw.lines.system ?? raw.line,
      `record ${code} has no System`,
      "missing-field"
    );
  }

  return Object.freeze({
    code,
    category: CATEGORY_BY_PREFIX[prefix],
    description,
    severity,
    system,
    causes: Object.freeze(cleanItems(raw.causes)),
    actions: Object.freeze(cleanItems(raw.actions)),
  });
}

function cleanItems(items: string[]): string[] {
  return items.map((item) => item.trim()).filter((item) => item.length > 0);
}
