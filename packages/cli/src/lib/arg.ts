/**
 * Argument parsing and validation helpers
 */

import { InvalidArgumentError } from "commander";
import type { OutputFormat } from "@dtcref/sdk";

const OUTPUT_FORMATS: readonly OutputFormat[] = ["text", "html", "json"];

/**
 * Parse a positive integer argument
 */
export function parsePositiveInt(value: string, name: string): number {
  const trimmed = value.trim();

  if (!/^\d+$/.test(trimmed)) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  const parsed = Number.parseInt(trimmed, 10);
  if (parsed < 1) {
    throw new InvalidArgumentError(`${name} must be a positive integer`);
  }

  // The corpus is small; anything above this is a typo
  if (parsed > 10000) {
    throw new InvalidArgumentError(`${name} must be <= 10000`);
  }

  return parsed;
}

/**
 * Parse an output format name (case-insensitive)
 */
export function parseFormat(value: string): OutputFormat {
  const lower = value.trim().toLowerCase();
  const format = OUTPUT_FORMATS.find((candidate) => candidate === lower);
  if (!format) {
    throw new InvalidArgumentError(`--format must be one of ${OUTPUT_FORMATS.join(", ")}`);
  }
  return format;
}

/**
 * Join variadic keyword arguments into one query string
 */
export function joinKeywords(keywords: readonly string[]): string {
  return keywords.join(" ").trim();
}
