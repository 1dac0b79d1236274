/**
 * Tokenization shared by indexing and search
 *
 * Rule: lower-case, split on anything that is not a letter, combining mark or
 * digit, drop tokens shorter than 2 code points. No stemming; tokens match
 * exactly.
 */

// marks stay: lower-casing can decompose a letter ("İ" becomes "i" + U+0307)
const SPLIT_PATTERN = /[^\p{L}\p{M}\p{N}]+/u;

/**
 * Shortest token kept
 */
export const MIN_TOKEN_LENGTH = 2;

/**
 * Split text into normalized tokens, in text order
 *
 * @example
 * tokenize("Random/Multiple Cylinder Misfire") // ["random", "multiple", "cylinder", "misfire"]
 */
export function tokenize(text: string): string[] {
  return text
    .toLowerCase()
    .split(SPLIT_PATTERN)
    .filter((token) => [...token].length >= MIN_TOKEN_LENGTH);
}

/**
 * Tokenize a query: same rule as indexing, duplicates removed, first occurrence kept
 */
export function tokenizeQuery(query: string): string[] {
  return [...new Set(tokenize(query))];
}
