/**
 * Search ranking strategies
 */

import type { Posting, ScoreContext, Scorer, TextField } from "./types.js";

/**
 * Weight of a match per field; description matches rank above cause and
 * action matches
 */
export const FIELD_WEIGHTS: Readonly<Record<TextField, number>> = Object.freeze({
  description: 3,
  causes: 2,
  actions: 1,
});

/**
 * Highest field weight among a token's postings
 */
function bestWeight(postings: readonly Posting[]): number {
  let best = 0;
  for (const posting of postings) {
    best = Math.max(best, FIELD_WEIGHTS[posting.field]);
  }
  return best;
}

/**
 * Sum over matched query tokens of the best field weight each token hits
 */
export const tokenSumScorer: Scorer = {
  name: "token-sum",
  score({ matches }: ScoreContext): number {
    let score = 0;
    for (const postings of matches.values()) {
      score += bestWeight(postings);
    }
    return score;
  },
};

/**
 * Token-sum plus a bonus for query words that appear next to each other
 *
 * For each adjacent pair of query tokens (a, b), every field where b sits
 * right after a adds that field's weight once.
 */
export const phraseProximityScorer: Scorer = {
  name: "phrase-proximity",
  score(context: ScoreContext): number {
    let score = tokenSumScorer.score(context);

    for (let i = 0; i + 1 < context.terms.length; i++) {
      const first = context.matches.get(context.terms[i] ?? "");
      const second = context.matches.get(context.terms[i + 1] ?? "");
      if (!first || !second) continue;

      const following = new Set(second.map((p) => `${p.field}:${p.position}`));
      const fields = new Set<TextField>();
      for (const posting of first) {
        if (following.has(`${posting.field}:${posting.position + 1}`)) {
          fields.add(posting.field);
        }
      }
      for (const field of fields) {
        score += FIELD_WEIGHTS[field];
      }
    }

    return score;
  },
};

/**
 * Built-in scorers by name
 */
export const SCORERS: Readonly<Record<string, Scorer>> = Object.freeze({
  [tokenSumScorer.name]: tokenSumScorer,
  [phraseProximityScorer.name]: phraseProximityScorer,
});
