/**
 * FuzzyMatcher - subsequence scorer backed by fzf's v2 algorithm.
 *
 * A query matches only when every character appears in the text in order.
 * Contiguous runs and word/camelCase boundaries score higher. Matching is
 * case-sensitive and accents are not folded; callers that want
 * case-insensitive matching lowercase both sides first.
 */

import { Fzf } from 'fzf';

export interface ScoredIndex {
  /** Position of the text in the scored list */
  index: number;
  score: number;
}

export class FuzzyMatcher {
  /**
   * Score one text. Returns null when the query is not a subsequence.
   */
  score(text: string, query: string): number | null {
    const [hit] = this.scoreAll([text], query);
    return hit ? hit.score : null;
  }

  /**
   * Score every text in one pass. Only matching texts are returned, in input order.
   */
  scoreAll(texts: readonly string[], query: string): ScoredIndex[] {
    const indices = texts.map((_, i) => i);
    const fzf = new Fzf(indices, {
      selector: (i: number) => texts[i],
      casing: 'case-sensitive',
      normalize: false,
      sort: false,
    });

    return fzf
      .find(query)
      .map((result) => ({ index: result.item, score: result.score }))
      .sort((a, b) => a.index - b.index);
  }
}

export const defaultMatcher = new FuzzyMatcher();
