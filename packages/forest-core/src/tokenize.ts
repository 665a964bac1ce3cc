/**
 * Text tokenization utilities
 */

import type { Token } from './types.js';

// A word is a run of ASCII letters, digits and underscore; a symbol is a run of
// anything that is neither a word character nor whitespace.
const SINGLE = /[A-Za-z0-9_]+|[^A-Za-z0-9_\s]+/g;

export interface TokenGroups {
  singles: Token[];
  pairs: Token[];
}

/**
 * Split text into single tokens and adjacent-pair bigrams
 * @param text - Raw input
 * @returns Singles in scan order, and one bigram per adjacent pair of singles
 */
export function tokenize(text: string): TokenGroups {
  const singles: Token[] = text.match(SINGLE) ?? [];
  const pairs: Token[] = [];

  for (let i = 0; i + 1 < singles.length; i++) {
    pairs.push(`${singles[i]} ${singles[i + 1]}`);
  }

  return { singles, pairs };
}

/**
 * Full token sequence fed to the vectorizer: all singles, then all pairs
 */
export function tokens(text: string): Token[] {
  const { singles, pairs } = tokenize(text);
  return singles.concat(pairs);
}
