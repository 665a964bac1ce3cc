/**
 * Frequency vectorization over vocabulary ids
 */

import { EmptyInputError } from './errors.js';
import type { FeatureId, Token } from './types.js';
import type { Vocabulary } from './vocabulary.js';

/** Mass spread over the tokens of one input. */
export const FREQUENCY_SCALE = 1000;

export interface FrequencyVector {
  /** Dense per-feature totals, indexed by feature id */
  readonly values: Float64Array;
  /** Every token seen, known or not */
  readonly tokenCount: number;
  /** Tokens that resolved to a feature id */
  readonly recognized: number;
  get(feature: FeatureId): number;
}

/**
 * Build the frequency vector for a token sequence
 * @param tokens - Singles followed by pairs, as produced by `tokens()`
 * @param vocabulary - Feature id lookup
 * @returns Vector whose mass is `1000 * recognized / tokenCount`
 * @throws EmptyInputError when the sequence is empty
 */
export function vectorize(tokens: readonly Token[], vocabulary: Vocabulary): FrequencyVector {
  const tokenCount = tokens.length;
  if (tokenCount === 0) throw new EmptyInputError();

  const increment = FREQUENCY_SCALE / tokenCount;
  const values = new Float64Array(vocabulary.size);
  let recognized = 0;

  for (const token of tokens) {
    const id = vocabulary.lookup(token);
    if (id === undefined) continue;
    values[id] += increment;
    recognized++;
  }

  return {
    values,
    tokenCount,
    recognized,
    get(feature) {
      return values[feature] ?? 0;
    },
  };
}

/**
 * Non-zero entries of a vector, by feature id
 */
export function nonZeroEntries(vector: FrequencyVector): Array<[FeatureId, number]> {
  const out: Array<[FeatureId, number]> = [];
  vector.values.forEach((value, id) => {
    if (value > 0) out.push([id, value]);
  });
  return out;
}
