/**
 * Weighted vote aggregation across the forest
 */

import { evaluateTree } from './tree.js';
import type { Forest, LabelId, Vote } from './types.js';
import type { FrequencyVector } from './vectorize.js';

export interface ForestResult {
  winner: LabelId;
  /** Voted labels by total (desc); equal totals stay in first-vote order */
  votes: Vote[];
}

/**
 * Evaluate every tree and pick the label with the greatest total weight
 *
 * Labels are remembered in the order they first receive a vote, and the winner
 * only changes on a strictly greater total. Among equal maxima, the label that
 * first voted in forest order wins.
 *
 * @param forest - Trees in model order
 * @param vector - Frequency vector of the input
 * @param labelCount - Upper bound (exclusive) on label ids
 */
export function aggregate(forest: Forest, vector: FrequencyVector, labelCount: number): ForestResult {
  const totals = new Float64Array(labelCount);
  const seen = new Uint8Array(labelCount);
  const order: LabelId[] = [];

  for (const tree of forest) {
    const leaf = evaluateTree(tree, vector);
    if (!seen[leaf.label]) {
      seen[leaf.label] = 1;
      order.push(leaf.label);
    }
    totals[leaf.label] += leaf.weight;
  }

  if (order.length === 0) {
    throw new RangeError('Cannot aggregate an empty forest');
  }

  let winner = order[0];
  for (const label of order) {
    if (totals[label] > totals[winner]) winner = label;
  }

  // Array.prototype.sort is stable, so ties keep first-vote order
  const votes = order
    .map((label) => ({ label, total: totals[label] }))
    .sort((a, b) => b.total - a.total);

  return { winner, votes };
}
