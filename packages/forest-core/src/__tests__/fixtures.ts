import type { ModelAsset } from '../model.js';
import type { LeafNode, TreeNode } from '../types.js';

export const leaf = (label: number, weight = 1): LeafNode => ({ kind: 'leaf', label, weight });

export const split = (feature: number, threshold: number, left: TreeNode, right: TreeNode): TreeNode => ({
  kind: 'split',
  feature,
  threshold,
  left,
  right,
});

/**
 * Three-tree model over four features and three languages.
 * Fresh object per call so tests can mutate it.
 */
export function tinyAsset(): ModelAsset {
  return {
    version: 'test-1',
    vocabulary: [
      ['def', 0],
      ['func', 1],
      ['package', 2],
      [':', 3],
    ],
    forest: [
      [0, 0, [1, 0, [2, 0.5], [1, 1]], [0, 1]],
      [2, 10, [3, 0, [2, 1], [0, 0.5]], [1, 1]],
      [2, 0.25],
    ],
    labels: [
      [0, 'python'],
      [1, 'go'],
      [2, 'ruby'],
    ],
  };
}
