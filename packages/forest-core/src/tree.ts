import type { LeafNode, TreeNode } from './types.js';
import type { FrequencyVector } from './vectorize.js';

/**
 * Walk one tree from the root to a leaf
 * @param root - Tree root
 * @param vector - Frequency vector of the input
 * @returns The leaf reached; absent features read as 0
 */
export function evaluateTree(root: TreeNode, vector: FrequencyVector): LeafNode {
  let node = root;
  while (node.kind === 'split') {
    node = vector.get(node.feature) <= node.threshold ? node.left : node.right;
  }
  return node;
}

export function treeDepth(root: TreeNode): number {
  if (root.kind === 'leaf') return 0;
  return 1 + Math.max(treeDepth(root.left), treeDepth(root.right));
}

export function leafCount(root: TreeNode): number {
  if (root.kind === 'leaf') return 1;
  return leafCount(root.left) + leafCount(root.right);
}
