export type Token = string;
export type FeatureId = number;
export type LabelId = number;
export type LanguageSymbol = string;

/**
 * Decision tree node, tagged at load time.
 * Splits send `value <= threshold` left, everything else right.
 */
export type TreeNode = SplitNode | LeafNode;

export interface SplitNode {
  readonly kind: 'split';
  readonly feature: FeatureId;
  readonly threshold: number;
  readonly left: TreeNode;
  readonly right: TreeNode;
}

export interface LeafNode {
  readonly kind: 'leaf';
  readonly label: LabelId;
  readonly weight: number;
}

export type Forest = readonly TreeNode[];

export interface Vote {
  label: LabelId;
  total: number;
}
