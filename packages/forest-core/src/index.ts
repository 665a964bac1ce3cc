export { tokenize, tokens, type TokenGroups } from './tokenize.js';
export { Vocabulary } from './vocabulary.js';
export { vectorize, nonZeroEntries, FREQUENCY_SCALE, type FrequencyVector } from './vectorize.js';
export { evaluateTree, treeDepth, leafCount } from './tree.js';
export { aggregate, type ForestResult } from './forest.js';
export { LabelTable } from './labels.js';
export {
  parseModel,
  loadModelFile,
  loadModelFileSync,
  defaultModel,
  loadDefaultModel,
  BUNDLED_MODEL_PATH,
  type Model,
  type ModelAsset,
} from './model.js';
export {
  Classifier,
  classifyText,
  classifyBuffer,
  rankText,
  readSource,
  type Ranking,
  type RankedLanguage,
  type TextBuffer,
  type TextSource,
} from './classifier.js';
export {
  LangForestError,
  EmptyInputError,
  MalformedModelError,
  UnknownLabelError,
  type LangForestErrorCode,
  type ModelIssue,
} from './errors.js';
export { createLogger, logger, formatData, type Logger, type LogData, type LoggerOptions } from './logger.js';
export { loadConfig, type LangForestConfig, type LogLevel, type LogFormat } from './config.js';
export type {
  Token,
  FeatureId,
  LabelId,
  LanguageSymbol,
  TreeNode,
  SplitNode,
  LeafNode,
  Forest,
  Vote,
} from './types.js';
