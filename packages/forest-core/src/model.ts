/**
 * Model asset loading and validation
 *
 * The asset is JSON with three tables: `vocabulary` as `[token, id]` pairs,
 * `forest` as nested arrays where a 4-element array is a split
 * `[feature, threshold, left, right]` and a 2-element array is a leaf
 * `[label, weight]`, and `labels` as `[id, symbol]` pairs. Arity is resolved
 * into tagged nodes here and nowhere else.
 */

import fs from 'node:fs';
import { readFile } from 'node:fs/promises';
import { fileURLToPath } from 'node:url';
import { z } from 'zod';
import { loadConfig } from './config.js';
import { MalformedModelError, type ModelIssue } from './errors.js';
import { LabelTable } from './labels.js';
import { logger } from './logger.js';
import type { Forest, LeafNode, SplitNode, TreeNode } from './types.js';
import { Vocabulary } from './vocabulary.js';

export interface Model {
  readonly version: string | undefined;
  readonly vocabulary: Vocabulary;
  readonly forest: Forest;
  readonly labels: LabelTable;
}

export const BUNDLED_MODEL_PATH = fileURLToPath(new URL('../model/model.json', import.meta.url));

const log = logger.child('model');

const FeatureIdSchema = z.number().int().nonnegative();
const LabelIdSchema = z.number().int().nonnegative();

const ModelAssetSchema = z.object({
  version: z.string().optional(),
  vocabulary: z.array(z.tuple([z.string().min(1), FeatureIdSchema])),
  forest: z.array(z.unknown()).min(1, 'Forest has no trees'),
  labels: z.array(z.tuple([LabelIdSchema, z.string().min(1)])).min(1, 'Label table is empty'),
});

const SplitSchema = z.tuple([FeatureIdSchema, z.number().finite(), z.unknown(), z.unknown()]);
const LeafSchema = z.tuple([LabelIdSchema, z.number().finite()]);

export type ModelAsset = z.infer<typeof ModelAssetSchema>;

function joinPath(base: string, segments: ReadonlyArray<string | number>): string {
  return segments.reduce<string>(
    (acc, seg) => (typeof seg === 'number' ? `${acc}[${seg}]` : acc ? `${acc}.${seg}` : seg),
    base
  );
}

function zodIssues(error: z.ZodError, base: string): ModelIssue[] {
  return error.issues.map((issue) => ({ path: joinPath(base, issue.path), message: issue.message }));
}

interface TreeContext {
  vocabularySize: number;
  labels: LabelTable;
  issues: ModelIssue[];
}

function parseTree(raw: unknown, path: string, ctx: TreeContext): TreeNode | undefined {
  if (!Array.isArray(raw) || (raw.length !== 4 && raw.length !== 2)) {
    ctx.issues.push({ path, message: 'Expected a 4-element split or a 2-element leaf' });
    return undefined;
  }

  if (raw.length === 2) {
    const leaf = LeafSchema.safeParse(raw);
    if (!leaf.success) {
      ctx.issues.push(...zodIssues(leaf.error, path));
      return undefined;
    }
    const [label, weight] = leaf.data;
    if (!ctx.labels.has(label)) {
      ctx.issues.push({ path, message: `Leaf references unknown label id ${label}` });
      return undefined;
    }
    const node: LeafNode = { kind: 'leaf', label, weight };
    return Object.freeze(node);
  }

  const split = SplitSchema.safeParse(raw);
  if (!split.success) {
    ctx.issues.push(...zodIssues(split.error, path));
    return undefined;
  }
  const [feature, threshold, rawLeft, rawRight] = split.data;
  if (feature >= ctx.vocabularySize) {
    ctx.issues.push({ path, message: `Split on feature id ${feature} outside vocabulary of ${ctx.vocabularySize}` });
  }
  const left = parseTree(rawLeft, `${path}.left`, ctx);
  const right = parseTree(rawRight, `${path}.right`, ctx);
  if (!left || !right || feature >= ctx.vocabularySize) return undefined;

  const node: SplitNode = { kind: 'split', feature, threshold, left, right };
  return Object.freeze(node);
}

function checkVocabulary(entries: ModelAsset['vocabulary'], issues: ModelIssue[]): void {
  const tokens = new Set<string>();
  const ids = new Set<number>();
  entries.forEach(([token, id], i) => {
    if (tokens.has(token)) issues.push({ path: `vocabulary[${i}][0]`, message: `Duplicate token ${JSON.stringify(token)}` });
    if (ids.has(id)) issues.push({ path: `vocabulary[${i}][1]`, message: `Duplicate feature id ${id}` });
    if (id >= entries.length) {
      issues.push({ path: `vocabulary[${i}][1]`, message: `Feature id ${id} is not dense over 0..${entries.length - 1}` });
    }
    tokens.add(token);
    ids.add(id);
  });
}

function checkLabels(entries: ModelAsset['labels'], issues: ModelIssue[]): void {
  const ids = new Set<number>();
  const symbols = new Set<string>();
  entries.forEach(([id, symbol], i) => {
    if (ids.has(id)) issues.push({ path: `labels[${i}][0]`, message: `Duplicate label id ${id}` });
    if (symbols.has(symbol)) issues.push({ path: `labels[${i}][1]`, message: `Duplicate language ${symbol}` });
    if (id >= entries.length) {
      issues.push({ path: `labels[${i}][0]`, message: `Label id ${id} is not dense over 0..${entries.length - 1}` });
    }
    ids.add(id);
    symbols.add(symbol);
  });
}

/**
 * Validate a decoded asset and build the model tables
 * @param raw - Decoded JSON
 * @param source - Where the asset came from, for error messages
 * @throws MalformedModelError listing every issue found
 */
export function parseModel(raw: unknown, source?: string): Model {
  const asset = ModelAssetSchema.safeParse(raw);
  if (!asset.success) throw new MalformedModelError(zodIssues(asset.error, ''), source);

  const issues: ModelIssue[] = [];
  checkVocabulary(asset.data.vocabulary, issues);
  checkLabels(asset.data.labels, issues);
  if (issues.length > 0) throw new MalformedModelError(issues, source);

  const vocabulary = new Vocabulary(asset.data.vocabulary);
  const labels = new LabelTable(asset.data.labels);
  const ctx: TreeContext = { vocabularySize: vocabulary.size, labels, issues };

  const forest: TreeNode[] = [];
  asset.data.forest.forEach((rawTree, i) => {
    const tree = parseTree(rawTree, `forest[${i}]`, ctx);
    if (tree) forest.push(tree);
  });
  if (issues.length > 0) throw new MalformedModelError(issues, source);

  return { version: asset.data.version, vocabulary, forest: Object.freeze(forest), labels };
}

function decode(text: string, source: string): unknown {
  try {
    return JSON.parse(text);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new MalformedModelError([{ path: '', message: `Invalid JSON: ${message}` }], source);
  }
}

function logLoaded(model: Model, source: string, started: number): void {
  log.debug('model loaded', {
    source,
    version: model.version ?? 'unversioned',
    vocabulary: model.vocabulary.size,
    trees: model.forest.length,
    labels: model.labels.symbols.length,
    ms: Date.now() - started,
  });
}

export function loadModelFileSync(path: string): Model {
  const started = Date.now();
  const model = parseModel(decode(fs.readFileSync(path, 'utf8'), path), path);
  logLoaded(model, path, started);
  return model;
}

export async function loadModelFile(path: string): Promise<Model> {
  const started = Date.now();
  const model = parseModel(decode(await readFile(path, 'utf8'), path), path);
  logLoaded(model, path, started);
  return model;
}

function defaultModelPath(): string {
  return loadConfig().modelPath ?? BUNDLED_MODEL_PATH;
}

let cached: Model | undefined;
let pending: Promise<Model> | undefined;

/**
 * Process-wide model, built on first use from `LANGFOREST_MODEL` or the bundled asset
 */
export function defaultModel(): Model {
  cached ??= loadModelFileSync(defaultModelPath());
  return cached;
}

/**
 * Async variant of `defaultModel()`; concurrent callers share one load
 */
export function loadDefaultModel(): Promise<Model> {
  if (cached) return Promise.resolve(cached);
  pending ??= loadModelFile(defaultModelPath()).then(
    (model) => {
      cached ??= model;
      return cached;
    },
    (err: unknown) => {
      pending = undefined;
      throw err;
    }
  );
  return pending;
}
