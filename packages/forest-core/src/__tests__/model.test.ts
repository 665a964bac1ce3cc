import fs from 'node:fs';
import os from 'node:os';
import path from 'node:path';
import { afterAll, describe, expect, it } from 'vitest';
import { MalformedModelError } from '../errors.js';
import { BUNDLED_MODEL_PATH, loadModelFile, loadModelFileSync, parseModel } from '../model.js';
import { tinyAsset } from './fixtures.js';

function issuesOf(raw: unknown): Array<{ path: string; message: string }> {
  try {
    parseModel(raw);
  } catch (err) {
    if (err instanceof MalformedModelError) return [...err.issues];
    throw err;
  }
  throw new Error('expected parseModel to fail');
}

describe('parseModel', () => {
  it('builds tagged trees from arity', () => {
    const model = parseModel(tinyAsset());
    expect(model.version).toBe('test-1');
    expect(model.vocabulary.size).toBe(4);
    expect(model.vocabulary.lookup('func')).toBe(1);
    expect(model.vocabulary.lookup('nope')).toBeUndefined();
    expect(model.labels.symbols).toEqual(['python', 'go', 'ruby']);
    expect(model.forest).toHaveLength(3);
    expect(model.forest[2]).toEqual({ kind: 'leaf', label: 2, weight: 0.25 });
    expect(model.forest[0]).toEqual({
      kind: 'split',
      feature: 0,
      threshold: 0,
      left: {
        kind: 'split',
        feature: 1,
        threshold: 0,
        left: { kind: 'leaf', label: 2, weight: 0.5 },
        right: { kind: 'leaf', label: 1, weight: 1 },
      },
      right: { kind: 'leaf', label: 0, weight: 1 },
    });
  });

  it('freezes the parsed tables', () => {
    const model = parseModel(tinyAsset());
    expect(Object.isFrozen(model.forest)).toBe(true);
    expect(Object.isFrozen(model.forest[0])).toBe(true);
  });

  it('accepts an asset without a version', () => {
    const { version: _version, ...rest } = tinyAsset();
    expect(parseModel(rest).version).toBeUndefined();
  });

  it('rejects a leaf with an unknown label', () => {
    const asset = tinyAsset();
    asset.forest[2] = [9, 1];
    expect(issuesOf(asset)).toEqual([{ path: 'forest[2]', message: 'Leaf references unknown label id 9' }]);
  });

  it('rejects nodes of any other arity', () => {
    const asset = tinyAsset();
    asset.forest[0] = [0, 0, [1, 1]];
    expect(issuesOf(asset)).toEqual([
      { path: 'forest[0]', message: 'Expected a 4-element split or a 2-element leaf' },
    ]);
  });

  it('reports the path of a nested defect', () => {
    const asset = tinyAsset();
    asset.forest[0] = [0, 0, [2, 1], [5, 1, 2]];
    expect(issuesOf(asset)).toEqual([
      { path: 'forest[0].right', message: 'Expected a 4-element split or a 2-element leaf' },
    ]);
  });

  it('rejects a split on a feature outside the vocabulary', () => {
    const asset = tinyAsset();
    asset.forest[1] = [4, 1, [0, 1], [1, 1]];
    expect(issuesOf(asset)).toEqual([
      { path: 'forest[1]', message: 'Split on feature id 4 outside vocabulary of 4' },
    ]);
  });

  it('rejects non-numeric leaf fields', () => {
    const asset = tinyAsset();
    asset.forest[2] = [0, 'heavy'];
    expect(issuesOf(asset).map((issue) => issue.path)).toEqual(['forest[2][1]']);
  });

  it('rejects duplicate and non-dense vocabulary ids', () => {
    const duplicate = tinyAsset();
    duplicate.vocabulary[3] = [':', 2];
    expect(issuesOf(duplicate)).toEqual([{ path: 'vocabulary[3][1]', message: 'Duplicate feature id 2' }]);

    const sparse = tinyAsset();
    sparse.vocabulary[3] = [':', 7];
    expect(issuesOf(sparse)).toEqual([{ path: 'vocabulary[3][1]', message: 'Feature id 7 is not dense over 0..3' }]);
  });

  it('rejects label ids outside 0..n-1', () => {
    const sparse = tinyAsset();
    sparse.labels[1] = [4294967295, 'go'];
    expect(issuesOf(sparse)).toEqual([
      { path: 'labels[1][0]', message: 'Label id 4294967295 is not dense over 0..2' },
    ]);

    const large = tinyAsset();
    large.labels[2] = [1e9, 'ruby'];
    expect(issuesOf(large)).toEqual([{ path: 'labels[2][0]', message: 'Label id 1000000000 is not dense over 0..2' }]);
  });

  it('rejects duplicate language symbols', () => {
    const asset = tinyAsset();
    asset.labels[2] = [2, 'go'];
    expect(issuesOf(asset)).toEqual([{ path: 'labels[2][1]', message: 'Duplicate language go' }]);
  });

  it('rejects an empty forest', () => {
    const asset = tinyAsset();
    asset.forest = [];
    expect(issuesOf(asset)).toEqual([{ path: 'forest', message: 'Forest has no trees' }]);
  });

  it('rejects values that are not a model at all', () => {
    expect(() => parseModel(null)).toThrow(MalformedModelError);
    expect(() => parseModel({ vocabulary: [] })).toThrow(MalformedModelError);
  });

  it('names the first issue and the source in the message', () => {
    const asset = tinyAsset();
    asset.forest[2] = [9, 1];
    expect(() => parseModel(asset, 'custom.json')).toThrow(
      'Malformed model (custom.json): forest[2]: Leaf references unknown label id 9'
    );
  });
});

describe('model files', () => {
  const dir = fs.mkdtempSync(path.join(os.tmpdir(), 'langforest-model-'));

  afterAll(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it('loads the bundled model', () => {
    const model = loadModelFileSync(BUNDLED_MODEL_PATH);
    expect(model.version).toBe('2024.06.1');
    expect(model.vocabulary.size).toBe(3095);
    expect(model.forest).toHaveLength(36);
    expect(model.labels.symbols).toHaveLength(39);
    expect(model.labels.resolve(28)).toBe('python');
    expect(model.labels.resolve(13)).toBe('go');
  });

  it('loads a model file asynchronously', async () => {
    const file = path.join(dir, 'tiny.json');
    fs.writeFileSync(file, JSON.stringify(tinyAsset()));
    const model = await loadModelFile(file);
    expect(model.labels.symbols).toEqual(['python', 'go', 'ruby']);
  });

  it('reports invalid JSON as a malformed model', async () => {
    const file = path.join(dir, 'broken.json');
    fs.writeFileSync(file, '{"vocabulary": [');
    await expect(loadModelFile(file)).rejects.toBeInstanceOf(MalformedModelError);
    expect(() => loadModelFileSync(file)).toThrow(/^Malformed model \(.*broken\.json\): <root>: Invalid JSON/);
  });
});
