import type { FeatureId, Token } from './types.js';

/**
 * Token → feature id table. Ids are dense over `0..size-1`;
 * the loader checks that before constructing one.
 */
export class Vocabulary {
  private readonly ids: ReadonlyMap<Token, FeatureId>;

  constructor(entries: Iterable<readonly [Token, FeatureId]>) {
    this.ids = new Map(entries);
  }

  get size(): number {
    return this.ids.size;
  }

  lookup(token: Token): FeatureId | undefined {
    return this.ids.get(token);
  }
}
