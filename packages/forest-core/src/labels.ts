import { UnknownLabelError } from './errors.js';
import type { LabelId, LanguageSymbol } from './types.js';

/**
 * Label id → language symbol
 */
export class LabelTable {
  private readonly byId: ReadonlyArray<LanguageSymbol | undefined>;

  constructor(entries: Iterable<readonly [LabelId, LanguageSymbol]>) {
    const byId: Array<LanguageSymbol | undefined> = [];
    for (const [id, symbol] of entries) byId[id] = symbol;
    this.byId = byId;
  }

  /** One past the largest label id; sizes per-label arrays */
  get capacity(): number {
    return this.byId.length;
  }

  has(id: LabelId): boolean {
    return this.byId[id] !== undefined;
  }

  resolve(id: LabelId): LanguageSymbol {
    const symbol = this.byId[id];
    if (symbol === undefined) throw new UnknownLabelError(id);
    return symbol;
  }

  /** All symbols in id order */
  get symbols(): LanguageSymbol[] {
    return this.byId.filter((symbol): symbol is LanguageSymbol => symbol !== undefined);
  }

  entries(): Array<[LabelId, LanguageSymbol]> {
    const out: Array<[LabelId, LanguageSymbol]> = [];
    this.byId.forEach((symbol, id) => {
      if (symbol !== undefined) out.push([id, symbol]);
    });
    return out;
  }
}
