/**
 * End-to-end classification: text → language symbol
 */

import { aggregate } from './forest.js';
import { defaultModel, type Model } from './model.js';
import { tokens } from './tokenize.js';
import type { LanguageSymbol } from './types.js';
import { vectorize } from './vectorize.js';

export interface RankedLanguage {
  language: LanguageSymbol;
  /** Sum of the leaf weights that voted for this language */
  total: number;
}

export interface Ranking {
  language: LanguageSymbol;
  /** Every language that received a vote, best first */
  ranked: RankedLanguage[];
  tokenCount: number;
  recognized: number;
}

/** Anything whose full text can be read at once, such as an editor document. */
export interface TextBuffer {
  getText(): string;
}

export type TextSource = string | Uint8Array | TextBuffer;

const utf8 = new TextDecoder('utf-8');

export function readSource(source: TextSource): string {
  if (typeof source === 'string') return source;
  if (source instanceof Uint8Array) return utf8.decode(source);
  return source.getText();
}

/**
 * Language detection bound to one loaded model
 */
export class Classifier {
  constructor(readonly model: Model) {}

  /**
   * Rank languages by forest vote
   * @throws EmptyInputError when the text has no tokens
   */
  rank(text: string): Ranking {
    const { vocabulary, forest, labels } = this.model;
    const vector = vectorize(tokens(text), vocabulary);
    const { winner, votes } = aggregate(forest, vector, labels.capacity);

    return {
      language: labels.resolve(winner),
      ranked: votes.map((vote) => ({ language: labels.resolve(vote.label), total: vote.total })),
      tokenCount: vector.tokenCount,
      recognized: vector.recognized,
    };
  }

  /**
   * @throws EmptyInputError when the text has no tokens
   */
  classify(text: string): LanguageSymbol {
    const { vocabulary, forest, labels } = this.model;
    const vector = vectorize(tokens(text), vocabulary);
    return labels.resolve(aggregate(forest, vector, labels.capacity).winner);
  }

  classifyBuffer(source: TextSource): LanguageSymbol {
    return this.classify(readSource(source));
  }

  get languages(): LanguageSymbol[] {
    return this.model.labels.symbols;
  }
}

let shared: Classifier | undefined;

function classifierFor(model?: Model): Classifier {
  if (model) return new Classifier(model);
  shared ??= new Classifier(defaultModel());
  return shared;
}

export function classifyText(text: string, model?: Model): LanguageSymbol {
  return classifierFor(model).classify(text);
}

export function classifyBuffer(source: TextSource, model?: Model): LanguageSymbol {
  return classifierFor(model).classifyBuffer(source);
}

export function rankText(text: string, model?: Model): Ranking {
  return classifierFor(model).rank(text);
}
