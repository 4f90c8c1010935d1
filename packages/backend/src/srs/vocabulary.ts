/**
 * 词汇表
 *
 * 以规范化英文为键；重复的键只保留一个条目（位置取首次出现，译文取最后一次）
 */

import type { VocabularyPair } from '@lexiloop/shared';

export class Vocabulary {
  private readonly pairs = new Map<string, string>();

  constructor(pairs: Iterable<VocabularyPair> = []) {
    for (const pair of pairs) {
      this.pairs.set(pair.english, pair.spanish);
    }
  }

  get size(): number {
    return this.pairs.size;
  }

  has(english: string): boolean {
    return this.pairs.has(english);
  }

  translationOf(english: string): string | undefined {
    return this.pairs.get(english);
  }

  pairOf(english: string): VocabularyPair | undefined {
    const spanish = this.pairs.get(english);
    return spanish === undefined ? undefined : { english, spanish };
  }

  words(): string[] {
    return [...this.pairs.keys()];
  }

  translations(): string[] {
    return [...this.pairs.values()];
  }

  toPairs(): VocabularyPair[] {
    return [...this.pairs].map(([english, spanish]) => ({ english, spanish }));
  }
}
