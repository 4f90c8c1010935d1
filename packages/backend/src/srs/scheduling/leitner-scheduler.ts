/**
 * Leitner 调度器
 *
 * 单词所在盒子决定复习间隔（以会话数计），
 * 距上次复习经过的会话数达到间隔即为"到期"。
 * box 为 0 的单词从未复习过，属于新词，永远不会到期
 */

import type { VocabularyPair, WordProgress } from '@lexiloop/shared';
import { DEFAULT_INTERVAL, LEITNER_SCHEDULE } from '../../config/scheduling';
import type { ProgressStore } from '../progress/progress-store';
import type { Vocabulary } from '../vocabulary';

/**
 * 间隔解析函数：单词 + 盒子 → 间隔（会话数）
 */
export type IntervalResolver = (word: string, box: number) => number;

/**
 * 固定间隔表中的基础间隔
 */
export function baseIntervalFor(box: number): number {
  return Object.hasOwn(LEITNER_SCHEDULE, box) ? LEITNER_SCHEDULE[box] : DEFAULT_INTERVAL;
}

export class LeitnerScheduler {
  baseInterval(box: number): number {
    return baseIntervalFor(box);
  }

  isDue(progress: Readonly<WordProgress>, currentSession: number, interval: number): boolean {
    if (progress.box <= 0) {
      return false;
    }
    return currentSession - progress.lastReviewedSession >= interval;
  }

  /**
   * 获取到期单词（保持词汇表顺序）
   *
   * @param resolveInterval 省略时使用固定间隔表
   */
  getDueWords(
    vocabulary: Vocabulary,
    store: ProgressStore,
    currentSession: number,
    resolveInterval: IntervalResolver = (_word, box) => this.baseInterval(box),
  ): VocabularyPair[] {
    return vocabulary.toPairs().filter((pair) => {
      const progress = store.get(pair.english);
      return this.isDue(progress, currentSession, resolveInterval(pair.english, progress.box));
    });
  }

  countDue(
    vocabulary: Vocabulary,
    store: ProgressStore,
    currentSession: number,
    resolveInterval?: IntervalResolver,
  ): number {
    return this.getDueWords(vocabulary, store, currentSession, resolveInterval).length;
  }
}
