/**
 * 单词学习进度存储
 *
 * 规则:
 * - 答对: mastery+1 (上限10)，box+1 (上限5)
 * - 答错: mastery-1 (下限0)，box-1 但不低于1；从未复习过的单词答错后进入盒子1
 * - 只保留最近 10 次反应时间
 *
 * 进度条目只会被创建和修改，不会删除
 */

import {
  createDefaultWordProgress,
  MAX_BOX,
  MAX_MASTERY,
  RESPONSE_TIME_HISTORY_SIZE,
  type ProgressDocument,
  type WordProgress,
} from '@lexiloop/shared';
import type { Vocabulary } from '../vocabulary';

export class ProgressStore {
  private readonly entries = new Map<string, WordProgress>();

  constructor(entries: Iterable<[string, WordProgress]> = []) {
    for (const [word, progress] of entries) {
      this.entries.set(word, cloneProgress(progress));
    }
  }

  /**
   * 从持久化文档恢复
   *
   * 词汇表中的每个单词都会有条目；文档中同名键的状态被合并进来。
   * 文档中存在但词汇表已不包含的单词也会保留，避免词库临时变动时丢失进度
   */
  static fromDocument(vocabulary: Vocabulary, document: ProgressDocument): ProgressStore {
    const store = new ProgressStore();
    for (const word of vocabulary.words()) {
      store.entries.set(
        word,
        Object.hasOwn(document, word) ? cloneProgress(document[word]) : createDefaultWordProgress(),
      );
    }
    for (const [word, progress] of Object.entries(document)) {
      if (!store.entries.has(word)) {
        store.entries.set(word, cloneProgress(progress));
      }
    }
    return store;
  }

  get size(): number {
    return this.entries.size;
  }

  has(word: string): boolean {
    return this.entries.has(word);
  }

  /**
   * 获取单词进度，不存在时创建默认条目
   */
  get(word: string): Readonly<WordProgress> {
    return this.ensure(word);
  }

  /**
   * 记录一次答题结果
   *
   * @param responseTime 反应时间（秒）
   * @param sessionIndex 当前会话序号
   * @param timestamp 毫秒时间戳
   */
  record(
    word: string,
    correct: boolean,
    responseTime: number,
    sessionIndex: number,
    timestamp: number,
  ): Readonly<WordProgress> {
    const entry = this.ensure(word);

    entry.attempts += 1;
    entry.lastReviewedSession = sessionIndex;
    entry.lastReviewTimestamp = timestamp;

    if (correct) {
      entry.correct += 1;
      entry.mastery = Math.min(MAX_MASTERY, entry.mastery + 1);
      entry.box = Math.min(MAX_BOX, entry.box + 1);
    } else {
      entry.mastery = Math.max(0, entry.mastery - 1);
      entry.box = entry.box > 0 ? Math.max(1, entry.box - 1) : 1;
    }

    entry.responseTimes.push(responseTime);
    if (entry.responseTimes.length > RESPONSE_TIME_HISTORY_SIZE) {
      entry.responseTimes.splice(0, entry.responseTimes.length - RESPONSE_TIME_HISTORY_SIZE);
    }

    return entry;
  }

  toDocument(): ProgressDocument {
    const document: ProgressDocument = {};
    for (const [word, progress] of this.entries) {
      document[word] = cloneProgress(progress);
    }
    return document;
  }

  private ensure(word: string): WordProgress {
    let entry = this.entries.get(word);
    if (!entry) {
      entry = createDefaultWordProgress();
      this.entries.set(word, entry);
    }
    return entry;
  }
}

function cloneProgress(progress: WordProgress): WordProgress {
  return { ...progress, responseTimes: [...progress.responseTimes] };
}
