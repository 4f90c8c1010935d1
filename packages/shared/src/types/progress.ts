/**
 * 单词学习进度类型定义
 */

/**
 * 单词学习进度
 *
 * - mastery: 掌握度 [0,10]
 * - box: Leitner 盒子 [0,5]，0 表示从未复习
 * - lastReviewedSession: 最近一次复习所在的会话序号
 * - lastReviewTimestamp: 最近一次复习的时间（毫秒时间戳），从未复习为 null
 * - responseTimes: 最近 10 次反应时间（秒），按时间先后排列
 */
export interface WordProgress {
  mastery: number;
  attempts: number;
  correct: number;
  box: number;
  lastReviewedSession: number;
  lastReviewTimestamp: number | null;
  responseTimes: number[];
}

/**
 * 进度文档：单词 → 进度
 */
export type ProgressDocument = Record<string, WordProgress>;
