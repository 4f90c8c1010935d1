/**
 * 间隔重复调度参数
 *
 * Leitner 盒子间隔以"会话数"而不是天数计
 */

import type { DifficultyBias } from '@lexiloop/shared';

/**
 * 盒子 → 复习间隔（会话数）
 */
export const LEITNER_SCHEDULE: Readonly<Record<number, number>> = {
  1: 1,
  2: 2,
  3: 4,
  4: 7,
  5: 15,
};

/** 未映射盒子的默认间隔 */
export const DEFAULT_INTERVAL = 15;

// ==================== 个性化间隔 ====================

/** 至少有这么多条答题记录才启用个性化间隔 */
export const MIN_OUTCOMES_FOR_PERSONALIZATION = 3;

/** 计算成功率时回看的答题记录条数（分母固定） */
export const PERSONALIZATION_WINDOW = 5;

export const INTERVAL_MULTIPLIERS = {
  strong: { minRate: 0.9, multiplier: 1.5 },
  steady: { minRate: 0.7, multiplier: 1.0 },
  weak: { multiplier: 0.6 },
} as const;

// ==================== 特征提取 ====================

export const DEFAULT_RECENT_ACCURACY = 0.75;
export const RECENT_ACCURACY_WINDOW = 3;

/** 秒 */
export const DEFAULT_AVG_RESPONSE_TIME = 3.0;
export const RESPONSE_TIME_WINDOW = 5;

/** 逐词正确率序列超过该长度才计算疲劳 */
export const MIN_FATIGUE_SEQUENCE = 5;

/** 判定为"易遗忘"的单词正确率上限 */
export const FORGET_ACCURACY_THRESHOLD = 0.8;

/** 小时 */
export const DEFAULT_HOURS_SINCE_LAST_SESSION = 24;
export const MAX_HOURS_SINCE_LAST_SESSION = 168;

// ==================== 会话预测 ====================

export const BASE_SESSION_SIZE = 15;
export const MIN_SESSION_SIZE = 8;
export const MAX_SESSION_SIZE = 25;

/** 长时间未学习（小时），强制复习偏向 */
export const LONG_GAP_HOURS = 48;

/** 间隔过短（小时），缩小会话 */
export const SHORT_GAP_HOURS = 4;

// ==================== 选词比例 ====================

export interface BucketProportions {
  new: number;
  struggling: number;
  progressing: number;
  strong: number;
}

/**
 * 偏向 → 各桶占比
 */
export const BIAS_PROPORTIONS: Readonly<Record<DifficultyBias, BucketProportions>> = {
  challenging: { new: 0.5, struggling: 0.2, progressing: 0.25, strong: 0.05 },
  review_heavy: { new: 0.2, struggling: 0.5, progressing: 0.25, strong: 0.05 },
  easy: { new: 0.3, struggling: 0.3, progressing: 0.3, strong: 0.1 },
  balanced: { new: 0.4, struggling: 0.3, progressing: 0.25, strong: 0.05 },
};

// ==================== 测验 ====================

export const QUIZ_OPTION_COUNT = 4;
export const QUIZ_MAX_DRAWS = 20;

/** 掌握度达到该值视为"已掌握" */
export const MASTERED_THRESHOLD = 8;

/** 进度汇总展示的单词数 */
export const SUMMARY_TOP_WORDS = 10;
