/**
 * 调度相关的共享常量
 *
 * 持久化文档的校验默认值与容量上限都从这里取，前后端保持一致
 */

import type { ForgettingCurveParams } from '../types';

/** 掌握度上限 */
export const MAX_MASTERY = 10;

/** Leitner 盒子上限 */
export const MAX_BOX = 5;

/** 单词保留的反应时间条数 */
export const RESPONSE_TIME_HISTORY_SIZE = 10;

/** 单词保留的答题结果条数 */
export const OUTCOME_HISTORY_SIZE = 10;

/** 保留的会话正确率条数 */
export const ACCURACY_TREND_SIZE = 10;

/** 会话日志容量 */
export const SESSION_LOG_SIZE = 50;

/** 置信度范围 */
export const MIN_CONFIDENCE = 0.1;
export const MAX_CONFIDENCE = 1.0;

/**
 * 个性化模型默认值
 */
export const DEFAULT_FORGETTING_CURVE_PARAMS: ForgettingCurveParams = {
  initialStrength: 1.0,
  decayRate: 0.5,
};

export const DEFAULT_FATIGUE_THRESHOLD = 0.3;

/** 秒 */
export const DEFAULT_RESPONSE_TIME_BASELINE = 3.0;

export const DEFAULT_CONFIDENCE_LEVEL = 0.5;
