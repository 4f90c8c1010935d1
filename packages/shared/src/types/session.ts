/**
 * 会话日志类型定义
 */

import type { SessionFeatures, SessionMode, SessionPrediction } from './personalization';

/**
 * 会话日志条目（每个完成的会话一条）
 */
export interface SessionLogEntry {
  sessionIndex: number;
  mode: SessionMode;
  /** 会话结束时间（毫秒时间戳） */
  timestamp: number;
  wordCount: number;
  correctCount: number;
  accuracy: number;
  /** 平均反应时间（秒） */
  avgResponseTime: number;
  /** 按答题顺序排列的逐词正确率（1 或 0） */
  wordAccuracies: number[];
  features: SessionFeatures;
  prediction: SessionPrediction;
  predictionAccuracy: number;
}

export type SessionLogDocument = SessionLogEntry[];

/**
 * 会话计数器文档
 */
export interface SessionCounterDocument {
  sessionCounter: number;
}
