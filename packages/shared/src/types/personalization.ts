/**
 * 个性化模型类型定义
 */

/**
 * 会话难度偏向
 */
export type DifficultyBias = 'challenging' | 'balanced' | 'review_heavy' | 'easy';

/**
 * 会话模式
 */
export type SessionMode = 'new' | 'revision';

/**
 * 遗忘曲线参数（目前仅持久化，调度逻辑未使用）
 */
export interface ForgettingCurveParams {
  initialStrength: number;
  decayRate: number;
}

/**
 * 单次答题结果记录
 */
export interface OutcomeRecord {
  correct: boolean;
  /** 距上次复习的天数 */
  daysSinceLast: number;
  /** 毫秒时间戳 */
  timestamp: number;
}

/**
 * 个性化模型持久化文档
 */
export interface PersonalizationModelDocument {
  forgettingCurveParams: ForgettingCurveParams;
  /** 会话内正确率下降阈值 (0,1)，超过则切换到 easy 偏向 */
  fatigueThreshold: number;
  /** 期望反应时间（秒） */
  responseTimeBaseline: number;
  /** 最近 10 次会话正确率 */
  accuracyTrends: number[];
  /** 单词 → 最近 10 次答题结果 */
  forgetRates: Record<string, OutcomeRecord[]>;
  /** 预测置信度 [0.1,1.0] */
  confidenceLevel: number;
}

/**
 * 会话规划特征
 */
export interface SessionFeatures {
  recentAccuracy: number;
  avgResponseTime: number;
  fatigueScore: number;
  forgetRate: number;
  sessionCount: number;
  /** 距上次会话的小时数，上限 168 */
  timeSinceLastSession: number;
}

/**
 * 会话预测结果
 */
export interface SessionPrediction {
  /** [8,25] */
  sessionSize: number;
  difficultyBias: DifficultyBias;
  confidence: number;
}
