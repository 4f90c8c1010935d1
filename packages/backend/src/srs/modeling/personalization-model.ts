/**
 * 个性化模型
 *
 * 基于规则的启发式模型（非训练模型）：
 * - 按单词最近答题成功率伸缩复习间隔
 * - 从会话日志提取学习者特征
 * - 规则级联预测下一次会话的大小与难度偏向
 * - 根据预测与实际表现的吻合程度自调整置信度
 */

import {
  ACCURACY_TREND_SIZE,
  createDefaultPersonalizationDocument,
  MAX_CONFIDENCE,
  MIN_CONFIDENCE,
  OUTCOME_HISTORY_SIZE,
  type DifficultyBias,
  type ForgettingCurveParams,
  type OutcomeRecord,
  type PersonalizationModelDocument,
  type SessionFeatures,
  type SessionPrediction,
} from '@lexiloop/shared';
import {
  BASE_SESSION_SIZE,
  DEFAULT_AVG_RESPONSE_TIME,
  DEFAULT_HOURS_SINCE_LAST_SESSION,
  DEFAULT_RECENT_ACCURACY,
  FORGET_ACCURACY_THRESHOLD,
  INTERVAL_MULTIPLIERS,
  LONG_GAP_HOURS,
  MAX_HOURS_SINCE_LAST_SESSION,
  MAX_SESSION_SIZE,
  MIN_FATIGUE_SEQUENCE,
  MIN_OUTCOMES_FOR_PERSONALIZATION,
  MIN_SESSION_SIZE,
  PERSONALIZATION_WINDOW,
  RECENT_ACCURACY_WINDOW,
  RESPONSE_TIME_WINDOW,
  SHORT_GAP_HOURS,
} from '../../config/scheduling';
import { clamp, mean, roundHalfEven } from '../common/math';
import { RingBuffer } from '../common/ring-buffer';
import type { ProgressStore } from '../progress/progress-store';
import { baseIntervalFor } from '../scheduling/leitner-scheduler';
import type { SessionLog } from '../session/session-log';
import type { Vocabulary } from '../vocabulary';

const MS_PER_HOUR = 3_600_000;

export class PersonalizationModel {
  private forgettingCurveParams: ForgettingCurveParams;
  private fatigueThreshold: number;
  private responseTimeBaseline: number;
  private accuracyTrends: RingBuffer<number>;
  private forgetRates = new Map<string, RingBuffer<OutcomeRecord>>();
  private confidenceLevel: number;

  constructor(document: PersonalizationModelDocument = createDefaultPersonalizationDocument()) {
    this.forgettingCurveParams = { ...document.forgettingCurveParams };
    this.fatigueThreshold = document.fatigueThreshold;
    this.responseTimeBaseline = document.responseTimeBaseline;
    this.accuracyTrends = RingBuffer.from(document.accuracyTrends, ACCURACY_TREND_SIZE);
    for (const [word, records] of Object.entries(document.forgetRates)) {
      this.forgetRates.set(
        word,
        RingBuffer.from(
          records.map((record) => ({ ...record })),
          OUTCOME_HISTORY_SIZE,
        ),
      );
    }
    this.confidenceLevel = clamp(document.confidenceLevel, MIN_CONFIDENCE, MAX_CONFIDENCE);
  }

  // ==================== 访问器 ====================

  getConfidence(): number {
    return this.confidenceLevel;
  }

  getAccuracyTrends(): number[] {
    return this.accuracyTrends.toArray();
  }

  getOutcomes(word: string): OutcomeRecord[] {
    return this.forgetRates.get(word)?.toArray() ?? [];
  }

  // ==================== 个性化间隔 ====================

  /**
   * 个性化复习间隔
   *
   * 答题记录不足 3 条时返回基础间隔；否则取最近 5 条，
   * 成功率 = 答对次数 / 5，按成功率选择乘数后向下取整（至少为 1）
   */
  personalizedInterval(word: string, box: number): number {
    const base = baseIntervalFor(box);
    const history = this.forgetRates.get(word);
    if (!history || history.size < MIN_OUTCOMES_FOR_PERSONALIZATION) {
      return base;
    }

    const recent = history.latest(PERSONALIZATION_WINDOW);
    const successRate = recent.filter((record) => record.correct).length / PERSONALIZATION_WINDOW;

    let multiplier: number;
    if (successRate >= INTERVAL_MULTIPLIERS.strong.minRate) {
      multiplier = INTERVAL_MULTIPLIERS.strong.multiplier;
    } else if (successRate >= INTERVAL_MULTIPLIERS.steady.minRate) {
      multiplier = INTERVAL_MULTIPLIERS.steady.multiplier;
    } else {
      multiplier = INTERVAL_MULTIPLIERS.weak.multiplier;
    }

    return Math.max(1, Math.floor(base * multiplier));
  }

  recordOutcome(word: string, correct: boolean, daysSinceLast: number, timestamp: number): void {
    let history = this.forgetRates.get(word);
    if (!history) {
      history = new RingBuffer<OutcomeRecord>(OUTCOME_HISTORY_SIZE);
      this.forgetRates.set(word, history);
    }
    history.push({ correct, daysSinceLast, timestamp });
  }

  recordSessionAccuracy(accuracy: number): void {
    this.accuracyTrends.push(clamp(accuracy, 0, 1));
  }

  // ==================== 特征提取 ====================

  /**
   * 提取会话规划特征
   *
   * 遗忘率只统计词汇表中的单词，已移出词库的进度条目不参与
   *
   * @param now 毫秒时间戳
   */
  extractFeatures(
    vocabulary: Vocabulary,
    store: ProgressStore,
    sessionLog: SessionLog,
    now: number,
  ): SessionFeatures {
    const trends = this.accuracyTrends.latest(RECENT_ACCURACY_WINDOW);
    const recentAccuracy =
      trends.length < RECENT_ACCURACY_WINDOW ? DEFAULT_RECENT_ACCURACY : mean(trends);

    const recentLogs = sessionLog.recent(RESPONSE_TIME_WINDOW);
    const avgResponseTime = mean(
      recentLogs.map((entry) => entry.avgResponseTime),
      DEFAULT_AVG_RESPONSE_TIME,
    );

    const latest = sessionLog.latest();
    const fatigueScore = latest ? computeFatigue(latest.wordAccuracies) : 0;

    let practiced = 0;
    let forgotten = 0;
    for (const word of vocabulary.words()) {
      const progress = store.get(word);
      if (progress.attempts > 1) {
        practiced += 1;
        if (progress.correct / progress.attempts < FORGET_ACCURACY_THRESHOLD) {
          forgotten += 1;
        }
      }
    }
    const forgetRate = practiced === 0 ? 0 : forgotten / practiced;

    const timeSinceLastSession = latest
      ? clamp((now - latest.timestamp) / MS_PER_HOUR, 0, MAX_HOURS_SINCE_LAST_SESSION)
      : DEFAULT_HOURS_SINCE_LAST_SESSION;

    return {
      recentAccuracy,
      avgResponseTime,
      fatigueScore,
      forgetRate,
      sessionCount: sessionLog.size,
      timeSinceLastSession,
    };
  }

  // ==================== 会话预测 ====================

  /**
   * 规则级联预测
   *
   * 规则顺序不可调换：时间间隔的偏向覆盖发生在疲劳覆盖之后，
   * 长时间未学习时 review_heavy 会取代疲劳导致的 easy
   */
  predictSession(features: SessionFeatures): SessionPrediction {
    const confidenceBoost = Math.min(0.3, this.confidenceLevel * 0.5);

    let multiplier: number;
    let bias: DifficultyBias;
    if (features.recentAccuracy >= 0.85) {
      multiplier = 1.3 + confidenceBoost;
      bias = 'challenging';
    } else if (features.recentAccuracy >= 0.7) {
      multiplier = 1.0;
      bias = 'balanced';
    } else {
      multiplier = 0.7;
      bias = 'review_heavy';
    }

    if (features.fatigueScore > this.fatigueThreshold) {
      multiplier *= 0.8;
      bias = 'easy';
    }

    if (features.avgResponseTime > this.responseTimeBaseline * 1.5) {
      multiplier *= 0.9;
    }

    if (features.timeSinceLastSession > LONG_GAP_HOURS) {
      bias = 'review_heavy';
    } else if (features.timeSinceLastSession < SHORT_GAP_HOURS) {
      multiplier *= 0.8;
    }

    return {
      sessionSize: clamp(
        roundHalfEven(BASE_SESSION_SIZE * multiplier),
        MIN_SESSION_SIZE,
        MAX_SESSION_SIZE,
      ),
      difficultyBias: bias,
      confidence: Math.min(MAX_CONFIDENCE, this.confidenceLevel + 0.1),
    };
  }

  updateConfidence(predictionAccuracy: number): void {
    if (predictionAccuracy > 0.8) {
      this.confidenceLevel = Math.min(MAX_CONFIDENCE, this.confidenceLevel + 0.05);
    } else {
      this.confidenceLevel = Math.max(MIN_CONFIDENCE, this.confidenceLevel - 0.02);
    }
  }

  // ==================== 持久化 ====================

  toDocument(): PersonalizationModelDocument {
    const forgetRates: Record<string, OutcomeRecord[]> = {};
    for (const [word, history] of this.forgetRates) {
      forgetRates[word] = history.toArray().map((record) => ({ ...record }));
    }
    return {
      forgettingCurveParams: { ...this.forgettingCurveParams },
      fatigueThreshold: this.fatigueThreshold,
      responseTimeBaseline: this.responseTimeBaseline,
      accuracyTrends: this.accuracyTrends.toArray(),
      forgetRates,
      confidenceLevel: this.confidenceLevel,
    };
  }
}

/**
 * 会话内疲劳度：前半段平均正确率 - 后半段平均正确率（不小于 0）
 *
 * 序列不超过 5 条时不计算
 */
export function computeFatigue(wordAccuracies: readonly number[]): number {
  if (wordAccuracies.length <= MIN_FATIGUE_SEQUENCE) {
    return 0;
  }
  const half = Math.floor(wordAccuracies.length / 2);
  const firstHalf = mean(wordAccuracies.slice(0, half));
  const secondHalf = mean(wordAccuracies.slice(half));
  return Math.max(0, firstHalf - secondHalf);
}
