/**
 * 会话记录器
 *
 * 每次作答同时更新进度存储和个性化模型；会话结束时计算会话级汇总，
 * 写入会话日志与正确率趋势，并据预测命中情况调整模型置信度。
 *
 * 已记录的作答不会回滚：会话中途放弃时进度依然有效
 */

import type {
  DifficultyBias,
  SessionFeatures,
  SessionLogEntry,
  SessionMode,
  SessionPrediction,
  WordProgress,
} from '@lexiloop/shared';
import { srsLogger } from '../../logger';
import { mean } from '../common/math';
import type { PersonalizationModel } from '../modeling/personalization-model';
import type { ProgressStore } from '../progress/progress-store';
import type { SessionLog } from './session-log';

const MS_PER_DAY = 86_400_000;

export interface SessionRecorderOptions {
  sessionIndex: number;
  mode: SessionMode;
  features: SessionFeatures;
  prediction: SessionPrediction;
  /** 时钟（毫秒），默认 Date.now */
  now?: () => number;
}

/**
 * 会话内统计（新词/复习词分开计数）
 */
export interface SessionStats {
  newCorrect: number;
  newTotal: number;
  reviewCorrect: number;
  reviewTotal: number;
}

export interface RecordedAnswer {
  word: string;
  correct: boolean;
  /** 作答前是否为新词 */
  wasNew: boolean;
  progress: Readonly<WordProgress>;
}

export class SessionRecorder {
  private readonly now: () => number;
  private readonly accuracies: number[] = [];
  private readonly responseTimes: number[] = [];
  private readonly stats: SessionStats = {
    newCorrect: 0,
    newTotal: 0,
    reviewCorrect: 0,
    reviewTotal: 0,
  };
  private finalized = false;

  constructor(
    private readonly store: ProgressStore,
    private readonly model: PersonalizationModel,
    private readonly log: SessionLog,
    private readonly options: SessionRecorderOptions,
  ) {
    this.now = options.now ?? Date.now;
  }

  get sessionIndex(): number {
    return this.options.sessionIndex;
  }

  get answerCount(): number {
    return this.accuracies.length;
  }

  getStats(): SessionStats {
    return { ...this.stats };
  }

  /**
   * 记录一次作答
   *
   * @param responseTime 反应时间（秒）
   */
  recordAnswer(word: string, correct: boolean, responseTime: number): RecordedAnswer {
    if (this.finalized) {
      throw new Error(`Session ${this.options.sessionIndex} is already finalized`);
    }

    const timestamp = this.now();
    const before = this.store.get(word);
    const wasNew = before.attempts === 0;
    const daysSinceLast =
      before.lastReviewTimestamp === null
        ? 0
        : Math.max(0, (timestamp - before.lastReviewTimestamp) / MS_PER_DAY);

    const progress = this.store.record(
      word,
      correct,
      responseTime,
      this.options.sessionIndex,
      timestamp,
    );
    this.model.recordOutcome(word, correct, daysSinceLast, timestamp);

    if (wasNew) {
      this.stats.newTotal += 1;
      if (correct) this.stats.newCorrect += 1;
    } else {
      this.stats.reviewTotal += 1;
      if (correct) this.stats.reviewCorrect += 1;
    }

    this.accuracies.push(correct ? 1 : 0);
    this.responseTimes.push(responseTime);

    return { word, correct, wasNew, progress };
  }

  /**
   * 结束会话
   *
   * 没有任何作答时不写日志，返回 null
   */
  finalizeSession(): SessionLogEntry | null {
    if (this.finalized) {
      throw new Error(`Session ${this.options.sessionIndex} is already finalized`);
    }
    this.finalized = true;

    const total = this.accuracies.length;
    if (total === 0) {
      srsLogger.info(
        { sessionIndex: this.options.sessionIndex },
        '[SessionRecorder] 会话无作答，跳过日志记录',
      );
      return null;
    }

    const correctCount = this.accuracies.filter((value) => value === 1).length;
    const accuracy = correctCount / total;
    const predictionAccuracy = evaluatePrediction(this.options.prediction.difficultyBias, accuracy);

    const entry: SessionLogEntry = {
      sessionIndex: this.options.sessionIndex,
      mode: this.options.mode,
      timestamp: this.now(),
      wordCount: total,
      correctCount,
      accuracy,
      avgResponseTime: mean(this.responseTimes),
      wordAccuracies: [...this.accuracies],
      features: { ...this.options.features },
      prediction: { ...this.options.prediction },
      predictionAccuracy,
    };

    this.log.append(entry);
    this.model.recordSessionAccuracy(accuracy);
    this.model.updateConfidence(predictionAccuracy);

    srsLogger.info(
      {
        sessionIndex: entry.sessionIndex,
        accuracy,
        predictionAccuracy,
        confidence: this.model.getConfidence(),
      },
      '[SessionRecorder] 会话已结束',
    );
    return entry;
  }
}

/**
 * 评估预测偏向与实际正确率的吻合程度
 *
 * 命中（challenging 且 >=0.8、easy 且 >=0.9、balanced 且位于 [0.7,0.9]）记 1.0；
 * 否则为 max(0, 1 - |accuracy - 0.8|)
 */
export function evaluatePrediction(bias: DifficultyBias, accuracy: number): number {
  const matched =
    (bias === 'challenging' && accuracy >= 0.8) ||
    (bias === 'easy' && accuracy >= 0.9) ||
    (bias === 'balanced' && accuracy >= 0.7 && accuracy <= 0.9);
  if (matched) {
    return 1.0;
  }
  return Math.max(0, 1 - Math.abs(accuracy - 0.8));
}
