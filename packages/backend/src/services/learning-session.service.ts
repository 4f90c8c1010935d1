/**
 * 学习会话服务
 *
 * 单用户会话生命周期：概览 → 开始（规划 + 出题）→ 逐词作答 → 结束/放弃。
 * 同一时刻最多一个进行中的会话；作答即时写入内存状态，结束或放弃时整体持久化
 */

import type { SessionLogEntry, SessionMode, SessionPrediction, WordProgress } from '@lexiloop/shared';
import { MASTERED_THRESHOLD, SUMMARY_TOP_WORDS } from '../config/scheduling';
import { AppError } from '../middleware/error.middleware';
import { serviceLogger } from '../logger';
import {
  LeitnerScheduler,
  SessionPlanner,
  SessionRecorder,
  type RandomSource,
  type SessionStats,
} from '../srs';
import type { LearningContext } from './learning-context';
import { buildQuizOptions } from './quiz-options.service';

// ==================== 类型定义 ====================

export interface LearningSessionServiceOptions {
  random: RandomSource;
  /** 到期单词达到该数量才提供复习模式 */
  revisionMinDue?: number;
  /** 时钟（毫秒），默认 Date.now */
  now?: () => number;
}

export interface SessionOverview {
  /** 下一次会话的序号 */
  sessionNumber: number;
  dueCount: number;
  revisionAvailable: boolean;
  revisionMinDue: number;
  totalWords: number;
  learnedWords: number;
  masteredWords: number;
}

export interface SessionWord {
  english: string;
  /** 首次出现的单词先展示闪卡 */
  isNew: boolean;
  /** 闪卡译文，仅新词提供 */
  flashcard?: string;
  options: string[];
  answered: boolean;
}

export interface ActiveSessionView {
  sessionIndex: number;
  mode: SessionMode;
  prediction: SessionPrediction;
  words: SessionWord[];
  answeredCount: number;
  remaining: number;
}

export interface AnswerResult {
  word: string;
  correct: boolean;
  correctAnswer: string;
  progress: Readonly<WordProgress>;
  remaining: number;
}

export interface SessionSummary {
  sessionIndex: number;
  mode: SessionMode;
  answered: number;
  stats: SessionStats;
  /** 无新词作答时为 null */
  newAccuracy: number | null;
  reviewAccuracy: number | null;
  introduced: string[];
  logEntry: SessionLogEntry | null;
  persisted: boolean;
  warning?: string;
}

export interface AbandonResult {
  sessionIndex: number;
  answered: number;
  persisted: boolean;
  warning?: string;
}

export interface WordSummary {
  english: string;
  spanish: string;
  mastery: number;
  /** "答对/作答" */
  accuracy: string;
}

export interface ProgressSummary {
  totalWords: number;
  masteredWords: number;
  /** 保留一位小数 */
  masteredPercent: number;
  topWords: WordSummary[];
}

interface ActiveSession {
  mode: SessionMode;
  prediction: SessionPrediction;
  recorder: SessionRecorder;
  words: SessionWord[];
  translations: Map<string, string>;
  introduced: string[];
}

const DEFAULT_REVISION_MIN_DUE = 5;

function normalizeAnswer(value: string): string {
  return value.trim().toLowerCase();
}

function ratio(correct: number, total: number): number | null {
  return total === 0 ? null : correct / total;
}

// ==================== 服务实现 ====================

export class LearningSessionService {
  private readonly scheduler = new LeitnerScheduler();
  private readonly planner: SessionPlanner;
  private readonly random: RandomSource;
  private readonly revisionMinDue: number;
  private readonly now: () => number;
  private active: ActiveSession | null = null;

  constructor(
    private readonly context: LearningContext,
    options: LearningSessionServiceOptions,
  ) {
    this.random = options.random;
    this.revisionMinDue = options.revisionMinDue ?? DEFAULT_REVISION_MIN_DUE;
    this.now = options.now ?? Date.now;
    this.planner = new SessionPlanner(this.scheduler, this.random);
  }

  /**
   * 学习概览（到期数按个性化间隔计算）
   */
  getOverview(): SessionOverview {
    const { vocabulary, progressStore } = this.context;
    const dueCount = this.countDue();

    let learnedWords = 0;
    let masteredWords = 0;
    for (const word of vocabulary.words()) {
      const progress = progressStore.get(word);
      if (progress.attempts > 0) learnedWords += 1;
      if (progress.mastery >= MASTERED_THRESHOLD) masteredWords += 1;
    }

    return {
      sessionNumber: this.context.sessionCounter + 1,
      dueCount,
      revisionAvailable: dueCount >= this.revisionMinDue,
      revisionMinDue: this.revisionMinDue,
      totalWords: vocabulary.size,
      learnedWords,
      masteredWords,
    };
  }

  /**
   * 开始会话
   *
   * 复习模式要求到期单词达到 revisionMinDue，与概览的 revisionAvailable 一致
   *
   * @throws AppError 409 SESSION_ALREADY_ACTIVE / NO_WORDS_AVAILABLE / NO_DUE_WORDS / REVISION_UNAVAILABLE
   */
  async startSession(mode: SessionMode): Promise<ActiveSessionView> {
    if (this.active) {
      throw AppError.conflict('已有进行中的会话', 'SESSION_ALREADY_ACTIVE');
    }

    if (mode === 'revision') {
      const dueCount = this.countDue();
      if (dueCount === 0) {
        throw AppError.conflict('没有到期需要复习的单词', 'NO_DUE_WORDS');
      }
      if (dueCount < this.revisionMinDue) {
        throw AppError.conflict(
          `到期单词不足 ${this.revisionMinDue} 个，暂不提供复习 (当前 ${dueCount} 个)`,
          'REVISION_UNAVAILABLE',
        );
      }
    }

    const { vocabulary, progressStore, model, sessionLog } = this.context;
    const features = model.extractFeatures(vocabulary, progressStore, sessionLog, this.now());
    const plan = this.planner.planSession({
      vocabulary,
      progressStore,
      model,
      mode,
      currentSession: this.context.sessionCounter,
      features,
    });

    if (plan.words.length === 0) {
      throw mode === 'revision'
        ? AppError.conflict('没有到期需要复习的单词', 'NO_DUE_WORDS')
        : AppError.conflict('没有可学习的单词', 'NO_WORDS_AVAILABLE');
    }

    const sessionIndex = this.context.beginSession();
    const recorder = new SessionRecorder(progressStore, model, sessionLog, {
      sessionIndex,
      mode,
      features,
      prediction: plan.prediction,
      now: this.now,
    });

    const translations = vocabulary.translations();
    const words = plan.words.map((pair): SessionWord => {
      const isNew = progressStore.get(pair.english).attempts === 0;
      return {
        english: pair.english,
        isNew,
        ...(isNew ? { flashcard: pair.spanish } : {}),
        options: buildQuizOptions(pair.spanish, translations, this.random),
        answered: false,
      };
    });

    this.active = {
      mode,
      prediction: plan.prediction,
      recorder,
      words,
      translations: new Map(plan.words.map((pair) => [pair.english, pair.spanish])),
      introduced: plan.introduced.map((pair) => pair.english),
    };

    serviceLogger.info(
      {
        sessionIndex,
        mode,
        size: words.length,
        sessionSize: plan.prediction.sessionSize,
        bias: plan.prediction.difficultyBias,
      },
      '[LearningSession] 会话已开始',
    );
    return this.viewOf(this.active);
  }

  hasActiveSession(): boolean {
    return this.active !== null;
  }

  /**
   * @throws AppError 404 NO_ACTIVE_SESSION
   */
  getActiveSession(): ActiveSessionView {
    return this.viewOf(this.requireActive());
  }

  /**
   * 提交答案（每个单词每次会话只能作答一次）
   *
   * @param responseTime 反应时间（秒）
   */
  async submitAnswer(word: string, answer: string, responseTime: number): Promise<AnswerResult> {
    const session = this.requireActive();
    const english = normalizeAnswer(word);
    const sessionWord = session.words.find((item) => item.english === english);
    const correctAnswer = session.translations.get(english);

    if (!sessionWord || correctAnswer === undefined) {
      throw AppError.badRequest(`单词不在当前会话中: ${english}`, 'WORD_NOT_IN_SESSION');
    }
    if (sessionWord.answered) {
      throw AppError.conflict(`单词已作答: ${english}`, 'WORD_ALREADY_ANSWERED');
    }

    const correct = normalizeAnswer(answer) === correctAnswer;
    const recorded = session.recorder.recordAnswer(english, correct, responseTime);
    sessionWord.answered = true;

    serviceLogger.debug(
      { sessionIndex: session.recorder.sessionIndex, word: english, correct, responseTime },
      '[LearningSession] 已记录作答',
    );

    return {
      word: english,
      correct,
      correctAnswer,
      progress: { ...recorded.progress, responseTimes: [...recorded.progress.responseTimes] },
      remaining: session.words.filter((item) => !item.answered).length,
    };
  }

  /**
   * 结束会话并持久化
   */
  async finishSession(): Promise<SessionSummary> {
    const session = this.requireActive();
    const logEntry = session.recorder.finalizeSession();
    this.active = null;

    const saved = await this.context.save();
    const stats = session.recorder.getStats();

    serviceLogger.info(
      {
        sessionIndex: session.recorder.sessionIndex,
        answered: session.recorder.answerCount,
        accuracy: logEntry?.accuracy ?? null,
        persisted: saved.persisted,
      },
      '[LearningSession] 会话已结束',
    );

    return {
      sessionIndex: session.recorder.sessionIndex,
      mode: session.mode,
      answered: session.recorder.answerCount,
      stats,
      newAccuracy: ratio(stats.newCorrect, stats.newTotal),
      reviewAccuracy: ratio(stats.reviewCorrect, stats.reviewTotal),
      introduced: session.introduced,
      logEntry,
      persisted: saved.persisted,
      ...(saved.warning === undefined ? {} : { warning: saved.warning }),
    };
  }

  /**
   * 放弃会话：不写会话日志，已记录的作答保留并持久化
   */
  async abandonSession(): Promise<AbandonResult> {
    const session = this.requireActive();
    this.active = null;

    const saved = await this.context.save();
    serviceLogger.info(
      { sessionIndex: session.recorder.sessionIndex, answered: session.recorder.answerCount },
      '[LearningSession] 会话已放弃',
    );

    return {
      sessionIndex: session.recorder.sessionIndex,
      answered: session.recorder.answerCount,
      persisted: saved.persisted,
      ...(saved.warning === undefined ? {} : { warning: saved.warning }),
    };
  }

  /**
   * 进度汇总：掌握度最高的前 10 个单词（同分保持词库顺序）
   */
  getProgressSummary(): ProgressSummary {
    const { vocabulary, progressStore } = this.context;
    const rows = vocabulary.toPairs().map((pair) => ({ pair, progress: progressStore.get(pair.english) }));

    const totalWords = rows.length;
    const masteredWords = rows.filter((row) => row.progress.mastery >= MASTERED_THRESHOLD).length;
    const masteredPercent =
      totalWords === 0 ? 0 : Math.round((masteredWords / totalWords) * 1000) / 10;

    const topWords = [...rows]
      .sort((a, b) => b.progress.mastery - a.progress.mastery)
      .slice(0, SUMMARY_TOP_WORDS)
      .map(
        ({ pair, progress }): WordSummary => ({
          english: pair.english,
          spanish: pair.spanish,
          mastery: progress.mastery,
          accuracy: `${progress.correct}/${progress.attempts}`,
        }),
      );

    return { totalWords, masteredWords, masteredPercent, topWords };
  }

  private countDue(): number {
    const { vocabulary, progressStore, model } = this.context;
    return this.scheduler.countDue(vocabulary, progressStore, this.context.sessionCounter, (word, box) =>
      model.personalizedInterval(word, box),
    );
  }

  private requireActive(): ActiveSession {
    if (!this.active) {
      throw AppError.notFound('当前没有进行中的会话', 'NO_ACTIVE_SESSION');
    }
    return this.active;
  }

  private viewOf(session: ActiveSession): ActiveSessionView {
    const answeredCount = session.words.filter((item) => item.answered).length;
    return {
      sessionIndex: session.recorder.sessionIndex,
      mode: session.mode,
      prediction: { ...session.prediction },
      words: session.words.map((item) => ({ ...item, options: [...item.options] })),
      answeredCount,
      remaining: session.words.length - answeredCount,
    };
  }
}
