/**
 * 会话规划器
 *
 * 复习模式: 取所有按个性化间隔到期的单词，掌握度低、复习早的优先
 * 学习模式: 按掌握状态分桶，再按难度偏向分配各桶名额
 *
 * 分桶规则:
 * - new: 从未作答，按单词长度升序
 * - struggling: 0 < mastery <= 3 且作答 >= 2 次
 * - progressing: 4 <= mastery <= 6
 * - strong: mastery >= 7
 * 不属于任何桶的单词（如 mastery 为 0 但已作答）不会被选入
 */

import type {
  DifficultyBias,
  SessionFeatures,
  SessionMode,
  SessionPrediction,
  VocabularyPair,
} from '@lexiloop/shared';
import { BIAS_PROPORTIONS, type BucketProportions } from '../../config/scheduling';
import { createChildLogger } from '../../logger';
import { shuffle, type RandomSource } from '../common/random';
import type { PersonalizationModel } from '../modeling/personalization-model';
import type { ProgressStore } from '../progress/progress-store';
import type { LeitnerScheduler } from '../scheduling/leitner-scheduler';
import type { Vocabulary } from '../vocabulary';

const plannerLogger = createChildLogger({ module: 'srs', feature: 'planner' });

export interface PlanSessionRequest {
  vocabulary: Vocabulary;
  progressStore: ProgressStore;
  model: PersonalizationModel;
  mode: SessionMode;
  /** 规划时的会话计数（尚未为本次会话递增） */
  currentSession: number;
  features: SessionFeatures;
}

export interface SessionPlan {
  mode: SessionMode;
  /** 呈现顺序 */
  words: VocabularyPair[];
  /** new 桶名额内选中的单词（回填进来的新词不计入） */
  introduced: VocabularyPair[];
  features: SessionFeatures;
  prediction: SessionPrediction;
}

export interface WordBuckets {
  new: VocabularyPair[];
  struggling: VocabularyPair[];
  progressing: VocabularyPair[];
  strong: VocabularyPair[];
}

type BucketName = keyof BucketProportions;

const BUCKET_ORDER: readonly BucketName[] = ['new', 'struggling', 'progressing', 'strong'];

export class SessionPlanner {
  constructor(
    private readonly scheduler: LeitnerScheduler,
    private readonly random: RandomSource,
  ) {}

  planSession(request: PlanSessionRequest): SessionPlan {
    const prediction = request.model.predictSession(request.features);
    const plan =
      request.mode === 'revision'
        ? this.planRevision(request, prediction)
        : this.planLearning(request, prediction);

    plannerLogger.debug(
      {
        mode: plan.mode,
        size: plan.words.length,
        sessionSize: prediction.sessionSize,
        bias: prediction.difficultyBias,
      },
      '[SessionPlanner] 会话规划完成',
    );
    return plan;
  }

  /**
   * 分桶（new 桶按长度排序，其余保持词汇表顺序）
   */
  partition(vocabulary: Vocabulary, store: ProgressStore): WordBuckets {
    const buckets: WordBuckets = { new: [], struggling: [], progressing: [], strong: [] };

    for (const pair of vocabulary.toPairs()) {
      const { attempts, mastery } = store.get(pair.english);
      if (attempts === 0) {
        buckets.new.push(pair);
      } else if (mastery > 0 && mastery <= 3 && attempts >= 2) {
        buckets.struggling.push(pair);
      } else if (mastery >= 4 && mastery <= 6) {
        buckets.progressing.push(pair);
      } else if (mastery >= 7) {
        buckets.strong.push(pair);
      }
    }

    buckets.new.sort((a, b) => a.english.length - b.english.length);
    return buckets;
  }

  private planRevision(request: PlanSessionRequest, prediction: SessionPrediction): SessionPlan {
    const { vocabulary, progressStore, model, currentSession, features } = request;

    const due = this.scheduler.getDueWords(vocabulary, progressStore, currentSession, (word, box) =>
      model.personalizedInterval(word, box),
    );

    due.sort((a, b) => {
      const pa = progressStore.get(a.english);
      const pb = progressStore.get(b.english);
      return pa.mastery - pb.mastery || pa.lastReviewedSession - pb.lastReviewedSession;
    });

    return {
      mode: 'revision',
      words: due.slice(0, Math.min(prediction.sessionSize, due.length)),
      introduced: [],
      features,
      prediction,
    };
  }

  private planLearning(request: PlanSessionRequest, prediction: SessionPrediction): SessionPlan {
    const { vocabulary, progressStore, features } = request;
    const { sessionSize, difficultyBias } = prediction;

    const buckets = this.partition(vocabulary, progressStore);
    const ordered: WordBuckets = {
      new: buckets.new,
      struggling: shuffle(buckets.struggling, this.random),
      progressing: shuffle(buckets.progressing, this.random),
      strong: shuffle(buckets.strong, this.random),
    };

    const targets = bucketTargets(sessionSize, difficultyBias);
    const taken: WordBuckets = {
      new: ordered.new.slice(0, targets.new),
      struggling: ordered.struggling.slice(0, targets.struggling),
      progressing: ordered.progressing.slice(0, targets.progressing),
      strong: ordered.strong.slice(0, targets.strong),
    };

    const selected = BUCKET_ORDER.flatMap((name) => taken[name]);

    if (selected.length < sessionSize) {
      const leftovers = shuffle(
        [
          ...ordered.new.slice(taken.new.length),
          ...ordered.struggling.slice(taken.struggling.length),
          ...ordered.progressing.slice(taken.progressing.length),
        ],
        this.random,
      );
      for (const pair of leftovers) {
        if (selected.length >= sessionSize) break;
        selected.push(pair);
      }
    }

    return {
      mode: 'new',
      words: shuffle(selected, this.random),
      introduced: taken.new,
      features,
      prediction,
    };
  }
}

/**
 * 各桶名额 = floor(会话大小 × 占比)
 */
export function bucketTargets(sessionSize: number, bias: DifficultyBias): BucketProportions {
  const proportions = BIAS_PROPORTIONS[bias];
  return {
    new: Math.floor(sessionSize * proportions.new),
    struggling: Math.floor(sessionSize * proportions.struggling),
    progressing: Math.floor(sessionSize * proportions.progressing),
    strong: Math.floor(sessionSize * proportions.strong),
  };
}
