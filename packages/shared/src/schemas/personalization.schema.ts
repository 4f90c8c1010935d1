/**
 * 个性化模型 Zod Schema
 */

import { z } from 'zod';
import {
  ACCURACY_TREND_SIZE,
  DEFAULT_CONFIDENCE_LEVEL,
  DEFAULT_FATIGUE_THRESHOLD,
  DEFAULT_FORGETTING_CURVE_PARAMS,
  DEFAULT_RESPONSE_TIME_BASELINE,
  MAX_CONFIDENCE,
  MIN_CONFIDENCE,
  OUTCOME_HISTORY_SIZE,
} from '../constants';
import type {
  DifficultyBias,
  OutcomeRecord,
  PersonalizationModelDocument,
  SessionFeatures,
  SessionMode,
  SessionPrediction,
} from '../types';

/**
 * 难度偏向 Schema
 */
export const DifficultyBiasSchema: z.ZodType<DifficultyBias> = z.enum([
  'challenging',
  'balanced',
  'review_heavy',
  'easy',
]);

/**
 * 会话模式 Schema
 */
export const SessionModeSchema: z.ZodType<SessionMode> = z.enum(['new', 'revision']);

/**
 * 答题结果 Schema
 */
export const OutcomeRecordSchema: z.ZodType<OutcomeRecord> = z.object({
  correct: z.boolean(),
  daysSinceLast: z.number().nonnegative(),
  timestamp: z.number(),
});

/**
 * 丢弃非法元素并保留最近 limit 条
 */
function boundedList<T>(item: z.ZodType<T>, limit: number) {
  return z
    .array(z.unknown())
    .catch([])
    .transform((items) =>
      items
        .flatMap((value) => {
          const result = item.safeParse(value);
          return result.success ? [result.data] : [];
        })
        .slice(-limit),
    );
}

/**
 * 个性化模型文档 Schema
 */
export const PersonalizationModelDocumentSchema: z.ZodType<
  PersonalizationModelDocument,
  z.ZodTypeDef,
  unknown
> = z
  .object({
    forgettingCurveParams: z
      .object({
        initialStrength: z.number().catch(DEFAULT_FORGETTING_CURVE_PARAMS.initialStrength),
        decayRate: z.number().catch(DEFAULT_FORGETTING_CURVE_PARAMS.decayRate),
      })
      .catch({ ...DEFAULT_FORGETTING_CURVE_PARAMS }),
    fatigueThreshold: z.number().gt(0).lt(1).catch(DEFAULT_FATIGUE_THRESHOLD),
    responseTimeBaseline: z.number().positive().catch(DEFAULT_RESPONSE_TIME_BASELINE),
    accuracyTrends: boundedList(z.number().min(0).max(1), ACCURACY_TREND_SIZE),
    forgetRates: z
      .record(z.unknown())
      .catch({})
      .transform((raw) => {
        const rates: Record<string, OutcomeRecord[]> = {};
        const history = boundedList(OutcomeRecordSchema, OUTCOME_HISTORY_SIZE);
        for (const [word, records] of Object.entries(raw)) {
          rates[word] = history.parse(records);
        }
        return rates;
      }),
    confidenceLevel: z.number().min(MIN_CONFIDENCE).max(MAX_CONFIDENCE).catch(DEFAULT_CONFIDENCE_LEVEL),
  })
  .catch(() => createDefaultPersonalizationDocument());

/**
 * 默认个性化模型文档
 */
export function createDefaultPersonalizationDocument(): PersonalizationModelDocument {
  return {
    forgettingCurveParams: { ...DEFAULT_FORGETTING_CURVE_PARAMS },
    fatigueThreshold: DEFAULT_FATIGUE_THRESHOLD,
    responseTimeBaseline: DEFAULT_RESPONSE_TIME_BASELINE,
    accuracyTrends: [],
    forgetRates: {},
    confidenceLevel: DEFAULT_CONFIDENCE_LEVEL,
  };
}

/**
 * 会话特征 Schema
 */
export const SessionFeaturesSchema: z.ZodType<SessionFeatures> = z.object({
  recentAccuracy: z.number(),
  avgResponseTime: z.number(),
  fatigueScore: z.number(),
  forgetRate: z.number(),
  sessionCount: z.number().int().nonnegative(),
  timeSinceLastSession: z.number(),
});

/**
 * 会话预测 Schema
 */
export const SessionPredictionSchema: z.ZodType<SessionPrediction> = z.object({
  sessionSize: z.number().int(),
  difficultyBias: DifficultyBiasSchema,
  confidence: z.number(),
});
