/**
 * 学习进度 Zod Schema
 *
 * 用于反序列化持久化的进度文档：字段缺失或非法时回退到默认值，不抛出异常
 */

import { z } from 'zod';
import { MAX_BOX, MAX_MASTERY, RESPONSE_TIME_HISTORY_SIZE } from '../constants';
import type { ProgressDocument, WordProgress } from '../types';
import { renameLegacyKeys } from './legacy-keys';

const WORD_PROGRESS_LEGACY_KEYS = { last_reviewed_session: 'lastReviewedSession' } as const;

function clampInt(value: number, min: number, max: number): number {
  return Math.max(min, Math.min(max, value));
}

/**
 * 创建默认（从未学习）的进度
 */
export function createDefaultWordProgress(): WordProgress {
  return {
    mastery: 0,
    attempts: 0,
    correct: 0,
    box: 0,
    lastReviewedSession: 0,
    lastReviewTimestamp: null,
    responseTimes: [],
  };
}

const counterSchema = z.number().int().nonnegative().catch(0);

/**
 * 单词进度 Schema
 *
 * correct 不会大于 attempts；超出范围的 mastery/box 截断到合法区间
 */
export const WordProgressSchema: z.ZodType<WordProgress, z.ZodTypeDef, unknown> = z
  .preprocess(
    (raw) => renameLegacyKeys(raw, WORD_PROGRESS_LEGACY_KEYS),
    z
      .object({
        mastery: z
          .number()
          .int()
          .catch(0)
          .transform((v) => clampInt(v, 0, MAX_MASTERY)),
        attempts: counterSchema,
        correct: counterSchema,
        box: z
          .number()
          .int()
          .catch(0)
          .transform((v) => clampInt(v, 0, MAX_BOX)),
        lastReviewedSession: counterSchema,
        lastReviewTimestamp: z.number().nullable().catch(null),
        responseTimes: z
          .array(z.number().nonnegative())
          .catch([])
          .transform((times) => times.slice(-RESPONSE_TIME_HISTORY_SIZE)),
      })
      .transform((progress) => ({
        ...progress,
        correct: Math.min(progress.correct, progress.attempts),
      })),
  )
  .catch(() => createDefaultWordProgress());

/**
 * 进度文档 Schema（单词 → 进度）
 */
export const ProgressDocumentSchema: z.ZodType<ProgressDocument, z.ZodTypeDef, unknown> = z
  .record(z.unknown())
  .catch({})
  .transform((raw) => {
    const document: ProgressDocument = {};
    for (const [word, value] of Object.entries(raw)) {
      document[word] = WordProgressSchema.parse(value);
    }
    return document;
  });
