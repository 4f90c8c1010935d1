/**
 * 会话日志与计数器 Zod Schema
 */

import { z } from 'zod';
import { SESSION_LOG_SIZE } from '../constants';
import type { SessionCounterDocument, SessionLogDocument, SessionLogEntry } from '../types';
import {
  SessionFeaturesSchema,
  SessionModeSchema,
  SessionPredictionSchema,
} from './personalization.schema';
import { renameLegacyKeys } from './legacy-keys';

/**
 * 会话日志条目 Schema
 */
export const SessionLogEntrySchema: z.ZodType<SessionLogEntry> = z.object({
  sessionIndex: z.number().int().nonnegative(),
  mode: SessionModeSchema,
  timestamp: z.number(),
  wordCount: z.number().int().nonnegative(),
  correctCount: z.number().int().nonnegative(),
  accuracy: z.number().min(0).max(1),
  avgResponseTime: z.number().nonnegative(),
  wordAccuracies: z.array(z.number().min(0).max(1)),
  features: SessionFeaturesSchema,
  prediction: SessionPredictionSchema,
  predictionAccuracy: z.number().min(0).max(1),
});

/**
 * 会话日志文档 Schema
 *
 * 非法条目被丢弃，只保留最近 50 条
 */
export const SessionLogDocumentSchema: z.ZodType<SessionLogDocument, z.ZodTypeDef, unknown> = z
  .array(z.unknown())
  .catch([])
  .transform((items) =>
    items
      .flatMap((item) => {
        const result = SessionLogEntrySchema.safeParse(item);
        return result.success ? [result.data] : [];
      })
      .slice(-SESSION_LOG_SIZE),
  );

/**
 * 会话计数器文档 Schema（兼容旧版的 session_counter 字段）
 */
export const SessionCounterDocumentSchema: z.ZodType<
  SessionCounterDocument,
  z.ZodTypeDef,
  unknown
> = z
  .preprocess(
    (raw) => renameLegacyKeys(raw, { session_counter: 'sessionCounter' }),
    z.object({
      sessionCounter: z.number().int().nonnegative().catch(0),
    }),
  )
  .catch({ sessionCounter: 0 });
