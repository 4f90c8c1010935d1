/**
 * 学习接口请求 Zod Schema
 */

import { z } from 'zod';
import { SessionModeSchema } from './personalization.schema';

/**
 * 开始会话请求
 */
export const StartSessionSchema = z.object({
  mode: SessionModeSchema,
});

/**
 * 提交答案请求
 *
 * responseTime 单位为秒
 */
export const SubmitAnswerSchema = z.object({
  word: z.string().trim().toLowerCase().min(1, 'word 不能为空'),
  answer: z.string().trim().toLowerCase(),
  responseTime: z.number().nonnegative('responseTime 不能为负数').max(3600, 'responseTime 过大'),
});

export type StartSessionDto = z.infer<typeof StartSessionSchema>;
export type SubmitAnswerDto = z.infer<typeof SubmitAnswerSchema>;
