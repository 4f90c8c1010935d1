/**
 * 后端环境变量配置
 *
 * 使用 Zod 进行运行时验证，确保环境变量的类型安全和完整性
 * 所有环境变量都通过此文件统一访问，避免直接使用 process.env
 */

import { config } from 'dotenv';
import { z } from 'zod';
import { startupLogger } from '../logger';

// 加载 .env 文件
config();

/**
 * 环境变量 Schema 定义
 */
const envSchema = z.object({
  // ============================================
  // 服务器配置
  // ============================================
  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive().max(65535, 'PORT 必须在 1-65535 范围内')),

  // 单用户本地工具，默认只监听本机
  HOST: z.string().default('127.0.0.1'),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  CORS_ORIGIN: z.string().default('http://localhost:5173'),

  // ============================================
  // 日志配置
  // ============================================
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),

  // ============================================
  // 数据文件配置
  // ============================================
  DATA_DIR: z.string().min(1).default('./data'),

  VOCABULARY_FILE: z.string().min(1).default('./data/english_spanish.csv'),

  // ============================================
  // 调度配置
  // ============================================
  // 设置后所有洗牌/干扰项抽取都可复现
  RANDOM_SEED: z.string().min(1).optional(),

  REVISION_MIN_DUE: z
    .string()
    .default('5')
    .transform((val) => parseInt(val, 10))
    .pipe(z.number().int().positive()),
});

/**
 * 环境变量类型
 */
export type Env = z.infer<typeof envSchema>;

/**
 * 验证并解析环境变量
 */
export function validateEnv(source: NodeJS.ProcessEnv = process.env): Env {
  try {
    const parsed = envSchema.parse({
      PORT: source.PORT,
      HOST: source.HOST,
      NODE_ENV: source.NODE_ENV,
      CORS_ORIGIN: source.CORS_ORIGIN,
      LOG_LEVEL: source.LOG_LEVEL,
      DATA_DIR: source.DATA_DIR,
      VOCABULARY_FILE: source.VOCABULARY_FILE,
      RANDOM_SEED: source.RANDOM_SEED,
      REVISION_MIN_DUE: source.REVISION_MIN_DUE,
    });

    if (parsed.NODE_ENV === 'production' && parsed.RANDOM_SEED) {
      startupLogger.warn('⚠️ 生产环境配置了 RANDOM_SEED，每次启动的选词顺序都会相同');
    }

    startupLogger.info(`环境变量验证成功 (环境: ${parsed.NODE_ENV})`);
    return parsed;
  } catch (error) {
    if (error instanceof z.ZodError) {
      startupLogger.error('环境变量验证失败:');
      error.errors.forEach((err) => {
        startupLogger.error(`  - ${err.path.join('.')}: ${err.message}`);
      });
      throw new Error('环境变量配置错误，请检查 .env 文件');
    }
    throw error;
  }
}

/**
 * 导出验证后的环境变量
 *
 * @example
 * ```ts
 * import { env } from './config/env';
 *
 * console.log(`Server running on port ${env.PORT}`);
 * ```
 */
export const env = validateEnv();
