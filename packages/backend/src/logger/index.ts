/**
 * 统一日志系统 - 基线配置
 *
 * 功能:
 * - 结构化 JSON 日志输出（生产环境）
 * - 美化控制台输出（开发环境）
 * - 敏感信息自动脱敏
 * - 支持子日志器创建
 */

import pino, { type Logger, type LoggerOptions, type DestinationStream } from 'pino';

// ==================== 配置常量 ====================

/** 默认日志级别 */
const DEFAULT_LOG_LEVEL = 'info';

/** 应用名称 */
const APP_NAME = 'lexiloop-backend';

/** 需要脱敏的字段路径 */
const REDACT_PATHS = [
  'req.headers.authorization',
  'req.headers.cookie',
  '*.password',
  '*.token',
  '*.secret',
  '*.apiKey',
];

// ==================== 环境检测 ====================

// 此处不能依赖 config/env，env 校验本身需要日志器
const LOG_LEVEL = process.env.LOG_LEVEL || DEFAULT_LOG_LEVEL;
const NODE_ENV = process.env.NODE_ENV || 'development';
const IS_PRODUCTION = NODE_ENV === 'production';
const IS_TEST = NODE_ENV === 'test';

// ==================== 序列化器 ====================

/**
 * 错误序列化器 - 保留完整堆栈和错误码
 */
function errSerializer(err: Error): pino.SerializedError {
  const serialized = pino.stdSerializers.err(err);
  if ('code' in err && typeof err.code === 'string') {
    serialized.code = err.code;
  }
  return serialized;
}

/** 序列化器集合 */
export const serializers = {
  err: errSerializer,
};

// ==================== 日志器配置 ====================

function buildLoggerOptions(): LoggerOptions {
  return {
    level: LOG_LEVEL,

    base: {
      app: APP_NAME,
      env: NODE_ENV,
    },

    serializers,

    redact: {
      paths: REDACT_PATHS,
      censor: '[REDACTED]',
    },

    formatters: {
      level(label: string) {
        return { level: label };
      },
      bindings(bindings) {
        // 开发环境移除 pid/hostname 以减少噪音
        if (IS_PRODUCTION) {
          return bindings;
        }
        return {
          ...bindings,
          pid: undefined,
          hostname: undefined,
        };
      },
    },

    timestamp: pino.stdTimeFunctions.isoTime,
  };
}

/**
 * 构建日志传输
 */
function buildTransport(): DestinationStream | undefined {
  // 测试环境不使用特殊传输
  if (IS_TEST) {
    return undefined;
  }

  const targets: pino.TransportTargetOptions[] = [];

  if (!IS_PRODUCTION) {
    targets.push({
      target: 'pino-pretty',
      options: {
        colorize: true,
        translateTime: 'SYS:standard',
        singleLine: false,
        ignore: 'pid,hostname',
        messageFormat: '{msg}',
      },
    });
  } else {
    targets.push({
      target: 'pino/file',
      options: { destination: 1 }, // stdout
    });
  }

  try {
    return pino.transport({ targets });
  } catch (err) {
    console.warn('[Logger] Failed to create transport, falling back to JSON output:', err);
    return undefined;
  }
}

// ==================== 创建日志器实例 ====================

export const logger: Logger = pino(buildLoggerOptions(), buildTransport());

// ==================== 子日志器工厂 ====================

/**
 * 子日志器绑定字段类型
 */
export interface LoggerBindings {
  /** 模块名称 */
  module?: string;
  /** 功能名称 */
  feature?: string;
  /** 请求ID */
  requestId?: string;
  [key: string]: unknown;
}

/**
 * 创建子日志器
 *
 * @example
 * ```typescript
 * const plannerLogger = createChildLogger({ module: 'srs', feature: 'planner' });
 * plannerLogger.info({ size: 15 }, '[SessionPlanner] 会话规划完成');
 * ```
 */
export function createChildLogger(bindings: LoggerBindings = {}): Logger {
  return logger.child(bindings);
}

// ==================== 预置模块日志器 ====================

/** 调度核心日志器 */
export const srsLogger = createChildLogger({ module: 'srs' });

/** 持久化日志器 */
export const storageLogger = createChildLogger({ module: 'storage' });

/** 启动流程日志器 */
export const startupLogger = createChildLogger({ module: 'startup' });

/** 路由模块日志器 */
export const routeLogger = createChildLogger({ module: 'route' });

/** 服务层日志器 */
export const serviceLogger = createChildLogger({ module: 'service' });

export type { Logger } from 'pino';
