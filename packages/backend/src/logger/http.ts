/**
 * HTTP 请求日志中间件
 *
 * 功能:
 * - 为每个请求分配唯一 requestId
 * - 记录请求/响应元数据
 * - 健康检查等路径静默处理
 * - 根据状态码自动选择日志级别
 */

import type { RequestHandler } from 'express';
import type { IncomingMessage, ServerResponse } from 'http';
import pinoHttp, { type HttpLogger, type Options } from 'pino-http';
import { v4 as uuidv4 } from 'uuid';
import { logger, serializers } from './index';

/** 不记录日志的路径 */
const SILENT_PATHS = ['/health', '/favicon.ico'];

function shouldSilence(path: string): boolean {
  return SILENT_PATHS.includes(path);
}

/**
 * 根据响应状态码确定日志级别
 */
function determineLogLevel(
  _req: IncomingMessage,
  res: ServerResponse,
  err?: Error,
): 'error' | 'warn' | 'info' {
  if (err || res.statusCode >= 500) {
    return 'error';
  }
  if (res.statusCode >= 400) {
    return 'warn';
  }
  return 'info';
}

/**
 * 生成或提取请求 ID
 * 优先使用上游传递的 X-Request-ID
 */
function generateRequestId(req: IncomingMessage): string {
  const existingId = req.headers['x-request-id'];
  if (typeof existingId === 'string' && existingId.length > 0) {
    return existingId;
  }
  return uuidv4();
}

function buildHttpLoggerOptions(): Options {
  return {
    logger,
    serializers,

    // 复用 requestIdMiddleware 预先注入的 id
    genReqId: (req: IncomingMessage) => req.id ?? generateRequestId(req),

    customProps: (req: IncomingMessage) => ({
      requestId: req.id,
    }),

    autoLogging: {
      ignore: (req: IncomingMessage) => shouldSilence(req.url || ''),
    },

    customLogLevel: determineLogLevel,

    customSuccessMessage: (req: IncomingMessage, res: ServerResponse) => {
      return `${req.method} ${req.url} ${res.statusCode}`;
    },

    customErrorMessage: (req: IncomingMessage, res: ServerResponse, err: Error) => {
      return `${req.method} ${req.url} ${res.statusCode} - ${err.message}`;
    },

    customAttributeKeys: {
      req: 'request',
      res: 'response',
      err: 'error',
      responseTime: 'duration',
    },
  };
}

let httpLoggerInstance: HttpLogger | null = null;

/**
 * 获取 HTTP 日志中间件（单例）
 */
export function getHttpLogger(): HttpLogger {
  if (!httpLoggerInstance) {
    httpLoggerInstance = pinoHttp(buildHttpLoggerOptions());
  }
  return httpLoggerInstance;
}

/**
 * 请求 ID 注入中间件
 * 在 pino-http 之前运行，确保 requestId 可用于后续中间件
 */
export const requestIdMiddleware: RequestHandler = (req, res, next) => {
  const requestId = generateRequestId(req);
  req.id = requestId;
  res.setHeader('X-Request-ID', requestId);
  next();
};

/**
 * 组合的日志中间件
 * 包含 requestId 注入和 HTTP 日志记录
 */
export const httpLoggerMiddleware: RequestHandler = (req, res, next) => {
  requestIdMiddleware(req, res, (err?: unknown) => {
    if (err) {
      return next(err);
    }
    getHttpLogger()(req, res, next);
  });
};
