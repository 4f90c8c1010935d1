import type { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../logger';

/**
 * 结构化应用错误类
 * 用于区分可预期的业务错误和系统错误，避免泄露内部实现细节
 */
export class AppError extends Error {
  statusCode: number;
  code: string;
  isOperational: boolean;

  constructor(
    message: string,
    statusCode: number = 400,
    code: string = 'BAD_REQUEST',
    isOperational: boolean = true,
  ) {
    super(message);
    this.statusCode = statusCode;
    this.code = code;
    this.isOperational = isOperational;
    Object.setPrototypeOf(this, AppError.prototype);
  }

  // 常用错误工厂方法
  static notFound(message: string = '资源不存在', code: string = 'NOT_FOUND'): AppError {
    return new AppError(message, 404, code);
  }

  static conflict(message: string = '资源冲突', code: string = 'CONFLICT'): AppError {
    return new AppError(message, 409, code);
  }

  static badRequest(message: string = '请求参数错误', code: string = 'BAD_REQUEST'): AppError {
    return new AppError(message, 400, code);
  }

  static internal(message: string = '服务器内部错误'): AppError {
    return new AppError(message, 500, 'INTERNAL_ERROR', false);
  }
}

export function errorHandler(
  err: Error,
  req: Request,
  res: Response,
  // eslint-disable-next-line @typescript-eslint/no-unused-vars
  next: NextFunction,
) {
  // 优先使用 req.log（pino-http 注入的带上下文日志器），fallback 到全局 logger
  const log = req.log ?? logger;
  const logContext = {
    err,
    method: req.method,
    path: req.path,
  };

  // Zod 验证错误 - 业务级别警告
  if (err instanceof ZodError) {
    log.warn(logContext, `参数验证错误: ${err.errors[0]?.message}`);
    return res.status(400).json({
      success: false,
      error: err.errors[0]?.message || '请求参数不合法',
      code: 'VALIDATION_ERROR',
      details: err.errors.map((e) => ({
        path: e.path.join('.'),
        message: e.message,
      })),
    });
  }

  if (err instanceof AppError) {
    if (err.isOperational) {
      log.warn(logContext, `业务错误: ${err.message}`);
    } else {
      log.error(logContext, `系统错误: ${err.message}`);
    }
    return res.status(err.statusCode).json({
      success: false,
      error: err.isOperational ? err.message : '服务器内部错误',
      code: err.code,
    });
  }

  // express.json 解析失败
  if (err instanceof SyntaxError && 'status' in err && err.status === 400) {
    log.warn(logContext, `请求体解析失败: ${err.message}`);
    return res.status(400).json({
      success: false,
      error: '请求体不是合法的 JSON',
      code: 'INVALID_JSON',
    });
  }

  // 未知错误 - 统一返回 500，不泄露内部实现细节
  log.error(logContext, `未处理错误: ${err.message}`);
  return res.status(500).json({
    success: false,
    error: '服务器内部错误',
    code: 'INTERNAL_ERROR',
  });
}

/**
 * 未匹配路由
 */
export function notFoundHandler(req: Request, res: Response) {
  res.status(404).json({
    success: false,
    error: `接口不存在: ${req.method} ${req.path}`,
    code: 'NOT_FOUND',
  });
}
