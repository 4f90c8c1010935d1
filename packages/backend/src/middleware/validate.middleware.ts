import type { Request, Response, NextFunction } from 'express';
import type { ZodTypeAny } from 'zod';

/**
 * 请求体验证中间件
 *
 * 校验通过后用解析结果替换 req.body（已去空白、转小写等）；
 * ZodError 交给 errorHandler 统一输出 VALIDATION_ERROR
 */
export function validateBody(schema: ZodTypeAny) {
  return (req: Request, _res: Response, next: NextFunction) => {
    const result = schema.safeParse(req.body ?? {});
    if (!result.success) {
      return next(result.error);
    }
    req.body = result.data;
    next();
  };
}
