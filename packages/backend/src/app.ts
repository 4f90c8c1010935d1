import express, { type Express } from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { env } from './config/env';
import { httpLoggerMiddleware } from './logger/http';
import { errorHandler, notFoundHandler } from './middleware/error.middleware';
import { createHealthRoutes, createOverviewRoutes, createSessionRoutes } from './routes';
import type { LearningSessionService } from './services/learning-session.service';

/**
 * 创建 Express 应用
 *
 * 服务实例由调用方注入，测试可传入基于内存仓库的服务
 */
export function createApp(service: LearningSessionService): Express {
  const app = express();

  // 请求日志 - 前置以捕获所有请求（包括解析失败的请求）
  app.use(httpLoggerMiddleware);

  app.use(
    helmet({
      contentSecurityPolicy: {
        directives: {
          defaultSrc: ["'self'"],
          scriptSrc: ["'self'"],
          styleSrc: ["'self'"],
          connectSrc: ["'self'", env.CORS_ORIGIN],
          objectSrc: ["'none'"],
          frameSrc: ["'none'"],
          baseUri: ["'self'"],
          formAction: ["'self'"],
        },
      },
      referrerPolicy: { policy: 'strict-origin-when-cross-origin' },
    }),
  );

  app.use(
    cors({
      origin: env.CORS_ORIGIN,
      methods: ['GET', 'POST', 'DELETE', 'OPTIONS'],
      allowedHeaders: ['Content-Type', 'X-Request-ID'],
      exposedHeaders: ['X-Request-ID'],
      maxAge: 86400,
    }),
  );

  app.use(express.json({ limit: '100kb' }));

  app.use('/health', createHealthRoutes());
  app.use('/api', createOverviewRoutes(service));
  app.use('/api/sessions', createSessionRoutes(service));

  app.use(notFoundHandler);
  app.use(errorHandler);

  return app;
}
