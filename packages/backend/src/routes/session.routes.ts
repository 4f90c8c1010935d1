/**
 * 学习会话路由
 *
 * 单用户、单会话：当前会话固定通过 /api/sessions/current 访问
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import {
  StartSessionSchema,
  SubmitAnswerSchema,
  type StartSessionDto,
  type SubmitAnswerDto,
} from '@lexiloop/shared';
import { routeLogger } from '../logger';
import { validateBody } from '../middleware/validate.middleware';
import type { LearningSessionService } from '../services/learning-session.service';

export function createSessionRoutes(service: LearningSessionService): Router {
  const router = Router();

  /**
   * POST /api/sessions
   * 开始新会话
   *
   * Body: { mode: 'new' | 'revision' }
   */
  router.post(
    '/',
    validateBody(StartSessionSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { mode }: StartSessionDto = req.body;
        const session = await service.startSession(mode);
        routeLogger.info(
          { sessionIndex: session.sessionIndex, mode, size: session.words.length },
          '[SessionRoutes] 会话已创建',
        );
        res.status(201).json({ success: true, data: session });
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * GET /api/sessions/current
   */
  router.get('/current', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: service.getActiveSession() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * POST /api/sessions/current/answers
   *
   * Body: { word: string, answer: string, responseTime: number (秒) }
   */
  router.post(
    '/current/answers',
    validateBody(SubmitAnswerSchema),
    async (req: Request, res: Response, next: NextFunction) => {
      try {
        const { word, answer, responseTime }: SubmitAnswerDto = req.body;
        const result = await service.submitAnswer(word, answer, responseTime);
        res.json({ success: true, data: result });
      } catch (error) {
        next(error);
      }
    },
  );

  /**
   * POST /api/sessions/current/finish
   */
  router.post('/current/finish', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const summary = await service.finishSession();
      res.json({ success: true, data: summary });
    } catch (error) {
      next(error);
    }
  });

  /**
   * DELETE /api/sessions/current
   * 放弃当前会话（已提交的作答保留）
   */
  router.delete('/current', async (_req: Request, res: Response, next: NextFunction) => {
    try {
      const result = await service.abandonSession();
      res.json({ success: true, data: result });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
