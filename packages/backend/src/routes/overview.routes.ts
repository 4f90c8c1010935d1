/**
 * 学习概览与进度汇总路由
 */

import { Router, type Request, type Response, type NextFunction } from 'express';
import type { LearningSessionService } from '../services/learning-session.service';

export function createOverviewRoutes(service: LearningSessionService): Router {
  const router = Router();

  /**
   * GET /api/overview
   * 下一次会话序号、到期单词数、是否提供复习模式
   */
  router.get('/overview', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: service.getOverview() });
    } catch (error) {
      next(error);
    }
  });

  /**
   * GET /api/progress/summary
   */
  router.get('/progress/summary', (_req: Request, res: Response, next: NextFunction) => {
    try {
      res.json({ success: true, data: service.getProgressSummary() });
    } catch (error) {
      next(error);
    }
  });

  return router;
}
