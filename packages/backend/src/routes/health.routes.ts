/**
 * 健康检查路由
 */

import { Router, type Request, type Response } from 'express';

interface HealthStatus {
  status: 'healthy';
  timestamp: string;
  uptime: number;
}

export function createHealthRoutes(): Router {
  const router = Router();

  /**
   * GET /health
   */
  router.get('/', (_req: Request, res: Response) => {
    const body: HealthStatus = {
      status: 'healthy',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
    };
    res.json(body);
  });

  return router;
}
