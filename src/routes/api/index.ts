/**
 * API路由主入口
 */
import { Router } from 'express';
import { createProspectionRouter, ProspectionRouteContext } from './prospection';

export const createApiRouter = (ctx: ProspectionRouteContext): Router => {
  const router: Router = Router();

  // 挂载路由
  router.use('/prospection', createProspectionRouter(ctx));

  // API根路径
  router.get('/', (_req, res) => {
    res.json({
      message: '账号采集筛选 API',
      version: '1.0.0',
      endpoints: {
        stats: '/api/prospection/stats',
        pending: '/api/prospection/pending',
        approved: '/api/prospection/approved',
        runs: '/api/prospection/runs',
        run: '/api/prospection/run',
      },
    });
  });

  return router;
};
