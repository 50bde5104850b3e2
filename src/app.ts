/**
 * Express应用配置
 */
import express, { Application } from 'express';
import { errorHandler, notFoundHandler } from './middleware/errorHandler';
import { logger } from './utils/logger';
import { createApiRouter } from './routes/api';
import { ProspectionRouteContext } from './routes/api/prospection';
import { setupMiddleware } from './middleware';

/**
 * 创建并配置Express应用
 */
export function createApp(ctx: ProspectionRouteContext): Application {
  const app = express();

  setupMiddleware(app);

  // 健康检查端点
  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      running: ctx.pipeline.isRunning(),
      timestamp: new Date().toISOString(),
    });
  });

  // API路由
  app.use('/api', createApiRouter(ctx));

  // 404错误处理
  app.use(notFoundHandler);

  // 全局错误处理中间件（必须放在最后）
  app.use(errorHandler);

  logger.info('✅ Express应用配置完成');

  return app;
}
