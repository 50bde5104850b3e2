import { Express } from 'express';
import express from 'express';
import cors from 'cors';
import helmet from 'helmet';
import { logger } from '../utils/logger';

const parseCorsOrigins = (rawOrigins?: string): string[] => {
  if (!rawOrigins) {
    return [];
  }

  return rawOrigins
    .split(',')
    .map((origin) => origin.trim())
    .filter(Boolean);
};

/**
 * 配置所有中间件
 */
export const setupMiddleware = (app: Express): void => {
  const allowedOrigins = parseCorsOrigins(process.env['CORS_ORIGIN']);

  // 安全中间件 - helmet
  app.use(helmet());

  // CORS中间件：未配置 CORS_ORIGIN 时只放行无 Origin 的调用（命令行、监控探针）
  app.use(
    cors({
      origin: (origin, callback) => {
        if (!origin || allowedOrigins.includes(origin) || allowedOrigins.includes('*')) {
          callback(null, true);
          return;
        }

        logger.warn(`CORS拒绝来源: ${origin}`);
        callback(null, false);
      },
      methods: ['GET', 'POST'],
      allowedHeaders: ['Content-Type', 'Authorization'],
    })
  );

  // Body解析中间件
  app.use(express.json({ limit: '100kb' }));

  // 请求日志中间件
  app.use((req, _res, next) => {
    logger.info(`${req.method} ${req.path}`);
    next();
  });

  logger.debug(`CORS允许来源: ${allowedOrigins.join(', ') || '(无)'}`);
};
