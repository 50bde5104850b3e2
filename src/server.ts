/**
 * HTTP服务器启动和管理
 */
import http from 'http';
import { Application } from 'express';
import { getServerConfig } from './config';
import { logger } from './utils/logger';

/**
 * 创建HTTP服务器
 */
export function createServer(app: Application): http.Server {
  return http.createServer(app);
}

/**
 * 启动服务器
 */
export async function startServer(server: http.Server): Promise<void> {
  const { port, host } = getServerConfig();

  return new Promise((resolve, reject) => {
    server.listen(port, host, () => {
      logger.info(`✓ 状态服务启动成功: http://${host}:${port} (${process.env['NODE_ENV'] || 'development'})`);
      resolve();
    });

    server.on('error', (error: Error & { code?: string }) => {
      if (error.code === 'EADDRINUSE') {
        logger.error(`✗ 端口 ${port} 已被占用`);
      } else {
        logger.error(`✗ 服务器启动失败: ${error.message}`);
      }
      reject(error);
    });
  });
}

/**
 * 优雅关闭服务器
 */
export async function shutdownServer(server: http.Server): Promise<void> {
  logger.info('正在关闭状态服务...');

  return new Promise((resolve, reject) => {
    server.close((error) => {
      if (error) {
        logger.error(`✗ 服务器关闭失败: ${error.message}`);
        reject(error);
      } else {
        logger.info('✓ 状态服务已关闭');
        resolve();
      }
    });
  });
}
