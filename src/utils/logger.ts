import winston from 'winston';
import path from 'path';
import fs from 'fs';

const isTestEnv = process.env['NODE_ENV'] === 'test';
const logsDir = path.resolve(process.env['LOG_DIR'] || path.join(process.cwd(), 'logs'));

// 测试环境不落盘
if (!isTestEnv && !fs.existsSync(logsDir)) {
  fs.mkdirSync(logsDir, { recursive: true });
}

const renderMeta = (meta: Record<string, unknown>): string => {
  const keys = Object.keys(meta);
  if (keys.length === 0) {
    return '';
  }
  return ` ${JSON.stringify(meta)}`;
};

// 日志格式
const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.printf(({ timestamp, level, message, stack, ...meta }) => {
    const line = `[${String(timestamp)}] ${level.toUpperCase()}: ${String(message)}${renderMeta(meta)}`;
    return typeof stack === 'string' ? `${line}\n${stack}` : line;
  })
);

const fileTransports = !isTestEnv
  ? [
      new winston.transports.File({
        filename: path.join(logsDir, 'combined.log'),
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
      new winston.transports.File({
        filename: path.join(logsDir, 'error.log'),
        level: 'error',
        maxsize: 5242880, // 5MB
        maxFiles: 5,
      }),
    ]
  : [];

export const logger = winston.createLogger({
  level: process.env['LOG_LEVEL'] || 'info',
  format: logFormat,
  transports: [
    new winston.transports.Console({
      silent: isTestEnv,
      // 控制台走 stderr，stdout 留给 CI 摘要行
      stderrLevels: ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'],
      format: winston.format.combine(winston.format.colorize(), logFormat),
    }),
    ...fileTransports,
  ],
});

/**
 * 把 unknown 错误转成可读文本
 */
export const describeError = (error: unknown): string => {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
};

export default logger;
