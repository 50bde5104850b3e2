import { Request, Response, NextFunction } from 'express';
import { ZodError } from 'zod';
import { logger } from '../utils/logger';
import { LedgerUnavailableError, PipelineBusyError } from '../utils/errors';

/**
 * 自定义错误类
 */
export class AppError extends Error {
  constructor(
    public statusCode: number,
    message: string,
    public isOperational = true
  ) {
    super(message);
    Object.setPrototypeOf(this, AppError.prototype);
  }
}

/**
 * 领域错误转成 HTTP 错误
 */
const toAppError = (err: Error): AppError | undefined => {
  if (err instanceof AppError) {
    return err;
  }
  if (err instanceof ZodError) {
    const issue = err.issues[0];
    const field = issue?.path.join('.') || 'body';
    return new AppError(400, `参数无效: ${field} ${issue?.message ?? ''}`.trim());
  }
  if (err instanceof PipelineBusyError) {
    return new AppError(409, err.message);
  }
  if (err instanceof LedgerUnavailableError) {
    return new AppError(503, err.message);
  }
  return undefined;
};

/**
 * 错误处理中间件
 */
export const errorHandler = (err: Error, _req: Request, res: Response, _next: NextFunction): void => {
  // 默认错误状态码和消息
  let statusCode = 500;
  let message = '服务器内部错误';
  let isOperational = false;

  const appError = toAppError(err);
  if (appError) {
    statusCode = appError.statusCode;
    message = appError.message;
    isOperational = appError.isOperational;
  }

  // 记录错误日志
  if (!isOperational || statusCode >= 500) {
    logger.error('错误:', {
      message: err.message,
      stack: err.stack,
      statusCode,
    });
  } else {
    logger.warn('操作错误:', {
      message: err.message,
      statusCode,
    });
  }

  res.status(statusCode).json({
    success: false,
    error: message,
  });
};

/**
 * 404错误处理
 */
export const notFoundHandler = (_req: Request, _res: Response, next: NextFunction): void => {
  next(new AppError(404, '请求的资源不存在'));
};

/**
 * 异步错误包装器
 */
export const asyncHandler = (fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>) => {
  return (req: Request, res: Response, next: NextFunction): void => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
};
