import { Request, Response, NextFunction } from 'express';
import { AppError, ErrorCode } from '../../domain/errors/AppError';
import { logger } from '../../infrastructure/logging/Logger';

export function errorHandler(
  error: Error,
  req: Request,
  res: Response,
  next: NextFunction
): void {
  if (res.headersSent) {
    return next(error);
  }

  if (error instanceof AppError) {
    const log = error.statusCode >= 500 ? logger.error.bind(logger) : logger.warn.bind(logger);
    log('Request failed', {
      code: error.code,
      error: error.message,
      path: req.path,
      method: req.method
    });

    res.status(error.statusCode).json({
      success: false,
      error: error.message,
      code: error.code,
      ...(error.details !== undefined && { details: error.details })
    });
    return;
  }

  logger.error('Unhandled error', {
    error: error.message,
    stack: error.stack,
    path: req.path,
    method: req.method,
    ip: req.ip
  });

  const isDevelopment = process.env.NODE_ENV === 'development';

  res.status(500).json({
    success: false,
    error: isDevelopment ? error.message : 'Internal server error',
    code: ErrorCode.INTERNAL_ERROR,
    ...(isDevelopment && { stack: error.stack })
  });
}

export function notFoundHandler(req: Request, res: Response): void {
  logger.warn('Route not found', {
    path: req.path,
    method: req.method,
    ip: req.ip
  });

  res.status(404).json({
    success: false,
    error: 'Route not found',
    code: ErrorCode.NOT_FOUND
  });
}

export function asyncHandler(
  fn: (req: Request, res: Response, next: NextFunction) => Promise<unknown>
) {
  return (req: Request, res: Response, next: NextFunction) => {
    Promise.resolve(fn(req, res, next)).catch(next);
  };
}
