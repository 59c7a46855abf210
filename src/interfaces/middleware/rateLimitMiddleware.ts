import rateLimit from 'express-rate-limit';
import { Request, Response } from 'express';
import { ErrorCode } from '../../domain/errors/AppError';
import { logger } from '../../infrastructure/logging/Logger';

export const createRateLimiter = (
  windowMs: number = 15 * 60 * 1000,
  limit: number = 100,
  message: string = 'Too many requests from this IP, please try again later'
) => {
  return rateLimit({
    windowMs,
    limit,
    standardHeaders: true,
    legacyHeaders: false,
    skip: (req: Request) => req.method === 'OPTIONS' || req.path === '/health',
    keyGenerator: (req: Request) => req.ip || 'unknown',
    handler: (req: Request, res: Response) => {
      logger.warn('Rate limit exceeded', {
        ip: req.ip,
        path: req.path,
        method: req.method
      });

      res.status(429).json({
        success: false,
        error: message,
        code: ErrorCode.RATE_LIMIT_EXCEEDED
      });
    }
  });
};

const isDevelopment = process.env.NODE_ENV === 'development';

export const apiRateLimiter = createRateLimiter(
  15 * 60 * 1000,
  isDevelopment ? 1000 : 100
);

// each iteration fans out to every agent's generation backend
export const iterationRateLimiter = createRateLimiter(
  60 * 1000,
  isDevelopment ? 100 : 10
);
