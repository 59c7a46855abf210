import express from 'express';
import helmet from 'helmet';
import cors, { CorsOptions } from 'cors';
import { CouncilController } from './interfaces/controllers/CouncilController';
import { createCouncilRoutes } from './interfaces/routes/councilRoutes';
import { errorHandler, notFoundHandler } from './interfaces/middleware/errorMiddleware';
import { apiRateLimiter } from './interfaces/middleware/rateLimitMiddleware';
import { logger } from './infrastructure/logging/Logger';

const DEFAULT_DEV_ORIGINS = [
  'http://localhost:3000',
  'http://localhost:5173',
  'http://127.0.0.1:5173'
];

export function createApp(councilController: CouncilController) {
  const app = express();

  const trustProxy = process.env.TRUST_PROXY;
  if (trustProxy !== undefined) {
    const hops = Number(trustProxy);
    app.set('trust proxy', trustProxy === 'true' ? true : trustProxy === 'false' ? false : Number.isNaN(hops) ? trustProxy : hops);
    logger.info('Express trust proxy configured', { value: trustProxy });
  }

  // Security middleware
  app.use(helmet());

  const envOrigins = (process.env.ALLOWED_ORIGINS || '')
    .split(',')
    .map(origin => origin.trim())
    .filter(origin => origin.length > 0);
  const allowedOrigins = envOrigins.length > 0 ? envOrigins : DEFAULT_DEV_ORIGINS;

  const corsOptions: CorsOptions = {
    origin: (origin, callback) => {
      // same-origin and non-browser requests
      if (!origin || allowedOrigins.includes(origin.replace(/\/$/, ''))) {
        return callback(null, true);
      }
      logger.warn('CORS blocked origin', { origin });
      callback(new Error(`CORS: Origin not allowed: ${origin}`));
    },
    methods: ['GET', 'POST', 'OPTIONS'],
    maxAge: 86400
  };
  app.use(cors(corsOptions));

  app.use(express.json({ limit: '1mb' }));

  app.use(apiRateLimiter);

  // Request logging
  app.use((req, _res, next) => {
    logger.info('Incoming request', {
      method: req.method,
      path: req.path,
      ip: req.ip
    });
    next();
  });

  app.get('/health', (_req, res) => {
    res.json({
      status: 'ok',
      timestamp: new Date().toISOString(),
      environment: process.env.NODE_ENV || 'development'
    });
  });

  app.use('/api/council', createCouncilRoutes(councilController));

  app.use(notFoundHandler);

  // Error handling middleware (must be last)
  app.use(errorHandler);

  return app;
}
