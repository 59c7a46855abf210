import winston from 'winston';
import path from 'path';
import fs from 'fs';

const logDir = process.env.LOG_DIR || 'logs';
const isTest = process.env.NODE_ENV === 'test';

const logFormat = winston.format.combine(
  winston.format.timestamp({ format: 'YYYY-MM-DD HH:mm:ss' }),
  winston.format.errors({ stack: true }),
  winston.format.splat(),
  winston.format.json()
);

const logger = winston.createLogger({
  level: process.env.LOG_LEVEL || 'info',
  format: logFormat,
  defaultMeta: { service: 'campaign-council' }
});

// File transports only outside tests; a missing log directory falls back to console only
if (!isTest) {
  let canWriteFiles = true;
  try {
    if (!fs.existsSync(logDir)) {
      fs.mkdirSync(logDir, { recursive: true });
    }
  } catch (error) {
    canWriteFiles = false;
    process.stderr.write(`Log directory ${logDir} unavailable: ${error instanceof Error ? error.message : String(error)}\n`);
  }

  if (canWriteFiles) {
    logger.add(
      new winston.transports.File({
        filename: path.join(logDir, 'error.log'),
        level: 'error',
        maxsize: 10485760, // 10MB
        maxFiles: 5
      })
    );
    logger.add(
      new winston.transports.File({
        filename: path.join(logDir, 'combined.log'),
        maxsize: 10485760, // 10MB
        maxFiles: 5
      })
    );
  }
}

logger.add(
  new winston.transports.Console({
    silent: isTest,
    format: winston.format.combine(
      winston.format.colorize(),
      winston.format.simple()
    )
  })
);

export { logger };
