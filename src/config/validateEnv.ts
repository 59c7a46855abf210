import { logger } from '../infrastructure/logging/Logger';
import { parseCouncilConfig } from './councilConfig';

type Env = Record<string, string | undefined>;

interface ValidationResult {
  isValid: boolean;
  errors: string[];
  warnings: string[];
}

/**
 * Validates server and council environment variables
 */
export function validateEnvironment(env: Env = process.env): ValidationResult {
  const { errors, warnings } = parseCouncilConfig(env);

  // Port validation
  if (env.PORT) {
    const port = parseInt(env.PORT);
    if (isNaN(port) || port < 1 || port > 65535) {
      warnings.push(`Invalid PORT value: ${env.PORT}. Using default 3000.`);
    }
  }

  const logLevels = ['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly'];
  if (env.LOG_LEVEL && !logLevels.includes(env.LOG_LEVEL)) {
    warnings.push(`Unknown LOG_LEVEL: ${env.LOG_LEVEL}. Valid options: ${logLevels.join(', ')}`);
  }

  return {
    isValid: errors.length === 0,
    errors,
    warnings
  };
}

/**
 * Logs environment validation results and exits if critical errors found
 */
export function validateAndExitOnErrors(): void {
  logger.info('Validating environment configuration...');

  const result = validateEnvironment();

  result.warnings.forEach(warning => {
    logger.warn(`Environment warning: ${warning}`);
  });

  result.errors.forEach(error => {
    logger.error(`Environment error: ${error}`);
  });

  if (!result.isValid) {
    logger.error('Environment validation failed. Cannot start server.');
    logger.error('Please check your environment variables and try again.');
    process.exit(1);
  }

  logger.info('Environment validation passed.');

  // Current configuration, without secrets
  const { config } = parseCouncilConfig();
  logger.info('Current configuration:', {
    NODE_ENV: process.env.NODE_ENV || 'development',
    PORT: process.env.PORT || '3000',
    STORAGE: config.storage,
    STATE_DIR: config.stateDir,
    AGENTS_PATH: config.agentsPath,
    GENERATION_PROVIDER: config.generationProvider,
    PROPOSALS_PER_AGENT: config.proposalsPerAgent,
    LEARNING: config.learning,
    PENALTIES: config.penalties,
    AI_SERVICES: {
      OPENAI: !!config.apiKeys.openai,
      ANTHROPIC: !!config.apiKeys.anthropic,
      GOOGLE: !!config.apiKeys.google
    }
  });
}
