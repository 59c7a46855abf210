import path from 'path';
import { CritiqueCategory } from '../domain/entities/Critique';
import { ConfigError } from '../domain/errors/CouncilErrors';

export type GenerationProvider = 'openai' | 'claude' | 'gemini' | 'mock';
export type StorageMode = 'file' | 'memory';

const GENERATION_PROVIDERS: ReadonlyArray<GenerationProvider> = ['openai', 'claude', 'gemini', 'mock'];
const STORAGE_MODES: ReadonlyArray<StorageMode> = ['file', 'memory'];

export interface LearningSettings {
  /** outcome scores strictly above this count as success */
  successThreshold: number;
  successDelta: number;
  failureDelta: number;
  learningRate: number;
  weightFloor: number;
}

export interface CouncilConfig {
  agentsPath: string;
  stateDir: string;
  storage: StorageMode;
  generationProvider: GenerationProvider;
  proposalsPerAgent: number;
  generationTimeoutMs: number;
  trendLimit: number;
  trendsPath: string;
  learning: LearningSettings;
  penalties: Record<CritiqueCategory, number>;
  apiKeys: {
    openai?: string;
    anthropic?: string;
    google?: string;
  };
  models: {
    openai: string;
    claude: string;
    gemini: string;
  };
}

export interface ParsedCouncilConfig {
  config: CouncilConfig;
  errors: string[];
  warnings: string[];
}

type Env = Record<string, string | undefined>;

export const DEFAULT_LEARNING: LearningSettings = {
  successThreshold: 7,
  successDelta: 0.2,
  failureDelta: 0.1,
  learningRate: 1.0,
  weightFloor: 0.1
};

export const DEFAULT_PENALTIES: Record<CritiqueCategory, number> = {
  [CritiqueCategory.RISK]: 3,
  [CritiqueCategory.GOAL_CONFLICT]: 2,
  [CritiqueCategory.MISSED_OPPORTUNITY]: 1
};

/**
 * Builds the council configuration from environment variables, collecting every problem
 * instead of stopping at the first one.
 */
export function parseCouncilConfig(env: Env = process.env): ParsedCouncilConfig {
  const errors: string[] = [];
  const warnings: string[] = [];

  const readNumber = (name: string, fallback: number, check?: (value: number) => string | null): number => {
    const raw = env[name];
    if (raw === undefined || raw.trim() === '') {
      return fallback;
    }
    const value = Number(raw);
    if (!Number.isFinite(value)) {
      errors.push(`${name} must be a number, got "${raw}"`);
      return fallback;
    }
    const problem = check ? check(value) : null;
    if (problem) {
      errors.push(`${name} ${problem}`);
      return fallback;
    }
    return value;
  };

  const positive = (value: number) => (value > 0 ? null : 'must be greater than 0');
  const nonNegative = (value: number) => (value >= 0 ? null : 'must not be negative');
  const positiveInteger = (value: number) =>
    Number.isInteger(value) && value > 0 ? null : 'must be a positive integer';

  const provider = (env.GENERATION_PROVIDER || 'mock').toLowerCase();
  let generationProvider: GenerationProvider = 'mock';
  if (isOneOf(provider, GENERATION_PROVIDERS)) {
    generationProvider = provider;
  } else {
    errors.push(`Unknown GENERATION_PROVIDER: ${provider}. Valid options: ${GENERATION_PROVIDERS.join(', ')}`);
  }

  const storageRaw = (env.COUNCIL_STORAGE || 'file').toLowerCase();
  let storage: StorageMode = 'file';
  if (isOneOf(storageRaw, STORAGE_MODES)) {
    storage = storageRaw;
  } else {
    errors.push(`Unknown COUNCIL_STORAGE: ${storageRaw}. Valid options: ${STORAGE_MODES.join(', ')}`);
  }

  const apiKeys = {
    openai: env.OPENAI_API_KEY,
    anthropic: env.ANTHROPIC_API_KEY,
    google: env.GOOGLE_API_KEY
  };

  const requiredKey: Record<Exclude<GenerationProvider, 'mock'>, [string, string | undefined]> = {
    openai: ['OPENAI_API_KEY', apiKeys.openai],
    claude: ['ANTHROPIC_API_KEY', apiKeys.anthropic],
    gemini: ['GOOGLE_API_KEY', apiKeys.google]
  };
  if (generationProvider !== 'mock') {
    const [keyName, keyValue] = requiredKey[generationProvider];
    if (!keyValue) {
      errors.push(`${keyName} is required when GENERATION_PROVIDER is ${generationProvider}`);
    }
  }

  const learning: LearningSettings = {
    successThreshold: readNumber('LEARNING_SUCCESS_THRESHOLD', DEFAULT_LEARNING.successThreshold, value =>
      value >= 0 && value <= 10 ? null : 'must be between 0 and 10'
    ),
    successDelta: readNumber('LEARNING_SUCCESS_DELTA', DEFAULT_LEARNING.successDelta, nonNegative),
    failureDelta: readNumber('LEARNING_FAILURE_DELTA', DEFAULT_LEARNING.failureDelta, nonNegative),
    learningRate: readNumber('LEARNING_RATE', DEFAULT_LEARNING.learningRate, nonNegative),
    weightFloor: readNumber('WEIGHT_FLOOR', DEFAULT_LEARNING.weightFloor, positive)
  };

  const penalties: Record<CritiqueCategory, number> = {
    [CritiqueCategory.RISK]: readNumber('PENALTY_RISK', DEFAULT_PENALTIES[CritiqueCategory.RISK], nonNegative),
    [CritiqueCategory.GOAL_CONFLICT]: readNumber(
      'PENALTY_GOAL_CONFLICT',
      DEFAULT_PENALTIES[CritiqueCategory.GOAL_CONFLICT],
      nonNegative
    ),
    [CritiqueCategory.MISSED_OPPORTUNITY]: readNumber(
      'PENALTY_MISSED_OPPORTUNITY',
      DEFAULT_PENALTIES[CritiqueCategory.MISSED_OPPORTUNITY],
      nonNegative
    )
  };

  if (penalties[CritiqueCategory.RISK] < penalties[CritiqueCategory.MISSED_OPPORTUNITY]) {
    warnings.push('PENALTY_RISK is lower than PENALTY_MISSED_OPPORTUNITY; risk flags will weigh less than missed opportunities');
  }

  const generationTimeoutMs = readNumber('GENERATION_TIMEOUT_MS', 30000, positiveInteger);
  if (generationTimeoutMs < 1000) {
    warnings.push(`GENERATION_TIMEOUT_MS is very low (${generationTimeoutMs}ms); most calls will fall back`);
  }

  const config: CouncilConfig = {
    agentsPath: path.resolve(env.COUNCIL_AGENTS_PATH || path.join('config', 'agents.json')),
    stateDir: path.resolve(env.COUNCIL_STATE_DIR || path.join('data', 'state')),
    storage,
    generationProvider,
    proposalsPerAgent: readNumber('PROPOSALS_PER_AGENT', 2, positiveInteger),
    generationTimeoutMs,
    trendLimit: readNumber('TREND_LIMIT', 10, positiveInteger),
    trendsPath: path.resolve(env.COUNCIL_TRENDS_PATH || path.join('data', 'sample_trends.json')),
    learning,
    penalties,
    apiKeys,
    models: {
      openai: env.OPENAI_MODEL || 'gpt-4o-mini',
      claude: env.CLAUDE_MODEL || 'claude-3-5-sonnet-latest',
      gemini: env.GEMINI_MODEL || 'gemini-1.5-flash'
    }
  };

  return { config, errors, warnings };
}

export function getCouncilConfig(env: Env = process.env): CouncilConfig {
  const { config, errors } = parseCouncilConfig(env);
  if (errors.length > 0) {
    throw new ConfigError('Invalid council configuration', { errors });
  }
  return config;
}

function isOneOf<T extends string>(value: string, options: ReadonlyArray<T>): value is T {
  return options.some(option => option === value);
}
