import { SCORING_STRATEGY_NAMES, ScoringStrategyName } from '@crease/constants';

/**
 * Application configuration
 */
export interface AppConfig {
  port: number;
  corsOrigin: string;
  scoring: {
    strategy: ScoringStrategyName;
  };
  logging: LoggingConfig;
  redis: {
    enabled: boolean;
    host: string;
    port: number;
    password: string | undefined;
  };
}

export interface LoggingConfig {
  level: string;
  directory: string;
  maxFileSize: string;
  maxFiles: number;
}

type Env = Record<string, string | undefined>;

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'];

function isScoringStrategyName(value: string): value is ScoringStrategyName {
  return SCORING_STRATEGY_NAMES.some((name) => name === value);
}

function parseInteger(value: string | undefined, fallback: number): number {
  return value ? parseInt(value, 10) : fallback;
}

/**
 * Build the typed configuration from environment variables
 */
export function buildConfig(env: Env): AppConfig {
  const strategy = (env.SCORING_STRATEGY || 'standard').toLowerCase();

  return {
    port: parseInteger(env.PORT, 4000),
    corsOrigin: env.CORS_ORIGIN || 'http://localhost:3000',
    scoring: {
      strategy: isScoringStrategyName(strategy) ? strategy : 'standard',
    },
    logging: {
      level: env.LOG_LEVEL || 'info',
      directory: env.LOG_DIRECTORY || 'logs',
      maxFileSize: env.LOG_MAX_FILE_SIZE || '10MB',
      maxFiles: parseInteger(env.LOG_MAX_FILES, 5),
    },
    redis: {
      enabled: env.REDIS_ENABLED === 'true',
      host: env.REDIS_HOST || 'localhost',
      port: parseInteger(env.REDIS_PORT, 6379),
      password: env.REDIS_PASSWORD || undefined,
    },
  };
}

/**
 * Validate raw environment values; used as the ConfigModule `validate` hook
 */
export function validateEnv(env: Env): Env {
  const strategy = env.SCORING_STRATEGY;
  if (strategy && !isScoringStrategyName(strategy.toLowerCase())) {
    throw new Error(
      `Configuration error: SCORING_STRATEGY must be one of ${SCORING_STRATEGY_NAMES.join(', ')} (got "${strategy}")`,
    );
  }

  const level = env.LOG_LEVEL;
  if (level && !LOG_LEVELS.includes(level)) {
    throw new Error(`Configuration error: LOG_LEVEL must be one of ${LOG_LEVELS.join(', ')}`);
  }

  for (const key of ['PORT', 'REDIS_PORT', 'LOG_MAX_FILES']) {
    const value = env[key];
    if (value !== undefined && value !== '' && !/^\d+$/.test(value)) {
      throw new Error(`Configuration error: ${key} must be a positive integer`);
    }
  }

  if (env.LOG_MAX_FILE_SIZE && !/^(\d+)(B|KB|MB|GB)$/i.test(env.LOG_MAX_FILE_SIZE)) {
    throw new Error(`Configuration error: invalid LOG_MAX_FILE_SIZE "${env.LOG_MAX_FILE_SIZE}"`);
  }

  return env;
}

/**
 * ConfigModule loader
 */
export default (): AppConfig => buildConfig(process.env);
