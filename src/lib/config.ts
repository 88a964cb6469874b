/**
 * Runtime Configuration
 *
 * Reads the process environment once and validates it with Zod so that a
 * misconfigured deployment fails at startup instead of mid-allocation.
 *
 * Recognised variables:
 * - NODE_ENV:            development | test | production (default development)
 * - LOG_LEVEL:           error | warn | info | debug (default depends on NODE_ENV)
 * - DATABASE_PATH:       SQLite file path, or ":memory:" (default data/allocations.db)
 * - LOCK_MAX_RETRIES:    retries after an optimistic lock failure (default 3)
 * - LOCK_BASE_DELAY_MS:  first backoff delay in milliseconds (default 100)
 * - LOCK_MAX_DELAY_MS:   backoff ceiling in milliseconds (default 1000)
 *
 * Usage:
 *   import { loadConfig } from './config';
 *   const { databasePath } = loadConfig();
 */

import { z } from 'zod';

const LOG_LEVELS = ['error', 'warn', 'info', 'debug'] as const;

export type LogLevel = (typeof LOG_LEVELS)[number];

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).optional(),
  DATABASE_PATH: z.string().min(1, 'DATABASE_PATH cannot be empty').default('data/allocations.db'),
  LOCK_MAX_RETRIES: z.coerce.number().int().min(0).max(10).default(3),
  LOCK_BASE_DELAY_MS: z.coerce.number().int().min(0).default(100),
  LOCK_MAX_DELAY_MS: z.coerce.number().int().min(0).default(1000),
});

export interface AppConfig {
  nodeEnv: 'development' | 'test' | 'production';
  logLevel: LogLevel;
  databasePath: string;
  lockRetry: {
    maxRetries: number;
    baseDelay: number;
    maxDelay: number;
  };
}

/**
 * Parses configuration from the given environment (process.env by default).
 *
 * The log level falls back to 'debug' in development and 'warn' elsewhere,
 * matching what operators expect when LOG_LEVEL is unset.
 *
 * @throws Error listing every invalid variable
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const issues = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid configuration: ${issues}`);
  }

  const values = parsed.data;
  return {
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL ?? (values.NODE_ENV === 'development' ? 'debug' : 'warn'),
    databasePath: values.DATABASE_PATH,
    lockRetry: {
      maxRetries: values.LOCK_MAX_RETRIES,
      baseDelay: values.LOCK_BASE_DELAY_MS,
      maxDelay: Math.max(values.LOCK_MAX_DELAY_MS, values.LOCK_BASE_DELAY_MS),
    },
  };
}
