/**
 * Environment variable validation using Zod.
 *
 * Validates required environment variables at startup and provides
 * a typed configuration object. Fails fast with clear error messages
 * if required variables are missing or invalid.
 */

import 'dotenv/config';
import { z } from 'zod';
import { logger } from './logger.js';

function positiveInt(name: string, fallback: string) {
  return z
    .string()
    .default(fallback)
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val > 0, {
      message: `${name} must be a positive integer`,
    });
}

const envSchema = z.object({
  CFBD_API_KEY: z
    .string({ required_error: 'CFBD_API_KEY is required' })
    .min(1, 'CFBD_API_KEY cannot be empty'),

  MCP_SHARED_SECRET: z
    .string({ required_error: 'MCP_SHARED_SECRET is required' })
    .min(16, 'MCP_SHARED_SECRET must be at least 16 characters'),

  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val > 0 && val < 65536, {
      message: 'PORT must be a valid port number (1-65535)',
    }),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),

  DEBUG: z
    .enum(['0', '1'])
    .default('0')
    .transform((val) => val === '1'),

  PUBLIC_BASE_URL: z
    .string()
    .url('PUBLIC_BASE_URL must be a valid URL')
    .optional()
    .transform((val) => (val ? val.replace(/\/+$/, '') : undefined))
    .describe('Externally visible origin used in OAuth metadata; derived per request when unset'),

  CFBD_API_BASE_URL: z
    .string()
    .url('CFBD_API_BASE_URL must be a valid URL')
    .default('https://apinext.collegefootballdata.com'),

  TOKEN_DB_PATH: z.string().default('./data/tokens.db'),

  REDIS_URL: z
    .string()
    .url('REDIS_URL must be a valid URL')
    .optional()
    .describe('Shared cache backend; an in-process LRU cache is used when unset'),

  CACHE_DEFAULT_TTL_SECONDS: positiveInt('CACHE_DEFAULT_TTL_SECONDS', '3600'),

  CACHE_TIMEOUT_MS: positiveInt('CACHE_TIMEOUT_MS', '500'),

  CACHE_RETRY_INTERVAL_MS: positiveInt('CACHE_RETRY_INTERVAL_MS', '30000'),

  UPSTREAM_TIMEOUT_MS: positiveInt('UPSTREAM_TIMEOUT_MS', '30000'),

  AUTH_CODE_TTL_SECONDS: z
    .string()
    .default('600')
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val >= 0, {
      message: 'AUTH_CODE_TTL_SECONDS must be zero (no expiry) or a positive integer',
    }),
});

export type Env = z.infer<typeof envSchema>;

export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => '  - ' + err.path.join('.') + ': ' + err.message)
      .join('\n');

    logger.error('Environment validation failed', {
      errors: result.error.errors.map((e) => ({
        path: e.path,
        message: e.message,
      })),
    });

    throw new Error('Environment validation failed:\n' + errors);
  }

  logger.info('Environment validated successfully', {
    port: result.data.PORT,
    env: result.data.NODE_ENV,
    logLevel: result.data.LOG_LEVEL,
    cache: result.data.REDIS_URL ? 'redis' : 'memory',
  });

  return result.data;
}

let _env: Env | null = null;

export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

/**
 * Drops the memoized configuration. Used by tests that mutate process.env.
 */
export function resetEnv(): void {
  _env = null;
}
