/**
 * Environment variable validation using Zod.
 *
 * Validates the process environment at startup and provides a typed
 * configuration object. Fails fast on malformed values.
 *
 * HOMEBOX_URL may be empty: every tool checks it on each call and answers
 * with a configuration message instead.
 */

import { z } from 'zod';
import { logger } from './logger.js';

/**
 * Environment variable schema.
 *
 * Homebox connection (all optional, default ''):
 * - HOMEBOX_URL: base URL of the Homebox instance, with or without /api
 * - CF_ACCESS_CLIENT_ID / CF_ACCESS_CLIENT_SECRET: Cloudflare Access service token
 *
 * Server (with defaults):
 * - HOMEBOX_TIMEOUT_MS: per-request timeout (default: 30000)
 * - PORT: Server port (default: 3000)
 * - NODE_ENV: Environment mode (default: development)
 * - LOG_LEVEL: Minimum log level (default: info)
 */
const envSchema = z.object({
  HOMEBOX_URL: z.string().trim().default(''),

  CF_ACCESS_CLIENT_ID: z.string().trim().default(''),

  CF_ACCESS_CLIENT_SECRET: z.string().trim().default(''),

  HOMEBOX_TIMEOUT_MS: z
    .string()
    .default('30000')
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val > 0, {
      message: 'HOMEBOX_TIMEOUT_MS must be a positive number of milliseconds',
    }),

  PORT: z
    .string()
    .default('3000')
    .transform((val) => parseInt(val, 10))
    .refine((val) => !isNaN(val) && val > 0 && val < 65536, {
      message: 'PORT must be a valid port number (1-65535)',
    }),

  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
});

export type Env = z.infer<typeof envSchema>;

/**
 * Validates environment variables and returns typed config.
 *
 * @throws Error listing every invalid variable
 */
export function validateEnv(): Env {
  const result = envSchema.safeParse(process.env);

  if (!result.success) {
    const errors = result.error.errors
      .map((err) => `  - ${err.path.join('.')}: ${err.message}`)
      .join('\n');

    logger.error('Environment validation failed', {
      errors: result.error.errors.map((e) => ({
        path: e.path,
        message: e.message,
      })),
    });

    throw new Error(`Environment validation failed:\n${errors}`);
  }

  logger.info('Environment validated successfully', {
    port: result.data.PORT,
    env: result.data.NODE_ENV,
    homeboxConfigured: result.data.HOMEBOX_URL !== '',
    accessTokenConfigured:
      result.data.CF_ACCESS_CLIENT_ID !== '' && result.data.CF_ACCESS_CLIENT_SECRET !== '',
  });

  return result.data;
}

let _env: Env | null = null;

/**
 * Gets the validated environment configuration, validating on first use.
 */
export function getEnv(): Env {
  if (!_env) {
    _env = validateEnv();
  }
  return _env;
}

/**
 * Drops the memoized configuration. Used by tests that change process.env.
 */
export function resetEnv(): void {
  _env = null;
}
