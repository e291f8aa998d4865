/**
 * Runtime Configuration
 *
 * Parses process.env once at boot. Every consumer receives the parsed
 * object instead of reading the environment itself.
 */

import { z } from 'zod';

const envSchema = z.object({
  DATABASE_URL: z.string().min(1, 'DATABASE_URL environment variable is required'),
  DB_POOL_SIZE: z.coerce.number().int().positive().default(20),
  PORT: z.coerce.number().int().min(1).max(65535).default(3000),
  NODE_ENV: z.enum(['development', 'test', 'production']).default('development'),
  LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).optional(),
  APPLICATION_KEY: z.string().min(1).optional(),
  CORS_ORIGIN: z.string().url().optional(),
  ROUTE_PREFIX: z
    .string()
    .default('/v1')
    .transform((prefix) => prefix.replace(/\/+$/, ''))
    .refine((prefix) => prefix === '' || prefix.startsWith('/'), {
      message: 'ROUTE_PREFIX must be empty or start with "/"',
    }),
});

export interface AppConfig {
  databaseUrl: string;
  dbPoolSize: number;
  port: number;
  nodeEnv: 'development' | 'test' | 'production';
  logLevel?: 'debug' | 'info' | 'warn' | 'error';
  applicationKey?: string;
  corsOrigin?: string;
  routePrefix: string;
}

export class ConfigError extends Error {
  constructor(readonly issues: string[]) {
    super(`Invalid configuration: ${issues.join('; ')}`);
    this.name = 'ConfigError';
  }
}

/**
 * Build the app config from an environment map
 *
 * Empty strings are treated as unset so that `FOO=` in a .env file
 * falls back to the default.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const cleaned: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') cleaned[key] = value;
  }

  const parsed = envSchema.safeParse(cleaned);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }

  const values = parsed.data;
  return {
    databaseUrl: values.DATABASE_URL,
    dbPoolSize: values.DB_POOL_SIZE,
    port: values.PORT,
    nodeEnv: values.NODE_ENV,
    logLevel: values.LOG_LEVEL,
    applicationKey: values.APPLICATION_KEY,
    corsOrigin: values.CORS_ORIGIN,
    routePrefix: values.ROUTE_PREFIX,
  };
}
