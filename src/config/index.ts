import 'dotenv/config';
import { z } from 'zod';
import { EnvConfig } from '../types';

const booleanFlag = z
  .string()
  .default('true')
  .transform((value) => ['true', '1', 'yes'].includes(value.trim().toLowerCase()));

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  PORT: z.coerce.number().int().positive().default(3000),
  HOST: z.string().default('localhost'),
  API_PREFIX: z.string().startsWith('/').default('/api/v1'),
  CORS_ORIGIN: z
    .string()
    .default('*')
    .transform((value) =>
      value
        .split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0)
    ),
  RATE_LIMIT_WINDOW_MS: z.coerce.number().int().positive().default(900000),
  RATE_LIMIT_MAX_REQUESTS: z.coerce.number().int().positive().default(100),
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'debug']).default('http'),
  DATABASE_URL: z.string().min(1).default('postgres://localhost:5432/interunit_recon'),
  DATABASE_POOL_MAX: z.coerce.number().int().positive().default(10),
  // Redis is optional - the app works without it
  REDIS_ENABLED: booleanFlag,
  REDIS_HOST: z.string().default('localhost'),
  REDIS_PORT: z.coerce.number().int().positive().default(6379),
  RUN_CACHE_TTL_SECONDS: z.coerce.number().int().positive().default(3600),
});

/**
 * Validate environment variables, failing fast with every problem listed
 */
export const loadEnv = (source: NodeJS.ProcessEnv): EnvConfig => {
  const result = envSchema.safeParse(source);

  if (!result.success) {
    const problems = result.error.errors
      .map((issue) => `  ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new Error(`Invalid environment configuration:\n${problems}`);
  }

  return result.data;
};

export const env: EnvConfig = loadEnv(process.env);

export { bankNameLookup, createBankNameLookup, BANK_NAMES } from './bankNames';
