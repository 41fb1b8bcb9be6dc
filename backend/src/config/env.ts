/**
 * Environment
 *
 * Process-level settings read once from the environment (and .env).
 */

import 'dotenv/config';
import { z } from 'zod';
import { ConfigError } from '../common/errors.js';

const booleanFlag = z
  .enum(['true', 'false', '1', '0'])
  .transform((v) => v === 'true' || v === '1');

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal', 'silent']).default('info'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8001),
  CORS_ORIGINS: z.string().default('*'),

  STORE_DRIVER: z.enum(['mongo', 'memory']).default('mongo'),
  MONGO_URL: z.string().default('mongodb://localhost:27017/macro_narrative'),

  FRED_API_KEY: z.string().optional(),
  BLS_API_KEY: z.string().optional(),
  ANTHROPIC_API_KEY: z.string().optional(),
  AI_MODEL: z.string().default('claude-3-5-sonnet-latest'),

  ALERT_WEBHOOK_URL: z.string().url().optional(),
  ORCHESTRATOR_ENABLED: booleanFlag.default('true'),
  ORCHESTRATOR_CONFIG_FILE: z.string().optional(),
});

export type Env = z.infer<typeof envSchema>;

export function parseEnv(source: NodeJS.ProcessEnv): Env {
  // empty strings from .env templates count as unset
  const cleaned = Object.fromEntries(
    Object.entries(source).filter(([, value]) => value !== undefined && value !== ''),
  );

  const result = envSchema.safeParse(cleaned);
  if (!result.success) {
    const issues = result.error.issues
      .map((issue) => `  - ${issue.path.join('.')}: ${issue.message}`)
      .join('\n');
    throw new ConfigError(`Environment validation failed:\n${issues}`);
  }
  return result.data;
}

let envInstance: Env | null = null;

export function getEnv(): Env {
  if (!envInstance) {
    envInstance = parseEnv(process.env);
  }
  return envInstance;
}
