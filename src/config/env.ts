/**
 * ENVIRONMENT
 *
 * Process configuration, parsed once at boot. Every setting has a default
 * except FRED_API_KEY, whose absence only disables the central-bank features.
 */

import 'dotenv/config';
import { z } from 'zod';

const EnvSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  HOST: z.string().default('0.0.0.0'),
  PORT: z.coerce.number().int().positive().default(8001),
  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),
  CORS_ORIGINS: z.string().default('*'),

  // Providers
  FRED_API_KEY: z.string().default(''),
  FRED_API_URL: z.string().url().default('https://api.stlouisfed.org/fred'),
  YAHOO_CHART_URL: z.string().url().default('https://query1.finance.yahoo.com/v8/finance/chart'),
  HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),

  // Time-boxed caches (seconds)
  QUOTE_CACHE_TTL_SEC: z.coerce.number().int().nonnegative().default(600),
  MACRO_CACHE_TTL_SEC: z.coerce.number().int().nonnegative().default(3600),
  NAME_CACHE_TTL_SEC: z.coerce.number().int().nonnegative().default(86400),

  // Sessions are dropped after this much inactivity
  SESSION_IDLE_TTL_MIN: z.coerce.number().int().positive().default(720),
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnv(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment: ${details}`);
  }
  return parsed.data;
}

export const env = loadEnv();
