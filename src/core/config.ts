/**
 * Application Configuration - Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, log level, registry endpoint and token) goes through
 * this file. Other modules import `config` instead of reading process.env.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and coerces
 * ("10000" → 10000) at startup. An invalid value exits the process right away.
 * The API token is the one optional setting: without it the registry client
 * logs a warning and sends anonymous requests.
 */
import 'dotenv/config';

import { z } from 'zod';

const envSchema = z.object({
  PORT: z.coerce.number().default(5000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),

  /** OpenCorporates API token. Empty string is treated as "not configured". */
  OPENCORPORATES_API_TOKEN: z.string().optional(),
  OPENCORPORATES_BASE_URL: z.url().default('https://api.opencorporates.com/v0.4'),
  /** Per-request timeout for registry calls (ms). */
  REGISTRY_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
});

const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  // eslint-disable-next-line no-console
  console.error('Invalid environment configuration:', z.treeifyError(parsed.error));
  process.exit(1);
}

const env = parsed.data;

export const config = {
  port: env.PORT,
  nodeEnv: env.NODE_ENV,
  isDev: env.NODE_ENV === 'development',
  isProd: env.NODE_ENV === 'production',

  cluster: {
    workers: env.WEB_CONCURRENCY,
  },

  log: {
    level: env.LOG_LEVEL,
  },

  registry: {
    baseUrl: env.OPENCORPORATES_BASE_URL,
    apiToken: env.OPENCORPORATES_API_TOKEN?.trim() || null,
    timeoutMs: env.REGISTRY_TIMEOUT_MS,
  },
} as const;

export type AppConfig = typeof config;
