/**
 * Application Configuration — Single Source of Truth
 * Layer: Core
 *
 * Every setting (port, log level, upstream endpoints, timeout) is read here
 * and nowhere else; other modules import `config` instead of touching
 * process.env.
 *
 * Flow: dotenv loads .env into process.env; a Zod schema validates and
 * coerces (e.g. "10000" → 10000) at startup. Anything missing or invalid
 * stops the process immediately. The result is a nested `config` object
 * exported `as const`.
 */
import 'dotenv/config';

import { z } from 'zod/v4';

const envSchema = z.object({
  PORT: z.coerce.number().default(3000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  WEB_CONCURRENCY: z.coerce.number().default(0),

  LOG_LEVEL: z
    .enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'])
    .default('info'),

  /** Search endpoint; the encoded query string is appended to it. */
  ITUNES_SEARCH_URL: z.url().default('https://itunes.apple.com/search'),
  /** Lookup endpoint; `?id=<identifier>` is appended to it. */
  ITUNES_LOOKUP_URL: z.url().default('https://itunes.apple.com/lookup'),
  /** Per-request deadline for the upstream round trip, body read included. */
  ITUNES_TIMEOUT_MS: z.coerce.number().int().min(100).max(120_000).default(10_000),
  ITUNES_USER_AGENT: z.string().min(1).default('itunes-catalog/1.0'),
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

  itunes: {
    searchUrl: env.ITUNES_SEARCH_URL,
    lookupUrl: env.ITUNES_LOOKUP_URL,
    timeoutMs: env.ITUNES_TIMEOUT_MS,
    userAgent: env.ITUNES_USER_AGENT,
  },
} as const;

export type AppConfig = typeof config;
