/** App configuration, parsed once from the environment. */
import path from 'path';
import { z } from 'zod';
import { LOG_LEVELS, type LogLevelName } from '@/services/logger';

const optionalString = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const envSchema = z.object({
  PORT: z.coerce.number().int().positive().default(4000),
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(LOG_LEVELS).default('info'),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4.1-mini'),

  OPENTRIPMAP_API_KEY: optionalString,
  AMADEUS_CLIENT_ID: optionalString,
  AMADEUS_CLIENT_SECRET: optionalString,
  AMADEUS_BASE_URL: z.string().url().default('https://test.api.amadeus.com'),

  LIVE_API_TIMEOUT_MS: z.coerce.number().int().positive().default(8000),
  LIVE_API_MAX_RETRIES: z.coerce.number().int().min(0).max(5).default(2),
  GENERATIVE_TIMEOUT_MS: z.coerce.number().int().positive().default(20000),
  INDEPENDENT_DEADLINE_MS: z.coerce.number().int().positive().default(45000),
  RUN_DEADLINE_MS: z.coerce.number().int().positive().default(90000),
  BUDGET_TOLERANCE: z.coerce.number().min(0).max(1).default(0.1),
  CATALOG_DIR: z.string().default('data/catalog'),
  RETRIEVAL_CACHE_TTL_SECONDS: z.coerce.number().int().min(0).default(900),
  TRIP_TTL_MINUTES: z.coerce.number().int().positive().default(120),
});

export interface AppConfig {
  port: number;
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: LogLevelName;
  openai: { apiKey?: string; model: string };
  openTripMap: { apiKey?: string };
  amadeus: { clientId?: string; clientSecret?: string; baseUrl: string };
  retrieval: {
    liveApiTimeoutMs: number;
    liveApiMaxRetries: number;
    generativeTimeoutMs: number;
    cacheTtlSeconds: number;
  };
  orchestration: {
    independentDeadlineMs: number;
    runDeadlineMs: number;
  };
  verification: { budgetTolerance: number };
  catalogDir: string;
  tripTtlMinutes: number;
}

export function loadAppConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.errors
      .map((e) => `${e.path.join('.') || 'root'}: ${e.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  const e = parsed.data;
  return {
    port: e.PORT,
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    openai: { apiKey: e.OPENAI_API_KEY, model: e.OPENAI_MODEL },
    openTripMap: { apiKey: e.OPENTRIPMAP_API_KEY },
    amadeus: {
      clientId: e.AMADEUS_CLIENT_ID,
      clientSecret: e.AMADEUS_CLIENT_SECRET,
      baseUrl: e.AMADEUS_BASE_URL,
    },
    retrieval: {
      liveApiTimeoutMs: e.LIVE_API_TIMEOUT_MS,
      liveApiMaxRetries: e.LIVE_API_MAX_RETRIES,
      generativeTimeoutMs: e.GENERATIVE_TIMEOUT_MS,
      cacheTtlSeconds: e.RETRIEVAL_CACHE_TTL_SECONDS,
    },
    orchestration: {
      independentDeadlineMs: e.INDEPENDENT_DEADLINE_MS,
      runDeadlineMs: e.RUN_DEADLINE_MS,
    },
    verification: { budgetTolerance: e.BUDGET_TOLERANCE },
    catalogDir: path.resolve(process.cwd(), e.CATALOG_DIR),
    tripTtlMinutes: e.TRIP_TTL_MINUTES,
  };
}

let cachedConfig: AppConfig | null = null;

export function getAppConfig(): AppConfig {
  if (!cachedConfig) cachedConfig = loadAppConfig();
  return cachedConfig;
}
