import dotenv from 'dotenv';
import { z } from 'zod';
import path from 'path';
import defaultSymbols from '../modules/market/data/defaultSymbols.json';
import { ConfigError } from '../common/errors/backfillErrors';

export const DEFAULT_SYMBOLS: readonly string[] = defaultSymbols;

// Comma-separated list, order kept, first occurrence wins
const symbolList = z
  .string()
  .transform((raw) => [
    ...new Set(
      raw
        .split(',')
        .map((s) => s.trim().toUpperCase())
        .filter((s) => s.length > 0)
    ),
  ])
  .refine((symbols) => symbols.length > 0, { message: 'must name at least one symbol' });

const envSchema = z.object({
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  LOG_LEVEL: z.enum(['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent']).default('info'),
  FMP_API_KEY: z.string().min(1),
  FMP_BASE_URL: z.string().url().default('https://financialmodelingprep.com/api/v3'),
  FMP_TIMEOUT_MS: z.coerce.number().int().positive().default(10_000),
  DB_HOST: z.string().min(1),
  DB_PORT: z.coerce.number().int().positive().default(27017),
  DB_NAME: z.string().min(1),
  DB_USER: z.string().min(1),
  DB_PASSWORD: z.string().min(1),
  DB_AUTH_SOURCE: z.string().min(1).default('admin'),
  BACKFILL_SYMBOLS: symbolList.optional(),
  INITIAL_BACKFILL_DAYS: z.coerce.number().int().positive().default(30),
  INTER_SYMBOL_DELAY_SECONDS: z.coerce.number().nonnegative().default(0.5),
});

export interface DatabaseConfig {
  host: string;
  port: number;
  name: string;
  user: string;
  password: string;
  authSource: string;
}

export interface BackfillConfig {
  nodeEnv: 'development' | 'production' | 'test';
  logLevel: string;
  fmp: {
    apiKey: string;
    baseUrl: string;
    timeoutMs: number;
  };
  database: DatabaseConfig;
  symbols: readonly string[];
  initialBackfillDays: number;
  interSymbolDelayMs: number;
}

export type Env = Record<string, string | undefined>;

/**
 * Loads `.env.<NODE_ENV>` from the working directory into `process.env`
 * (existing variables win), the same file layout the deploy scripts use.
 */
export const loadEnvFile = (env: Env = process.env): void => {
  const nodeEnv = env.NODE_ENV || 'development';
  dotenv.config({ path: path.resolve(process.cwd(), `.env.${nodeEnv}`) });
};

export const loadConfig = (env: Env = process.env): BackfillConfig => {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    throw new ConfigError(
      parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`)
    );
  }
  const e = parsed.data;

  return Object.freeze({
    nodeEnv: e.NODE_ENV,
    logLevel: e.LOG_LEVEL,
    fmp: {
      apiKey: e.FMP_API_KEY,
      baseUrl: e.FMP_BASE_URL.replace(/\/+$/, ''),
      timeoutMs: e.FMP_TIMEOUT_MS,
    },
    database: {
      host: e.DB_HOST,
      port: e.DB_PORT,
      name: e.DB_NAME,
      user: e.DB_USER,
      password: e.DB_PASSWORD,
      authSource: e.DB_AUTH_SOURCE,
    },
    symbols: e.BACKFILL_SYMBOLS ?? DEFAULT_SYMBOLS,
    initialBackfillDays: e.INITIAL_BACKFILL_DAYS,
    interSymbolDelayMs: Math.round(e.INTER_SYMBOL_DELAY_SECONDS * 1000),
  });
};
