/**
 * Configuration
 *
 * Environment (optionally from .env) is validated once into an AppConfig.
 * Nothing else in the codebase reads process.env.
 */

import * as path from 'path';
import { fileURLToPath } from 'url';
import * as dotenv from 'dotenv';
import { z } from 'zod';
import { ConfigurationError } from './errors.js';
import type { LabelPolicy } from '../src/types/index.js';

const PROJECT_ROOT = path.join(path.dirname(fileURLToPath(import.meta.url)), '..');

const day = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'expected YYYY-MM-DD');
const optionalSecret = z
  .string()
  .optional()
  .transform((v) => (v && v.trim() ? v.trim() : undefined));

const EnvSchema = z
  .object({
    ANTHROPIC_API_KEY: optionalSecret,
    PREDICTION_MODEL: z.string().min(1).default('claude-sonnet-4-5-20250929'),
    TICKERS: z
      .string()
      .default('TSLA,NVDA,AMZN,META,AAPL')
      .transform((v) => v.split(',').map((t) => t.trim().toUpperCase()).filter(Boolean))
      .refine((list) => list.length > 0, 'at least one ticker is required')
      .refine((list) => new Set(list).size === list.length, 'tickers must be unique'),
    STATE_DIR: z.string().default('state'),
    EXPERIMENT_START_DATE: day.default('2026-01-14'),
    EXPERIMENT_END_DATE: day.default('2026-02-18'),
    FINAL_REPORT_DATE: day.default('2026-02-19'),
    MAX_RUNS: z.coerce.number().int().positive().default(25),
    LABEL_SCHEME: z.enum(['binary', 'ternary']).default('binary'),
    TIE_BREAK: z.enum(['UP', 'DOWN']).default('UP'),
    PREDICTION_DELAY_MS: z.coerce.number().int().min(0).default(500),
    PREDICTION_TIMEOUT_MS: z.coerce.number().int().positive().default(60_000),
    LOG_LEVEL: z.enum(['debug', 'info', 'warn', 'error']).default('info'),
    RUN_AT: z.string().regex(/^([01]\d|2[0-3]):[0-5]\d$/, 'expected HH:mm').default('09:30'),
    TELEGRAM_BOT_TOKEN: optionalSecret,
    TELEGRAM_CHAT_ID: optionalSecret,
  })
  .refine((env) => env.EXPERIMENT_START_DATE <= env.EXPERIMENT_END_DATE, {
    message: 'EXPERIMENT_START_DATE must not be after EXPERIMENT_END_DATE',
    path: ['EXPERIMENT_START_DATE'],
  });

export interface ExperimentDefaults {
  startDate: string;
  endDate: string;
  finalReportDate: string;
  maxRuns: number;
}

export interface AppConfig {
  anthropicApiKey?: string;
  model: string;
  tickers: string[];
  stateDir: string;
  experiment: ExperimentDefaults;
  labelPolicy: LabelPolicy;
  predictionDelayMs: number;
  predictionTimeoutMs: number;
  logLevel: 'debug' | 'info' | 'warn' | 'error';
  runAt: string;
  telegram: {
    botToken?: string;
    chatId?: string;
  };
}

export function parseConfig(env: Record<string, string | undefined>): AppConfig {
  const result = EnvSchema.safeParse(env);
  if (!result.success) {
    throw new ConfigurationError(
      result.error.issues.map((issue) => `${issue.path.join('.') || 'env'}: ${issue.message}`)
    );
  }

  const e = result.data;
  return {
    anthropicApiKey: e.ANTHROPIC_API_KEY,
    model: e.PREDICTION_MODEL,
    tickers: e.TICKERS,
    stateDir: path.resolve(PROJECT_ROOT, e.STATE_DIR),
    experiment: {
      startDate: e.EXPERIMENT_START_DATE,
      endDate: e.EXPERIMENT_END_DATE,
      finalReportDate: e.FINAL_REPORT_DATE,
      maxRuns: e.MAX_RUNS,
    },
    labelPolicy: { scheme: e.LABEL_SCHEME, tieBreak: e.TIE_BREAK },
    predictionDelayMs: e.PREDICTION_DELAY_MS,
    predictionTimeoutMs: e.PREDICTION_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
    runAt: e.RUN_AT,
    telegram: {
      botToken: e.TELEGRAM_BOT_TOKEN,
      chatId: e.TELEGRAM_CHAT_ID,
    },
  };
}

export function loadConfig(): AppConfig {
  dotenv.config({ path: path.join(PROJECT_ROOT, '.env') });
  return parseConfig(process.env);
}

/**
 * The model credential is only needed by commands that call the model.
 */
export function requireModelCredential(config: AppConfig): string {
  if (!config.anthropicApiKey) {
    throw new ConfigurationError(['ANTHROPIC_API_KEY: required to query the prediction model']);
  }
  return config.anthropicApiKey;
}
