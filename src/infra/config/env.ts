/**
 * Environment configuration with validation
 * Uses TypeBox for runtime type checking
 */

import { Type, type Static } from '@sinclair/typebox';
import { Value } from '@sinclair/typebox/value';

import type { SurveillancePeriods } from '../../modules/surveillance/core/types.js';

const PeriodSchema = (defaultValue: number) => Type.Integer({ minimum: 1, default: defaultValue });

/**
 * Environment variable schema
 */
export const EnvSchema = Type.Object({
  // Server
  NODE_ENV: Type.Union(
    [Type.Literal('development'), Type.Literal('production'), Type.Literal('test')],
    { default: 'development' }
  ),
  PORT: Type.Number({ default: 3000, minimum: 1, maximum: 65535 }),
  HOST: Type.String({ default: '0.0.0.0' }),

  // Logging
  LOG_LEVEL: Type.Union(
    [
      Type.Literal('fatal'),
      Type.Literal('error'),
      Type.Literal('warn'),
      Type.Literal('info'),
      Type.Literal('debug'),
      Type.Literal('trace'),
      Type.Literal('silent'),
    ],
    { default: 'info' }
  ),

  // Case snapshot
  SNAPSHOT_PATH: Type.String({ minLength: 1, default: 'data/snapshots/srag-cases.yaml' }),
  SNAPSHOT_CACHE_TTL_MS: Type.Integer({ minimum: 0, default: 3_600_000 }),

  // Rate windows (days)
  CASE_VAR_PERIOD_1_DAYS: PeriodSchema(7),
  CASE_VAR_PERIOD_2_DAYS: PeriodSchema(30),
  DEATH_RATE_PERIOD_DAYS: PeriodSchema(30),
  ICU_RATE_PERIOD_DAYS: PeriodSchema(30),
  VACC_RATE_PERIOD_DAYS: PeriodSchema(30),
  VACC_LABEL_WINDOW_DAYS: PeriodSchema(30),

  // Chart windows
  CHART_DAILY_PERIOD_DAYS: PeriodSchema(30),
  CHART_MONTHLY_PERIOD_MONTHS: PeriodSchema(12),

  // CORS
  ALLOWED_ORIGINS: Type.Optional(Type.String()),
});

export type Env = Static<typeof EnvSchema>;

const parseInteger = (value: string | undefined, fallback: number): number =>
  value != null && value !== '' ? Number(value) : fallback;

/**
 * Parse and validate environment variables
 */
export const parseEnv = (env: NodeJS.ProcessEnv): Env => {
  const rawEnv = {
    NODE_ENV: env['NODE_ENV'] ?? 'development',
    PORT: parseInteger(env['PORT'], 3000),
    HOST: env['HOST'] ?? '0.0.0.0',
    LOG_LEVEL: env['LOG_LEVEL'] ?? 'info',
    SNAPSHOT_PATH: env['SNAPSHOT_PATH'] ?? 'data/snapshots/srag-cases.yaml',
    SNAPSHOT_CACHE_TTL_MS: parseInteger(env['SNAPSHOT_CACHE_TTL_MS'], 3_600_000),
    CASE_VAR_PERIOD_1_DAYS: parseInteger(env['CASE_VAR_PERIOD_1_DAYS'], 7),
    CASE_VAR_PERIOD_2_DAYS: parseInteger(env['CASE_VAR_PERIOD_2_DAYS'], 30),
    DEATH_RATE_PERIOD_DAYS: parseInteger(env['DEATH_RATE_PERIOD_DAYS'], 30),
    ICU_RATE_PERIOD_DAYS: parseInteger(env['ICU_RATE_PERIOD_DAYS'], 30),
    VACC_RATE_PERIOD_DAYS: parseInteger(env['VACC_RATE_PERIOD_DAYS'], 30),
    VACC_LABEL_WINDOW_DAYS: parseInteger(env['VACC_LABEL_WINDOW_DAYS'], 30),
    CHART_DAILY_PERIOD_DAYS: parseInteger(env['CHART_DAILY_PERIOD_DAYS'], 30),
    CHART_MONTHLY_PERIOD_MONTHS: parseInteger(env['CHART_MONTHLY_PERIOD_MONTHS'], 12),
    ALLOWED_ORIGINS: env['ALLOWED_ORIGINS'],
  };

  // Validate against schema
  if (!Value.Check(EnvSchema, rawEnv)) {
    const errors = [...Value.Errors(EnvSchema, rawEnv)];
    const errorMessages = errors.map((e) => `${e.path}: ${e.message}`).join(', ');
    throw new Error(`Invalid environment configuration: ${errorMessages}`);
  }

  // Vaccinated counts only exist inside the labelling window
  if (rawEnv.VACC_RATE_PERIOD_DAYS > rawEnv.VACC_LABEL_WINDOW_DAYS) {
    throw new Error(
      `Invalid environment configuration: /VACC_RATE_PERIOD_DAYS: must not exceed VACC_LABEL_WINDOW_DAYS (${String(rawEnv.VACC_LABEL_WINDOW_DAYS)})`
    );
  }

  return rawEnv;
};

/**
 * Create a typed configuration object from environment
 */
export const createConfig = (env: Env) => {
  const periods: SurveillancePeriods = {
    rates: {
      caseVariationPeriod1: env.CASE_VAR_PERIOD_1_DAYS,
      caseVariationPeriod2: env.CASE_VAR_PERIOD_2_DAYS,
      deathRatePeriod: env.DEATH_RATE_PERIOD_DAYS,
      icuRatePeriod: env.ICU_RATE_PERIOD_DAYS,
      vaccinationRatePeriod: env.VACC_RATE_PERIOD_DAYS,
    },
    charts: {
      dailyPeriod: env.CHART_DAILY_PERIOD_DAYS,
      monthlyPeriod: env.CHART_MONTHLY_PERIOD_MONTHS,
    },
    vaccinationWindowDays: env.VACC_LABEL_WINDOW_DAYS,
  };

  return {
    server: {
      port: env.PORT,
      host: env.HOST,
      isDevelopment: env.NODE_ENV === 'development',
      isProduction: env.NODE_ENV === 'production',
      isTest: env.NODE_ENV === 'test',
    },
    logger: {
      level: env.LOG_LEVEL,
      pretty: env.NODE_ENV !== 'production',
    },
    snapshot: {
      path: env.SNAPSHOT_PATH,
      cacheTtlMs: env.SNAPSHOT_CACHE_TTL_MS,
    },
    periods,
    cors: {
      /** Comma-separated list of origins allowed to call the API */
      allowedOrigins: env.ALLOWED_ORIGINS,
    },
  };
};

export type AppConfig = ReturnType<typeof createConfig>;
