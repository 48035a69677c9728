/**
 * Unit tests for configuration module
 */

import { describe, expect, it } from 'vitest';

import { parseEnv, createConfig } from '@/infra/config/index.js';

describe('Configuration', () => {
  describe('parseEnv', () => {
    it('returns default values when env is empty', () => {
      const env = parseEnv({});

      expect(env.NODE_ENV).toBe('development');
      expect(env.PORT).toBe(3000);
      expect(env.HOST).toBe('0.0.0.0');
      expect(env.LOG_LEVEL).toBe('info');
      expect(env.SNAPSHOT_PATH).toBe('data/snapshots/srag-cases.yaml');
      expect(env.SNAPSHOT_CACHE_TTL_MS).toBe(3_600_000);
      expect(env.ALLOWED_ORIGINS).toBeUndefined();
    });

    it('parses window lengths as integers', () => {
      const env = parseEnv({ CASE_VAR_PERIOD_1_DAYS: '14', CHART_MONTHLY_PERIOD_MONTHS: '6' });

      expect(env.CASE_VAR_PERIOD_1_DAYS).toBe(14);
      expect(env.CHART_MONTHLY_PERIOD_MONTHS).toBe(6);
    });

    it('treats empty strings as unset', () => {
      expect(parseEnv({ PORT: '', DEATH_RATE_PERIOD_DAYS: '' }).DEATH_RATE_PERIOD_DAYS).toBe(30);
    });

    it('throws on a zero window length', () => {
      expect(() => parseEnv({ CASE_VAR_PERIOD_1_DAYS: '0' })).toThrow(
        /Invalid environment configuration: \/CASE_VAR_PERIOD_1_DAYS/
      );
    });

    it('throws on non-numeric and fractional window lengths', () => {
      expect(() => parseEnv({ ICU_RATE_PERIOD_DAYS: 'thirty' })).toThrow(
        /Invalid environment configuration/
      );
      expect(() => parseEnv({ VACC_LABEL_WINDOW_DAYS: '1.5' })).toThrow(
        /Invalid environment configuration/
      );
    });

    it('throws when the vaccination rate window exceeds the labelling window', () => {
      expect(() => parseEnv({ VACC_RATE_PERIOD_DAYS: '60', VACC_LABEL_WINDOW_DAYS: '30' })).toThrow(
        'Invalid environment configuration: /VACC_RATE_PERIOD_DAYS: must not exceed VACC_LABEL_WINDOW_DAYS (30)'
      );
    });

    it('accepts a vaccination rate window equal to the labelling window', () => {
      const env = parseEnv({ VACC_RATE_PERIOD_DAYS: '45', VACC_LABEL_WINDOW_DAYS: '45' });

      expect(env.VACC_RATE_PERIOD_DAYS).toBe(45);
    });

    it('throws on invalid LOG_LEVEL', () => {
      expect(() => parseEnv({ LOG_LEVEL: 'verbose' })).toThrow(/Invalid environment configuration/);
    });
  });

  describe('createConfig', () => {
    it('groups the windows into surveillance periods', () => {
      const config = createConfig(
        parseEnv({
          CASE_VAR_PERIOD_1_DAYS: '14',
          VACC_RATE_PERIOD_DAYS: '60',
          VACC_LABEL_WINDOW_DAYS: '60',
          CHART_DAILY_PERIOD_DAYS: '45',
        })
      );

      expect(config.periods).toEqual({
        rates: {
          caseVariationPeriod1: 14,
          caseVariationPeriod2: 30,
          deathRatePeriod: 30,
          icuRatePeriod: 30,
          vaccinationRatePeriod: 60,
        },
        charts: { dailyPeriod: 45, monthlyPeriod: 12 },
        vaccinationWindowDays: 60,
      });
    });

    it('derives environment flags and logging', () => {
      const config = createConfig(parseEnv({ NODE_ENV: 'production', LOG_LEVEL: 'warn' }));

      expect(config.server.isProduction).toBe(true);
      expect(config.server.isDevelopment).toBe(false);
      expect(config.logger).toEqual({ level: 'warn', pretty: false });
    });

    it('carries the snapshot location', () => {
      const config = createConfig(
        parseEnv({ SNAPSHOT_PATH: '/srv/cases.json', SNAPSHOT_CACHE_TTL_MS: '0' })
      );

      expect(config.snapshot).toEqual({ path: '/srv/cases.json', cacheTtlMs: 0 });
    });
  });
});
