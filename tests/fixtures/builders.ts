/**
 * Test data builders
 */

import { addDays } from '@/modules/surveillance/core/calendar.js';
import { DEFAULT_SURVEILLANCE_PERIODS } from '@/modules/surveillance/core/types.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { HealthChecker } from '@/modules/health/core/ports.js';
import type {
  CaseRecord,
  CaseSnapshot,
  DailyRecord,
  IsoDate,
  RawCaseRow,
} from '@/modules/surveillance/core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Config
// ─────────────────────────────────────────────────────────────────────────────

export const makeTestConfig = (overrides: Partial<AppConfig> = {}): AppConfig => {
  const defaults: AppConfig = {
    server: {
      port: 3000,
      host: '0.0.0.0',
      isDevelopment: false,
      isProduction: false,
      isTest: true,
    },
    logger: {
      level: 'silent',
      pretty: false,
    },
    snapshot: {
      path: 'data/snapshots/srag-cases.yaml',
      cacheTtlMs: 0,
    },
    periods: DEFAULT_SURVEILLANCE_PERIODS,
    cors: {
      allowedOrigins: undefined,
    },
  };

  return {
    ...defaults,
    ...overrides,
    server: { ...defaults.server, ...overrides.server },
    cors: { ...defaults.cors, ...overrides.cors },
  };
};

// ─────────────────────────────────────────────────────────────────────────────
// Cases
// ─────────────────────────────────────────────────────────────────────────────

let caseSequence = 0;

/**
 * A cured, non-ICU, unvaccinated influenza case unless overridden.
 */
export const makeCase = (
  notificationDate: IsoDate | null,
  overrides: Partial<Omit<CaseRecord, 'notificationDate'>> = {}
): CaseRecord => {
  caseSequence += 1;
  return {
    caseId: `case-${String(caseSequence)}`,
    notificationDate,
    outcome: 'cure',
    icu: 'no',
    fluVaccine: 'no',
    covidVaccine: 'no',
    finalClassification: 'influenza',
    ...overrides,
  };
};

/**
 * `count` identical cases on the same date.
 */
export const makeCases = (
  notificationDate: IsoDate,
  count: number,
  overrides: Partial<Omit<CaseRecord, 'notificationDate'>> = {}
): CaseRecord[] =>
  Array.from({ length: count }, () => makeCase(notificationDate, overrides));

export const makeRawRow = (overrides: Partial<RawCaseRow> = {}): RawCaseRow => ({
  notification_date: '2025-03-01',
  case_id: '100001',
  outcome_code: 1,
  icu_code: 2,
  flu_vaccine_code: 2,
  covid_vaccine_code: 2,
  final_classification_code: 1,
  ...overrides,
});

// ─────────────────────────────────────────────────────────────────────────────
// Daily table
// ─────────────────────────────────────────────────────────────────────────────

export const makeDaily = (
  date: IsoDate,
  overrides: Partial<Omit<DailyRecord, 'date'>> = {}
): DailyRecord => ({
  date,
  caseCount: 0,
  deathCount: 0,
  icuCount: 0,
  vaccinatedCount: null,
  ...overrides,
});

/**
 * Consecutive daily rows starting at `start`, one per entry of `caseCounts`.
 */
export const makeDailyRun = (start: IsoDate, caseCounts: readonly number[]): DailyRecord[] =>
  caseCounts.map((caseCount, offset) => makeDaily(addDays(start, offset), { caseCount }));

export const makeSnapshot = (
  cases: CaseRecord[],
  overrides: Partial<Omit<CaseSnapshot, 'cases'>> = {}
): CaseSnapshot => ({
  metadata: { source: 'test-source', extractedAt: '2025-03-31' },
  cases,
  rejected: [],
  ...overrides,
});

// ─────────────────────────────────────────────────────────────────────────────
// Health
// ─────────────────────────────────────────────────────────────────────────────

export const makeHealthChecker = (name: string): HealthChecker => {
  return async () => ({ name, status: 'healthy' });
};

export const makeFailingHealthChecker = (name: string, message: string): HealthChecker => {
  return async () => ({ name, status: 'unhealthy', message });
};
