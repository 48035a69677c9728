import { describe, expect, it } from 'vitest';

import { DEFAULT_SURVEILLANCE_PERIODS, isDefinedRate } from '@/modules/surveillance/core/types.js';
import {
  computeSurveillanceMetrics,
  toNamedRates,
} from '@/modules/surveillance/core/usecases/compute-metrics.js';

import { makeDaily } from '../../fixtures/builders.js';

const periods = DEFAULT_SURVEILLANCE_PERIODS.rates;

describe('computeSurveillanceMetrics', () => {
  const daily = [
    makeDaily('2025-03-01', { caseCount: 10, deathCount: 1, icuCount: 2, vaccinatedCount: 4 }),
    makeDaily('2025-03-10', { caseCount: 10, deathCount: 1, icuCount: 3, vaccinatedCount: 1 }),
  ];

  it('computes every rate over its own window', () => {
    const metrics = computeSurveillanceMetrics(daily, periods)._unsafeUnwrap();

    expect(metrics.maxDate).toBe('2025-03-10');
    expect(metrics.periods).toEqual(periods);
    expect(metrics.caseVariation1.periodDays).toBe(7);
    expect(metrics.caseVariation2.periodDays).toBe(30);

    const values = [metrics.deathRate, metrics.icuRate, metrics.vaccinationRate].map((rate) =>
      isDefinedRate(rate) ? rate.value.toFixed(2) : null
    );
    expect(values).toEqual(['10.00', '25.00', '25.00']);
  });

  it('compares each variation period independently', () => {
    const metrics = computeSurveillanceMetrics(daily, periods)._unsafeUnwrap();

    // 7 days: 03-01 is in the previous half, 03-10 in the current one
    expect(isDefinedRate(metrics.caseVariation1) && metrics.caseVariation1.value.toFixed(2)).toBe(
      '0.00'
    );
    // 30 days: both dates are in the current half
    expect(metrics.caseVariation2.status).toBe('undefined');
  });

  it('fails on an empty table', () => {
    const error = computeSurveillanceMetrics([], periods)._unsafeUnwrapErr();

    expect(error).toEqual({
      type: 'EmptyInputError',
      message: 'Cannot compute surveillance metrics: the daily table is empty',
      operation: 'surveillance metrics',
    });
  });

  it('fails when the vaccination rate window is longer than the labelled days', () => {
    const labelled = [
      makeDaily('2025-02-20', { caseCount: 10, vaccinatedCount: null }),
      makeDaily('2025-03-10', { caseCount: 10, vaccinatedCount: 10 }),
    ];

    const error = computeSurveillanceMetrics(labelled, periods)._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidWindowError');
    expect(error.operation).toBe('vaccination rate');
  });

  it('propagates an invalid window', () => {
    const error = computeSurveillanceMetrics(daily, { ...periods, icuRatePeriod: 0 })._unsafeUnwrapErr();

    expect(error.type).toBe('InvalidWindowError');
  });
});

describe('toNamedRates', () => {
  const daily = [makeDaily('2025-03-10', { caseCount: 5, vaccinatedCount: 0 })];

  it('keys variation rates by their period', () => {
    const metrics = computeSurveillanceMetrics(daily, periods)._unsafeUnwrap();

    expect(Object.keys(toNamedRates(metrics))).toEqual([
      'case_var_7',
      'case_var_30',
      'death_rate',
      'icu_rate',
      'vacc_rate',
    ]);
  });

  it('shares one key when both variation periods are equal', () => {
    const metrics = computeSurveillanceMetrics(daily, {
      ...periods,
      caseVariationPeriod2: 7,
    })._unsafeUnwrap();

    expect(Object.keys(toNamedRates(metrics))).toEqual([
      'case_var_7',
      'death_rate',
      'icu_rate',
      'vacc_rate',
    ]);
  });
});
