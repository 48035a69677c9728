import { err, ok, type Result } from 'neverthrow';

import { calculateCaseVariation, calculateRatioRate } from './calculate-rates.js';
import { latestDate } from '../daily-window.js';
import { createEmptyInputError, type CalculationError } from '../errors.js';

import type {
  DailyRecord,
  NamedRates,
  RatePeriods,
  SurveillanceMetrics,
} from '../types.js';

/**
 * Computes every rate of the surveillance report from the daily table:
 * case variation over two periods, mortality, ICU occupancy and vaccination
 * coverage, each over its own window.
 */
export const computeSurveillanceMetrics = (
  daily: readonly DailyRecord[],
  periods: RatePeriods
): Result<SurveillanceMetrics, CalculationError> => {
  const maxDate = latestDate(daily);
  if (maxDate === undefined) {
    return err(createEmptyInputError('surveillance metrics'));
  }

  const caseVariation1 = calculateCaseVariation(daily, periods.caseVariationPeriod1);
  if (caseVariation1.isErr()) return err(caseVariation1.error);

  const caseVariation2 = calculateCaseVariation(daily, periods.caseVariationPeriod2);
  if (caseVariation2.isErr()) return err(caseVariation2.error);

  const deathRate = calculateRatioRate(
    daily,
    'death_rate',
    'deathCount',
    'caseCount',
    periods.deathRatePeriod
  );
  if (deathRate.isErr()) return err(deathRate.error);

  const icuRate = calculateRatioRate(
    daily,
    'icu_rate',
    'icuCount',
    'caseCount',
    periods.icuRatePeriod
  );
  if (icuRate.isErr()) return err(icuRate.error);

  const vaccinationRate = calculateRatioRate(
    daily,
    'vaccination_rate',
    'vaccinatedCount',
    'caseCount',
    periods.vaccinationRatePeriod
  );
  if (vaccinationRate.isErr()) return err(vaccinationRate.error);

  return ok({
    maxDate,
    periods,
    caseVariation1: caseVariation1.value,
    caseVariation2: caseVariation2.value,
    deathRate: deathRate.value,
    icuRate: icuRate.value,
    vaccinationRate: vaccinationRate.value,
  });
};

/**
 * Keys the rates the way report collaborators address them.
 * When both variation periods are equal, they share one key.
 */
export const toNamedRates = (metrics: SurveillanceMetrics): NamedRates => ({
  [`case_var_${String(metrics.periods.caseVariationPeriod1)}`]: metrics.caseVariation1,
  [`case_var_${String(metrics.periods.caseVariationPeriod2)}`]: metrics.caseVariation2,
  death_rate: metrics.deathRate,
  icu_rate: metrics.icuRate,
  vacc_rate: metrics.vaccinationRate,
});
