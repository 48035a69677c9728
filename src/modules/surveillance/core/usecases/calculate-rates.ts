import { Decimal } from 'decimal.js';
import { err, ok, type Result } from 'neverthrow';

import { addDays, windowStart } from '../calendar.js';
import { hasUncomputedCells, isValidPeriod, latestDate, sumField } from '../daily-window.js';
import {
  createEmptyInputError,
  createInvalidWindowError,
  type CalculationError,
} from '../errors.js';

import type { DailyCountField, DailyRecord, RateMetric, RateResult } from '../types.js';

const PERCENT = new Decimal(100);

/**
 * Percentage rounded to 2 decimal places, half to even.
 */
const toPercent = (numerator: Decimal, denominator: Decimal): Decimal =>
  numerator.div(denominator).mul(PERCENT).toDecimalPlaces(2, Decimal.ROUND_HALF_EVEN);

const rateFrom = (
  metric: RateMetric,
  periodDays: number,
  numerator: Decimal,
  denominator: Decimal
): RateResult => {
  if (denominator.isZero()) {
    return { status: 'undefined', metric, periodDays, reason: 'ZeroDenominator' };
  }

  return { status: 'defined', metric, periodDays, value: toPercent(numerator, denominator) };
};

/**
 * Period-over-period variation of case counts.
 *
 * The window is the `2 * periodDays` calendar days ending at the latest date:
 * the first half is the previous period, the second half the current one.
 *
 *   rate = (current - previous) / previous * 100
 *
 * A previous period with no cases gives an undefined rate.
 */
export const calculateCaseVariation = (
  daily: readonly DailyRecord[],
  periodDays: number
): Result<RateResult, CalculationError> => {
  const operation = 'case variation';

  if (!isValidPeriod(periodDays)) {
    return err(createInvalidWindowError(operation, periodDays));
  }

  const end = latestDate(daily);
  if (end === undefined) {
    return err(createEmptyInputError(operation));
  }

  const start = windowStart(end, periodDays * 2);
  const previousEnd = addDays(start, periodDays - 1);
  const currentStart = addDays(start, periodDays);

  const previous = new Decimal(sumField(daily, 'caseCount', start, previousEnd));
  const current = new Decimal(sumField(daily, 'caseCount', currentStart, end));

  return ok(rateFrom('case_variation', periodDays, current.minus(previous), previous));
};

/**
 * Ratio of two count columns over the trailing `periodDays` days, in percent.
 *
 *   rate = sum(numerator) / sum(denominator) * 100
 *
 * A zero denominator gives an undefined rate. A window that covers rows where
 * either column was never computed is rejected.
 */
export const calculateRatioRate = (
  daily: readonly DailyRecord[],
  metric: RateMetric,
  numeratorField: DailyCountField,
  denominatorField: DailyCountField,
  periodDays: number
): Result<RateResult, CalculationError> => {
  const operation = metric.replace('_', ' ');

  if (!isValidPeriod(periodDays)) {
    return err(createInvalidWindowError(operation, periodDays));
  }

  const end = latestDate(daily);
  if (end === undefined) {
    return err(createEmptyInputError(operation));
  }

  const start = windowStart(end, periodDays);
  if (
    hasUncomputedCells(daily, numeratorField, start, end) ||
    hasUncomputedCells(daily, denominatorField, start, end)
  ) {
    return err(
      createInvalidWindowError(
        operation,
        periodDays,
        `the ${String(periodDays)}-day window reaches dates where ${numeratorField} or ${denominatorField} was not computed`
      )
    );
  }

  const numerator = new Decimal(sumField(daily, numeratorField, start, end));
  const denominator = new Decimal(sumField(daily, denominatorField, start, end));

  return ok(rateFrom(metric, periodDays, numerator, denominator));
};
