import { err, ok, type Result } from 'neverthrow';

import {
  addDays,
  formatYearMonth,
  isLastDayOfMonth,
  lastDayOfMonth,
  shiftMonths,
  yearMonthOf,
  type YearMonth,
} from '../calendar.js';
import { isValidPeriod, latestDate } from '../daily-window.js';
import {
  createEmptyInputError,
  createInvalidWindowError,
  type CalculationError,
} from '../errors.js';

import type {
  ChartPeriods,
  ChartSeries,
  DailyRecord,
  DailySeriesPoint,
  IsoDate,
  MonthlySeriesBucket,
} from '../types.js';

/**
 * A monthly bucket is partial when it holds the latest date and the latest
 * date is not the last day of its month.
 */
export const isPartialMonth = (bucketYear: number, bucketMonth: number, maxDate: IsoDate): boolean => {
  const latest = yearMonthOf(maxDate);
  return latest.year === bucketYear && latest.month === bucketMonth && !isLastDayOfMonth(maxDate);
};

/**
 * `MM/YY`, plus ` (until DD/MM)` for a partial bucket.
 */
const formatBucketLabel = (value: YearMonth, partial: boolean, periodEnd: IsoDate): string => {
  const base = `${String(value.month).padStart(2, '0')}/${String(value.year % 100).padStart(2, '0')}`;
  if (!partial) {
    return base;
  }
  return `${base} (until ${periodEnd.slice(8, 10)}/${periodEnd.slice(5, 7)})`;
};

/**
 * Case counts for each of the trailing `dailyPeriod` days ending at the latest
 * date, ascending. Days without notifications are filled with 0 so the chart
 * gets a continuous grid.
 */
export const buildDailySeries = (
  daily: readonly DailyRecord[],
  dailyPeriod: number
): Result<DailySeriesPoint[], CalculationError> => {
  const operation = 'daily series';

  if (!isValidPeriod(dailyPeriod)) {
    return err(createInvalidWindowError(operation, dailyPeriod));
  }

  const end = latestDate(daily);
  if (end === undefined) {
    return err(createEmptyInputError(operation));
  }

  const casesByDate = new Map(daily.map((record) => [record.date, record.caseCount]));

  const points: DailySeriesPoint[] = [];
  for (let offset = dailyPeriod - 1; offset >= 0; offset--) {
    const date = addDays(end, -offset);
    points.push({ date, cases: casesByDate.get(date) ?? 0 });
  }

  return ok(points);
};

/**
 * Case counts per calendar month for the trailing `monthlyPeriod` months,
 * ending with the month of the latest date. Months without notifications are
 * zero buckets.
 */
export const buildMonthlySeries = (
  daily: readonly DailyRecord[],
  monthlyPeriod: number
): Result<MonthlySeriesBucket[], CalculationError> => {
  const operation = 'monthly series';

  if (!isValidPeriod(monthlyPeriod)) {
    return err(createInvalidWindowError(operation, monthlyPeriod));
  }

  const end = latestDate(daily);
  if (end === undefined) {
    return err(createEmptyInputError(operation));
  }

  const casesByMonth = new Map<string, number>();
  for (const record of daily) {
    const month = record.date.slice(0, 7);
    casesByMonth.set(month, (casesByMonth.get(month) ?? 0) + record.caseCount);
  }

  const latestMonth = yearMonthOf(end);
  const buckets: MonthlySeriesBucket[] = [];

  for (let offset = monthlyPeriod - 1; offset >= 0; offset--) {
    const value = shiftMonths(latestMonth, -offset);
    const month = formatYearMonth(value);
    const partial = isPartialMonth(value.year, value.month, end);
    const periodEnd = partial ? end : lastDayOfMonth(value);

    buckets.push({
      month,
      cases: casesByMonth.get(month) ?? 0,
      periodEnd,
      label: formatBucketLabel(value, partial, periodEnd),
      partial,
    });
  }

  return ok(buckets);
};

/**
 * Both chart series, using the configured chart windows.
 */
export const buildChartSeries = (
  daily: readonly DailyRecord[],
  periods: ChartPeriods
): Result<ChartSeries, CalculationError> => {
  const dailySeries = buildDailySeries(daily, periods.dailyPeriod);
  if (dailySeries.isErr()) return err(dailySeries.error);

  const monthlySeries = buildMonthlySeries(daily, periods.monthlyPeriod);
  if (monthlySeries.isErr()) return err(monthlySeries.error);

  return ok({ daily: dailySeries.value, monthly: monthlySeries.value });
};
