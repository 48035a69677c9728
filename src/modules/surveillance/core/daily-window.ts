import { maxDate } from './calendar.js';

import type { DailyCountField, DailyRecord, IsoDate } from './types.js';

/**
 * Latest date of the daily table, or undefined for an empty table.
 */
export const latestDate = (daily: readonly DailyRecord[]): IsoDate | undefined =>
  maxDate(daily.map((record) => record.date));

export const isValidPeriod = (periodDays: number): boolean =>
  Number.isInteger(periodDays) && periodDays > 0;

/**
 * True when a row in [from, to] has no value for `field`, i.e. the range
 * reaches back before the vaccination labelling window.
 */
export const hasUncomputedCells = (
  daily: readonly DailyRecord[],
  field: DailyCountField,
  from: IsoDate,
  to: IsoDate
): boolean =>
  daily.some((record) => record.date >= from && record.date <= to && record[field] === null);

/**
 * Sums a count column over the inclusive date range [from, to].
 * Dates missing from the table contribute nothing; `null` cells count as 0.
 */
export const sumField = (
  daily: readonly DailyRecord[],
  field: DailyCountField,
  from: IsoDate,
  to: IsoDate
): number => {
  let total = 0;
  for (const record of daily) {
    if (record.date >= from && record.date <= to) {
      total += record[field] ?? 0;
    }
  }
  return total;
};
