import type { IsoDate } from './types.js';

const MS_PER_DAY = 86_400_000;

/** Date part, optionally followed by a time part from a datetime export */
const ISO_DATE_RE = /^(\d{4})-(\d{2})-(\d{2})(?:[T ][\d:.]+(?:Z|[+-]\d{2}:?\d{2})?)?$/;

export interface YearMonth {
  year: number;
  /** 1-12 */
  month: number;
}

const pad2 = (value: number): string => String(value).padStart(2, '0');

export const formatIsoDate = (year: number, month: number, day: number): IsoDate =>
  `${String(year).padStart(4, '0')}-${pad2(month)}-${pad2(day)}`;

export const daysInMonth = (year: number, month: number): number =>
  new Date(Date.UTC(year, month, 0)).getUTCDate();

const MIN_YEAR = 1000;

/**
 * Parses a `YYYY-MM-DD` date (a trailing time part is dropped).
 * Returns null for malformed strings, years before 1000 and impossible dates
 * such as 2024-02-30.
 */
export const parseIsoDate = (value: string): IsoDate | null => {
  const match = ISO_DATE_RE.exec(value.trim());
  if (match === null) {
    return null;
  }

  const year = Number.parseInt(match[1] ?? '', 10);
  const month = Number.parseInt(match[2] ?? '', 10);
  const day = Number.parseInt(match[3] ?? '', 10);

  if (year < MIN_YEAR || month < 1 || month > 12 || day < 1 || day > daysInMonth(year, month)) {
    return null;
  }

  return formatIsoDate(year, month, day);
};

const splitIsoDate = (date: IsoDate): [number, number, number] => {
  const [year = '0', month = '1', day = '1'] = date.split('-');
  return [Number.parseInt(year, 10), Number.parseInt(month, 10), Number.parseInt(day, 10)];
};

/**
 * Days since 1970-01-01 (UTC).
 */
export const toEpochDay = (date: IsoDate): number => {
  const [year, month, day] = splitIsoDate(date);
  return Date.UTC(year, month - 1, day) / MS_PER_DAY;
};

export const fromEpochDay = (epochDay: number): IsoDate => {
  const date = new Date(epochDay * MS_PER_DAY);
  return formatIsoDate(date.getUTCFullYear(), date.getUTCMonth() + 1, date.getUTCDate());
};

export const addDays = (date: IsoDate, days: number): IsoDate =>
  fromEpochDay(toEpochDay(date) + days);

/**
 * First day of the inclusive window of `days` calendar days ending at `end`.
 */
export const windowStart = (end: IsoDate, days: number): IsoDate => addDays(end, -(days - 1));

export const yearMonthOf = (date: IsoDate): YearMonth => {
  const [year, month] = splitIsoDate(date);
  return { year, month };
};

/**
 * Moves a year-month by a (possibly negative) number of months.
 */
export const shiftMonths = (value: YearMonth, months: number): YearMonth => {
  const index = value.year * 12 + (value.month - 1) + months;
  return { year: Math.floor(index / 12), month: (index % 12) + 1 };
};

/** `YYYY-MM` */
export const formatYearMonth = (value: YearMonth): string =>
  `${String(value.year).padStart(4, '0')}-${pad2(value.month)}`;

export const lastDayOfMonth = (value: YearMonth): IsoDate =>
  formatIsoDate(value.year, value.month, daysInMonth(value.year, value.month));

export const isLastDayOfMonth = (date: IsoDate): boolean =>
  date === lastDayOfMonth(yearMonthOf(date));

/**
 * Latest date of a non-empty list of dates; undefined when the list is empty.
 */
export const maxDate = (dates: Iterable<IsoDate>): IsoDate | undefined => {
  let max: IsoDate | undefined;
  for (const date of dates) {
    if (max === undefined || date > max) {
      max = date;
    }
  }
  return max;
};
