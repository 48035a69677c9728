import { classifyVaccination } from './classify-vaccination.js';
import { maxDate, windowStart } from '../calendar.js';

import type { AggregateDailyOptions, CaseRecord, DailyRecord, IsoDate } from '../types.js';

interface DailyCounts {
  caseCount: number;
  deathCount: number;
  icuCount: number;
  vaccinatedCount: number | null;
}

/**
 * Builds the daily table: one row per notification date present in `cases`,
 * ordered by date.
 *
 * Death and ICU counts cover every date. Vaccination labels are only computed
 * for the trailing `vaccinationWindowDays` days ending at the latest date;
 * older rows carry `vaccinatedCount: null`. Records without a notification
 * date are skipped.
 */
export const aggregateDaily = (
  cases: readonly CaseRecord[],
  options: AggregateDailyOptions
): DailyRecord[] => {
  const dated = cases.filter(
    (record): record is CaseRecord & { notificationDate: IsoDate } =>
      record.notificationDate !== null
  );

  const latest = maxDate(dated.map((record) => record.notificationDate));
  if (latest === undefined) {
    return [];
  }

  const labelFrom =
    options.vaccinationWindowDays > 0 ? windowStart(latest, options.vaccinationWindowDays) : null;

  const byDate = new Map<IsoDate, DailyCounts>();

  for (const record of dated) {
    const date = record.notificationDate;
    const inLabelWindow = labelFrom !== null && date >= labelFrom;

    let counts = byDate.get(date);
    if (counts === undefined) {
      counts = {
        caseCount: 0,
        deathCount: 0,
        icuCount: 0,
        vaccinatedCount: inLabelWindow ? 0 : null,
      };
      byDate.set(date, counts);
    }

    counts.caseCount += 1;

    if (record.outcome === 'death') {
      counts.deathCount += 1;
    }

    if (record.icu === 'yes') {
      counts.icuCount += 1;
    }

    if (counts.vaccinatedCount !== null) {
      const label = classifyVaccination(
        record.finalClassification,
        record.fluVaccine,
        record.covidVaccine
      );
      if (label === 'vaccinated') {
        counts.vaccinatedCount += 1;
      }
    }
  }

  return [...byDate.entries()]
    .sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
    .map(([date, counts]) => ({ date, ...counts }));
};
