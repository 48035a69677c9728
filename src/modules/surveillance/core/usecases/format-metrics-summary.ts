import { formatReportDate, getTranslations, interpolate } from '../i18n.js';

import type { RateResult, SupportedLanguage, SurveillanceReport } from '../types.js';

const formatRate = (rate: RateResult, lang: SupportedLanguage): string => {
  const t = getTranslations(lang);
  if (rate.status === 'undefined') {
    return t.insufficientData;
  }
  return `${rate.value.toFixed(2).replace('.', t.decimalSeparator)}%`;
};

/**
 * Renders the metrics block consumed by the report-text collaborator:
 * a heading, one line per rate and the two chart captions.
 *
 * Undefined rates are written out as "insufficient data" so the narrative
 * never reports a fabricated 0%.
 */
export const formatMetricsSummary = (
  report: SurveillanceReport,
  lang: SupportedLanguage = 'pt'
): string => {
  const t = getTranslations(lang);
  const { metrics, chartPeriods } = report;

  const line = (template: string, rate: RateResult): string =>
    `- ${interpolate(template, { days: rate.periodDays })}: ${formatRate(rate, lang)}`;

  return [
    interpolate(t.heading, { date: formatReportDate(lang, report.maxDate) }),
    line(t.metrics.caseVariation, metrics.caseVariation1),
    line(t.metrics.caseVariation, metrics.caseVariation2),
    line(t.metrics.deathRate, metrics.deathRate),
    line(t.metrics.icuRate, metrics.icuRate),
    line(t.metrics.vaccinationRate, metrics.vaccinationRate),
    '',
    interpolate(t.charts.daily, { days: chartPeriods.dailyPeriod }),
    interpolate(t.charts.monthly, { months: chartPeriods.monthlyPeriod }),
  ].join('\n');
};
