import { toNamedRates } from '../../core/usecases/compute-metrics.js';
import { formatMetricsSummary } from '../../core/usecases/format-metrics-summary.js';

import type { MetricsDto, RateDto, ReportDto } from './schemas.js';
import type {
  RateResult,
  SupportedLanguage,
  SurveillanceMetrics,
  SurveillanceReport,
} from '../../core/types.js';

export const toRateDto = (rate: RateResult): RateDto => ({
  metric: rate.metric,
  periodDays: rate.periodDays,
  status: rate.status,
  value: rate.status === 'defined' ? rate.value.toNumber() : null,
});

export const toMetricsDto = (metrics: SurveillanceMetrics): MetricsDto => ({
  maxDate: metrics.maxDate,
  periods: metrics.periods,
  rates: Object.fromEntries(
    Object.entries(toNamedRates(metrics)).map(([key, rate]) => [key, toRateDto(rate)])
  ),
});

/**
 * Serializable view of a report, shared by the REST endpoint and the CLI `--json` output.
 */
export const toReportDto = (report: SurveillanceReport, lang: SupportedLanguage): ReportDto => ({
  source: report.metadata.source,
  extractedAt: report.metadata.extractedAt,
  maxDate: report.maxDate,
  daily: report.daily,
  metrics: toMetricsDto(report.metrics),
  charts: report.charts,
  summary: formatMetricsSummary(report, lang),
  excluded: report.excluded,
});
