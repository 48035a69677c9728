// Repository
export { createSnapshotRepo, type SnapshotRepoOptions } from './shell/repo/fs-snapshot-repo.js';
export type { CaseSnapshotRepo } from './core/ports.js';

// Use cases
export { classifyVaccination } from './core/usecases/classify-vaccination.js';
export { normalizeCaseRow, normalizeCaseRows } from './core/usecases/normalize-case-rows.js';
export { aggregateDaily } from './core/usecases/aggregate-daily.js';
export { calculateCaseVariation, calculateRatioRate } from './core/usecases/calculate-rates.js';
export { computeSurveillanceMetrics, toNamedRates } from './core/usecases/compute-metrics.js';
export {
  buildChartSeries,
  buildDailySeries,
  buildMonthlySeries,
  isPartialMonth,
} from './core/usecases/build-chart-series.js';
export {
  buildSurveillanceReport,
  type BuildSurveillanceReportDeps,
  type BuildSurveillanceReportInput,
} from './core/usecases/build-surveillance-report.js';
export { formatMetricsSummary } from './core/usecases/format-metrics-summary.js';

// REST
export { makeSurveillanceRoutes, type MakeSurveillanceRoutesDeps } from './shell/rest/routes.js';

// Types
export { DEFAULT_SURVEILLANCE_PERIODS, isDefinedRate } from './core/types.js';
export type {
  CaseRecord,
  CaseSnapshot,
  ChartPeriods,
  ChartSeries,
  DailyRecord,
  DailySeriesPoint,
  MonthlySeriesBucket,
  NamedRates,
  RatePeriods,
  RateResult,
  SupportedLanguage,
  SurveillanceMetrics,
  SurveillancePeriods,
  SurveillanceReport,
  VaccinationLabel,
} from './core/types.js';

// Errors
export {
  getHttpStatusForError,
  type CalculationError,
  type EmptyInputError,
  type SnapshotRepoError,
  type SurveillanceError,
} from './core/errors.js';
