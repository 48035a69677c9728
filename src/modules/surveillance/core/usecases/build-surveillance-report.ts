/**
 * Build Surveillance Report Use Case
 *
 * Loads the case snapshot, builds the daily table and derives the rates and
 * chart series handed to the report collaborators.
 */

import { err, ok, type Result } from 'neverthrow';

import { aggregateDaily } from './aggregate-daily.js';
import { buildChartSeries } from './build-chart-series.js';
import { computeSurveillanceMetrics } from './compute-metrics.js';
import { createEmptyInputError, type SurveillanceError } from '../errors.js';

import type { CaseSnapshotRepo } from '../ports.js';
import type { SurveillancePeriods, SurveillanceReport } from '../types.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface BuildSurveillanceReportDeps {
  snapshotRepo: CaseSnapshotRepo;
  logger: Logger;
}

export interface BuildSurveillanceReportInput {
  periods: SurveillancePeriods;
}

// ─────────────────────────────────────────────────────────────────────────────
// Implementation
// ─────────────────────────────────────────────────────────────────────────────

export const buildSurveillanceReport = async (
  deps: BuildSurveillanceReportDeps,
  input: BuildSurveillanceReportInput
): Promise<Result<SurveillanceReport, SurveillanceError>> => {
  const { snapshotRepo, logger } = deps;
  const { periods } = input;

  const log = logger.child({ usecase: 'buildSurveillanceReport' });

  const snapshotResult = await snapshotRepo.load();
  if (snapshotResult.isErr()) {
    log.error({ error: snapshotResult.error }, 'Failed to load case snapshot');
    return err(snapshotResult.error);
  }

  const snapshot = snapshotResult.value;
  const undated = snapshot.cases.filter((record) => record.notificationDate === null).length;

  if (snapshot.rejected.length > 0 || undated > 0) {
    log.warn(
      { malformed: snapshot.rejected.length, undated },
      'Excluding case rows from aggregation'
    );
  }

  const daily = aggregateDaily(snapshot.cases, {
    vaccinationWindowDays: periods.vaccinationWindowDays,
  });

  const maxDate = daily.at(-1)?.date;
  if (maxDate === undefined) {
    log.warn('Case snapshot has no dated records');
    return err(createEmptyInputError('surveillance report'));
  }

  const metricsResult = computeSurveillanceMetrics(daily, periods.rates);
  if (metricsResult.isErr()) {
    return err(metricsResult.error);
  }

  const chartsResult = buildChartSeries(daily, periods.charts);
  if (chartsResult.isErr()) {
    return err(chartsResult.error);
  }

  log.info(
    { cases: snapshot.cases.length - undated, days: daily.length, maxDate },
    'Built surveillance report'
  );

  return ok({
    metadata: snapshot.metadata,
    maxDate,
    daily,
    metrics: metricsResult.value,
    charts: chartsResult.value,
    chartPeriods: periods.charts,
    excluded: {
      malformed: snapshot.rejected.length,
      undated,
    },
  });
};
