/**
 * Argument handling and rendering for the compute-metrics command.
 * The process wiring (exit codes, stdout) lives in scripts/compute-metrics.ts.
 */

import { err, ok, type Result } from 'neverthrow';

import { buildSurveillanceReport } from '../../core/usecases/build-surveillance-report.js';
import { formatMetricsSummary } from '../../core/usecases/format-metrics-summary.js';
import { toReportDto } from '../rest/mappers.js';

import type { SurveillanceError } from '../../core/errors.js';
import type { CaseSnapshotRepo } from '../../core/ports.js';
import type { SupportedLanguage, SurveillancePeriods } from '../../core/types.js';
import type { Logger } from 'pino';

export interface ComputeMetricsOptions {
  /** Overrides SNAPSHOT_PATH when given */
  snapshotPath?: string;
  lang: SupportedLanguage;
  json: boolean;
}

export const COMPUTE_METRICS_USAGE =
  'Usage: compute-metrics [snapshotPath] [--lang pt|en] [--json]';

const isSupportedLanguage = (value: string): value is SupportedLanguage =>
  value === 'pt' || value === 'en';

export const parseComputeMetricsArgs = (
  args: readonly string[]
): Result<ComputeMetricsOptions, string> => {
  let snapshotPath: string | undefined;
  let lang: SupportedLanguage = 'pt';
  let json = false;

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    switch (arg) {
      case '--json':
        json = true;
        break;
      case '--lang': {
        const value = args[i + 1];
        if (value === undefined || !isSupportedLanguage(value)) {
          return err(`--lang expects pt or en, got ${value ?? 'nothing'}`);
        }
        lang = value;
        i++;
        break;
      }
      default:
        if (arg === undefined || arg.startsWith('--')) {
          return err(`Unknown option ${String(arg)}`);
        }
        if (snapshotPath !== undefined) {
          return err(`Unexpected argument ${arg}`);
        }
        snapshotPath = arg;
    }
  }

  return ok({ ...(snapshotPath !== undefined && { snapshotPath }), lang, json });
};

export interface RunComputeMetricsDeps {
  snapshotRepo: CaseSnapshotRepo;
  periods: SurveillancePeriods;
  logger: Logger;
}

/**
 * Builds the report and renders it as summary text or as pretty-printed JSON.
 */
export const runComputeMetrics = async (
  deps: RunComputeMetricsDeps,
  options: Pick<ComputeMetricsOptions, 'lang' | 'json'>
): Promise<Result<string, SurveillanceError>> => {
  const result = await buildSurveillanceReport(
    { snapshotRepo: deps.snapshotRepo, logger: deps.logger },
    { periods: deps.periods }
  );
  if (result.isErr()) {
    return err(result.error);
  }

  if (options.json) {
    return ok(JSON.stringify(toReportDto(result.value, options.lang), null, 2));
  }

  return ok(formatMetricsSummary(result.value, options.lang));
};
