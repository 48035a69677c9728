/**
 * Snapshot health checker
 *
 * Loads the case snapshot through the repository. The service cannot answer
 * any surveillance request without it, so a failure is unhealthy.
 */

import type { CaseSnapshotRepo } from '../../../surveillance/core/ports.js';
import type { HealthChecker } from '../../core/ports.js';

export interface SnapshotHealthCheckerOptions {
  /** Name reported in the readiness response (default: 'case-snapshot') */
  name?: string;
}

export const makeSnapshotHealthChecker = (
  snapshotRepo: CaseSnapshotRepo,
  options: SnapshotHealthCheckerOptions = {}
): HealthChecker => {
  const { name = 'case-snapshot' } = options;

  return async () => {
    const startTime = Date.now();
    const result = await snapshotRepo.load();
    const latencyMs = Date.now() - startTime;

    if (result.isErr()) {
      return { name, status: 'unhealthy', message: result.error.message, latencyMs };
    }

    return {
      name,
      status: 'healthy',
      message: `${String(result.value.cases.length)} case records`,
      latencyMs,
    };
  };
};
