/**
 * Health module exports
 */

export { makeHealthRoutes } from './shell/rest/routes.js';
export {
  makeSnapshotHealthChecker,
  type SnapshotHealthCheckerOptions,
} from './shell/checkers/index.js';

export type { HealthChecker } from './core/ports.js';
export type { HealthCheckResult, LivenessResponse, ReadinessResponse } from './core/types.js';
