import type { HealthCheckResult } from './types.js';

/**
 * Probes one dependency. A rejected promise counts as unhealthy.
 */
export type HealthChecker = () => Promise<HealthCheckResult>;
