import type { HealthChecker } from '../ports.js';
import type { HealthCheckResult, ReadinessResponse } from '../types.js';

export interface GetReadinessDeps {
  checkers: HealthChecker[];
  version?: string | undefined;
}

export interface GetReadinessInput {
  uptime: number;
  timestamp: string;
}

const toCheckResult = (result: PromiseSettledResult<HealthCheckResult>): HealthCheckResult => {
  if (result.status === 'fulfilled') {
    return result.value;
  }
  return {
    name: 'unknown',
    status: 'unhealthy',
    message: result.reason instanceof Error ? result.reason.message : 'Check failed',
  };
};

/**
 * Runs every checker in parallel. The service is ready only when all of them
 * report healthy.
 */
export async function getReadiness(
  deps: GetReadinessDeps,
  input: GetReadinessInput
): Promise<ReadinessResponse> {
  const { checkers, version } = deps;

  const results = await Promise.allSettled(checkers.map((checker) => checker()));
  const checks = results.map(toCheckResult);
  const status = checks.some((check) => check.status === 'unhealthy') ? 'unhealthy' : 'ok';

  return {
    status,
    timestamp: input.timestamp,
    uptime: input.uptime,
    checks,
    ...(version !== undefined && { version }),
  };
}
