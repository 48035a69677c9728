import { describe, it, expect } from 'vitest';

import { getReadiness } from '@/modules/health/core/usecases/get-readiness.js';

import type { HealthChecker } from '@/modules/health/core/ports.js';

describe('getReadiness', () => {
  const timestamp = '2025-01-01T00:00:00Z';
  const uptime = 100;

  it('returns ok when all checks are healthy', async () => {
    const checkers: HealthChecker[] = [
      async () => ({ name: 'case-snapshot', status: 'healthy' }),
      async () => ({ name: 'other', status: 'healthy' }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('ok');
    expect(result.checks.map((check) => check.name)).toEqual(['case-snapshot', 'other']);
    expect(result.uptime).toBe(100);
    expect(result.timestamp).toBe(timestamp);
  });

  it('returns ok when no checkers are configured', async () => {
    const result = await getReadiness({ checkers: [] }, { uptime, timestamp });

    expect(result.status).toBe('ok');
    expect(result.checks).toEqual([]);
  });

  it('includes version only when provided', async () => {
    const withVersion = await getReadiness({ checkers: [], version: '1.0.0' }, { uptime, timestamp });
    const withoutVersion = await getReadiness({ checkers: [] }, { uptime, timestamp });

    expect(withVersion.version).toBe('1.0.0');
    expect('version' in withoutVersion).toBe(false);
  });

  it('returns unhealthy when any check is unhealthy', async () => {
    const checkers: HealthChecker[] = [
      async () => ({ name: 'a', status: 'healthy' }),
      async () => ({ name: 'case-snapshot', status: 'unhealthy', message: 'missing' }),
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
  });

  it('turns a rejected check into an unhealthy result', async () => {
    const checkers: HealthChecker[] = [
      async () => {
        throw new Error('Disk read timed out');
      },
    ];

    const result = await getReadiness({ checkers }, { uptime, timestamp });

    expect(result.status).toBe('unhealthy');
    expect(result.checks).toEqual([
      { name: 'unknown', status: 'unhealthy', message: 'Disk read timed out' },
    ]);
  });
});
