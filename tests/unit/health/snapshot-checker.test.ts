import { describe, expect, it } from 'vitest';

import { makeSnapshotHealthChecker } from '@/modules/health/index.js';

import { makeCases, makeSnapshot } from '../../fixtures/builders.js';
import { makeFailingSnapshotRepo, makeFakeSnapshotRepo } from '../../fixtures/fakes.js';

describe('makeSnapshotHealthChecker', () => {
  it('is healthy when the snapshot loads', async () => {
    const checker = makeSnapshotHealthChecker(
      makeFakeSnapshotRepo(makeSnapshot(makeCases('2025-03-01', 3)))
    );

    const result = await checker();

    expect(result.name).toBe('case-snapshot');
    expect(result.status).toBe('healthy');
    expect(result.message).toBe('3 case records');
    expect(typeof result.latencyMs).toBe('number');
  });

  it('is unhealthy with the repository message when loading fails', async () => {
    const checker = makeSnapshotHealthChecker(
      makeFailingSnapshotRepo({
        type: 'SnapshotNotFound',
        message: 'Case snapshot not found at /srv/cases.yaml',
        path: '/srv/cases.yaml',
      }),
      { name: 'snapshot' }
    );

    const result = await checker();

    expect(result).toMatchObject({
      name: 'snapshot',
      status: 'unhealthy',
      message: 'Case snapshot not found at /srv/cases.yaml',
    });
  });
});
