/**
 * Integration tests for health endpoints
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import {
  makeCases,
  makeFailingHealthChecker,
  makeHealthChecker,
  makeSnapshot,
  makeTestConfig,
} from '../fixtures/builders.js';
import { makeFakeSnapshotRepo, makeSilentLogger } from '../fixtures/fakes.js';

import type { HealthChecker } from '@/modules/health/index.js';
import type { FastifyInstance } from 'fastify';

const buildTestApp = (healthCheckers: HealthChecker[] = [], version?: string) =>
  createApp({
    fastifyOptions: { logger: false },
    deps: {
      config: makeTestConfig(),
      snapshotRepo: makeFakeSnapshotRepo(makeSnapshot(makeCases('2025-03-01', 1))),
      logger: makeSilentLogger(),
      healthCheckers,
    },
    ...(version !== undefined && { version }),
  });

describe('Health Endpoints', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('GET /health/live returns 200 with status ok', async () => {
    app = await buildTestApp([makeFailingHealthChecker('case-snapshot', 'down')]);

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok' });
  });

  it('GET /health/ready returns 200 when every check is healthy', async () => {
    app = await buildTestApp([makeHealthChecker('case-snapshot')], '1.2.3');

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(200);
    const body = response.json<{ status: string; version: string; checks: unknown[] }>();
    expect(body.status).toBe('ok');
    expect(body.version).toBe('1.2.3');
    expect(body.checks).toEqual([{ name: 'case-snapshot', status: 'healthy' }]);
  });

  it('GET /health/ready returns 503 when a check is unhealthy', async () => {
    app = await buildTestApp([
      makeHealthChecker('other'),
      makeFailingHealthChecker('case-snapshot', 'Case snapshot not found'),
    ]);

    const response = await app.inject({ method: 'GET', url: '/health/ready' });

    expect(response.statusCode).toBe(503);
    expect(response.json<{ status: string }>().status).toBe('unhealthy');
  });
});
