/**
 * Integration tests for CORS plugin
 */

import { describe, expect, it, afterEach } from 'vitest';

import { createApp } from '@/app/build-app.js';

import { makeCases, makeSnapshot, makeTestConfig } from '../fixtures/builders.js';
import { makeFakeSnapshotRepo, makeSilentLogger } from '../fixtures/fakes.js';

import type { AppConfig } from '@/infra/config/env.js';
import type { FastifyInstance } from 'fastify';

const buildTestApp = (config: AppConfig) =>
  createApp({
    fastifyOptions: { logger: false },
    deps: {
      config,
      snapshotRepo: makeFakeSnapshotRepo(makeSnapshot(makeCases('2025-03-01', 1))),
      logger: makeSilentLogger(),
    },
  });

const server = (isDevelopment: boolean): AppConfig['server'] => ({
  port: 3000,
  host: '0.0.0.0',
  isDevelopment,
  isProduction: !isDevelopment,
  isTest: false,
});

describe('CORS Plugin', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('allows configured origins', async () => {
    app = await buildTestApp(
      makeTestConfig({
        server: server(false),
        cors: { allowedOrigins: 'https://dashboard.example.org' },
      })
    );

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'https://dashboard.example.org' },
    });

    expect(response.statusCode).toBe(200);
    expect(response.headers['access-control-allow-origin']).toBe('https://dashboard.example.org');
  });

  it('does not allow other origins', async () => {
    app = await buildTestApp(
      makeTestConfig({
        server: server(false),
        cors: { allowedOrigins: 'https://dashboard.example.org' },
      })
    );

    const response = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'https://elsewhere.example.org' },
    });

    expect(response.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('allows localhost in development only', async () => {
    app = await buildTestApp(makeTestConfig({ server: server(true) }));
    const devResponse = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'http://localhost:5173' },
    });
    await app.close();

    app = await buildTestApp(makeTestConfig({ server: server(false) }));
    const prodResponse = await app.inject({
      method: 'GET',
      url: '/health/live',
      headers: { origin: 'http://localhost:5173' },
    });

    expect(devResponse.headers['access-control-allow-origin']).toBe('http://localhost:5173');
    expect(prodResponse.headers['access-control-allow-origin']).toBeUndefined();
  });

  it('serves requests without an origin header', async () => {
    app = await buildTestApp(makeTestConfig());

    const response = await app.inject({ method: 'GET', url: '/health/live' });

    expect(response.statusCode).toBe(200);
  });
});
