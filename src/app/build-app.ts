/**
 * Fastify application factory
 * Creates and configures the Fastify instance with all plugins and routes
 */

import fastifyLib, {
  type FastifyInstance,
  type FastifyServerOptions,
  type FastifyError,
} from 'fastify';

import { createChildLogger } from '../infra/logger/index.js';
import { registerCors } from '../infra/plugins/index.js';
import { makeHealthRoutes, type HealthChecker } from '../modules/health/index.js';
import { makeSurveillanceRoutes, type CaseSnapshotRepo } from '../modules/surveillance/index.js';

import type { AppConfig } from '../infra/config/env.js';
import type { Logger } from 'pino';

/**
 * Application dependencies that can be injected
 */
export interface AppDeps {
  config: AppConfig;
  snapshotRepo: CaseSnapshotRepo;
  /** Logger handed to use cases; Fastify keeps its own request logger */
  logger: Logger;
  healthCheckers?: HealthChecker[];
}

export interface AppOptions {
  fastifyOptions?: FastifyServerOptions;
  deps?: Partial<AppDeps>;
  version?: string;
}

export const buildApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const { fastifyOptions = {}, deps = {}, version } = options;

  if (deps.config === undefined || deps.snapshotRepo === undefined || deps.logger === undefined) {
    throw new Error('Missing required dependencies: config, snapshotRepo, logger');
  }

  const { config, snapshotRepo, logger } = deps;

  const app = fastifyLib({
    ...fastifyOptions,
  });

  await registerCors(app, config);

  await app.register(
    makeHealthRoutes({
      ...(version !== undefined && { version }),
      checkers: deps.healthCheckers ?? [],
    })
  );

  await app.register(
    makeSurveillanceRoutes({
      snapshotRepo,
      periods: config.periods,
      logger: createChildLogger(logger, { module: 'surveillance' }),
    })
  );

  app.setErrorHandler((error: FastifyError, request, reply) => {
    request.log.error({ err: error }, 'Request error');

    if (error.validation != null) {
      return reply.status(400).send({
        ok: false,
        error: 'ValidationError',
        message: error.message,
      });
    }

    if (error.statusCode != null && error.statusCode < 500) {
      return reply.status(error.statusCode).send({
        ok: false,
        error: error.name,
        message: error.message,
      });
    }

    return reply.status(500).send({
      ok: false,
      error: 'InternalServerError',
      message: 'An unexpected error occurred',
    });
  });

  app.setNotFoundHandler((request, reply) => {
    return reply.status(404).send({
      ok: false,
      error: 'NotFoundError',
      message: `Route ${request.method} ${request.url} not found`,
    });
  });

  return app;
};

/**
 * Build app and prepare it (await all plugins)
 */
export const createApp = async (options: AppOptions = {}): Promise<FastifyInstance> => {
  const app = await buildApp(options);
  await app.ready();
  return app;
};
