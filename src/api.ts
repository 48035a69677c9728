/**
 * API server entry point
 * Starts the Fastify HTTP server
 */

import { buildApp } from './app/build-app.js';
import { parseEnv, createConfig } from './infra/config/index.js';
import { createLogger } from './infra/logger/index.js';
import { makeSnapshotHealthChecker } from './modules/health/index.js';
import { createSnapshotRepo } from './modules/surveillance/index.js';

const main = async (): Promise<void> => {
  const env = parseEnv(process.env);
  const config = createConfig(env);

  const logger = createLogger({
    level: config.logger.level,
    name: 'srag-surveillance-server',
    pretty: config.logger.pretty,
  });

  logger.info(
    { config: { server: config.server, snapshot: config.snapshot, periods: config.periods } },
    'Starting API server'
  );

  const snapshotRepo = createSnapshotRepo({
    filePath: config.snapshot.path,
    cacheTtlMs: config.snapshot.cacheTtlMs,
    logger,
  });

  // Fail fast on an unreadable snapshot instead of serving 500s
  const initial = await snapshotRepo.load();
  if (initial.isErr()) {
    logger.fatal({ error: initial.error }, 'Case snapshot could not be loaded');
    process.exit(1);
  }
  logger.info({ cases: initial.value.cases.length }, 'Case snapshot loaded');

  const app = await buildApp({
    fastifyOptions: {
      logger: {
        level: config.logger.level,
        ...(config.logger.pretty && {
          transport: {
            target: 'pino-pretty',
            options: {
              colorize: true,
              translateTime: 'SYS:standard',
              ignore: 'pid,hostname',
            },
          },
        }),
      },
    },
    deps: {
      config,
      snapshotRepo,
      logger,
      healthCheckers: [makeSnapshotHealthChecker(snapshotRepo)],
    },
    version: process.env['APP_VERSION'] ?? '0.1.0',
  });

  const shutdown = async (signal: string): Promise<void> => {
    logger.info({ signal }, 'Received shutdown signal');

    try {
      await app.close();
      logger.info('Server closed gracefully');
      process.exit(0);
    } catch (error) {
      logger.error({ err: error }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => {
    void shutdown('SIGTERM');
  });
  process.on('SIGINT', () => {
    void shutdown('SIGINT');
  });

  try {
    const address = await app.listen({
      port: config.server.port,
      host: config.server.host,
    });

    logger.info({ address }, 'Server listening');
  } catch (error) {
    logger.fatal({ err: error }, 'Failed to start server');
    process.exit(1);
  }
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error);
  process.exit(1);
});
