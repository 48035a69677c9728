import { createConfig, parseEnv } from '../src/infra/config/index.js';
import { createLogger } from '../src/infra/logger/index.js';
import {
  COMPUTE_METRICS_USAGE,
  parseComputeMetricsArgs,
  runComputeMetrics,
} from '../src/modules/surveillance/shell/cli/compute-metrics-cli.js';
import { createSnapshotRepo } from '../src/modules/surveillance/index.js';

const main = async (): Promise<void> => {
  const argsResult = parseComputeMetricsArgs(process.argv.slice(2));
  if (argsResult.isErr()) {
    console.error(argsResult.error);
    console.error(COMPUTE_METRICS_USAGE);
    process.exit(1);
  }
  const options = argsResult.value;

  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'compute-metrics',
    pretty: config.logger.pretty,
    toStderr: true,
  });

  const snapshotRepo = createSnapshotRepo({
    filePath: options.snapshotPath ?? config.snapshot.path,
    logger,
  });

  const result = await runComputeMetrics(
    { snapshotRepo, periods: config.periods, logger },
    { lang: options.lang, json: options.json }
  );

  if (result.isErr()) {
    console.error(`${result.error.type}: ${result.error.message}`);
    process.exit(1);
  }

  console.log(result.value);
};

await main().catch((error: unknown) => {
  console.error('Fatal error:', error instanceof Error ? error.message : String(error));
  process.exit(1);
});
