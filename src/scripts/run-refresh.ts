/**
 * One-shot refresh
 *
 * Runs a single refresh against the configured storage, prints the run
 * summary as JSON on stdout and exits non-zero when the run failed.
 *
 * Usage:
 *   DATABASE_URL=postgres://... tsx src/scripts/run-refresh.ts
 */

import { createRuntime } from '../app/runtime.js';
import { createConfig, parseEnv } from '../infra/config/index.js';
import { createLogger } from '../infra/logger/index.js';
import { toRunSummaryDto } from '../modules/refresh/index.js';

const main = async (): Promise<number> => {
  const config = createConfig(parseEnv(process.env));
  const logger = createLogger({
    level: config.logger.level,
    name: 'region-insights-refresh',
    pretty: config.logger.pretty,
  });

  const runtime = await createRuntime({ config, logger });

  try {
    const result = await runtime.orchestrator.runOnce('cli');
    if (result.isErr()) {
      logger.error({ runningRunId: result.error.runningRunId }, result.error.message);
      return 1;
    }

    const summary = result.value;
    process.stdout.write(`${JSON.stringify(toRunSummaryDto(summary), null, 2)}\n`);
    return summary.state === 'succeeded' ? 0 : 1;
  } finally {
    await runtime.close();
  }
};

await main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error('Fatal error:', error);
    process.exit(1);
  });
