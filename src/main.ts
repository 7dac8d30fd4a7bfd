// Bounded connection pool for every fetch made by the source clients
import { setGlobalDispatcher, Agent } from 'undici';
setGlobalDispatcher(new Agent({
  connections: 50,             // per host
  pipelining: 1,
  connectTimeout: 10_000,
  bodyTimeout: 15_000,
  headersTimeout: 10_000,
  keepAliveTimeout: 4_000,
  keepAliveMaxTimeout: 30_000,
}));

import { assertValidConfig, loadConfig } from './config.js';
import { logger } from './utils/logger.js';
import { ConfigError } from './utils/errors.js';
import { readFeed } from './pipeline/feed.js';
import { createPipeline } from './pipeline/create-pipeline.js';
import { summarizeReports } from './pipeline/token-risk-pipeline.js';

process.on('unhandledRejection', (reason) => {
  const msg = reason instanceof Error ? reason.message : String(reason);
  logger.error(`[process] Unhandled rejection: ${msg}`);
  if (reason instanceof Error && reason.stack) logger.error(`[process] Stack: ${reason.stack}`);
});

async function main(): Promise<void> {
  const config = assertValidConfig(loadConfig());

  const candidates = readFeed(config.feedPath);
  logger.info(`[main] ${candidates.length} candidate(s) from ${config.feedPath}`);

  const { pipeline, events } = createPipeline(config);
  events.on('source:unavailable', ({ source, chain, address, reason }) => {
    logger.debug(`[main] ${source} unavailable for ${chain}:${address}: ${reason}`);
  });

  const controller = new AbortController();
  let interrupted = false;
  process.on('SIGINT', () => {
    if (interrupted) {
      logger.warn('[main] Force exit (second SIGINT)');
      process.exit(1);
    }
    interrupted = true;
    logger.info('[main] Aborting run (Ctrl+C again to force)...');
    controller.abort(new Error('interrupted'));
  });

  const reports = await pipeline.run(candidates, { signal: controller.signal });
  process.stdout.write(`${JSON.stringify(reports, null, 2)}\n`);

  const summary = summarizeReports(reports);
  logger.info(`[main] ${summary.total} report(s)`, { byLevel: summary.byLevel, byChain: summary.byChain });
}

main().catch((err: unknown) => {
  if (err instanceof ConfigError) {
    for (const problem of err.problems) logger.error(`Config error: ${problem}`);
  } else {
    logger.error('Fatal error', { error: String(err), stack: err instanceof Error ? err.stack : undefined });
  }
  process.exitCode = 1;
});
