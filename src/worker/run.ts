import { run } from 'graphile-worker';
import { env } from '../config/env.js';
import { createEngine } from '../engine.js';
import { createLogger } from '../logger.js';
import { buildSyncCrontab } from '../services/queue.js';
import { createTaskList } from './taskHandlers.js';

const logger = createLogger(env.logLevel);

async function main() {
  const engine = await createEngine(env, logger);
  const runner = await run({
    connectionString: env.databaseUrl,
    taskList: createTaskList(engine),
    concurrency: env.sync.concurrency,
    pollInterval: 1000,
    schema: 'graphile_worker',
    crontab: buildSyncCrontab(env.sync.intervalMinutes),
    noHandleSignals: true,
  });
  logger.info(
    { concurrency: env.sync.concurrency, intervalMinutes: env.sync.intervalMinutes },
    'sync worker started',
  );

  let stopping = false;
  const shutdown = async (signal: NodeJS.Signals) => {
    if (stopping) {
      return;
    }
    stopping = true;
    logger.info({ signal }, 'stopping worker; waiting for in-flight syncs');
    // Stops dequeuing and resolves once running jobs have finished.
    await runner.stop();
    await engine.close();
    logger.info('worker stopped');
  };

  for (const signal of ['SIGINT', 'SIGTERM'] as const) {
    process.once(signal, () => {
      shutdown(signal).catch((error: unknown) => {
        logger.error({ err: error }, 'worker shutdown failed');
        process.exit(1);
      });
    });
  }

  await runner.promise;
}

main().catch((err: unknown) => {
  logger.error({ err }, 'worker stopped with error');
  process.exit(1);
});
