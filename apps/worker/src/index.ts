import { loadConfig, WorkerConfigSchema, createLogger, errorMeta, startHealthBeat } from '@epistat/shared';
import { initPool, closePool, createAccessLayer } from '@epistat/db';
import { startSessionSweeper } from './jobs/session-sweep';

const logger = createLogger({ name: 'worker' });

async function main() {
  const config = loadConfig(WorkerConfigSchema);

  initPool({ connectionString: config.DATABASE_URL, max: config.DATABASE_POOL_MAX });

  const { reaper } = createAccessLayer({ config });

  const healthBeat = startHealthBeat({
    path: config.WORKER_HEALTHCHECK_PATH,
    intervalMs: config.WORKER_HEALTHCHECK_INTERVAL_MS,
    logger,
  });

  const sweeper = startSessionSweeper(reaper, { intervalMs: config.SESSION_SWEEP_INTERVAL_MS });

  logger.info({ sweepIntervalMs: config.SESSION_SWEEP_INTERVAL_MS }, 'Worker started');

  const shutdown = async () => {
    logger.info({}, 'Shutting down worker');
    healthBeat.stop();
    sweeper.stop();
    await sweeper.idle();
    await closePool();
    process.exit(0);
  };

  const onSignal = () => {
    shutdown().catch((err: unknown) => {
      logger.fatal(errorMeta(err), 'Worker shutdown failed');
      process.exit(1);
    });
  };

  process.on('SIGTERM', onSignal);
  process.on('SIGINT', onSignal);
}

main().catch((err: unknown) => {
  logger.fatal(errorMeta(err), 'Failed to start worker');
  process.exit(1);
});
