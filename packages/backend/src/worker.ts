/**
 * Standalone worker process for maintenance jobs
 *
 * Run with: npm run worker
 */
import 'dotenv/config';
import { createWorkContext } from './context.js';
import { startWorkers, stopWorkers, closeQueues } from './jobs/index.js';
import { setupScheduledJobs, removeScheduledJobs } from './jobs/scheduler.js';
import { getWorkManagerConfig } from './lib/config/work-manager.js';
import { logger } from './lib/logger.js';
import { MemoryRecordSink, recordUpsertType, researchBriefType } from './order-types/index.js';
import { closeRedisConnection } from './lib/redis.js';

async function main() {
  const config = getWorkManagerConfig();
  const sink = new MemoryRecordSink();
  const context = createWorkContext({
    config,
    orderTypes: [recordUpsertType(sink), researchBriefType(sink)],
  });
  const log = logger.child({ component: 'worker' });

  log.info({ orderTypes: context.registry.names(), leaseBackend: config.lease.backend }, 'Work maintenance worker');

  await startWorkers(context.maintenance, log);
  await setupScheduledJobs(config, log);

  const shutdown = async (signal: string) => {
    log.info({ signal }, 'Shutting down gracefully');

    try {
      await removeScheduledJobs(log);
      await stopWorkers(log);
      await closeQueues();
      await closeRedisConnection();
      context.close();
      log.info('Shutdown complete');
      process.exit(0);
    } catch (error) {
      log.error({ err: error instanceof Error ? error.message : String(error) }, 'Error during shutdown');
      process.exit(1);
    }
  };

  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('SIGINT', () => void shutdown('SIGINT'));

  log.info('Worker is running. Press Ctrl+C to stop.');
}

main().catch((error: unknown) => {
  logger.fatal({ err: error instanceof Error ? error.message : String(error) }, 'Failed to start worker');
  process.exit(1);
});
