import type { WorkManagerConfig } from '../lib/config/work-manager.js';
import type { Logger } from '../lib/logger.js';
import { MAINTENANCE_TASKS } from '../services/maintenance.service.js';
import { getMaintenanceQueue } from './queue.js';

/**
 * Set up recurring maintenance using BullMQ's repeatable jobs: lease reclaim
 * on its own tight schedule, the remaining sweeps less often.
 */
export async function setupScheduledJobs(config: WorkManagerConfig, logger: Logger): Promise<void> {
  logger.info('Setting up scheduled jobs...');

  const queue = getMaintenanceQueue();

  await queue.add(
    'scheduled-reclaim',
    {
      tasks: ['reclaim'],
      triggeredBy: 'scheduled',
      timestamp: new Date().toISOString(),
    },
    {
      repeat: {
        pattern: config.maintenance.reclaimPattern,
      },
      jobId: 'scheduled-reclaim',
    },
  );

  await queue.add(
    'scheduled-sweep',
    {
      tasks: MAINTENANCE_TASKS.filter((task) => task !== 'reclaim'),
      triggeredBy: 'scheduled',
      timestamp: new Date().toISOString(),
    },
    {
      repeat: {
        pattern: config.maintenance.sweepPattern,
      },
      jobId: 'scheduled-sweep',
    },
  );

  logger.info(
    { reclaim: config.maintenance.reclaimPattern, sweep: config.maintenance.sweepPattern },
    'Scheduled jobs configured',
  );
}

/**
 * Remove all scheduled jobs (for cleanup)
 */
export async function removeScheduledJobs(logger: Logger): Promise<void> {
  const queue = getMaintenanceQueue();
  const repeatableJobs = await queue.getRepeatableJobs();
  for (const job of repeatableJobs) {
    await queue.removeRepeatableByKey(job.key);
  }

  logger.info('Scheduled jobs removed');
}
