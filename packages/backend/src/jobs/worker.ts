import { Worker } from 'bullmq';
import type { Job } from 'bullmq';
import type { Logger } from '../lib/logger.js';
import type { MaintenanceReport, MaintenanceService } from '../services/maintenance.service.js';
import { redisConnection, QUEUE_NAMES } from './queue.js';
import type { MaintenanceJobData } from './queue.js';
import { createMaintenanceProcessor } from './processors/maintenance.processor.js';

let maintenanceWorker: Worker<MaintenanceJobData, MaintenanceReport> | null = null;

/**
 * Start the maintenance job worker
 */
export async function startWorkers(maintenance: MaintenanceService, logger: Logger): Promise<void> {
  logger.info('Starting background job workers...');

  maintenanceWorker = new Worker<MaintenanceJobData, MaintenanceReport>(
    QUEUE_NAMES.MAINTENANCE,
    createMaintenanceProcessor(maintenance, logger),
    {
      connection: redisConnection,
      // Sweeps touch the same rows; one at a time per worker process
      concurrency: 1,
    },
  );

  maintenanceWorker.on('completed', (job: Job<MaintenanceJobData>, result: MaintenanceReport) => {
    logger.info({ jobId: job.id, reclaimed: result.reclaimed }, '[work-maintenance] Job completed');
  });

  maintenanceWorker.on('failed', (job: Job<MaintenanceJobData> | undefined, err: Error) => {
    logger.error({ jobId: job?.id, err: err.message }, '[work-maintenance] Job failed');
  });

  maintenanceWorker.on('error', (err: Error) => {
    logger.error({ err: err.message }, '[work-maintenance] Worker error');
  });

  logger.info('All workers started successfully');
}

/**
 * Stop all workers gracefully
 */
export async function stopWorkers(logger: Logger): Promise<void> {
  logger.info('Stopping background job workers...');

  if (maintenanceWorker) {
    await maintenanceWorker.close();
    maintenanceWorker = null;
  }

  logger.info('All workers stopped');
}

/**
 * Get worker status for health checks
 */
export function getWorkerStatus(): { maintenance: boolean } {
  return {
    maintenance: maintenanceWorker !== null && !maintenanceWorker.closing,
  };
}
