import type { Job } from 'bullmq';
import type { Logger } from '../../lib/logger.js';
import type { MaintenanceReport, MaintenanceService } from '../../services/maintenance.service.js';
import type { MaintenanceJobData } from '../queue.js';

/** The parts of a BullMQ job the processor reads. */
export type MaintenanceJob = Pick<Job<MaintenanceJobData>, 'id' | 'data'>;

export type MaintenanceProcessor = (job: MaintenanceJob) => Promise<MaintenanceReport>;

/**
 * Build the BullMQ processor for the maintenance queue around a service
 * instance, so the worker and tests share the same code path.
 */
export function createMaintenanceProcessor(maintenance: MaintenanceService, logger: Logger): MaintenanceProcessor {
  return async (job) => {
    const { tasks, triggeredBy } = job.data;

    logger.info({ jobId: job.id, tasks, triggeredBy }, '[work-maintenance] Processing');
    const report = await maintenance.run(tasks);
    logger.info(
      { jobId: job.id, reclaimed: report.reclaimed, deadLettered: report.deadLetteredItems + report.deadLetteredOrders },
      '[work-maintenance] Complete',
    );

    return report;
  };
}
