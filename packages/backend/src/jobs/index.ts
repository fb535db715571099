// Queue exports
export {
  QUEUE_NAMES,
  redisConnection,
  getMaintenanceQueue,
  closeQueues,
  enqueueMaintenance,
  maintenanceJobId,
} from './queue.js';

export type { MaintenanceJobData } from './queue.js';

// Worker exports
export { startWorkers, stopWorkers, getWorkerStatus } from './worker.js';

// Scheduler exports
export { setupScheduledJobs, removeScheduledJobs } from './scheduler.js';

// Processor exports (for testing)
export { createMaintenanceProcessor } from './processors/maintenance.processor.js';
export type { MaintenanceProcessor } from './processors/maintenance.processor.js';
