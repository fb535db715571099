import { Queue } from 'bullmq';
import type { ConnectionOptions } from 'bullmq';
import type { MaintenanceTask } from '../services/maintenance.service.js';

// Redis connection options for BullMQ
export const redisConnection: ConnectionOptions = {
  host: process.env.REDIS_HOST || 'localhost',
  port: parseInt(process.env.REDIS_PORT || '6379', 10),
  password: process.env.REDIS_PASSWORD || undefined,
  db: parseInt(process.env.REDIS_DB || '0', 10),
};

// Queue names
export const QUEUE_NAMES = {
  MAINTENANCE: 'work-maintenance',
} as const;

// Job data types
export interface MaintenanceJobData {
  tasks: MaintenanceTask[];
  triggeredBy: 'scheduled' | 'manual';
  timestamp: string;
}

// Queue instances (lazy initialization)
let maintenanceQueue: Queue<MaintenanceJobData> | null = null;

/**
 * Get or create the maintenance queue
 */
export function getMaintenanceQueue(): Queue<MaintenanceJobData> {
  if (!maintenanceQueue) {
    maintenanceQueue = new Queue<MaintenanceJobData>(QUEUE_NAMES.MAINTENANCE, {
      connection: redisConnection,
      defaultJobOptions: {
        // The next scheduled run retries anything a failed run missed
        attempts: 1,
        removeOnComplete: {
          age: 12 * 3600,
          count: 500,
        },
        removeOnFail: {
          age: 7 * 24 * 3600,
        },
      },
    });
  }
  return maintenanceQueue;
}

/**
 * Close all queue connections
 */
export async function closeQueues(): Promise<void> {
  if (maintenanceQueue) {
    await maintenanceQueue.close();
    maintenanceQueue = null;
  }
}

/**
 * Job id of a one-off run. Every request gets its own job; only a retry of
 * the same request at the same instant collapses.
 */
export function maintenanceJobId(tasks: MaintenanceTask[], requestedAt: Date): string {
  return `maintenance-${tasks.join('-')}-${requestedAt.getTime()}`;
}

/**
 * Helper to add a one-off maintenance job
 */
export async function enqueueMaintenance(
  tasks: MaintenanceTask[],
  triggeredBy: MaintenanceJobData['triggeredBy'] = 'manual',
): Promise<string | null> {
  const queue = getMaintenanceQueue();
  const requestedAt = new Date();

  const job = await queue.add(
    'maintenance',
    {
      tasks,
      triggeredBy,
      timestamp: requestedAt.toISOString(),
    },
    {
      jobId: maintenanceJobId(tasks, requestedAt),
    },
  );

  return job.id ?? null;
}
