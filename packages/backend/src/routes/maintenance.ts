import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import type { WorkContext } from '../context.js';
import { enqueueMaintenance, getMaintenanceQueue, QUEUE_NAMES } from '../jobs/index.js';
import { MAINTENANCE_TASKS } from '../services/maintenance.service.js';

const RunMaintenanceSchema = z.object({
  tasks: z.array(z.enum(MAINTENANCE_TASKS)).min(1).default([...MAINTENANCE_TASKS]),
  /** `inline` runs in this process; `queue` hands the run to the worker. */
  mode: z.enum(['inline', 'queue']).default('inline'),
});

export interface MaintenanceRoutesOptions {
  context: WorkContext;
}

export async function maintenanceRoutes(fastify: FastifyInstance, options: MaintenanceRoutesOptions) {
  /**
   * GET /api/work/maintenance/status
   * Job counts of the maintenance queue
   */
  fastify.get('/api/work/maintenance/status', async (request, reply) => {
    const counts = await getMaintenanceQueue().getJobCounts();
    return reply.send({
      queues: { [QUEUE_NAMES.MAINTENANCE]: counts },
      timestamp: new Date().toISOString(),
    });
  });

  /**
   * POST /api/work/maintenance/run
   * Run maintenance tasks now, or enqueue them for the worker
   */
  fastify.post('/api/work/maintenance/run', async (request, reply) => {
    const body = RunMaintenanceSchema.parse(request.body ?? {});

    if (body.mode === 'queue') {
      const jobId = await enqueueMaintenance(body.tasks, 'manual');
      return reply.status(202).send({ jobId, tasks: body.tasks });
    }

    const report = await options.context.maintenance.run(body.tasks);
    return reply.status(200).send({ tasks: body.tasks, report });
  });
}
