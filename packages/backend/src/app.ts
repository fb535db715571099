import Fastify, { FastifyInstance, FastifyServerOptions } from 'fastify';
import cors from '@fastify/cors';
import type { WorkContext } from './context.js';
import { getWorkerStatus } from './jobs/index.js';
import { registerErrorHandler } from './lib/error-handler.js';
import { isRedisAvailable } from './lib/redis.js';
import actorPlugin from './plugins/actor.plugin.js';
import { maintenanceRoutes } from './routes/maintenance.js';
import { workOrderRoutes } from './routes/work-orders.js';

export interface BuildAppOptions {
  context: WorkContext;
  logger?: FastifyServerOptions['logger'];
  /** Reachability check reported by /health when leases live in Redis. */
  checkRedis?: () => Promise<boolean>;
}

/**
 * Build the HTTP adapter over a work context. Listening is left to the
 * caller so tests can drive the instance with `inject`.
 */
export async function buildApp(options: BuildAppOptions): Promise<FastifyInstance> {
  const fastify = Fastify({
    logger: options.logger ?? true,
  });

  await fastify.register(cors, {
    origin: process.env.CORS_ORIGIN || true,
  });

  // Calling actor from X-Agent-Id / X-User-Id
  await fastify.register(actorPlugin);

  registerErrorHandler(fastify);

  const checkRedis = options.checkRedis ?? isRedisAvailable;

  fastify.get('/health', async () => {
    const leaseBackend = options.context.config.lease.backend;
    const health = {
      status: 'ok',
      orderTypes: options.context.registry.names(),
      leaseBackend,
      workers: getWorkerStatus(),
    };
    if (leaseBackend !== 'redis') {
      return health;
    }

    const redis = await checkRedis();
    return { ...health, status: redis ? 'ok' : 'degraded', redis: redis ? 'connected' : 'unavailable' };
  });

  await fastify.register(workOrderRoutes, { context: options.context });
  await fastify.register(maintenanceRoutes, { context: options.context });

  return fastify;
}
