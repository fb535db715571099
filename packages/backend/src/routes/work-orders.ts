import { FastifyInstance, FastifyRequest } from 'fastify';
import type { WorkContext } from '../context.js';
import {
  CheckoutNextSchema,
  CheckoutSchema,
  CloneSchema,
  DeadLetterSchema,
  FailSchema,
  FinalizeSchema,
  HeartbeatSchema,
  OrderListQuerySchema,
  PartListQuerySchema,
  ProposeSchema,
  RejectSchema,
  SubmitPartSchema,
  SubmitSchema,
} from '../schemas/work-order.schema.js';
import type { WorkItem } from '../types/index.js';

export interface WorkOrderRoutesOptions {
  context: WorkContext;
}

type IdParams = { Params: { id: string } };

// ============================================================================
// Work Order Routes
// ============================================================================

export async function workOrderRoutes(fastify: FastifyInstance, options: WorkOrderRoutesOptions) {
  const { coordinator, config } = options.context;
  const idempotencyHeader = config.idempotency.header.toLowerCase();

  function idempotencyKey(request: FastifyRequest): { idempotencyKey: string | null } {
    const value = request.headers[idempotencyHeader];
    const key = Array.isArray(value) ? value[0] : value;
    return { idempotencyKey: key?.trim() || null };
  }

  /** Lease responses tell the agent how often to heartbeat. */
  function withHeartbeat(item: WorkItem): WorkItem & { heartbeatEverySeconds: number } {
    return { ...item, heartbeatEverySeconds: config.lease.heartbeatEverySeconds };
  }

  // =========================================================================
  // Orders
  // =========================================================================

  // POST /api/work/propose - Propose a work order
  fastify.post('/api/work/propose', async (request, reply) => {
    const body = ProposeSchema.parse(request.body);
    const proposal = await coordinator.propose(body, request.actor, idempotencyKey(request));
    return reply.status(201).send(proposal);
  });

  // GET /api/work/orders - List work orders
  fastify.get('/api/work/orders', async (request, reply) => {
    const query = OrderListQuerySchema.parse(request.query);
    return reply.status(200).send(coordinator.listOrders(query));
  });

  // GET /api/work/orders/:id - Get a work order with its items
  fastify.get<IdParams>('/api/work/orders/:id', async (request, reply) => {
    return reply.status(200).send(coordinator.getOrder(request.params.id));
  });

  // GET /api/work/orders/:id/logs - Event log of a work order
  fastify.get<IdParams>('/api/work/orders/:id/logs', async (request, reply) => {
    return reply.status(200).send(coordinator.listOrderEvents(request.params.id));
  });

  // POST /api/work/orders/:id/approve - Approve and apply
  fastify.post<IdParams>('/api/work/orders/:id/approve', async (request, reply) => {
    const approval = await coordinator.approve(request.params.id, request.actor, idempotencyKey(request));
    return reply.status(200).send(approval);
  });

  // POST /api/work/orders/:id/reject - Reject, optionally sending back for rework
  fastify.post<IdParams>('/api/work/orders/:id/reject', async (request, reply) => {
    const body = RejectSchema.parse(request.body ?? {});
    const order = await coordinator.reject(request.params.id, body, request.actor, idempotencyKey(request));
    return reply.status(200).send(order);
  });

  // POST /api/work/orders/:id/retry-apply - Re-run a failed apply
  fastify.post<IdParams>('/api/work/orders/:id/retry-apply', async (request, reply) => {
    const approval = await coordinator.retryApply(request.params.id, request.actor);
    return reply.status(200).send(approval);
  });

  // POST /api/work/orders/:id/dead-letter - Retire a rejected or failed order
  fastify.post<IdParams>('/api/work/orders/:id/dead-letter', async (request, reply) => {
    const body = DeadLetterSchema.parse(request.body ?? {});
    const order = coordinator.deadLetter(request.params.id, request.actor, body.message);
    return reply.status(200).send(order);
  });

  // POST /api/work/orders/:id/clone - Start a dead-lettered order over
  fastify.post<IdParams>('/api/work/orders/:id/clone', async (request, reply) => {
    const body = CloneSchema.parse(request.body ?? {});
    const proposal = await coordinator.cloneDeadLettered(request.params.id, body, request.actor);
    return reply.status(201).send(proposal);
  });

  // =========================================================================
  // Leases
  // =========================================================================

  // POST /api/work/orders/:id/checkout - Lease the next item of an order
  fastify.post<IdParams>('/api/work/orders/:id/checkout', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const body = CheckoutSchema.parse(request.body ?? {});
    const item = await coordinator.checkout(request.params.id, holderId, body.ttlSeconds);
    return reply.status(200).send(withHeartbeat(item));
  });

  // POST /api/work/checkout - Lease the next available item of any order
  fastify.post('/api/work/checkout', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const { ttlSeconds, ...filters } = CheckoutNextSchema.parse(request.body ?? {});
    const item = await coordinator.checkoutNext(holderId, filters, ttlSeconds);
    return reply.status(200).send(withHeartbeat(item));
  });

  // POST /api/work/items/:id/heartbeat - Extend a lease
  fastify.post<IdParams>('/api/work/items/:id/heartbeat', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const body = HeartbeatSchema.parse(request.body ?? {});
    const item = await coordinator.heartbeat(request.params.id, holderId, body.ttlSeconds);
    return reply.status(200).send(withHeartbeat(item));
  });

  // POST /api/work/items/:id/release - Give a lease back
  fastify.post<IdParams>('/api/work/items/:id/release', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const item = await coordinator.release(request.params.id, holderId);
    return reply.status(200).send(item);
  });

  // =========================================================================
  // Items
  // =========================================================================

  // POST /api/work/items/:id/submit - Submit an item's result
  fastify.post<IdParams>('/api/work/items/:id/submit', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const body = SubmitSchema.parse(request.body);
    const item = await coordinator.submit(request.params.id, body, holderId, idempotencyKey(request));
    return reply.status(200).send(item);
  });

  // POST /api/work/items/:id/parts - Submit one part of an item's result
  fastify.post<IdParams>('/api/work/items/:id/parts', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const body = SubmitPartSchema.parse(request.body);
    const part = await coordinator.submitPart(request.params.id, body, holderId, idempotencyKey(request));
    return reply.status(201).send(part);
  });

  // GET /api/work/items/:id/parts - List an item's parts
  fastify.get<IdParams>('/api/work/items/:id/parts', async (request, reply) => {
    const filters = PartListQuerySchema.parse(request.query);
    return reply.status(200).send(coordinator.listParts(request.params.id, filters));
  });

  // POST /api/work/items/:id/finalize - Assemble parts into the item's result
  fastify.post<IdParams>('/api/work/items/:id/finalize', async (request, reply) => {
    const holderId = fastify.requireAgent(request);
    const body = FinalizeSchema.parse(request.body ?? {});
    const item = await coordinator.finalize(request.params.id, body.mode, holderId, idempotencyKey(request));
    return reply.status(200).send(item);
  });

  // POST /api/work/items/:id/fail - Record a failed attempt
  fastify.post<IdParams>('/api/work/items/:id/fail', async (request, reply) => {
    const body = FailSchema.parse(request.body);
    const holderId = request.actor.type === 'agent' && request.actor.id ? request.actor.id : undefined;
    const item = await coordinator.fail(request.params.id, body, holderId);
    return reply.status(200).send(item);
  });

  // POST /api/work/items/:id/retry - Requeue a failed item with fresh attempts
  fastify.post<IdParams>('/api/work/items/:id/retry', async (request, reply) => {
    return reply.status(200).send(coordinator.retryItem(request.params.id, request.actor));
  });

  // GET /api/work/items/:id/logs - Event log of an item
  fastify.get<IdParams>('/api/work/items/:id/logs', async (request, reply) => {
    return reply.status(200).send(coordinator.listItemEvents(request.params.id));
  });
}
