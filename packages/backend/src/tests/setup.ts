import { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { buildApp } from '../app.js';
import { createWorkContext } from '../context.js';
import type { WorkContext } from '../context.js';
import type { Clock } from '../lib/clock.js';
import type { WorkManagerConfigInput } from '../lib/config/work-manager.js';
import { createDiff } from '../lib/diff.js';
import { silentLogger } from '../lib/logger.js';
import { MemoryRecordSink } from '../order-types/index.js';
import type { OrderTypeDefinition } from '../order-types/index.js';
import type { RedisLeaseClient } from '../services/lease-backends/redis.backend.js';
import type { LeaseBackend } from '../services/lease-backends/types.js';
import { agentActor } from '../types/index.js';
import type { Actor } from '../types/index.js';

export const TEST_START = '2026-01-05T09:00:00.000Z';

export const AGENT_A = 'agent-a';
export const AGENT_B = 'agent-b';
export const REVIEWER: Actor = { type: 'user', id: 'reviewer-1' };
export const PROPOSER: Actor = agentActor('planner');

// ============================================================================
// Clock
// ============================================================================

export interface TestClock {
  clock: Clock;
  now(): string;
  advance(ms: number): void;
  advanceSeconds(seconds: number): void;
}

export function createTestClock(start: string = TEST_START): TestClock {
  let current = Date.parse(start);
  return {
    clock: () => new Date(current),
    now: () => new Date(current).toISOString(),
    advance(ms: number) {
      current += ms;
    },
    advanceSeconds(seconds: number) {
      current += seconds * 1000;
    },
  };
}

// ============================================================================
// Redis
// ============================================================================

/**
 * In-process stand-in for the SET NX PX / compare-and-delete scripts,
 * expiring keys against the test clock.
 */
export class MemoryRedisLeaseClient implements RedisLeaseClient {
  readonly keys = new Map<string, { value: string; expiresAt: number }>();

  constructor(private readonly time: TestClock) {}

  private live(key: string): { value: string; expiresAt: number } | null {
    const entry = this.keys.get(key);
    if (!entry) {
      return null;
    }
    if (entry.expiresAt <= this.time.clock().getTime()) {
      this.keys.delete(key);
      return null;
    }
    return entry;
  }

  async setIfAbsent(key: string, value: string, ttlMs: number): Promise<boolean> {
    if (this.live(key)) {
      return false;
    }
    this.keys.set(key, { value, expiresAt: this.time.clock().getTime() + ttlMs });
    return true;
  }

  async extendIfValue(key: string, value: string, ttlMs: number): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== value) {
      return false;
    }
    entry.expiresAt = this.time.clock().getTime() + ttlMs;
    return true;
  }

  async deleteIfValue(key: string, value: string): Promise<boolean> {
    const entry = this.live(key);
    if (!entry || entry.value !== value) {
      return false;
    }
    return this.keys.delete(key);
  }
}

// ============================================================================
// Order types
// ============================================================================

export const TASKS_TYPE = 'test.tasks';

const TasksPayloadSchema = z.object({
  tasks: z.array(z.string().min(1)).min(1),
});

/**
 * One item per task. Submissions must carry `{ done: true }`; apply copies
 * each item's result into the sink under `tasks/{task}`.
 */
export function tasksOrderType(
  sink: MemoryRecordSink,
  overrides: Partial<OrderTypeDefinition> = {},
): OrderTypeDefinition {
  return {
    type: TASKS_TYPE,
    schema: () => TasksPayloadSchema,
    plan: (order) => {
      const { tasks } = TasksPayloadSchema.parse(order.payload);
      return tasks.map((task) => ({ input: { task } }));
    },
    submissionRules: () => z.object({ done: z.literal(true) }),
    apply: (order) => {
      const tasks: string[] = [];
      for (const item of order.items) {
        const task = String(item.input.task);
        if (item.state === 'submitted' && item.result) {
          sink.upsert('tasks', task, item.result);
          tasks.push(task);
        }
      }
      tasks.sort();
      return createDiff({ tasks: [] }, { tasks }, `Applied ${tasks.length} tasks`);
    },
    ...overrides,
  };
}

// ============================================================================
// Context
// ============================================================================

/**
 * Test defaults: in-memory database, no jitter, short idempotency waits and
 * no operation that insists on an idempotency key.
 */
export function testConfig(overrides: WorkManagerConfigInput = {}): WorkManagerConfigInput {
  return {
    ...overrides,
    database: { path: ':memory:' },
    retry: { jitterSeconds: 0, ...overrides.retry },
    idempotency: { enforceOn: [], pollIntervalMs: 5, waitTimeoutMs: 40, ...overrides.idempotency },
  };
}

export interface TestContextOptions {
  config?: WorkManagerConfigInput;
  orderTypes?: (sink: MemoryRecordSink) => OrderTypeDefinition[];
  leaseBackend?: LeaseBackend;
}

export interface TestWorkContext extends WorkContext {
  time: TestClock;
  sink: MemoryRecordSink;
}

export function createTestContext(options: TestContextOptions = {}): TestWorkContext {
  const time = createTestClock();
  const sink = new MemoryRecordSink();
  const context = createWorkContext({
    config: testConfig(options.config),
    orderTypes: options.orderTypes ? options.orderTypes(sink) : [tasksOrderType(sink)],
    leaseBackend: options.leaseBackend,
    clock: time.clock,
    logger: silentLogger(),
    random: () => 0,
  });
  return { ...context, time, sink };
}

export async function buildTestApp(context: WorkContext): Promise<FastifyInstance> {
  const app = await buildApp({ context, logger: false });
  await app.ready();
  return app;
}
