import { buildLifecycles } from './engine/graph/index.js';
import type { Lifecycles } from './engine/graph/index.js';
import { systemClock } from './lib/clock.js';
import type { Clock } from './lib/clock.js';
import { resolveConfig } from './lib/config/work-manager.js';
import type { WorkManagerConfig, WorkManagerConfigInput } from './lib/config/work-manager.js';
import { openDatabase } from './lib/db.js';
import type { Db } from './lib/db.js';
import { logger as rootLogger } from './lib/logger.js';
import type { Logger } from './lib/logger.js';
import { getRedisClient } from './lib/redis.js';
import { OrderTypeRegistry } from './order-types/index.js';
import type { OrderTypeDefinition } from './order-types/index.js';
import { IdempotencyGuard } from './services/idempotency.service.js';
import { LeaseManager } from './services/lease.service.js';
import { RedisLeaseBackend, ioredisLeaseClient } from './services/lease-backends/redis.backend.js';
import { SqliteLeaseBackend } from './services/lease-backends/sqlite.backend.js';
import type { LeaseBackend } from './services/lease-backends/types.js';
import { MaintenanceService } from './services/maintenance.service.js';
import { PartialAssembler } from './services/partial-assembler.service.js';
import { StateMachine } from './services/state-machine.service.js';
import { WorkCoordinator } from './services/work-coordinator.service.js';
import { WorkStore } from './services/work-store.js';

export interface WorkContextOptions {
  /** A resolved config, or overrides merged over the defaults. */
  config?: WorkManagerConfig | WorkManagerConfigInput;
  /** Defaults to a database opened at `config.database.path`. */
  db?: Db;
  orderTypes?: OrderTypeDefinition[];
  registry?: OrderTypeRegistry;
  leaseBackend?: LeaseBackend;
  clock?: Clock;
  logger?: Logger;
  random?: () => number;
}

export interface WorkContext {
  config: WorkManagerConfig;
  db: Db;
  registry: OrderTypeRegistry;
  lifecycles: Lifecycles;
  store: WorkStore;
  stateMachine: StateMachine;
  leases: LeaseManager;
  idempotency: IdempotencyGuard;
  assembler: PartialAssembler;
  coordinator: WorkCoordinator;
  maintenance: MaintenanceService;
  close(): void;
}

function createLeaseBackend(config: WorkManagerConfig, db: Db, clock: Clock): LeaseBackend {
  if (config.lease.backend === 'redis') {
    return new RedisLeaseBackend(ioredisLeaseClient(getRedisClient()), config.lease.redisPrefix);
  }
  return new SqliteLeaseBackend(db, clock);
}

/**
 * Wire the engine together. Everything is constructed once and shared; the
 * HTTP routes, the maintenance worker and tests all start from here.
 */
export function createWorkContext(options: WorkContextOptions = {}): WorkContext {
  const config = resolveConfig(options.config ?? {});
  const clock = options.clock ?? systemClock;
  const logger = options.logger ?? rootLogger;
  const db = options.db ?? openDatabase(config.database.path);

  const registry = options.registry ?? new OrderTypeRegistry();
  for (const definition of options.orderTypes ?? []) {
    registry.register(definition);
  }

  const lifecycles = buildLifecycles(config.transitions);
  const store = new WorkStore(db, logger.child({ component: 'work-store' }));
  const stateMachine = new StateMachine(store, lifecycles, clock, logger.child({ component: 'state-machine' }));

  const leases = new LeaseManager({
    store,
    stateMachine,
    backend: options.leaseBackend ?? createLeaseBackend(config, db, clock),
    config,
    clock,
    logger: logger.child({ component: 'leases' }),
  });

  const idempotency = new IdempotencyGuard(
    store,
    config.idempotency,
    clock,
    logger.child({ component: 'idempotency' }),
  );

  const assembler = new PartialAssembler({
    store,
    stateMachine,
    leases,
    registry,
    config: config.partials,
    clock,
    logger: logger.child({ component: 'partials' }),
  });

  const coordinator = new WorkCoordinator({
    store,
    stateMachine,
    leases,
    idempotency,
    assembler,
    registry,
    config,
    clock,
    logger: logger.child({ component: 'coordinator' }),
    random: options.random,
  });

  const maintenance = new MaintenanceService({
    store,
    leases,
    coordinator,
    idempotency,
    config,
    clock,
    logger: logger.child({ component: 'maintenance' }),
    random: options.random,
  });

  return {
    config,
    db,
    registry,
    lifecycles,
    store,
    stateMachine,
    leases,
    idempotency,
    assembler,
    coordinator,
    maintenance,
    close: () => {
      db.close();
    },
  };
}
