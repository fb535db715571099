import type { Clock } from '../lib/clock.js';
import { addMilliseconds } from '../lib/clock.js';
import { backoffDelaySeconds } from '../lib/backoff.js';
import type { WorkManagerConfig } from '../lib/config/work-manager.js';
import { ApplyFailureError, errorMessage } from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { IdempotencyGuard } from './idempotency.service.js';
import type { LeaseManager } from './lease.service.js';
import type { WorkCoordinator } from './work-coordinator.service.js';
import type { WorkStore } from './work-store.js';

export const MAINTENANCE_TASKS = ['reclaim', 'dead-letter', 'retry-apply', 'check-stale', 'prune-keys'] as const;

export type MaintenanceTask = (typeof MAINTENANCE_TASKS)[number];

export interface MaintenanceReport {
  reclaimed: number;
  deadLetteredItems: number;
  deadLetteredOrders: number;
  retriedApplies: number;
  failedRetries: number;
  staleOrderIds: string[];
  prunedKeys: number;
}

export interface MaintenanceServiceDeps {
  store: WorkStore;
  leases: LeaseManager;
  coordinator: WorkCoordinator;
  idempotency: IdempotencyGuard;
  config: WorkManagerConfig;
  clock: Clock;
  logger: Logger;
  random?: () => number;
}

const HOUR_MS = 60 * 60 * 1000;

function emptyReport(): MaintenanceReport {
  return {
    reclaimed: 0,
    deadLetteredItems: 0,
    deadLetteredOrders: 0,
    retriedApplies: 0,
    failedRetries: 0,
    staleOrderIds: [],
    prunedKeys: 0,
  };
}

/**
 * Periodic sweeps. Each task is safe to run from several workers at once;
 * a failure on one entity is logged and the sweep moves on.
 */
export class MaintenanceService {
  private readonly store: WorkStore;
  private readonly leases: LeaseManager;
  private readonly coordinator: WorkCoordinator;
  private readonly idempotency: IdempotencyGuard;
  private readonly config: WorkManagerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(deps: MaintenanceServiceDeps) {
    this.store = deps.store;
    this.leases = deps.leases;
    this.coordinator = deps.coordinator;
    this.idempotency = deps.idempotency;
    this.config = deps.config;
    this.clock = deps.clock;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
  }

  async run(tasks: readonly MaintenanceTask[] = MAINTENANCE_TASKS): Promise<MaintenanceReport> {
    const report = emptyReport();

    for (const task of tasks) {
      switch (task) {
        case 'reclaim':
          report.reclaimed = await this.leases.reclaim();
          break;
        case 'dead-letter':
          await this.deadLetterStale(report);
          break;
        case 'retry-apply':
          await this.retryFailedApplies(report);
          break;
        case 'check-stale':
          report.staleOrderIds = this.checkStale();
          break;
        case 'prune-keys':
          report.prunedKeys = this.pruneKeys();
          break;
      }
    }

    this.logger.info({ tasks, report }, 'Maintenance run complete');
    return report;
  }

  private async deadLetterStale(report: MaintenanceReport): Promise<void> {
    const cutoff = addMilliseconds(this.clock().toISOString(), -this.config.maintenance.deadLetterAfterHours * HOUR_MS);

    for (const item of this.store.itemsInStateSince('failed', cutoff)) {
      try {
        await this.coordinator.deadLetterItem(item.id, undefined, 'Failed item exceeded the dead-letter threshold');
        report.deadLetteredItems += 1;
      } catch (err) {
        this.logger.error({ itemId: item.id, err: errorMessage(err) }, 'Failed to dead-letter item');
      }
    }

    const orders = [
      ...this.store.ordersInStateSince('rejected', cutoff),
      ...this.store
        .ordersInStateSince('failed', cutoff)
        .filter((order) => order.applyAttempts === 0 || order.applyAttempts >= this.config.retry.maxApplyAttempts),
    ];
    for (const order of orders) {
      try {
        this.coordinator.deadLetter(order.id, undefined, `Order stayed ${order.state} past the dead-letter threshold`);
        report.deadLetteredOrders += 1;
      } catch (err) {
        this.logger.error({ orderId: order.id, err: errorMessage(err) }, 'Failed to dead-letter order');
      }
    }
  }

  /**
   * Retry apply for failed orders that still have apply attempts left and
   * whose backoff has elapsed.
   */
  private async retryFailedApplies(report: MaintenanceReport): Promise<void> {
    const now = this.clock().toISOString();
    const candidates = this.store
      .ordersInStateSince('failed', addMilliseconds(now, 1))
      .filter((order) => order.applyAttempts > 0 && order.applyAttempts < this.config.retry.maxApplyAttempts);

    for (const order of candidates) {
      const delay = backoffDelaySeconds(
        order.applyAttempts,
        this.config.retry.backoffSeconds,
        this.config.retry.jitterSeconds,
        this.random,
      );
      const due = addMilliseconds(order.lastTransitionedAt ?? order.createdAt, delay * 1000);
      if (due > now) {
        continue;
      }

      try {
        await this.coordinator.retryApply(order.id);
        report.retriedApplies += 1;
      } catch (err) {
        report.failedRetries += 1;
        if (!(err instanceof ApplyFailureError)) {
          this.logger.error({ orderId: order.id, err: errorMessage(err) }, 'Apply retry could not start');
        }
      }
    }
  }

  private checkStale(): string[] {
    if (!this.config.maintenance.enableAlerts) {
      return [];
    }
    const cutoff = addMilliseconds(
      this.clock().toISOString(),
      -this.config.maintenance.staleOrderThresholdHours * HOUR_MS,
    );
    const stale = this.store.staleOrders(cutoff).map((order) => order.id);
    if (stale.length > 0) {
      this.logger.warn({ orderIds: stale, count: stale.length }, 'Work orders are stale');
    }
    return stale;
  }

  private pruneKeys(): number {
    const cutoff = addMilliseconds(this.clock().toISOString(), -this.config.idempotency.retentionHours * HOUR_MS);
    return this.idempotency.prune(cutoff);
  }
}
