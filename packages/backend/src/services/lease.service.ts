import type { Clock } from '../lib/clock.js';
import { addMilliseconds } from '../lib/clock.js';
import type { Logger } from '../lib/logger.js';
import type { WorkManagerConfig } from '../lib/config/work-manager.js';
import {
  ConcurrencyLimitExceededError,
  LeaseExpiredError,
  LeaseNotHeldError,
  NoItemsAvailableError,
  errorMessage,
} from '../lib/errors.js';
import { LEASED_ITEM_STATES, SYSTEM_ACTOR, agentActor } from '../types/index.js';
import type { WorkItem } from '../types/index.js';
import type { LeaseBackend } from './lease-backends/types.js';
import { itemLeaseKey } from './lease-backends/types.js';
import type { StateMachine } from './state-machine.service.js';
import type { WorkStore } from './work-store.js';

// ============================================================================
// Types
// ============================================================================

export interface CheckoutFilters {
  type?: string;
  minPriority?: number;
}

export interface LeaseManagerDeps {
  store: WorkStore;
  stateMachine: StateMachine;
  backend: LeaseBackend;
  config: WorkManagerConfig;
  clock: Clock;
  logger: Logger;
}

/** How many queued candidates a single acquire looks at before giving up. */
const CANDIDATE_BATCH = 25;

// ============================================================================
// LeaseManager
// ============================================================================

/**
 * TTL leases over items.
 *
 * The backend decides who wins a lease; the item row mirrors the winner
 * (holder, expiry, heartbeat) and is only written inside a store
 * transaction that re-checks the item is still queued.
 */
export class LeaseManager {
  private readonly store: WorkStore;
  private readonly stateMachine: StateMachine;
  private readonly backend: LeaseBackend;
  private readonly config: WorkManagerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(deps: LeaseManagerDeps) {
    this.store = deps.store;
    this.stateMachine = deps.stateMachine;
    this.backend = deps.backend;
    this.config = deps.config;
    this.clock = deps.clock;
    this.logger = deps.logger;
  }

  get backendName(): string {
    return this.backend.name;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  private ttlMs(ttlSeconds?: number): number {
    return (ttlSeconds ?? this.config.lease.ttlSeconds) * 1000;
  }

  // ==========================================================================
  // Quotas
  // ==========================================================================

  private typeLimit(type: string): number | null {
    return this.config.lease.typeLimits[type] ?? this.config.lease.maxLeasesPerType;
  }

  private assertHolderQuota(holderId: string): void {
    const limit = this.config.lease.maxLeasesPerHolder;
    if (limit !== null && this.store.countActiveLeases({ holder: holderId }, this.now()) >= limit) {
      throw new ConcurrencyLimitExceededError('holder', holderId, limit);
    }
  }

  private typeAtQuota(type: string): number | null {
    const limit = this.typeLimit(type);
    if (limit !== null && this.store.countActiveLeases({ type }, this.now()) >= limit) {
      return limit;
    }
    return null;
  }

  private assertTypeQuota(type: string): void {
    const limit = this.typeAtQuota(type);
    if (limit !== null) {
      throw new ConcurrencyLimitExceededError('type', type, limit);
    }
  }

  // ==========================================================================
  // Acquire
  // ==========================================================================

  /**
   * Lease the oldest ready item of one order.
   * Quotas are checked first; exceeding one fails with no side effects.
   */
  async acquire(orderId: string, holderId: string, ttlSeconds?: number): Promise<WorkItem> {
    const order = this.store.getOrder(orderId);
    this.assertHolderQuota(holderId);
    this.assertTypeQuota(order.type);

    const candidates = this.store.leaseCandidates({ orderId, now: this.now(), limit: CANDIDATE_BATCH });
    for (const candidate of candidates) {
      const leased = await this.tryLease(candidate, holderId, ttlSeconds);
      if (leased) {
        return leased;
      }
    }
    throw new NoItemsAvailableError(orderId);
  }

  /**
   * Lease the next ready item across all orders: highest order priority
   * first, oldest first within a priority. Candidates whose type is at its
   * quota are skipped.
   */
  async acquireNext(holderId: string, filters: CheckoutFilters = {}, ttlSeconds?: number): Promise<WorkItem> {
    this.assertHolderQuota(holderId);
    if (filters.type) {
      this.assertTypeQuota(filters.type);
    }

    const candidates = this.store.leaseCandidates({
      type: filters.type,
      minPriority: filters.minPriority,
      now: this.now(),
      limit: CANDIDATE_BATCH,
    });

    let blockedBy: ConcurrencyLimitExceededError | null = null;
    for (const candidate of candidates) {
      const limit = this.typeAtQuota(candidate.type);
      if (limit !== null) {
        blockedBy = new ConcurrencyLimitExceededError('type', candidate.type, limit);
        continue;
      }
      const leased = await this.tryLease(candidate, holderId, ttlSeconds);
      if (leased) {
        return leased;
      }
    }

    if (blockedBy) {
      throw blockedBy;
    }
    throw new NoItemsAvailableError();
  }

  private async tryLease(candidate: WorkItem, holderId: string, ttlSeconds?: number): Promise<WorkItem | null> {
    const key = itemLeaseKey(candidate.id);
    const ttlMs = this.ttlMs(ttlSeconds);
    if (!(await this.backend.tryAcquire(key, holderId, ttlMs))) {
      return null;
    }

    let leased: WorkItem | null;
    try {
      leased = this.store.transaction(() => {
        const current = this.store.getItem(candidate.id);
        if (current.state !== 'queued') {
          return null;
        }
        this.assertHolderQuota(holderId);
        this.assertTypeQuota(current.type);

        const now = this.now();
        const item = this.stateMachine.transitionItem(current, 'leased', {
          actor: agentActor(holderId),
          patch: {
            leaseHolder: holderId,
            leaseExpiresAt: addMilliseconds(now, ttlMs),
            lastHeartbeatAt: now,
          },
          payload: { leaseExpiresAt: addMilliseconds(now, ttlMs) },
        });

        const order = this.store.getOrder(item.orderId);
        if (order.state === 'queued') {
          this.stateMachine.transitionOrder(order, 'checked_out', { actor: agentActor(holderId) });
        }
        return item;
      });
    } catch (err) {
      await this.backend.release(key, holderId);
      throw err;
    }

    if (!leased) {
      await this.backend.release(key, holderId);
      return null;
    }

    this.logger.info({ itemId: leased.id, holderId, expiresAt: leased.leaseExpiresAt }, 'Item leased');
    return leased;
  }

  // ==========================================================================
  // Extend / release
  // ==========================================================================

  /**
   * Verify `holderId` holds an unexpired lease on the item.
   * Throws LeaseNotHeldError or LeaseExpiredError.
   */
  assertHeld(item: WorkItem, holderId: string): void {
    if (!LEASED_ITEM_STATES.includes(item.state) || item.leaseHolder !== holderId) {
      throw new LeaseNotHeldError(item.id, holderId);
    }
    if (item.leaseExpiresAt === null || item.leaseExpiresAt <= this.now()) {
      throw new LeaseExpiredError(item.id);
    }
  }

  /**
   * Heartbeat. The first one after acquisition also starts the item
   * (leased → in_progress) and, on its first start, the order.
   */
  async extend(itemId: string, holderId: string, ttlSeconds?: number): Promise<WorkItem> {
    this.assertHeld(this.store.getItem(itemId), holderId);

    const ttlMs = this.ttlMs(ttlSeconds);
    if (!(await this.backend.tryExtend(itemLeaseKey(itemId), holderId, ttlMs))) {
      throw new LeaseExpiredError(itemId);
    }

    return this.store.transaction(() => {
      const current = this.store.getItem(itemId);
      this.assertHeld(current, holderId);

      const now = this.now();
      const leaseExpiresAt = addMilliseconds(now, ttlMs);
      const actor = agentActor(holderId);

      if (current.state === 'leased') {
        return this.stateMachine.startItem(current, actor, { leaseExpiresAt, lastHeartbeatAt: now });
      }

      const extended: WorkItem = { ...current, leaseExpiresAt, lastHeartbeatAt: now, updatedAt: now };
      this.store.saveItem(extended);
      this.stateMachine.recordItemEvent(extended, 'heartbeat', { actor, payload: { leaseExpiresAt } });
      return extended;
    });
  }

  /**
   * Give the item back to the queue before its lease runs out. Releasing an
   * item that is no longer leased is a no-op.
   */
  async release(itemId: string, holderId: string): Promise<WorkItem> {
    const item = this.store.getItem(itemId);
    if (!LEASED_ITEM_STATES.includes(item.state)) {
      return item;
    }
    if (item.leaseHolder !== holderId) {
      throw new LeaseNotHeldError(itemId, holderId);
    }

    const released = this.store.transaction(() => {
      const current = this.store.getItem(itemId);
      if (!LEASED_ITEM_STATES.includes(current.state)) {
        return current;
      }
      const requeued = this.stateMachine.transitionItem(current, 'queued', {
        actor: agentActor(holderId),
        event: 'released',
      });
      this.requeueOrderIfIdle(requeued.orderId);
      return requeued;
    });

    await this.releaseKey(itemId, holderId);
    return released;
  }

  /** Drop the backend lease after the item has left the leased states. */
  async releaseKey(itemId: string, holderId: string): Promise<void> {
    try {
      await this.backend.release(itemLeaseKey(itemId), holderId);
    } catch (err) {
      // The key expires on its own; a failed delete only delays the next lease.
      this.logger.warn({ itemId, holderId, err: errorMessage(err) }, 'Failed to release backend lease');
    }
  }

  /**
   * Return a checked-out order to the queue when none of its items is
   * leased or in progress any more.
   */
  requeueOrderIfIdle(orderId: string): void {
    this.store.transaction(() => {
      const order = this.store.getOrder(orderId);
      if (order.state !== 'checked_out' && order.state !== 'in_progress') {
        return;
      }
      const active = this.store
        .itemsForOrder(orderId)
        .some((candidate) => LEASED_ITEM_STATES.includes(candidate.state));
      if (!active) {
        this.stateMachine.transitionOrder(order, 'queued', { actor: SYSTEM_ACTOR, event: 'requeued' });
      }
    });
  }

  // ==========================================================================
  // Reclaim
  // ==========================================================================

  /**
   * Recover every item whose lease expired: requeue it while attempts remain,
   * otherwise fail it. Each item is its own transaction; items another runner
   * already reclaimed are skipped. Returns how many items this call reclaimed.
   */
  async reclaim(): Promise<number> {
    const now = this.now();
    let reclaimed = 0;

    for (const expired of this.store.expiredLeases(now)) {
      const holderId = expired.leaseHolder;
      const outcome = this.store.transaction(() => {
        const current = this.store.getItem(expired.id);
        if (
          !LEASED_ITEM_STATES.includes(current.state) ||
          current.leaseExpiresAt === null ||
          current.leaseExpiresAt > now
        ) {
          return null;
        }

        const attempts = current.attempts + 1;
        const payload = { holderId: current.leaseHolder, attempts, maxAttempts: current.maxAttempts };
        const item =
          attempts < current.maxAttempts
            ? this.stateMachine.transitionItem(current, 'queued', {
                event: 'lease_expired',
                payload,
                patch: { attempts },
              })
            : this.stateMachine.transitionItem(current, 'failed', {
                event: 'lease_expired',
                payload,
                message: 'Lease expired with no attempts remaining',
                patch: {
                  attempts,
                  error: {
                    code: 'max_attempts_exceeded',
                    message: `Lease expired after ${attempts} of ${current.maxAttempts} attempts`,
                  },
                },
              });
        this.requeueOrderIfIdle(item.orderId);
        return item;
      });

      if (outcome) {
        reclaimed += 1;
        this.logger.info({ itemId: outcome.id, state: outcome.state, attempts: outcome.attempts }, 'Lease reclaimed');
        if (holderId) {
          await this.releaseKey(outcome.id, holderId);
        }
      }
    }

    return reclaimed;
  }
}
