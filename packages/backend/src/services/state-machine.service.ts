import type { Lifecycles } from '../engine/graph/index.js';
import type { Clock } from '../lib/clock.js';
import type { Diff } from '../lib/diff.js';
import type { Logger } from '../lib/logger.js';
import type { WorkStore } from './work-store.js';
import {
  LEASED_ITEM_STATES,
  TERMINAL_ITEM_STATES,
  SYSTEM_ACTOR,
} from '../types/index.js';
import type {
  Actor,
  EventType,
  ItemState,
  JsonObject,
  OrderState,
  WorkItem,
  WorkOrder,
} from '../types/index.js';

// ============================================================================
// Types
// ============================================================================

export interface TransitionOptions {
  actor?: Actor;
  /** Event type to record; defaults to the target state. */
  event?: EventType;
  payload?: JsonObject;
  message?: string | null;
  diff?: Diff | null;
}

export type OrderPatch = Partial<Pick<WorkOrder, 'applyAttempts' | 'meta'>>;

export type ItemPatch = Partial<
  Omit<WorkItem, 'id' | 'orderId' | 'state' | 'createdAt' | 'updatedAt'>
>;

export interface SubmissionInput {
  result: JsonObject;
  assembledResult?: JsonObject | null;
  actor: Actor;
  event?: EventType;
  payload?: JsonObject;
  message?: string | null;
}

// ============================================================================
// StateMachine
// ============================================================================

/**
 * The only writer of order and item state.
 *
 * Every transition re-reads the entity inside a store transaction, checks the
 * edge against the configured graph, writes state, timestamps and exactly one
 * event, and commits them together.
 */
export class StateMachine {
  constructor(
    private readonly store: WorkStore,
    private readonly lifecycles: Lifecycles,
    private readonly clock: Clock,
    private readonly logger: Logger,
  ) {}

  canTransitionOrder(order: WorkOrder, to: OrderState): boolean {
    return this.lifecycles.order.canTransition(order.state, to).allowed;
  }

  canTransitionItem(item: WorkItem, to: ItemState): boolean {
    return this.lifecycles.item.canTransition(item.state, to).allowed;
  }

  transitionOrder(
    order: WorkOrder | string,
    to: OrderState,
    options: TransitionOptions & { patch?: OrderPatch } = {},
  ): WorkOrder {
    const id = typeof order === 'string' ? order : order.id;

    return this.store.transaction(() => {
      const current = this.store.getOrder(id);
      this.lifecycles.order.assertTransition(current.state, to);

      const now = this.clock().toISOString();
      const next: WorkOrder = {
        ...current,
        ...options.patch,
        state: to,
        lastTransitionedAt: now,
        updatedAt: now,
      };
      if (to === 'applied') {
        next.appliedAt = now;
      }
      if (to === 'completed') {
        next.completedAt = now;
      }

      this.store.saveOrder(next);
      this.store.appendEvent({
        orderId: next.id,
        eventType: options.event ?? to,
        actor: options.actor ?? SYSTEM_ACTOR,
        payload: { from: current.state, to, ...options.payload },
        diff: options.diff ?? null,
        message: options.message ?? null,
        createdAt: now,
      });

      this.logger.debug({ orderId: next.id, from: current.state, to }, 'Order transitioned');
      return next;
    });
  }

  transitionItem(
    item: WorkItem | string,
    to: ItemState,
    options: TransitionOptions & { patch?: ItemPatch } = {},
  ): WorkItem {
    const id = typeof item === 'string' ? item : item.id;

    const next = this.store.transaction(() => {
      const current = this.store.getItem(id);
      this.lifecycles.item.assertTransition(current.state, to);

      const now = this.clock().toISOString();
      const updated: WorkItem = {
        ...current,
        ...options.patch,
        state: to,
        updatedAt: now,
      };
      if (!LEASED_ITEM_STATES.includes(to)) {
        updated.leaseHolder = null;
        updated.leaseExpiresAt = null;
        updated.lastHeartbeatAt = null;
      }
      if (to === 'accepted') {
        updated.acceptedAt = now;
      }

      this.store.saveItem(updated);
      this.store.appendEvent({
        orderId: updated.orderId,
        itemId: updated.id,
        eventType: options.event ?? to,
        actor: options.actor ?? SYSTEM_ACTOR,
        payload: { from: current.state, to, ...options.payload },
        diff: options.diff ?? null,
        message: options.message ?? null,
        createdAt: now,
      });

      if (TERMINAL_ITEM_STATES.includes(to)) {
        this.checkOrderCompletion(updated.orderId);
      }
      return updated;
    });

    this.logger.debug({ itemId: next.id, state: next.state }, 'Item transitioned');
    return next;
  }

  /**
   * Record an event that is not a state change (heartbeats, part submissions).
   */
  recordItemEvent(item: WorkItem, event: EventType, options: Omit<TransitionOptions, 'event'> = {}): void {
    this.store.appendEvent({
      orderId: item.orderId,
      itemId: item.id,
      eventType: event,
      actor: options.actor ?? SYSTEM_ACTOR,
      payload: options.payload ?? null,
      diff: options.diff ?? null,
      message: options.message ?? null,
      createdAt: this.clock().toISOString(),
    });
  }

  /**
   * Complete the order once every item is completed or dead-lettered and the
   * graph allows it. Safe to call repeatedly.
   */
  checkOrderCompletion(orderId: string): WorkOrder {
    return this.store.transaction(() => {
      const order = this.store.getOrder(orderId);
      if (order.state === 'completed') {
        return order;
      }

      const items = this.store.itemsForOrder(orderId);
      const finished =
        items.length > 0 && items.every((candidate) => TERMINAL_ITEM_STATES.includes(candidate.state));
      if (!finished || !this.canTransitionOrder(order, 'completed')) {
        return order;
      }

      return this.transitionOrder(order, 'completed', {
        actor: SYSTEM_ACTOR,
        message: 'All items completed or dead-lettered',
      });
    });
  }

  // ==========================================================================
  // Workflow helpers
  // ==========================================================================

  /**
   * Move a leased item to in_progress, and its order from checked_out to
   * in_progress on the first such start. Items already in progress are
   * returned unchanged.
   */
  startItem(item: WorkItem | string, actor: Actor, patch: ItemPatch = {}): WorkItem {
    const id = typeof item === 'string' ? item : item.id;

    return this.store.transaction(() => {
      const current = this.store.getItem(id);
      if (current.state !== 'leased') {
        return current;
      }

      const started = this.transitionItem(current, 'in_progress', { actor, patch });
      const order = this.store.getOrder(started.orderId);
      if (order.state === 'checked_out') {
        this.transitionOrder(order, 'in_progress', { actor });
      }
      return started;
    });
  }

  /**
   * Store a result and move the item to submitted, starting it first when it
   * is still only leased. Shared by single-shot submission and finalize.
   */
  recordSubmission(item: WorkItem | string, input: SubmissionInput): WorkItem {
    const id = typeof item === 'string' ? item : item.id;

    return this.store.transaction(() => {
      const started = this.startItem(id, input.actor);
      return this.transitionItem(started, 'submitted', {
        actor: input.actor,
        event: input.event,
        payload: input.payload,
        message: input.message,
        patch: {
          result: input.result,
          assembledResult: input.assembledResult ?? started.assembledResult,
          error: null,
        },
      });
    });
  }

  /**
   * Move an order toward `target`, stepping through checked_out → in_progress
   * when the graph has no direct edge. Returns the order unchanged when it is
   * already there or no path of that shape exists.
   */
  advanceOrder(orderId: string, target: OrderState, actor: Actor = SYSTEM_ACTOR): WorkOrder {
    return this.store.transaction(() => {
      let order = this.store.getOrder(orderId);
      if (order.state === target) {
        return order;
      }
      if (!this.canTransitionOrder(order, target) && order.state === 'checked_out') {
        order = this.transitionOrder(order, 'in_progress', { actor });
      }
      if (this.canTransitionOrder(order, target)) {
        order = this.transitionOrder(order, target, { actor });
      }
      return order;
    });
  }
}
