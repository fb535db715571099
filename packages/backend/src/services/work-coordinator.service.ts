import type { Clock } from '../lib/clock.js';
import { addMilliseconds } from '../lib/clock.js';
import { backoffDelaySeconds } from '../lib/backoff.js';
import type { WorkManagerConfig, IdempotentOperation } from '../lib/config/work-manager.js';
import { generateId } from '../lib/crypto.js';
import type { Diff } from '../lib/diff.js';
import {
  ApplyFailureError,
  IdempotencyKeyRequiredError,
  IllegalTransitionError,
  ValidationFailedError,
  WorkflowError,
  errorMessage,
  fieldErrorsFromZod,
} from '../lib/errors.js';
import type { Logger } from '../lib/logger.js';
import type { ItemSpec, OrderType, OrderTypeRegistry } from '../order-types/index.js';
import {
  ApprovalSchema,
  OrderWithItemsSchema,
  ProposalSchema,
  WorkItemPartSchema,
  WorkItemSchema,
} from '../schemas/work-entities.schema.js';
import { LEASED_ITEM_STATES, SYSTEM_ACTOR, TERMINAL_ITEM_STATES, agentActor } from '../types/index.js';
import type {
  Actor,
  FieldError,
  ItemError,
  JsonObject,
  OrderState,
  OrderWithItems,
  PaginatedResponse,
  WorkEvent,
  WorkEventListener,
  WorkItem,
  WorkItemPart,
  WorkOrder,
} from '../types/index.js';
import type { IdempotencyGuard, ResponseSchema } from './idempotency.service.js';
import type { CheckoutFilters, LeaseManager } from './lease.service.js';
import type { FinalizeMode, PartInput, PartListFilters, PartialAssembler } from './partial-assembler.service.js';
import type { StateMachine } from './state-machine.service.js';
import type { WorkStore } from './work-store.js';

// ============================================================================
// Types
// ============================================================================

export interface ProposeInput {
  type: string;
  payload: JsonObject;
  meta?: JsonObject | null;
  priority?: number;
}

export interface SubmitInput {
  result: JsonObject;
  evidence?: JsonObject | null;
  notes?: string | null;
}

export interface RejectInput {
  errors: FieldError[];
  allowRework: boolean;
  message?: string | null;
}

export interface FailInput {
  code?: string;
  message: string;
  details?: unknown;
}

export interface Proposal {
  order: WorkOrder;
  items: WorkItem[];
}

export interface Approval {
  order: OrderWithItems;
  diff: Diff;
}

export interface IdempotencyOptions {
  idempotencyKey?: string | null;
}

export interface OrderListQuery {
  state?: OrderState;
  type?: string;
  page?: number;
  limit?: number;
}

export interface WorkCoordinatorDeps {
  store: WorkStore;
  stateMachine: StateMachine;
  leases: LeaseManager;
  idempotency: IdempotencyGuard;
  assembler: PartialAssembler;
  registry: OrderTypeRegistry;
  config: WorkManagerConfig;
  clock: Clock;
  logger: Logger;
  /** Source of backoff jitter; defaults to Math.random. */
  random?: () => number;
}

// ============================================================================
// WorkCoordinator
// ============================================================================

/**
 * The workflow surface: propose, checkout, heartbeat, submit, finalize,
 * approve, apply, reject and fail.
 *
 * Order type hooks run outside store transactions; every write that follows
 * a hook re-reads the entity and goes through the StateMachine.
 */
export class WorkCoordinator {
  private readonly store: WorkStore;
  private readonly stateMachine: StateMachine;
  private readonly leases: LeaseManager;
  private readonly idempotency: IdempotencyGuard;
  private readonly assembler: PartialAssembler;
  private readonly registry: OrderTypeRegistry;
  private readonly config: WorkManagerConfig;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly random: () => number;

  constructor(deps: WorkCoordinatorDeps) {
    this.store = deps.store;
    this.stateMachine = deps.stateMachine;
    this.leases = deps.leases;
    this.idempotency = deps.idempotency;
    this.assembler = deps.assembler;
    this.registry = deps.registry;
    this.config = deps.config;
    this.clock = deps.clock;
    this.logger = deps.logger;
    this.random = deps.random ?? Math.random;
  }

  private now(): string {
    return this.clock().toISOString();
  }

  onEvent(listener: WorkEventListener): () => void {
    return this.store.onEvent(listener);
  }

  /**
   * Run a mutating operation under the idempotency guard when the caller
   * supplied a key. Operations listed in `idempotency.enforceOn` require one.
   */
  private async withIdempotency<T>(
    operation: IdempotentOperation,
    scope: string,
    options: IdempotencyOptions,
    payload: unknown,
    schema: ResponseSchema<T>,
    fn: () => Promise<T>,
  ): Promise<T> {
    const key = options.idempotencyKey;
    if (key) {
      return this.idempotency.guard(scope, key, payload, schema, fn);
    }
    if (this.config.idempotency.enforceOn.includes(operation)) {
      throw new IdempotencyKeyRequiredError(this.config.idempotency.header);
    }
    return fn();
  }

  private orderType(order: WorkOrder): OrderType {
    return this.registry.get(order.type);
  }

  private withItems(orderId: string): OrderWithItems {
    return { ...this.store.getOrder(orderId), items: this.store.itemsForOrder(orderId) };
  }

  // ==========================================================================
  // Propose
  // ==========================================================================

  async propose(input: ProposeInput, actor: Actor, options: IdempotencyOptions = {}): Promise<Proposal> {
    const orderType = this.registry.get(input.type);

    return this.withIdempotency('propose', `propose:${input.type}`, options, input, ProposalSchema, () =>
      this.createOrder(orderType, input, actor),
    );
  }

  private async createOrder(orderType: OrderType, input: ProposeInput, actor: Actor): Promise<Proposal> {
    const parsed = orderType.schema().safeParse(input.payload);
    if (!parsed.success) {
      throw new ValidationFailedError(
        `Invalid payload for order type '${input.type}'`,
        fieldErrorsFromZod(parsed.error),
      );
    }

    const now = this.now();
    const order: WorkOrder = {
      id: generateId(),
      type: orderType.type,
      state: 'queued',
      priority: input.priority ?? 0,
      payload: parsed.data,
      meta: input.meta ?? null,
      requestedBy: actor,
      applyAttempts: 0,
      lastTransitionedAt: now,
      appliedAt: null,
      completedAt: null,
      createdAt: now,
      updatedAt: now,
    };

    const specs = await orderType.plan(order);
    if (specs.length === 0) {
      throw new ValidationFailedError(`Order type '${input.type}' planned no items`, [
        { path: 'payload', message: 'The plan produced no work items' },
      ]);
    }
    const items = specs.map((spec) => this.buildItem(order, spec, now));

    this.store.transaction(() => {
      this.store.insertOrder(order);
      this.store.appendEvent({
        orderId: order.id,
        eventType: 'proposed',
        actor,
        payload: { type: order.type, priority: order.priority },
        createdAt: now,
      });
      this.insertPlannedItems(order, items, actor, now);
    });

    this.logger.info({ orderId: order.id, type: order.type, items: items.length }, 'Work order proposed');
    return { order, items };
  }

  /**
   * Start a dead-lettered order over as a fresh order with the same type,
   * payload and meta. The payload is validated and planned again.
   */
  async cloneDeadLettered(orderId: string, options: { priority?: number }, actor: Actor): Promise<Proposal> {
    const original = this.store.getOrder(orderId);
    if (original.state !== 'dead_lettered') {
      throw new WorkflowError('Only dead-lettered orders can be cloned', original.state, 'dead_lettered');
    }

    const proposal = await this.createOrder(
      this.orderType(original),
      {
        type: original.type,
        payload: original.payload,
        meta: { ...original.meta, clonedFrom: original.id },
        priority: options.priority ?? original.priority,
      },
      actor,
    );
    this.store.appendEvent({
      orderId: original.id,
      eventType: 'cloned',
      actor,
      payload: { cloneId: proposal.order.id },
      createdAt: this.now(),
    });

    this.logger.info({ orderId, cloneId: proposal.order.id }, 'Dead-lettered order cloned');
    return proposal;
  }

  private buildItem(order: WorkOrder, spec: ItemSpec, now: string): WorkItem {
    return {
      id: generateId(),
      orderId: order.id,
      type: spec.type ?? order.type,
      state: 'queued',
      attempts: 0,
      maxAttempts: spec.maxAttempts ?? this.config.retry.defaultMaxAttempts,
      leaseHolder: null,
      leaseExpiresAt: null,
      lastHeartbeatAt: null,
      availableAt: null,
      input: spec.input,
      result: null,
      assembledResult: null,
      partsRequired: spec.partsRequired ?? [],
      partsState: {},
      revision: 1,
      error: null,
      acceptedAt: null,
      createdAt: now,
      updatedAt: now,
    };
  }

  private insertPlannedItems(order: WorkOrder, items: WorkItem[], actor: Actor, now: string): void {
    for (const item of items) {
      this.store.insertItem(item);
    }
    this.store.appendEvent({
      orderId: order.id,
      eventType: 'planned',
      actor,
      payload: { itemIds: items.map((item) => item.id) },
      createdAt: now,
    });
  }

  // ==========================================================================
  // Leases
  // ==========================================================================

  checkout(orderId: string, holderId: string, ttlSeconds?: number): Promise<WorkItem> {
    return this.leases.acquire(orderId, holderId, ttlSeconds);
  }

  checkoutNext(holderId: string, filters: CheckoutFilters = {}, ttlSeconds?: number): Promise<WorkItem> {
    return this.leases.acquireNext(holderId, filters, ttlSeconds);
  }

  heartbeat(itemId: string, holderId: string, ttlSeconds?: number): Promise<WorkItem> {
    return this.leases.extend(itemId, holderId, ttlSeconds);
  }

  release(itemId: string, holderId: string): Promise<WorkItem> {
    return this.leases.release(itemId, holderId);
  }

  // ==========================================================================
  // Submit
  // ==========================================================================

  async submit(
    itemId: string,
    input: SubmitInput,
    holderId: string,
    options: IdempotencyOptions = {},
  ): Promise<WorkItem> {
    return this.withIdempotency('submit', `submit:item:${itemId}`, options, input, WorkItemSchema, async () => {
      const item = this.store.getItem(itemId);
      this.leases.assertHeld(item, holderId);
      const orderType = this.orderType(this.store.getOrder(item.orderId));

      const rules = orderType.submissionRules(item);
      if (rules) {
        const parsed = rules.safeParse(input.result);
        if (!parsed.success) {
          throw new ValidationFailedError('Submission failed validation', fieldErrorsFromZod(parsed.error));
        }
      }
      await orderType.afterValidateSubmission(item, input.result);

      const submitted = this.store.transaction(() => {
        const current = this.store.getItem(itemId);
        this.leases.assertHeld(current, holderId);
        return this.stateMachine.recordSubmission(current, {
          result: input.result,
          actor: agentActor(holderId),
          payload: input.evidence ? { evidence: input.evidence } : undefined,
          message: input.notes ?? null,
        });
      });

      await this.leases.releaseKey(itemId, holderId);
      this.logger.info({ itemId, orderId: submitted.orderId }, 'Item submitted');

      await this.settleOrder(submitted.orderId);
      return this.store.getItem(itemId);
    });
  }

  submitPart(
    itemId: string,
    input: PartInput,
    holderId: string,
    options: IdempotencyOptions = {},
  ): Promise<WorkItemPart> {
    return this.withIdempotency(
      'submit-part',
      `submit-part:item:${itemId}`,
      options,
      input,
      WorkItemPartSchema,
      () => this.assembler.submitPart(itemId, input, holderId),
    );
  }

  finalize(
    itemId: string,
    mode: FinalizeMode,
    holderId: string,
    options: IdempotencyOptions = {},
  ): Promise<WorkItem> {
    return this.withIdempotency('finalize', `finalize:item:${itemId}`, options, { mode }, WorkItemSchema, async () => {
      const submitted = await this.assembler.finalize(itemId, mode, holderId);
      await this.settleOrder(submitted.orderId);
      return this.store.getItem(itemId);
    });
  }

  listParts(itemId: string, filters: PartListFilters = {}): WorkItemPart[] {
    return this.assembler.listParts(itemId, filters);
  }

  /**
   * Move the order forward once its items allow it: to submitted when every
   * live item is submitted (auto-approving when the order type asks for it),
   * or to dead_lettered when no live item is left.
   */
  async settleOrder(orderId: string): Promise<WorkOrder> {
    const items = this.store.itemsForOrder(orderId);
    const live = items.filter((item) => item.state !== 'dead_lettered');

    if (live.length === 0) {
      return this.store.transaction(() => {
        let order = this.store.getOrder(orderId);
        if (order.state !== 'failed' && this.stateMachine.canTransitionOrder(order, 'failed')) {
          order = this.stateMachine.transitionOrder(order, 'failed', { message: 'Every item was dead-lettered' });
        }
        if (this.stateMachine.canTransitionOrder(order, 'dead_lettered')) {
          order = this.stateMachine.transitionOrder(order, 'dead_lettered');
        }
        return order;
      });
    }

    if (!live.every((item) => item.state === 'submitted')) {
      return this.store.getOrder(orderId);
    }

    const order = this.stateMachine.advanceOrder(orderId, 'submitted');
    if (order.state !== 'submitted' || !this.orderType(order).shouldAutoApprove()) {
      return order;
    }

    try {
      const { order: approved } = await this.approveOrder(orderId, SYSTEM_ACTOR);
      return approved;
    } catch (err) {
      this.logger.warn({ orderId, err: errorMessage(err) }, 'Auto-approval failed; order left for review');
      return this.store.getOrder(orderId);
    }
  }

  // ==========================================================================
  // Approve / apply
  // ==========================================================================

  approve(orderId: string, actor: Actor, options: IdempotencyOptions = {}): Promise<Approval> {
    return this.withIdempotency('approve', `approve:order:${orderId}`, options, { orderId }, ApprovalSchema, () =>
      this.approveOrder(orderId, actor),
    );
  }

  private async approveOrder(orderId: string, actor: Actor): Promise<Approval> {
    const order = this.withItems(orderId);
    if (order.state !== 'submitted') {
      throw new IllegalTransitionError('order', order.state, 'approved');
    }

    const pending = order.items.filter((item) => item.state !== 'dead_lettered' && item.state !== 'submitted');
    if (pending.length > 0) {
      throw new ValidationFailedError(
        'Every item must be submitted before approval',
        pending.map((item) => ({ path: `items.${item.id}`, message: `Item is ${item.state}` })),
      );
    }

    if (!(await this.orderType(order).canApprove(order))) {
      throw new ValidationFailedError('Order did not pass approval checks', [
        { path: 'order', message: `Order type '${order.type}' declined approval` },
      ]);
    }

    this.stateMachine.transitionOrder(orderId, 'approved', { actor });
    this.logger.info({ orderId, actor }, 'Work order approved');
    return this.applyOrder(orderId, actor);
  }

  /**
   * Run the order type's apply for an approved order, then accept and
   * complete its items. A failing apply moves the order to failed.
   */
  private async applyOrder(orderId: string, actor: Actor): Promise<Approval> {
    const approved = this.withItems(orderId);
    const orderType = this.orderType(approved);

    let diff: Diff;
    try {
      await orderType.beforeApply(approved);
      diff = await orderType.apply(approved);
    } catch (err) {
      const failed = this.store.transaction(() => {
        const current = this.store.getOrder(orderId);
        return this.stateMachine.transitionOrder(current, 'failed', {
          actor: SYSTEM_ACTOR,
          event: 'apply_failed',
          message: errorMessage(err),
          patch: { applyAttempts: current.applyAttempts + 1 },
        });
      });
      this.logger.error(
        { orderId, applyAttempts: failed.applyAttempts, err: errorMessage(err) },
        'Work order apply failed',
      );
      throw new ApplyFailureError(orderId, errorMessage(err), { cause: err });
    }

    this.store.transaction(() => {
      this.stateMachine.transitionOrder(orderId, 'applied', { actor, diff, message: diff.summary });
      for (const item of this.store.itemsForOrder(orderId)) {
        if (item.state === 'submitted') {
          this.stateMachine.transitionItem(item, 'accepted', { actor });
        }
      }
    });

    try {
      await orderType.afterApply(this.withItems(orderId), diff);
    } catch (err) {
      this.logger.error({ orderId, err: errorMessage(err) }, 'afterApply hook failed');
    }

    this.store.transaction(() => {
      for (const item of this.store.itemsForOrder(orderId)) {
        if (item.state === 'accepted') {
          this.stateMachine.transitionItem(item, 'completed', { actor: SYSTEM_ACTOR });
        }
      }
      this.stateMachine.checkOrderCompletion(orderId);
    });

    this.logger.info({ orderId, summary: diff.summary }, 'Work order applied');
    return { order: this.withItems(orderId), diff };
  }

  /**
   * Re-run apply for an order whose previous apply failed. The order's items
   * must still be submitted; apply is idempotent so a repeat is safe.
   */
  async retryApply(orderId: string, actor: Actor = SYSTEM_ACTOR): Promise<Approval> {
    const order = this.withItems(orderId);
    if (order.state !== 'failed') {
      throw new IllegalTransitionError('order', order.state, 'queued');
    }
    const pending = order.items.filter((item) => item.state !== 'dead_lettered' && item.state !== 'submitted');
    if (pending.length > 0) {
      throw new ValidationFailedError(
        'Apply can only be retried while every item is submitted',
        pending.map((item) => ({ path: `items.${item.id}`, message: `Item is ${item.state}` })),
      );
    }

    this.store.transaction(() => {
      this.stateMachine.transitionOrder(orderId, 'queued', {
        actor,
        event: 'requeued',
        message: `Retrying apply (attempt ${order.applyAttempts + 1})`,
      });
      this.stateMachine.transitionOrder(orderId, 'submitted', { actor });
    });
    return this.approveOrder(orderId, actor);
  }

  // ==========================================================================
  // Reject / fail / dead-letter
  // ==========================================================================

  reject(
    orderId: string,
    input: RejectInput,
    actor: Actor,
    options: IdempotencyOptions = {},
  ): Promise<OrderWithItems> {
    return this.withIdempotency(
      'reject',
      `reject:order:${orderId}`,
      options,
      input,
      OrderWithItemsSchema,
      async () => {
        const order = this.store.getOrder(orderId);
        const replan =
          input.allowRework && this.config.rework.policy === 'replan' ? await this.orderType(order).plan(order) : null;
        const message = input.message ?? 'Rejected by reviewer';
        const error: ItemError = { code: 'rejected', message, details: input.errors };

        this.store.transaction(() => {
          this.stateMachine.transitionOrder(orderId, 'rejected', {
            actor,
            message,
            payload: { errors: input.errors, allowRework: input.allowRework },
          });
          for (const item of this.store.itemsForOrder(orderId)) {
            if (item.state === 'submitted') {
              this.stateMachine.transitionItem(item, 'rejected', { actor, message, patch: { error } });
            }
          }

          if (!input.allowRework) {
            return;
          }

          this.stateMachine.transitionOrder(orderId, 'queued', { actor, event: 'requeued', message: 'Sent back for rework' });
          const rejected = this.store.itemsForOrder(orderId).filter((item) => item.state === 'rejected');

          if (replan) {
            for (const item of rejected) {
              this.stateMachine.transitionItem(item, 'failed', { actor });
              this.stateMachine.transitionItem(item.id, 'dead_lettered', { actor, message: 'Replaced by a new plan' });
            }
            const now = this.now();
            const current = this.store.getOrder(orderId);
            this.insertPlannedItems(
              current,
              replan.map((spec) => this.buildItem(current, spec, now)),
              actor,
              now,
            );
            return;
          }

          for (const item of rejected) {
            this.stateMachine.transitionItem(item, 'queued', {
              actor,
              event: 'requeued',
              message: 'Sent back for rework',
              patch: {
                result: null,
                assembledResult: null,
                partsState: {},
                availableAt: null,
                revision: item.revision + 1,
              },
            });
          }
        });

        this.logger.info({ orderId, allowRework: input.allowRework }, 'Work order rejected');
        return this.withItems(orderId);
      },
    );
  }

  /**
   * Record a failed attempt on a leased item. The item is requeued behind a
   * backoff while attempts remain, otherwise it moves to failed.
   */
  async fail(itemId: string, input: FailInput, holderId?: string): Promise<WorkItem> {
    const item = this.store.getItem(itemId);
    if (holderId !== undefined) {
      this.leases.assertHeld(item, holderId);
    }
    const actor = holderId !== undefined ? agentActor(holderId) : SYSTEM_ACTOR;
    const error: ItemError = { code: input.code ?? 'agent_failure', message: input.message, details: input.details };

    const failed = this.store.transaction(() => {
      const current = this.store.getItem(itemId);
      if (!LEASED_ITEM_STATES.includes(current.state)) {
        throw new IllegalTransitionError('item', current.state, 'failed');
      }
      const attempts = current.attempts + 1;
      let next: WorkItem;

      if (attempts < current.maxAttempts) {
        const delay = backoffDelaySeconds(
          attempts,
          this.config.retry.backoffSeconds,
          this.config.retry.jitterSeconds,
          this.random,
        );
        const availableAt = addMilliseconds(this.now(), delay * 1000);
        next = this.stateMachine.transitionItem(current, 'queued', {
          actor,
          event: 'requeued',
          message: input.message,
          payload: { attempts, availableAt },
          patch: { attempts, error, availableAt },
        });
      } else {
        next = this.stateMachine.transitionItem(current, 'failed', {
          actor,
          message: input.message,
          payload: { attempts },
          patch: { attempts, error },
        });
      }

      this.leases.requeueOrderIfIdle(next.orderId);
      return next;
    });

    if (item.leaseHolder) {
      await this.leases.releaseKey(itemId, item.leaseHolder);
    }
    this.logger.info({ itemId, state: failed.state, attempts: failed.attempts }, 'Item attempt failed');
    return failed;
  }

  /**
   * Retire a rejected or failed order: every unfinished item is
   * dead-lettered, then the order itself.
   */
  deadLetter(orderId: string, actor: Actor = SYSTEM_ACTOR, message = 'Dead-lettered'): WorkOrder {
    const order = this.store.getOrder(orderId);
    if (!this.stateMachine.canTransitionOrder(order, 'dead_lettered')) {
      throw new IllegalTransitionError('order', order.state, 'dead_lettered');
    }

    const dead = this.store.transaction(() => {
      for (const item of this.store.itemsForOrder(orderId)) {
        this.deadLetterItemInTransaction(item, actor, message);
      }
      return this.stateMachine.transitionOrder(orderId, 'dead_lettered', { actor, message });
    });

    this.logger.warn({ orderId }, 'Work order dead-lettered');
    return dead;
  }

  /** Dead-letter a single failed item and settle its order. */
  async deadLetterItem(itemId: string, actor: Actor = SYSTEM_ACTOR, message = 'Dead-lettered'): Promise<WorkItem> {
    const item = this.store.transaction(() =>
      this.deadLetterItemInTransaction(this.store.getItem(itemId), actor, message),
    );
    await this.settleOrder(item.orderId);
    return this.store.getItem(itemId);
  }

  private deadLetterItemInTransaction(item: WorkItem, actor: Actor, message: string): WorkItem {
    if (TERMINAL_ITEM_STATES.includes(item.state)) {
      return item;
    }
    let current = item;
    if (current.state !== 'failed') {
      // Accepted items are already past the point of failure.
      if (!this.stateMachine.canTransitionItem(current, 'failed')) {
        return current;
      }
      current = this.stateMachine.transitionItem(current, 'failed', { actor, message });
    }
    return this.stateMachine.transitionItem(current, 'dead_lettered', { actor, message });
  }

  /** Put a failed item back in the queue with its attempts reset. */
  retryItem(itemId: string, actor: Actor = SYSTEM_ACTOR): WorkItem {
    return this.store.transaction(() => {
      const item = this.stateMachine.transitionItem(itemId, 'queued', {
        actor,
        event: 'requeued',
        message: 'Retried',
        patch: { attempts: 0, error: null, availableAt: null },
      });
      const order = this.store.getOrder(item.orderId);
      if ((order.state === 'failed' || order.state === 'rejected') && this.stateMachine.canTransitionOrder(order, 'queued')) {
        this.stateMachine.transitionOrder(order, 'queued', { actor, event: 'requeued' });
      }
      return item;
    });
  }

  // ==========================================================================
  // Reads
  // ==========================================================================

  getOrder(orderId: string): OrderWithItems {
    return this.withItems(orderId);
  }

  listOrders(query: OrderListQuery = {}): PaginatedResponse<WorkOrder> {
    const page = query.page ?? 1;
    const limit = query.limit ?? 20;
    const { data, total } = this.store.listOrders({ state: query.state, type: query.type, page, limit });
    return {
      data,
      pagination: { page, limit, total, totalPages: Math.ceil(total / limit) },
    };
  }

  getItem(itemId: string): WorkItem {
    return this.store.getItem(itemId);
  }

  listItemEvents(itemId: string): WorkEvent[] {
    this.store.getItem(itemId);
    return this.store.eventsForItem(itemId);
  }

  listOrderEvents(orderId: string): WorkEvent[] {
    this.store.getOrder(orderId);
    return this.store.eventsForOrder(orderId);
  }
}
