import { z } from 'zod';
import type { Db } from '../lib/db.js';
import type { Logger } from '../lib/logger.js';
import { NotFoundError, errorMessage } from '../lib/errors.js';
import { generateId } from '../lib/crypto.js';
import { DiffSchema } from '../lib/diff.js';
import type { Diff } from '../lib/diff.js';
import {
  ActorTypeSchema,
  EventTypeSchema,
  FieldErrorsSchema,
  ItemErrorSchema,
  ItemStateSchema,
  JsonObjectSchema,
  OrderStateSchema,
  PartStatusSchema,
  PartsStateSchema,
  StringListSchema,
} from '../schemas/work-entities.schema.js';
import {
  LEASED_ITEM_STATES,
  CHECKOUT_ORDER_STATES,
  TERMINAL_ORDER_STATES,
} from '../types/index.js';
import type {
  Actor,
  EventType,
  ItemState,
  JsonObject,
  OrderState,
  PartStatus,
  WorkEvent,
  WorkEventListener,
  WorkItem,
  WorkItemPart,
  WorkOrder,
} from '../types/index.js';

// ============================================================================
// Row decoding
// ============================================================================

function decode<T>(schema: z.ZodType<T>, text: string): T {
  return schema.parse(JSON.parse(text));
}

function decodeNullable<T>(schema: z.ZodType<T>, text: string | null): T | null {
  return text === null ? null : decode(schema, text);
}

function encodeNullable(value: unknown): string | null {
  return value === null || value === undefined ? null : JSON.stringify(value);
}

interface OrderRow {
  id: string;
  type: string;
  state: string;
  priority: number;
  payload: string;
  meta: string | null;
  requested_by_type: string;
  requested_by_id: string | null;
  apply_attempts: number;
  last_transitioned_at: string | null;
  applied_at: string | null;
  completed_at: string | null;
  created_at: string;
  updated_at: string;
}

interface ItemRow {
  id: string;
  order_id: string;
  type: string;
  state: string;
  attempts: number;
  max_attempts: number;
  lease_holder: string | null;
  lease_expires_at: string | null;
  last_heartbeat_at: string | null;
  available_at: string | null;
  input: string;
  result: string | null;
  assembled_result: string | null;
  parts_required: string;
  parts_state: string;
  revision: number;
  error: string | null;
  accepted_at: string | null;
  created_at: string;
  updated_at: string;
}

interface PartRow {
  id: string;
  item_id: string;
  part_key: string;
  seq: number;
  revision: number;
  status: string;
  payload: string;
  evidence: string | null;
  notes: string | null;
  errors: string | null;
  checksum: string;
  submitted_by: string | null;
  created_at: string;
}

interface EventRow {
  id: string;
  order_id: string;
  item_id: string | null;
  event_type: string;
  actor_type: string;
  actor_id: string | null;
  payload: string | null;
  diff: string | null;
  message: string | null;
  created_at: string;
}

interface IdempotencyRow {
  scope: string;
  key_hash: string;
  fingerprint: string;
  status: string;
  response: string | null;
  created_at: string;
  completed_at: string | null;
}

function toOrder(row: OrderRow): WorkOrder {
  return {
    id: row.id,
    type: row.type,
    state: OrderStateSchema.parse(row.state),
    priority: row.priority,
    payload: decode(JsonObjectSchema, row.payload),
    meta: decodeNullable(JsonObjectSchema, row.meta),
    requestedBy: { type: ActorTypeSchema.parse(row.requested_by_type), id: row.requested_by_id },
    applyAttempts: row.apply_attempts,
    lastTransitionedAt: row.last_transitioned_at,
    appliedAt: row.applied_at,
    completedAt: row.completed_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toItem(row: ItemRow): WorkItem {
  return {
    id: row.id,
    orderId: row.order_id,
    type: row.type,
    state: ItemStateSchema.parse(row.state),
    attempts: row.attempts,
    maxAttempts: row.max_attempts,
    leaseHolder: row.lease_holder,
    leaseExpiresAt: row.lease_expires_at,
    lastHeartbeatAt: row.last_heartbeat_at,
    availableAt: row.available_at,
    input: decode(JsonObjectSchema, row.input),
    result: decodeNullable(JsonObjectSchema, row.result),
    assembledResult: decodeNullable(JsonObjectSchema, row.assembled_result),
    partsRequired: decode(StringListSchema, row.parts_required),
    partsState: decode(PartsStateSchema, row.parts_state),
    revision: row.revision,
    error: decodeNullable(ItemErrorSchema, row.error),
    acceptedAt: row.accepted_at,
    createdAt: row.created_at,
    updatedAt: row.updated_at,
  };
}

function toPart(row: PartRow): WorkItemPart {
  return {
    id: row.id,
    itemId: row.item_id,
    partKey: row.part_key,
    seq: row.seq,
    revision: row.revision,
    status: PartStatusSchema.parse(row.status),
    payload: decode(JsonObjectSchema, row.payload),
    evidence: decodeNullable(JsonObjectSchema, row.evidence),
    notes: row.notes,
    errors: decodeNullable(FieldErrorsSchema, row.errors),
    checksum: row.checksum,
    submittedBy: row.submitted_by,
    createdAt: row.created_at,
  };
}

function toEvent(row: EventRow): WorkEvent {
  return {
    id: row.id,
    orderId: row.order_id,
    itemId: row.item_id,
    eventType: EventTypeSchema.parse(row.event_type),
    actorType: ActorTypeSchema.parse(row.actor_type),
    actorId: row.actor_id,
    payload: decodeNullable(JsonObjectSchema, row.payload),
    diff: decodeNullable(DiffSchema, row.diff),
    message: row.message,
    createdAt: row.created_at,
  };
}

function placeholders(values: readonly unknown[]): string {
  return values.map(() => '?').join(', ');
}

// ============================================================================
// Types
// ============================================================================

export interface NewEvent {
  orderId: string;
  itemId?: string | null;
  eventType: EventType;
  actor: Actor;
  payload?: JsonObject | null;
  diff?: Diff | null;
  message?: string | null;
  createdAt: string;
}

export interface IdempotencyRecord {
  scope: string;
  keyHash: string;
  fingerprint: string;
  status: 'pending' | 'completed';
  response: string | null;
  createdAt: string;
  completedAt: string | null;
}

export interface OrderListFilters {
  state?: OrderState;
  type?: string;
  page: number;
  limit: number;
}

export interface CandidateFilters {
  orderId?: string;
  type?: string;
  minPriority?: number;
  now: string;
  limit: number;
}

export interface PartFilters {
  partKey?: string;
  status?: PartStatus;
  revision?: number;
}

// ============================================================================
// WorkStore
// ============================================================================

/**
 * Persistence for orders, items, parts, events and idempotency records.
 *
 * All methods are synchronous (better-sqlite3). transaction() nests through
 * savepoints; events appended inside a transaction reach listeners only
 * after the outermost transaction commits, and are discarded on rollback.
 */
export class WorkStore {
  private readonly listeners = new Set<WorkEventListener>();
  private pending: WorkEvent[] = [];

  constructor(
    readonly db: Db,
    private readonly logger: Logger,
  ) {}

  transaction<T>(fn: () => T): T {
    const outermost = !this.db.inTransaction;
    const mark = this.pending.length;
    let result: T;
    try {
      result = this.db.transaction(fn)();
    } catch (err) {
      this.pending.length = mark;
      throw err;
    }
    if (outermost) {
      this.flush();
    }
    return result;
  }

  onEvent(listener: WorkEventListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  private flush(): void {
    const events = this.pending;
    this.pending = [];
    for (const event of events) {
      for (const listener of this.listeners) {
        try {
          listener(event);
        } catch (err) {
          this.logger.error(
            { eventId: event.id, eventType: event.eventType, err: errorMessage(err) },
            'Work event listener failed',
          );
        }
      }
    }
  }

  // ==========================================================================
  // Orders
  // ==========================================================================

  insertOrder(order: WorkOrder): void {
    this.db
      .prepare(
        `INSERT INTO work_orders (id, type, state, priority, payload, meta, requested_by_type,
          requested_by_id, apply_attempts, last_transitioned_at, applied_at, completed_at, created_at, updated_at)
         VALUES (@id, @type, @state, @priority, @payload, @meta, @requestedByType,
          @requestedById, @applyAttempts, @lastTransitionedAt, @appliedAt, @completedAt, @createdAt, @updatedAt)`,
      )
      .run(this.orderParams(order));
  }

  saveOrder(order: WorkOrder): void {
    this.db
      .prepare(
        `UPDATE work_orders SET type = @type, state = @state, priority = @priority, payload = @payload,
          meta = @meta, requested_by_type = @requestedByType, requested_by_id = @requestedById,
          apply_attempts = @applyAttempts, last_transitioned_at = @lastTransitionedAt,
          applied_at = @appliedAt, completed_at = @completedAt, updated_at = @updatedAt
         WHERE id = @id`,
      )
      .run(this.orderParams(order));
  }

  private orderParams(order: WorkOrder) {
    return {
      id: order.id,
      type: order.type,
      state: order.state,
      priority: order.priority,
      payload: JSON.stringify(order.payload),
      meta: encodeNullable(order.meta),
      requestedByType: order.requestedBy.type,
      requestedById: order.requestedBy.id,
      applyAttempts: order.applyAttempts,
      lastTransitionedAt: order.lastTransitionedAt,
      appliedAt: order.appliedAt,
      completedAt: order.completedAt,
      createdAt: order.createdAt,
      updatedAt: order.updatedAt,
    };
  }

  findOrder(id: string): WorkOrder | null {
    const row = this.db.prepare<[string], OrderRow>(`SELECT * FROM work_orders WHERE id = ?`).get(id);
    return row ? toOrder(row) : null;
  }

  getOrder(id: string): WorkOrder {
    const order = this.findOrder(id);
    if (!order) {
      throw new NotFoundError('Work order', id);
    }
    return order;
  }

  listOrders(filters: OrderListFilters): { data: WorkOrder[]; total: number } {
    const clauses: string[] = [];
    const params: Array<string | number> = [];
    if (filters.state) {
      clauses.push('state = ?');
      params.push(filters.state);
    }
    if (filters.type) {
      clauses.push('type = ?');
      params.push(filters.type);
    }
    const where = clauses.length > 0 ? `WHERE ${clauses.join(' AND ')}` : '';

    const rows = this.db
      .prepare<Array<string | number>, OrderRow>(
        `SELECT * FROM work_orders ${where} ORDER BY priority DESC, created_at ASC, rowid ASC LIMIT ? OFFSET ?`,
      )
      .all(...params, filters.limit, (filters.page - 1) * filters.limit);
    const count = this.db
      .prepare<Array<string | number>, { total: number }>(`SELECT COUNT(*) AS total FROM work_orders ${where}`)
      .get(...params);

    return { data: rows.map(toOrder), total: count?.total ?? 0 };
  }

  /** Orders in a state whose last transition happened before the cutoff. */
  ordersInStateSince(state: OrderState, before: string): WorkOrder[] {
    return this.db
      .prepare<[string, string], OrderRow>(
        `SELECT * FROM work_orders WHERE state = ? AND COALESCE(last_transitioned_at, created_at) < ?
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(state, before)
      .map(toOrder);
  }

  /** Orders created before the cutoff that have not reached a terminal state. */
  staleOrders(before: string): WorkOrder[] {
    return this.db
      .prepare<string[], OrderRow>(
        `SELECT * FROM work_orders WHERE state NOT IN (${placeholders(TERMINAL_ORDER_STATES)}) AND created_at < ?
         ORDER BY created_at ASC, rowid ASC`,
      )
      .all(...TERMINAL_ORDER_STATES, before)
      .map(toOrder);
  }

  // ==========================================================================
  // Items
  // ==========================================================================

  insertItem(item: WorkItem): void {
    this.db
      .prepare(
        `INSERT INTO work_items (id, order_id, type, state, attempts, max_attempts, lease_holder,
          lease_expires_at, last_heartbeat_at, available_at, input, result, assembled_result,
          parts_required, parts_state, revision, error, accepted_at, created_at, updated_at)
         VALUES (@id, @orderId, @type, @state, @attempts, @maxAttempts, @leaseHolder,
          @leaseExpiresAt, @lastHeartbeatAt, @availableAt, @input, @result, @assembledResult,
          @partsRequired, @partsState, @revision, @error, @acceptedAt, @createdAt, @updatedAt)`,
      )
      .run(this.itemParams(item));
  }

  saveItem(item: WorkItem): void {
    this.db
      .prepare(
        `UPDATE work_items SET type = @type, state = @state, attempts = @attempts,
          max_attempts = @maxAttempts, lease_holder = @leaseHolder, lease_expires_at = @leaseExpiresAt,
          last_heartbeat_at = @lastHeartbeatAt, available_at = @availableAt, input = @input,
          result = @result, assembled_result = @assembledResult, parts_required = @partsRequired,
          parts_state = @partsState, revision = @revision, error = @error, accepted_at = @acceptedAt,
          updated_at = @updatedAt
         WHERE id = @id`,
      )
      .run(this.itemParams(item));
  }

  private itemParams(item: WorkItem) {
    return {
      id: item.id,
      orderId: item.orderId,
      type: item.type,
      state: item.state,
      attempts: item.attempts,
      maxAttempts: item.maxAttempts,
      leaseHolder: item.leaseHolder,
      leaseExpiresAt: item.leaseExpiresAt,
      lastHeartbeatAt: item.lastHeartbeatAt,
      availableAt: item.availableAt,
      input: JSON.stringify(item.input),
      result: encodeNullable(item.result),
      assembledResult: encodeNullable(item.assembledResult),
      partsRequired: JSON.stringify(item.partsRequired),
      partsState: JSON.stringify(item.partsState),
      revision: item.revision,
      error: encodeNullable(item.error),
      acceptedAt: item.acceptedAt,
      createdAt: item.createdAt,
      updatedAt: item.updatedAt,
    };
  }

  findItem(id: string): WorkItem | null {
    const row = this.db.prepare<[string], ItemRow>(`SELECT * FROM work_items WHERE id = ?`).get(id);
    return row ? toItem(row) : null;
  }

  getItem(id: string): WorkItem {
    const item = this.findItem(id);
    if (!item) {
      throw new NotFoundError('Work item', id);
    }
    return item;
  }

  itemsForOrder(orderId: string): WorkItem[] {
    return this.db
      .prepare<[string], ItemRow>(`SELECT * FROM work_items WHERE order_id = ? ORDER BY created_at ASC, rowid ASC`)
      .all(orderId)
      .map(toItem);
  }

  /**
   * Queued items ready to lease, oldest first within the highest order
   * priority. Only orders that still accept checkouts are considered.
   */
  leaseCandidates(filters: CandidateFilters): WorkItem[] {
    const clauses = [
      `i.state = 'queued'`,
      `(i.available_at IS NULL OR i.available_at <= ?)`,
      `o.state IN (${placeholders(CHECKOUT_ORDER_STATES)})`,
    ];
    const params: Array<string | number> = [filters.now, ...CHECKOUT_ORDER_STATES];
    if (filters.orderId) {
      clauses.push('i.order_id = ?');
      params.push(filters.orderId);
    }
    if (filters.type) {
      clauses.push('i.type = ?');
      params.push(filters.type);
    }
    if (filters.minPriority !== undefined) {
      clauses.push('o.priority >= ?');
      params.push(filters.minPriority);
    }

    return this.db
      .prepare<Array<string | number>, ItemRow>(
        `SELECT i.* FROM work_items i JOIN work_orders o ON o.id = i.order_id
         WHERE ${clauses.join(' AND ')}
         ORDER BY o.priority DESC, o.created_at ASC, i.created_at ASC, i.rowid ASC
         LIMIT ?`,
      )
      .all(...params, filters.limit)
      .map(toItem);
  }

  /** Items still marked leased whose lease expired at or before `now`. */
  expiredLeases(now: string): WorkItem[] {
    return this.db
      .prepare<string[], ItemRow>(
        `SELECT * FROM work_items
         WHERE state IN (${placeholders(LEASED_ITEM_STATES)}) AND lease_expires_at IS NOT NULL AND lease_expires_at <= ?
         ORDER BY lease_expires_at ASC, rowid ASC`,
      )
      .all(...LEASED_ITEM_STATES, now)
      .map(toItem);
  }

  countActiveLeases(filter: { holder: string } | { type: string }, now: string): number {
    const column = 'holder' in filter ? 'lease_holder' : 'type';
    const value = 'holder' in filter ? filter.holder : filter.type;
    const row = this.db
      .prepare<string[], { total: number }>(
        `SELECT COUNT(*) AS total FROM work_items
         WHERE ${column} = ? AND state IN (${placeholders(LEASED_ITEM_STATES)}) AND lease_expires_at > ?`,
      )
      .get(value, ...LEASED_ITEM_STATES, now);
    return row?.total ?? 0;
  }

  /** Items in a state whose last update happened before the cutoff. */
  itemsInStateSince(state: ItemState, before: string): WorkItem[] {
    return this.db
      .prepare<[string, string], ItemRow>(
        `SELECT * FROM work_items WHERE state = ? AND updated_at < ? ORDER BY updated_at ASC, rowid ASC`,
      )
      .all(state, before)
      .map(toItem);
  }

  // ==========================================================================
  // Parts
  // ==========================================================================

  insertPart(part: WorkItemPart): void {
    this.db
      .prepare(
        `INSERT INTO work_item_parts (id, item_id, part_key, seq, revision, status, payload, evidence,
          notes, errors, checksum, submitted_by, created_at)
         VALUES (@id, @itemId, @partKey, @seq, @revision, @status, @payload, @evidence,
          @notes, @errors, @checksum, @submittedBy, @createdAt)`,
      )
      .run({
        id: part.id,
        itemId: part.itemId,
        partKey: part.partKey,
        seq: part.seq,
        revision: part.revision,
        status: part.status,
        payload: JSON.stringify(part.payload),
        evidence: encodeNullable(part.evidence),
        notes: part.notes,
        errors: encodeNullable(part.errors),
        checksum: part.checksum,
        submittedBy: part.submittedBy,
        createdAt: part.createdAt,
      });
  }

  findPart(itemId: string, revision: number, partKey: string, seq: number): WorkItemPart | null {
    const row = this.db
      .prepare<[string, number, string, number], PartRow>(
        `SELECT * FROM work_item_parts WHERE item_id = ? AND revision = ? AND part_key = ? AND seq = ?`,
      )
      .get(itemId, revision, partKey, seq);
    return row ? toPart(row) : null;
  }

  countParts(itemId: string, revision: number): number {
    const row = this.db
      .prepare<[string, number], { total: number }>(
        `SELECT COUNT(*) AS total FROM work_item_parts WHERE item_id = ? AND revision = ?`,
      )
      .get(itemId, revision);
    return row?.total ?? 0;
  }

  maxPartSeq(itemId: string, revision: number, partKey: string): number {
    const row = this.db
      .prepare<[string, number, string], { maxSeq: number | null }>(
        `SELECT MAX(seq) AS maxSeq FROM work_item_parts WHERE item_id = ? AND revision = ? AND part_key = ?`,
      )
      .get(itemId, revision, partKey);
    return row?.maxSeq ?? 0;
  }

  listParts(itemId: string, filters: PartFilters = {}): WorkItemPart[] {
    const clauses = ['item_id = ?'];
    const params: Array<string | number> = [itemId];
    if (filters.partKey) {
      clauses.push('part_key = ?');
      params.push(filters.partKey);
    }
    if (filters.status) {
      clauses.push('status = ?');
      params.push(filters.status);
    }
    if (filters.revision !== undefined) {
      clauses.push('revision = ?');
      params.push(filters.revision);
    }
    return this.db
      .prepare<Array<string | number>, PartRow>(
        `SELECT * FROM work_item_parts WHERE ${clauses.join(' AND ')}
         ORDER BY revision ASC, part_key ASC, seq ASC, rowid ASC`,
      )
      .all(...params)
      .map(toPart);
  }

  /**
   * Latest part per key for one revision of an item: the highest sequence
   * number, ties broken by insertion order. Restrict to a status to get,
   * for example, the latest validated part per key.
   */
  latestParts(itemId: string, revision: number, status?: PartStatus): Record<string, WorkItemPart> {
    const latest: Record<string, WorkItemPart> = {};
    for (const part of this.listParts(itemId, { revision, status })) {
      const current = latest[part.partKey];
      if (!current || part.seq >= current.seq) {
        latest[part.partKey] = part;
      }
    }
    return latest;
  }

  // ==========================================================================
  // Events
  // ==========================================================================

  appendEvent(input: NewEvent): WorkEvent {
    const event: WorkEvent = {
      id: generateId(),
      orderId: input.orderId,
      itemId: input.itemId ?? null,
      eventType: input.eventType,
      actorType: input.actor.type,
      actorId: input.actor.id,
      payload: input.payload ?? null,
      diff: input.diff ?? null,
      message: input.message ?? null,
      createdAt: input.createdAt,
    };

    this.db
      .prepare(
        `INSERT INTO work_events (id, order_id, item_id, event_type, actor_type, actor_id, payload, diff, message, created_at)
         VALUES (@id, @orderId, @itemId, @eventType, @actorType, @actorId, @payload, @diff, @message, @createdAt)`,
      )
      .run({
        ...event,
        payload: encodeNullable(event.payload),
        diff: encodeNullable(event.diff),
      });

    this.pending.push(event);
    if (!this.db.inTransaction) {
      this.flush();
    }
    return event;
  }

  eventsForOrder(orderId: string): WorkEvent[] {
    return this.db
      .prepare<[string], EventRow>(`SELECT * FROM work_events WHERE order_id = ? ORDER BY created_at ASC, rowid ASC`)
      .all(orderId)
      .map(toEvent);
  }

  eventsForItem(itemId: string): WorkEvent[] {
    return this.db
      .prepare<[string], EventRow>(`SELECT * FROM work_events WHERE item_id = ? ORDER BY created_at ASC, rowid ASC`)
      .all(itemId)
      .map(toEvent);
  }

  // ==========================================================================
  // Idempotency records
  // ==========================================================================

  /**
   * Insert a pending record. Returns false when (scope, keyHash) already
   * exists; the unique key decides concurrent reservations.
   */
  reserveIdempotencyKey(record: { scope: string; keyHash: string; fingerprint: string; createdAt: string }): boolean {
    const result = this.db
      .prepare(
        `INSERT OR IGNORE INTO work_idempotency_keys (scope, key_hash, fingerprint, status, response, created_at, completed_at)
         VALUES (?, ?, ?, 'pending', NULL, ?, NULL)`,
      )
      .run(record.scope, record.keyHash, record.fingerprint, record.createdAt);
    return result.changes === 1;
  }

  findIdempotencyKey(scope: string, keyHash: string): IdempotencyRecord | null {
    const row = this.db
      .prepare<[string, string], IdempotencyRow>(`SELECT * FROM work_idempotency_keys WHERE scope = ? AND key_hash = ?`)
      .get(scope, keyHash);
    if (!row) {
      return null;
    }
    return {
      scope: row.scope,
      keyHash: row.key_hash,
      fingerprint: row.fingerprint,
      status: row.status === 'completed' ? 'completed' : 'pending',
      response: row.response,
      createdAt: row.created_at,
      completedAt: row.completed_at,
    };
  }

  completeIdempotencyKey(scope: string, keyHash: string, response: string, completedAt: string): void {
    this.db
      .prepare(
        `UPDATE work_idempotency_keys SET status = 'completed', response = ?, completed_at = ?
         WHERE scope = ? AND key_hash = ? AND status = 'pending'`,
      )
      .run(response, completedAt, scope, keyHash);
  }

  /** Drop a pending reservation so the client may retry after a failure. */
  releaseIdempotencyKey(scope: string, keyHash: string, fingerprint: string): void {
    this.db
      .prepare(
        `DELETE FROM work_idempotency_keys WHERE scope = ? AND key_hash = ? AND fingerprint = ? AND status = 'pending'`,
      )
      .run(scope, keyHash, fingerprint);
  }

  pruneIdempotencyKeys(before: string): number {
    return this.db.prepare(`DELETE FROM work_idempotency_keys WHERE created_at < ?`).run(before).changes;
  }
}
