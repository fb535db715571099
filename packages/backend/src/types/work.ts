import type { Diff } from '../lib/diff.js';

// ============================================================================
// States
// ============================================================================

export const ORDER_STATES = [
  'queued',
  'checked_out',
  'in_progress',
  'submitted',
  'approved',
  'applied',
  'completed',
  'rejected',
  'failed',
  'dead_lettered',
] as const;

export type OrderState = (typeof ORDER_STATES)[number];

export const ITEM_STATES = [
  'queued',
  'leased',
  'in_progress',
  'submitted',
  'accepted',
  'rejected',
  'completed',
  'failed',
  'dead_lettered',
] as const;

export type ItemState = (typeof ITEM_STATES)[number];

/** Item states in which lease fields may be set. */
export const LEASED_ITEM_STATES: readonly ItemState[] = ['leased', 'in_progress'];

/** Item states that never change again and count toward order completion. */
export const TERMINAL_ITEM_STATES: readonly ItemState[] = ['completed', 'dead_lettered'];

export const TERMINAL_ORDER_STATES: readonly OrderState[] = ['completed', 'dead_lettered'];

/** Order states from which items may be checked out. */
export const CHECKOUT_ORDER_STATES: readonly OrderState[] = ['queued', 'checked_out', 'in_progress'];

export type EntityKind = 'order' | 'item';

export const PART_STATUSES = ['draft', 'validated', 'rejected'] as const;
export type PartStatus = (typeof PART_STATUSES)[number];

export const EVENT_TYPES = [
  'proposed',
  'planned',
  'queued',
  'checked_out',
  'leased',
  'in_progress',
  'heartbeat',
  'submitted',
  'accepted',
  'approved',
  'applied',
  'rejected',
  'completed',
  'failed',
  'dead_lettered',
  'released',
  'requeued',
  'lease_expired',
  'part_submitted',
  'part_rejected',
  'apply_failed',
  'cloned',
] as const;

export type EventType = (typeof EVENT_TYPES)[number];

// ============================================================================
// Actors
// ============================================================================

export type ActorType = 'user' | 'agent' | 'system';

export interface Actor {
  type: ActorType;
  id: string | null;
}

export const SYSTEM_ACTOR: Actor = { type: 'system', id: null };

export function agentActor(id: string): Actor {
  return { type: 'agent', id };
}

// ============================================================================
// Entities
// ============================================================================

export type JsonObject = Record<string, unknown>;

export interface FieldError {
  path: string;
  message: string;
}

export interface ItemError {
  code: string;
  message: string;
  details?: unknown;
}

export interface PartStateEntry {
  status: PartStatus;
  seq: number;
  checksum: string;
  submittedAt: string;
}

export interface WorkOrder {
  id: string;
  type: string;
  state: OrderState;
  priority: number;
  payload: JsonObject;
  meta: JsonObject | null;
  requestedBy: Actor;
  applyAttempts: number;
  lastTransitionedAt: string | null;
  appliedAt: string | null;
  completedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface WorkItem {
  id: string;
  orderId: string;
  type: string;
  state: ItemState;
  attempts: number;
  maxAttempts: number;
  leaseHolder: string | null;
  leaseExpiresAt: string | null;
  lastHeartbeatAt: string | null;
  /** Earliest time the item may be leased again after a failed attempt. */
  availableAt: string | null;
  input: JsonObject;
  result: JsonObject | null;
  assembledResult: JsonObject | null;
  partsRequired: string[];
  partsState: Record<string, PartStateEntry>;
  /** Incremented by every rework cycle; parts from earlier revisions no longer count. */
  revision: number;
  error: ItemError | null;
  acceptedAt: string | null;
  createdAt: string;
  updatedAt: string;
}

export interface WorkItemPart {
  id: string;
  itemId: string;
  partKey: string;
  seq: number;
  revision: number;
  status: PartStatus;
  payload: JsonObject;
  evidence: JsonObject | null;
  notes: string | null;
  errors: FieldError[] | null;
  checksum: string;
  submittedBy: string | null;
  createdAt: string;
}

export interface WorkEvent {
  id: string;
  orderId: string;
  itemId: string | null;
  eventType: EventType;
  actorType: ActorType;
  actorId: string | null;
  payload: JsonObject | null;
  diff: Diff | null;
  message: string | null;
  createdAt: string;
}

export interface OrderWithItems extends WorkOrder {
  items: WorkItem[];
}

export type WorkEventListener = (event: WorkEvent) => void;
