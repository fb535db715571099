import { z } from 'zod';
import { DiffSchema } from '../lib/diff.js';
import { EVENT_TYPES, ITEM_STATES, ORDER_STATES, PART_STATUSES } from '../types/index.js';
import type { OrderWithItems, WorkItem, WorkItemPart, WorkOrder } from '../types/index.js';

// Decoders for stored rows and replayed idempotent responses.

export const JsonObjectSchema = z.record(z.string(), z.unknown());
export const OrderStateSchema = z.enum(ORDER_STATES);
export const ItemStateSchema = z.enum(ITEM_STATES);
export const PartStatusSchema = z.enum(PART_STATUSES);
export const EventTypeSchema = z.enum(EVENT_TYPES);
export const ActorTypeSchema = z.enum(['user', 'agent', 'system']);
export const FieldErrorsSchema = z.array(z.object({ path: z.string(), message: z.string() }));
export const ItemErrorSchema = z.object({ code: z.string(), message: z.string(), details: z.unknown() });
export const StringListSchema = z.array(z.string());

export const PartsStateSchema = z.record(
  z.string(),
  z.object({
    status: PartStatusSchema,
    seq: z.number(),
    checksum: z.string(),
    submittedAt: z.string(),
  }),
);

const nullableString = z.string().nullable();

export const WorkOrderSchema: z.ZodType<WorkOrder, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  type: z.string(),
  state: OrderStateSchema,
  priority: z.number(),
  payload: JsonObjectSchema,
  meta: JsonObjectSchema.nullable(),
  requestedBy: z.object({ type: ActorTypeSchema, id: nullableString }),
  applyAttempts: z.number(),
  lastTransitionedAt: nullableString,
  appliedAt: nullableString,
  completedAt: nullableString,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const WorkItemSchema: z.ZodType<WorkItem, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  orderId: z.string(),
  type: z.string(),
  state: ItemStateSchema,
  attempts: z.number(),
  maxAttempts: z.number(),
  leaseHolder: nullableString,
  leaseExpiresAt: nullableString,
  lastHeartbeatAt: nullableString,
  availableAt: nullableString,
  input: JsonObjectSchema,
  result: JsonObjectSchema.nullable(),
  assembledResult: JsonObjectSchema.nullable(),
  partsRequired: StringListSchema,
  partsState: PartsStateSchema,
  revision: z.number(),
  error: ItemErrorSchema.nullable(),
  acceptedAt: nullableString,
  createdAt: z.string(),
  updatedAt: z.string(),
});

export const WorkItemPartSchema: z.ZodType<WorkItemPart, z.ZodTypeDef, unknown> = z.object({
  id: z.string(),
  itemId: z.string(),
  partKey: z.string(),
  seq: z.number(),
  revision: z.number(),
  status: PartStatusSchema,
  payload: JsonObjectSchema,
  evidence: JsonObjectSchema.nullable(),
  notes: nullableString,
  errors: FieldErrorsSchema.nullable(),
  checksum: z.string(),
  submittedBy: nullableString,
  createdAt: z.string(),
});

export const OrderWithItemsSchema: z.ZodType<OrderWithItems, z.ZodTypeDef, unknown> = z.intersection(
  WorkOrderSchema,
  z.object({ items: z.array(WorkItemSchema) }),
);

export const ProposalSchema = z.object({
  order: WorkOrderSchema,
  items: z.array(WorkItemSchema),
});

export const ApprovalSchema = z.object({
  order: OrderWithItemsSchema,
  diff: DiffSchema,
});
