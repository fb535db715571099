import { z } from 'zod';
import { FieldErrorsSchema, JsonObjectSchema, OrderStateSchema, PartStatusSchema } from './work-entities.schema.js';

const ttlSeconds = z.number().int().positive().max(86400).optional();

// ============================================================================
// Order Schemas
// ============================================================================

export const ProposeSchema = z.object({
  type: z.string().min(1, 'Order type is required'),
  payload: JsonObjectSchema,
  meta: JsonObjectSchema.nullable().optional(),
  priority: z.number().int().min(0).optional(),
});

export type ProposeBody = z.infer<typeof ProposeSchema>;

export const OrderListQuerySchema = z.object({
  state: OrderStateSchema.optional(),
  type: z.string().min(1).optional(),
  page: z.coerce.number().int().positive().default(1),
  limit: z.coerce.number().int().positive().max(100).default(20),
});

export const RejectSchema = z.object({
  errors: FieldErrorsSchema.default([]),
  allowRework: z.boolean().default(false),
  message: z.string().min(1).nullable().optional(),
});

export const DeadLetterSchema = z.object({
  message: z.string().min(1).optional(),
});

export const CloneSchema = z.object({
  priority: z.number().int().min(0).optional(),
});

// ============================================================================
// Lease Schemas
// ============================================================================

export const CheckoutSchema = z.object({
  ttlSeconds,
});

export const CheckoutNextSchema = z.object({
  type: z.string().min(1).optional(),
  minPriority: z.number().int().optional(),
  ttlSeconds,
});

export const HeartbeatSchema = z.object({
  ttlSeconds,
});

// ============================================================================
// Item Schemas
// ============================================================================

export const SubmitSchema = z.object({
  result: JsonObjectSchema,
  evidence: JsonObjectSchema.nullable().optional(),
  notes: z.string().nullable().optional(),
});

export const SubmitPartSchema = z.object({
  partKey: z.string().min(1).max(100),
  seq: z.number().int().positive().optional(),
  payload: JsonObjectSchema,
  evidence: JsonObjectSchema.nullable().optional(),
  notes: z.string().nullable().optional(),
});

export const PartListQuerySchema = z.object({
  partKey: z.string().min(1).optional(),
  status: PartStatusSchema.optional(),
  revision: z.coerce.number().int().positive().optional(),
});

export const FinalizeSchema = z.object({
  mode: z.enum(['strict', 'lenient']).default('strict'),
});

export const FailSchema = z.object({
  code: z.string().min(1).optional(),
  message: z.string().min(1, 'A failure message is required'),
  details: z.unknown().optional(),
});
