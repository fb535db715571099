import type { z } from 'zod';
import type { Diff } from '../lib/diff.js';
import type { JsonObject, OrderWithItems, WorkItem, WorkItemPart, WorkOrder } from '../types/index.js';

export type MaybePromise<T> = T | Promise<T>;

/** Zod schema producing a JSON object, used for order payloads. */
export type PayloadSchema = z.ZodType<JsonObject, z.ZodTypeDef, unknown>;

/** Zod schema for a submission or a part; only success and issues matter. */
export type RuleSet = z.ZodType<unknown, z.ZodTypeDef, unknown>;

/** One item an order type's plan asks to create. */
export interface ItemSpec {
  /** Defaults to the order's type. */
  type?: string;
  input: JsonObject;
  maxAttempts?: number;
  /** Part keys finalize requires for this item. */
  partsRequired?: string[];
}

/** Latest part per part key. */
export type PartMap = Record<string, WorkItemPart>;

/**
 * A domain plugin. Only `type`, `schema` and `apply` are required; the other
 * hooks are filled with defaults by `defineOrderType`.
 *
 * Validation hooks signal failure by throwing ValidationFailedError.
 * `apply` must be idempotent: it may run again for the same order after a
 * failure or crash and must then return a structurally equal Diff.
 */
export interface OrderTypeDefinition {
  readonly type: string;
  schema(): PayloadSchema;
  plan?(order: WorkOrder): MaybePromise<ItemSpec[]>;

  submissionRules?(item: WorkItem): RuleSet | null;
  afterValidateSubmission?(item: WorkItem, result: JsonObject): MaybePromise<void>;

  canApprove?(order: OrderWithItems): MaybePromise<boolean>;
  shouldAutoApprove?(): boolean;

  partialRules?(item: WorkItem, partKey: string, seq: number): RuleSet | null;
  afterValidatePart?(
    item: WorkItem,
    partKey: string,
    payload: JsonObject,
    seq: number,
    otherParts: PartMap,
  ): MaybePromise<void>;
  requiredParts?(item: WorkItem): string[];
  assemble?(item: WorkItem, parts: PartMap): MaybePromise<JsonObject>;
  validateAssembled?(item: WorkItem, assembled: JsonObject): MaybePromise<void>;

  beforeApply?(order: OrderWithItems): MaybePromise<void>;
  apply(order: OrderWithItems): MaybePromise<Diff>;
  afterApply?(order: OrderWithItems, diff: Diff): MaybePromise<void>;
}

export type OrderType = Required<OrderTypeDefinition>;
