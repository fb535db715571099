import { z } from 'zod';
import { createDiff } from '../../lib/diff.js';
import { ValidationFailedError } from '../../lib/errors.js';
import type { Logger } from '../../lib/logger.js';
import type { OrderTypeDefinition } from '../types.js';
import type { RecordSink } from './record-sink.js';

export const RECORD_UPSERT_TYPE = 'records.upsert';

const CollectionSchema = z.enum(['products', 'categories', 'tags']);

const RecordUpsertPayloadSchema = z.object({
  collection: CollectionSchema,
  records: z
    .array(
      z.object({
        key: z.string().min(1),
        data: z.record(z.string(), z.unknown()),
      }),
    )
    .min(1),
});

const RecordInputSchema = z.object({
  collection: CollectionSchema,
  key: z.string(),
  data: z.record(z.string(), z.unknown()),
});

const RecordResultSchema = z.object({
  written: z.boolean(),
  recordKey: z.string().min(1),
  verification: z.object({
    checked: z.boolean(),
    valid: z.boolean(),
  }),
});

/**
 * Upserts one record per item into a collection. Agents prepare and verify
 * each record; apply writes the verified records to the sink.
 */
export function recordUpsertType(sink: RecordSink, logger?: Logger): OrderTypeDefinition {
  return {
    type: RECORD_UPSERT_TYPE,

    schema: () => RecordUpsertPayloadSchema,

    plan: (order) => {
      const payload = RecordUpsertPayloadSchema.parse(order.payload);
      return payload.records.map((record) => ({
        input: { collection: payload.collection, key: record.key, data: record.data },
      }));
    },

    submissionRules: () => RecordResultSchema,

    afterValidateSubmission: (item, result) => {
      const input = RecordInputSchema.parse(item.input);
      const parsed = RecordResultSchema.parse(result);
      if (parsed.recordKey !== input.key) {
        throw new ValidationFailedError('Submission does not match the item', [
          { path: 'recordKey', message: `Expected record key '${input.key}'` },
        ]);
      }
      if (!parsed.verification.checked || !parsed.verification.valid) {
        throw new ValidationFailedError('Record must be verified before submission', [
          { path: 'verification', message: 'Records must be verified as valid before submission' },
        ]);
      }
    },

    canApprove: (order) =>
      order.items
        .filter((item) => item.state !== 'dead_lettered')
        .every((item) => RecordResultSchema.safeParse(item.result).data?.verification.valid === true),

    beforeApply: (order) => {
      logger?.info({ orderId: order.id, records: order.items.length }, 'Applying record upserts');
    },

    apply: async (order) => {
      const payload = RecordUpsertPayloadSchema.parse(order.payload);
      const keys: string[] = [];

      for (const item of order.items) {
        if (item.state === 'dead_lettered') {
          continue;
        }
        const input = RecordInputSchema.parse(item.input);
        await sink.upsert(input.collection, input.key, input.data);
        keys.push(input.key);
      }

      return createDiff(
        { collection: payload.collection, recordCount: 0 },
        { collection: payload.collection, recordCount: keys.length, keys },
        `Upserted ${keys.length} records into ${payload.collection}`,
      );
    },

    afterApply: (order, diff) => {
      logger?.info({ orderId: order.id, summary: diff.summary }, 'Record upserts applied');
    },
  };
}
