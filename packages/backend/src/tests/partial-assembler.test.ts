import { describe, it, expect, afterEach } from 'vitest';
import {
  AssemblyIncompleteError,
  LeaseNotHeldError,
  PartRejectedError,
} from '../lib/errors.js';
import type { WorkManagerConfigInput } from '../lib/config/work-manager.js';
import { RESEARCH_BRIEF_TYPE, researchBriefType } from '../order-types/index.js';
import { AGENT_A, AGENT_B, PROPOSER, REVIEWER, createTestContext } from './setup.js';
import type { TestWorkContext } from './setup.js';

const IDENTITY = { name: 'Acme Corp', domain: 'https://www.acme.example/about', confidence: 0.9 };
const SOURCES = { sources: [{ url: 'https://acme.example/press', title: 'Press' }] };

async function leaseBrief(depth: 'basic' | 'standard', config: WorkManagerConfigInput = {}) {
  const ctx = createTestContext({ config, orderTypes: (sink) => [researchBriefType(sink)] });
  const { order, items } = await ctx.coordinator.propose(
    { type: RESEARCH_BRIEF_TYPE, payload: { subject: 'Acme Corp', domain: 'acme.example', depth } },
    PROPOSER,
  );
  await ctx.coordinator.checkout(order.id, AGENT_A);
  return { ctx, orderId: order.id, itemId: items[0].id };
}

describe('PartialAssembler', () => {
  let ctx: TestWorkContext;

  afterEach(() => {
    ctx.close();
  });

  describe('submitPart', () => {
    it('stores a validated part and starts the item', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      const part = await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);

      expect(part).toMatchObject({ partKey: 'identity', seq: 1, revision: 1, status: 'validated', errors: null });
      const item = ctx.store.getItem(lease.itemId);
      expect(item.state).toBe('in_progress');
      expect(item.partsState.identity).toMatchObject({ status: 'validated', seq: 1, checksum: part.checksum });
      expect(ctx.store.getOrder(lease.orderId).state).toBe('in_progress');
      expect(ctx.store.eventsForItem(lease.itemId).pop()).toMatchObject({
        eventType: 'part_submitted',
        payload: { partKey: 'identity', seq: 1, status: 'validated' },
      });
    });

    it('numbers parts per key when no sequence is given', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);
      const second = await ctx.assembler.submitPart(
        lease.itemId,
        { partKey: 'sources', payload: { sources: [{ url: 'https://acme.example/blog' }] } },
        AGENT_A,
      );
      const identity = await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);

      expect(second.seq).toBe(2);
      expect(identity.seq).toBe(1);
      expect(ctx.store.getItem(lease.itemId).partsState.sources.seq).toBe(2);
    });

    it('stores a part that fails a rule as rejected and raises it', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      await expect(
        ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: { sources: [{ url: 'nope' }] } }, AGENT_A),
      ).rejects.toMatchObject({
        reason: 'validation_failed',
        errors: [{ path: 'sources.0.url', message: 'Invalid url' }],
      });

      const rejected = ctx.assembler.listParts(lease.itemId, { status: 'rejected' });
      expect(rejected).toHaveLength(1);
      expect(rejected[0].errors).toEqual([{ path: 'sources.0.url', message: 'Invalid url' }]);
      expect(ctx.store.eventsForItem(lease.itemId).pop()?.eventType).toBe('part_rejected');
    });

    it('applies the order type checks after the rules', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      const error = await ctx.assembler
        .submitPart(lease.itemId, { partKey: 'identity', payload: { ...IDENTITY, confidence: 0.5 } }, AGENT_A)
        .catch((err: unknown) => err);

      expect(error).toBeInstanceOf(PartRejectedError);
      expect(error).toMatchObject({
        statusCode: 422,
        errors: [{ path: 'confidence', message: 'Critical parts require confidence >= 0.7' }],
      });
    });

    it('checks a part against the other validated parts', async () => {
      const lease = await leaseBrief('standard');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);

      await expect(
        ctx.assembler.submitPart(
          lease.itemId,
          {
            partKey: 'findings',
            payload: {
              findings: [
                { claim: 'Opened a new office', sourceUrl: 'https://acme.example/press' },
                { claim: 'Doubled revenue', sourceUrl: 'https://elsewhere.example/rumour' },
              ],
              confidence: 0.8,
            },
          },
          AGENT_A,
        ),
      ).rejects.toMatchObject({
        errors: [{ path: 'findings.1.sourceUrl', message: 'Finding cites a source that is not in the sources part' }],
      });
    });

    it('returns the stored part for an identical resubmission', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      const first = await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', seq: 1, payload: SOURCES }, AGENT_A);
      const again = await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', seq: 1, payload: SOURCES }, AGENT_A);

      expect(again.id).toBe(first.id);
      expect(ctx.assembler.listParts(lease.itemId)).toHaveLength(1);
    });

    it('rejects a different payload for a used sequence', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', seq: 1, payload: SOURCES }, AGENT_A);

      await expect(
        ctx.assembler.submitPart(
          lease.itemId,
          { partKey: 'sources', seq: 1, payload: { sources: [{ url: 'https://acme.example/other' }] } },
          AGENT_A,
        ),
      ).rejects.toMatchObject({ reason: 'duplicate_sequence' });
    });

    it('enforces the payload size limit', async () => {
      const lease = await leaseBrief('basic', { partials: { maxPayloadBytes: 64 } });
      ctx = lease.ctx;

      await expect(
        ctx.assembler.submitPart(lease.itemId, { partKey: 'notes', payload: { data: { text: 'x'.repeat(100) } } }, AGENT_A),
      ).rejects.toMatchObject({ reason: 'payload_too_large' });
      expect(ctx.assembler.listParts(lease.itemId)).toHaveLength(0);
    });

    it('enforces the part count limit', async () => {
      const lease = await leaseBrief('basic', { partials: { maxPartsPerItem: 1 } });
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);

      await expect(
        ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A),
      ).rejects.toMatchObject({ reason: 'too_many_parts' });
    });

    it('refuses parts when partial submissions are disabled', async () => {
      const lease = await leaseBrief('basic', { partials: { enabled: false } });
      ctx = lease.ctx;

      await expect(
        ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A),
      ).rejects.toMatchObject({ reason: 'partials_disabled' });
    });

    it('requires the lease', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      await expect(
        ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_B),
      ).rejects.toThrow(LeaseNotHeldError);
    });
  });

  describe('finalize', () => {
    it('assembles the required parts, submits the item and settles the order', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);

      const item = await ctx.coordinator.finalize(lease.itemId, 'strict', AGENT_A);

      const expected = {
        identity: IDENTITY,
        sources: SOURCES,
        _meta: { subject: 'Acme Corp', depth: 'basic', partsCount: 2, overallConfidence: 0.9 },
      };
      expect(item).toMatchObject({ state: 'submitted', result: expected, assembledResult: expected, leaseHolder: null });
      expect(ctx.store.getOrder(lease.orderId).state).toBe('submitted');
      expect(ctx.store.eventsForItem(lease.itemId).pop()).toMatchObject({
        eventType: 'submitted',
        message: 'Finalized from parts',
        payload: { mode: 'strict', parts: ['identity', 'sources'] },
      });
    });

    it('names the missing parts in strict mode', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);

      const error = await ctx.assembler.finalize(lease.itemId, 'strict', AGENT_A).catch((err: unknown) => err);

      expect(error).toBeInstanceOf(AssemblyIncompleteError);
      expect(error).toMatchObject({ missing: ['sources'] });
      expect(ctx.store.getItem(lease.itemId).state).toBe('in_progress');
    });

    it('treats a key whose latest part was rejected as missing', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);
      await ctx.assembler
        .submitPart(lease.itemId, { partKey: 'identity', payload: { ...IDENTITY, confidence: 0.1 } }, AGENT_A)
        .catch(() => undefined);

      await expect(ctx.assembler.finalize(lease.itemId, 'strict', AGENT_A)).rejects.toMatchObject({
        missing: ['identity'],
      });
    });

    it('assembles whatever is validated in lenient mode', async () => {
      const lease = await leaseBrief('standard');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);

      const item = await ctx.assembler.finalize(lease.itemId, 'lenient', AGENT_A);

      expect(item.state).toBe('submitted');
      expect(item.result).toEqual({
        identity: IDENTITY,
        _meta: { subject: 'Acme Corp', depth: 'standard', partsCount: 1, overallConfidence: 0.9 },
      });
    });

    it('refuses to finalize with no validated part at all', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;

      await expect(ctx.assembler.finalize(lease.itemId, 'lenient', AGENT_A)).rejects.toMatchObject({
        missing: ['identity', 'sources'],
      });
    });

    it('runs the assembled-result check', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);

      await expect(ctx.assembler.finalize(lease.itemId, 'lenient', AGENT_A)).rejects.toMatchObject({
        code: 'validation_failed',
        errors: [{ path: 'identity', message: 'Identity part is required' }],
      });
    });
  });

  describe('revisions', () => {
    it('starts a fresh set of parts after rework', async () => {
      const lease = await leaseBrief('basic');
      ctx = lease.ctx;
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'identity', payload: IDENTITY }, AGENT_A);
      await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);
      await ctx.coordinator.finalize(lease.itemId, 'strict', AGENT_A);

      await ctx.coordinator.reject(
        lease.orderId,
        { errors: [{ path: 'sources', message: 'Need more sources' }], allowRework: true },
        REVIEWER,
      );

      const item = ctx.store.getItem(lease.itemId);
      expect(item).toMatchObject({ state: 'queued', revision: 2, partsState: {}, result: null });
      expect(ctx.assembler.listParts(lease.itemId)).toEqual([]);
      expect(ctx.assembler.listParts(lease.itemId, { revision: 1 })).toHaveLength(2);

      await ctx.coordinator.checkout(lease.orderId, AGENT_A);
      const part = await ctx.assembler.submitPart(lease.itemId, { partKey: 'sources', payload: SOURCES }, AGENT_A);
      expect(part).toMatchObject({ seq: 1, revision: 2 });
    });
  });
});
