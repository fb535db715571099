import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { IllegalTransitionError } from '../lib/errors.js';
import { createDiff } from '../lib/diff.js';
import { SYSTEM_ACTOR } from '../types/index.js';
import type { WorkEvent, WorkItem, WorkOrder } from '../types/index.js';
import { createTestContext, PROPOSER, REVIEWER, TASKS_TYPE } from './setup.js';
import type { TestWorkContext } from './setup.js';

describe('StateMachine', () => {
  let ctx: TestWorkContext;
  let order: WorkOrder;
  let items: WorkItem[];

  beforeEach(async () => {
    ctx = createTestContext();
    ({ order, items } = await ctx.coordinator.propose({ type: TASKS_TYPE, payload: { tasks: ['a', 'b'] } }, PROPOSER));
  });

  afterEach(() => {
    ctx.close();
  });

  describe('transitionOrder', () => {
    it('writes the state, timestamps and exactly one event', () => {
      ctx.time.advanceSeconds(5);
      const before = ctx.store.eventsForOrder(order.id).length;

      const moved = ctx.stateMachine.transitionOrder(order.id, 'rejected', {
        actor: REVIEWER,
        message: 'not needed',
      });

      expect(moved.state).toBe('rejected');
      expect(moved.lastTransitionedAt).toBe('2026-01-05T09:00:05.000Z');
      expect(ctx.store.getOrder(order.id).state).toBe('rejected');

      const events = ctx.store.eventsForOrder(order.id);
      expect(events).toHaveLength(before + 1);
      expect(events[events.length - 1]).toMatchObject({
        eventType: 'rejected',
        actorType: 'user',
        actorId: 'reviewer-1',
        message: 'not needed',
        payload: { from: 'queued', to: 'rejected' },
        itemId: null,
      });
    });

    it('refuses edges outside the graph and writes nothing', () => {
      const before = ctx.store.eventsForOrder(order.id).length;

      expect(() => ctx.stateMachine.transitionOrder(order.id, 'applied')).toThrow(IllegalTransitionError);
      expect(ctx.store.getOrder(order.id).state).toBe('queued');
      expect(ctx.store.eventsForOrder(order.id)).toHaveLength(before);
    });

    it('stamps appliedAt and stores the diff on the event', () => {
      const diff = createDiff({ count: 0 }, { count: 2 }, 'two added');
      ctx.stateMachine.transitionOrder(order.id, 'submitted');
      ctx.stateMachine.transitionOrder(order.id, 'approved');
      const applied = ctx.stateMachine.transitionOrder(order.id, 'applied', { diff });

      expect(applied.appliedAt).toBe('2026-01-05T09:00:00.000Z');
      const last = ctx.store.eventsForOrder(order.id).pop();
      expect(last?.diff).toEqual(diff);
    });

    it('uses the given event type instead of the target state', () => {
      ctx.stateMachine.transitionOrder(order.id, 'failed');
      ctx.stateMachine.transitionOrder(order.id, 'queued', { event: 'requeued' });

      expect(ctx.store.eventsForOrder(order.id).pop()?.eventType).toBe('requeued');
    });
  });

  describe('transitionItem', () => {
    it('clears lease fields when leaving the leased states', () => {
      const leased = ctx.stateMachine.transitionItem(items[0].id, 'leased', {
        patch: { leaseHolder: 'agent-a', leaseExpiresAt: '2026-01-05T09:10:00.000Z', lastHeartbeatAt: ctx.time.now() },
      });
      expect(leased.leaseHolder).toBe('agent-a');

      const requeued = ctx.stateMachine.transitionItem(leased, 'queued', { event: 'released' });
      expect(requeued).toMatchObject({ state: 'queued', leaseHolder: null, leaseExpiresAt: null, lastHeartbeatAt: null });
    });

    it('stamps acceptedAt', () => {
      ctx.stateMachine.transitionItem(items[0].id, 'leased');
      ctx.stateMachine.transitionItem(items[0].id, 'in_progress');
      ctx.stateMachine.transitionItem(items[0].id, 'submitted');
      ctx.time.advanceSeconds(1);
      const accepted = ctx.stateMachine.transitionItem(items[0].id, 'accepted');

      expect(accepted.acceptedAt).toBe('2026-01-05T09:00:01.000Z');
    });

    it('rolls back every write when a later step in the transaction fails', () => {
      expect(() =>
        ctx.store.transaction(() => {
          ctx.stateMachine.transitionItem(items[0].id, 'leased');
          ctx.stateMachine.transitionItem(items[1].id, 'completed');
        }),
      ).toThrow(IllegalTransitionError);

      expect(ctx.store.getItem(items[0].id).state).toBe('queued');
      expect(ctx.store.eventsForItem(items[0].id)).toHaveLength(0);
    });
  });

  describe('events', () => {
    it('delivers events to listeners only after the outermost commit', () => {
      const seen: WorkEvent[] = [];
      ctx.coordinator.onEvent((event) => seen.push(event));

      ctx.store.transaction(() => {
        ctx.stateMachine.transitionItem(items[0].id, 'leased');
        expect(seen).toHaveLength(0);
        ctx.stateMachine.transitionItem(items[0].id, 'in_progress');
      });

      expect(seen.map((event) => event.eventType)).toEqual(['leased', 'in_progress']);
    });

    it('drops buffered events on rollback', () => {
      const seen: WorkEvent[] = [];
      ctx.coordinator.onEvent((event) => seen.push(event));

      expect(() =>
        ctx.store.transaction(() => {
          ctx.stateMachine.transitionItem(items[0].id, 'leased');
          throw new Error('abort');
        }),
      ).toThrow('abort');

      expect(seen).toHaveLength(0);
    });

    it('keeps going when a listener throws', () => {
      const seen: string[] = [];
      ctx.coordinator.onEvent(() => {
        throw new Error('listener broke');
      });
      ctx.coordinator.onEvent((event) => seen.push(event.eventType));

      ctx.stateMachine.transitionItem(items[0].id, 'leased');

      expect(seen).toEqual(['leased']);
    });

    it('stops delivering after unsubscribe', () => {
      const seen: string[] = [];
      const unsubscribe = ctx.coordinator.onEvent((event) => seen.push(event.eventType));
      unsubscribe();

      ctx.stateMachine.transitionItem(items[0].id, 'leased');

      expect(seen).toEqual([]);
    });
  });

  describe('workflow helpers', () => {
    it('startItem moves the item and a checked-out order to in_progress', () => {
      ctx.stateMachine.transitionItem(items[0].id, 'leased');
      ctx.stateMachine.transitionOrder(order.id, 'checked_out');

      const started = ctx.stateMachine.startItem(items[0].id, SYSTEM_ACTOR);

      expect(started.state).toBe('in_progress');
      expect(ctx.store.getOrder(order.id).state).toBe('in_progress');
    });

    it('startItem leaves items that are not leased untouched', () => {
      const untouched = ctx.stateMachine.startItem(items[0].id, SYSTEM_ACTOR);

      expect(untouched.state).toBe('queued');
      expect(ctx.store.eventsForItem(items[0].id)).toHaveLength(0);
    });

    it('recordSubmission starts a leased item and stores the result', () => {
      ctx.stateMachine.transitionItem(items[0].id, 'leased');

      const submitted = ctx.stateMachine.recordSubmission(items[0].id, {
        result: { done: true },
        actor: SYSTEM_ACTOR,
      });

      expect(submitted).toMatchObject({ state: 'submitted', result: { done: true }, error: null });
      expect(ctx.store.eventsForItem(items[0].id).map((event) => event.eventType)).toEqual([
        'leased',
        'in_progress',
        'submitted',
      ]);
    });

    it('advanceOrder steps a checked-out order through in_progress', () => {
      ctx.stateMachine.transitionOrder(order.id, 'checked_out');

      const advanced = ctx.stateMachine.advanceOrder(order.id, 'submitted');

      expect(advanced.state).toBe('submitted');
      expect(ctx.store.eventsForOrder(order.id).map((event) => event.eventType).slice(-3)).toEqual([
        'checked_out',
        'in_progress',
        'submitted',
      ]);
    });

    it('completes the order once every item is terminal', () => {
      ctx.stateMachine.transitionOrder(order.id, 'submitted');
      ctx.stateMachine.transitionOrder(order.id, 'approved');
      ctx.stateMachine.transitionOrder(order.id, 'applied');
      for (const item of items) {
        ctx.stateMachine.transitionItem(item.id, 'failed');
        ctx.stateMachine.transitionItem(item.id, 'dead_lettered');
      }

      const completed = ctx.store.getOrder(order.id);
      expect(completed.state).toBe('completed');
      expect(completed.completedAt).toBe('2026-01-05T09:00:00.000Z');
      expect(ctx.stateMachine.checkOrderCompletion(order.id).state).toBe('completed');
    });

    it('leaves the order applied while an item is still only submitted', () => {
      ctx.stateMachine.transitionOrder(order.id, 'submitted');
      ctx.stateMachine.transitionOrder(order.id, 'approved');
      ctx.stateMachine.transitionOrder(order.id, 'applied');
      const [first, second] = items;
      for (const state of ['leased', 'in_progress', 'submitted', 'accepted', 'completed'] as const) {
        ctx.stateMachine.transitionItem(first.id, state);
      }
      for (const state of ['leased', 'in_progress', 'submitted'] as const) {
        ctx.stateMachine.transitionItem(second.id, state);
      }

      const checked = ctx.stateMachine.checkOrderCompletion(order.id);

      expect(checked.state).toBe('applied');
      expect(checked.completedAt).toBeNull();
      expect(ctx.store.itemsForOrder(order.id).map((item) => item.state)).toEqual(['completed', 'submitted']);
    });
  });
});
