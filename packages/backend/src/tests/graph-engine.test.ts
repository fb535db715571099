import { describe, it, expect } from 'vitest';
import {
  LifecycleGraph,
  GraphEngine,
  buildLifecycles,
  defaultTransitions,
} from '../engine/graph/index.js';
import { IllegalTransitionError, ValidationError } from '../lib/errors.js';
import { ITEM_STATES, ORDER_STATES } from '../types/index.js';
import type { ItemState } from '../types/index.js';

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function itemGraph(transitions: Record<string, string[]>): LifecycleGraph<ItemState> {
  return new LifecycleGraph({ kind: 'item', states: ITEM_STATES, transitions });
}

// ---------------------------------------------------------------------------
// LifecycleGraph
// ---------------------------------------------------------------------------

describe('LifecycleGraph', () => {
  it('accepts the default order and item tables', () => {
    const order = new LifecycleGraph({ kind: 'order', states: ORDER_STATES, transitions: defaultTransitions.order });
    const item = itemGraph(defaultTransitions.item);

    expect(order.validate()).toEqual({ valid: true, errors: [] });
    expect(item.validate()).toEqual({ valid: true, errors: [] });
  });

  it('reports undeclared source and target states', () => {
    const graph = itemGraph({ ...defaultTransitions.item, parked: ['queued'], queued: ['leased', 'archived'] });
    const { valid, errors } = graph.validate();

    expect(valid).toBe(false);
    expect(errors).toContain("Transition table references undeclared source state 'parked'");
    expect(errors).toContain("Transition 'queued' -> 'archived' references undeclared target state 'archived'");
  });

  it('reports duplicate edges', () => {
    const graph = itemGraph({ ...defaultTransitions.item, accepted: ['completed', 'completed'] });

    expect(graph.validate().errors).toEqual(["Transition 'accepted' -> 'completed' is declared more than once"]);
  });

  it('reports states nothing leads to', () => {
    const graph = itemGraph({ ...defaultTransitions.item, submitted: ['rejected', 'failed'] });

    expect(graph.validate().errors).toEqual(["State 'accepted' of the item lifecycle is unreachable"]);
  });

  it('treats states without outgoing edges as terminal', () => {
    const graph = itemGraph(defaultTransitions.item);

    expect(graph.isTerminal('completed')).toBe(true);
    expect(graph.isTerminal('dead_lettered')).toBe(true);
    expect(graph.isTerminal('failed')).toBe(false);
  });
});

// ---------------------------------------------------------------------------
// GraphEngine
// ---------------------------------------------------------------------------

describe('GraphEngine', () => {
  const engine = new GraphEngine(itemGraph(defaultTransitions.item));

  it('allows configured edges', () => {
    expect(engine.canTransition('queued', 'leased')).toEqual({ allowed: true, reason: 'Transition allowed' });
  });

  it('explains refused edges with the valid targets', () => {
    expect(engine.canTransition('queued', 'submitted')).toEqual({
      allowed: false,
      reason: "No transition from 'queued' to 'submitted'. Valid targets: [leased, failed]",
    });
  });

  it('throws IllegalTransitionError from assertTransition', () => {
    expect(() => engine.assertTransition('completed', 'queued')).toThrow(IllegalTransitionError);
    expect(() => engine.assertTransition('leased', 'in_progress')).not.toThrow();
  });

  it('lists valid transitions', () => {
    expect(engine.getValidTransitions('submitted')).toEqual(['accepted', 'rejected', 'failed']);
    expect(engine.getValidTransitions('completed')).toEqual([]);
  });
});

// ---------------------------------------------------------------------------
// buildLifecycles
// ---------------------------------------------------------------------------

describe('buildLifecycles', () => {
  it('builds both engines from the default tables', () => {
    const lifecycles = buildLifecycles(defaultTransitions);

    expect(lifecycles.order.kind).toBe('order');
    expect(lifecycles.item.kind).toBe('item');
    expect(lifecycles.order.canTransition('applied', 'completed').allowed).toBe(true);
  });

  it('throws ValidationError listing every problem', () => {
    let caught: unknown;
    try {
      buildLifecycles({
        order: { ...defaultTransitions.order, queued: ['nowhere'] },
        item: defaultTransitions.item,
      });
    } catch (err) {
      caught = err;
    }

    expect(caught).toBeInstanceOf(ValidationError);
    if (caught instanceof ValidationError) {
      expect(caught.details).toEqual({
        errors: [
          "Transition 'queued' -> 'nowhere' references undeclared target state 'nowhere'",
          "State 'checked_out' of the order lifecycle is unreachable",
        ],
      });
    }
  });
});
