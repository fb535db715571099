export { LifecycleGraph } from './lifecycle-graph.js';
export { GraphEngine } from './graph-engine.js';
export type {
  TransitionTable,
  LifecycleDefinition,
  TransitionResult,
  ValidationResult,
} from './types.js';

import { z } from 'zod';
import defaultTransitionsJson from './default-transitions.json' with { type: 'json' };
import { LifecycleGraph } from './lifecycle-graph.js';
import { GraphEngine } from './graph-engine.js';
import { ValidationError } from '../../lib/errors.js';
import { ORDER_STATES, ITEM_STATES } from '../../types/index.js';
import type { OrderState, ItemState } from '../../types/index.js';
import type { TransitionTable } from './types.js';

export const TransitionTableSchema = z.record(z.string(), z.array(z.string()));

export const TransitionConfigSchema = z.object({
  order: TransitionTableSchema,
  item: TransitionTableSchema,
});

export type TransitionConfig = z.infer<typeof TransitionConfigSchema>;

export const defaultTransitions: TransitionConfig = TransitionConfigSchema.parse(defaultTransitionsJson);

export interface Lifecycles {
  order: GraphEngine<OrderState>;
  item: GraphEngine<ItemState>;
}

/**
 * Build and validate the order and item graphs.
 * Throws ValidationError listing every integrity problem found.
 */
export function buildLifecycles(transitions: {
  order: TransitionTable;
  item: TransitionTable;
}): Lifecycles {
  const orderGraph = new LifecycleGraph({ kind: 'order', states: ORDER_STATES, transitions: transitions.order });
  const itemGraph = new LifecycleGraph({ kind: 'item', states: ITEM_STATES, transitions: transitions.item });

  const errors = [...orderGraph.validate().errors, ...itemGraph.validate().errors];
  if (errors.length > 0) {
    throw new ValidationError('Invalid transition configuration', { errors });
  }

  return {
    order: new GraphEngine(orderGraph),
    item: new GraphEngine(itemGraph),
  };
}
