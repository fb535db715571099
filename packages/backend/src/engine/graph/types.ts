// ============================================================================
// Transition Graph Types
// ============================================================================

import type { EntityKind } from '../../types/index.js';

/**
 * Adjacency map as loaded from configuration: source state → allowed targets.
 * Keys and targets are untrusted strings until the graph has validated them.
 */
export type TransitionTable = Record<string, readonly string[]>;

export interface LifecycleDefinition<S extends string> {
  kind: EntityKind;
  /** Every state the entity may be in; the first entry is where new entities start. */
  states: readonly S[];
  transitions: TransitionTable;
}

export interface TransitionResult {
  allowed: boolean;
  reason: string;
}

export interface ValidationResult {
  valid: boolean;
  errors: string[];
}
