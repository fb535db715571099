import type { EntityKind } from '../../types/index.js';
import type { LifecycleDefinition, ValidationResult } from './types.js';

/**
 * LifecycleGraph — the directed graph of legal state changes for one entity kind.
 *
 * Built from plain data so a deployment can extend it without code changes.
 * Construction never throws; references to undeclared states are collected
 * and reported by validate().
 */
export class LifecycleGraph<S extends string> {
  readonly kind: EntityKind;
  private readonly states: readonly S[];
  /** Adjacency list: state → allowed target states */
  private readonly adjacency: Map<S, S[]>;
  private readonly referenceErrors: string[] = [];

  constructor(definition: LifecycleDefinition<S>) {
    this.kind = definition.kind;
    this.states = definition.states;

    this.adjacency = new Map();
    for (const state of this.states) {
      this.adjacency.set(state, []);
    }

    for (const [from, targets] of Object.entries(definition.transitions)) {
      if (!this.hasState(from)) {
        this.referenceErrors.push(`Transition table references undeclared source state '${from}'`);
        continue;
      }
      const outgoing = this.adjacency.get(from) ?? [];
      for (const to of targets) {
        if (!this.hasState(to)) {
          this.referenceErrors.push(
            `Transition '${from}' -> '${to}' references undeclared target state '${to}'`,
          );
          continue;
        }
        if (outgoing.includes(to)) {
          this.referenceErrors.push(`Transition '${from}' -> '${to}' is declared more than once`);
          continue;
        }
        outgoing.push(to);
      }
      this.adjacency.set(from, outgoing);
    }
  }

  getStates(): S[] {
    return [...this.states];
  }

  getOutgoing(state: S): S[] {
    return [...(this.adjacency.get(state) ?? [])];
  }

  hasState(state: string): state is S {
    return this.states.some((declared) => declared === state);
  }

  hasTransition(from: S, to: S): boolean {
    return this.adjacency.get(from)?.includes(to) ?? false;
  }

  isTerminal(state: S): boolean {
    return this.getOutgoing(state).length === 0;
  }

  /**
   * Validate the graph for referential integrity.
   *
   * Checks:
   * 1. At least one state exists
   * 2. Every source and target in the table is a declared state
   * 3. No edge is declared twice
   * 4. Every state other than the entry state has an incoming edge
   */
  validate(): ValidationResult {
    const errors: string[] = [...this.referenceErrors];

    if (this.states.length === 0) {
      errors.push(`The ${this.kind} lifecycle must have at least one state`);
      return { valid: false, errors };
    }

    const entry = this.states[0];
    const hasIncoming = new Set<S>();
    for (const targets of this.adjacency.values()) {
      for (const to of targets) {
        hasIncoming.add(to);
      }
    }

    for (const state of this.states) {
      if (state !== entry && !hasIncoming.has(state)) {
        errors.push(`State '${state}' of the ${this.kind} lifecycle is unreachable`);
      }
    }

    return { valid: errors.length === 0, errors };
  }
}
