import type { TransitionResult } from './types.js';
import { LifecycleGraph } from './lifecycle-graph.js';
import { IllegalTransitionError } from '../../lib/errors.js';

/**
 * GraphEngine — the runtime API for checking state changes against a LifecycleGraph.
 *
 * Legality only: the engine never writes state. StateMachine calls
 * assertTransition() before it persists anything.
 */
export class GraphEngine<S extends string> {
  private readonly graph: LifecycleGraph<S>;

  constructor(graph: LifecycleGraph<S>) {
    this.graph = graph;
  }

  get kind() {
    return this.graph.kind;
  }

  getValidTransitions(currentState: S): S[] {
    return this.graph.getOutgoing(currentState);
  }

  isTerminal(state: S): boolean {
    return this.graph.isTerminal(state);
  }

  canTransition(currentState: S, targetState: S): TransitionResult {
    if (!this.graph.hasState(currentState)) {
      return {
        allowed: false,
        reason: `Current state '${currentState}' is not defined in the ${this.kind} lifecycle`,
      };
    }

    if (!this.graph.hasState(targetState)) {
      return {
        allowed: false,
        reason: `Target state '${targetState}' is not defined in the ${this.kind} lifecycle`,
      };
    }

    if (!this.graph.hasTransition(currentState, targetState)) {
      const validTargets = this.graph.getOutgoing(currentState);
      return {
        allowed: false,
        reason: `No transition from '${currentState}' to '${targetState}'. Valid targets: [${validTargets.join(', ')}]`,
      };
    }

    return { allowed: true, reason: 'Transition allowed' };
  }

  /** Throws IllegalTransitionError when the edge is not in the graph. */
  assertTransition(currentState: S, targetState: S): void {
    if (!this.canTransition(currentState, targetState).allowed) {
      throw new IllegalTransitionError(this.kind, currentState, targetState);
    }
  }
}
