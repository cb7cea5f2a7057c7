import type { GraphNode, OperationNode } from '../types/node';
import { NodeComputeError, UnsetInputError, toError } from '../utils/graph-error';
import type { NodeArena } from './arena';
import type { NodeId } from './node-id';

/**
 * Receives evaluation events; used by the engine for stats and hooks
 */
export interface EvaluationListener {
  cacheHit(nodeId: NodeId): void;
  nodeComputed(nodeId: NodeId, durationMs: number): void;
}

interface Frame<T> {
  readonly node: GraphNode<T>;
  expanded: boolean;
}

/**
 * @internal
 * Memoized evaluation over an explicit work stack.
 *
 * A frame is visited twice: first to push its stale inputs, then, once
 * they are all fresh, to run the node's function. Stack depth is bounded
 * by the edge count, not by the call stack.
 */
export class Evaluator<T> {
  constructor(
    private readonly arena: NodeArena<T>,
    private readonly listener?: EvaluationListener
  ) {}

  /**
   * Returns the up-to-date value of `id`, computing stale ancestors first
   * @throws UnsetInputError when an input on the way has no value
   * @throws NodeComputeError when a node's function throws
   */
  compute(id: NodeId): T {
    const root = this.arena.get(id);
    if (root.cache) {
      this.listener?.cacheHit(id);
      return root.cache.value;
    }

    const stack: Frame<T>[] = [{ node: root, expanded: false }];

    while (stack.length > 0) {
      const frame = stack[stack.length - 1];
      const node = frame.node;

      // Already evaluated through another branch of this query
      if (node.cache) {
        stack.pop();
        continue;
      }

      if (node.kind === 'input') {
        throw new UnsetInputError(node.id, node.name);
      }

      if (!frame.expanded) {
        frame.expanded = true;
        // Reverse push so inputs are resolved in declared order
        for (let i = node.inputs.length - 1; i >= 0; i--) {
          const input = this.arena.at(node.inputs[i].index);
          if (input.cache) {
            this.listener?.cacheHit(input.id);
          } else {
            stack.push({ node: input, expanded: false });
          }
        }
        continue;
      }

      stack.pop();
      node.cache = { value: this.apply(node) };
    }

    return this.cachedValue(root);
  }

  private apply(node: OperationNode<T>): T {
    const values = node.inputs.map(input => this.cachedValue(this.arena.at(input.index)));

    const start = performance.now();
    let value: T;
    try {
      value = node.op(values);
    } catch (error) {
      throw new NodeComputeError(node.id, toError(error));
    }
    this.listener?.nodeComputed(node.id, performance.now() - start);
    return value;
  }

  private cachedValue(node: GraphNode<T>): T {
    if (!node.cache) {
      throw new Error(`Node ${node.id.toString()} was read before being evaluated`);
    }
    return node.cache.value;
  }
}
