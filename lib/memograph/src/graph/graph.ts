import type { Observable } from 'rxjs';
import type {
  ExecutableGraphState,
  GraphDefinition,
  GraphOperator,
} from './operator-types';
import { topologicalOrder } from './topological-order';
import { ComputationGraph, NodeId } from '../engine';
import type { GraphEventHandlers, UnsubscribeFn } from '../types/graph-hooks';
import type { GraphStats } from '../types/graph-stats';
import type { NodeState } from '../types/graph-state-snapshot';
import { InvalidReferenceError } from '../utils/graph-error';

/**
 * Creates a new graph from operators
 *
 * @example
 * ```typescript
 * const graph = createGraph<number>(
 *   withInputs(['price', 'quantity']),
 *   withNodes([
 *     { id: 'total', inputs: ['subtotal', 'tax'], compute: ([s, t]) => s + t },
 *     { id: 'subtotal', inputs: ['price', 'quantity'], compute: ([p, q]) => p * q },
 *     { id: 'tax', inputs: ['subtotal'], compute: ([s]) => s * 0.2 },
 *   ])
 * );
 *
 * graph.set('price', 10).set('quantity', 3);
 * graph.compute('total'); // 36
 * ```
 */
export function createGraph<T>(...operators: readonly GraphOperator<T>[]): ExecutableGraph<T> {
  let graph: GraphDefinition<T> = {
    inputs: new Map(),
    nodes: new Map(),
    options: {},
  };

  for (const operator of operators) {
    graph = operator(graph);
  }

  return new ExecutableGraph<T>(graph);
}

/**
 * Graph built from a definition, addressed by string keys.
 *
 * Definitions are compiled into a ComputationGraph in dependency order at
 * construction, so reference and cycle errors surface from `createGraph`.
 */
export class ExecutableGraph<T> {
  private readonly graph: ComputationGraph<T>;
  private readonly ids = new Map<string, NodeId>();
  // Node key by arena index
  private readonly keys: string[] = [];

  constructor(definition: GraphDefinition<T>) {
    this.validateReferences(definition);
    const order = topologicalOrder(definition.nodes);

    this.graph = new ComputationGraph<T>(definition.options);

    for (const input of definition.inputs.values()) {
      this.track(input.id, this.graph.addInputNode(input.id));
    }
    for (const node of order) {
      const inputs = node.inputs.map(ref => this.nodeId(ref));
      this.track(node.id, this.graph.addNode(inputs, node.compute));
    }
    for (const input of definition.inputs.values()) {
      if (input.initial) {
        this.graph.setInput(input.id, input.initial.value);
      }
    }
  }

  /**
   * Underlying imperative graph
   */
  get engine(): ComputationGraph<T> {
    return this.graph;
  }

  get destroyed(): boolean {
    return this.graph.destroyed;
  }

  /**
   * Resolves a node key to its id in the underlying graph
   * @throws InvalidReferenceError for unknown keys
   */
  nodeId(key: string): NodeId {
    const id = this.ids.get(key);
    if (!id) {
      throw new InvalidReferenceError(`Unknown node key '${key}'`);
    }
    return id;
  }

  /**
   * Sets an input value
   * @returns this, for chaining
   */
  set(name: string, value: T): this {
    this.graph.setInput(name, value);
    return this;
  }

  compute(key: string): T {
    return this.graph.compute(this.nodeId(key));
  }

  /**
   * Marks a node and everything downstream of it stale
   * @returns keys of the invalidated nodes
   */
  invalidate(key: string): string[] {
    return this.graph.invalidate(this.nodeId(key)).map(id => this.keyOf(id));
  }

  isStale(key: string): boolean {
    return this.graph.isStale(this.nodeId(key));
  }

  observe(key: string): Observable<T> {
    return this.graph.observeNode(this.nodeId(key));
  }

  on<K extends keyof GraphEventHandlers>(eventType: K, handler: GraphEventHandlers[K]): UnsubscribeFn {
    return this.graph.on(eventType, handler);
  }

  getStats(): GraphStats {
    return this.graph.getStats();
  }

  exportState(): ExecutableGraphState<T> {
    const snapshot = this.graph.exportState();
    const nodes: Record<string, NodeState<T>> = {};
    for (const node of snapshot.nodes) {
      nodes[this.keys[node.index]] = node;
    }
    return { graphId: snapshot.graphId, timestamp: snapshot.timestamp, nodes };
  }

  destroy(): void {
    this.graph.destroy();
  }

  private keyOf(id: NodeId): string {
    return this.keys[id.index];
  }

  private track(key: string, id: NodeId): void {
    this.ids.set(key, id);
    this.keys[id.index] = key;
  }

  private validateReferences(definition: GraphDefinition<T>): void {
    for (const node of definition.nodes.values()) {
      for (const ref of node.inputs) {
        if (!definition.inputs.has(ref) && !definition.nodes.has(ref)) {
          throw new InvalidReferenceError(`Node '${node.id}' reads unknown key '${ref}'`);
        }
      }
    }
  }
}
