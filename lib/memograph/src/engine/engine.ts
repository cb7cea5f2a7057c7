import { EMPTY, Observable, Subject, concatMap, defer, filter, of, startWith, throwError } from 'rxjs';
import type { IGraphOptions } from '../types/graph-options';
import { GraphEventHandlers, GraphEventType, UnsubscribeFn } from '../types/graph-hooks';
import type { GraphStats } from '../types/graph-stats';
import type { GraphStateSnapshot, NodeState } from '../types/graph-state-snapshot';
import { ILogger, LogLevel } from '../types/logger';
import type { OperationFn } from '../types/node';
import {
  GraphDestroyedError,
  isGraphError,
  isUnsetInputError,
  getErrorMessage,
} from '../utils/graph-error';
import { LoggerManager } from '../utils/logging';
import { NodeArena } from './arena';
import { Evaluator } from './evaluator';
import { HookManager } from './hook-manager';
import { InputRegistry } from './input-registry';
import { Invalidator } from './invalidator';
import type { NodeId } from './node-id';
import { TopologyBuilder } from './topology';

let graphCounter = 0;

/**
 * Incremental, memoized dataflow graph over values of type `T`.
 *
 * Input nodes hold values supplied from outside; operation nodes hold pure
 * functions of their inputs. `compute` evaluates lazily and caches every
 * node it evaluates; `setInput` marks everything downstream of the input
 * stale. Setting an input always invalidates, even when the new value
 * equals the old one.
 *
 * All operations are synchronous and assume exclusive access to the graph.
 *
 * @example
 * ```typescript
 * const graph = new ComputationGraph<number>();
 * const a = graph.addInputNode('a');
 * const b = graph.addInputNode('b');
 * const sum = graph.addNode([a, b], ([x, y]) => x + y);
 *
 * graph.setInput('a', 1);
 * graph.setInput('b', 2);
 * graph.compute(sum); // 3
 * ```
 */
export class ComputationGraph<T> {
  readonly graphId: string;

  private readonly arena = new NodeArena<T>();
  private readonly registry = new InputRegistry();
  private readonly topology: TopologyBuilder<T>;
  private readonly invalidator: Invalidator<T>;
  private readonly evaluator: Evaluator<T>;
  private readonly hookManager: HookManager;
  private readonly logger: ILogger;
  private readonly silentErrors: boolean;

  // Indices of the nodes marked stale by each mutation
  private readonly changes$ = new Subject<ReadonlySet<number>>();

  private isDestroyed = false;
  private computeCount = 0;
  private cacheHits = 0;
  private invalidationCount = 0;
  private errorCount = 0;

  constructor(options: IGraphOptions = {}) {
    this.graphId = options.graphId ?? `graph-${++graphCounter}`;
    this.logger = options.logger ?? LoggerManager.getInstance().getLogger();
    this.silentErrors = options.silentErrors ?? false;

    this.hookManager = new HookManager(this.logger);
    this.topology = new TopologyBuilder(this.arena, this.registry);
    this.invalidator = new Invalidator(this.arena);
    this.evaluator = new Evaluator(this.arena, {
      cacheHit: () => {
        this.cacheHits++;
      },
      nodeComputed: (nodeId, durationMs) => {
        this.computeCount++;
        this.logger.logEvent('evaluator', 'node-computed', {
          graphId: this.graphId,
          node: nodeId.index,
        });
        this.hookManager.emit(GraphEventType.NODE_COMPUTED, nodeId, durationMs);
      },
    });

    this.logger.logEvent(
      'graph',
      'creation',
      { graphId: this.graphId, silentErrors: this.silentErrors },
      LogLevel.INFO
    );
  }

  /**
   * Whether `destroy()` has been called
   */
  get destroyed(): boolean {
    return this.isDestroyed;
  }

  /**
   * Number of nodes in the graph
   */
  get size(): number {
    return this.arena.size;
  }

  /**
   * Adds an unset input node, registering `name` when given
   * @throws DuplicateInputNameError if `name` is taken
   */
  addInputNode(name?: string): NodeId {
    this.ensureAlive();
    const id = this.topology.addInputNode(name);

    this.logger.logEvent('graph', 'input-node-added', {
      graphId: this.graphId,
      node: id.index,
      name,
    });
    this.hookManager.emit(GraphEventType.NODE_ADDED, id, 'input');
    if (name !== undefined) {
      this.hookManager.emit(GraphEventType.INPUT_REGISTERED, name, id);
    }
    return id;
  }

  /**
   * Adds an operation node computing `op` over the values of `inputs`
   * @throws InvalidReferenceError if an input is not a node of this graph
   */
  addNode(inputs: readonly NodeId[], op: OperationFn<T>): NodeId {
    this.ensureAlive();
    const id = this.topology.addNode(inputs, op);

    this.logger.logEvent('graph', 'operation-node-added', {
      graphId: this.graphId,
      node: id.index,
      inputs: inputs.map(input => input.index).join(','),
    });
    this.hookManager.emit(GraphEventType.NODE_ADDED, id, 'operation');
    return id;
  }

  /**
   * Binds a symbolic name to an input node
   * @throws DuplicateInputNameError if `name` is taken
   * @throws NotAnInputNodeError if `id` is an operation node
   */
  registerInput(name: string, id: NodeId): void {
    this.ensureAlive();
    this.topology.registerInput(name, id);

    this.logger.logEvent('graph', 'input-registered', {
      graphId: this.graphId,
      node: id.index,
      name,
    });
    this.hookManager.emit(GraphEventType.INPUT_REGISTERED, name, id);
  }

  /**
   * Invalidates everything downstream of the named input, then stores `value`
   * @throws UnknownInputNameError if `name` was never registered
   */
  setInput(name: string, value: T): void {
    this.ensureAlive();
    this.storeInput(this.registry.get(name), name, value);
  }

  /**
   * Same as `setInput`, addressing the input by id
   * @throws NotAnInputNodeError if `id` is an operation node
   */
  setInputNode(id: NodeId, value: T): void {
    this.ensureAlive();
    const node = this.arena.getInput(id);
    this.storeInput(id, node.name, value);
  }

  /**
   * Marks `id` and all of its transitive dependents stale.
   * Invalidating an input clears its value.
   * @returns ids marked stale, starting with `id`
   */
  invalidate(id: NodeId): NodeId[] {
    this.ensureAlive();
    const invalidated = this.invalidateFrom(id);
    this.changes$.next(new Set(invalidated.map(node => node.index)));
    return invalidated;
  }

  /**
   * Returns the up-to-date value of `id`
   * @throws UnsetInputError if an input reached during evaluation has no value
   * @throws NodeComputeError if a node's function throws
   */
  compute(id: NodeId): T {
    this.ensureAlive();
    try {
      return this.evaluator.compute(id);
    } catch (error) {
      this.reportFailure(id, error);
      throw error;
    }
  }

  /**
   * Whether the node's cache slot is empty
   */
  isStale(id: NodeId): boolean {
    this.ensureAlive();
    return this.arena.get(id).cache === undefined;
  }

  /**
   * Cached value of `id` without evaluating anything; `undefined` when stale
   */
  cached(id: NodeId): T | undefined {
    this.ensureAlive();
    return this.arena.get(id).cache?.value;
  }

  /**
   * @throws UnknownInputNameError if `name` was never registered
   */
  getInputId(name: string): NodeId {
    this.ensureAlive();
    return this.registry.get(name);
  }

  /**
   * Whether `name` is registered for some input
   */
  hasInput(name: string): boolean {
    this.ensureAlive();
    return this.registry.has(name);
  }

  /**
   * Registered input names, in registration order
   */
  inputNames(): string[] {
    this.ensureAlive();
    return [...this.registry.names()];
  }

  /**
   * Ordered inputs of a node; empty for input nodes
   */
  inputsOf(id: NodeId): readonly NodeId[] {
    this.ensureAlive();
    const node = this.arena.get(id);
    return node.kind === 'operation' ? node.inputs : [];
  }

  /**
   * Nodes reading `id` directly, in construction order
   */
  dependentsOf(id: NodeId): NodeId[] {
    this.ensureAlive();
    return this.arena.get(id).dependents.map(index => this.arena.at(index).id);
  }

  /**
   * Stream of the node's value. Emits on subscription and again after
   * every mutation that makes the node stale; each emission recomputes.
   * Emissions are skipped while an input the node needs is unset.
   * Errors with NodeComputeError if the node's function throws;
   * completes when the graph is destroyed.
   */
  observeNode(id: NodeId): Observable<T> {
    this.ensureAlive();
    this.arena.assertOwned(id);

    return this.changes$.pipe(
      filter(changed => changed.has(id.index)),
      startWith(undefined),
      concatMap(() => defer(() => this.computeForObserver(id)))
    );
  }

  /**
   * Registers a hook
   * @returns Function to unsubscribe
   */
  on<K extends keyof GraphEventHandlers>(eventType: K, handler: GraphEventHandlers[K]): UnsubscribeFn {
    this.ensureAlive();
    return this.hookManager.on(eventType, handler);
  }

  /**
   * Current counters of the graph
   */
  getStats(): GraphStats {
    this.ensureAlive();
    let freshCount = 0;
    let inputsCount = 0;
    for (const node of this.arena.values()) {
      if (node.cache) {
        freshCount++;
      }
      if (node.kind === 'input') {
        inputsCount++;
      }
    }

    return {
      timestamp: Date.now(),
      graphId: this.graphId,
      nodesCount: this.arena.size,
      inputsCount,
      freshCount,
      computeCount: this.computeCount,
      cacheHits: this.cacheHits,
      invalidationCount: this.invalidationCount,
      errorCount: this.errorCount,
    };
  }

  /**
   * Snapshot of every node, in index order
   */
  exportState(): GraphStateSnapshot<T> {
    this.ensureAlive();
    const nodes: NodeState<T>[] = [];
    for (const node of this.arena.values()) {
      const state: NodeState<T> = {
        index: node.id.index,
        kind: node.kind,
        inputs: node.kind === 'operation' ? node.inputs.map(input => input.index) : [],
        dependents: [...node.dependents],
        stale: node.cache === undefined,
      };
      if (node.kind === 'input' && node.name !== undefined) {
        state.name = node.name;
      }
      if (node.cache) {
        state.value = node.cache.value;
      }
      nodes.push(state);
    }

    return { graphId: this.graphId, timestamp: Date.now(), nodes };
  }

  /**
   * Releases the graph as a whole: drops cached values, completes
   * observation streams and removes hooks. Later calls fail with
   * GraphDestroyedError.
   */
  destroy(): void {
    if (this.isDestroyed) {
      this.logger.logEvent('graph', 'destroy-skipped', {
        graphId: this.graphId,
        reason: 'already-destroyed',
      });
      return;
    }

    this.hookManager.emit(GraphEventType.BEFORE_DESTROY);
    this.isDestroyed = true;

    for (const node of this.arena.values()) {
      node.cache = undefined;
    }
    this.changes$.complete();

    this.logger.logEvent(
      'graph',
      'destroy',
      { graphId: this.graphId, nodesCount: this.arena.size },
      LogLevel.INFO
    );
    this.hookManager.emit(GraphEventType.AFTER_DESTROY);
    this.hookManager.clearAllEvents();
  }

  private storeInput(id: NodeId, name: string | undefined, value: T): void {
    const invalidated = this.invalidateFrom(id);
    this.arena.getInput(id).cache = { value };

    this.logger.logEvent('graph', 'input-set', {
      graphId: this.graphId,
      node: id.index,
      name,
    });
    this.hookManager.emit(GraphEventType.INPUT_SET, name, id);
    this.changes$.next(new Set(invalidated.map(node => node.index)));
  }

  private invalidateFrom(id: NodeId): NodeId[] {
    const invalidated = this.invalidator.invalidate(id);
    this.invalidationCount += invalidated.length;

    this.logger.logEvent('invalidator', 'nodes-invalidated', {
      graphId: this.graphId,
      origin: id.index,
      count: invalidated.length,
    });
    this.hookManager.emit(GraphEventType.NODES_INVALIDATED, invalidated);
    return invalidated;
  }

  private computeForObserver(id: NodeId): Observable<T> {
    if (this.isDestroyed) {
      return EMPTY;
    }
    // Bypasses compute(): waiting on an unset input is not a failure here
    try {
      return of(this.evaluator.compute(id));
    } catch (error) {
      if (isUnsetInputError(error)) {
        this.logger.logEvent('graph', 'observe-skipped', {
          graphId: this.graphId,
          node: id.index,
          reason: getErrorMessage(error),
        });
        return EMPTY;
      }
      this.reportFailure(id, error);
      return throwError(() => error);
    }
  }

  private reportFailure(id: NodeId, error: unknown): void {
    this.errorCount++;
    if (isGraphError(error)) {
      const level = this.silentErrors ? LogLevel.DEBUG : LogLevel.ERROR;
      this.logger.log(level, `Compute of node ${id.toString()} failed: ${error.message}`);
      this.hookManager.emit(GraphEventType.NODE_COMPUTE_ERROR, error.nodeId ?? id, error);
    }
  }

  private ensureAlive(): void {
    if (this.isDestroyed) {
      throw new GraphDestroyedError(this.graphId);
    }
  }
}
