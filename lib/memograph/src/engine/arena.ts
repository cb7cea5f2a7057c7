import type { GraphNode, InputNode, OperationFn, OperationNode } from '../types/node';
import { InvalidReferenceError, NotAnInputNodeError } from '../utils/graph-error';
import { NodeId } from './node-id';

let nextArenaId = 0;

/**
 * @internal
 * Single owner of every node of one graph.
 *
 * Nodes are stored in construction order and never removed, so an index
 * handed out once stays valid for the arena's lifetime. Edges only point
 * to lower indices; any traversal that resolves inputs first terminates.
 */
export class NodeArena<T> {
  readonly arenaId = nextArenaId++;

  private readonly nodes: GraphNode<T>[] = [];

  /**
   * Number of nodes
   */
  get size(): number {
    return this.nodes.length;
  }

  /**
   * Appends an input node with an empty cache
   */
  addInput(): NodeId {
    const id = this.nextId();
    const node: InputNode<T> = {
      kind: 'input',
      id,
      cache: undefined,
      dependents: [],
    };
    this.nodes.push(node);
    return id;
  }

  /**
   * Appends an operation node. Inputs must already be validated.
   */
  addOperation(inputs: readonly NodeId[], op: OperationFn<T>): NodeId {
    const id = this.nextId();
    const node: OperationNode<T> = {
      kind: 'operation',
      id,
      cache: undefined,
      dependents: [],
      inputs,
      op,
    };
    this.nodes.push(node);
    return id;
  }

  /**
   * Resolves an id minted by this arena
   * @throws InvalidReferenceError for foreign or out-of-range ids
   */
  get(id: NodeId): GraphNode<T> {
    this.assertOwned(id);
    return this.at(id.index);
  }

  /**
   * Resolves an id that must point to an input node
   * @throws NotAnInputNodeError for operation nodes
   */
  getInput(id: NodeId): InputNode<T> {
    const node = this.get(id);
    if (node.kind !== 'input') {
      throw new NotAnInputNodeError(id);
    }
    return node;
  }

  /**
   * Index-based access for traversals that only follow recorded edges
   */
  at(index: number): GraphNode<T> {
    const node = this.nodes[index];
    if (node === undefined) {
      throw new InvalidReferenceError(`Node index ${index} is out of range`);
    }
    return node;
  }

  /**
   * Whether `id` was minted by this arena
   */
  has(id: NodeId): boolean {
    return id.arenaId === this.arenaId && id.index >= 0 && id.index < this.nodes.length;
  }

  /**
   * @throws InvalidReferenceError if `id` is foreign or out of range
   */
  assertOwned(id: NodeId): void {
    if (id.arenaId !== this.arenaId) {
      throw new InvalidReferenceError(
        `Node ${id.toString()} belongs to another graph`,
        id
      );
    }
    if (id.index < 0 || id.index >= this.nodes.length) {
      throw new InvalidReferenceError(`Node ${id.toString()} does not exist`, id);
    }
  }

  /**
   * Nodes in index order
   */
  values(): IterableIterator<GraphNode<T>> {
    return this.nodes.values();
  }

  private nextId(): NodeId {
    return new NodeId(this.arenaId, this.nodes.length);
  }
}
