import type { OperationFn } from '../types/node';
import {
  DuplicateInputNameError,
  InvalidReferenceError,
  NotAnInputNodeError,
} from '../utils/graph-error';
import type { NodeArena } from './arena';
import type { InputRegistry } from './input-registry';
import type { NodeId } from './node-id';

/**
 * @internal
 * Append-only construction of the graph.
 * Records every edge in both directions at node creation.
 */
export class TopologyBuilder<T> {
  constructor(
    private readonly arena: NodeArena<T>,
    private readonly registry: InputRegistry
  ) {}

  /**
   * Creates an unset leaf, registering `name` when given
   */
  addInputNode(name?: string): NodeId {
    // Checked before appending so a duplicate leaves no orphan node behind
    if (name !== undefined && this.registry.has(name)) {
      throw new DuplicateInputNameError(name, this.registry.get(name));
    }
    const id = this.arena.addInput();
    if (name !== undefined) {
      this.registerInput(name, id);
    }
    return id;
  }

  /**
   * Creates an operation node over `inputs`, in argument order
   * @throws InvalidReferenceError if an input is not a node of this arena
   */
  addNode(inputs: readonly NodeId[], op: OperationFn<T>): NodeId {
    for (const input of inputs) {
      if (!this.arena.has(input)) {
        throw new InvalidReferenceError(
          `Operation input ${input.toString()} is not a node of this graph`,
          input
        );
      }
    }

    const id = this.arena.addOperation([...inputs], op);
    for (const input of inputs) {
      const dependents = this.arena.at(input.index).dependents;
      // The same input may be listed twice; one reverse edge is enough
      if (dependents[dependents.length - 1] !== id.index) {
        dependents.push(id.index);
      }
    }
    return id;
  }

  /**
   * Binds a name to an existing input node
   */
  registerInput(name: string, id: NodeId): void {
    const node = this.arena.get(id);
    if (node.kind !== 'input') {
      throw new NotAnInputNodeError(id);
    }
    this.registry.register(name, id);
    node.name ??= name;
  }
}
