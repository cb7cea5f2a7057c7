import { DuplicateInputNameError, UnknownInputNameError } from '../utils/graph-error';
import type { NodeId } from './node-id';

/**
 * @internal
 * Maps symbolic input names to the ids of their leaf nodes
 */
export class InputRegistry {
  private readonly inputs = new Map<string, NodeId>();

  /**
   * Binds a name to a node id
   * @throws DuplicateInputNameError if name is already registered
   */
  register(name: string, id: NodeId): void {
    const existing = this.inputs.get(name);
    if (existing) {
      throw new DuplicateInputNameError(name, existing);
    }
    this.inputs.set(name, id);
  }

  /**
   * Gets node id by name
   * @throws UnknownInputNameError if name is not registered
   */
  get(name: string): NodeId {
    const id = this.inputs.get(name);
    if (!id) {
      throw new UnknownInputNameError(name);
    }
    return id;
  }

  /**
   * Whether `name` is registered
   */
  has(name: string): boolean {
    return this.inputs.has(name);
  }

  /**
   * Names in registration order
   */
  names(): IterableIterator<string> {
    return this.inputs.keys();
  }

  /**
   * Number of registered names
   */
  public get size(): number {
    return this.inputs.size;
  }
}
