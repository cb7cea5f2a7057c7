import type { GraphNode } from '../types/node';
import type { NodeArena } from './arena';
import type { NodeId } from './node-id';

/**
 * @internal
 * Marks a node and everything downstream of it as stale
 */
export class Invalidator<T> {
  constructor(private readonly arena: NodeArena<T>) {}

  /**
   * Breadth-first walk over reverse edges. Each reachable node is
   * cleared and expanded exactly once, even when several paths lead to it.
   * @returns ids of the nodes marked stale, in visit order
   */
  invalidate(id: NodeId): NodeId[] {
    const visited = new Set<number>([id.index]);
    const queue: GraphNode<T>[] = [this.arena.get(id)];
    const invalidated: NodeId[] = [];

    for (let head = 0; head < queue.length; head++) {
      const node = queue[head];
      node.cache = undefined;
      invalidated.push(node.id);

      for (const dependent of node.dependents) {
        if (!visited.has(dependent)) {
          visited.add(dependent);
          queue.push(this.arena.at(dependent));
        }
      }
    }

    return invalidated;
  }
}
