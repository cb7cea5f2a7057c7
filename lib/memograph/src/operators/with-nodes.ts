import type { GraphOperator, NodeDefinition } from '../graph';
import { DuplicateNodeKeyError } from '../utils/graph-error';

/**
 * Declares operation nodes. Definitions may reference keys declared
 * later or by other operators; order is resolved when the graph is created.
 */
export function withNodes<T>(nodes: readonly NodeDefinition<T>[]): GraphOperator<T> {
  return graph => {
    const merged = new Map(graph.nodes);
    for (const node of nodes) {
      if (merged.has(node.id) || graph.inputs.has(node.id)) {
        throw new DuplicateNodeKeyError(node.id);
      }
      merged.set(node.id, node);
    }
    return { ...graph, nodes: merged };
  };
}
