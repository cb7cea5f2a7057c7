import type { AnyGraphOperator, GraphOperator, InputDefinition } from '../graph';
import { DuplicateNodeKeyError } from '../utils/graph-error';

/**
 * Declares input nodes, either by name or with initial values
 *
 * @example
 * ```typescript
 * createGraph<number>(
 *   withInputs(['x1', 'x2']),          // unset until graph.set()
 *   withInputs({ rate: 0.2, fee: 5 })  // set at creation
 * );
 * ```
 */
export function withInputs(names: readonly string[]): AnyGraphOperator;
export function withInputs<T>(values: Readonly<Record<string, T>>): GraphOperator<T>;
export function withInputs<T>(
  declared: readonly string[] | Readonly<Record<string, T>>
): GraphOperator<T> {
  const definitions: InputDefinition<T>[] = isNameList(declared)
    ? declared.map(id => ({ id }))
    : Object.entries(declared).map(([id, value]) => ({ id, initial: { value } }));

  return graph => {
    const inputs = new Map(graph.inputs);
    for (const definition of definitions) {
      if (inputs.has(definition.id) || graph.nodes.has(definition.id)) {
        throw new DuplicateNodeKeyError(definition.id);
      }
      inputs.set(definition.id, definition);
    }
    return { ...graph, inputs };
  };
}

function isNameList<T>(
  declared: readonly string[] | Readonly<Record<string, T>>
): declared is readonly string[] {
  return Array.isArray(declared);
}
