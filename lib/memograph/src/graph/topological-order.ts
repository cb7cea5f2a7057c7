import { CyclicDependencyError } from '../utils/graph-error';
import type { NodeDefinition } from './operator-types';

/**
 * Orders node definitions so that every node comes after the nodes it reads.
 * Ties keep declaration order. References to keys outside `nodes` (inputs)
 * are ignored here.
 * @throws CyclicDependencyError naming the keys of one cycle
 */
export function topologicalOrder<T>(
  nodes: ReadonlyMap<string, NodeDefinition<T>>
): NodeDefinition<T>[] {
  const pending = new Map<string, number>();
  const readers = new Map<string, string[]>();

  for (const def of nodes.values()) {
    let unresolved = 0;
    for (const ref of new Set(def.inputs)) {
      if (!nodes.has(ref)) {
        continue;
      }
      unresolved++;
      const list = readers.get(ref);
      if (list) {
        list.push(def.id);
      } else {
        readers.set(ref, [def.id]);
      }
    }
    pending.set(def.id, unresolved);
  }

  const ordered = [...nodes.values()].filter(def => pending.get(def.id) === 0);
  for (let head = 0; head < ordered.length; head++) {
    for (const reader of readers.get(ordered[head].id) ?? []) {
      const left = (pending.get(reader) ?? 0) - 1;
      pending.set(reader, left);
      const readerDef = nodes.get(reader);
      if (left === 0 && readerDef) {
        ordered.push(readerDef);
      }
    }
  }

  if (ordered.length < nodes.size) {
    const remaining = new Set([...pending].filter(([, left]) => left > 0).map(([key]) => key));
    throw new CyclicDependencyError(findCycle(remaining, nodes));
  }
  return ordered;
}

/**
 * Every remaining node still waits on another remaining node,
 * so following those edges must eventually revisit a key.
 */
function findCycle<T>(
  remaining: ReadonlySet<string>,
  nodes: ReadonlyMap<string, NodeDefinition<T>>
): string[] {
  const path: string[] = [];
  const position = new Map<string, number>();
  let current: string | undefined = [...remaining][0];

  while (current !== undefined && !position.has(current)) {
    position.set(current, path.length);
    path.push(current);
    current = nodes.get(current)?.inputs.find(ref => remaining.has(ref));
  }

  return current === undefined ? path : path.slice(position.get(current));
}
