import type { NodeKind } from './node';

/**
 * State of a single node at export time
 */
export interface NodeState<T = unknown> {
  index: number;
  kind: NodeKind;
  /**
   * Registered input name, if any
   */
  name?: string;
  inputs: number[];
  dependents: number[];
  stale: boolean;
  /**
   * Cached value; absent when stale
   */
  value?: T;
}

/**
 * Snapshot of the whole graph
 */
export interface GraphStateSnapshot<T = unknown> {
  graphId: string;
  timestamp: number;
  nodes: NodeState<T>[];
}
