import type { NodeId } from '../engine/node-id';

/**
 * Pure function of a node's ordered input values
 */
export type OperationFn<T> = (inputs: readonly T[]) => T;

export type NodeKind = 'input' | 'operation';

/**
 * Cache slot of a node. `undefined` means stale.
 * The wrapper keeps `undefined` usable as a node value.
 */
export interface CacheSlot<T> {
  readonly value: T;
}

interface BaseNode<T> {
  readonly id: NodeId;
  cache: CacheSlot<T> | undefined;
  /**
   * Indices of nodes reading this node; filled once at their construction
   */
  readonly dependents: number[];
}

export interface InputNode<T> extends BaseNode<T> {
  readonly kind: 'input';
  name?: string;
}

export interface OperationNode<T> extends BaseNode<T> {
  readonly kind: 'operation';
  readonly inputs: readonly NodeId[];
  readonly op: OperationFn<T>;
}

export type GraphNode<T> = InputNode<T> | OperationNode<T>;
