import type { IGraphOptions } from '../types/graph-options';
import type { NodeState } from '../types/graph-state-snapshot';
import type { OperationFn } from '../types/node';

/**
 * Input declared by key, optionally with an initial value
 */
export interface InputDefinition<T> {
  readonly id: string;
  readonly initial?: { readonly value: T };
}

/**
 * Operation node declared by key.
 * `inputs` name other inputs or nodes; `compute` receives their values in that order.
 */
export interface NodeDefinition<T> {
  readonly id: string;
  readonly inputs: readonly string[];
  readonly compute: OperationFn<T>;
}

/**
 * Graph definition for Build API
 * Immutable representation of the graph before compilation
 */
export interface GraphDefinition<T> {
  readonly inputs: ReadonlyMap<string, InputDefinition<T>>;
  readonly nodes: ReadonlyMap<string, NodeDefinition<T>>;
  readonly options: IGraphOptions;
}

/**
 * Graph operator function
 * Transforms a graph definition, adding inputs, nodes, or configuration
 */
export interface GraphOperator<T> {
  (graph: GraphDefinition<T>): GraphDefinition<T>;
}

/**
 * Operator that does not depend on the value type
 */
export type AnyGraphOperator = <T>(graph: GraphDefinition<T>) => GraphDefinition<T>;

/**
 * Exported state of an executable graph, keyed by node key
 */
export interface ExecutableGraphState<T> {
  readonly graphId: string;
  readonly timestamp: number;
  readonly nodes: Record<string, NodeState<T>>;
}
