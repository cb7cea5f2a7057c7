export { createGraph, ExecutableGraph } from './graph';
export { topologicalOrder } from './topological-order';
export type {
  AnyGraphOperator,
  ExecutableGraphState,
  GraphDefinition,
  GraphOperator,
  InputDefinition,
  NodeDefinition,
} from './operator-types';
