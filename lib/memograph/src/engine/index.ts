export { ComputationGraph } from './engine';
export { NodeId } from './node-id';
export { NodeArena } from './arena';
export { InputRegistry } from './input-registry';
export { TopologyBuilder } from './topology';
export { Invalidator } from './invalidator';
export { Evaluator } from './evaluator';
export type { EvaluationListener } from './evaluator';
export { HookManager } from './hook-manager';
