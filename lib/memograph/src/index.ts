// ============================================
// Imperative API
// ============================================
export { ComputationGraph, NodeId } from './engine';
export type { EvaluationListener } from './engine';
// ============================================
// Build API
// ============================================
export { createGraph, ExecutableGraph, topologicalOrder } from './graph';
export type {
  AnyGraphOperator,
  ExecutableGraphState,
  GraphDefinition,
  GraphOperator,
  InputDefinition,
  NodeDefinition,
} from './graph';
export { withInputs, withNodes, withOptions, withLoggerProvider } from './operators';
export type { GraphOptions } from './operators';
// ============================================
// Types
// ============================================
export type { OperationFn, NodeKind, CacheSlot } from './types/node';
export type { IGraphOptions } from './types/graph-options';
export { GraphEventType } from './types/graph-hooks';
export type { GraphEventHandlers, UnsubscribeFn } from './types/graph-hooks';
export type { GraphStats } from './types/graph-stats';
export type { GraphStateSnapshot, NodeState } from './types/graph-state-snapshot';
export { LogLevel } from './types/logger';
export type { ILogger, LogMetadata } from './types/logger';
// ============================================
// Errors
// ============================================
export {
  GraphError,
  GraphErrorCode,
  UnknownInputNameError,
  UnsetInputError,
  InvalidReferenceError,
  DuplicateInputNameError,
  NotAnInputNodeError,
  NodeComputeError,
  DuplicateNodeKeyError,
  CyclicDependencyError,
  GraphDestroyedError,
  isGraphError,
  isUnsetInputError,
  isUnknownInputNameError,
  isNodeComputeError,
  getErrorMessage,
} from './utils/graph-error';
// ============================================
// Logging
// ============================================
export { LoggerAdapter, ConsoleLoggerAdapter, LoggerManager } from './utils/logging';
