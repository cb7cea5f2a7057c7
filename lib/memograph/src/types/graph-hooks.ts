import type { NodeId } from '../engine/node-id';
import type { NodeKind } from './node';
import type { GraphError } from '../utils/graph-error';

/**
 * Types of all graph events
 */
export enum GraphEventType {
  NODE_ADDED = 'nodeAdded',
  INPUT_REGISTERED = 'inputRegistered',
  INPUT_SET = 'inputSet',
  NODES_INVALIDATED = 'nodesInvalidated',
  NODE_COMPUTED = 'nodeComputed',
  NODE_COMPUTE_ERROR = 'nodeComputeError',
  BEFORE_DESTROY = 'beforeDestroy',
  AFTER_DESTROY = 'afterDestroy',
}

/**
 * Handler type for each event
 */
export interface GraphEventHandlers {
  [GraphEventType.NODE_ADDED]: (nodeId: NodeId, kind: NodeKind) => void;
  [GraphEventType.INPUT_REGISTERED]: (name: string, nodeId: NodeId) => void;
  /** `name` is undefined when an unnamed input was set by id */
  [GraphEventType.INPUT_SET]: (name: string | undefined, nodeId: NodeId) => void;
  [GraphEventType.NODES_INVALIDATED]: (nodeIds: readonly NodeId[]) => void;
  [GraphEventType.NODE_COMPUTED]: (nodeId: NodeId, durationMs: number) => void;
  [GraphEventType.NODE_COMPUTE_ERROR]: (nodeId: NodeId, error: GraphError) => void;
  [GraphEventType.BEFORE_DESTROY]: () => void;
  [GraphEventType.AFTER_DESTROY]: () => void;
}

/**
 * Function type for hook unregistration
 */
export type UnsubscribeFn = () => void;

/**
 * Interface for hook management
 */
export interface IHookManager {
  /**
   * Subscribe to event with cancellation capability
   * @returns Function to unsubscribe
   */
  on<K extends keyof GraphEventHandlers>(eventType: K, handler: GraphEventHandlers[K]): UnsubscribeFn;

  /**
   * Call all handlers for specified event
   */
  emit<K extends keyof GraphEventHandlers>(
    eventType: K,
    ...args: Parameters<GraphEventHandlers[K]>
  ): void;

  /**
   * Cancel all subscriptions to all events
   */
  clearAllEvents(): void;
}
