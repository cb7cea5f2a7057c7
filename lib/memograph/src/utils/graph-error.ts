import type { NodeId } from '../engine/node-id';

/**
 * Machine-readable error codes
 */
export enum GraphErrorCode {
  UNKNOWN_INPUT_NAME = 'UNKNOWN_INPUT_NAME',
  UNSET_INPUT = 'UNSET_INPUT',
  INVALID_REFERENCE = 'INVALID_REFERENCE',
  DUPLICATE_INPUT_NAME = 'DUPLICATE_INPUT_NAME',
  NOT_AN_INPUT_NODE = 'NOT_AN_INPUT_NODE',
  NODE_COMPUTE_FAILED = 'NODE_COMPUTE_FAILED',
  DUPLICATE_NODE_KEY = 'DUPLICATE_NODE_KEY',
  CYCLIC_DEPENDENCY = 'CYCLIC_DEPENDENCY',
  GRAPH_DESTROYED = 'GRAPH_DESTROYED',
}

/**
 * Base class of every error raised by the graph.
 *
 * Extends standard Error with a code and, where one is involved,
 * the node the failure was detected on.
 */
export class GraphError extends Error {
  public readonly code: GraphErrorCode;

  public readonly nodeId?: NodeId;

  /**
   * Original error, if exists
   */
  public readonly originalError?: Error;

  constructor(code: GraphErrorCode, message: string, nodeId?: NodeId, originalError?: Error) {
    super(message);
    this.name = 'GraphError';
    this.code = code;
    this.nodeId = nodeId;
    this.originalError = originalError;

    if (originalError?.stack) {
      this.stack = `${this.stack}\nCaused by: ${originalError.stack}`;
    }

    Object.setPrototypeOf(this, new.target.prototype);
  }

  public override toString(): string {
    return this.nodeId
      ? `[${this.name} in ${this.nodeId.toString()}] ${this.message}`
      : `[${this.name}] ${this.message}`;
  }

  toJSON(): {
    readonly name: string;
    readonly code: GraphErrorCode;
    readonly message: string;
    readonly nodeIndex?: number;
    readonly originalError?: {
      readonly name: string;
      readonly message: string;
    };
  } {
    return {
      name: this.name,
      code: this.code,
      message: this.message,
      nodeIndex: this.nodeId?.index,
      originalError: this.originalError
        ? {
            name: this.originalError.name,
            message: this.originalError.message,
          }
        : undefined,
    };
  }
}

/**
 * `setInput` or a lookup used a name that was never registered
 */
export class UnknownInputNameError extends GraphError {
  constructor(public readonly inputName: string) {
    super(GraphErrorCode.UNKNOWN_INPUT_NAME, `Unknown input name '${inputName}'`);
    this.name = 'UnknownInputNameError';
  }
}

/**
 * Evaluation reached an input node whose value was never provided
 */
export class UnsetInputError extends GraphError {
  constructor(
    nodeId: NodeId,
    public readonly inputName?: string
  ) {
    super(
      GraphErrorCode.UNSET_INPUT,
      inputName === undefined
        ? `Input node ${nodeId.toString()} has no value`
        : `Input '${inputName}' has no value`,
      nodeId
    );
    this.name = 'UnsetInputError';
  }
}

/**
 * A node id (or Build API key) that does not belong to this graph
 */
export class InvalidReferenceError extends GraphError {
  constructor(message: string, nodeId?: NodeId) {
    super(GraphErrorCode.INVALID_REFERENCE, message, nodeId);
    this.name = 'InvalidReferenceError';
  }
}

export class DuplicateInputNameError extends GraphError {
  constructor(
    public readonly inputName: string,
    existing: NodeId
  ) {
    super(
      GraphErrorCode.DUPLICATE_INPUT_NAME,
      `Input name '${inputName}' is already registered for node ${existing.toString()}`,
      existing
    );
    this.name = 'DuplicateInputNameError';
  }
}

/**
 * An input-only operation was given an operation node
 */
export class NotAnInputNodeError extends GraphError {
  constructor(nodeId: NodeId) {
    super(
      GraphErrorCode.NOT_AN_INPUT_NODE,
      `Node ${nodeId.toString()} is an operation node, not an input`,
      nodeId
    );
    this.name = 'NotAnInputNodeError';
  }
}

/**
 * A node's function threw while being evaluated
 */
export class NodeComputeError extends GraphError {
  constructor(nodeId: NodeId, originalError: Error) {
    super(
      GraphErrorCode.NODE_COMPUTE_FAILED,
      `Computation of node ${nodeId.toString()} failed: ${originalError.message}`,
      nodeId,
      originalError
    );
    this.name = 'NodeComputeError';
  }
}

export class DuplicateNodeKeyError extends GraphError {
  constructor(public readonly key: string) {
    super(GraphErrorCode.DUPLICATE_NODE_KEY, `Node key '${key}' is declared more than once`);
    this.name = 'DuplicateNodeKeyError';
  }
}

export class CyclicDependencyError extends GraphError {
  constructor(public readonly keys: readonly string[]) {
    super(GraphErrorCode.CYCLIC_DEPENDENCY, `Dependency cycle between nodes: ${keys.join(', ')}`);
    this.name = 'CyclicDependencyError';
  }
}

export class GraphDestroyedError extends GraphError {
  constructor(graphId: string) {
    super(GraphErrorCode.GRAPH_DESTROYED, `Graph '${graphId}' has been destroyed`);
    this.name = 'GraphDestroyedError';
  }
}

export function isGraphError(error: unknown): error is GraphError {
  return error instanceof GraphError;
}

export function isUnsetInputError(error: unknown): error is UnsetInputError {
  return error instanceof UnsetInputError;
}

export function isUnknownInputNameError(error: unknown): error is UnknownInputNameError {
  return error instanceof UnknownInputNameError;
}

export function isNodeComputeError(error: unknown): error is NodeComputeError {
  return error instanceof NodeComputeError;
}

/**
 * Safely extracts error message from unknown error type
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Normalizes a thrown value to an Error instance
 */
export function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(getErrorMessage(error));
}
