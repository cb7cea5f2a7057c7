/**
 * Counters describing a graph, for monitoring and tests
 */
export interface GraphStats {
  /**
   * Timestamp of statistics collection
   */
  timestamp: number;

  graphId: string;

  /**
   * Number of nodes in the arena, inputs included
   */
  nodesCount: number;

  /**
   * Number of input nodes, named or not
   */
  inputsCount: number;

  /**
   * Nodes whose cache slot currently holds a value
   */
  freshCount: number;

  /**
   * Operation function invocations since creation
   */
  computeCount: number;

  /**
   * Reads answered from a fresh cache slot
   */
  cacheHits: number;

  /**
   * Nodes marked stale, summed over all invalidations
   */
  invalidationCount: number;

  /**
   * Failed compute calls since creation
   */
  errorCount: number;
}
