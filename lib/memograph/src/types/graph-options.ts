import type { ILogger } from './logger';

/**
 * Options for graph creation
 */
export interface IGraphOptions {
  /**
   * Identifier used in logs, stats and errors. Generated when omitted.
   */
  graphId?: string;

  /**
   * Logger for this graph. Falls back to LoggerManager's logger.
   */
  logger?: ILogger;

  /**
   * Log node computation failures at DEBUG instead of ERROR.
   * Failures are still thrown to the caller.
   */
  silentErrors?: boolean;
}
