import type { AnyGraphOperator } from '../graph';
import type { IGraphOptions } from '../types/graph-options';

/**
 * Graph options settable through the Build API;
 * the logger goes through withLoggerProvider
 */
export type GraphOptions = Omit<IGraphOptions, 'logger'>;

/**
 * Applies graph options. Later calls override earlier ones key by key.
 * @throws Error if options is not an object
 */
export function withOptions(options: GraphOptions): AnyGraphOperator {
  if (!options || typeof options !== 'object') {
    throw new Error('withOptions: options must be an object');
  }
  if (options.graphId !== undefined && options.graphId.trim() === '') {
    throw new Error('withOptions: graphId must not be empty');
  }

  return graph => ({
    ...graph,
    options: {
      ...graph.options,
      ...options,
    },
  });
}
