import type { AnyGraphOperator } from '../graph';
import type { ILogger } from '../types/logger';

/**
 * Registers a logger for the graph
 *
 * @example
 * ```typescript
 * const graph = createGraph<number>(
 *   withLoggerProvider(new ConsoleLoggerAdapter(LogLevel.DEBUG)),
 *   withInputs(['x'])
 * );
 * ```
 */
export function withLoggerProvider(provider: ILogger): AnyGraphOperator {
  return graph => ({
    ...graph,
    options: {
      ...graph.options,
      logger: provider,
    },
  });
}
