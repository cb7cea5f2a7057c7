import type {
  GraphEventHandlers,
  IHookManager,
  UnsubscribeFn,
} from '../types/graph-hooks';
import type { ILogger } from '../types/logger';
import { getErrorMessage } from '../utils/graph-error';

type EventKey = keyof GraphEventHandlers;
type RegisteredHandler = GraphEventHandlers[EventKey];

/**
 * @internal
 * Per-event handler sets of a single graph.
 *
 * Handlers run synchronously in registration order. A handler that throws
 * is logged; the remaining handlers and the emitting operation proceed.
 */
export class HookManager implements IHookManager {
  private readonly handlers = new Map<EventKey, Set<RegisteredHandler>>();

  constructor(private readonly logger: ILogger) {}

  /**
   * Registers a handler
   * @returns Function to unsubscribe
   */
  public on<K extends EventKey>(eventType: K, handler: GraphEventHandlers[K]): UnsubscribeFn {
    let registered = this.handlers.get(eventType);
    if (!registered) {
      registered = new Set();
      this.handlers.set(eventType, registered);
    }
    registered.add(handler);

    const owner = registered;
    return () => {
      owner.delete(handler);
    };
  }

  /**
   * Calls every handler of `eventType` with `args`
   */
  public emit<K extends EventKey>(eventType: K, ...args: Parameters<GraphEventHandlers[K]>): void {
    const registered = this.handlers.get(eventType);
    if (!registered?.size) {
      return;
    }

    // Snapshot, so handlers may unsubscribe while being called
    for (const handler of [...registered]) {
      try {
        Reflect.apply(handler, undefined, args);
      } catch (error) {
        this.logger.error(`Error in event handler ${eventType}: ${getErrorMessage(error)}`, error);
      }
    }
  }

  /**
   * Removes every handler
   */
  public clearAllEvents(): void {
    this.handlers.clear();
  }
}
