/**
 * Type-Safe Event Bus
 *
 * Strongly-typed pub/sub used to report pass progress to the CLI and
 * other observers. Config change handlers do not go through the bus; they
 * are bound by path pattern in the EventRegistry.
 *
 * @module
 */

// =============================================================================
// Event Types
// =============================================================================

/**
 * Event handler function type
 */
export type EventHandler<T> = (payload: T) => void;

type HandlerTable<Events> = { [K in keyof Events]?: Set<EventHandler<Events[K]>> };

// =============================================================================
// Event Bus Implementation
// =============================================================================

/**
 * Type-safe event emitter for decoupled communication.
 *
 * @example
 * ```typescript
 * interface MyEvents {
 *   'config:applied': { eventCount: number };
 * }
 *
 * const bus = new EventBus<MyEvents>();
 * bus.on('config:applied', ({ eventCount }) => console.log(eventCount));
 * bus.emit('config:applied', { eventCount: 3 });
 * ```
 */
export class EventBus<Events extends object> {
  private handlers: HandlerTable<Events> = {};

  /**
   * Subscribes to an event.
   *
   * @returns Unsubscribe function
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let set = this.handlers[event];
    if (!set) {
      set = new Set();
      this.handlers[event] = set;
    }
    set.add(handler);

    return () => this.off(event, handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    this.handlers[event]?.delete(handler);
  }

  /**
   * Emits an event to all subscribers, in subscription order.
   */
  emit<K extends keyof Events>(event: K, payload: Events[K]): void {
    const set = this.handlers[event];
    if (!set) return;
    for (const handler of [...set]) {
      handler(payload);
    }
  }

  /**
   * Subscribes to an event for a single emission.
   */
  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const wrappedHandler: EventHandler<Events[K]> = (payload) => {
      this.off(event, wrappedHandler);
      handler(payload);
    };
    return this.on(event, wrappedHandler);
  }

  /**
   * Removes all handlers for a specific event or all events.
   */
  clear<K extends keyof Events>(event?: K): void {
    if (event !== undefined) {
      delete this.handlers[event];
    } else {
      this.handlers = {};
    }
  }

  listenerCount<K extends keyof Events>(event: K): number {
    return this.handlers[event]?.size ?? 0;
  }
}
