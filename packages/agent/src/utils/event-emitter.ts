/**
 * Typed event emitter
 *
 * Minimal listener registry used by connections and the topology manager.
 * A throwing handler is logged and does not stop delivery to the others.
 *
 * @packageDocumentation
 */

import { createNoopLogger, type StructuredLogger } from '../logging/index.js';

export type EventHandler<T> = (data: T) => void;

/**
 * @example
 * ```typescript
 * const events = new TypedEventEmitter<{ close: Error | null }>();
 * const off = events.on('close', error => console.log('closed', error));
 * events.emit('close', null);
 * off();
 * ```
 */
export class TypedEventEmitter<Events extends object> {
  private listeners: { [K in keyof Events]?: Set<EventHandler<Events[K]>> } = {};
  private readonly logger: StructuredLogger;

  constructor(logger: StructuredLogger = createNoopLogger()) {
    this.logger = logger;
  }

  /**
   * Register a listener.
   *
   * @returns a function that removes it
   */
  on<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    let handlers = this.listeners[event];
    if (!handlers) {
      handlers = new Set();
      this.listeners[event] = handlers;
    }
    handlers.add(handler);
    return () => this.off(event, handler);
  }

  off<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): void {
    const handlers = this.listeners[event];
    if (handlers) {
      handlers.delete(handler);
      if (handlers.size === 0) {
        delete this.listeners[event];
      }
    }
  }

  once<K extends keyof Events>(event: K, handler: EventHandler<Events[K]>): () => void {
    const onceHandler: EventHandler<Events[K]> = data => {
      this.off(event, onceHandler);
      handler(data);
    };
    return this.on(event, onceHandler);
  }

  emit<K extends keyof Events>(event: K, data: Events[K]): void {
    const handlers = this.listeners[event];
    if (!handlers) {
      return;
    }
    for (const handler of [...handlers]) {
      try {
        handler(data);
      } catch (error) {
        this.logger.error(
          'error in {event} event handler',
          error instanceof Error ? error : new Error(String(error)),
          { event: String(event) }
        );
      }
    }
  }

  clear(event?: keyof Events): void {
    if (event === undefined) {
      this.listeners = {};
    } else {
      delete this.listeners[event];
    }
  }

  listenerCount(event: keyof Events): number {
    return this.listeners[event]?.size ?? 0;
  }
}
