// =========================================================
// EVENT EMITTER — INTERNAL EVENT BUS
// =========================================================

import { EventMap, EventType, SystemEvent } from '../types';
import { logger } from './logger';

type EventHandler<K extends EventType> = (event: SystemEvent<K>) => void;
type AnyEventHandler = (event: SystemEvent) => void;

/**
 * Typed event bus for pipeline events. One instance is created per
 * process and handed to every component that publishes or listens.
 */
export class EventBus {
  private handlers: { [K in EventType]?: Set<EventHandler<K>> } = {};
  private allHandlers: Set<AnyEventHandler> = new Set();

  /**
   * Subscribe to a specific event type
   */
  on<K extends EventType>(type: K, handler: EventHandler<K>): () => void {
    const handlers: { [P in K]?: Set<EventHandler<P>> } = this.handlers;
    let set = handlers[type];
    if (!set) {
      set = new Set<EventHandler<K>>();
      handlers[type] = set;
    }
    set.add(handler);

    // Return unsubscribe function
    return () => {
      this.handlers[type]?.delete(handler);
    };
  }

  /**
   * Subscribe to all events
   */
  onAll(handler: AnyEventHandler): () => void {
    this.allHandlers.add(handler);
    return () => {
      this.allHandlers.delete(handler);
    };
  }

  /**
   * Emit an event. Handler errors are logged and never reach the emitter.
   */
  emit<K extends EventType>(type: K, data: EventMap[K]): void {
    const event: SystemEvent<K> = {
      type,
      timestamp: Date.now(),
      data,
    };

    // Notify specific handlers
    const typeHandlers = this.handlers[type];
    if (typeHandlers) {
      for (const handler of typeHandlers) {
        try {
          handler(event);
        } catch (error) {
          logger.error(`Event handler error for ${type}`, { error: String(error) });
        }
      }
    }

    // Notify all handlers
    for (const handler of this.allHandlers) {
      try {
        handler(event);
      } catch (error) {
        logger.error('Event handler error (all)', { error: String(error) });
      }
    }
  }
}
