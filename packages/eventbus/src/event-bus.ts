import type { EventHandler, IEventBus } from '@promptgate/core';
import { createLogger } from '@promptgate/core';

const log = createLogger('EventBus');

/**
 * In-process pub/sub. Handlers run synchronously in subscription order; a
 * throwing handler is reported and does not stop the others.
 */
export class EventBus implements IEventBus {
  private handlers = new Map<string, Set<EventHandler>>();

  on(event: string, handler: EventHandler): () => void {
    let set = this.handlers.get(event);
    if (!set) {
      set = new Set();
      this.handlers.set(event, set);
    }
    set.add(handler);
    return () => {
      this.handlers.get(event)?.delete(handler);
    };
  }

  once(event: string, handler: EventHandler): void {
    const unsubscribe = this.on(event, (payload) => {
      unsubscribe();
      handler(payload);
    });
  }

  emit(event: string, payload: unknown): void {
    const set = this.handlers.get(event);
    if (!set) return;
    for (const handler of [...set]) {
      try {
        handler(payload);
      } catch (error) {
        log.error(`Error in handler for "${event}"`, {
          error: error instanceof Error ? error.message : String(error),
        });
      }
    }
  }

  removeAllListeners(event?: string): void {
    if (event) {
      this.handlers.delete(event);
    } else {
      this.handlers.clear();
    }
  }

  listenerCount(event: string): number {
    return this.handlers.get(event)?.size ?? 0;
  }
}
