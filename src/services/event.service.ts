/**
 * EventService
 *
 * In-process dispatcher for lifecycle events. The subscription service
 * publishes only after its changeset has committed. Handlers run in
 * registration order; a failing handler is logged and the rest still run.
 */

import { logger as defaultLogger, type Logger } from '@/lib/logger.js';
import type {
  EntitlementEvent,
  EntitlementEventType,
  EventOfType,
} from '@/types/index.js';

export type EventHandler<T extends EntitlementEventType> = (
  event: EventOfType<T>
) => void | Promise<void>;

export type AnyEventHandler = (event: EntitlementEvent) => void | Promise<void>;

export interface EventService {
  on<T extends EntitlementEventType>(type: T, handler: EventHandler<T>): () => void;
  onAny(handler: AnyEventHandler): () => void;
  publish(events: EntitlementEvent[]): Promise<void>;
}

export function isEventOfType<T extends EntitlementEventType>(
  event: EntitlementEvent,
  type: T
): event is EventOfType<T> {
  return event.type === type;
}

export function createEventService(deps: { logger?: Logger } = {}): EventService {
  const log = deps.logger ?? defaultLogger;
  const handlers: AnyEventHandler[] = [];

  function register(handler: AnyEventHandler): () => void {
    handlers.push(handler);
    return () => {
      const index = handlers.indexOf(handler);
      if (index !== -1) {
        handlers.splice(index, 1);
      }
    };
  }

  return {
    on(type, handler) {
      return register(async (event) => {
        if (isEventOfType(event, type)) {
          await handler(event);
        }
      });
    },

    onAny(handler) {
      return register(handler);
    },

    async publish(events) {
      for (const event of events) {
        for (const handler of [...handlers]) {
          try {
            await handler(event);
          } catch (error) {
            log.error('Event handler failed', error, {
              requestId: event.requestId,
              eventType: event.type,
              subscriberType: event.subscriber.type,
              subscriberId: event.subscriber.id,
            });
          }
        }
      }
    },
  };
}
