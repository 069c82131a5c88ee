import { DomainEvent } from '@/types/event.types';
import { StreamEntry } from '@/types/eventLog.types';
import { EventHandler } from './eventConsumer.service';
import logger from '@/utils/pinoLogger';

/**
 * Dispatches consumed events to one handler per event type. Types without a
 * handler are logged and count as handled.
 */
export class EventRouter {
    #_routes = new Map<string, EventHandler>();

    public register(eventType : string, handler : EventHandler) : this {
        this.#_routes.set(eventType, handler);
        return this;
    }

    public handles(eventType : string) : boolean {
        return this.#_routes.has(eventType);
    }

    public route = async (event : DomainEvent, entry : StreamEntry) : Promise<void> => {
        const handler = this.#_routes.get(event.eventType);
        if (!handler) {
            logger.warn(`No handler registered for event type: ${event.eventType}`, { position : entry.position });
            return;
        }
        await handler(event, entry);
    }
}
