import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { IEventLog } from '@/providers/interfaces/IEventLog.interface';
import { EventRegistry } from './eventRegistry';
import { DomainEvent } from '@/types/event.types';
import { LogPosition, StreamEntry } from '@/types/eventLog.types';
import { nextPosition } from '@/utils/streamPosition';
import logger, { describeError } from '@/utils/pinoLogger';

export interface StoredEvent {
    position : LogPosition;
    event : DomainEvent;
}

const PAGE_SIZE = 100;

/**
 * Read-side access to the log outside consumer groups: full replays and a
 * view of the most recent entries.
 */
@injectable()
export class EventStore {
    #_eventLog : IEventLog
    #_registry : EventRegistry

    constructor(
        @inject(TYPES.IEventLog) eventLog : IEventLog,
        @inject(TYPES.EventRegistry) registry : EventRegistry
    ){
        this.#_eventLog = eventLog
        this.#_registry = registry
    }

    /**
     * Feeds every decodable event from `fromPosition` onward to `handler`,
     * in log order. Returns how many events were handled.
     */
    async replay(
        topic : string,
        handler : (stored : StoredEvent) => Promise<void>,
        fromPosition : LogPosition = '0-0'
    ) : Promise<number> {
        let cursor = fromPosition;
        let handled = 0;
        while (true) {
            const page = await this.#_eventLog.readRange(topic, cursor, PAGE_SIZE);
            for (const entry of page) {
                const event = this.decode(topic, entry);
                if (event) {
                    await handler({ position : entry.position, event });
                    handled += 1;
                }
            }
            if (page.length < PAGE_SIZE) break;
            cursor = nextPosition(page[page.length - 1].position);
        }
        logger.info(`Replayed ${handled} events from ${topic}`, { fromPosition });
        return handled;
    }

    async recent(topic : string, count : number = PAGE_SIZE) : Promise<StoredEvent[]> {
        const entries = await this.#_eventLog.readLatest(topic, count);
        const events : StoredEvent[] = [];
        for (const entry of entries) {
            const event = this.decode(topic, entry);
            if (event) events.push({ position : entry.position, event });
        }
        return events;
    }

    private decode(topic : string, entry : StreamEntry) : DomainEvent | null {
        try {
            return this.#_registry.decode(entry.payload);
        } catch (error) {
            logger.warn(`Skipping undecodable entry ${entry.position} on ${topic}`, describeError(error));
            return null;
        }
    }
}
