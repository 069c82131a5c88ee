import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { IEventLog } from '@/providers/interfaces/IEventLog.interface';
import { IEventPublisher } from './interfaces/eventPublisher.service.interface';
import { EventRegistry } from './eventRegistry';
import { StreamTopic, StreamTopics } from '@/config/streams/streamTopics';
import { PublishResult } from '@/types/event.types';
import { Clock } from '@/utils/clock';
import logger, { describeError } from '@/utils/pinoLogger';

// Checked in order; the collaboration prefixes must win over user_ and document_.
const TOPIC_ROUTES : ReadonlyArray<readonly [string, StreamTopic]> = [
    ['user_joined', StreamTopics.COLLABORATION],
    ['user_left', StreamTopics.COLLABORATION],
    ['document_changed', StreamTopics.COLLABORATION],
    ['user_', StreamTopics.USER],
    ['document_', StreamTopics.DOCUMENT],
];

export function routeEventType(eventType : string) : StreamTopic {
    const route = TOPIC_ROUTES.find(([prefix]) => eventType.startsWith(prefix));
    return route ? route[1] : StreamTopics.DEAD_LETTER;
}

@injectable()
export class EventPublisher implements IEventPublisher {
    #_eventLog : IEventLog
    #_registry : EventRegistry
    #_clock : Clock

    constructor(
        @inject(TYPES.IEventLog) eventLog : IEventLog,
        @inject(TYPES.EventRegistry) registry : EventRegistry,
        @inject(TYPES.Clock) clock : Clock
    ){
        this.#_eventLog = eventLog
        this.#_registry = registry
        this.#_clock = clock
    }

    async publish(eventType : string, data : Record<string, unknown>) : Promise<PublishResult> {
        const event = this.#_registry.validate(eventType, {
            ...data,
            timestamp : data.timestamp ?? new Date(this.#_clock.now()).toISOString(),
        });
        const topic = routeEventType(eventType);
        const serialized = JSON.stringify(event);

        const position = await this.#_eventLog.append(topic, serialized);
        logger.debug(`Published event ${eventType} to ${topic}`, { position });

        try {
            await this.#_eventLog.append(StreamTopics.AUDIT, serialized, { 'x-primary-topic' : topic, 'x-primary-position' : position });
        } catch (error) {
            logger.error(`Failed to append ${eventType} to audit trail`, { topic, position, ...describeError(error) });
        }

        return { topic, position, event };
    }
}
