import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { IEventLog } from '@/providers/interfaces/IEventLog.interface';
import { ALL_STREAM_TOPICS, StreamTopics } from '@/config/streams/streamTopics';
import { EventMetrics, GroupMetrics, TopicMetrics } from '@/types/metrics.types';
import logger, { describeError } from '@/utils/pinoLogger';

@injectable()
export class EventMonitor {
    #_eventLog : IEventLog

    constructor(
        @inject(TYPES.IEventLog) eventLog : IEventLog
    ){
        this.#_eventLog = eventLog
    }

    /**
     * Entry counts per topic, pending and acked counts per consumer group,
     * and the dead-letter depth. A topic whose stats cannot be read reports
     * `entries: null` instead of failing the whole snapshot.
     */
    async collect(topics : readonly string[] = ALL_STREAM_TOPICS) : Promise<EventMetrics> {
        const results = await Promise.all(topics.map((topic) => this.collectTopic(topic)));
        const deadLetter = results.find((metrics) => metrics.topic === StreamTopics.DEAD_LETTER);
        return {
            topics : results,
            deadLetterDepth : deadLetter?.entries ?? await this.deadLetterDepth(),
        };
    }

    async deadLetterDepth() : Promise<number> {
        return this.#_eventLog.length(StreamTopics.DEAD_LETTER);
    }

    /**
     * Logs an alert when the dead-letter topic holds `threshold` or more
     * entries. Returns whether it alerted.
     */
    async checkDeadLetter(threshold : number) : Promise<boolean> {
        const depth = await this.deadLetterDepth();
        if (depth >= threshold) {
            logger.error(`Dead letter topic has ${depth} events! Immediate attention required.`, { threshold, topic : StreamTopics.DEAD_LETTER });
            return true;
        }
        return false;
    }

    private async collectTopic(topic : string) : Promise<TopicMetrics> {
        try {
            const [entries, groups] = await Promise.all([
                this.#_eventLog.length(topic),
                this.#_eventLog.groupInfo(topic),
            ]);
            return {
                topic,
                entries,
                groups : groups.map((group) : GroupMetrics => ({
                    group : group.name,
                    consumers : group.consumers,
                    pending : group.pending,
                    acked : Math.max(0, group.entriesRead - group.pending),
                    lastDeliveredPosition : group.lastDeliveredPosition,
                })),
            };
        } catch (error) {
            logger.warn(`Could not collect metrics for ${topic}`, describeError(error));
            return { topic, entries : null, groups : [] };
        }
    }
}
