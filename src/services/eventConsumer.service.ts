import { IEventLog } from '@/providers/interfaces/IEventLog.interface';
import { EventRegistry } from './eventRegistry';
import { DomainEvent } from '@/types/event.types';
import { GroupStartPosition, LogPosition, StreamEntry } from '@/types/eventLog.types';
import { DeadLetterHeaders, StreamTopics } from '@/config/streams/streamTopics';
import { HandlerFailure } from '@/errors/collab.errors';
import { config } from '@/config';
import { sleep as defaultSleep, Sleep } from '@/utils/clock';
import logger, { describeError } from '@/utils/pinoLogger';

export type ConsumerState = 'IDLE' | 'FETCHING' | 'PROCESSING';

export type DeliveryStatus = 'PROCESSING' | 'RETRYING' | 'ACKED' | 'DEAD_LETTERED';

/**
 * Processing record for one entry. Kept after the entry settles so the
 * outcome stays inspectable.
 */
export interface EntryDelivery {
    position : LogPosition;
    status : DeliveryStatus;
    attempts : number;
    lastDelayMs : number;
    lastError? : string;
}

export type EventHandler = (event : DomainEvent, entry : StreamEntry) => Promise<void>;

export interface RetryPolicy {
    maxRetries : number;
    baseDelayMs : number;
    maxDelayMs : number;
    jitterRatio : number;
}

export interface EventConsumerOptions {
    topic : string;
    group : string;
    consumer : string;
    handler : EventHandler;
    startPosition? : GroupStartPosition;
    retry? : Partial<RetryPolicy>;
    batchSize? : number;
    blockMs? : number;
    transportRetryMs? : number;
    deadLetterTopic? : string;
    sleep? : Sleep;
    random? : () => number;
}

const MAX_TRACKED_DELIVERIES = 500;

/**
 * Delay before retry number `attempt` (1-based): base doubling per attempt,
 * capped, plus up to `jitterRatio` of extra delay.
 */
export function computeRetryDelay(attempt : number, policy : RetryPolicy, random : () => number = Math.random) : number {
    const exp = Math.min(policy.baseDelayMs * Math.pow(2, attempt - 1), policy.maxDelayMs);
    const jitter = Math.floor(random() * exp * policy.jitterRatio);
    return exp + jitter;
}

/**
 * Pulls entries for one (topic, group, consumer), runs the handler and
 * acknowledges. Failed entries are retried in place with backoff, then
 * moved to the dead-letter topic and acknowledged.
 */
export class EventConsumer {
    readonly topic : string;
    readonly group : string;
    readonly consumer : string;

    #_eventLog : IEventLog;
    #_registry : EventRegistry;
    #_handler : EventHandler;
    #_startPosition : GroupStartPosition;
    #_retry : RetryPolicy;
    #_batchSize : number;
    #_blockMs : number;
    #_transportRetryMs : number;
    #_deadLetterTopic : string;
    #_sleep : Sleep;
    #_random : () => number;

    #_state : ConsumerState = 'IDLE';
    #_deliveries = new Map<LogPosition, EntryDelivery>();
    #_drainPending = true;
    #_running = false;
    #_loop? : Promise<void>;

    constructor(eventLog : IEventLog, registry : EventRegistry, options : EventConsumerOptions) {
        this.topic = options.topic;
        this.group = options.group;
        this.consumer = options.consumer;
        this.#_eventLog = eventLog;
        this.#_registry = registry;
        this.#_handler = options.handler;
        this.#_startPosition = options.startPosition ?? '0';
        this.#_retry = {
            maxRetries : options.retry?.maxRetries ?? config.EVENT_CONSUMER_MAX_RETRIES,
            baseDelayMs : options.retry?.baseDelayMs ?? config.EVENT_RETRY_BASE_MS,
            maxDelayMs : options.retry?.maxDelayMs ?? config.EVENT_RETRY_MAX_MS,
            jitterRatio : options.retry?.jitterRatio ?? config.EVENT_RETRY_JITTER_RATIO,
        };
        this.#_batchSize = options.batchSize ?? config.EVENT_FETCH_COUNT;
        this.#_blockMs = options.blockMs ?? config.EVENT_FETCH_BLOCK_MS;
        this.#_transportRetryMs = options.transportRetryMs ?? config.EVENT_TRANSPORT_RETRY_MS;
        this.#_deadLetterTopic = options.deadLetterTopic ?? StreamTopics.DEAD_LETTER;
        this.#_sleep = options.sleep ?? defaultSleep;
        this.#_random = options.random ?? Math.random;
    }

    get state() : ConsumerState {
        return this.#_state;
    }

    get running() : boolean {
        return this.#_running;
    }

    get deliveries() : ReadonlyMap<LogPosition, Readonly<EntryDelivery>> {
        return this.#_deliveries;
    }

    public async connect() : Promise<void> {
        await this.#_eventLog.groupCreate(this.topic, this.group, this.#_startPosition);
    }

    /**
     * Creates the group if needed and starts the fetch loop in the
     * background. The loop only ends through `stop()`.
     */
    public async start() : Promise<void> {
        if (this.#_running) {
            logger.warn(`[CONSUMER: ${this.group}] start called while already running`, { topic : this.topic });
            return;
        }
        await this.connect();
        this.#_running = true;
        this.#_loop = this.runLoop();
        logger.info(`[CONSUMER: ${this.group}] running`, { topic : this.topic, consumer : this.consumer });
    }

    /**
     * Stops fetching. Resolves after the batch in flight has finished its
     * ack, backoff or dead-letter cycle.
     */
    public async stop() : Promise<void> {
        if (!this.#_running) return;
        this.#_running = false;
        await this.#_loop;
        this.#_loop = undefined;
        logger.info(`[CONSUMER: ${this.group}] stopped`, { topic : this.topic, consumer : this.consumer });
    }

    /**
     * One fetch and process cycle. Returns the number of entries handled.
     * Fetch and ack failures propagate; handler failures never do.
     */
    public async pollOnce() : Promise<number> {
        this.#_state = 'FETCHING';
        let entries : StreamEntry[];
        try {
            entries = await this.fetch();
        } catch (error) {
            this.#_state = 'IDLE';
            throw error;
        }

        this.#_state = 'PROCESSING';
        try {
            for (const entry of entries) {
                await this.processEntry(entry);
            }
        } catch (error) {
            // entry stays pending; read it again from the pending list
            this.#_drainPending = true;
            throw error;
        } finally {
            this.#_state = 'IDLE';
        }
        return entries.length;
    }

    public async processEntry(entry : StreamEntry) : Promise<DeliveryStatus> {
        const previous = this.#_deliveries.get(entry.position);
        if (previous?.status === 'DEAD_LETTERED') {
            // already copied to the dead-letter topic; only the ack was lost
            await this.#_eventLog.ack(this.topic, this.group, entry.position);
            logger.info(`[CONSUMER: ${this.group}] Acknowledged previously dead-lettered entry.`, { topic : this.topic, position : entry.position });
            return previous.status;
        }

        const delivery : EntryDelivery = { position : entry.position, status : 'PROCESSING', attempts : 0, lastDelayMs : 0 };
        this.track(delivery);

        let event : DomainEvent;
        try {
            event = this.#_registry.decode(entry.payload);
        } catch (error) {
            delivery.lastError = error instanceof Error ? error.message : String(error);
            logger.error(`[CONSUMER: ${this.group}] Invalid payload. Sending to dead-letter topic.`, { topic : this.topic, position : entry.position, ...describeError(error) });
            await this.deadLetter(entry, delivery, 'invalid-payload');
            return delivery.status;
        }

        while (true) {
            delivery.attempts += 1;
            delivery.status = 'PROCESSING';
            try {
                await this.#_handler(event, entry);
            } catch (error) {
                const failure = new HandlerFailure(this.topic, entry.position, error);
                delivery.lastError = error instanceof Error ? error.message : String(error);

                if (delivery.attempts >= this.#_retry.maxRetries) {
                    logger.error(`[CONSUMER: ${this.group}] ${failure.message}; retries exhausted. Sending to dead-letter topic.`, { attempts : delivery.attempts, eventType : event.eventType, ...describeError(error) });
                    await this.deadLetter(entry, delivery, 'max-retries-reached');
                    return delivery.status;
                }

                const delay = computeRetryDelay(delivery.attempts, this.#_retry, this.#_random);
                delivery.status = 'RETRYING';
                delivery.lastDelayMs = delay;
                logger.warn(`[CONSUMER: ${this.group}] ${failure.message}; retry ${delivery.attempts} in ${delay}ms`, { eventType : event.eventType, ...describeError(error) });
                await this.#_sleep(delay);
                continue;
            }

            await this.#_eventLog.ack(this.topic, this.group, entry.position);
            delivery.status = 'ACKED';
            logger.debug(`[CONSUMER: ${this.group}] Entry processed and acknowledged.`, { topic : this.topic, position : entry.position, attempts : delivery.attempts });
            return delivery.status;
        }
    }

    private async fetch() : Promise<StreamEntry[]> {
        if (this.#_drainPending) {
            const pending = await this.#_eventLog.groupRead(this.topic, this.group, this.consumer, {
                maxCount : this.#_batchSize,
                blockMs : 0,
                pendingOnly : true,
            });
            if (pending.length > 0) {
                logger.info(`[CONSUMER: ${this.group}] Re-processing ${pending.length} pending entries.`, { topic : this.topic });
                return pending;
            }
            this.#_drainPending = false;
        }
        return this.#_eventLog.groupRead(this.topic, this.group, this.consumer, {
            maxCount : this.#_batchSize,
            blockMs : this.#_blockMs,
        });
    }

    private async deadLetter(entry : StreamEntry, delivery : EntryDelivery, reason : string) : Promise<void> {
        await this.#_eventLog.append(this.#_deadLetterTopic, entry.payload, {
            ...entry.headers,
            [DeadLetterHeaders.ORIGINAL_TOPIC] : this.topic,
            [DeadLetterHeaders.ORIGINAL_POSITION] : entry.position,
            [DeadLetterHeaders.RETRY_COUNT] : String(delivery.attempts),
            [DeadLetterHeaders.ERROR] : reason,
            [DeadLetterHeaders.CONSUMER_GROUP] : this.group,
        });
        delivery.status = 'DEAD_LETTERED';
        await this.#_eventLog.ack(this.topic, this.group, entry.position);
        logger.warn(`[CONSUMER: ${this.group}] Entry moved to dead-letter topic.`, { topic : this.topic, position : entry.position, reason });
    }

    private async runLoop() : Promise<void> {
        while (this.#_running) {
            try {
                await this.pollOnce();
            } catch (error) {
                logger.error(`[CONSUMER: ${this.group}] Fetch cycle failed. Retrying in ${this.#_transportRetryMs}ms.`, { topic : this.topic, ...describeError(error) });
                if (this.#_running) {
                    await this.#_sleep(this.#_transportRetryMs);
                }
            }
        }
    }

    private track(delivery : EntryDelivery) : void {
        this.#_deliveries.delete(delivery.position);
        this.#_deliveries.set(delivery.position, delivery);
        if (this.#_deliveries.size > MAX_TRACKED_DELIVERIES) {
            const oldest = this.#_deliveries.keys().next();
            if (!oldest.done) this.#_deliveries.delete(oldest.value);
        }
    }
}
