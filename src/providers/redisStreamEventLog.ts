import Redis from 'ioredis';
import { IEventLog } from './interfaces/IEventLog.interface';
import {
    ConsumerGroupInfo,
    EntryHeaders,
    GroupReadOptions,
    GroupStartPosition,
    LogPosition,
    StreamEntry,
} from '@/types/eventLog.types';
import { TransportError } from '@/errors/collab.errors';
import logger from '@/utils/pinoLogger';

const EVENT_FIELD = 'event';
const HEADERS_FIELD = 'headers';

/**
 * Event log on Redis Streams. Each entry stores the event JSON under
 * `event` and its headers as JSON under `headers`.
 */
export class RedisStreamEventLog implements IEventLog {
    #_redis : Redis;

    constructor(redis : Redis) {
        this.#_redis = redis;
    }

    public async append(topic : string, payload : string, headers : EntryHeaders = {}) : Promise<LogPosition> {
        const position = await this.run('append', topic, () =>
            this.#_redis.xadd(topic, '*', EVENT_FIELD, payload, HEADERS_FIELD, JSON.stringify(headers))
        );
        if (!position) {
            throw new TransportError(`XADD on ${topic} returned no id`);
        }
        return position;
    }

    public async readRange(topic : string, fromPosition : LogPosition, count : number) : Promise<StreamEntry[]> {
        const reply = await this.run('readRange', topic, () =>
            this.#_redis.xrange(topic, fromPosition, '+', 'COUNT', count)
        );
        return parseEntries(reply);
    }

    public async readLatest(topic : string, count : number) : Promise<StreamEntry[]> {
        const reply = await this.run('readLatest', topic, () =>
            this.#_redis.xrevrange(topic, '+', '-', 'COUNT', count)
        );
        return parseEntries(reply);
    }

    public async groupCreate(topic : string, group : string, startPosition : GroupStartPosition) : Promise<void> {
        try {
            await this.#_redis.call('XGROUP', 'CREATE', topic, group, startPosition, 'MKSTREAM');
            logger.info(`Consumer group created`, { topic, group, startPosition });
        } catch (error) {
            if (error instanceof Error && error.message.includes('BUSYGROUP')) {
                logger.debug(`Consumer group "${group}" already exists on ${topic}. Skipping creation.`);
                return;
            }
            throw wrapRedisError('groupCreate', topic, error);
        }
    }

    public async groupRead(
        topic : string,
        group : string,
        consumer : string,
        options : GroupReadOptions
    ) : Promise<StreamEntry[]> {
        const args : (string | number)[] = ['GROUP', group, consumer, 'COUNT', options.maxCount];
        if (!options.pendingOnly && options.blockMs > 0) {
            args.push('BLOCK', options.blockMs);
        }
        args.push('STREAMS', topic, options.pendingOnly ? '0' : '>');

        const reply = await this.run('groupRead', topic, () => this.#_redis.call('XREADGROUP', ...args));
        return parseReadGroupReply(reply, topic);
    }

    public async ack(topic : string, group : string, position : LogPosition) : Promise<void> {
        await this.run('ack', topic, () => this.#_redis.xack(topic, group, position));
    }

    public async length(topic : string) : Promise<number> {
        return this.run('length', topic, () => this.#_redis.xlen(topic));
    }

    public async groupInfo(topic : string) : Promise<ConsumerGroupInfo[]> {
        try {
            const reply = await this.#_redis.call('XINFO', 'GROUPS', topic);
            return parseGroupInfoReply(reply);
        } catch (error) {
            // XINFO on a stream that was never written to
            if (error instanceof Error && /no such key/i.test(error.message)) {
                return [];
            }
            throw wrapRedisError('groupInfo', topic, error);
        }
    }

    public async close() : Promise<void> {
        await this.#_redis.quit();
    }

    private async run<T>(operation : string, topic : string, command : () => Promise<T>) : Promise<T> {
        try {
            return await command();
        } catch (error) {
            throw wrapRedisError(operation, topic, error);
        }
    }
}

const wrapRedisError = (operation : string, topic : string, error : unknown) : TransportError => {
    const detail = error instanceof Error ? error.message : String(error);
    return new TransportError(`Redis ${operation} on ${topic} failed: ${detail}`, { cause : error });
}

const isStringArray = (value : unknown) : value is string[] =>
    Array.isArray(value) && value.every((item) => typeof item === 'string');

const parseHeaders = (raw : string | undefined) : EntryHeaders => {
    if (!raw) return {};
    try {
        const parsed : unknown = JSON.parse(raw);
        if (typeof parsed !== 'object' || parsed === null) return {};
        const headers : EntryHeaders = {};
        for (const [key, value] of Object.entries(parsed)) {
            headers[key] = String(value);
        }
        return headers;
    } catch {
        return {};
    }
}

/**
 * Turns `[[id, [field, value, ...]], ...]` into entries. Entries whose
 * fields are gone (trimmed while pending) are skipped.
 */
export function parseEntries(reply : unknown) : StreamEntry[] {
    if (!Array.isArray(reply)) return [];
    const entries : StreamEntry[] = [];
    for (const item of reply) {
        if (!Array.isArray(item) || typeof item[0] !== 'string' || !isStringArray(item[1])) continue;
        const [position, flat] = item;
        const fields = new Map<string, string>();
        for (let i = 0; i + 1 < flat.length; i += 2) {
            fields.set(flat[i], flat[i + 1]);
        }
        const payload = fields.get(EVENT_FIELD);
        if (payload === undefined) continue;
        entries.push({ position, payload, headers : parseHeaders(fields.get(HEADERS_FIELD)) });
    }
    return entries;
}

/** XREADGROUP replies `[[stream, entries]]`, or null on timeout. */
export function parseReadGroupReply(reply : unknown, topic : string) : StreamEntry[] {
    if (!Array.isArray(reply)) return [];
    for (const stream of reply) {
        if (Array.isArray(stream) && stream[0] === topic) {
            return parseEntries(stream[1]);
        }
    }
    return [];
}

/** XINFO GROUPS replies one flat key/value array per group. */
export function parseGroupInfoReply(reply : unknown) : ConsumerGroupInfo[] {
    if (!Array.isArray(reply)) return [];
    const groups : ConsumerGroupInfo[] = [];
    for (const raw of reply) {
        if (!Array.isArray(raw)) continue;
        const fields = new Map<string, unknown>();
        for (let i = 0; i + 1 < raw.length; i += 2) {
            fields.set(String(raw[i]), raw[i + 1]);
        }
        const pending = Number(fields.get('pending') ?? 0);
        groups.push({
            name : String(fields.get('name') ?? ''),
            consumers : Number(fields.get('consumers') ?? 0),
            pending,
            lastDeliveredPosition : String(fields.get('last-delivered-id') ?? '0-0'),
            // entries-read is null before Redis 7 can compute it
            entriesRead : fields.get('entries-read') == null ? pending : Number(fields.get('entries-read')),
        });
    }
    return groups;
}
