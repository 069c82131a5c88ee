import { EventEmitter } from 'events';
import { injectable } from 'inversify';
import { IEventLog } from './interfaces/IEventLog.interface';
import {
    ConsumerGroupInfo,
    EntryHeaders,
    GroupReadOptions,
    GroupStartPosition,
    LogPosition,
    StreamEntry,
} from '@/types/eventLog.types';
import { comparePositions } from '@/utils/streamPosition';

interface PendingDelivery {
    consumer : string;
    deliveries : number;
}

interface GroupState {
    lastDelivered : LogPosition;
    entriesRead : number;
    consumers : Set<string>;
    pending : Map<LogPosition, PendingDelivery>;
}

/**
 * Event log held in process memory, with the same consumer-group
 * semantics as the Redis Streams log. Positions are `<n>-0` with `n`
 * counting appends per topic from 1.
 */
@injectable()
export class InMemoryEventLog extends EventEmitter implements IEventLog {
    #_topics = new Map<string, StreamEntry[]>();
    #_groups = new Map<string, Map<string, GroupState>>();
    #_counters = new Map<string, number>();
    #_waiters = new Set<() => void>();

    constructor() {
        super();
        // one listener per blocked reader
        this.setMaxListeners(0);
    }

    public async append(topic : string, payload : string, headers : EntryHeaders = {}) : Promise<LogPosition> {
        const next = (this.#_counters.get(topic) ?? 0) + 1;
        this.#_counters.set(topic, next);
        const position = `${next}-0`;
        this.entries(topic).push({ position, payload, headers : { ...headers } });
        this.emit(`append:${topic}`, position);
        return position;
    }

    public async readRange(topic : string, fromPosition : LogPosition, count : number) : Promise<StreamEntry[]> {
        return this.entries(topic)
            .filter((entry) => comparePositions(entry.position, fromPosition) >= 0)
            .slice(0, count)
            .map(copyEntry);
    }

    public async readLatest(topic : string, count : number) : Promise<StreamEntry[]> {
        return this.entries(topic).slice(-count).reverse().map(copyEntry);
    }

    public async groupCreate(topic : string, group : string, startPosition : GroupStartPosition) : Promise<void> {
        const groups = this.groups(topic);
        if (groups.has(group)) return;

        const entries = this.entries(topic);
        let lastDelivered : LogPosition;
        if (startPosition === '$') {
            lastDelivered = entries.length > 0 ? entries[entries.length - 1].position : '0-0';
        } else if (startPosition === '0') {
            lastDelivered = '0-0';
        } else {
            lastDelivered = startPosition;
        }
        groups.set(group, { lastDelivered, entriesRead : 0, consumers : new Set(), pending : new Map() });
    }

    public async groupRead(
        topic : string,
        group : string,
        consumer : string,
        options : GroupReadOptions
    ) : Promise<StreamEntry[]> {
        const state = this.requireGroup(topic, group);
        state.consumers.add(consumer);

        if (options.pendingOnly) {
            return this.readOwnPending(topic, state, consumer, options.maxCount);
        }

        const claimed = this.claimNew(topic, state, consumer, options.maxCount);
        if (claimed.length > 0 || options.blockMs <= 0) return claimed;

        await this.waitForAppend(topic, options.blockMs);
        return this.claimNew(topic, this.requireGroup(topic, group), consumer, options.maxCount);
    }

    public async ack(topic : string, group : string, position : LogPosition) : Promise<void> {
        this.groups(topic).get(group)?.pending.delete(position);
    }

    public async length(topic : string) : Promise<number> {
        return this.#_topics.get(topic)?.length ?? 0;
    }

    public async groupInfo(topic : string) : Promise<ConsumerGroupInfo[]> {
        return [...this.groups(topic).entries()].map(([name, state]) => ({
            name,
            consumers : state.consumers.size,
            pending : state.pending.size,
            lastDeliveredPosition : state.lastDelivered,
            entriesRead : state.entriesRead,
        }));
    }

    public async close() : Promise<void> {
        for (const wake of [...this.#_waiters]) wake();
        this.#_waiters.clear();
        this.removeAllListeners();
    }

    private claimNew(topic : string, state : GroupState, consumer : string, maxCount : number) : StreamEntry[] {
        const fresh = this.entries(topic)
            .filter((entry) => comparePositions(entry.position, state.lastDelivered) > 0)
            .slice(0, maxCount);

        for (const entry of fresh) {
            state.pending.set(entry.position, { consumer, deliveries : 1 });
            state.lastDelivered = entry.position;
            state.entriesRead += 1;
        }
        return fresh.map(copyEntry);
    }

    private readOwnPending(topic : string, state : GroupState, consumer : string, maxCount : number) : StreamEntry[] {
        const owned = [...state.pending.entries()]
            .filter(([, delivery]) => delivery.consumer === consumer)
            .map(([position]) => position)
            .sort(comparePositions)
            .slice(0, maxCount);

        const byPosition = new Map(this.entries(topic).map((entry) => [entry.position, entry]));
        const result : StreamEntry[] = [];
        for (const position of owned) {
            const entry = byPosition.get(position);
            const delivery = state.pending.get(position);
            if (!entry || !delivery) continue;
            delivery.deliveries += 1;
            result.push(copyEntry(entry));
        }
        return result;
    }

    private waitForAppend(topic : string, blockMs : number) : Promise<void> {
        return new Promise((resolve) => {
            const event = `append:${topic}`;
            const wake = () => {
                clearTimeout(timer);
                this.off(event, wake);
                this.#_waiters.delete(wake);
                resolve();
            };
            const timer = setTimeout(wake, blockMs);
            this.#_waiters.add(wake);
            this.once(event, wake);
        });
    }

    private requireGroup(topic : string, group : string) : GroupState {
        const state = this.groups(topic).get(group);
        if (!state) {
            throw new Error(`NOGROUP No such consumer group '${group}' for topic '${topic}'`);
        }
        return state;
    }

    private entries(topic : string) : StreamEntry[] {
        let entries = this.#_topics.get(topic);
        if (!entries) {
            entries = [];
            this.#_topics.set(topic, entries);
        }
        return entries;
    }

    private groups(topic : string) : Map<string, GroupState> {
        let groups = this.#_groups.get(topic);
        if (!groups) {
            groups = new Map();
            this.#_groups.set(topic, groups);
        }
        return groups;
    }
}

const copyEntry = (entry : StreamEntry) : StreamEntry => ({
    position : entry.position,
    payload : entry.payload,
    headers : { ...entry.headers },
});
