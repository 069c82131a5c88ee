import {
    ConsumerGroupInfo,
    EntryHeaders,
    GroupReadOptions,
    GroupStartPosition,
    LogPosition,
    StreamEntry,
} from "@/types/eventLog.types";

/**
 * Append-only, per-topic ordered log with consumer-group semantics.
 *
 * Implementations wrap connection problems in `TransportError`.
 *
 * @interface
 */
export interface IEventLog {

    append(
        topic : string,
        payload : string,
        headers? : EntryHeaders
    ) : Promise<LogPosition>;

    /**
     * Entries at or after `fromPosition`, oldest first, at most `count`.
     */
    readRange(
        topic : string,
        fromPosition : LogPosition,
        count : number
    ) : Promise<StreamEntry[]>;

    /** Newest entries first. */
    readLatest(
        topic : string,
        count : number
    ) : Promise<StreamEntry[]>;

    /**
     * Creating a group that already exists is a no-op.
     */
    groupCreate(
        topic : string,
        group : string,
        startPosition : GroupStartPosition
    ) : Promise<void>;

    /**
     * Claims entries for `consumer`. Entries claimed by another consumer of
     * the same group are never returned.
     */
    groupRead(
        topic : string,
        group : string,
        consumer : string,
        options : GroupReadOptions
    ) : Promise<StreamEntry[]>;

    ack(
        topic : string,
        group : string,
        position : LogPosition
    ) : Promise<void>;

    length(
        topic : string
    ) : Promise<number>;

    groupInfo(
        topic : string
    ) : Promise<ConsumerGroupInfo[]>;

    close() : Promise<void>;
}
