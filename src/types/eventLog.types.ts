/**
 * Redis stream id (`<ms>-<seq>`), assigned by the log on append.
 */
export type LogPosition = string;

/**
 * Where a new consumer group starts: `'0'` for the beginning of the topic,
 * `'$'` for entries appended after creation, or a concrete position.
 */
export type GroupStartPosition = '0' | '$' | LogPosition;

export type EntryHeaders = Record<string, string>;

export interface StreamEntry {
  position : LogPosition;
  /** JSON text of the event. */
  payload : string;
  headers : EntryHeaders;
}

export interface GroupReadOptions {
  maxCount : number;
  blockMs : number;
  /**
   * Re-read entries already delivered to this consumer but never acked,
   * instead of claiming new ones.
   */
  pendingOnly? : boolean;
}

export interface ConsumerGroupInfo {
  name : string;
  consumers : number;
  pending : number;
  lastDeliveredPosition : LogPosition;
  /** Entries handed out to the group so far, acked or not. */
  entriesRead : number;
}
