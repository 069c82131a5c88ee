
export const StreamTopics = {
  USER : 'user_events',
  DOCUMENT : 'document_events',
  COLLABORATION : 'collaboration_events',
  DEAD_LETTER : 'dead_letter_events',
  AUDIT : 'event_audit_store',
} as const;

export type StreamTopic = typeof StreamTopics[keyof typeof StreamTopics];

export const ALL_STREAM_TOPICS : readonly StreamTopic[] = Object.values(StreamTopics);

export const DeadLetterHeaders = {
  ORIGINAL_TOPIC : 'x-original-topic',
  ORIGINAL_POSITION : 'x-original-position',
  RETRY_COUNT : 'x-retry-count',
  ERROR : 'x-error',
  CONSUMER_GROUP : 'x-consumer-group',
} as const;
