import { z } from 'zod';
import {
    CollaborationEventSchema,
    DocumentEventSchema,
    EVENT_FAMILY_SCHEMAS,
    UserEventSchema,
} from '@/schemas/event.schemas';
import { StreamTopic } from '@/config/streams/streamTopics';

export type EventFamily = keyof typeof EVENT_FAMILY_SCHEMAS;

export type UserEvent = z.infer<typeof UserEventSchema>;
export type DocumentEvent = z.infer<typeof DocumentEventSchema>;
export type CollaborationEvent = z.infer<typeof CollaborationEventSchema>;

export type DomainEvent = UserEvent | DocumentEvent | CollaborationEvent;

/**
 * Known event types and the schema family each one validates against.
 */
export const EVENT_TYPE_FAMILIES = {
    user_registered : 'user',
    user_updated : 'user',
    user_deleted : 'user',
    document_created : 'document',
    document_updated : 'document',
    document_shared : 'document',
    document_deleted : 'document',
    user_joined_session : 'collaboration',
    user_left_session : 'collaboration',
    document_changed : 'collaboration',
    document_saved : 'collaboration',
} as const satisfies Record<string, EventFamily>;

export interface PublishResult {
    topic : StreamTopic;
    position : string;
    event : DomainEvent;
}
