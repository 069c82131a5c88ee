import { z } from 'zod';

/**
 * Identifiers come from other services as strings or integers; they are
 * carried as strings from here on.
 */
const Identifier = z
    .union([z.string().trim().min(1), z.number().int().nonnegative()])
    .transform((value) => String(value));

const baseEventShape = {
    eventType : z.string().min(1),
    timestamp : z.string().datetime({ offset : true }),
    payload : z.record(z.unknown()).default({}),
};

export const UserEventSchema = z.object({
    ...baseEventShape,
    userId : Identifier,
});

export const DocumentEventSchema = z.object({
    ...baseEventShape,
    documentId : Identifier,
});

export const CollaborationEventSchema = z.object({
    ...baseEventShape,
    documentId : Identifier,
    userId : Identifier,
});

export const EVENT_FAMILY_SCHEMAS = {
    user : UserEventSchema,
    document : DocumentEventSchema,
    collaboration : CollaborationEventSchema,
} as const;
