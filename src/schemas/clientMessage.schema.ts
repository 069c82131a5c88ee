import { z } from 'zod';

export const OperationSchema = z.object({
    position : z.number().int().nonnegative(),
    text : z.string(),
    kind : z.enum(['insert', 'delete']),
});

export const CoordinatesSchema = z.object({
    line : z.number().int().nonnegative().optional(),
    column : z.number().int().nonnegative().optional(),
    index : z.number().int().nonnegative().optional(),
    selectionEnd : z.number().int().nonnegative().optional(),
}).passthrough();

export const ClientMessageSchema = z.discriminatedUnion('type', [
    z.object({
        type : z.literal('document_change'),
        operation : OperationSchema,
        baseVersion : z.number().int().nonnegative().optional(),
    }),
    z.object({
        type : z.literal('cursor_position'),
        cursor : CoordinatesSchema,
    }),
    z.object({
        type : z.literal('document_saved'),
    }).passthrough(),
    z.object({
        type : z.literal('user_joined'),
    }),
    z.object({
        type : z.literal('user_left'),
    }),
]);
