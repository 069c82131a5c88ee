import { injectable } from 'inversify';
import { z, ZodError } from 'zod';
import { EVENT_FAMILY_SCHEMAS } from '@/schemas/event.schemas';
import { DomainEvent, EVENT_TYPE_FAMILIES, EventFamily } from '@/types/event.types';
import { SchemaValidationError, UnknownEventTypeError } from '@/errors/collab.errors';

const fieldsOf = (error : ZodError) : string[] => {
    const fields = error.issues.map((issue) => issue.path.length > 0 ? issue.path.join('.') : '(root)');
    return [...new Set(fields)];
}

/**
 * Maps every event type to exactly one schema family.
 */
@injectable()
export class EventRegistry {
    #_families : ReadonlyMap<string, EventFamily> = new Map<string, EventFamily>(Object.entries(EVENT_TYPE_FAMILIES));

    public validate(eventType : string, data : Record<string, unknown>) : DomainEvent {
        const family = this.#_families.get(eventType);
        if (!family) {
            throw new UnknownEventTypeError(eventType);
        }
        const schema : z.ZodType<DomainEvent, z.ZodTypeDef, unknown> = EVENT_FAMILY_SCHEMAS[family];
        const result = schema.safeParse({ ...data, eventType });
        if (!result.success) {
            throw new SchemaValidationError(eventType, fieldsOf(result.error));
        }
        return result.data;
    }

    /**
     * Parses a logged payload back into an event. Throws the same errors as
     * `validate`, or `SchemaValidationError` on `(root)` for broken JSON.
     */
    public decode(payload : string) : DomainEvent {
        let parsed : unknown;
        try {
            parsed = JSON.parse(payload);
        } catch {
            throw new SchemaValidationError('(unparseable)', ['(root)']);
        }
        if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
            throw new SchemaValidationError('(unparseable)', ['(root)']);
        }
        const record : Record<string, unknown> = Object.fromEntries(Object.entries(parsed));
        const eventType = record.eventType;
        if (typeof eventType !== 'string') {
            throw new SchemaValidationError('(unknown)', ['eventType']);
        }
        return this.validate(eventType, record);
    }
}
