/**
 * Error taxonomy for the collaboration core.
 *
 * Only `UnknownEventTypeError` and `SchemaValidationError` ever reach a
 * publish caller. The rest are caught where they happen and turned into a
 * retry, a dead-letter entry or a log line.
 */
export abstract class CollabError extends Error {
    abstract readonly code : string;

    constructor(message : string, options? : { cause? : unknown }) {
        super(message, options);
        this.name = new.target.name;
    }
}

export class UnknownEventTypeError extends CollabError {
    readonly code = 'UNKNOWN_EVENT_TYPE';

    constructor(readonly eventType : string) {
        super(`Unknown event type: ${eventType}`);
    }
}

export class SchemaValidationError extends CollabError {
    readonly code = 'SCHEMA_VALIDATION_FAILED';

    constructor(
        readonly eventType : string,
        readonly fields : string[]
    ) {
        super(`Event ${eventType} failed validation on: ${fields.join(', ')}`);
    }
}

/** The event log or another remote collaborator is unreachable. */
export class TransportError extends CollabError {
    readonly code = 'TRANSPORT_UNAVAILABLE';
}

export class HandlerFailure extends CollabError {
    readonly code = 'HANDLER_FAILED';

    constructor(
        readonly topic : string,
        readonly position : string,
        cause : unknown
    ) {
        super(`Handler failed for ${topic}@${position}`, { cause });
    }
}

export class BroadcastDeliveryFailure extends CollabError {
    readonly code = 'BROADCAST_DELIVERY_FAILED';

    constructor(
        readonly connectionId : string,
        cause? : unknown
    ) {
        super(`Could not deliver message to connection ${connectionId}`, { cause });
    }
}

export class CircuitOpenError extends CollabError {
    readonly code = 'CIRCUIT_OPEN';

    constructor(readonly circuit : string) {
        super(`Circuit ${circuit} is open`);
    }
}
