import { PublishResult } from "@/types/event.types";

export interface IEventPublisher {

    /**
     * Validates and appends an event to its primary topic, then copies it to
     * the audit topic. Throws `UnknownEventTypeError` or
     * `SchemaValidationError` before anything is appended.
     */
    publish(
        eventType : string,
        data : Record<string, unknown>
    ) : Promise<PublishResult>;

}
