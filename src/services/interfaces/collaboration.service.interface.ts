import { IConnection, Session } from "@/types/client-server.types";
import { LiveBuffer } from "@/types/document.types";

export interface ICollaborationService {

    /**
     * Registers the connection, loads the document on first join, sends the
     * joiner its initial state and announces the join.
     */
    join(
        connection : IConnection,
        documentId : string
    ) : Promise<Session>;

    /**
     * Handles one inbound message. Never rejects: bad input is answered
     * with an `error` message to the sender.
     */
    handleMessage(
        connection : IConnection,
        documentId : string,
        raw : unknown
    ) : Promise<void>;

    /**
     * Idempotent. Returns false when the connection was not registered.
     */
    leave(
        connection : IConnection,
        documentId : string
    ) : Promise<boolean>;

    liveBuffer(
        documentId : string
    ) : Readonly<LiveBuffer> | undefined;

    shutdown() : Promise<void>;
}
