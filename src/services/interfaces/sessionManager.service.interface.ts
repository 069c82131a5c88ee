import { BroadcastReport, IConnection, ServerMessage, Session } from "@/types/client-server.types";

export interface ISessionManager {

    /**
     * Registers the connection under the document. Registering the same
     * connection twice returns the existing session.
     */
    connect(
        documentId : string,
        connection : IConnection
    ) : Session;

    /**
     * Removes the session; a no-op when it is not registered. Returns the
     * removed session, if any.
     */
    disconnect(
        documentId : string,
        connection : IConnection
    ) : Session | null;

    /**
     * Sends to every session of the document. A failed send is logged and
     * skipped; this never rejects.
     */
    broadcast(
        documentId : string,
        message : ServerMessage,
        options? : { excludeConnectionId? : string }
    ) : Promise<BroadcastReport>;

    sessions(
        documentId : string
    ) : Session[];

    has(
        documentId : string,
        connectionId : string
    ) : boolean;

    documentIds() : string[];

    clear() : void;
}
