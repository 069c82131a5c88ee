import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { ISessionManager } from './interfaces/sessionManager.service.interface';
import { BroadcastReport, IConnection, ServerMessage, Session } from '@/types/client-server.types';
import { BroadcastDeliveryFailure } from '@/errors/collab.errors';
import { Clock } from '@/utils/clock';
import logger, { describeError } from '@/utils/pinoLogger';

/**
 * Live sessions per document. Owned by one service instance; create it
 * through the container and tear it down with `clear()`.
 */
@injectable()
export class SessionManager implements ISessionManager {
    #_documents = new Map<string, Map<string, Session>>();
    #_clock : Clock

    constructor(
        @inject(TYPES.Clock) clock : Clock
    ){
        this.#_clock = clock
    }

    connect(documentId : string, connection : IConnection) : Session {
        let sessions = this.#_documents.get(documentId);
        if (!sessions) {
            sessions = new Map();
            this.#_documents.set(documentId, sessions);
        }
        const existing = sessions.get(connection.id);
        if (existing) return existing;

        const session : Session = {
            documentId,
            userId : connection.userId,
            connection,
            joinedAt : this.#_clock.now(),
        };
        sessions.set(connection.id, session);
        logger.debug(`Session registered`, { documentId, connectionId : connection.id, userId : connection.userId, participants : sessions.size });
        return session;
    }

    disconnect(documentId : string, connection : IConnection) : Session | null {
        const sessions = this.#_documents.get(documentId);
        const session = sessions?.get(connection.id);
        if (!sessions || !session) return null;

        sessions.delete(connection.id);
        if (sessions.size === 0) {
            this.#_documents.delete(documentId);
            logger.debug(`Last session left document ${documentId}; session set discarded.`);
        }
        return session;
    }

    async broadcast(
        documentId : string,
        message : ServerMessage,
        options : { excludeConnectionId? : string } = {}
    ) : Promise<BroadcastReport> {
        const targets = this.sessions(documentId)
            .filter((session) => session.connection.id !== options.excludeConnectionId);

        const results = await Promise.allSettled(targets.map(async (session) => {
            try {
                await session.connection.send(message);
            } catch (error) {
                throw new BroadcastDeliveryFailure(session.connection.id, error);
            }
        }));

        let failed = 0;
        for (const result of results) {
            if (result.status === 'rejected') {
                failed += 1;
                logger.warn(`Broadcast delivery failed`, { documentId, type : message.type, ...describeError(result.reason) });
            }
        }
        return { delivered : results.length - failed, failed };
    }

    sessions(documentId : string) : Session[] {
        return [...(this.#_documents.get(documentId)?.values() ?? [])];
    }

    has(documentId : string, connectionId : string) : boolean {
        return this.#_documents.get(documentId)?.has(connectionId) ?? false;
    }

    documentIds() : string[] {
        return [...this.#_documents.keys()];
    }

    clear() : void {
        this.#_documents.clear();
    }
}
