import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { ICollaborationService } from './interfaces/collaboration.service.interface';
import { ISessionManager } from './interfaces/sessionManager.service.interface';
import { IEventPublisher } from './interfaces/eventPublisher.service.interface';
import { PresenceTracker } from './presence.service';
import { IDocumentStore } from '@/providers/interfaces/IDocumentStore.interface';
import { ClientMessageSchema } from '@/schemas/clientMessage.schema';
import { apply, transform } from '@/modules/transform/operation.transform';
import { IConnection, ServerMessage, Session } from '@/types/client-server.types';
import { LiveBuffer, LiveBuffersMap, Operation } from '@/types/document.types';
import { COLLAB_ERROR_MESSAGES } from '@/const/errorType.const';
import { DocumentLocks } from '@/utils/documentLocks';
import { Clock } from '@/utils/clock';
import logger, { describeError } from '@/utils/pinoLogger';

@injectable()
export class CollaborationService implements ICollaborationService {
    #_sessionManager : ISessionManager
    #_presence : PresenceTracker
    #_publisher : IEventPublisher
    #_documentStore : IDocumentStore
    #_clock : Clock
    #_liveBuffers : LiveBuffersMap = new Map();
    #_locks = new DocumentLocks();

    constructor(
        @inject(TYPES.ISessionManager) sessionManager : ISessionManager,
        @inject(TYPES.PresenceTracker) presence : PresenceTracker,
        @inject(TYPES.IEventPublisher) publisher : IEventPublisher,
        @inject(TYPES.IDocumentStore) documentStore : IDocumentStore,
        @inject(TYPES.Clock) clock : Clock
    ){
        this.#_sessionManager = sessionManager
        this.#_presence = presence
        this.#_publisher = publisher
        this.#_documentStore = documentStore
        this.#_clock = clock
    }

    join(connection : IConnection, documentId : string) : Promise<Session> {
        return this.#_locks.run(documentId, async () => {
            const alreadyJoined = this.#_sessionManager.has(documentId, connection.id);
            const session = this.#_sessionManager.connect(documentId, connection);
            if (alreadyJoined) {
                logger.debug(`Connection ${connection.id} re-sent join for ${documentId}; ignoring.`);
                return session;
            }
            logger.info(`User ${connection.userId} joined document ${documentId}`, { connectionId : connection.id });

            const buffer = await this.ensureBuffer(documentId);
            await this.sendTo(connection, {
                type : 'initial_state',
                documentId,
                content : buffer.content,
                version : buffer.version,
                cursors : this.#_presence.snapshot(documentId),
            });

            await this.#_sessionManager.broadcast(documentId, {
                type : 'user_joined',
                userId : connection.userId,
                timestamp : this.timestamp(),
            });
            await this.publishSafely('user_joined_session', {
                documentId,
                userId : connection.userId,
                payload : { connectionId : connection.id },
            });
            return session;
        });
    }

    async handleMessage(connection : IConnection, documentId : string, raw : unknown) : Promise<void> {
        const parsed = ClientMessageSchema.safeParse(raw);
        if (!parsed.success) {
            logger.warn(`Invalid message from ${connection.userId} on ${documentId}`, { issues : parsed.error.issues.map((issue) => issue.path.join('.')) });
            await this.sendTo(connection, { type : 'error', message : COLLAB_ERROR_MESSAGES.INVALID_MESSAGE, code : 'INVALID_MESSAGE' });
            return;
        }
        const message = parsed.data;

        try {
            switch (message.type) {
                case 'document_change':
                    await this.#_locks.run(documentId, async () => {
                        if (!await this.ensureMember(connection, documentId)) return;
                        await this.applyChange(connection, documentId, message.operation, message.baseVersion);
                    });
                    return;
                case 'cursor_position':
                    await this.#_locks.run(documentId, async () => {
                        if (!await this.ensureMember(connection, documentId)) return;
                        await this.#_presence.update(documentId, connection.userId, message.cursor);
                    });
                    return;
                case 'document_saved': {
                    const { type, ...extra } = message;
                    await this.#_locks.run(documentId, async () => {
                        if (!await this.ensureMember(connection, documentId)) return;
                        await this.saveDocument(connection, documentId, extra);
                    });
                    logger.debug(`Handled ${type} from ${connection.userId}`);
                    return;
                }
                case 'user_joined':
                    await this.join(connection, documentId);
                    return;
                case 'user_left':
                    await this.leave(connection, documentId);
                    return;
            }
        } catch (error) {
            logger.error(`Failed to handle ${message.type} on ${documentId}`, { userId : connection.userId, ...describeError(error) });
        }
    }

    leave(connection : IConnection, documentId : string) : Promise<boolean> {
        return this.#_locks.run(documentId, async () => {
            const removed = this.#_sessionManager.disconnect(documentId, connection);
            if (!removed) return false;

            const remaining = this.#_sessionManager.sessions(documentId);
            if (!remaining.some((session) => session.userId === connection.userId)) {
                this.#_presence.remove(documentId, connection.userId);
            }
            logger.info(`User ${connection.userId} left document ${documentId}`, { connectionId : connection.id, remaining : remaining.length });

            await this.#_sessionManager.broadcast(documentId, {
                type : 'user_left',
                userId : connection.userId,
                timestamp : this.timestamp(),
            });
            await this.publishSafely('user_left_session', {
                documentId,
                userId : connection.userId,
                payload : { connectionId : connection.id },
            });

            if (remaining.length === 0) {
                await this.releaseBuffer(documentId);
            }
            return true;
        });
    }

    liveBuffer(documentId : string) : Readonly<LiveBuffer> | undefined {
        return this.#_liveBuffers.get(documentId);
    }

    async shutdown() : Promise<void> {
        const documentIds = [...this.#_liveBuffers.keys()];
        logger.info(`Graceful shutdown initiated. Saving ${documentIds.length} live documents...`);
        await Promise.all(documentIds.map((documentId) =>
            this.#_locks.run(documentId, () => this.releaseBuffer(documentId))
        ));
        this.#_sessionManager.clear();
        this.#_presence.clear();
        logger.info('Collaboration state cleared.');
    }

    private async applyChange(
        connection : IConnection,
        documentId : string,
        incoming : Operation,
        baseVersion : number | undefined
    ) : Promise<void> {
        const buffer = await this.ensureBuffer(documentId);
        const last = buffer.lastOperation;

        let operation = incoming;
        if (baseVersion !== undefined && baseVersion < buffer.version && last && last.connectionId !== connection.id) {
            operation = transform(incoming, last.operation);
            logger.debug(`Transformed operation from ${connection.userId}`, { documentId, baseVersion, version : buffer.version, from : incoming.position, to : operation.position });
        }

        buffer.content = apply(buffer.content, operation);
        buffer.version += 1;
        buffer.lastOperation = {
            operation,
            connectionId : connection.id,
            userId : connection.userId,
            version : buffer.version,
        };

        await this.#_sessionManager.broadcast(documentId, {
            type : 'document_change',
            operation,
            userId : connection.userId,
            version : buffer.version,
            timestamp : this.timestamp(),
        });
        await this.publishSafely('document_changed', {
            documentId,
            userId : connection.userId,
            payload : { operation, version : buffer.version },
        });
    }

    private async saveDocument(
        connection : IConnection,
        documentId : string,
        extra : Record<string, unknown>
    ) : Promise<void> {
        const buffer = await this.ensureBuffer(documentId);
        try {
            await this.#_documentStore.save(documentId, buffer.content);
            buffer.lastPersisted = buffer.content;
        } catch (error) {
            logger.error(`Failed to save document ${documentId}`, { userId : connection.userId, ...describeError(error) });
            await this.sendTo(connection, { type : 'error', message : COLLAB_ERROR_MESSAGES.SAVE_FAILED, code : 'SAVE_FAILED' });
            return;
        }

        await this.#_sessionManager.broadcast(documentId, {
            ...extra,
            type : 'document_saved',
            userId : connection.userId,
            version : buffer.version,
            timestamp : this.timestamp(),
        });
        await this.publishSafely('document_saved', {
            documentId,
            userId : connection.userId,
            payload : { version : buffer.version, length : buffer.content.length },
        });
    }

    /** Only registered connections may touch the buffer or presence. */
    private async ensureMember(connection : IConnection, documentId : string) : Promise<boolean> {
        if (this.#_sessionManager.has(documentId, connection.id)) return true;
        logger.warn(`Dropped message from ${connection.userId}: not joined to ${documentId}`, { connectionId : connection.id });
        await this.sendTo(connection, { type : 'error', message : COLLAB_ERROR_MESSAGES.NOT_JOINED, code : 'NOT_JOINED' });
        return false;
    }

    private async ensureBuffer(documentId : string) : Promise<LiveBuffer> {
        const existing = this.#_liveBuffers.get(documentId);
        if (existing) return existing;

        let content = '';
        let lastPersisted : string | null = null;
        try {
            content = await this.#_documentStore.load(documentId);
            lastPersisted = content;
            logger.debug(`Loaded document ${documentId} into a live buffer`, { length : content.length });
        } catch (error) {
            logger.error(`Failed to load document ${documentId}; starting with an empty buffer.`, describeError(error));
        }

        const buffer : LiveBuffer = { content, version : 0, lastOperation : null, lastPersisted };
        this.#_liveBuffers.set(documentId, buffer);
        return buffer;
    }

    /**
     * Saves the buffer when it changed since the last load or save, then
     * drops it. A buffer whose load failed is never saved implicitly.
     */
    private async releaseBuffer(documentId : string) : Promise<void> {
        const buffer = this.#_liveBuffers.get(documentId);
        if (!buffer) return;
        try {
            if (buffer.lastPersisted === null) {
                logger.warn(`Skipped save for ${documentId}: stored content unknown since load failed.`);
            } else if (buffer.content !== buffer.lastPersisted) {
                await this.#_documentStore.save(documentId, buffer.content);
                logger.info(`Saved final content for document ${documentId}`);
            } else {
                logger.info(`Skipped save for document ${documentId} (no changes).`);
            }
        } catch (error) {
            logger.error(`Failed to save document ${documentId} during cleanup.`, describeError(error));
        } finally {
            this.#_liveBuffers.delete(documentId);
        }
    }

    /**
     * The log append and the live broadcast are independent; a failed append
     * is logged and the edit stands.
     */
    private async publishSafely(eventType : string, data : Record<string, unknown>) : Promise<void> {
        try {
            await this.#_publisher.publish(eventType, data);
        } catch (error) {
            logger.error(`Failed to publish ${eventType}`, describeError(error));
        }
    }

    private async sendTo(connection : IConnection, message : ServerMessage) : Promise<void> {
        try {
            await connection.send(message);
        } catch (error) {
            logger.warn(`Could not send ${message.type} to ${connection.id}`, describeError(error));
        }
    }

    private timestamp() : string {
        return new Date(this.#_clock.now()).toISOString();
    }
}
