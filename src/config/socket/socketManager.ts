import { injectable, inject } from 'inversify';
import TYPES from '@/config/inversify/types';
import { ICollaborationService } from '@/services/interfaces/collaboration.service.interface';
import { IIdentityProvider } from '@/providers/interfaces/IIdentityProvider.interface';
import { COLLAB_ERROR_MESSAGES } from '@/const/errorType.const';
import { CollabServer, CollabSocket, ISocketManager } from './socketManager.interface';
import { SocketConnection } from './socketConnection';
import logger, { describeError } from '@/utils/pinoLogger';

const handshakeDocumentId = (socket : CollabSocket) : string | null => {
  const fromAuth : unknown = socket.handshake.auth.documentId;
  if (typeof fromAuth === 'string' && fromAuth.trim() !== '') return fromAuth.trim();
  if (typeof fromAuth === 'number' && Number.isInteger(fromAuth)) return String(fromAuth);
  const fromQuery = socket.handshake.query.documentId;
  if (typeof fromQuery === 'string' && fromQuery.trim() !== '') return fromQuery.trim();
  return null;
}

@injectable()
export class SocketManager implements ISocketManager {
  #_io?: CollabServer;
  #_collaboration : ICollaborationService
  #_identity : IIdentityProvider

  constructor(
    @inject(TYPES.ICollaborationService) collaboration : ICollaborationService,
    @inject(TYPES.IIdentityProvider) identity : IIdentityProvider
  ) {
    this.#_collaboration = collaboration
    this.#_identity = identity
  }

  public init(io: CollabServer): void {
    this.#_io = io;
    this.#_io.use(this.authMiddleware.bind(this));

    this.#_io.on('connection', (socket: CollabSocket) => {
      this.handleConnection(socket);
    });
  }

  public connectionCount(): number {
    return this.#_io?.of('/').sockets.size ?? 0;
  }

  /**
   * Binds the gateway-verified user and the requested document to the
   * socket. Connections without either are refused.
   */
  private authMiddleware(socket: CollabSocket, next: (err?: Error) => void): void {
    const userId = this.#_identity.resolveUserId({
      headers : socket.handshake.headers,
      auth : socket.handshake.auth,
    });
    if (!userId) {
      return next(new Error(COLLAB_ERROR_MESSAGES.UNAUTHENTICATED));
    }
    const documentId = handshakeDocumentId(socket);
    if (!documentId) {
      return next(new Error(COLLAB_ERROR_MESSAGES.DOCUMENT_MISSING));
    }
    socket.data.userId = userId;
    socket.data.documentId = documentId;
    next();
  }

  private handleConnection(socket: CollabSocket): void {
    const { userId, documentId } = socket.data;
    const connection = new SocketConnection(socket);
    logger.info(`User ${userId} connected to document ${documentId} with socket ID: ${socket.id}`);

    // registered before join resolves so messages sent right after connecting keep their order
    socket.on('message', (raw: unknown) => {
      this.track('message', socket, this.#_collaboration.handleMessage(connection, documentId, raw));
    });

    socket.on('disconnect', (reason) => {
      logger.info(`User ${userId} disconnected from ${documentId}`, { reason });
      this.track('disconnect', socket, this.#_collaboration.leave(connection, documentId));
    });

    this.track('join', socket, this.#_collaboration.join(connection, documentId));
  }

  private track(stage: string, socket: CollabSocket, task: Promise<unknown>): void {
    void task.catch((error: unknown) => {
      logger.error(`[SocketManager] ${stage} failed for socket ${socket.id}`, describeError(error));
    });
  }
}
