import { BroadcastDeliveryFailure } from '@/errors/collab.errors';
import { IConnection, ServerMessage } from '@/types/client-server.types';
import { CollabSocket } from './socketManager.interface';

/**
 * Presents a Socket.IO socket to the session layer as a plain connection.
 */
export class SocketConnection implements IConnection {
    #_socket : CollabSocket;

    constructor(socket : CollabSocket) {
        this.#_socket = socket;
    }

    get id() : string {
        return this.#_socket.id;
    }

    get userId() : string {
        return this.#_socket.data.userId;
    }

    send(message : ServerMessage) : void {
        if (!this.#_socket.connected) {
            throw new BroadcastDeliveryFailure(this.#_socket.id);
        }
        this.#_socket.emit('message', message);
    }
}
