import { inject, injectable } from 'inversify';
import TYPES from '@/config/inversify/types';
import { ISessionManager } from './interfaces/sessionManager.service.interface';
import { Coordinates } from '@/types/document.types';
import { BroadcastReport } from '@/types/client-server.types';
import { Clock } from '@/utils/clock';

/**
 * Cursor positions per document and user. Last write wins; nothing is
 * persisted, so a restart forgets every cursor.
 */
@injectable()
export class PresenceTracker {
    #_cursors = new Map<string, Map<string, Coordinates>>();
    #_sessionManager : ISessionManager
    #_clock : Clock

    constructor(
        @inject(TYPES.ISessionManager) sessionManager : ISessionManager,
        @inject(TYPES.Clock) clock : Clock
    ){
        this.#_sessionManager = sessionManager
        this.#_clock = clock
    }

    async update(documentId : string, userId : string, coordinates : Coordinates) : Promise<BroadcastReport> {
        let cursors = this.#_cursors.get(documentId);
        if (!cursors) {
            cursors = new Map();
            this.#_cursors.set(documentId, cursors);
        }
        cursors.set(userId, coordinates);

        return this.#_sessionManager.broadcast(documentId, {
            type : 'cursor_position',
            userId,
            cursor : coordinates,
            timestamp : new Date(this.#_clock.now()).toISOString(),
        });
    }

    get(documentId : string, userId : string) : Coordinates | undefined {
        return this.#_cursors.get(documentId)?.get(userId);
    }

    remove(documentId : string, userId : string) : boolean {
        const cursors = this.#_cursors.get(documentId);
        if (!cursors) return false;
        const removed = cursors.delete(userId);
        if (cursors.size === 0) this.#_cursors.delete(documentId);
        return removed;
    }

    snapshot(documentId : string) : Record<string, Coordinates> {
        return Object.fromEntries(this.#_cursors.get(documentId) ?? []);
    }

    clear() : void {
        this.#_cursors.clear();
    }
}
