import { EventRouter } from '@/services/eventRouter';
import { routeEventType } from '@/services/eventPublisher.service';
import { comparePositions } from '@/utils/streamPosition';
import { DomainEvent } from '@/types/event.types';
import { StreamEntry } from '@/types/eventLog.types';
import logger from '@/utils/pinoLogger';

export interface DocumentActivity {
    documentId : string;
    edits : number;
    saves : number;
    joins : number;
    leaves : number;
    activeParticipants : number;
    lastVersion : number | null;
    lastActivityAt : string;
    lastPosition : string;
}

interface ActivityState extends DocumentActivity {
    participants : Map<string, number>;
}

/**
 * Per-document activity counters folded from collaboration and document
 * events. An entry at or before the last position folded from its topic is
 * skipped, so redelivery after a consumer restart does not double count.
 */
export class ActivityProjection {
    #_documents = new Map<string, ActivityState>();
    #_lastFolded = new Map<string, string>();

    public attach(router : EventRouter) : EventRouter {
        return router
            .register('user_joined_session', this.onJoined)
            .register('user_left_session', this.onLeft)
            .register('document_changed', this.onChanged)
            .register('document_saved', this.onSaved)
            .register('document_deleted', this.onDeleted);
    }

    public get(documentId : string) : DocumentActivity | undefined {
        const state = this.#_documents.get(documentId);
        return state ? toActivity(state) : undefined;
    }

    public all() : DocumentActivity[] {
        return [...this.#_documents.values()].map(toActivity);
    }

    public onJoined = async (event : DomainEvent, entry : StreamEntry) : Promise<void> => {
        const state = this.fold(event, entry);
        if (!state || !('userId' in event)) return;
        state.joins += 1;
        state.participants.set(event.userId, (state.participants.get(event.userId) ?? 0) + 1);
        state.activeParticipants = state.participants.size;
    }

    public onLeft = async (event : DomainEvent, entry : StreamEntry) : Promise<void> => {
        const state = this.fold(event, entry);
        if (!state || !('userId' in event)) return;
        state.leaves += 1;
        const sessions = (state.participants.get(event.userId) ?? 0) - 1;
        if (sessions > 0) {
            state.participants.set(event.userId, sessions);
        } else {
            state.participants.delete(event.userId);
        }
        state.activeParticipants = state.participants.size;
    }

    public onChanged = async (event : DomainEvent, entry : StreamEntry) : Promise<void> => {
        const state = this.fold(event, entry);
        if (!state) return;
        state.edits += 1;
        state.lastVersion = versionOf(event) ?? state.lastVersion;
    }

    public onSaved = async (event : DomainEvent, entry : StreamEntry) : Promise<void> => {
        const state = this.fold(event, entry);
        if (!state) return;
        state.saves += 1;
        state.lastVersion = versionOf(event) ?? state.lastVersion;
    }

    public onDeleted = async (event : DomainEvent, entry : StreamEntry) : Promise<void> => {
        if (!('documentId' in event) || !this.advance(event, entry)) return;
        this.#_documents.delete(event.documentId);
        logger.info(`Dropped activity for deleted document ${event.documentId}`);
    }

    private fold(event : DomainEvent, entry : StreamEntry) : ActivityState | null {
        if (!('documentId' in event)) {
            logger.warn(`Activity event ${event.eventType} has no documentId`, { position : entry.position });
            return null;
        }
        if (!this.advance(event, entry)) return null;

        let state = this.#_documents.get(event.documentId);
        if (!state) {
            state = {
                documentId : event.documentId,
                edits : 0,
                saves : 0,
                joins : 0,
                leaves : 0,
                activeParticipants : 0,
                lastVersion : null,
                lastActivityAt : event.timestamp,
                lastPosition : entry.position,
                participants : new Map(),
            };
            this.#_documents.set(event.documentId, state);
        }
        state.lastActivityAt = event.timestamp;
        state.lastPosition = entry.position;
        return state;
    }

    private advance(event : DomainEvent, entry : StreamEntry) : boolean {
        const topic = routeEventType(event.eventType);
        const last = this.#_lastFolded.get(topic);
        if (last !== undefined && comparePositions(entry.position, last) <= 0) {
            logger.debug(`Skipping already folded ${event.eventType}`, { topic, position : entry.position, last });
            return false;
        }
        this.#_lastFolded.set(topic, entry.position);
        return true;
    }
}

const versionOf = (event : DomainEvent) : number | null => {
    const version = event.payload.version;
    return typeof version === 'number' ? version : null;
}

const toActivity = ({ participants, ...activity } : ActivityState) : DocumentActivity => {
    return { ...activity, activeParticipants : participants.size };
}
