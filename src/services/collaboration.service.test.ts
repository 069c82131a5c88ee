import { CollaborationService } from './collaboration.service';
import { SessionManager } from './sessionManager.service';
import { PresenceTracker } from './presence.service';
import { EventPublisher } from './eventPublisher.service';
import { EventRegistry } from './eventRegistry';
import { InMemoryEventLog } from '@/providers/inMemoryEventLog';
import { StreamTopics } from '@/config/streams/streamTopics';
import { COLLAB_ERROR_MESSAGES } from '@/const/errorType.const';
import { TransportError } from '@/errors/collab.errors';
import { FakeConnection, FakeDocumentStore, ManualClock } from '@/test/fakes';

const TS = '2026-03-01T12:00:00.000Z';
const DOC = 'doc-1';

describe('CollaborationService', () => {
    let eventLog : InMemoryEventLog;
    let store : FakeDocumentStore;
    let sessions : SessionManager;
    let presence : PresenceTracker;
    let service : CollaborationService;
    let alice : FakeConnection;
    let bob : FakeConnection;

    const loggedEvents = async (topic : string) => {
        const entries = await eventLog.readRange(topic, '0-0', 100);
        return entries.map((entry) : unknown => JSON.parse(entry.payload));
    };

    beforeEach(() => {
        const clock = new ManualClock();
        eventLog = new InMemoryEventLog();
        store = new FakeDocumentStore();
        sessions = new SessionManager(clock);
        presence = new PresenceTracker(sessions, clock);
        const publisher = new EventPublisher(eventLog, new EventRegistry(), clock);
        service = new CollaborationService(sessions, presence, publisher, store, clock);
        alice = new FakeConnection('c-alice', 'alice');
        bob = new FakeConnection('c-bob', 'bob');
        store.documents.set(DOC, 'hello');
    });

    afterEach(async () => {
        await eventLog.close();
    });

    describe('join', () => {
        it('sends the initial state and announces the join', async () => {
            await service.join(alice, DOC);

            expect(alice.sent).toEqual([
                { type : 'initial_state', documentId : DOC, content : 'hello', version : 0, cursors : {} },
                { type : 'user_joined', userId : 'alice', timestamp : TS },
            ]);
            expect(await loggedEvents(StreamTopics.COLLABORATION)).toEqual([
                { eventType : 'user_joined_session', timestamp : TS, documentId : DOC, userId : 'alice', payload : { connectionId : 'c-alice' } },
            ]);
        });

        it('tells earlier participants about a newcomer', async () => {
            await service.join(alice, DOC);
            await service.join(bob, DOC);

            expect(alice.sent[2]).toEqual({ type : 'user_joined', userId : 'bob', timestamp : TS });
            expect(bob.ofType('initial_state')).toHaveLength(1);
        });

        it('ignores a repeated join from the same connection', async () => {
            await service.join(alice, DOC);
            await service.join(alice, DOC);

            expect(alice.sent).toHaveLength(2);
            expect(await eventLog.length(StreamTopics.COLLABORATION)).toBe(1);
            expect(sessions.sessions(DOC)).toHaveLength(1);
        });

        it('includes the cursors already known for the document', async () => {
            await service.join(alice, DOC);
            await service.handleMessage(alice, DOC, { type : 'cursor_position', cursor : { line : 0, column : 3 } });
            await service.join(bob, DOC);

            expect(bob.sent[0]).toEqual({
                type : 'initial_state',
                documentId : DOC,
                content : 'hello',
                version : 0,
                cursors : { alice : { line : 0, column : 3 } },
            });
        });

        it('starts from an empty buffer when the document cannot be loaded', async () => {
            store.loadError = new TransportError('document service down');

            await service.join(alice, DOC);

            expect(alice.sent[0]).toEqual({ type : 'initial_state', documentId : DOC, content : '', version : 0, cursors : {} });
            expect(service.liveBuffer(DOC)?.lastPersisted).toBeNull();
        });
    });

    describe('handleMessage', () => {
        beforeEach(async () => {
            await service.join(alice, DOC);
            await service.join(bob, DOC);
            alice.sent.length = 0;
            bob.sent.length = 0;
        });

        it('answers an invalid message with an error to the sender only', async () => {
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : -1, text : 'x', kind : 'insert' } });
            await service.handleMessage(alice, DOC, 'not even an object');

            const error = { type : 'error', message : COLLAB_ERROR_MESSAGES.INVALID_MESSAGE, code : 'INVALID_MESSAGE' };
            expect(alice.sent).toEqual([error, error]);
            expect(bob.sent).toEqual([]);
            expect(service.liveBuffer(DOC)?.content).toBe('hello');
        });

        it('applies an edit, broadcasts it and logs it', async () => {
            const operation = { position : 5, text : ' world', kind : 'insert' };

            await service.handleMessage(alice, DOC, { type : 'document_change', operation, baseVersion : 0 });

            const change = { type : 'document_change', operation, userId : 'alice', version : 1, timestamp : TS };
            expect(alice.sent).toEqual([change]);
            expect(bob.sent).toEqual([change]);
            expect(service.liveBuffer(DOC)?.content).toBe('hello world');
            expect((await loggedEvents(StreamTopics.COLLABORATION)).at(-1)).toEqual({
                eventType : 'document_changed',
                timestamp : TS,
                documentId : DOC,
                userId : 'alice',
                payload : { operation, version : 1 },
            });
        });

        it('transforms a concurrent edit against the one applied before it', async () => {
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 0, text : 'A', kind : 'insert' }, baseVersion : 0 });
            await service.handleMessage(bob, DOC, { type : 'document_change', operation : { position : 5, text : 'B', kind : 'insert' }, baseVersion : 0 });

            expect(service.liveBuffer(DOC)?.content).toBe('AhelloB');
            expect(service.liveBuffer(DOC)?.version).toBe(2);
            expect(alice.sent[1]).toEqual({
                type : 'document_change',
                operation : { position : 6, text : 'B', kind : 'insert' },
                userId : 'bob',
                version : 2,
                timestamp : TS,
            });
        });

        it('does not transform consecutive edits from the same connection', async () => {
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 0, text : 'A', kind : 'insert' }, baseVersion : 0 });
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 1, text : 'B', kind : 'insert' }, baseVersion : 0 });

            expect(service.liveBuffer(DOC)?.content).toBe('ABhello');
        });

        it('applies messages from one connection in arrival order', async () => {
            await Promise.all([
                service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 5, text : '!', kind : 'insert' } }),
                service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 0, text : '> ', kind : 'delete' } }),
            ]);

            expect(service.liveBuffer(DOC)?.content).toBe('llo!');
            expect(bob.sent.map((message) => message.type === 'document_change' ? message.version : null)).toEqual([1, 2]);
        });

        it('relays cursor positions to everyone', async () => {
            await service.handleMessage(bob, DOC, { type : 'cursor_position', cursor : { index : 2, selectionEnd : 4 } });

            const cursor = { type : 'cursor_position', userId : 'bob', cursor : { index : 2, selectionEnd : 4 }, timestamp : TS };
            expect(alice.sent).toEqual([cursor]);
            expect(bob.sent).toEqual([cursor]);
            expect(await eventLog.length(StreamTopics.COLLABORATION)).toBe(2);
        });

        it('saves on request and announces the save', async () => {
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 0, text : 'h', kind : 'delete' } });
            await service.handleMessage(alice, DOC, { type : 'document_saved', label : 'manual' });

            expect(store.saves).toEqual([{ documentId : DOC, content : 'ello' }]);
            expect(bob.sent[1]).toEqual({ label : 'manual', type : 'document_saved', userId : 'alice', version : 1, timestamp : TS });
            expect(await loggedEvents(StreamTopics.DOCUMENT)).toEqual([
                { eventType : 'document_saved', timestamp : TS, documentId : DOC, userId : 'alice', payload : { version : 1, length : 4 } },
            ]);
        });

        it('reports a failed save to the requester only', async () => {
            store.saveError = new TransportError('document service down');

            await service.handleMessage(alice, DOC, { type : 'document_saved' });

            expect(alice.sent).toEqual([{ type : 'error', message : COLLAB_ERROR_MESSAGES.SAVE_FAILED, code : 'SAVE_FAILED' }]);
            expect(bob.sent).toEqual([]);
            expect(await eventLog.length(StreamTopics.DOCUMENT)).toBe(0);
        });

        it('keeps the edit when the event log is unavailable', async () => {
            jest.spyOn(eventLog, 'append').mockRejectedValue(new TransportError('log down'));

            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 0, text : '>', kind : 'insert' } });

            expect(service.liveBuffer(DOC)?.content).toBe('>hello');
            expect(bob.ofType('document_change')).toHaveLength(1);
        });

        it('refuses edits from a connection that already left', async () => {
            await service.handleMessage(bob, DOC, { type : 'user_left' });
            alice.sent.length = 0;

            await service.handleMessage(bob, DOC, { type : 'document_change', operation : { position : 5, text : '!', kind : 'insert' } });
            await service.handleMessage(bob, DOC, { type : 'document_saved' });

            const notJoined = { type : 'error', message : COLLAB_ERROR_MESSAGES.NOT_JOINED, code : 'NOT_JOINED' };
            expect(bob.sent).toEqual([notJoined, notJoined]);
            expect(alice.sent).toEqual([]);
            expect(service.liveBuffer(DOC)?.content).toBe('hello');
            expect(store.saves).toEqual([]);
        });

        it('keeps no cursor for a connection that already left', async () => {
            await service.handleMessage(bob, DOC, { type : 'user_left' });

            await service.handleMessage(bob, DOC, { type : 'cursor_position', cursor : { index : 3 } });
            const carol = new FakeConnection('c-carol', 'carol');
            await service.join(carol, DOC);

            expect(presence.snapshot(DOC)).toEqual({});
            expect(carol.sent[0]).toEqual({ type : 'initial_state', documentId : DOC, content : 'hello', version : 0, cursors : {} });
        });

        it('handles an explicit user_left like a disconnect', async () => {
            await service.handleMessage(bob, DOC, { type : 'user_left' });

            expect(sessions.has(DOC, 'c-bob')).toBe(false);
            expect(alice.sent).toEqual([{ type : 'user_left', userId : 'bob', timestamp : TS }]);
        });
    });

    describe('leave', () => {
        it('is a no-op for a connection that already left', async () => {
            await service.join(alice, DOC);
            await service.join(bob, DOC);

            expect(await service.leave(bob, DOC)).toBe(true);
            expect(await service.leave(bob, DOC)).toBe(false);
            expect(alice.ofType('user_left')).toHaveLength(1);
            expect((await loggedEvents(StreamTopics.COLLABORATION)).filter((event) => JSON.stringify(event).includes('user_left_session'))).toHaveLength(1);
        });

        it('drops the cursor of a user with no other session', async () => {
            await service.join(alice, DOC);
            await service.join(bob, DOC);
            await service.handleMessage(bob, DOC, { type : 'cursor_position', cursor : { index : 1 } });

            await service.leave(bob, DOC);

            expect(presence.snapshot(DOC)).toEqual({});
        });

        it('saves changed content when the last participant leaves', async () => {
            await service.join(alice, DOC);
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 5, text : '!', kind : 'insert' } });

            await service.leave(alice, DOC);

            expect(store.saves).toEqual([{ documentId : DOC, content : 'hello!' }]);
            expect(service.liveBuffer(DOC)).toBeUndefined();
        });

        it('skips the save when nothing changed', async () => {
            await service.join(alice, DOC);
            await service.leave(alice, DOC);

            expect(store.saves).toEqual([]);
        });

        it('does not revive the buffer for edits sent after the last leave', async () => {
            await service.join(alice, DOC);
            await service.handleMessage(alice, DOC, { type : 'user_left' });

            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 5, text : '!', kind : 'insert' } });

            expect(service.liveBuffer(DOC)).toBeUndefined();
            expect(await service.leave(alice, DOC)).toBe(false);
            expect(store.saves).toEqual([]);
            expect(alice.sent.at(-1)).toEqual({ type : 'error', message : COLLAB_ERROR_MESSAGES.NOT_JOINED, code : 'NOT_JOINED' });
        });

        it('never overwrites a document whose load failed', async () => {
            store.loadError = new TransportError('document service down');
            await service.join(alice, DOC);
            await service.handleMessage(alice, DOC, { type : 'document_change', operation : { position : 0, text : 'x', kind : 'insert' } });

            await service.leave(alice, DOC);

            expect(store.saves).toEqual([]);
            expect(store.documents.get(DOC)).toBe('hello');
        });
    });

    it('saves live documents and clears state on shutdown', async () => {
        store.documents.set('doc-2', '');
        await service.join(alice, DOC);
        await service.join(bob, 'doc-2');
        await service.handleMessage(bob, 'doc-2', { type : 'document_change', operation : { position : 0, text : 'draft', kind : 'insert' } });

        await service.shutdown();

        expect(store.saves).toEqual([{ documentId : 'doc-2', content : 'draft' }]);
        expect(sessions.documentIds()).toEqual([]);
        expect(service.liveBuffer(DOC)).toBeUndefined();
    });
});
