import { InMemoryEventLog } from './inMemoryEventLog';

const TOPIC = 'document_events';

describe('InMemoryEventLog', () => {
    let eventLog : InMemoryEventLog;

    beforeEach(() => {
        eventLog = new InMemoryEventLog();
    });

    afterEach(async () => {
        await eventLog.close();
    });

    const appendMany = async (count : number) => {
        const positions : string[] = [];
        for (let i = 1; i <= count; i++) {
            positions.push(await eventLog.append(TOPIC, `{"n":${i}}`));
        }
        return positions;
    };

    it('assigns increasing positions per topic', async () => {
        expect(await appendMany(3)).toEqual(['1-0', '2-0', '3-0']);
        expect(await eventLog.append('user_events', '{}')).toBe('1-0');
        expect(await eventLog.length(TOPIC)).toBe(3);
    });

    it('reads a range inclusively from a position', async () => {
        await appendMany(5);
        const range = await eventLog.readRange(TOPIC, '2-0', 2);
        expect(range.map((entry) => entry.payload)).toEqual(['{"n":2}', '{"n":3}']);
    });

    it('reads the latest entries newest first', async () => {
        await appendMany(4);
        const latest = await eventLog.readLatest(TOPIC, 2);
        expect(latest.map((entry) => entry.position)).toEqual(['4-0', '3-0']);
    });

    it('hands every earlier entry, in order, to a group created from the start', async () => {
        await appendMany(5);
        await eventLog.groupCreate(TOPIC, 'late-group', '0');

        const entries = await eventLog.groupRead(TOPIC, 'late-group', 'c1', { maxCount : 10, blockMs : 0 });

        expect(entries.map((entry) => entry.payload)).toEqual(['{"n":1}', '{"n":2}', '{"n":3}', '{"n":4}', '{"n":5}']);
    });

    it('only hands new entries to a group created at the end', async () => {
        await appendMany(2);
        await eventLog.groupCreate(TOPIC, 'tail-group', '$');
        await eventLog.append(TOPIC, '{"n":3}');

        const entries = await eventLog.groupRead(TOPIC, 'tail-group', 'c1', { maxCount : 10, blockMs : 0 });
        expect(entries.map((entry) => entry.position)).toEqual(['3-0']);
    });

    it('treats creating an existing group as a no-op', async () => {
        await appendMany(2);
        await eventLog.groupCreate(TOPIC, 'g', '0');
        await eventLog.groupRead(TOPIC, 'g', 'c1', { maxCount : 1, blockMs : 0 });
        await eventLog.groupCreate(TOPIC, 'g', '0');

        const next = await eventLog.groupRead(TOPIC, 'g', 'c1', { maxCount : 10, blockMs : 0 });
        expect(next.map((entry) => entry.position)).toEqual(['2-0']);
    });

    it('fails to read from a group that was never created', async () => {
        await expect(eventLog.groupRead(TOPIC, 'missing', 'c1', { maxCount : 1, blockMs : 0 })).rejects.toThrow('NOGROUP');
    });

    it('keeps groups independent of each other', async () => {
        await appendMany(2);
        await eventLog.groupCreate(TOPIC, 'a', '0');
        await eventLog.groupCreate(TOPIC, 'b', '0');

        const fromA = await eventLog.groupRead(TOPIC, 'a', 'c1', { maxCount : 10, blockMs : 0 });
        const fromB = await eventLog.groupRead(TOPIC, 'b', 'c1', { maxCount : 10, blockMs : 0 });
        expect(fromA).toHaveLength(2);
        expect(fromB).toHaveLength(2);
    });

    it('keeps unacked entries pending for their consumer only', async () => {
        await appendMany(3);
        await eventLog.groupCreate(TOPIC, 'g', '0');
        await eventLog.groupRead(TOPIC, 'g', 'c1', { maxCount : 2, blockMs : 0 });
        await eventLog.ack(TOPIC, 'g', '1-0');

        const own = await eventLog.groupRead(TOPIC, 'g', 'c1', { maxCount : 10, blockMs : 0, pendingOnly : true });
        const other = await eventLog.groupRead(TOPIC, 'g', 'c2', { maxCount : 10, blockMs : 0, pendingOnly : true });

        expect(own.map((entry) => entry.position)).toEqual(['2-0']);
        expect(other).toEqual([]);
        expect(await eventLog.groupInfo(TOPIC)).toEqual([
            { name : 'g', consumers : 2, pending : 1, lastDeliveredPosition : '2-0', entriesRead : 2 },
        ]);
    });

    it('wakes a blocked read when an entry is appended', async () => {
        await eventLog.groupCreate(TOPIC, 'g', '$');
        const read = eventLog.groupRead(TOPIC, 'g', 'c1', { maxCount : 10, blockMs : 5_000 });
        await eventLog.append(TOPIC, '{"n":1}');

        const entries = await read;
        expect(entries.map((entry) => entry.position)).toEqual(['1-0']);
    });

    it('serves many blocked readers on one topic without a listener warning', async () => {
        const warn = jest.spyOn(process, 'emitWarning').mockImplementation(() => undefined);
        await eventLog.groupCreate(TOPIC, 'g', '$');

        const reads = Array.from({ length : 12 }, (_, i) => eventLog.groupRead(TOPIC, 'g', `c${i}`, { maxCount : 1, blockMs : 5_000 }));
        expect(eventLog.listenerCount(`append:${TOPIC}`)).toBe(12);
        await eventLog.append(TOPIC, '{"n":1}');
        const results = await Promise.all(reads);

        expect(results.flat().map((entry) => entry.position)).toEqual(['1-0']);
        expect(warn).not.toHaveBeenCalled();
        warn.mockRestore();
    });

    it('returns nothing when a blocked read times out', async () => {
        await eventLog.groupCreate(TOPIC, 'g', '$');
        expect(await eventLog.groupRead(TOPIC, 'g', 'c1', { maxCount : 10, blockMs : 10 })).toEqual([]);
    });

    it('keeps stored headers apart from the caller object', async () => {
        const headers = { 'x-trace' : 'one' };
        await eventLog.append(TOPIC, '{}', headers);
        headers['x-trace'] = 'two';

        const [entry] = await eventLog.readRange(TOPIC, '0-0', 1);
        expect(entry.headers).toEqual({ 'x-trace' : 'one' });
    });
});
