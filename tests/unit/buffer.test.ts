import { BroadcastBuffer } from '../../src/broadcast/buffer.js';

const chunk = (label: string) => Buffer.from(label);

describe('BroadcastBuffer', () => {
    it('assigns gapless sequence numbers from 0', () => {
        const buffer = new BroadcastBuffer(4);

        expect(buffer.append(chunk('a'))).toBe(0);
        expect(buffer.append(chunk('b'))).toBe(1);
        expect(buffer.append(chunk('c'))).toBe(2);
        expect(buffer.nextSequence).toBe(3);
        expect(buffer.floor).toBe(0);
        expect(buffer.liveEdge()).toBe(2);
    });

    it('reports a live edge of 0 before anything is produced', () => {
        const buffer = new BroadcastBuffer(4);
        expect(buffer.liveEdge()).toBe(0);
        expect(buffer.nextSequence).toBe(0);
    });

    it('reads retained chunks in order', async () => {
        const buffer = new BroadcastBuffer(4);
        buffer.append(chunk('a'));
        buffer.append(chunk('b'));

        const first = await buffer.readFrom(0, 10);
        expect(first).toEqual({ status: 'chunk', sequence: 0, chunk: chunk('a'), nextSequence: 1, discontinuity: false });

        const second = await buffer.readFrom(first.nextSequence, 10);
        expect(second.status).toBe('chunk');
        expect(second.nextSequence).toBe(2);
        if (second.status === 'chunk') {
            expect(second.chunk.toString()).toBe('b');
        }
    });

    it('suspends at the head until the next append', async () => {
        const buffer = new BroadcastBuffer(4);
        const pending = buffer.readFrom(0, 1000);

        buffer.append(chunk('late'));

        const read = await pending;
        expect(read.status).toBe('chunk');
        if (read.status === 'chunk') {
            expect(read.sequence).toBe(0);
            expect(read.chunk.toString()).toBe('late');
        }
    });

    it('times out without moving the cursor', async () => {
        const buffer = new BroadcastBuffer(4);
        buffer.append(chunk('a'));

        const read = await buffer.readFrom(1, 10);
        expect(read).toEqual({ status: 'timeout', nextSequence: 1, discontinuity: false });
    });

    it('evicts the oldest chunk once full', () => {
        const buffer = new BroadcastBuffer(3);
        for (let i = 0; i < 5; i++) buffer.append(chunk(`c${i}`));

        expect(buffer.nextSequence).toBe(5);
        expect(buffer.floor).toBe(2);
    });

    it('moves a lapped cursor to the live edge and flags it', async () => {
        const buffer = new BroadcastBuffer(4);
        for (let i = 0; i < 10; i++) buffer.append(chunk(`c${i}`));

        const read = await buffer.readFrom(2, 10);
        expect(read.status).toBe('chunk');
        expect(read.discontinuity).toBe(true);
        if (read.status === 'chunk') {
            expect(read.sequence).toBe(9);
            expect(read.chunk.toString()).toBe('c9');
            expect(read.nextSequence).toBe(10);
        }
    });

    it('moves a cursor ahead of the producer to the live edge', async () => {
        const buffer = new BroadcastBuffer(4);
        buffer.append(chunk('a'));
        buffer.append(chunk('b'));

        const read = await buffer.readFrom(50, 10);
        expect(read.discontinuity).toBe(true);
        expect(read.status).toBe('chunk');
        if (read.status === 'chunk') {
            expect(read.sequence).toBe(1);
        }
    });

    it('resyncs a reader that was lapped while suspended', async () => {
        const buffer = new BroadcastBuffer(2);
        buffer.append(chunk('c0'));
        buffer.append(chunk('c1'));

        const pending = buffer.readFrom(2, 1000);
        buffer.append(chunk('c2'));
        buffer.append(chunk('c3'));
        buffer.append(chunk('c4'));

        const read = await pending;
        expect(read.discontinuity).toBe(true);
        expect(read.status).toBe('chunk');
        if (read.status === 'chunk') {
            expect(read.sequence).toBe(4);
            expect(read.chunk.toString()).toBe('c4');
        }
    });

    it('wakes suspended readers with closed and rejects further appends', async () => {
        const buffer = new BroadcastBuffer(4);
        const pending = buffer.readFrom(0, 1000);

        buffer.close();

        await expect(pending).resolves.toEqual({ status: 'closed', nextSequence: 0, discontinuity: false });
        expect(buffer.isClosed).toBe(true);
        expect(() => buffer.append(chunk('x'))).toThrow('closed');
    });

    it('still serves retained chunks after close', async () => {
        const buffer = new BroadcastBuffer(4);
        buffer.append(chunk('a'));
        buffer.close();

        const read = await buffer.readFrom(0, 10);
        expect(read.status).toBe('chunk');
        const end = await buffer.readFrom(1, 10);
        expect(end.status).toBe('closed');
    });

    it('rejects a non-positive capacity', () => {
        expect(() => new BroadcastBuffer(0)).toThrow(RangeError);
    });
});
