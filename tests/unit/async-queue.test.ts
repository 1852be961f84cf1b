import { AsyncQueue } from '../../src/utils/async-queue.js';

describe('AsyncQueue', () => {
    it('yields items in push order and ends once closed and drained', async () => {
        const queue = new AsyncQueue<number>();
        queue.push(1);
        queue.push(2);
        queue.close();

        const seen: number[] = [];
        for await (const item of queue) seen.push(item);

        expect(seen).toEqual([1, 2]);
    });

    it('suspends the consumer until something is pushed', async () => {
        const queue = new AsyncQueue<string>();
        const next = queue.next();

        queue.push('late');

        await expect(next).resolves.toEqual({ value: 'late', done: false });
    });

    it('ignores pushes after close', () => {
        const queue = new AsyncQueue<string>();
        queue.close();

        expect(queue.push('x')).toBe(false);
        expect(queue.length).toBe(0);
        expect(queue.isClosed).toBe(true);
    });
});
