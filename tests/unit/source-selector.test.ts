import fs from 'fs/promises';
import path from 'path';
import { SourceSelector } from '../../src/broadcast/source-selector.js';
import { ConfigurationError } from '../../src/core/exceptions.js';
import type { SourceSnapshot } from '../../src/broadcast/types.js';
import { makeTempDir } from './helpers/fakes.js';

describe('SourceSelector', () => {
    it('starts on background at generation 0', () => {
        const selector = new SourceSelector('/audio/bg.mp3');
        expect(selector.current()).toEqual({ source: { kind: 'background', path: '/audio/bg.mp3' }, generation: 0 });
    });

    it('preempts with speech and announces the change', () => {
        const selector = new SourceSelector('/audio/bg.mp3');
        const changes: Array<[SourceSnapshot, SourceSnapshot]> = [];
        selector.on('change', (next: SourceSnapshot, previous: SourceSnapshot) => changes.push([next, previous]));

        const snapshot = selector.preempt('/tts/a.mp3');

        expect(snapshot).toEqual({ source: { kind: 'speech', path: '/tts/a.mp3' }, generation: 1 });
        expect(changes).toHaveLength(1);
        expect(changes[0]?.[1].generation).toBe(0);
    });

    it('lets newer speech replace speech that is still playing', () => {
        const selector = new SourceSelector('/audio/bg.mp3');
        selector.preempt('/tts/a.mp3');
        selector.preempt('/tts/b.mp3');

        expect(selector.current().source).toEqual({ kind: 'speech', path: '/tts/b.mp3' });
        expect(selector.generation).toBe(2);
    });

    it('reverts to background when the current speech drains', () => {
        const selector = new SourceSelector('/audio/bg.mp3');
        const speech = selector.preempt('/tts/a.mp3');

        expect(selector.markDrained(speech)).toBe(true);
        expect(selector.current()).toEqual({ source: { kind: 'background', path: '/audio/bg.mp3' }, generation: 2 });
    });

    it('ignores a drain from a superseded speech source', () => {
        const selector = new SourceSelector('/audio/bg.mp3');
        const first = selector.preempt('/tts/a.mp3');
        selector.preempt('/tts/b.mp3');

        expect(selector.markDrained(first)).toBe(false);
        expect(selector.current().source.path).toBe('/tts/b.mp3');
        expect(selector.generation).toBe(2);
    });

    it('ignores a drain of the background source', () => {
        const selector = new SourceSelector('/audio/bg.mp3');
        expect(selector.markDrained(selector.current())).toBe(false);
        expect(selector.generation).toBe(0);
    });

    describe('assertBackgroundAvailable', () => {
        it('accepts an existing file', async () => {
            const dir = await makeTempDir();
            const file = path.join(dir, 'bg.mp3');
            await fs.writeFile(file, 'loop');

            expect(() => new SourceSelector(file).assertBackgroundAvailable()).not.toThrow();
        });

        it('fails for a missing file', async () => {
            const dir = await makeTempDir();
            const selector = new SourceSelector(path.join(dir, 'missing.mp3'));

            expect(() => selector.assertBackgroundAvailable()).toThrow(ConfigurationError);
        });

        it('fails for a directory', async () => {
            const dir = await makeTempDir();
            expect(() => new SourceSelector(dir).assertBackgroundAvailable()).toThrow('not a file');
        });
    });
});
