import fs from 'fs/promises';
import path from 'path';
import { isTempFile, publishAtomically, removeIfExists, tempPathFor, writeFileAtomic } from '../../src/utils/atomic-file.js';
import { makeTempDir } from './helpers/fakes.js';

describe('atomic file publication', () => {
    it('places the temp file beside the target', () => {
        const temp = tempPathFor('/data/tts/speech.mp3');
        expect(path.dirname(temp)).toBe('/data/tts');
        expect(isTempFile(path.basename(temp))).toBe(true);
    });

    it('replaces the target in one step', async () => {
        const dir = await makeTempDir();
        const target = path.join(dir, 'voices.json');
        await fs.writeFile(target, 'old');

        await writeFileAtomic(target, 'new');

        await expect(fs.readFile(target, 'utf-8')).resolves.toBe('new');
        await expect(fs.readdir(dir)).resolves.toEqual(['voices.json']);
    });

    it('leaves the previous file untouched when the writer fails', async () => {
        const dir = await makeTempDir();
        const target = path.join(dir, 'voices.json');
        await fs.writeFile(target, 'old');

        await expect(
            publishAtomically(target, async (temp) => {
                await fs.writeFile(temp, 'partial');
                throw new Error('disk full');
            }),
        ).rejects.toThrow('disk full');

        await expect(fs.readFile(target, 'utf-8')).resolves.toBe('old');
        await expect(fs.readdir(dir)).resolves.toEqual(['voices.json']);
    });

    it('treats a missing file as already removed', async () => {
        const dir = await makeTempDir();
        await expect(removeIfExists(path.join(dir, 'gone.mp3'))).resolves.toBe(false);
    });
});
