import fs from 'fs/promises';
import path from 'path';
import { findProjectRoot, projectRoot, resolveFromRoot } from '../../src/core/paths.js';
import { makeTempDir } from './helpers/fakes.js';

describe('paths', () => {
    it('finds the nearest directory holding package.json', async () => {
        const root = await makeTempDir();
        await fs.writeFile(path.join(root, 'package.json'), '{}');
        const nested = path.join(root, 'dist', 'src', 'core');
        await fs.mkdir(nested, { recursive: true });

        expect(findProjectRoot(nested)).toBe(root);
    });

    it('resolves relative paths against the package root, not the working directory', async () => {
        await expect(fs.access(path.join(projectRoot, 'package.json'))).resolves.toBeUndefined();
        expect(resolveFromRoot('voices.json')).toBe(path.join(projectRoot, 'voices.json'));
        expect(resolveFromRoot('tts', '/srv/radio')).toBe('/srv/radio/tts');
        expect(resolveFromRoot('/var/audio/bg.mp3')).toBe('/var/audio/bg.mp3');
    });
});
