import fs from 'fs/promises';
import http from 'http';
import path from 'path';
import { createApiServer } from '../../src/api/server.js';
import { RadioService } from '../../src/services/radio.js';
import { FakeEngine, fakeTranscoderFactory, makeTempDir } from './helpers/fakes.js';

describe('HTTP API', () => {
    let radio: RadioService;
    let server: http.Server;
    let baseUrl: string;

    beforeAll(async () => {
        const dir = await makeTempDir();
        const backgroundAudioPath = path.join(dir, 'background.mp3');
        await fs.writeFile(backgroundAudioPath, 'loop');

        radio = new RadioService(
            {
                backgroundAudioPath,
                speechOutputDir: path.join(dir, 'tts'),
                speechRetention: 5,
                voicesFile: path.join(dir, 'voices.json'),
                chunkSize: 4,
                bufferCapacity: 64,
                restartBackoffMs: 10,
                killGraceMs: 50,
                listenerWaitMs: 20,
                transcoder: { ffmpegPath: 'ffmpeg', bitrate: '128k', sampleRate: 44100, channels: 2 },
            },
            { engine: new FakeEngine(), spawnTranscoder: fakeTranscoderFactory().factory },
        );
        await radio.start();

        server = createApiServer({ radio, jobWaitMs: 1000 });
        await new Promise<void>((resolve) => server.listen(0, '127.0.0.1', resolve));
        const address = server.address();
        if (address === null || typeof address === 'string') throw new Error('server is not listening on a port');
        baseUrl = `http://127.0.0.1:${address.port}`;
    });

    afterAll(async () => {
        await radio.stop();
        server.closeAllConnections();
        await new Promise<void>((resolve) => server.close(() => resolve()));
    });

    async function post(pathname: string, body?: unknown): Promise<Response> {
        return fetch(`${baseUrl}${pathname}`, {
            method: 'POST',
            headers: { 'Content-Type': 'application/json' },
            body: body === undefined ? undefined : JSON.stringify(body),
        });
    }

    it('answers health checks', async () => {
        const res = await fetch(`${baseUrl}/health`);
        expect(res.status).toBe(200);
        await expect(res.json()).resolves.toMatchObject({ status: 'healthy' });

        const ready = await fetch(`${baseUrl}/ready`);
        expect(ready.status).toBe(200);
        await expect(ready.json()).resolves.toMatchObject({ checks: { service: 'running', transcoder: 'running' } });
    });

    it('exposes Prometheus metrics', async () => {
        const res = await fetch(`${baseUrl}/metrics`);
        const text = await res.text();
        expect(text).toContain('# TYPE radio_listeners gauge\n');
        expect(text).toMatch(/^radio_synthesis_pending 0$/m);
    });

    it('rejects /say without text', async () => {
        const res = await post('/say', {});
        expect(res.status).toBe(400);
        await expect(res.json()).resolves.toEqual({ error: 'Missing text', status: 'error' });
    });

    it('rejects /say with an unknown voice', async () => {
        const res = await post('/say', { text: 'hi', voice: 'ghost' });
        expect(res.status).toBe(400);
        await expect(res.json()).resolves.toEqual({ error: 'Unknown voice: ghost', status: 'error' });
    });

    it('rejects a body that is not JSON', async () => {
        const res = await fetch(`${baseUrl}/say`, { method: 'POST', body: '{oops' });
        expect(res.status).toBe(400);
        await expect(res.json()).resolves.toEqual({ error: 'Invalid JSON body', status: 'error' });
    });

    it('synthesizes speech and lists it under /songs', async () => {
        const res = await post('/say', { text: 'hello listeners' });
        expect(res.status).toBe(200);
        const body: unknown = await res.json();
        expect(body).toMatchObject({ status: 'ok', job: { text: 'hello listeners', status: 'completed' } });

        const audioPath = typeof body === 'object' && body !== null && 'audio_path' in body ? body.audio_path : undefined;
        expect(audioPath).toMatch(/^speech-\d{13}-\d{4}\.mp3$/);

        const songs = await fetch(`${baseUrl}/songs`);
        const listing: unknown = await songs.json();
        expect(listing).toMatchObject({ songs: expect.arrayContaining([audioPath]) });

        const job = typeof body === 'object' && body !== null && 'job' in body ? body.job : undefined;
        const jobId = typeof job === 'object' && job !== null && 'id' in job ? String(job.id) : '';
        const status = await fetch(`${baseUrl}/say/${jobId}`);
        expect(status.status).toBe(200);
        await expect(status.json()).resolves.toMatchObject({ id: jobId, status: 'completed' });

        const replay = await post(`/play/${String(audioPath)}`);
        expect(replay.status).toBe(200);
        await expect(replay.json()).resolves.toMatchObject({ status: 'ok', message: `Now playing: ${String(audioPath)}` });
    });

    it('returns 404 for unknown jobs and files', async () => {
        expect((await fetch(`${baseUrl}/say/no-such-job`)).status).toBe(404);
        expect((await post('/play/speech-0000000000000-0001.mp3')).status).toBe(404);
        expect((await post('/play/..%2Fvoices.json')).status).toBe(404);
    });

    it('manages voices', async () => {
        const registered = await post('/voice', { name: 'narrator', value: 'karun' });
        expect(registered.status).toBe(200);
        await expect(registered.json()).resolves.toMatchObject({ status: 'ok', voices: { narrator: 'karun' } });

        const voices = await fetch(`${baseUrl}/voices`);
        await expect(voices.json()).resolves.toEqual({ default: 'engine-voice', narrator: 'karun' });

        const used = await post('/use/narrator');
        expect(used.status).toBe(200);
        await expect(used.json()).resolves.toMatchObject({ status: 'ok', voice: 'karun' });

        expect((await post('/use/ghost')).status).toBe(404);
    });

    it('requires both name and value to register a voice', async () => {
        const res = await post('/voice', { name: 'solo' });
        expect(res.status).toBe(400);
        await expect(res.json()).resolves.toEqual({ error: 'value is required', status: 'error' });
    });

    it('serves the live stream as audio/mpeg', async () => {
        const controller = new AbortController();
        const res = await fetch(`${baseUrl}/stream`, { signal: controller.signal });

        expect(res.status).toBe(200);
        expect(res.headers.get('content-type')).toBe('audio/mpeg');
        expect(res.headers.get('cache-control')).toBe('no-cache, no-store, must-revalidate');
        await vi.waitFor(() => expect(radio.listenerCount).toBe(1));

        controller.abort();
        await vi.waitFor(() => expect(radio.listenerCount).toBe(0));
    });

    it('returns 404 for unknown routes', async () => {
        const res = await fetch(`${baseUrl}/nope`);
        expect(res.status).toBe(404);
    });
});
