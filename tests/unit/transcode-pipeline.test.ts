import { BroadcastBuffer } from '../../src/broadcast/buffer.js';
import { SourceSelector } from '../../src/broadcast/source-selector.js';
import { TranscodePipeline } from '../../src/broadcast/transcode-pipeline.js';
import type { TranscoderFactory } from '../../src/broadcast/types.js';
import { FakeTranscoder, fakeTranscoderFactory } from './helpers/fakes.js';

const BACKGROUND = '/audio/background.mp3';
const OPTIONS = { chunkSize: 4, restartBackoffMs: 10, killGraceMs: 50 };

async function readAll(buffer: BroadcastBuffer): Promise<string[]> {
    const out: string[] = [];
    for (let seq = buffer.floor; seq < buffer.nextSequence; seq++) {
        const read = await buffer.readFrom(seq, 10);
        if (read.status === 'chunk') out.push(read.chunk.toString());
    }
    return out;
}

function procAt(procs: FakeTranscoder[], index: number): FakeTranscoder {
    const proc = procs[index];
    if (!proc) throw new Error(`transcoder ${index} was never started`);
    return proc;
}

describe('TranscodePipeline', () => {
    let buffer: BroadcastBuffer;
    let selector: SourceSelector;
    let pipeline: TranscodePipeline | undefined;

    beforeEach(() => {
        buffer = new BroadcastBuffer(64);
        selector = new SourceSelector(BACKGROUND);
    });

    afterEach(async () => {
        await pipeline?.stop();
        pipeline = undefined;
    });

    it('feeds fixed-size chunks of the background into the buffer', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();

        await vi.waitFor(() => expect(procs).toHaveLength(1));
        expect(procAt(procs, 0).inputPath).toBe(BACKGROUND);

        procAt(procs, 0).emit('bgbgbg');
        await vi.waitFor(() => expect(buffer.nextSequence).toBe(1));
        expect(await readAll(buffer)).toEqual(['bgbg']);
        expect(pipeline.getStats().activePid).toBe(procAt(procs, 0).pid);
    });

    it('restarts the background when it ends', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        procAt(procs, 0).finish(0);

        await vi.waitFor(() => expect(procs).toHaveLength(2));
        expect(procAt(procs, 1).inputPath).toBe(BACKGROUND);
        expect(selector.generation).toBe(0);
        expect(pipeline.getStats().restarts).toBe(1);
    });

    it('switches to speech, drains it, then returns to background', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        procAt(procs, 0).emit('bgbgbgbg');
        await vi.waitFor(() => expect(buffer.nextSequence).toBe(2));

        selector.preempt('/tts/speech-1.mp3');
        await vi.waitFor(() => expect(procs).toHaveLength(2));
        expect(procAt(procs, 0).signals).toContain('SIGTERM');
        expect(procAt(procs, 1).inputPath).toBe('/tts/speech-1.mp3');

        procAt(procs, 1).emit('spsps');
        procAt(procs, 1).finish(0);

        await vi.waitFor(() => expect(procs).toHaveLength(3));
        expect(procAt(procs, 2).inputPath).toBe(BACKGROUND);
        expect(selector.current().source.kind).toBe('background');
        expect(selector.generation).toBe(2);

        // The trailing partial chunk is kept
        expect(await readAll(buffer)).toEqual(['bgbg', 'bgbg', 'spsp', 's']);
        expect(pipeline.getStats()).toMatchObject({ switches: 1, drains: 1, failures: 0, chunksProduced: 4 });
    });

    it('never appends output of a superseded source', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        procAt(procs, 0).emit('oldoldold!');
        selector.preempt('/tts/speech-1.mp3');

        await vi.waitFor(() => expect(procs).toHaveLength(2));
        expect(buffer.nextSequence).toBe(0);

        procAt(procs, 1).emit('new!');
        await vi.waitFor(() => expect(buffer.nextSequence).toBe(1));
        expect(await readAll(buffer)).toEqual(['new!']);
    });

    it('lets newer speech interrupt speech that is still playing', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        selector.preempt('/tts/a.mp3');
        await vi.waitFor(() => expect(procs).toHaveLength(2));
        selector.preempt('/tts/b.mp3');
        await vi.waitFor(() => expect(procs).toHaveLength(3));

        expect(procAt(procs, 1).signals).toContain('SIGTERM');
        expect(procAt(procs, 2).inputPath).toBe('/tts/b.mp3');
        expect(selector.current().source.path).toBe('/tts/b.mp3');
    });

    it('backs off and retries when the transcoder cannot be spawned', async () => {
        const { factory: working, procs } = fakeTranscoderFactory();
        let attempts = 0;
        const flaky: TranscoderFactory = (inputPath) => {
            attempts++;
            if (attempts === 1) throw new Error('spawn ENOENT');
            return working(inputPath);
        };
        pipeline = new TranscodePipeline(buffer, selector, flaky, OPTIONS);
        pipeline.start();

        await vi.waitFor(() => expect(procs).toHaveLength(1));
        expect(attempts).toBe(2);
        expect(pipeline.getStats().failures).toBe(1);
        expect(pipeline.isRunning).toBe(true);
    });

    it('treats a non-zero exit as a failure and retries the same source', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        procAt(procs, 0).finish(1);

        await vi.waitFor(() => expect(procs).toHaveLength(2));
        expect(procAt(procs, 1).inputPath).toBe(BACKGROUND);
        expect(pipeline.getStats().failures).toBe(1);
    });

    it('gives up on speech that keeps failing and returns to background', async () => {
        const { factory: working, procs } = fakeTranscoderFactory();
        const speechAttempts: string[] = [];
        const corruptSpeech: TranscoderFactory = (inputPath) => {
            const proc = working(inputPath);
            if (inputPath !== BACKGROUND) {
                speechAttempts.push(inputPath);
                procAt(procs, procs.length - 1).finish(1);
            }
            return proc;
        };
        pipeline = new TranscodePipeline(buffer, selector, corruptSpeech, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        selector.preempt('/tts/corrupt.wav');

        await vi.waitFor(() => expect(selector.current().source.kind).toBe('background'));
        await vi.waitFor(() => expect(procs).toHaveLength(4));
        expect(speechAttempts).toEqual(['/tts/corrupt.wav', '/tts/corrupt.wav']);
        expect(procAt(procs, 3).inputPath).toBe(BACKGROUND);
        expect(selector.generation).toBe(2);
        expect(pipeline.getStats()).toMatchObject({ failures: 2, abandoned: 1 });
    });

    it('does not replay speech that failed after part of it aired', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        selector.preempt('/tts/truncated.wav');
        await vi.waitFor(() => expect(procs).toHaveLength(2));
        procAt(procs, 1).emit('spee');
        await vi.waitFor(() => expect(buffer.nextSequence).toBe(1));
        procAt(procs, 1).finish(1);

        await vi.waitFor(() => expect(procs).toHaveLength(3));
        expect(procAt(procs, 2).inputPath).toBe(BACKGROUND);
        expect(selector.current().source.kind).toBe('background');
        expect(pipeline.getStats()).toMatchObject({ failures: 1, abandoned: 1 });
    });

    it('keeps retrying the background however often it fails', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        pipeline = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        pipeline.start();

        for (let i = 0; i < 3; i++) {
            await vi.waitFor(() => expect(procs).toHaveLength(i + 1));
            procAt(procs, i).finish(1);
        }

        await vi.waitFor(() => expect(procs).toHaveLength(4));
        expect(procAt(procs, 3).inputPath).toBe(BACKGROUND);
        expect(pipeline.getStats()).toMatchObject({ failures: 3, abandoned: 0 });
    });

    it('terminates the active transcoder on stop', async () => {
        const { factory, procs } = fakeTranscoderFactory();
        const stopping = new TranscodePipeline(buffer, selector, factory, OPTIONS);
        stopping.start();
        await vi.waitFor(() => expect(procs).toHaveLength(1));

        await stopping.stop();

        expect(procAt(procs, 0).signals).toEqual(['SIGTERM', 'SIGTERM']);
        expect(stopping.isRunning).toBe(false);
        expect(procs).toHaveLength(1);
    });
});
