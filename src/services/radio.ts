/**
 * Radio Service - live broadcast engine wiring
 *
 * Owns the broadcast buffer, source selector, transcode pipeline,
 * synthesis queue, speech store and voice registry, and connects them:
 *
 *   queue --(published path)--> selector --(change)--> pipeline --> buffer --> listeners
 */

import type { Writable } from 'stream';
import { getLogger } from '../core/logging.js';
import { BroadcastBuffer } from '../broadcast/buffer.js';
import { ListenerSession } from '../broadcast/listener-session.js';
import { SourceSelector } from '../broadcast/source-selector.js';
import { TranscodePipeline } from '../broadcast/transcode-pipeline.js';
import { createFfmpegFactory } from '../broadcast/transcoder.js';
import type { BroadcastStatus, SourceSnapshot, TranscoderFactory, TranscoderOptions } from '../broadcast/types.js';
import { SpeechOutputStore } from '../speech/output-store.js';
import { SynthesisQueue } from '../speech/synthesis-queue.js';
import { VoiceRegistry } from '../speech/voice-registry.js';
import type { SynthesisEngine } from '../plugins/types.js';

const logger = getLogger('radio');

/**
 * Radio service configuration
 */
export interface RadioServiceConfig {
  backgroundAudioPath: string;
  speechOutputDir: string;
  speechRetention: number;
  voicesFile: string;
  chunkSize: number;
  bufferCapacity: number;
  restartBackoffMs: number;
  killGraceMs: number;
  listenerWaitMs: number;
  transcoder: TranscoderOptions;
}

export interface RadioServiceDeps {
  engine: SynthesisEngine;
  /** Defaults to ffmpeg built from `config.transcoder` */
  spawnTranscoder?: TranscoderFactory;
}

export interface RadioStatus extends BroadcastStatus {
  running: boolean;
  jobs: ReturnType<SynthesisQueue['getStats']>;
}

export class RadioService {
  readonly buffer: BroadcastBuffer;
  readonly selector: SourceSelector;
  readonly pipeline: TranscodePipeline;
  readonly store: SpeechOutputStore;
  readonly voices: VoiceRegistry;
  readonly queue: SynthesisQueue;
  private readonly sessions = new Set<ListenerSession>();
  private readonly listenerWaitMs: number;
  private running = false;

  constructor(config: RadioServiceConfig, deps: RadioServiceDeps) {
    this.listenerWaitMs = config.listenerWaitMs;
    this.buffer = new BroadcastBuffer(config.bufferCapacity);
    this.selector = new SourceSelector(config.backgroundAudioPath);
    this.pipeline = new TranscodePipeline(
      this.buffer,
      this.selector,
      deps.spawnTranscoder ?? createFfmpegFactory(config.transcoder),
      {
        chunkSize: config.chunkSize,
        restartBackoffMs: config.restartBackoffMs,
        killGraceMs: config.killGraceMs,
      },
    );
    this.store = new SpeechOutputStore({ directory: config.speechOutputDir, maxFiles: config.speechRetention });
    this.voices = new VoiceRegistry(config.voicesFile, deps.engine.defaultVoice, deps.engine.voices);
    this.queue = new SynthesisQueue(deps.engine, this.store, this.voices, {
      onPublished: (path) => {
        this.selector.preempt(path);
      },
    });
  }

  get isRunning(): boolean {
    return this.running;
  }

  get listenerCount(): number {
    return this.sessions.size;
  }

  /**
   * Validate startup prerequisites and start the worker and pipeline.
   * A missing background file throws ConfigurationError.
   */
  async start(): Promise<void> {
    if (this.running) return;
    this.selector.assertBackgroundAvailable();
    await this.voices.load();
    await this.store.init();

    this.queue.start();
    this.pipeline.start();
    this.running = true;
    logger.info('Radio service started', { background: this.selector.backgroundPath });
  }

  /**
   * Terminate the transcoder, end every listener, then let the worker finish.
   */
  async stop(): Promise<void> {
    if (!this.running) return;
    this.running = false;
    await this.pipeline.stop();
    this.buffer.close();
    for (const session of Array.from(this.sessions)) {
      session.close('server shutting down');
    }
    await this.queue.stop();
    logger.info('Radio service stopped');
  }

  /**
   * Attach a client transport as a new listener joining at the live edge.
   * The returned promise settles when the listener disconnects.
   */
  attachListener(transport: Writable): { session: ListenerSession; done: Promise<void> } {
    const session = new ListenerSession(this.buffer, transport, { waitMs: this.listenerWaitMs });
    this.sessions.add(session);
    const done = session
      .run()
      .catch((error: unknown) => {
        logger.error('Listener session failed', error);
        session.close('session error');
      })
      .finally(() => {
        this.sessions.delete(session);
      });
    return { session, done };
  }

  /**
   * Replay a retained speech file by name.
   *
   * @returns the new source snapshot, or undefined when the name is not a stored file
   */
  async play(name: string): Promise<SourceSnapshot | undefined> {
    const filePath = await this.store.resolve(name);
    if (!filePath) return undefined;
    return this.selector.preempt(filePath);
  }

  status(): RadioStatus {
    const snapshot = this.selector.current();
    return {
      running: this.running,
      source: snapshot.source,
      generation: snapshot.generation,
      liveEdge: this.buffer.liveEdge(),
      nextSequence: this.buffer.nextSequence,
      listeners: this.sessions.size,
      pipeline: this.pipeline.getStats(),
      jobs: this.queue.getStats(),
    };
  }
}
