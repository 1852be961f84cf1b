/**
 * Synthesis Queue & Worker
 *
 * Serializes speech-synthesis jobs against the engine: one FIFO, one
 * worker, one job in flight. A failed job is recorded and the worker
 * moves on to the next.
 *
 * @module speech/synthesis-queue
 */

import fs from 'fs/promises';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from '../core/logging.js';
import { ValidationError, errorMessage } from '../core/exceptions.js';
import { AsyncQueue } from '../utils/async-queue.js';
import type { SynthesisEngine } from '../plugins/types.js';
import type { SpeechOutputStore } from './output-store.js';
import type { VoiceRegistry } from './voice-registry.js';
import type { JobStatus, SynthesisJobView } from './types.js';

const logger = getLogger('speech.queue');

/**
 * Receives every successfully published speech file
 */
export type PublishListener = (path: string, job: SynthesisJob) => void;

export class SynthesisJob {
  readonly id = uuidv4();
  readonly createdAt = Date.now();
  status: JobStatus = 'queued';
  resultPath?: string;
  error?: string;
  completedAt?: number;
  private readonly waiters = new Set<() => void>();

  constructor(
    readonly text: string,
    readonly voiceId: string,
    readonly voiceName?: string,
  ) {}

  /** Finished, successfully or not */
  get completed(): boolean {
    return this.status === 'completed' || this.status === 'failed';
  }

  /**
   * Resolve when the job finishes or `timeoutMs` elapses, whichever is
   * first. Timing out never cancels the job.
   */
  wait(timeoutMs: number): Promise<SynthesisJob> {
    if (this.completed) return Promise.resolve(this);
    return new Promise<SynthesisJob>((resolve) => {
      const done = () => {
        clearTimeout(timer);
        this.waiters.delete(done);
        resolve(this);
      };
      const timer = setTimeout(done, timeoutMs);
      this.waiters.add(done);
    });
  }

  markSynthesizing(): void {
    this.status = 'synthesizing';
  }

  succeed(resultPath: string): void {
    this.resultPath = resultPath;
    this.finish('completed');
  }

  fail(error: string): void {
    this.error = error;
    this.finish('failed');
  }

  toJSON(): SynthesisJobView {
    return {
      id: this.id,
      status: this.status,
      text: this.text,
      voiceName: this.voiceName,
      voiceId: this.voiceId,
      resultPath: this.resultPath,
      completed: this.completed,
      error: this.error,
      createdAt: this.createdAt,
      completedAt: this.completedAt,
    };
  }

  private finish(status: JobStatus): void {
    this.status = status;
    this.completedAt = Date.now();
    for (const waiter of Array.from(this.waiters)) {
      waiter();
    }
  }
}

export interface SynthesisQueueOptions {
  /** Finished jobs kept for status lookups */
  historySize?: number;
  /** Called after each successful publish (the source selector's preempt) */
  onPublished?: PublishListener;
}

export class SynthesisQueue {
  private readonly channel = new AsyncQueue<SynthesisJob>();
  private readonly jobs = new Map<string, SynthesisJob>();
  private readonly historySize: number;
  private readonly onPublished?: PublishListener;
  private worker?: Promise<void>;
  private current?: SynthesisJob;
  private processed = 0;
  private failed = 0;

  constructor(
    private readonly engine: SynthesisEngine,
    private readonly store: SpeechOutputStore,
    private readonly voices: VoiceRegistry,
    options: SynthesisQueueOptions = {},
  ) {
    this.historySize = options.historySize ?? 100;
    this.onPublished = options.onPublished;
  }

  /**
   * Validate and enqueue. Empty text or an unknown voice name throws
   * ValidationError before anything is queued.
   */
  enqueue(text: string, voice?: string): SynthesisJob {
    if (typeof text !== 'string' || text.trim().length === 0) {
      throw new ValidationError('Missing text', 'text');
    }
    if (this.channel.isClosed) {
      throw new ValidationError('Synthesis queue is stopped');
    }

    const resolved = this.voices.resolve(voice);
    const job = new SynthesisJob(text, resolved.voiceId, resolved.name);
    this.jobs.set(job.id, job);
    this.channel.push(job);

    logger.info('Synthesis job queued', {
      jobId: job.id,
      voiceId: job.voiceId,
      voiceTier: resolved.tier,
      pending: this.channel.length,
    });
    return job;
  }

  get(jobId: string): SynthesisJob | undefined {
    return this.jobs.get(jobId);
  }

  get pending(): number {
    return this.channel.length;
  }

  get inFlight(): SynthesisJob | undefined {
    return this.current;
  }

  getStats(): { pending: number; processed: number; failed: number; inFlight?: string } {
    return {
      pending: this.channel.length,
      processed: this.processed,
      failed: this.failed,
      inFlight: this.current?.id,
    };
  }

  start(): void {
    if (this.worker) return;
    this.worker = this.work().catch((error: unknown) => {
      logger.error('Synthesis worker crashed', error);
    });
    logger.info('Synthesis worker started');
  }

  /**
   * Stop accepting jobs; resolves once the worker has finished what was queued.
   */
  async stop(): Promise<void> {
    this.channel.close();
    await this.worker;
  }

  private async work(): Promise<void> {
    for await (const job of this.channel) {
      this.current = job;
      try {
        await this.process(job);
      } finally {
        this.current = undefined;
        this.processed++;
        this.trimHistory();
      }
    }
    logger.info('Synthesis worker stopped');
  }

  private async process(job: SynthesisJob): Promise<void> {
    job.markSynthesizing();
    const startTime = Date.now();

    let path: string;
    try {
      const audio = await this.engine.synthesize(job.text, job.voiceId);
      if (audio.length === 0) {
        throw new Error('Engine returned empty audio');
      }
      path = await this.store.commit((tempPath) => fs.writeFile(tempPath, audio), this.engine.audioExtension);
    } catch (error) {
      this.failed++;
      job.fail(errorMessage(error));
      logger.error('Synthesis job failed', { jobId: job.id, voiceId: job.voiceId, error: job.error });
      return;
    }

    job.succeed(path);
    logger.info('Synthesis job completed', { jobId: job.id, path, latencyMs: Date.now() - startTime });

    try {
      this.onPublished?.(path, job);
    } catch (error) {
      logger.error('Publish listener failed', error);
    }
  }

  private trimHistory(): void {
    if (this.jobs.size <= this.historySize) return;
    for (const [id, job] of this.jobs) {
      if (this.jobs.size <= this.historySize) break;
      if (job.completed) this.jobs.delete(id);
    }
  }
}
