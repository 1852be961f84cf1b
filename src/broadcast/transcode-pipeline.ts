/**
 * Transcode Pipeline
 *
 * Supervises exactly one transcoder process at a time and feeds its
 * output, re-sliced into fixed-size chunks, into the broadcast buffer.
 *
 * Loop:
 * 1. Snapshot the current source
 * 2. Spawn the transcoder on it
 * 3. Append each chunk, checking the source generation before every append
 * 4. Source changed: terminate immediately, restart on the new source
 * 5. Speech ended: tell the selector it drained, restart
 * 6. Background ended: restart (loops forever)
 * 7. Spawn failure / abnormal exit: back off, retry. Speech gets one
 *    retry (none once it has aired anything), then is abandoned so the
 *    background comes back.
 *
 * @module broadcast/transcode-pipeline
 */

import { getLogger } from '../core/logging.js';
import { TranscodeError, errorMessage } from '../core/exceptions.js';
import { BroadcastBuffer } from './buffer.js';
import { FixedChunker } from './chunker.js';
import { SourceSelector } from './source-selector.js';
import type { PipelineStats, SourceSnapshot, TranscoderFactory, TranscoderProcess } from './types.js';

const logger = getLogger('broadcast.pipeline');

export interface TranscodePipelineOptions {
  chunkSize: number;
  restartBackoffMs: number;
  killGraceMs: number;
}

/**
 * How one transcoder run ended
 */
type RunOutcome = 'ended' | 'switched' | 'failed' | 'stopped';

const SPEECH_MAX_ATTEMPTS = 2;

export class TranscodePipeline {
  private running = false;
  private loop?: Promise<void>;
  private active?: TranscoderProcess;
  private wakeBackoff?: () => void;
  private appendedThisRun = 0;
  private failedGeneration = -1;
  private failedAttempts = 0;
  private stats: Omit<PipelineStats, 'running' | 'activePid'> = {
    restarts: 0,
    failures: 0,
    abandoned: 0,
    switches: 0,
    drains: 0,
    chunksProduced: 0,
  };

  constructor(
    private readonly buffer: BroadcastBuffer,
    private readonly selector: SourceSelector,
    private readonly spawnTranscoder: TranscoderFactory,
    private readonly options: TranscodePipelineOptions,
  ) {}

  get isRunning(): boolean {
    return this.running;
  }

  getStats(): PipelineStats {
    return {
      ...this.stats,
      running: this.running,
      activePid: this.active?.pid,
    };
  }

  start(): void {
    if (this.running) return;
    this.running = true;
    logger.info('Transcode pipeline started');
    this.loop = this.run().catch((error: unknown) => {
      logger.error('Transcode pipeline loop crashed', error);
      this.running = false;
    });
  }

  /**
   * Stop the loop and terminate the active transcoder.
   */
  async stop(): Promise<void> {
    if (!this.running) {
      await this.loop;
      return;
    }
    this.running = false;
    this.wakeBackoff?.();
    const proc = this.active;
    if (proc) {
      await this.terminate(proc, 'pipeline stopping');
    }
    await this.loop;
    logger.info('Transcode pipeline stopped');
  }

  private async run(): Promise<void> {
    while (this.running) {
      const snapshot = this.selector.current();
      const outcome = await this.play(snapshot);

      switch (outcome) {
        case 'stopped':
          return;
        case 'switched':
          this.stats.switches++;
          break;
        case 'ended':
          if (snapshot.source.kind === 'speech') {
            this.stats.drains++;
            this.selector.markDrained(snapshot);
          }
          break;
        case 'failed':
          this.stats.failures++;
          if (this.shouldAbandon(snapshot)) {
            this.stats.abandoned++;
            logger.error('Giving up on speech source after failed transcode', {
              path: snapshot.source.path,
              attempts: this.failedAttempts,
            });
            this.selector.markDrained(snapshot);
            break;
          }
          await this.backoff();
          break;
      }

      if (this.running) {
        this.stats.restarts++;
      }
    }
  }

  /**
   * Speech that keeps failing, or that already aired part of itself, is
   * dropped rather than retried. Background is always retried.
   */
  private shouldAbandon(snapshot: SourceSnapshot): boolean {
    if (snapshot.source.kind !== 'speech') return false;
    if (this.failedGeneration !== snapshot.generation) {
      this.failedGeneration = snapshot.generation;
      this.failedAttempts = 0;
    }
    this.failedAttempts++;
    return this.appendedThisRun > 0 || this.failedAttempts >= SPEECH_MAX_ATTEMPTS;
  }

  /**
   * Run one transcoder process against `snapshot` until it ends, fails,
   * is superseded or the pipeline stops.
   */
  private async play(snapshot: SourceSnapshot): Promise<RunOutcome> {
    const { source } = snapshot;
    this.appendedThisRun = 0;

    let proc: TranscoderProcess;
    try {
      proc = this.spawnTranscoder(source.path);
    } catch (error) {
      logger.error(`Transcoder failed to spawn for ${source.kind} source`, {
        path: source.path,
        error: errorMessage(error),
      });
      return 'failed';
    }

    this.active = proc;
    logger.debug(`Transcoding ${source.kind} source`, { path: source.path, pid: proc.pid });

    const chunker = new FixedChunker(this.options.chunkSize);
    const superseded = () => this.selector.generation !== snapshot.generation;
    const onChange = () => {
      void this.terminate(proc, 'source changed');
    };
    this.selector.on('change', onChange);

    let interrupted = false;
    try {
      read: for await (const data of proc.stdout) {
        const bytes = Buffer.isBuffer(data) ? data : Buffer.from(String(data));
        for (const chunk of chunker.push(bytes)) {
          if (!this.running || superseded()) {
            interrupted = true;
            break read;
          }
          this.buffer.append(chunk);
          this.stats.chunksProduced++;
          this.appendedThisRun++;
        }
      }
    } catch (error) {
      logger.warning('Transcoder output stream errored', { pid: proc.pid, error: errorMessage(error) });
    } finally {
      this.selector.off('change', onChange);
    }

    if (!this.running || interrupted || superseded()) {
      await this.terminate(proc, this.running ? 'source changed' : 'pipeline stopping');
      this.active = undefined;
      return this.running ? 'switched' : 'stopped';
    }

    const exit = await proc.exited;
    this.active = undefined;

    if (!this.running) return 'stopped';
    if (superseded()) return 'switched';

    if (exit.error || exit.code !== 0) {
      const failure = exit.error
        ? new TranscodeError(`Transcoder failed to start: ${exit.error.message}`)
        : new TranscodeError(`Transcoder exited abnormally`, exit.code, exit.signal);
      logger.error(`Transcode of ${source.kind} source failed`, {
        path: source.path,
        code: failure.exitCode,
        signal: failure.signal,
        error: failure.message,
      });
      return 'failed';
    }

    const tail = chunker.flush();
    if (tail) {
      this.buffer.append(tail);
      this.stats.chunksProduced++;
    }
    return 'ended';
  }

  /**
   * SIGTERM first, SIGKILL once the grace period runs out.
   */
  private async terminate(proc: TranscoderProcess, reason: string): Promise<void> {
    logger.debug('Terminating transcoder', { pid: proc.pid, reason });
    proc.kill('SIGTERM');
    const timer = setTimeout(() => {
      logger.warning('Transcoder ignored SIGTERM, killing', { pid: proc.pid });
      proc.kill('SIGKILL');
    }, this.options.killGraceMs);
    try {
      await proc.exited;
    } finally {
      clearTimeout(timer);
    }
  }

  private backoff(): Promise<void> {
    return new Promise<void>((resolve) => {
      const finish = () => {
        clearTimeout(timer);
        this.wakeBackoff = undefined;
        resolve();
      };
      const timer = setTimeout(finish, this.options.restartBackoffMs);
      this.wakeBackoff = finish;
    });
  }
}
