/**
 * Listener Session
 *
 * One per connected client. Tails the broadcast buffer from the live edge
 * and writes every chunk to the client until it disconnects.
 *
 * A slow client only ever slows itself down: when it falls out of the
 * retained window the buffer moves its cursor back to the live edge.
 *
 * @module broadcast/listener-session
 */

import type { Writable } from 'stream';
import { v4 as uuidv4 } from 'uuid';
import { getLogger } from '../core/logging.js';
import { errorMessage } from '../core/exceptions.js';
import { BroadcastBuffer } from './buffer.js';

const logger = getLogger('broadcast.listener');

export interface ListenerSessionOptions {
  /** How long one buffer read may suspend before re-checking the client */
  waitMs: number;
  id?: string;
}

export interface ListenerSessionStats {
  id: string;
  connectedAt: number;
  cursor: number;
  chunksSent: number;
  bytesSent: number;
  discontinuities: number;
}

export class ListenerSession {
  readonly id: string;
  readonly connectedAt = Date.now();
  private cursor: number;
  private closed = false;
  private chunksSent = 0;
  private bytesSent = 0;
  private discontinuities = 0;
  private wakeDrain?: () => void;

  constructor(
    private readonly buffer: BroadcastBuffer,
    private readonly transport: Writable,
    private readonly options: ListenerSessionOptions,
  ) {
    this.id = options.id ?? uuidv4();
    this.cursor = buffer.liveEdge();

    const onGone = () => this.close('transport closed');
    transport.once('close', onGone);
    transport.once('error', (error: Error) => {
      logger.debug('Listener transport error', { sessionId: this.id, error: error.message });
      onGone();
    });
  }

  get isClosed(): boolean {
    return this.closed;
  }

  getStats(): ListenerSessionStats {
    return {
      id: this.id,
      connectedAt: this.connectedAt,
      cursor: this.cursor,
      chunksSent: this.chunksSent,
      bytesSent: this.bytesSent,
      discontinuities: this.discontinuities,
    };
  }

  /**
   * Stream until the client goes away, a write fails, or the buffer closes.
   */
  async run(): Promise<void> {
    logger.info('Listener connected', { sessionId: this.id, cursor: this.cursor });

    while (!this.closed) {
      const read = await this.buffer.readFrom(this.cursor, this.options.waitMs);
      if (read.discontinuity) {
        this.discontinuities++;
        logger.debug('Listener fell behind, resynced to live edge', {
          sessionId: this.id,
          from: this.cursor,
          to: read.nextSequence - (read.status === 'chunk' ? 1 : 0),
        });
      }
      this.cursor = read.nextSequence;

      if (read.status === 'closed') {
        this.close('broadcast closed');
        break;
      }
      if (read.status === 'timeout' || this.closed) {
        continue;
      }

      try {
        await this.write(read.chunk);
      } catch (error) {
        this.close(`write failed: ${errorMessage(error)}`);
      }
    }

    logger.info('Listener disconnected', {
      sessionId: this.id,
      chunksSent: this.chunksSent,
      bytesSent: this.bytesSent,
    });
  }

  /**
   * End the session and release the client. Safe to call more than once.
   */
  close(reason: string): void {
    if (this.closed) return;
    this.closed = true;
    logger.debug('Closing listener session', { sessionId: this.id, reason });
    this.wakeDrain?.();
    if (!this.transport.destroyed && !this.transport.writableEnded) {
      this.transport.end();
    }
  }

  private async write(chunk: Buffer): Promise<void> {
    if (this.transport.destroyed || this.transport.writableEnded) {
      throw new Error('transport is no longer writable');
    }
    const flushed = this.transport.write(chunk);
    this.chunksSent++;
    this.bytesSent += chunk.length;
    if (!flushed) {
      await this.waitForDrain();
    }
  }

  private waitForDrain(): Promise<void> {
    return new Promise<void>((resolve) => {
      const finish = () => {
        this.transport.off('drain', finish);
        this.wakeDrain = undefined;
        resolve();
      };
      this.wakeDrain = finish;
      this.transport.once('drain', finish);
    });
  }
}
