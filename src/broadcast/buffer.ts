/**
 * Broadcast Buffer
 *
 * Fixed-capacity ring of encoded chunks shared by every listener.
 * One producer appends; any number of readers tail it with their own cursor.
 *
 * Sequence numbers start at 0 and are gapless for the process lifetime.
 * Once the ring is full, the lowest readable sequence is `next - capacity`.
 *
 * @module broadcast/buffer
 */

import type { BufferRead } from './types.js';

type Waiter = () => void;

export class BroadcastBuffer {
  private readonly slots: Array<Buffer | undefined>;
  private readonly waiters = new Set<Waiter>();
  private next = 0;
  private closed = false;

  constructor(readonly capacity: number = 256) {
    if (!Number.isInteger(capacity) || capacity < 1) {
      throw new RangeError(`Buffer capacity must be a positive integer, got ${capacity}`);
    }
    this.slots = new Array<Buffer | undefined>(capacity);
  }

  /**
   * Sequence number the next append will receive
   */
  get nextSequence(): number {
    return this.next;
  }

  /**
   * Lowest sequence still retained
   */
  get floor(): number {
    return Math.max(0, this.next - this.capacity);
  }

  /**
   * Most recently produced sequence (0 before anything was produced)
   */
  liveEdge(): number {
    return Math.max(0, this.next - 1);
  }

  get isClosed(): boolean {
    return this.closed;
  }

  /**
   * Producer-only. Stores the chunk, evicting the oldest when full,
   * and wakes every suspended reader.
   */
  append(chunk: Buffer): number {
    if (this.closed) {
      throw new Error('Cannot append to a closed broadcast buffer');
    }
    const sequence = this.next;
    this.slots[sequence % this.capacity] = chunk;
    this.next = sequence + 1;
    this.wakeAll();
    return sequence;
  }

  /**
   * Read the chunk at `sequence`, suspending up to `timeoutMs` when the
   * cursor is at the head. A cursor outside the retained window is moved
   * to the live edge and the result is flagged as a discontinuity.
   */
  async readFrom(sequence: number, timeoutMs: number): Promise<BufferRead> {
    let cursor = sequence;
    let discontinuity = false;

    if (cursor < this.floor || cursor > this.next) {
      cursor = this.liveEdge();
      discontinuity = true;
    }

    if (cursor < this.next) {
      return this.take(cursor, discontinuity);
    }

    if (this.closed) {
      return { status: 'closed', nextSequence: cursor, discontinuity };
    }

    const woken = await this.waitForAppend(timeoutMs);
    if (this.closed) {
      return { status: 'closed', nextSequence: cursor, discontinuity };
    }
    if (!woken) {
      return { status: 'timeout', nextSequence: cursor, discontinuity };
    }

    // The producer may have lapped the reader while it slept
    if (cursor < this.floor) {
      return this.take(this.liveEdge(), true);
    }
    return this.take(cursor, discontinuity);
  }

  /**
   * Wake all readers with a `closed` result. Further appends are rejected.
   */
  close(): void {
    this.closed = true;
    this.wakeAll();
  }

  private take(sequence: number, discontinuity: boolean): BufferRead {
    const chunk = this.slots[sequence % this.capacity];
    if (chunk === undefined) {
      // Unreachable while floor <= sequence < next
      throw new Error(`Broadcast buffer slot for sequence ${sequence} is empty`);
    }
    return {
      status: 'chunk',
      sequence,
      chunk,
      nextSequence: sequence + 1,
      discontinuity,
    };
  }

  private waitForAppend(timeoutMs: number): Promise<boolean> {
    return new Promise<boolean>((resolve) => {
      const waiter: Waiter = () => {
        clearTimeout(timer);
        this.waiters.delete(waiter);
        resolve(true);
      };
      const timer = setTimeout(() => {
        this.waiters.delete(waiter);
        resolve(false);
      }, timeoutMs);
      this.waiters.add(waiter);
    });
  }

  private wakeAll(): void {
    for (const waiter of Array.from(this.waiters)) {
      waiter();
    }
  }
}
