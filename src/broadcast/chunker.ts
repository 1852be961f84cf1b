/**
 * Re-slices an arbitrary byte stream into fixed-size chunks.
 */
export class FixedChunker {
  private pending: Buffer = Buffer.alloc(0);

  constructor(readonly chunkSize: number) {
    if (!Number.isInteger(chunkSize) || chunkSize < 1) {
      throw new RangeError(`Chunk size must be a positive integer, got ${chunkSize}`);
    }
  }

  get pendingBytes(): number {
    return this.pending.length;
  }

  /**
   * Add bytes and return every complete chunk now available.
   */
  push(data: Buffer): Buffer[] {
    this.pending = this.pending.length === 0 ? data : Buffer.concat([this.pending, data]);

    const chunks: Buffer[] = [];
    while (this.pending.length >= this.chunkSize) {
      // Copy out of the stream's backing buffer
      chunks.push(Buffer.from(this.pending.subarray(0, this.chunkSize)));
      this.pending = this.pending.subarray(this.chunkSize);
    }
    return chunks;
  }

  /**
   * Take the trailing partial chunk, if any.
   */
  flush(): Buffer | undefined {
    if (this.pending.length === 0) {
      return undefined;
    }
    const rest = Buffer.from(this.pending);
    this.pending = Buffer.alloc(0);
    return rest;
  }
}
