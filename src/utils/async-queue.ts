/**
 * Unbounded FIFO channel with a single async consumer.
 *
 * Producers `push`; the consumer iterates with `for await` and suspends
 * while the queue is empty. `close()` ends iteration once drained.
 */
export class AsyncQueue<T> implements AsyncIterator<T>, AsyncIterable<T> {
  private readonly items: T[] = [];
  private wakeUp?: () => void;
  private closed = false;

  push(item: T): boolean {
    if (this.closed) return false;
    this.items.push(item);
    this.wakeUp?.();
    return true;
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.wakeUp?.();
  }

  get isClosed(): boolean {
    return this.closed;
  }

  get length(): number {
    return this.items.length;
  }

  async next(): Promise<IteratorResult<T>> {
    while (true) {
      if (this.items.length > 0) {
        const [value] = this.items.splice(0, 1);
        return { value, done: false };
      }
      if (this.closed) return { value: undefined, done: true };
      // sleep until push/close
      await new Promise<void>((resolve) => {
        this.wakeUp = resolve;
      });
      this.wakeUp = undefined;
    }
  }

  [Symbol.asyncIterator](): AsyncIterator<T> {
    return this;
  }
}
