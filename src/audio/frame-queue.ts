/** Queue value meaning "no more data will arrive". */
export const END_OF_STREAM: unique symbol = Symbol('end-of-stream');
export type EndOfStream = typeof END_OF_STREAM;

/**
 * Unbounded single-producer/single-consumer FIFO between the capture callback
 * and the session's chunk generator.
 *
 * `push` never waits. Once `end()` has been called the sentinel is the last
 * value `take`/`poll` will ever return; frames pushed afterwards are discarded.
 */
export class FrameQueue {
  private items: Buffer[] = [];
  private head = 0;
  private ended = false;
  private _bufferedBytes = 0;
  private waiter: ((value: Buffer | EndOfStream) => void) | null = null;

  push(frame: Buffer): void {
    if (this.ended) return;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(frame);
      return;
    }

    this.items.push(frame);
    this._bufferedBytes += frame.length;
  }

  /** Enqueue the sentinel. Idempotent. */
  end(): void {
    if (this.ended) return;
    this.ended = true;

    if (this.waiter) {
      const resolve = this.waiter;
      this.waiter = null;
      resolve(END_OF_STREAM);
    }
  }

  /** Non-blocking pull. `undefined` means nothing is buffered right now. */
  poll(): Buffer | EndOfStream | undefined {
    if (this.head < this.items.length) {
      const frame = this.items[this.head];
      this.head++;
      this._bufferedBytes -= frame.length;
      this.compact();
      return frame;
    }
    return this.ended ? END_OF_STREAM : undefined;
  }

  /** Blocking pull: resolves with the next frame, or the sentinel. */
  take(): Promise<Buffer | EndOfStream> {
    const next = this.poll();
    if (next !== undefined) {
      return Promise.resolve(next);
    }
    if (this.waiter) {
      return Promise.reject(new Error('FrameQueue supports a single consumer'));
    }
    return new Promise((resolve) => {
      this.waiter = resolve;
    });
  }

  get size(): number {
    return this.items.length - this.head;
  }

  get bufferedBytes(): number {
    return this._bufferedBytes;
  }

  private compact(): void {
    // Drop consumed slots once they dominate the backing array
    if (this.head > 1024 && this.head * 2 > this.items.length) {
      this.items = this.items.slice(this.head);
      this.head = 0;
    }
  }
}
