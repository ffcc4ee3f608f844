import { performance } from 'perf_hooks';
import { v4 as uuidv4 } from 'uuid';
import { END_OF_STREAM, FrameQueue } from './frame-queue.js';
import type { CaptureSource } from './microphone-source.js';
import { logger } from '../logger.js';

const BYTES_PER_SAMPLE = 2;

export interface CaptureSessionOptions {
  source: CaptureSource;
  sampleRateHertz: number;
  chunkSize: number;
  streamDurationLimitMs: number;
  /** Log a warning once per session when this much unread audio is queued. */
  backlogWarningMs?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
}

/**
 * One bounded-duration capture cycle: device open to device close.
 *
 * `chunks()` pulls from the frame queue, merging whatever is already buffered
 * into a single chunk per pull. The duration limit is checked only at the top
 * of each pull, so a session can overrun it by at most one drained batch.
 */
export class CaptureSession {
  readonly id = uuidv4();
  readonly rate: number;
  readonly chunkSize: number;

  private readonly queue = new FrameQueue();
  private readonly source: CaptureSource;
  private readonly limitMs: number;
  private readonly backlogWarningBytes: number;
  private readonly now: () => number;

  private startTime: number | null = null;
  private endReason: string | null = null;
  private _closed = true;
  private iterated = false;
  private backlogWarned = false;
  private bytesCaptured = 0;
  private bytesYielded = 0;
  private chunksYielded = 0;

  constructor(options: CaptureSessionOptions) {
    this.source = options.source;
    this.rate = options.sampleRateHertz;
    this.chunkSize = options.chunkSize;
    this.limitMs = options.streamDurationLimitMs;
    this.now = options.now ?? (() => performance.now());
    const backlogMs = options.backlogWarningMs ?? 10_000;
    this.backlogWarningBytes = Math.floor((this.rate * BYTES_PER_SAMPLE * backlogMs) / 1000);
  }

  get closed(): boolean {
    return this._closed;
  }

  /** Milliseconds since `open()`, or 0 before it. */
  get elapsedMs(): number {
    return this.startTime === null ? 0 : this.now() - this.startTime;
  }

  get stats(): { bytesCaptured: number; bytesYielded: number; chunksYielded: number } {
    return {
      bytesCaptured: this.bytesCaptured,
      bytesYielded: this.bytesYielded,
      chunksYielded: this.chunksYielded,
    };
  }

  /** Why the source stopped on its own, or null if it did not. */
  get sourceEndedReason(): string | null {
    return this.endReason;
  }

  async open(): Promise<void> {
    if (this.startTime !== null) {
      throw new Error(`Capture session ${this.id} was already opened`);
    }

    await this.source.start(
      (frame) => this.fillBuffer(frame),
      (reason) => {
        logger.warn(`Capture session ${this.id}: source ended (${reason})`);
        this.endReason = reason;
        this.queue.end();
      }
    );

    this.startTime = this.now();
    this._closed = false;
    logger.debug(`Capture session ${this.id} opened (${this.rate}Hz, ${this.chunkSize} samples/frame)`);
  }

  /** Capture callback: enqueue only. */
  private fillBuffer(frame: Buffer): void {
    this.bytesCaptured += frame.length;
    this.queue.push(frame);

    if (!this.backlogWarned && this.queue.bufferedBytes >= this.backlogWarningBytes) {
      this.backlogWarned = true;
      const seconds = this.queue.bufferedBytes / (this.rate * BYTES_PER_SAMPLE);
      logger.warn(
        `Capture session ${this.id}: ${seconds.toFixed(1)}s of audio queued, recognizer is falling behind`
      );
    }
  }

  /** Lazy, finite, single-use sequence of merged audio chunks. */
  async *chunks(): AsyncGenerator<Buffer, void, undefined> {
    if (this.iterated) {
      throw new Error(`Capture session ${this.id}: chunks() can only be consumed once`);
    }
    this.iterated = true;

    while (!this._closed) {
      if (this.elapsedMs > this.limitMs) {
        logger.debug(`Capture session ${this.id}: duration limit ${this.limitMs}ms reached`);
        return;
      }

      const first = await this.queue.take();
      if (first === END_OF_STREAM) return;

      const data: Buffer[] = [first];
      let ended = false;
      for (;;) {
        const next = this.queue.poll();
        if (next === undefined) break;
        if (next === END_OF_STREAM) {
          ended = true;
          break;
        }
        data.push(next);
      }

      const chunk = data.length === 1 ? first : Buffer.concat(data);
      this.bytesYielded += chunk.length;
      this.chunksYielded++;
      yield chunk;

      // Frames queued ahead of the sentinel are delivered, never dropped
      if (ended) return;
    }
  }

  /** Release the device and end the chunk sequence. Idempotent. */
  async close(): Promise<void> {
    if (this._closed && this.startTime === null) {
      this.queue.end();
      return;
    }
    if (this._closed) return;

    this._closed = true;
    try {
      await this.source.stop();
    } finally {
      this.queue.end();
      const seconds = this.bytesCaptured / (this.rate * BYTES_PER_SAMPLE);
      logger.debug(
        `Capture session ${this.id} closed after ${(this.elapsedMs / 1000).toFixed(1)}s ` +
        `(${seconds.toFixed(1)}s captured, ${this.chunksYielded} chunks)`
      );
    }
  }
}

/**
 * Scoped acquisition: opens a session, runs `fn`, and closes the session on
 * every exit path.
 */
export async function withCaptureSession<T>(
  options: CaptureSessionOptions,
  fn: (session: CaptureSession) => Promise<T>,
  onOpen?: (session: CaptureSession) => void
): Promise<T> {
  const session = new CaptureSession(options);
  try {
    await session.open();
    onOpen?.(session);
    return await fn(session);
  } finally {
    await session.close();
  }
}
