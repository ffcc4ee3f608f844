import { describe, it, expect, vi } from 'vitest';
import { CaptureSession, withCaptureSession, type CaptureSessionOptions } from './capture-session.js';
import { DeviceUnavailableError } from '../errors.js';
import { FakeCaptureSource, collect } from '../testing/fakes.js';
import { logger } from '../logger.js';

const LIMIT_MS = 300_000;

function frame(fill: number, length = 4): Buffer {
  return Buffer.alloc(length, fill);
}

function sessionOptions(source: FakeCaptureSource, overrides: Partial<CaptureSessionOptions> = {}): CaptureSessionOptions {
  return {
    source,
    sampleRateHertz: 16000,
    chunkSize: 1600,
    streamDurationLimitMs: LIMIT_MS,
    ...overrides,
  };
}

describe('CaptureSession', () => {
  it('merges buffered frames into one chunk and conserves every byte in order', async () => {
    const frames = [frame(1), frame(2, 3), frame(3), frame(4, 1), frame(5)];
    const source = new FakeCaptureSource({ frames, endAfterFrames: true });
    const session = new CaptureSession(sessionOptions(source));
    await session.open();

    const chunks = await collect(session.chunks());

    expect(chunks).toHaveLength(1);
    expect(Buffer.concat(chunks)).toEqual(Buffer.concat(frames));
    expect(session.stats).toEqual({ bytesCaptured: 16, bytesYielded: 16, chunksYielded: 1 });
  });

  it('yields a lone frame as soon as it arrives, then merges what piled up', async () => {
    const source = new FakeCaptureSource();
    const session = new CaptureSession(sessionOptions(source));
    await session.open();
    const iterator = session.chunks();

    const firstPull = iterator.next();
    source.emit(frame(1));
    expect(await firstPull).toEqual({ done: false, value: frame(1) });

    source.emit(frame(2));
    source.emit(frame(3));
    expect(await iterator.next()).toEqual({ done: false, value: Buffer.concat([frame(2), frame(3)]) });

    source.end();
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('ends without yielding once the duration limit has passed, even with audio queued', async () => {
    let now = 1000;
    const source = new FakeCaptureSource({ frames: [frame(1), frame(2)] });
    const session = new CaptureSession(sessionOptions(source, { now: () => now }));
    await session.open();

    now = 1000 + LIMIT_MS + 1;

    expect(await collect(session.chunks())).toEqual([]);
  });

  it('checks the duration limit only at the top of each pull', async () => {
    let now = 0;
    const source = new FakeCaptureSource({ frames: [frame(1)] });
    const session = new CaptureSession(sessionOptions(source, { now: () => now }));
    await session.open();
    const iterator = session.chunks();

    now = LIMIT_MS;
    expect(await iterator.next()).toEqual({ done: false, value: frame(1) });

    now = LIMIT_MS + 1;
    source.emit(frame(2));
    expect(await iterator.next()).toEqual({ done: true, value: undefined });
  });

  it('close() releases the source and ends a consumer blocked on the queue', async () => {
    const source = new FakeCaptureSource();
    const session = new CaptureSession(sessionOptions(source));
    await session.open();
    const pending = session.chunks().next();

    await session.close();

    expect(await pending).toEqual({ done: true, value: undefined });
    expect(source.stopped).toBe(true);
    expect(session.closed).toBe(true);
  });

  it('remembers why the source ended on its own, but not a normal close', async () => {
    vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const lostSource = new FakeCaptureSource();
    const lost = new CaptureSession(sessionOptions(lostSource));
    const closed = new CaptureSession(sessionOptions(new FakeCaptureSource()));
    await lost.open();
    await closed.open();

    expect(lost.sourceEndedReason).toBeNull();
    lostSource.end('ffmpeg exited unexpectedly (code 1, signal null)');
    expect(lost.sourceEndedReason).toBe('ffmpeg exited unexpectedly (code 1, signal null)');
    expect(await collect(lost.chunks())).toEqual([]);

    await closed.close();
    expect(closed.sourceEndedReason).toBeNull();
  });

  it('refuses to be iterated twice', async () => {
    const source = new FakeCaptureSource({ endAfterFrames: true });
    const session = new CaptureSession(sessionOptions(source));
    await session.open();
    await collect(session.chunks());

    await expect(session.chunks().next()).rejects.toThrow('can only be consumed once');
  });

  it('warns once when the unread backlog passes the threshold', async () => {
    const warn = vi.spyOn(logger, 'warn').mockImplementation(() => undefined);
    const source = new FakeCaptureSource();
    // 100ms at 16kHz s16le = 3200 bytes
    const session = new CaptureSession(sessionOptions(source, { backlogWarningMs: 100 }));
    await session.open();

    source.emit(Buffer.alloc(3199));
    expect(warn).not.toHaveBeenCalled();
    source.emit(Buffer.alloc(10));
    source.emit(Buffer.alloc(5000));
    expect(warn).toHaveBeenCalledTimes(1);
  });
});

describe('withCaptureSession', () => {
  it('closes the session after the body completes', async () => {
    const source = new FakeCaptureSource({ frames: [frame(9)], endAfterFrames: true });

    const chunks = await withCaptureSession(sessionOptions(source), (session) => collect(session.chunks()));

    expect(chunks).toEqual([frame(9)]);
    expect(source.stopped).toBe(true);
  });

  it('closes the session when the body throws', async () => {
    const source = new FakeCaptureSource();

    await expect(
      withCaptureSession(sessionOptions(source), async () => {
        throw new Error('recognizer went away');
      })
    ).rejects.toThrow('recognizer went away');
    expect(source.stopped).toBe(true);
  });

  it('propagates device failures without running the body', async () => {
    const source = new FakeCaptureSource({ startError: new DeviceUnavailableError('no mic', 'not-found') });
    const body = vi.fn(async () => 'unreachable');

    await expect(withCaptureSession(sessionOptions(source), body)).rejects.toBeInstanceOf(DeviceUnavailableError);
    expect(body).not.toHaveBeenCalled();
    expect(source.stopped).toBe(false);
  });
});
