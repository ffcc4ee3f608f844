import { EventEmitter } from 'events';
import { PassThrough } from 'stream';
import { describe, it, expect, vi } from 'vitest';
import {
  FfmpegMicrophoneSource,
  buildFfmpegArgs,
  normalizeMicError,
  type CaptureProcess,
} from './microphone-source.js';
import { DeviceUnavailableError } from '../errors.js';
import type { CaptureConfig } from '../types/index.js';

const captureConfig: CaptureConfig = {
  inputFormat: 'pulse',
  inputDevice: 'default',
  sampleRateHertz: 16000,
  chunkSize: 1600,
  streamDurationLimitSeconds: 300,
  backlogWarningSeconds: 10,
};

class FakeFfmpeg extends EventEmitter implements CaptureProcess {
  readonly stdout = new PassThrough();
  readonly stderr = new PassThrough();
  exitCode: number | null = null;
  signalCode: NodeJS.Signals | null = null;
  readonly pid = 4242;
  readonly signals: NodeJS.Signals[] = [];

  kill(signal: NodeJS.Signals = 'SIGTERM'): boolean {
    this.signals.push(signal);
    setImmediate(() => {
      this.signalCode = signal;
      this.emit('exit', null, signal);
    });
    return true;
  }

  exit(code: number): void {
    this.exitCode = code;
    this.emit('exit', code, null);
  }
}

const tick = (): Promise<void> => new Promise((resolve) => setImmediate(resolve));

function bytes(length: number, offset = 0): Buffer {
  const buffer = Buffer.alloc(length);
  for (let i = 0; i < length; i++) {
    buffer[i] = (i + offset) % 251;
  }
  return buffer;
}

describe('buildFfmpegArgs', () => {
  it('captures mono s16le at the configured rate', () => {
    expect(buildFfmpegArgs(captureConfig)).toEqual([
      '-hide_banner',
      '-loglevel', 'error',
      '-f', 'pulse',
      '-i', 'default',
      '-ac', '1',
      '-ar', '16000',
      '-f', 's16le',
      '-acodec', 'pcm_s16le',
      'pipe:1',
    ]);
  });
});

describe('normalizeMicError', () => {
  it('classifies permission failures', () => {
    const err = normalizeMicError('[avfoundation] Operation not permitted');
    expect(err).toBeInstanceOf(DeviceUnavailableError);
    expect(err.reason).toBe('permission-denied');
  });

  it('classifies missing devices and a missing ffmpeg binary', () => {
    expect(normalizeMicError('default: No such device').reason).toBe('not-found');
    expect(normalizeMicError('spawn ffmpeg ENOENT').reason).toBe('not-found');
  });

  it('keeps other detail in the message', () => {
    const err = normalizeMicError('something odd\n');
    expect(err.reason).toBe('unknown');
    expect(err.message).toBe('Microphone capture failed: something odd');
  });
});

describe('FfmpegMicrophoneSource', () => {
  it('re-frames stdout into exact chunk-size frames', async () => {
    const proc = new FakeFfmpeg();
    const spawnProcess = vi.fn(() => proc);
    const source = new FfmpegMicrophoneSource(captureConfig, { spawnProcess, startupDelayMs: 0 });
    const frames: Buffer[] = [];

    await source.start((frame) => frames.push(Buffer.from(frame)));
    expect(spawnProcess).toHaveBeenCalledWith('ffmpeg', buildFfmpegArgs(captureConfig));

    const input = bytes(7000);
    proc.stdout.write(input.subarray(0, 5000));
    await tick();
    proc.stdout.write(input.subarray(5000));
    await tick();

    expect(frames.map((f) => f.length)).toEqual([3200, 3200]);
    expect(Buffer.concat(frames)).toEqual(input.subarray(0, 6400));
  });

  it('flushes a trailing partial frame on stop', async () => {
    const proc = new FakeFfmpeg();
    const source = new FfmpegMicrophoneSource(captureConfig, { spawnProcess: () => proc, startupDelayMs: 0 });
    const frames: Buffer[] = [];
    await source.start((frame) => frames.push(Buffer.from(frame)));

    proc.stdout.write(bytes(2000, 3));
    await tick();
    expect(frames).toHaveLength(0);

    await source.stop();

    expect(proc.signals).toEqual(['SIGTERM']);
    expect(frames).toEqual([bytes(2000, 3)]);
    expect(source.running).toBe(false);
  });

  it('flushes even a tail far shorter than a frame', async () => {
    const proc = new FakeFfmpeg();
    const source = new FfmpegMicrophoneSource(captureConfig, { spawnProcess: () => proc, startupDelayMs: 0 });
    const frames: Buffer[] = [];
    await source.start((frame) => frames.push(frame));

    proc.stdout.write(bytes(10));
    await tick();
    await source.stop();

    expect(frames).toEqual([bytes(10)]);
  });

  it('rejects with DeviceUnavailableError when ffmpeg cannot be spawned', async () => {
    const proc = new FakeFfmpeg();
    const source = new FfmpegMicrophoneSource(captureConfig, {
      spawnProcess: () => {
        setImmediate(() => proc.emit('error', new Error('spawn ffmpeg ENOENT')));
        return proc;
      },
      startupDelayMs: 50,
    });

    const started = source.start(() => undefined);

    await expect(started).rejects.toBeInstanceOf(DeviceUnavailableError);
    await expect(started).rejects.toMatchObject({ reason: 'not-found' });
  });

  it('rejects when ffmpeg exits during startup, using its stderr', async () => {
    const proc = new FakeFfmpeg();
    const source = new FfmpegMicrophoneSource(captureConfig, {
      spawnProcess: () => {
        setImmediate(() => {
          proc.stderr.write('Permission denied\n');
          setImmediate(() => proc.exit(1));
        });
        return proc;
      },
      startupDelayMs: 50,
    });

    await expect(source.start(() => undefined)).rejects.toMatchObject({
      name: 'DeviceUnavailableError',
      reason: 'permission-denied',
    });
  });

  it('reports an unexpected exit after startup', async () => {
    const proc = new FakeFfmpeg();
    const source = new FfmpegMicrophoneSource(captureConfig, { spawnProcess: () => proc, startupDelayMs: 0 });
    const onEnd = vi.fn();
    await source.start(() => undefined, onEnd);

    proc.exit(1);

    expect(onEnd).toHaveBeenCalledWith('ffmpeg exited unexpectedly (code 1, signal null)');
    expect(source.running).toBe(false);
  });

  it('does not report the exit it caused itself', async () => {
    const proc = new FakeFfmpeg();
    const source = new FfmpegMicrophoneSource(captureConfig, { spawnProcess: () => proc, startupDelayMs: 0 });
    const onEnd = vi.fn();
    await source.start(() => undefined, onEnd);

    await source.stop();
    await source.stop();

    expect(onEnd).not.toHaveBeenCalled();
    expect(proc.signals).toEqual(['SIGTERM']);
  });
});
