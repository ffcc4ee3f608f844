import { spawn } from 'child_process';
import type { EventEmitter } from 'events';
import type { Readable } from 'stream';
import type { CaptureConfig } from '../types/index.js';
import { DeviceUnavailableError } from '../errors.js';
import { logger } from '../logger.js';

const START_STABILITY_DELAY_MS = 300;
const SIGKILL_GRACE_MS = 2000;
const BYTES_PER_SAMPLE = 2; // s16le mono

export type FrameCallback = (frame: Buffer) => void;

/**
 * Owns the physical input device. Frames are delivered on the capture
 * callback with no knowledge of who consumes them.
 */
export interface CaptureSource {
  /** Rejects with DeviceUnavailableError if the device cannot be opened. */
  start(onFrame: FrameCallback, onEnd?: (reason: string) => void): Promise<void>;
  stop(): Promise<void>;
}

/** The subset of ChildProcess the capture source relies on. */
export interface CaptureProcess extends EventEmitter {
  readonly stdout: Readable | null;
  readonly stderr: Readable | null;
  readonly exitCode: number | null;
  readonly signalCode: NodeJS.Signals | null;
  readonly pid?: number;
  kill(signal?: NodeJS.Signals): boolean;
}

export type SpawnCapture = (command: string, args: string[]) => CaptureProcess;

export interface MicrophoneSourceOptions {
  spawnProcess?: SpawnCapture;
  startupDelayMs?: number;
}

const defaultSpawn: SpawnCapture = (command, args) =>
  spawn(command, args, { stdio: ['ignore', 'pipe', 'pipe'] });

export function normalizeMicError(raw: string): DeviceUnavailableError {
  const detail = raw.trim();

  if (/Operation not permitted|not authorized|Permission denied/i.test(detail)) {
    return new DeviceUnavailableError(
      'Microphone permission denied. Grant microphone access to the terminal and retry.',
      'permission-denied'
    );
  }

  if (/Input\/output error|No such file|No such device|device not found|could not find|ENOENT/i.test(detail)) {
    return new DeviceUnavailableError(
      'Microphone input device is unavailable. Check CAPTURE_INPUT_FORMAT / CAPTURE_INPUT_DEVICE and that ffmpeg is installed.',
      'not-found'
    );
  }

  return new DeviceUnavailableError(
    detail ? `Microphone capture failed: ${detail}` : 'Microphone capture failed.'
  );
}

export function buildFfmpegArgs(config: CaptureConfig): string[] {
  return [
    '-hide_banner',
    '-loglevel', 'error',
    '-f', config.inputFormat,
    '-i', config.inputDevice,
    '-ac', '1',
    '-ar', String(config.sampleRateHertz),
    '-f', 's16le',
    '-acodec', 'pcm_s16le',
    'pipe:1',
  ];
}

/**
 * Captures mono 16-bit PCM from the configured input through an ffmpeg child
 * process and re-frames stdout into fixed `chunkSize`-sample frames.
 *
 * The stdout `data` handler is the capture callback: it slices and hands
 * frames over synchronously and never awaits.
 */
export class FfmpegMicrophoneSource implements CaptureSource {
  private process: CaptureProcess | null = null;
  private onFrame: FrameCallback | null = null;
  private pending: Buffer[] = [];
  private pendingBytes = 0;
  private stopping = false;
  private readonly frameBytes: number;
  private readonly spawnProcess: SpawnCapture;
  private readonly startupDelayMs: number;

  constructor(private readonly config: CaptureConfig, options: MicrophoneSourceOptions = {}) {
    this.frameBytes = config.chunkSize * BYTES_PER_SAMPLE;
    this.spawnProcess = options.spawnProcess ?? defaultSpawn;
    this.startupDelayMs = options.startupDelayMs ?? START_STABILITY_DELAY_MS;
  }

  get running(): boolean {
    return this.process !== null;
  }

  async start(onFrame: FrameCallback, onEnd?: (reason: string) => void): Promise<void> {
    if (this.process) {
      throw new Error('Microphone source is already running');
    }

    this.onFrame = onFrame;
    this.pending = [];
    this.pendingBytes = 0;
    this.stopping = false;

    let proc: CaptureProcess;
    try {
      proc = this.spawnProcess('ffmpeg', buildFfmpegArgs(this.config));
    } catch (err) {
      throw normalizeMicError(err instanceof Error ? err.message : String(err));
    }

    let stderrLog = '';
    proc.stderr?.on('data', (data: Buffer) => {
      stderrLog += data.toString();
    });
    proc.stdout?.on('data', (data: Buffer) => {
      this.handleAudioData(data);
    });

    await new Promise<void>((resolve, reject) => {
      let settled = false;

      proc.once('error', (err: Error) => {
        if (settled) {
          logger.error('ffmpeg capture: process error:', err);
          return;
        }
        settled = true;
        reject(normalizeMicError(err.message));
      });

      proc.once('exit', (code: number | null, signal: NodeJS.Signals | null) => {
        if (!settled) {
          settled = true;
          reject(normalizeMicError(stderrLog || `ffmpeg exited with code ${code}`));
          return;
        }
        if (this.process === proc) {
          this.process = null;
        }
        if (!this.stopping) {
          const reason = `ffmpeg exited unexpectedly (code ${code}, signal ${signal})`;
          logger.warn(`ffmpeg capture: ${reason}${stderrLog ? `: ${stderrLog.trim()}` : ''}`);
          onEnd?.(reason);
        }
      });

      setTimeout(() => {
        if (settled) return;
        if (proc.exitCode !== null || proc.signalCode !== null) {
          settled = true;
          reject(normalizeMicError(stderrLog || `ffmpeg exited with code ${proc.exitCode}`));
          return;
        }
        settled = true;
        this.process = proc;
        resolve();
      }, this.startupDelayMs);
    });

    logger.debug(
      `ffmpeg capture started: ${this.config.inputFormat} ${this.config.inputDevice} ` +
      `@ ${this.config.sampleRateHertz}Hz, ${this.frameBytes} bytes/frame, pid=${proc.pid}`
    );
  }

  /** Stop capture. Two-stage: SIGTERM, then SIGKILL after 2s. Idempotent. */
  async stop(): Promise<void> {
    const proc = this.process;
    if (!proc) return;
    this.stopping = true;
    this.process = null;

    if (proc.exitCode === null && proc.signalCode === null) {
      await new Promise<void>((resolve) => {
        const sigkillTimer = setTimeout(() => {
          if (proc.exitCode !== null || proc.signalCode !== null) return;
          logger.warn(`ffmpeg capture: SIGTERM ignored, sent SIGKILL (pid=${proc.pid})`);
          proc.kill('SIGKILL');
        }, SIGKILL_GRACE_MS);

        proc.once('exit', () => {
          clearTimeout(sigkillTimer);
          resolve();
        });
        proc.kill('SIGTERM');
      });
    }

    this.flushPendingTail();
    this.pending = [];
    this.pendingBytes = 0;
    this.onFrame = null;
    logger.debug('ffmpeg capture stopped');
  }

  private handleAudioData(data: Buffer): void {
    if (!this.onFrame || data.length === 0) return;

    this.pending.push(data);
    this.pendingBytes += data.length;
    if (this.pendingBytes < this.frameBytes) return;

    const joined = this.pending.length === 1 ? this.pending[0] : Buffer.concat(this.pending, this.pendingBytes);
    let offset = 0;
    while (joined.length - offset >= this.frameBytes) {
      this.onFrame(joined.subarray(offset, offset + this.frameBytes));
      offset += this.frameBytes;
    }

    const rest = joined.subarray(offset);
    this.pending = rest.length > 0 ? [rest] : [];
    this.pendingBytes = rest.length;
  }

  /** Deliver whatever partial frame is still buffered. */
  private flushPendingTail(): void {
    if (!this.onFrame || this.pendingBytes === 0) return;
    this.onFrame(Buffer.concat(this.pending, this.pendingBytes));
  }
}
