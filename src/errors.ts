/** The microphone could not be opened (missing device, permission denied, ffmpeg absent). */
export class DeviceUnavailableError extends Error {
  readonly reason: 'permission-denied' | 'not-found' | 'unknown';

  constructor(message: string, reason: DeviceUnavailableError['reason'] = 'unknown') {
    super(message);
    this.name = 'DeviceUnavailableError';
    this.reason = reason;
  }
}

/** A streaming recognition call failed. `code` is the gRPC status code when the server supplied one. */
export class RecognizerStreamError extends Error {
  readonly code: number | null;

  constructor(message: string, code: number | null, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'RecognizerStreamError';
    this.code = code;
  }
}

export class RelayHttpError extends Error {
  readonly status: number;

  constructor(status: number, statusText: string) {
    super(`Backend responded with HTTP ${status}${statusText ? ` ${statusText}` : ''}`);
    this.name = 'RelayHttpError';
    this.status = status;
  }
}

export class SupervisorGaveUpError extends Error {
  readonly attempts: number;

  constructor(attempts: number, options?: { cause?: unknown }) {
    super(`Giving up after ${attempts} consecutive failed sessions`, options);
    this.name = 'SupervisorGaveUpError';
    this.attempts = attempts;
  }
}

/** gRPC status code carried by errors from google-gax, if any. */
export function grpcCode(err: unknown): number | null {
  if (err && typeof err === 'object' && 'code' in err && typeof err.code === 'number') {
    return err.code;
  }
  return null;
}

export function describeError(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
