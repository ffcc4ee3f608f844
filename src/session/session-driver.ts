import { type CaptureSession, withCaptureSession } from '../audio/capture-session.js';
import type { CaptureSource } from '../audio/microphone-source.js';
import { type DispatchOutcome, type TranscriptSink, dispatchTranscripts } from '../dispatch/transcript-dispatcher.js';
import type { ConsoleWriter } from '../dispatch/console-line.js';
import { recognize } from '../stt/recognition-bridge.js';
import type { StreamingRecognitionConfig, StreamingRecognizer } from '../stt/types.js';
import type { SttUsageTracker } from '../stt/usage-tracker.js';
import type { CaptureConfig, SupervisorConfig } from '../types/index.js';
import { DeviceUnavailableError, SupervisorGaveUpError } from '../errors.js';
import { backoffDelayMs, sleep as defaultSleep } from '../utils/backoff.js';
import { logger } from '../logger.js';

export type SessionOutcome = 'completed' | 'stopped' | 'failed';

export interface SessionDriverOptions {
  /** Called once per session; each session owns a fresh device handle. */
  createSource: () => CaptureSource;
  recognizer: StreamingRecognizer;
  relay: TranscriptSink;
  streamingConfig: StreamingRecognitionConfig;
  capture: Pick<CaptureConfig, 'sampleRateHertz' | 'chunkSize' | 'streamDurationLimitSeconds' | 'backlogWarningSeconds'>;
  supervisor: SupervisorConfig;
  isStopPhrase?: (transcript: string) => boolean;
  console?: ConsoleWriter;
  usage?: SttUsageTracker;
  sleep?: (ms: number, signal: AbortSignal) => Promise<void>;
  /** Monotonic clock handed to each capture session. */
  now?: () => number;
}

/**
 * Outer supervision loop: capture session → recognition stream → dispatcher,
 * over and over, each session bounded by the capture duration limit.
 *
 * A stop phrase ends the whole loop. Failed sessions (device lost or never
 * opened, recognizer stream error) are retried after an exponential backoff
 * until `maxConsecutiveFailures` in a row, after which `run()` rejects with
 * SupervisorGaveUpError. Any session that completes resets the failure count.
 */
export class SessionDriver {
  private readonly abortController = new AbortController();
  private activeSession: CaptureSession | null = null;
  private consecutiveFailures = 0;
  private sessionCount = 0;
  private lastError: unknown = null;

  constructor(private readonly options: SessionDriverOptions) {}

  get sessionsStarted(): number {
    return this.sessionCount;
  }

  get stopping(): boolean {
    return this.abortController.signal.aborted;
  }

  async run(): Promise<void> {
    const { supervisor } = this.options;
    const sleep = this.options.sleep ?? defaultSleep;

    while (!this.stopping) {
      const outcome = await this.runSession();

      if (outcome === 'stopped') {
        logger.info('Stop phrase heard, shutting down');
        this.abortController.abort();
        return;
      }

      if (outcome === 'completed') {
        this.consecutiveFailures = 0;
        continue;
      }

      if (this.stopping) return;

      this.consecutiveFailures++;
      if (this.consecutiveFailures >= supervisor.maxConsecutiveFailures) {
        throw new SupervisorGaveUpError(this.consecutiveFailures, { cause: this.lastError });
      }

      const delayMs = backoffDelayMs(this.consecutiveFailures, supervisor);
      logger.warn(
        `Session failed (${this.consecutiveFailures}/${supervisor.maxConsecutiveFailures}), restarting in ${delayMs}ms`
      );
      await sleep(delayMs, this.abortController.signal);
    }
  }

  /** One capture-and-recognize cycle. Never throws. */
  async runSession(): Promise<SessionOutcome> {
    const { capture } = this.options;
    const sequence = ++this.sessionCount;

    try {
      const result: DispatchOutcome = await withCaptureSession(
        {
          source: this.options.createSource(),
          sampleRateHertz: capture.sampleRateHertz,
          chunkSize: capture.chunkSize,
          streamDurationLimitMs: capture.streamDurationLimitSeconds * 1000,
          backlogWarningMs: capture.backlogWarningSeconds * 1000,
          now: this.options.now,
        },
        async (session) => {
          const responses = recognize(this.options.recognizer, this.options.streamingConfig, session.chunks());
          const outcome = await dispatchTranscripts(responses, {
            relay: this.options.relay,
            console: this.options.console,
            isStopPhrase: this.options.isStopPhrase,
          });
          // Audio already captured was still recognized; the lost device counts as a failure
          const lostDevice = session.sourceEndedReason;
          if (lostDevice !== null && !outcome.stopRequested) {
            throw new DeviceUnavailableError(`Microphone capture failed: ${lostDevice}`);
          }
          return outcome;
        },
        (session) => {
          this.activeSession = session;
          logger.info(`Session #${sequence} listening (${session.id})`);
        }
      );

      logger.debug(`Session #${sequence} ended with ${result.finalCount} final transcripts`);
      return result.stopRequested ? 'stopped' : 'completed';
    } catch (err) {
      this.lastError = err;
      logger.error(`Session #${sequence} failed:`, err);
      return 'failed';
    } finally {
      const session = this.activeSession;
      this.activeSession = null;
      if (session) {
        this.recordUsage(session);
      }
    }
  }

  /** End the current session and stop the loop. */
  async stop(): Promise<void> {
    this.abortController.abort();
    const session = this.activeSession;
    if (session) {
      await session.close();
    }
  }

  private recordUsage(session: CaptureSession): void {
    this.options.usage?.addSession(session.stats.bytesYielded, session.rate);
  }
}
