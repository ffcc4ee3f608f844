import { logger } from '../logger.js';

/** Standard-model streaming price per minute of audio, plus a 20% buffer. */
const PRICE_PER_MINUTE_USD = 0.024;
const COST_BUFFER = 1.2;

/**
 * Tracks audio streamed to the recognizer over the life of the process.
 * Streaming recognition bills for all audio sent, not only speech.
 */
export class SttUsageTracker {
  private totalAudioMs = 0;
  private sessionCount = 0;
  private warningEmitted = false;

  constructor(private readonly costWarningUsd: number) {}

  /** Record one finished capture session. */
  addSession(audioBytes: number, sampleRateHertz: number): void {
    const durationMs = (audioBytes / (sampleRateHertz * 2)) * 1000;
    this.totalAudioMs += durationMs;
    this.sessionCount++;

    if (!this.warningEmitted) {
      const cost = this.estimateCost();
      if (cost >= this.costWarningUsd) {
        logger.warn(
          `STT cost warning: estimated $${cost.toFixed(2)} ` +
          `(${this.audioMinutes.toFixed(1)} audio-minutes over ${this.sessionCount} sessions)`
        );
        this.warningEmitted = true;
      }
    }
  }

  get audioMinutes(): number {
    return this.totalAudioMs / 60000;
  }

  get sessions(): number {
    return this.sessionCount;
  }

  estimateCost(): number {
    return this.audioMinutes * PRICE_PER_MINUTE_USD * COST_BUFFER;
  }

  /** Log the running total (called at shutdown). */
  report(): void {
    if (this.totalAudioMs === 0) return;
    logger.info(
      `STT usage: ${this.audioMinutes.toFixed(1)} audio-minutes over ${this.sessionCount} sessions, ` +
      `estimated $${this.estimateCost().toFixed(2)}`
    );
  }
}
