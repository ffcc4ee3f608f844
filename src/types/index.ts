export interface SpeechConfig {
  projectId: string;
  keyFile: string;
  languageCode: string;
  /** Empty string leaves model selection to the service. */
  model: string;
  enableAutomaticPunctuation: boolean;
  /** Log a warning once the estimated streaming cost of this run reaches this amount. */
  costWarningUsd: number;
}

export interface CaptureConfig {
  /** ffmpeg input format, e.g. avfoundation, pulse, alsa, dshow. */
  inputFormat: string;
  inputDevice: string;
  sampleRateHertz: number;
  /** Samples per capture frame (~100ms). */
  chunkSize: number;
  streamDurationLimitSeconds: number;
  backlogWarningSeconds: number;
}

export interface RelayConfig {
  url: string;
  timeoutMs: number;
}

export interface SupervisorConfig {
  maxConsecutiveFailures: number;
  baseDelayMs: number;
  maxDelayMs: number;
}

export interface AppConfig {
  speech: SpeechConfig;
  capture: CaptureConfig;
  relay: RelayConfig;
  supervisor: SupervisorConfig;
  stopWords: string[];
  eventLoopLagThresholdMs: number;
}
