import { SpeechClient } from '@google-cloud/speech';
import type { RecognizeStream, StreamingRecognitionConfig, StreamingRecognizer } from './types.js';
import type { CaptureConfig, SpeechConfig } from '../types/index.js';
import { logger } from '../logger.js';

/**
 * Streaming recognition config for raw microphone PCM.
 * Interim results are always on: the console overwrites them in place.
 */
export function buildStreamingConfig(
  speech: SpeechConfig,
  capture: Pick<CaptureConfig, 'sampleRateHertz'>
): StreamingRecognitionConfig {
  return {
    config: {
      encoding: 'LINEAR16',
      sampleRateHertz: capture.sampleRateHertz,
      languageCode: speech.languageCode,
      ...(speech.model ? { model: speech.model } : {}),
      enableAutomaticPunctuation: speech.enableAutomaticPunctuation,
    },
    interimResults: true,
  };
}

/**
 * Google Cloud Speech-to-Text (v1) recognizer. One gRPC client for the whole
 * process; every capture session opens a fresh streaming call on it.
 */
export class GoogleSpeechRecognizer implements StreamingRecognizer {
  private client: SpeechClient;

  /** `client` replaces the default one built from `config`. */
  constructor(config: SpeechConfig, client?: SpeechClient) {
    if (client) {
      this.client = client;
      return;
    }

    const clientOptions: { projectId?: string; keyFilename?: string } = {};
    if (config.projectId) {
      clientOptions.projectId = config.projectId;
    }
    if (config.keyFile) {
      clientOptions.keyFilename = config.keyFile;
    }

    this.client = new SpeechClient(clientOptions);
    logger.info(
      `Google Cloud Speech client initialized (${config.keyFile ? 'service account key' : 'application default credentials'})`
    );
  }

  streamingRecognize(config: StreamingRecognitionConfig): RecognizeStream {
    return this.client.streamingRecognize(config);
  }

  async close(): Promise<void> {
    await this.client.close();
  }
}
