import type { Duplex } from 'stream';
import type { protos } from '@google-cloud/speech';

export type StreamingRecognitionConfig = protos.google.cloud.speech.v1.IStreamingRecognitionConfig;

export interface RecognitionAlternative {
  transcript?: string | null;
}

export interface RecognitionResult {
  alternatives?: RecognitionAlternative[] | null;
  isFinal?: boolean | null;
}

/**
 * The part of a streaming recognize response the pipeline reads.
 * Google's IStreamingRecognizeResponse satisfies it structurally.
 */
export interface RecognitionResponse {
  results?: RecognitionResult[] | null;
}

/** Bidirectional recognize call: raw audio buffers in, response objects out. */
export type RecognizeStream = Duplex;

export interface StreamingRecognizer {
  streamingRecognize(config: StreamingRecognitionConfig): RecognizeStream;
  close(): Promise<void>;
}
