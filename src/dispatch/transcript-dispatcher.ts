import type { RecognitionResponse } from '../stt/types.js';
import { type ConsoleWriter, overwritePadding, stdoutWriter } from './console-line.js';
import { isStopPhrase as defaultStopPhrase } from './stop-phrase.js';
import { logger } from '../logger.js';

/** Receives each final transcript. Implementations are expected not to throw. */
export interface TranscriptSink {
  send(transcript: string): Promise<unknown>;
}

export interface DispatcherOptions {
  relay: TranscriptSink;
  console?: ConsoleWriter;
  isStopPhrase?: (transcript: string) => boolean;
}

export interface DispatchOutcome {
  /** Last final transcript, or null when no result was ever final. */
  lastTranscript: string | null;
  /** A final transcript contained a stop word. */
  stopRequested: boolean;
  finalCount: number;
}

/**
 * Render recognition responses to the console and forward finals.
 *
 * Interim results overwrite the current line (`\r`); finals end it (`\n`),
 * are sent to the relay, and end the loop when they contain a stop word.
 * Only the first result of each response is considered.
 */
export async function dispatchTranscripts(
  responses: AsyncIterable<RecognitionResponse>,
  options: DispatcherOptions
): Promise<DispatchOutcome> {
  const out = options.console ?? stdoutWriter;
  const matchesStop = options.isStopPhrase ?? defaultStopPhrase;

  let numCharsPrinted = 0;
  const outcome: DispatchOutcome = { lastTranscript: null, stopRequested: false, finalCount: 0 };

  for await (const response of responses) {
    const result = response.results?.[0];
    if (!result) continue;

    const alternative = result.alternatives?.[0];
    if (!alternative) continue;

    const transcript = alternative.transcript ?? '';
    const padding = ' '.repeat(overwritePadding(numCharsPrinted, transcript.length));

    if (!result.isFinal) {
      out.write(`${transcript}${padding}\r`);
      numCharsPrinted = transcript.length;
      continue;
    }

    out.write(`${transcript}${padding}\n`);
    outcome.lastTranscript = transcript;
    outcome.finalCount++;

    try {
      await options.relay.send(transcript);
    } catch (err) {
      logger.error('Relay failed for final transcript:', err);
    }

    if (matchesStop(transcript)) {
      out.write('Exiting..\n');
      outcome.stopRequested = true;
      break;
    }

    numCharsPrinted = 0;
  }

  return outcome;
}
