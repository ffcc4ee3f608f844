import type { RelayConfig } from '../types/index.js';
import { type ConsoleWriter, stdoutWriter } from '../dispatch/console-line.js';
import type { TranscriptSink } from '../dispatch/transcript-dispatcher.js';
import { RelayHttpError, describeError } from '../errors.js';
import { logger } from '../logger.js';

export type FetchLike = (input: string, init: RequestInit) => Promise<Response>;

export interface RelayResult {
  ok: boolean;
  status?: number;
  /** Full reply text received (possibly partial on failure). */
  text: string;
}

export interface BackendRelayOptions {
  fetch?: FetchLike;
  console?: ConsoleWriter;
}

/**
 * Posts final transcripts to the local backend and renders its streamed reply
 * on a single updating console line.
 *
 * `send` never rejects: transport, timeout and HTTP status failures are logged
 * and reported through the returned result.
 */
export class BackendRelay implements TranscriptSink {
  private readonly fetchImpl: FetchLike;
  private readonly out: ConsoleWriter;

  constructor(private readonly config: RelayConfig, options: BackendRelayOptions = {}) {
    this.fetchImpl = options.fetch ?? ((input, init) => fetch(input, init));
    this.out = options.console ?? stdoutWriter;
  }

  async send(transcript: string): Promise<RelayResult> {
    if (transcript.trim() === '') {
      return { ok: false, text: '' };
    }

    logger.info(`Sending text to backend: ${transcript}`);

    let text = '';
    try {
      const response = await this.fetchImpl(this.config.url, {
        method: 'POST',
        headers: { 'Content-Type': 'application/json' },
        body: JSON.stringify({ Question: transcript }),
        signal: AbortSignal.timeout(this.config.timeoutMs),
      });

      if (!response.ok) {
        await response.body?.cancel();
        throw new RelayHttpError(response.status, response.statusText);
      }

      if (response.body) {
        const reader = response.body.getReader();
        const decoder = new TextDecoder('utf-8');
        for (;;) {
          const { done, value } = await reader.read();
          if (done) break;
          if (!value || value.length === 0) continue;
          text += decoder.decode(value, { stream: true });
          this.out.write(`\r${text}`);
        }
        const tail = decoder.decode();
        if (tail) {
          text += tail;
          this.out.write(`\r${text}`);
        }
      }

      if (text) {
        this.out.write('\n');
      }
      return { ok: true, status: response.status, text };
    } catch (err) {
      if (text) {
        this.out.write('\n');
      }
      logger.error(`Error sending request to backend: ${describeError(err)}`);
      return {
        ok: false,
        status: err instanceof RelayHttpError ? err.status : undefined,
        text,
      };
    }
  }
}
