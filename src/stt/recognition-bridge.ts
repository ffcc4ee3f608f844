import type {
  RecognitionResponse,
  RecognizeStream,
  StreamingRecognitionConfig,
  StreamingRecognizer,
} from './types.js';
import { RecognizerStreamError, describeError, grpcCode } from '../errors.js';
import { logger } from '../logger.js';

/** gRPC OUT_OF_RANGE: the server closed the call at its own duration limit. */
const GRPC_OUT_OF_RANGE = 11;

function waitForDrain(stream: RecognizeStream): Promise<void> {
  return new Promise((resolve) => {
    const done = (): void => {
      stream.off('drain', done);
      stream.off('close', done);
      resolve();
    };
    stream.once('drain', done);
    stream.once('close', done);
  });
}

/**
 * Drive one streaming recognize call: one audio request per chunk,
 * responses yielded in arrival order.
 *
 * The request side ends when `chunks` ends. Stream failures surface as
 * RecognizerStreamError; nothing is retried here. Abandoning the returned
 * generator early cancels the call.
 */
export async function* recognize(
  recognizer: StreamingRecognizer,
  config: StreamingRecognitionConfig,
  chunks: AsyncIterable<Buffer>
): AsyncGenerator<RecognitionResponse, void, undefined> {
  const stream = recognizer.streamingRecognize(config);
  let requestCount = 0;

  const pump = async (): Promise<void> => {
    for await (const chunk of chunks) {
      if (stream.destroyed) return;
      requestCount++;
      // The client helper wraps each raw buffer in { audioContent }
      if (!stream.write(chunk)) {
        await waitForDrain(stream);
      }
    }
    if (!stream.destroyed) {
      logger.debug(`Recognition bridge: audio ended after ${requestCount} requests, closing request stream`);
      stream.end();
    }
  };

  void pump().catch((err: unknown) => {
    stream.destroy(err instanceof Error ? err : new Error(String(err)));
  });

  try {
    for await (const response of stream) {
      yield response;
    }
  } catch (err) {
    const code = grpcCode(err);
    if (code === GRPC_OUT_OF_RANGE) {
      logger.debug('Recognition bridge: stream ended at the service duration limit');
      return;
    }
    throw new RecognizerStreamError(`Streaming recognition failed: ${describeError(err)}`, code, { cause: err });
  } finally {
    if (!stream.destroyed) {
      stream.destroy();
    }
  }
}
