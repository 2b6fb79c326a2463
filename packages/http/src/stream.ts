import { PassThrough, type Readable, type Writable } from 'node:stream';

import { getLogger } from '@ons-clients/logger';
import { err, ok, type Result } from 'neverthrow';

const logger = getLogger('stream');

/** Reads `input` and writes the transformed bytes to `output`; must not end `output`. */
export type Transformer = (input: Readable, output: Writable) => Promise<Result<void, Error>>;

/** Reads the transformed stream to its end. Rejecting stops the transform. */
export type Consumer = (input: Readable) => Promise<void>;

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(String(error));
}

/**
 * Pipe `body` through `transform` into `consume`, running both concurrently.
 *
 * The intermediate stream is ended when the transform succeeds and destroyed
 * with its error otherwise, so the consumer sees the failure on its next read.
 * A failing consumer destroys the stream, which fails any pending transform
 * write. `body` is always destroyed once the transform returns.
 */
export async function streamThrough(
  body: Readable,
  transform: Transformer,
  consume: Consumer
): Promise<Result<void, Error>> {
  const pipe = new PassThrough();
  // Failures reach the caller through the returned Result
  pipe.on('error', (error) => logger.debug(`stream closed with error: ${error.message}`));

  const transformed = (async (): Promise<Error | undefined> => {
    try {
      const result = await transform(body, pipe);
      if (result.isErr()) {
        pipe.destroy(result.error);
        return result.error;
      }
      pipe.end();
      return undefined;
    } catch (error) {
      const failure = toError(error);
      pipe.destroy(failure);
      return failure;
    } finally {
      body.destroy();
    }
  })();

  const consumed = (async (): Promise<Error | undefined> => {
    try {
      await consume(pipe);
      if (!pipe.readableEnded) {
        logger.warn('consumer returned before the end of the stream');
        pipe.destroy();
      }
      return undefined;
    } catch (error) {
      const failure = toError(error);
      if (!pipe.destroyed) {
        pipe.destroy(failure);
      }
      return failure;
    }
  })();

  const [transformError, consumeError] = await Promise.all([transformed, consumed]);

  if (transformError && consumeError) {
    return err(
      new Error(`transform error: ${transformError.message}, consumer error: ${consumeError.message}`, {
        cause: transformError,
      })
    );
  }
  if (transformError) {
    return err(new Error(`transform error: ${transformError.message}`, { cause: transformError }));
  }
  if (consumeError) {
    return err(new Error(`consumer error: ${consumeError.message}`, { cause: consumeError }));
  }
  return ok();
}
