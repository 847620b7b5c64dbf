import type { Stream } from 'node:stream';

export type FailedSide = 'source' | 'sink';

/**
 * Remember which end of a transfer failed first.
 *
 * Once one stream of a pipeline errors, the pipeline destroys the others with
 * the same error, so only the first error event tells whether the network or
 * the disk gave up.
 */
export function watchFailure(source: Stream, sink: Stream): () => FailedSide | undefined {
  let failed: FailedSide | undefined;

  source.once('error', () => {
    failed ??= 'source';
  });
  sink.once('error', () => {
    failed ??= 'sink';
  });

  return () => failed;
}
