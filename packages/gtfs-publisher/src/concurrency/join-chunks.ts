/**
 * Join the concurrent calls of one fanned-out step.
 *
 * Every chunk runs to completion before the join settles, so nothing a step
 * started is still in flight once the step has failed.
 */

import { ChunkUploadError, toError, type ChunkFailure } from '../core/errors.js';

/**
 * Resolve with every chunk's output in chunk order, or reject with one
 * ChunkUploadError listing each failed chunk
 */
export async function joinChunks<T>(chunks: readonly Promise<T>[]): Promise<T[]> {
  const settled = await Promise.allSettled(chunks);

  const values: T[] = [];
  const failures: ChunkFailure[] = [];
  settled.forEach((outcome, chunkIndex) => {
    if (outcome.status === 'fulfilled') {
      values.push(outcome.value);
    } else {
      failures.push({ chunkIndex, reason: toError(outcome.reason).message });
    }
  });

  if (failures.length > 0) {
    throw new ChunkUploadError(chunks.length, failures);
  }
  return values;
}
