import type { Channel } from "./channel.js";
import type { QueryRecord, QuerySet } from "./query-set.js";

export interface BatchRange {
  start: number;
  end: number;
}

/**
 * Split [0, size) into contiguous ranges of `batchSize`; the last may be shorter
 */
export function* partition(size: number, batchSize: number): Generator<BatchRange> {
  if (!Number.isInteger(batchSize) || batchSize < 1) {
    throw new RangeError(`Batch size must be at least 1, got ${String(batchSize)}`);
  }
  for (let start = 0; start < size; start += batchSize) {
    yield { start, end: Math.min(start + batchSize, size) };
  }
}

/**
 * Render every query of `querySet` into batches and hand them to `batches`,
 * closing it once the set is exhausted. Suspends while the channel is full.
 *
 * @returns number of batches sent
 */
export async function produceBatches(
  querySet: QuerySet,
  batchSize: number,
  batches: Channel<QueryRecord[]>
): Promise<number> {
  let count = 0;
  try {
    for (const { start, end } of partition(querySet.size(), batchSize)) {
      const batch: QueryRecord[] = [];
      for (let n = start; n < end; n++) {
        batch.push(querySet.recordAt(n));
      }
      await batches.send(batch);
      count++;
    }
  } finally {
    batches.close();
  }
  return count;
}
