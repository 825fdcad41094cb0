import type { Channel } from "./channel.js";
import { BatchExecutionError, ResultCountMismatchError } from "./errors.js";
import type { QueryRecord } from "./query-set.js";

/**
 * Sends one compound request and returns one scalar per sub-query,
 * in the order the sub-queries appear in the request.
 */
export interface QueryExecutor {
  execute(pql: string, signal?: AbortSignal): Promise<number[]>;
}

export type QueryOutcome =
  | { ok: true; record: QueryRecord; value: number }
  | { ok: false; error: BatchExecutionError };

export interface WorkerPoolOptions {
  concurrency: number;
  batches: Channel<QueryRecord[]>;
  completed: Channel<QueryOutcome>;
  executor: QueryExecutor;
  signal?: AbortSignal;
}

/**
 * Run `concurrency` workers until the batch channel is drained and closed,
 * then close `completed`.
 *
 * A failed batch is reported once on `completed` and stops that worker.
 * Nothing is retried: once a compound response is in doubt its results
 * cannot be matched back to their queries.
 */
export async function runWorkers(options: WorkerPoolOptions): Promise<void> {
  const { concurrency, completed } = options;
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new RangeError(`Concurrency must be at least 1, got ${String(concurrency)}`);
  }
  try {
    const workers = Array.from({ length: concurrency }, () => worker(options));
    const settled = await Promise.allSettled(workers);
    const failure = settled.find((s): s is PromiseRejectedResult => s.status === "rejected");
    if (failure) throw failure.reason;
  } finally {
    completed.close();
  }
}

async function worker({ batches, completed, executor, signal }: WorkerPoolOptions): Promise<void> {
  for await (const batch of batches) {
    const raw = batch.map((q) => q.raw).join("");
    let values: number[];
    try {
      values = await executor.execute(raw, signal);
      if (values.length !== batch.length) {
        throw new ResultCountMismatchError(batch.length, values.length);
      }
    } catch (error) {
      if (signal?.aborted) throw error;
      await completed.send({ ok: false, error: new BatchExecutionError(raw, error) });
      return;
    }
    for (const [n, record] of batch.entries()) {
      await completed.send({ ok: true, record, value: values[n] ?? Number.NaN });
    }
  }
}
