import { Channel } from "./channel.js";
import { collect } from "./collector.js";
import { SetupError, TeardownError, errorMessage } from "./errors.js";
import { produceBatches } from "./producer.js";
import type { QueryRecord, QuerySet } from "./query-set.js";
import type { ResultsSink, SinkFactory } from "./sink.js";
import type { BenchmarkSummary, Logger } from "./types.js";
import { runWorkers, type QueryExecutor, type QueryOutcome } from "./workers.js";

export interface RunOptions {
  executor: QueryExecutor;
  concurrency: number;
  batchSize: number;
  sinkFactory: SinkFactory;
  /** Reported on the summary as-is */
  recordCount?: number;
  /** Stops producer, workers and collector at their next suspension point */
  signal?: AbortSignal;
  logger?: Logger;
}

/**
 * Send every query of `querySet` to the engine in batches of `batchSize`
 * over `concurrency` workers, writing each result to a fresh results sink.
 *
 * Never throws for a failed run: the returned summary carries the error.
 * Results written before a failure stay in the sink.
 */
export async function runQuerySet(
  querySet: QuerySet,
  options: RunOptions
): Promise<BenchmarkSummary> {
  const { executor, concurrency, batchSize } = options;
  const logger = options.logger ?? console;
  const timestamp = Math.floor(Date.now() / 1000);
  const base = {
    name: querySet.name,
    concurrency,
    batchSize,
    recordCount: options.recordCount ?? 0,
    timestamp,
  };

  let summary: BenchmarkSummary;
  let needsTeardown = false;
  try {
    assertPositive("concurrency", concurrency);
    assertPositive("batch size", batchSize);

    const start = performance.now();
    if (querySet.setup) {
      try {
        await executor.execute(querySet.setup, options.signal);
      } catch (error) {
        // A setup cut short by cancellation may still have run on the engine
        needsTeardown = options.signal?.aborted ?? false;
        throw new SetupError(error);
      }
    }
    needsTeardown = true;

    const sink = await options.sinkFactory({ name: querySet.name, timestamp, concurrency, batchSize });
    let seconds: number;
    let written: number;
    try {
      written = await pipeline(querySet, options, sink);
      seconds = (performance.now() - start) / 1000;
    } finally {
      await sink.close();
    }

    logger.log(`[${querySet.name}] wrote ${String(written)} results to ${sink.location}`);
    summary = { ...base, iterations: querySet.size(), seconds };
  } catch (error) {
    logger.error(`[${querySet.name}] ${errorMessage(error)}`);
    summary = { ...base, iterations: 0, seconds: -1, error: errorMessage(error) };
  }

  // Teardown also runs after a failed or cancelled pass so setup state does not leak
  if (needsTeardown && querySet.teardown) {
    try {
      await executor.execute(querySet.teardown);
    } catch (error) {
      const teardownError = new TeardownError(error);
      logger.error(`[${querySet.name}] ${teardownError.message}`);
      summary.teardownError = teardownError.message;
    }
  }

  return summary;
}

/**
 * Producer, workers and collector joined by two bounded channels.
 * The first failure aborts the shared signal and becomes the pass's error.
 */
async function pipeline(
  querySet: QuerySet,
  { executor, concurrency, batchSize, signal }: RunOptions,
  sink: ResultsSink
): Promise<number> {
  const controller = new AbortController();
  const forward = (): void => {
    controller.abort(signal?.reason);
  };
  if (signal?.aborted) forward();
  signal?.addEventListener("abort", forward, { once: true });

  const stop = (error: unknown): never => {
    if (!controller.signal.aborted) controller.abort(error);
    throw error;
  };

  try {
    const batches = new Channel<QueryRecord[]>(concurrency, controller.signal);
    const completed = new Channel<QueryOutcome>(concurrency * batchSize, controller.signal);

    const [, , collected] = await Promise.allSettled([
      produceBatches(querySet, batchSize, batches).catch(stop),
      runWorkers({ concurrency, batches, completed, executor, signal: controller.signal }).catch(
        stop
      ),
      collect(completed, sink).catch(stop),
    ]);

    if (controller.signal.aborted) throw controller.signal.reason;
    if (collected.status === "rejected") throw collected.reason;
    return collected.value;
  } finally {
    signal?.removeEventListener("abort", forward);
  }
}

function assertPositive(label: string, value: number): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${label} must be a positive integer, got ${String(value)}`);
  }
}
