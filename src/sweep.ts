import type { QuerySet } from "./query-set.js";
import { runQuerySet, type RunOptions } from "./run.js";
import type { BenchmarkSummary, SweepGrid } from "./types.js";

export const DEFAULT_GRID: SweepGrid = {
  concurrency: [8, 16, 32],
  batchSize: [2, 4, 8],
};

/**
 * Run one full pass per (concurrency, batch size) pair, one after another.
 * Concurrency is the outer loop, batch size the inner one.
 *
 * A failed pass contributes its failed summary and the sweep moves on.
 * Once `signal` is aborted no further pass starts.
 */
export async function runSweep(
  querySet: QuerySet,
  grid: SweepGrid,
  options: Omit<RunOptions, "concurrency" | "batchSize">
): Promise<BenchmarkSummary[]> {
  const summaries: BenchmarkSummary[] = [];
  for (const concurrency of grid.concurrency) {
    for (const batchSize of grid.batchSize) {
      if (options.signal?.aborted) return summaries;
      summaries.push(await runQuerySet(querySet, { ...options, concurrency, batchSize }));
    }
  }
  return summaries;
}
