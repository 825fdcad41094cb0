/**
 * Outcome of one pass over a query set at a fixed concurrency and batch size.
 * A failed pass has `seconds === -1`, `iterations === 0` and `error` set.
 */
export interface BenchmarkSummary {
  name: string;
  iterations: number;
  concurrency: number;
  batchSize: number;
  seconds: number;
  /** Size of the dataset under test, informational */
  recordCount: number;
  /** Unix seconds */
  timestamp: number;
  error?: string;
  teardownError?: string;
}

export interface Logger {
  log(message: string): void;
  warn(message: string): void;
  error(message: string): void;
}

export interface SweepGrid {
  concurrency: number[];
  batchSize: number[];
}
