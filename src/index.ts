export { arange, product, ravelIndex, unravelIndex } from "./enumerator.js";
export { QuerySet, type QueryRecord, type QuerySetDefinition } from "./query-set.js";
export { Channel } from "./channel.js";
export { partition, produceBatches, type BatchRange } from "./producer.js";
export { runWorkers, type QueryExecutor, type QueryOutcome, type WorkerPoolOptions } from "./workers.js";
export { collect, formatResultLine } from "./collector.js";
export {
  FileResultsSink,
  fileSinkFactory,
  resultsFileName,
  type ResultsSink,
  type SinkFactory,
  type SinkKey,
} from "./sink.js";
export { runQuerySet, type RunOptions } from "./run.js";
export { DEFAULT_GRID, runSweep } from "./sweep.js";
export { QueryCatalogue, DEFAULT_CATALOGUE_PATH, type CatalogueListing } from "./catalogue.js";
export { PilosaRunner, toScalar, type EngineRunner, type PilosaRunnerOptions } from "./runners.js";
export { generateMarkdown, generateReport, type BenchmarkReport } from "./report.js";
export { parseConfig, reproduceCommand, type BenchConfig, type RunMode } from "./config.js";
export * from "./errors.js";
export type { BenchmarkSummary, Logger, SweepGrid } from "./types.js";
export { calculateStats, formatSeconds, getEnvironmentInfo, throughput } from "./utils.js";
