export type BenchErrorCode =
  | "CONFIG_INVALID"
  | "QUERY_SET_INVALID"
  | "CATALOGUE_INVALID"
  | "CHANNEL_CLOSED"
  | "SETUP_FAILED"
  | "BATCH_FAILED"
  | "RESULT_COUNT_MISMATCH"
  | "TEARDOWN_FAILED"
  | "SINK_WRITE_FAILED"
  | "ENGINE_ERROR";

/**
 * Base class for every error raised by the benchmark driver.
 * `code` is stable and meant for programmatic checks.
 */
export class BenchError extends Error {
  readonly code: BenchErrorCode;

  constructor(code: BenchErrorCode, message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "BenchError";
    this.code = code;
  }
}

export class ConfigError extends BenchError {
  constructor(message: string) {
    super("CONFIG_INVALID", message);
    this.name = "ConfigError";
  }
}

export class QuerySetError extends BenchError {
  constructor(message: string) {
    super("QUERY_SET_INVALID", message);
    this.name = "QuerySetError";
  }
}

export class CatalogueError extends BenchError {
  constructor(message: string, options?: { cause?: unknown }) {
    super("CATALOGUE_INVALID", message, options);
    this.name = "CatalogueError";
  }
}

export class ChannelClosedError extends BenchError {
  constructor() {
    super("CHANNEL_CLOSED", "Send on closed channel");
    this.name = "ChannelClosedError";
  }
}

export class SetupError extends BenchError {
  constructor(cause: unknown) {
    super("SETUP_FAILED", `Setup query failed: ${errorMessage(cause)}`, { cause });
    this.name = "SetupError";
  }
}

/**
 * A compound request failed. `raw` is the full request text that was sent.
 */
export class BatchExecutionError extends BenchError {
  readonly raw: string;

  constructor(raw: string, cause: unknown) {
    super("BATCH_FAILED", `Batch query failed: ${errorMessage(cause)}`, { cause });
    this.name = "BatchExecutionError";
    this.raw = raw;
  }
}

export class ResultCountMismatchError extends BenchError {
  readonly expected: number;
  readonly received: number;

  constructor(expected: number, received: number) {
    super(
      "RESULT_COUNT_MISMATCH",
      `Engine returned ${String(received)} results for ${String(expected)} queries`
    );
    this.name = "ResultCountMismatchError";
    this.expected = expected;
    this.received = received;
  }
}

export class TeardownError extends BenchError {
  constructor(cause: unknown) {
    super("TEARDOWN_FAILED", `Teardown query failed: ${errorMessage(cause)}`, { cause });
    this.name = "TeardownError";
  }
}

export class SinkWriteError extends BenchError {
  constructor(cause: unknown) {
    super("SINK_WRITE_FAILED", `Writing results failed: ${errorMessage(cause)}`, { cause });
    this.name = "SinkWriteError";
  }
}

/**
 * Engine rejected a request or answered with something unreadable.
 */
export class EngineError extends BenchError {
  readonly status?: number;

  constructor(message: string, status?: number, options?: { cause?: unknown }) {
    super("ENGINE_ERROR", message, options);
    this.name = "EngineError";
    if (status !== undefined) {
      this.status = status;
    }
  }
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}
