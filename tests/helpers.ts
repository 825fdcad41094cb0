import { vi } from "vitest";
import { QuerySet } from "../src/query-set.js";
import type { ResultsSink, SinkFactory } from "../src/sink.js";
import type { Logger } from "../src/types.js";
import type { QueryExecutor } from "../src/workers.js";

/**
 * 3 x 4 = 12 queries: Q(0,10)\n, Q(1,10)\n, Q(2,10)\n, Q(0,20)\n, ...
 */
export function gridQuerySet(extra: { setup?: string; teardown?: string } = {}): QuerySet {
  return new QuerySet({
    name: "grid",
    template: "Q(%d,%d)",
    argSets: [
      [0, 1, 2],
      [10, 20, 30, 40],
    ],
    ...extra,
  });
}

export function silentLogger() {
  return {
    log: vi.fn<(message: string) => void>(),
    warn: vi.fn<(message: string) => void>(),
    error: vi.fn<(message: string) => void>(),
  } satisfies Logger;
}

const QUERY = /^Q\((\d+),(\d+)\)$/;

/**
 * Answers every Q(a,b) line with a * 1000 + b and records each request
 */
export class EchoExecutor implements QueryExecutor {
  readonly requests: string[] = [];

  execute(pql: string): Promise<number[]> {
    this.requests.push(pql);
    const values: number[] = [];
    for (const line of pql.split("\n")) {
      const match = QUERY.exec(line);
      if (match) values.push(Number(match[1]) * 1000 + Number(match[2]));
    }
    return Promise.resolve(values);
  }

  /** Number of sub-queries in each request that carried Q(...) lines */
  batchSizes(): number[] {
    return this.requests
      .map((pql) => pql.split("\n").filter((line) => QUERY.test(line)).length)
      .filter((n) => n > 0);
  }
}

export class MemorySink implements ResultsSink {
  readonly lines: string[] = [];
  closed = false;

  constructor(
    readonly location = "memory",
    private readonly failAfter = Infinity
  ) {}

  write(line: string): Promise<void> {
    if (this.lines.length >= this.failAfter) {
      return Promise.reject(new Error("disk full"));
    }
    this.lines.push(line);
    return Promise.resolve();
  }

  close(): Promise<void> {
    this.closed = true;
    return Promise.resolve();
  }
}

/**
 * Sink factory that keeps every sink it hands out
 */
export function memorySinks(failAfter = Infinity): { factory: SinkFactory; sinks: MemorySink[] } {
  const sinks: MemorySink[] = [];
  const factory: SinkFactory = (key) => {
    const sink = new MemorySink(
      `${key.name}-c${String(key.concurrency)}-b${String(key.batchSize)}`,
      failAfter
    );
    sinks.push(sink);
    return Promise.resolve(sink);
  };
  return { factory, sinks };
}

export function tick(): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, 0));
}
