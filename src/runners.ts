import { z } from "zod";
import { EngineError, errorMessage } from "./errors.js";
import type { QuerySet } from "./query-set.js";
import type { QueryExecutor } from "./workers.js";

export interface EngineRunner extends QueryExecutor {
  name: string;
  connect(): Promise<void>;
  disconnect(): Promise<void>;
  getVersion(): Promise<string>;
  /** Sum of every result of `querySet`, sent as one compound request */
  getRecordCount(querySet: QuerySet): Promise<number>;
}

export interface PilosaRunnerOptions {
  /** e.g. http://localhost:10101 */
  url: string;
  index: string;
  /** Frames to create on connect if missing */
  frames?: string[];
  /** Per-request timeout (default: 5 minutes) */
  timeoutMs?: number;
}

// Sum() results are { sum, count } on older servers and { value, count } on newer ones
const ScalarResultSchema = z.union([
  z.number(),
  z.object({ sum: z.number() }).transform((result) => result.sum),
  z.object({ value: z.number() }).transform((result) => result.value),
]);

const QueryResponseSchema = z.object({
  results: z.array(z.unknown()).optional(),
  error: z.string().optional(),
});

const VersionResponseSchema = z.object({ version: z.string() });

/**
 * Reduce one PQL result to the scalar the benchmark records
 */
export function toScalar(result: unknown): number {
  const parsed = ScalarResultSchema.safeParse(result);
  if (!parsed.success) {
    throw new EngineError(`Unexpected query result: ${JSON.stringify(result)}`);
  }
  return parsed.data;
}

export class PilosaRunner implements EngineRunner {
  name = "pilosa";
  private readonly baseUrl: string;
  private readonly index: string;
  private readonly frames: string[];
  private readonly timeoutMs: number;
  private connected = false;

  constructor(options: PilosaRunnerOptions) {
    this.baseUrl = options.url.replace(/\/$/, "");
    this.index = options.index;
    this.frames = options.frames ?? [];
    this.timeoutMs = options.timeoutMs ?? 300_000;
  }

  /**
   * Make sure the index and every configured frame exist
   */
  async connect(): Promise<void> {
    await this.ensure(`/index/${encodeURIComponent(this.index)}`);
    for (const frame of this.frames) {
      await this.ensure(
        `/index/${encodeURIComponent(this.index)}/frame/${encodeURIComponent(frame)}`
      );
    }
    this.connected = true;
  }

  disconnect(): Promise<void> {
    this.connected = false;
    return Promise.resolve();
  }

  async execute(pql: string, signal?: AbortSignal): Promise<number[]> {
    if (!this.connected) throw new Error("Not connected");
    const { combined, dispose } = this.withTimeout(signal);
    let response: Response;
    let json: unknown;
    try {
      response = await this.request(`/index/${encodeURIComponent(this.index)}/query`, {
        method: "POST",
        headers: { "Content-Type": "text/plain", Accept: "application/json" },
        body: pql,
        signal: combined,
      });
      json = await this.readJson(response);
    } finally {
      dispose();
    }

    const body = QueryResponseSchema.safeParse(json);
    if (!body.success) {
      throw new EngineError("Malformed query response", response.status);
    }
    if (body.data.error !== undefined || !response.ok) {
      throw new EngineError(
        body.data.error ?? `Query failed with HTTP ${String(response.status)}`,
        response.status
      );
    }
    return (body.data.results ?? []).map(toScalar);
  }

  async getVersion(): Promise<string> {
    const response = await this.request("/version", {
      headers: { Accept: "application/json" },
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    if (!response.ok) {
      throw new EngineError(`Version request failed with HTTP ${String(response.status)}`, response.status);
    }
    const body = VersionResponseSchema.safeParse(await this.readJson(response));
    if (!body.success) throw new EngineError("Malformed version response", response.status);
    return body.data.version;
  }

  async getRecordCount(querySet: QuerySet): Promise<number> {
    let pql = "";
    for (let n = 0; n < querySet.size(); n++) {
      pql += querySet.queryAt(n);
    }
    if (pql === "") return 0;
    const counts = await this.execute(pql);
    return counts.reduce((a, b) => a + b, 0);
  }

  private async ensure(path: string): Promise<void> {
    const response = await this.request(path, {
      method: "POST",
      headers: { "Content-Type": "application/json", Accept: "application/json" },
      body: JSON.stringify({ options: {} }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });
    // 409: already exists
    if (!response.ok && response.status !== 409) {
      const text = await response.text();
      throw new EngineError(
        `POST ${path} failed with HTTP ${String(response.status)}: ${text}`,
        response.status
      );
    }
  }

  private async request(path: string, init: RequestInit): Promise<Response> {
    try {
      return await fetch(`${this.baseUrl}${path}`, init);
    } catch (error) {
      if (init.signal?.aborted) throw error;
      throw new EngineError(`Request to ${this.baseUrl}${path} failed: ${errorMessage(error)}`, undefined, {
        cause: error,
      });
    }
  }

  private async readJson(response: Response): Promise<unknown> {
    const text = await response.text();
    try {
      return JSON.parse(text);
    } catch {
      throw new EngineError(
        `Engine answered HTTP ${String(response.status)} with non-JSON body: ${text.slice(0, 200)}`,
        response.status
      );
    }
  }

  /**
   * Run signal and request timeout merged into one; `dispose` detaches the listeners
   */
  private withTimeout(signal?: AbortSignal): { combined: AbortSignal; dispose: () => void } {
    const timeout = AbortSignal.timeout(this.timeoutMs);
    if (!signal) return { combined: timeout, dispose: () => undefined };

    const controller = new AbortController();
    const onSignal = (): void => {
      controller.abort(signal.reason);
    };
    const onTimeout = (): void => {
      controller.abort(timeout.reason);
    };
    if (signal.aborted) onSignal();
    signal.addEventListener("abort", onSignal, { once: true });
    timeout.addEventListener("abort", onTimeout, { once: true });
    return {
      combined: controller.signal,
      dispose: () => {
        signal.removeEventListener("abort", onSignal);
        timeout.removeEventListener("abort", onTimeout);
      },
    };
  }
}
