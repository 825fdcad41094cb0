import { mkdir, open, type FileHandle } from "node:fs/promises";
import { join } from "node:path";

/**
 * Append-only destination for result lines. Only the collector writes to it.
 */
export interface ResultsSink {
  /** Where the lines end up, for log output */
  readonly location: string;
  write(line: string): Promise<void>;
  close(): Promise<void>;
}

export interface SinkKey {
  name: string;
  timestamp: number;
  concurrency: number;
  batchSize: number;
}

export type SinkFactory = (key: SinkKey) => Promise<ResultsSink>;

/**
 * results/<name>-<timestamp>-c<concurrency>-b<batchSize>[-<copy>].txt
 *
 * `copy` tells apart passes with the same key, e.g. two passes in the same second.
 */
export function resultsFileName(
  { name, timestamp, concurrency, batchSize }: SinkKey,
  copy = 1
): string {
  const safeName = name.replace(/[^\w.-]/g, "_");
  const suffix = copy > 1 ? `-${String(copy)}` : "";
  return `${safeName}-${String(timestamp)}-c${String(concurrency)}-b${String(batchSize)}${suffix}.txt`;
}

function alreadyExists(error: unknown): boolean {
  return error instanceof Error && "code" in error && error.code === "EEXIST";
}

export class FileResultsSink implements ResultsSink {
  private bytes = 0;

  private constructor(
    readonly location: string,
    private readonly handle: FileHandle
  ) {}

  /**
   * Fails with EEXIST rather than truncate an existing file
   */
  static async create(path: string): Promise<FileResultsSink> {
    const handle = await open(path, "wx", 0o600);
    return new FileResultsSink(path, handle);
  }

  get bytesWritten(): number {
    return this.bytes;
  }

  async write(line: string): Promise<void> {
    const { bytesWritten } = await this.handle.write(line);
    this.bytes += bytesWritten;
  }

  async close(): Promise<void> {
    await this.handle.close();
  }
}

export function fileSinkFactory(directory: string): SinkFactory {
  return async (key) => {
    await mkdir(directory, { recursive: true, mode: 0o700 });
    for (let copy = 1; ; copy++) {
      try {
        return await FileResultsSink.create(join(directory, resultsFileName(key, copy)));
      } catch (error) {
        if (!alreadyExists(error)) throw error;
      }
    }
  };
}
