import type { Channel } from "./channel.js";
import { SinkWriteError } from "./errors.js";
import type { QueryRecord } from "./query-set.js";
import type { ResultsSink } from "./sink.js";
import type { QueryOutcome } from "./workers.js";

/**
 * "<value> [<input> <input> ...]"
 */
export function formatResultLine(record: QueryRecord, value: number): string {
  return `${String(value)} [${record.inputs.join(" ")}]\n`;
}

/**
 * Drain `completed` in arrival order into `sink`.
 *
 * Throws the batch error carried by the first failed outcome, or a
 * SinkWriteError, without draining further.
 *
 * @returns number of results written
 */
export async function collect(
  completed: Channel<QueryOutcome>,
  sink: ResultsSink
): Promise<number> {
  let written = 0;
  for await (const outcome of completed) {
    if (!outcome.ok) throw outcome.error;
    try {
      await sink.write(formatResultLine(outcome.record, outcome.value));
    } catch (error) {
      throw new SinkWriteError(error);
    }
    written++;
  }
  return written;
}
