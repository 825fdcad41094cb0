import { parseArgs } from "node:util";
import { ConfigError } from "./errors.js";
import { DEFAULT_GRID } from "./sweep.js";
import type { SweepGrid } from "./types.js";
import { parseNumber, parseNumberList } from "./utils.js";

export type RunMode = "query" | "grid";

export interface BenchConfig {
  url: string;
  index: string;
  concurrency: number;
  batchSize: number;
  mode: RunMode;
  grid: SweepGrid;
  /** Query set names; empty means every set (after tag filtering) */
  queries: string[];
  onlyTag?: string;
  resultsDir: string;
  reportsDir: string;
  cataloguePath?: string;
  /** Deadline for the whole invocation */
  timeoutSeconds?: number;
  profile?: string;
  report: boolean;
  list: boolean;
  help: boolean;
}

export const HELP = `
Usage: npm run benchmark -- [options]

Options:
  -u, --url <url>              Engine address (default: $PILOSA_URL or http://localhost:10101)
  -i, --index <name>           Index to query (default: $PILOSA_INDEX or ssb)
  -c, --concurrency <n>        Concurrent batches in flight (default: 32)
  -b, --batch-size <n>         Queries per compound request (default: 1)
  -q, --query <names>          Comma-separated query set names (default: all)
  -o, --only <tag>             Run only query sets with this tag
  -g, --grid                   Sweep concurrency x batch size instead of a single pass
      --grid-concurrency <ns>  Concurrency values for --grid (default: 8,16,32)
      --grid-batch <ns>        Batch sizes for --grid (default: 2,4,8)
      --results <dir>          Directory for per-pass result files (default: results)
      --catalogue <file>       Query catalogue YAML (default: queries/ssb.yaml)
  -t, --timeout <seconds>      Cancel everything after this many seconds
  -e, --env <label>            Machine label recorded in reports
      --report                 Write JSON and Markdown reports to reports/
  -l, --list                   List query sets and exit
  -h, --help                   Show this help message

Examples:
  npm run benchmark -- -q 2.1 -c 16 -b 4
  npm run benchmark -- -q 3.1,3.2 --grid --report
  npm run benchmark -- --only flight4 --grid --grid-concurrency 1,2,4 --grid-batch 1,8
`;

function positive(label: string, raw: string): number {
  const value = parseNumber(raw);
  if (!Number.isInteger(value) || value < 1) {
    throw new ConfigError(`${label} must be a positive integer, got "${raw}"`);
  }
  return value;
}

function positiveList(label: string, raw: string): number[] {
  const values = parseNumberList(raw);
  if (values.length === 0) throw new ConfigError(`${label} needs at least one value`);
  for (const value of values) {
    if (!Number.isInteger(value) || value < 1) {
      throw new ConfigError(`${label} values must be positive integers, got "${raw}"`);
    }
  }
  return values;
}

function readArgs(argv: string[]) {
  try {
    return parseArgs({
      args: argv,
      options: {
        url: { type: "string", short: "u" },
        index: { type: "string", short: "i" },
        concurrency: { type: "string", short: "c", default: "32" },
        "batch-size": { type: "string", short: "b", default: "1" },
        query: { type: "string", short: "q" },
        only: { type: "string", short: "o" },
        grid: { type: "boolean", short: "g", default: false },
        "grid-concurrency": { type: "string" },
        "grid-batch": { type: "string" },
        results: { type: "string", default: "results" },
        catalogue: { type: "string" },
        timeout: { type: "string", short: "t" },
        env: { type: "string", short: "e" },
        report: { type: "boolean", default: false },
        list: { type: "boolean", short: "l", default: false },
        help: { type: "boolean", short: "h", default: false },
      },
    });
  } catch (error) {
    throw new ConfigError(error instanceof Error ? error.message : String(error));
  }
}

/**
 * Turn command-line arguments (without node and script) into a BenchConfig
 */
export function parseConfig(
  argv: string[],
  env: Record<string, string | undefined> = process.env
): BenchConfig {
  const { values } = readArgs(argv);

  const config: BenchConfig = {
    url: values.url ?? env.PILOSA_URL ?? "http://localhost:10101",
    index: values.index ?? env.PILOSA_INDEX ?? "ssb",
    concurrency: positive("--concurrency", values.concurrency),
    batchSize: positive("--batch-size", values["batch-size"]),
    mode: values.grid ? "grid" : "query",
    grid: {
      concurrency: values["grid-concurrency"]
        ? positiveList("--grid-concurrency", values["grid-concurrency"])
        : [...DEFAULT_GRID.concurrency],
      batchSize: values["grid-batch"]
        ? positiveList("--grid-batch", values["grid-batch"])
        : [...DEFAULT_GRID.batchSize],
    },
    queries: values.query
      ? values.query
          .split(",")
          .map((q) => q.trim())
          .filter((q) => q !== "")
      : [],
    resultsDir: values.results,
    reportsDir: "reports",
    report: values.report,
    list: values.list,
    help: values.help,
  };
  if (values.only) config.onlyTag = values.only;
  if (values.catalogue) config.cataloguePath = values.catalogue;
  if (values.timeout) config.timeoutSeconds = positive("--timeout", values.timeout);
  if (values.env) config.profile = values.env;
  return config;
}

/**
 * Command line that reproduces `config`
 */
export function reproduceCommand(config: BenchConfig): string {
  const parts = ["npm run benchmark --", `-u ${config.url}`, `-i ${config.index}`];
  if (config.queries.length > 0) parts.push(`-q ${config.queries.join(",")}`);
  if (config.onlyTag) parts.push(`-o ${config.onlyTag}`);
  if (config.mode === "grid") {
    parts.push("--grid");
    parts.push(`--grid-concurrency ${config.grid.concurrency.join(",")}`);
    parts.push(`--grid-batch ${config.grid.batchSize.join(",")}`);
  } else {
    parts.push(`-c ${String(config.concurrency)}`);
    parts.push(`-b ${String(config.batchSize)}`);
  }
  if (config.timeoutSeconds !== undefined) parts.push(`-t ${String(config.timeoutSeconds)}`);
  if (config.profile) parts.push(`-e ${config.profile}`);
  parts.push("--report");
  return parts.join(" ");
}
