#!/usr/bin/env node
import { QueryCatalogue } from "./catalogue.js";
import { HELP, parseConfig, reproduceCommand, type BenchConfig } from "./config.js";
import { errorMessage } from "./errors.js";
import { generateReport } from "./report.js";
import { runQuerySet } from "./run.js";
import { PilosaRunner } from "./runners.js";
import { fileSinkFactory } from "./sink.js";
import { runSweep } from "./sweep.js";
import type { BenchmarkSummary } from "./types.js";
import { formatSeconds, getEnvironmentInfo, throughput } from "./utils.js";

function printSummary(s: BenchmarkSummary): void {
  if (s.error) {
    console.error(
      `  c=${String(s.concurrency)} b=${String(s.batchSize)}: FAILED (${s.error})`
    );
    return;
  }
  console.log(
    `  c=${String(s.concurrency)} b=${String(s.batchSize)}: ${String(s.iterations)} queries in ` +
      `${formatSeconds(s.seconds)} (${throughput(s).toFixed(1)} queries/s)`
  );
  if (s.teardownError) console.error(`    teardown: ${s.teardownError}`);
}

async function main(config: BenchConfig): Promise<number> {
  const catalogue = QueryCatalogue.load(config.cataloguePath);

  const selected = catalogue.list({ names: config.queries, tag: config.onlyTag });
  if (config.list) {
    for (const q of selected) {
      const tags = q.tags.length ? ` [${q.tags.join(", ")}]` : "";
      console.log(`  - ${q.name}${tags}: ${q.description} (${String(q.size)} queries)`);
    }
    return 0;
  }

  // Unknown names still run, as empty query sets
  const names = config.queries.length > 0 ? config.queries : selected.map((q) => q.name);
  if (names.length === 0) {
    console.error("No query sets match the specified filters.");
    return 1;
  }

  const runner = new PilosaRunner({ url: config.url, index: config.index, frames: catalogue.frames });
  const signal =
    config.timeoutSeconds !== undefined ? AbortSignal.timeout(config.timeoutSeconds * 1000) : undefined;

  console.log("=== Bitmap Query Benchmarks ===");
  console.log(`Engine: ${config.url}, index: ${config.index}`);
  await runner.connect();

  let engineVersion: string | undefined;
  try {
    engineVersion = await runner.getVersion();
  } catch (error) {
    console.log(`  Could not get engine version: ${errorMessage(error)}`);
  }

  const countQuery = catalogue.recordCountQuery();
  const recordCount = countQuery ? await runner.getRecordCount(countQuery) : 0;
  console.log(`Records: ${recordCount.toLocaleString("en-US")}`);

  const options = {
    executor: runner,
    sinkFactory: fileSinkFactory(config.resultsDir),
    recordCount,
    signal,
  };

  const summaries: BenchmarkSummary[] = [];
  for (const name of names) {
    if (signal?.aborted) break;
    const querySet = catalogue.get(name);
    console.log(`\n[${name}] ${querySet.toString()}`);

    const results =
      config.mode === "grid"
        ? await runSweep(querySet, config.grid, options)
        : [
            await runQuerySet(querySet, {
              ...options,
              concurrency: config.concurrency,
              batchSize: config.batchSize,
            }),
          ];
    results.forEach(printSummary);
    summaries.push(...results);
  }

  await runner.disconnect();

  if (config.report) {
    const paths = generateReport(
      {
        timestamp: new Date().toISOString(),
        command: reproduceCommand(config),
        environment: getEnvironmentInfo(config.profile, engineVersion),
        engine: { url: config.url, index: config.index, recordCount },
        summaries,
      },
      config.reportsDir
    );
    for (const path of paths) console.log(`Generated report: ${path}`);
  }

  console.log("\n=== Done ===");
  return summaries.some((s) => s.error) ? 1 : 0;
}

let config: BenchConfig;
try {
  config = parseConfig(process.argv.slice(2));
} catch (error) {
  console.error(errorMessage(error));
  console.error(HELP);
  process.exit(1);
}

if (config.help) {
  console.log(HELP);
  process.exit(0);
}

main(config)
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error);
    process.exit(1);
  });
