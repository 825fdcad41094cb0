import { mkdirSync, writeFileSync } from "node:fs";
import { join } from "node:path";
import type { BenchmarkSummary } from "./types.js";
import { calculateStats, formatSeconds, throughput, type EnvironmentInfo } from "./utils.js";

export interface BenchmarkReport {
  timestamp: string;
  command: string;
  environment: EnvironmentInfo;
  engine: { url: string; index: string; recordCount: number };
  summaries: BenchmarkSummary[];
}

/**
 * Write benchmark-<timestamp>.json and .md into `reportsDir`
 *
 * @returns paths of the written files
 */
export function generateReport(report: BenchmarkReport, reportsDir: string): string[] {
  mkdirSync(reportsDir, { recursive: true });
  const stamp = report.timestamp.replace(/[:.]/g, "-").slice(0, 19);

  const jsonPath = join(reportsDir, `benchmark-${stamp}.json`);
  writeFileSync(jsonPath, JSON.stringify(report, null, 2));

  const mdPath = join(reportsDir, `benchmark-${stamp}.md`);
  writeFileSync(mdPath, generateMarkdown(report));

  return [jsonPath, mdPath];
}

export function generateMarkdown(report: BenchmarkReport): string {
  const env = report.environment;
  const lines: string[] = [
    "# Benchmark Report",
    "",
    `**Date:** ${report.timestamp}`,
    `**Engine:** ${report.engine.url} (index \`${report.engine.index}\`)`,
    `**Records:** ${report.engine.recordCount.toLocaleString("en-US")}`,
    "",
    "## Environment",
    "",
    "| Property | Value |",
    "|----------|-------|",
    `| Profile | ${env.profile ?? "not specified"} |`,
    `| Engine Version | ${env.engineVersion ?? "unknown"} |`,
    `| Total Memory | ${String(env.totalMemoryGB)} GB |`,
    `| CPU Cores | ${String(env.cpuCores)} |`,
    `| CPU Model | ${env.cpuModel} |`,
    `| Platform | ${env.platform} ${env.osRelease} |`,
    `| Node.js | ${env.nodeVersion} |`,
    "",
    "**Command to reproduce:**",
    "```bash",
    report.command,
    "```",
    "",
    "## Results",
    "",
    "| Query | Iterations | Concurrency | Batch Size | Time | Queries/s |",
    "|-------|-----------:|------------:|-----------:|-----:|----------:|",
  ];

  for (const s of report.summaries) {
    const time = s.error ? "ERROR" : formatSeconds(s.seconds);
    const qps = s.error ? "-" : throughput(s).toFixed(1);
    lines.push(
      `| ${s.name} | ${String(s.iterations)} | ${String(s.concurrency)} | ${String(s.batchSize)} | ${time} | ${qps} |`
    );
  }
  lines.push("");

  const succeeded = report.summaries.filter((s) => !s.error);
  if (succeeded.length > 1) {
    const stats = calculateStats(succeeded.map(throughput));
    lines.push(
      `Throughput across ${String(succeeded.length)} passes: min=${stats.min.toFixed(1)}, ` +
        `median=${stats.median.toFixed(1)}, max=${stats.max.toFixed(1)} queries/s`
    );
    lines.push("");
  }

  const problems = report.summaries.filter((s) => s.error ?? s.teardownError);
  if (problems.length > 0) {
    lines.push("## Errors");
    lines.push("");
    for (const s of problems) {
      lines.push(`**${s.name} (c=${String(s.concurrency)}, b=${String(s.batchSize)}):**`);
      lines.push("```");
      if (s.error) lines.push(s.error);
      if (s.teardownError) lines.push(s.teardownError);
      lines.push("```");
      lines.push("");
    }
  }

  return lines.join("\n");
}
