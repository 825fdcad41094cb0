import os from "node:os";
import type { BenchmarkSummary } from "./types.js";

/**
 * Format a duration in seconds, e.g. 0.25 -> "250ms", 75 -> "1m 15s"
 */
export function formatSeconds(seconds: number): string {
  if (seconds < 0) return "failed";
  const ms = seconds * 1000;
  if (ms < 1000) return `${String(Math.round(ms))}ms`;
  if (seconds < 60) return `${seconds.toFixed(2)}s`;
  const minutes = Math.floor(seconds / 60);
  const rest = Math.floor(seconds % 60);
  if (minutes < 60) return `${String(minutes)}m ${String(rest)}s`;
  return `${String(Math.floor(minutes / 60))}h ${String(minutes % 60)}m ${String(rest)}s`;
}

/**
 * Queries per second, 0 for failed or instantaneous passes
 */
export function throughput(summary: BenchmarkSummary): number {
  return summary.seconds > 0 ? summary.iterations / summary.seconds : 0;
}

export interface Stats {
  min: number;
  max: number;
  avg: number;
  median: number;
}

export function calculateStats(values: number[]): Stats {
  if (values.length === 0) {
    return { min: 0, max: 0, avg: 0, median: 0 };
  }
  const sorted = [...values].sort((a, b) => a - b);
  const sum = sorted.reduce((a, b) => a + b, 0);
  return {
    min: sorted[0] ?? 0,
    max: sorted[sorted.length - 1] ?? 0,
    avg: sum / sorted.length,
    median: sorted[Math.floor(sorted.length / 2)] ?? 0,
  };
}

/**
 * Parse an integer allowing underscore separators (e.g. 1_000)
 */
export function parseNumber(value: string): number {
  const cleaned = value.replace(/_/g, "").trim();
  if (!/^-?\d+$/.test(cleaned)) return Number.NaN;
  return parseInt(cleaned, 10);
}

/**
 * "8,16, 32" -> [8, 16, 32]
 */
export function parseNumberList(value: string): number[] {
  return value
    .split(",")
    .map((part) => part.trim())
    .filter((part) => part !== "")
    .map(parseNumber);
}

export interface EnvironmentInfo {
  /** Free-form machine label given on the command line */
  profile?: string;
  totalMemoryGB: number;
  cpuCores: number;
  cpuModel: string;
  platform: string;
  osRelease: string;
  nodeVersion: string;
  engineVersion?: string;
}

export function getEnvironmentInfo(profile?: string, engineVersion?: string): EnvironmentInfo {
  const cpus = os.cpus();
  const result: EnvironmentInfo = {
    totalMemoryGB: Math.round(os.totalmem() / (1024 * 1024 * 1024)),
    cpuCores: cpus.length,
    cpuModel: cpus[0]?.model ?? "Unknown",
    platform: os.platform(),
    osRelease: os.release(),
    nodeVersion: process.version,
  };
  if (profile) result.profile = profile;
  if (engineVersion) result.engineVersion = engineVersion;
  return result;
}
