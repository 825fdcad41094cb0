import { describe, it, expect } from "vitest";
import { parseConfig, reproduceCommand } from "../src/config.js";
import { ConfigError } from "../src/errors.js";

describe("parseConfig", () => {
  it("fills in defaults", () => {
    expect(parseConfig([], {})).toEqual({
      url: "http://localhost:10101",
      index: "ssb",
      concurrency: 32,
      batchSize: 1,
      mode: "query",
      grid: { concurrency: [8, 16, 32], batchSize: [2, 4, 8] },
      queries: [],
      resultsDir: "results",
      reportsDir: "reports",
      report: false,
      list: false,
      help: false,
    });
  });

  it("falls back to the environment for the engine address", () => {
    const env = { PILOSA_URL: "http://engine.test:10101", PILOSA_INDEX: "bench" };

    expect(parseConfig([], env)).toMatchObject({ url: "http://engine.test:10101", index: "bench" });
    expect(parseConfig(["-i", "other"], env).index).toBe("other");
  });

  it("reads every flag", () => {
    const config = parseConfig(
      [
        "-u", "http://engine.test:1",
        "-q", "2.1, 3.1,",
        "-c", "1_000",
        "-b", "8",
        "-o", "flight2",
        "-t", "30",
        "-e", "lab",
        "--results", "out",
        "--catalogue", "custom.yaml",
        "--report",
        "-l",
      ],
      {}
    );

    expect(config).toMatchObject({
      url: "http://engine.test:1",
      queries: ["2.1", "3.1"],
      concurrency: 1000,
      batchSize: 8,
      onlyTag: "flight2",
      timeoutSeconds: 30,
      profile: "lab",
      resultsDir: "out",
      cataloguePath: "custom.yaml",
      report: true,
      list: true,
    });
  });

  it("switches to grid mode with custom axes", () => {
    const config = parseConfig(["-g", "--grid-concurrency", "1,2", "--grid-batch", "4"], {});
    expect(config.mode).toBe("grid");
    expect(config.grid).toEqual({ concurrency: [1, 2], batchSize: [4] });
  });

  it("rejects invalid numbers", () => {
    expect(() => parseConfig(["-c", "0"], {})).toThrow(
      new ConfigError('--concurrency must be a positive integer, got "0"')
    );
    expect(() => parseConfig(["-b", "two"], {})).toThrow(
      '--batch-size must be a positive integer, got "two"'
    );
    expect(() => parseConfig(["--grid-batch", "1,x"], {})).toThrow(
      '--grid-batch values must be positive integers, got "1,x"'
    );
    expect(() => parseConfig(["--grid-concurrency", ","], {})).toThrow(
      "--grid-concurrency needs at least one value"
    );
  });

  it("rejects unknown options", () => {
    expect(() => parseConfig(["--nope"], {})).toThrow(ConfigError);
  });
});

describe("reproduceCommand", () => {
  it("repeats a single pass", () => {
    expect(reproduceCommand(parseConfig(["-q", "2.1"], {}))).toBe(
      "npm run benchmark -- -u http://localhost:10101 -i ssb -q 2.1 -c 32 -b 1 --report"
    );
  });

  it("repeats a sweep", () => {
    const config = parseConfig(["-g", "--grid-concurrency", "1,2", "-q", "3.1", "-e", "lab", "-t", "60"], {});
    expect(reproduceCommand(config)).toBe(
      "npm run benchmark -- -u http://localhost:10101 -i ssb -q 3.1 --grid " +
        "--grid-concurrency 1,2 --grid-batch 2,4,8 -t 60 -e lab --report"
    );
  });
});
