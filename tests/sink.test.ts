import { mkdtempSync, readFileSync, rmSync, statSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, it, expect } from "vitest";
import { FileResultsSink, fileSinkFactory, resultsFileName } from "../src/sink.js";

describe("resultsFileName", () => {
  it("keys the file by name, time and settings", () => {
    expect(resultsFileName({ name: "4.1rb", timestamp: 1_700_000_000, concurrency: 8, batchSize: 2 })).toBe(
      "4.1rb-1700000000-c8-b2.txt"
    );
  });

  it("numbers later copies of the same key", () => {
    expect(resultsFileName({ name: "2.1", timestamp: 7, concurrency: 2, batchSize: 3 }, 2)).toBe(
      "2.1-7-c2-b3-2.txt"
    );
  });

  it("replaces path separators in the name", () => {
    expect(resultsFileName({ name: "a/b c", timestamp: 1, concurrency: 1, batchSize: 1 })).toBe(
      "a_b_c-1-c1-b1.txt"
    );
  });
});

describe("FileResultsSink", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes lines and counts bytes", async () => {
    dir = mkdtempSync(join(tmpdir(), "pql-bench-sink-"));
    const sink = await FileResultsSink.create(join(dir, "out.txt"));

    await sink.write("10 [0 10]\n");
    await sink.write("1010 [1 10]\n");
    await sink.close();

    expect(sink.bytesWritten).toBe(22);
    expect(readFileSync(join(dir, "out.txt"), "utf-8")).toBe("10 [0 10]\n1010 [1 10]\n");
  });

  it("never truncates an existing file", async () => {
    dir = mkdtempSync(join(tmpdir(), "pql-bench-sink-"));
    const path = join(dir, "out.txt");
    writeFileSync(path, "10 [0 10]\n");

    await expect(FileResultsSink.create(path)).rejects.toHaveProperty("code", "EEXIST");
    expect(readFileSync(path, "utf-8")).toBe("10 [0 10]\n");
  });

  it("gives passes with the same key separate files", async () => {
    dir = mkdtempSync(join(tmpdir(), "pql-bench-sink-"));
    const factory = fileSinkFactory(dir);
    const key = { name: "2.1", timestamp: 5, concurrency: 2, batchSize: 3 };

    const first = await factory(key);
    await first.write("first\n");
    await first.close();
    const second = await factory(key);
    await second.write("second\n");
    await second.close();

    expect(first.location).toBe(join(dir, "2.1-5-c2-b3.txt"));
    expect(second.location).toBe(join(dir, "2.1-5-c2-b3-2.txt"));
    expect(readFileSync(first.location, "utf-8")).toBe("first\n");
    expect(readFileSync(second.location, "utf-8")).toBe("second\n");
  });

  it("creates the results directory on demand", async () => {
    dir = mkdtempSync(join(tmpdir(), "pql-bench-sink-"));
    const factory = fileSinkFactory(join(dir, "nested", "results"));

    const sink = await factory({ name: "2.1", timestamp: 5, concurrency: 2, batchSize: 3 });
    await sink.close();

    expect(sink.location).toBe(join(dir, "nested", "results", "2.1-5-c2-b3.txt"));
    expect(statSync(sink.location).isFile()).toBe(true);
  });
});
