import { describe, it, expect } from "vitest";
import { arange, product, ravelIndex, unravelIndex } from "../src/enumerator.js";

describe("arange", () => {
  it("steps from start up to but excluding stop", () => {
    expect(arange(10, 20, 2)).toEqual([10, 12, 14, 16, 18]);
    expect(arange(1992, 1995)).toEqual([1992, 1993, 1994]);
  });

  it("is empty when stop <= start", () => {
    expect(arange(5, 5)).toEqual([]);
    expect(arange(5, 1)).toEqual([]);
  });

  it("rejects a non-positive step", () => {
    expect(() => arange(0, 10, 0)).toThrow(RangeError);
  });
});

describe("unravelIndex", () => {
  const dims = [5, 4, 3];

  it("cycles the first dimension fastest", () => {
    expect(unravelIndex(0, dims)).toEqual([0, 0, 0]);
    expect(unravelIndex(1, dims)).toEqual([1, 0, 0]);
    expect(unravelIndex(5, dims)).toEqual([0, 1, 0]);
    expect(unravelIndex(20, dims)).toEqual([0, 0, 1]);
  });

  it("maps arbitrary indices", () => {
    expect(unravelIndex(23, dims)).toEqual([3, 0, 1]);
    expect(unravelIndex(59, dims)).toEqual([4, 3, 2]);
  });

  it("handles zero dimensions", () => {
    expect(unravelIndex(0, [])).toEqual([]);
    expect(product([])).toBe(1);
  });

  it.each([[[1]], [[7]], [[3, 4]], [[5, 4, 3]], [[2, 1, 3, 2]]])(
    "is a bijection onto the grid for dims %j",
    (shape: number[]) => {
      const seen = new Set<string>();
      for (let i = 0; i < product(shape); i++) {
        const idx = unravelIndex(i, shape);
        expect(idx).toHaveLength(shape.length);
        idx.forEach((offset, k) => {
          expect(offset).toBeGreaterThanOrEqual(0);
          expect(offset).toBeLessThan(shape[k] ?? 0);
        });
        expect(ravelIndex(idx, shape)).toBe(i);
        seen.add(idx.join(","));
      }
      expect(seen.size).toBe(product(shape));
    }
  );
});
