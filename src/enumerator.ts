/**
 * Arithmetic range: arange(10, 20, 2) -> [10, 12, 14, 16, 18]
 */
export function arange(start: number, stop: number, step = 1): number[] {
  if (step <= 0) throw new RangeError(`arange step must be positive, got ${String(step)}`);
  const values: number[] = [];
  for (let n = start; n < stop; n += step) {
    values.push(n);
  }
  return values;
}

/**
 * Product of all dimension sizes (1 for no dimensions)
 */
export function product(dims: readonly number[]): number {
  return dims.reduce((acc, d) => acc * d, 1);
}

/**
 * Map a flat index to one offset per dimension.
 *
 * idx[0] cycles fastest, idx[D-1] slowest. For dims (5, 4, 3):
 *   idx[0] = i % 5
 *   idx[1] = floor(i / 5) % 4
 *   idx[2] = floor(i / 20) % 3
 *
 * Callers keep `index` within [0, product(dims)).
 */
export function unravelIndex(index: number, dims: readonly number[]): number[] {
  const indices = new Array<number>(dims.length);
  let stride = 1;
  for (let k = 0; k < dims.length; k++) {
    const dim = dims[k] ?? 1;
    indices[k] = Math.floor(index / stride) % dim;
    stride *= dim;
  }
  return indices;
}

/**
 * Inverse of unravelIndex
 */
export function ravelIndex(indices: readonly number[], dims: readonly number[]): number {
  let index = 0;
  let stride = 1;
  for (let k = 0; k < dims.length; k++) {
    index += (indices[k] ?? 0) * stride;
    stride *= dims[k] ?? 1;
  }
  return index;
}
