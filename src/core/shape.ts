/**
 * Canonical pure shape utility functions.
 *
 * Zero dependencies, importable from any layer (core, grid).
 */

export type Shape = readonly number[];

export function sizeOf(shape: Shape): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

/**
 * Row-major (C-style) strides in elements: last dimension is contiguous.
 */
export function computeContiguousStrides(shape: Shape): number[] {
  if (shape.length === 0) return [];
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i--) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

/** A bare extent `n` means the rank-1 shape `[n]`. */
export function toShape(shape: number | Shape): number[] {
  return typeof shape === "number" ? [shape] : shape.slice();
}

export function formatShape(shape: Shape): string {
  return `[${shape.join(",")}]`;
}

/**
 * Visit every coordinate of the box `[0, shape)` in row-major order.
 *
 * The callback receives the same mutable index array on every call; copy it
 * if it must outlive the call. A box with a zero extent visits nothing.
 */
export function forEachIndex(
  shape: Shape,
  fn: (index: readonly number[], linear: number) => void,
): void {
  const rank = shape.length;
  const total = sizeOf(shape);
  if (total === 0) return;
  const index = new Array<number>(rank).fill(0);
  for (let linear = 0; linear < total; linear += 1) {
    fn(index, linear);
    for (let d = rank - 1; d >= 0; d -= 1) {
      index[d] += 1;
      if (index[d] < shape[d]) break;
      index[d] = 0;
    }
  }
}
