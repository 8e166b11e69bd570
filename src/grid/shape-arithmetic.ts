/**
 * Pure tile arithmetic for a launch: how many groups each dimension has,
 * where a group starts, and how much of the nominal tile it actually covers.
 *
 * Zero mutable state.
 */

import { InvalidShapeError } from "../core/errors";
import { formatShape, type Shape } from "../core/shape";

/** Iteration spaces are at most three-dimensional. */
export const MAX_GRID_RANK = 3;

function isPositiveInteger(value: number): boolean {
  return Number.isInteger(value) && value > 0;
}

export function validateLaunchShapes(globalSize: Shape, localSize: Shape): void {
  const valid =
    globalSize.length >= 1 &&
    globalSize.length <= MAX_GRID_RANK &&
    globalSize.length === localSize.length &&
    globalSize.every(isPositiveInteger) &&
    localSize.every(isPositiveInteger);
  if (!valid) {
    throw new InvalidShapeError(
      `Invalid launch shape: global ${formatShape(globalSize)} local ${formatShape(localSize)}`,
    );
  }
}

/** `ceil(global[d] / local[d])` per dimension. */
export function groupCount(globalSize: Shape, localSize: Shape): number[] {
  validateLaunchShapes(globalSize, localSize);
  return globalSize.map((g, d) => Math.ceil(g / localSize[d]));
}

export function groupOrigin(groupIndex: Shape, localSize: Shape): number[] {
  return groupIndex.map((i, d) => i * localSize[d]);
}

/**
 * Clipped extent of the tile starting at `origin`: the nominal local size
 * everywhere except on the trailing edge of a non-divisible dimension.
 */
export function groupExtent(origin: Shape, localSize: Shape, globalSize: Shape): number[] {
  return origin.map((o, d) => Math.min(localSize[d], globalSize[d] - o));
}

/**
 * Every group index in `[0, counts)`, row-major: the last dimension varies
 * fastest. Each yielded array is fresh.
 */
export function* groupIndices(counts: Shape): Generator<number[], void, undefined> {
  if (counts.some((c) => c <= 0)) return;
  const index = new Array<number>(counts.length).fill(0);
  while (true) {
    yield index.slice();
    let d = counts.length - 1;
    for (; d >= 0; d -= 1) {
      index[d] += 1;
      if (index[d] < counts[d]) break;
      index[d] = 0;
    }
    if (d < 0) return;
  }
}
