/**
 * Bounded transfers between backing arrays and a tile's working buffers.
 *
 * Origins are never negative, so the part of a transfer that lands inside
 * the array is always a leading box of the requested shape. A MaskedBuffer
 * stores that box as `validShape` instead of a per-element mask.
 */

import type { DType, Element } from "../core/dtype";
import { InvalidShapeError, OutOfRangeAccessError } from "../core/errors";
import {
  type ArraySlice,
  asSlice,
  type BackingArray,
  NdArray,
} from "../core/ndarray";
import { forEachIndex, formatShape, type Shape, sizeOf, toShape } from "../core/shape";

export class MaskedBuffer<D extends DType = DType> {
  readonly values: NdArray<D>;
  /** Per-dimension length of the valid leading box. */
  readonly validShape: Shape;

  constructor(values: NdArray<D>, validShape: Shape) {
    if (
      validShape.length !== values.shape.length ||
      validShape.some((v, d) => !Number.isInteger(v) || v < 0 || v > values.shape[d])
    ) {
      throw new InvalidShapeError(
        `Valid box ${formatShape(validShape)} does not fit buffer shape ${formatShape(values.shape)}`,
      );
    }
    this.values = values;
    this.validShape = Object.freeze(validShape.slice());
  }

  get dtype(): D {
    return this.values.dtype;
  }

  /** The requested (nominal) shape, independent of how much is valid. */
  get shape(): Shape {
    return this.values.shape;
  }

  get size(): number {
    return this.values.size;
  }

  get validCount(): number {
    return sizeOf(this.validShape);
  }

  isValid(index: readonly number[]): boolean {
    if (index.length !== this.validShape.length) return false;
    return index.every((i, d) => Number.isInteger(i) && i >= 0 && i < this.validShape[d]);
  }

  /** The element at `index`, or undefined where the buffer holds no data. */
  get(index: readonly number[]): Element<D> | undefined {
    return this.isValid(index) ? this.values.get(index) : undefined;
  }

  /**
   * Overwrite a slot. Writes to invalid slots are kept in `values` but a
   * store still skips them.
   */
  set(index: readonly number[], value: Element<D>): void {
    this.values.set(index, value);
  }

  /** Apply `fn` to every valid element; the mask carries over unchanged. */
  map(fn: (value: Element<D>, index: readonly number[]) => Element<D>): MaskedBuffer<D> {
    const out = new NdArray(this.dtype, this.shape);
    forEachIndex(this.validShape, (index) => {
      out.set(index, fn(this.values.get(index), index));
    });
    return new MaskedBuffer(out, this.validShape);
  }
}

function checkTransfer(slice: ArraySlice, shape: Shape): void {
  const rank = slice.array.shape.length;
  if (shape.length !== rank || slice.origin.length !== rank) {
    throw new InvalidShapeError(
      `Transfer of shape ${formatShape(shape)} at ${formatShape(slice.origin)} does not match array rank ${rank}`,
    );
  }
  if (!shape.every((s) => Number.isInteger(s) && s >= 0)) {
    throw new InvalidShapeError(`Invalid transfer shape ${formatShape(shape)}`);
  }
  if (!slice.origin.every((o) => Number.isInteger(o) && o >= 0)) {
    throw new OutOfRangeAccessError(
      `Transfer origin ${formatShape(slice.origin)} must be non-negative integers`,
    );
  }
}

/** How much of `shape`, placed at `origin`, lies inside `extent`. */
function clipBox(origin: Shape, shape: Shape, extent: Shape): number[] {
  return shape.map((s, d) => Math.max(0, Math.min(s, extent[d] - origin[d])));
}

function offsetIndex(origin: Shape, index: readonly number[]): number[] {
  return index.map((i, d) => origin[d] + i);
}

export function load<D extends DType>(
  target: BackingArray<D> | ArraySlice<D>,
  shape: number | Shape,
): MaskedBuffer<D> {
  const slice = asSlice(target);
  const transferShape = toShape(shape);
  checkTransfer(slice, transferShape);

  const { array, origin } = slice;
  const validShape = clipBox(origin, transferShape, array.shape);
  const values = new NdArray(array.dtype, transferShape);
  forEachIndex(validShape, (index) => {
    values.set(index, array.get(offsetIndex(origin, index)));
  });
  return new MaskedBuffer(values, validShape);
}

/**
 * Write every valid element of `buffer` to `origin + c`. Invalid elements,
 * and valid ones that would land outside the destination, leave the
 * destination as it was.
 */
export function store<D extends DType>(
  target: BackingArray<D> | ArraySlice<D>,
  buffer: MaskedBuffer<D>,
): void {
  const slice = asSlice(target);
  checkTransfer(slice, buffer.shape);

  const { array, origin } = slice;
  const writable = clipBox(origin, buffer.validShape, array.shape);
  forEachIndex(writable, (index) => {
    array.set(offsetIndex(origin, index), buffer.values.get(index));
  });
}

/** Valid elements in row-major order. */
export function compact<D extends DType>(buffer: MaskedBuffer<D>): Element<D>[] {
  const out: Element<D>[] = [];
  forEachIndex(buffer.validShape, (index) => {
    out.push(buffer.values.get(index));
  });
  return out;
}

/** All-valid scratch buffer; contents are zero but callers must not rely on it. */
export function allocate<D extends DType>(shape: number | Shape, dtype: D): MaskedBuffer<D> {
  const bufferShape = toShape(shape);
  if (bufferShape.length < 1) {
    throw new InvalidShapeError("Scratch buffers need at least one dimension");
  }
  return new MaskedBuffer(new NdArray(dtype, bufferShape), bufferShape);
}
