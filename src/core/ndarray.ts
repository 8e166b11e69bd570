import {
  allocateStorage,
  type DType,
  type Element,
  fromNumber,
  type Storage,
} from "./dtype";
import { InvalidShapeError, OutOfRangeAccessError } from "./errors";
import {
  computeContiguousStrides,
  formatShape,
  type Shape,
  sizeOf,
  toShape,
} from "./shape";

/**
 * What the simulator needs from an array it reads or writes: its element
 * kind, its per-dimension extent, and element-wise access.
 */
export interface BackingArray<D extends DType = DType> {
  readonly dtype: D;
  readonly shape: Shape;
  get(index: readonly number[]): Element<D>;
  set(index: readonly number[], value: Element<D>): void;
}

/**
 * A backing array addressed from a caller-chosen origin, the `arr[o:]` of
 * array languages. Coordinates passed to a transfer are relative to
 * `origin`.
 */
export interface ArraySlice<D extends DType = DType> {
  readonly array: BackingArray<D>;
  readonly origin: readonly number[];
}

export function isArraySlice<D extends DType>(
  target: BackingArray<D> | ArraySlice<D>,
): target is ArraySlice<D> {
  return "array" in target && "origin" in target;
}

/** Normalize a bare array to a slice at the zero origin. */
export function asSlice<D extends DType>(
  target: BackingArray<D> | ArraySlice<D>,
): ArraySlice<D> {
  if (isArraySlice(target)) return target;
  return { array: target, origin: new Array<number>(target.shape.length).fill(0) };
}

/**
 * Dense row-major N-d array over a typed array.
 */
export class NdArray<D extends DType = DType> implements BackingArray<D> {
  readonly dtype: D;
  readonly shape: Shape;
  readonly strides: readonly number[];
  readonly data: Storage<Element<D>>;
  private readonly sizeValue: number;

  constructor(dtype: D, shape: Shape, data?: Storage<Element<D>>) {
    for (const dim of shape) {
      if (!Number.isInteger(dim) || dim < 0) {
        throw new InvalidShapeError(`Invalid array shape ${formatShape(shape)}`);
      }
    }
    const expected = sizeOf(shape);
    if (data !== undefined && data.length !== expected) {
      throw new InvalidShapeError(
        `Array data length ${data.length} does not match shape ${formatShape(shape)}`,
      );
    }
    this.dtype = dtype;
    this.shape = Object.freeze(shape.slice());
    this.strides = Object.freeze(computeContiguousStrides(shape));
    this.data = data ?? allocateStorage(dtype, expected);
    this.sizeValue = expected;
  }

  get size(): number {
    return this.sizeValue;
  }

  get rank(): number {
    return this.shape.length;
  }

  get(index: readonly number[]): Element<D> {
    return this.data[this.linearIndex(index)];
  }

  set(index: readonly number[], value: Element<D>): void {
    this.data[this.linearIndex(index)] = value;
  }

  /** View this array from `origin`, for passing to a tile's load or store. */
  at(origin: number | readonly number[]): ArraySlice<D> {
    return { array: this, origin: toShape(origin) };
  }

  toArray(): Element<D>[] {
    const out = new Array<Element<D>>(this.sizeValue);
    for (let i = 0; i < this.sizeValue; i += 1) {
      out[i] = this.data[i];
    }
    return out;
  }

  private linearIndex(index: readonly number[]): number {
    if (index.length !== this.shape.length) {
      throw new InvalidShapeError(
        `Index rank ${index.length} does not match array shape ${formatShape(this.shape)}`,
      );
    }
    let linear = 0;
    for (let d = 0; d < index.length; d += 1) {
      const i = index[d];
      if (!Number.isInteger(i) || i < 0 || i >= this.shape[d]) {
        throw new OutOfRangeAccessError(
          `Index ${formatShape(index)} is out of range for shape ${formatShape(this.shape)}`,
        );
      }
      linear += i * this.strides[d];
    }
    return linear;
  }
}

export function ndarray<D extends DType>(
  dtype: D,
  values: ArrayLike<Element<D>>,
  shape?: number | Shape,
): NdArray<D> {
  const out = new NdArray(dtype, shape === undefined ? [values.length] : toShape(shape));
  if (values.length !== out.size) {
    throw new InvalidShapeError(
      `Got ${values.length} values for shape ${formatShape(out.shape)}`,
    );
  }
  for (let i = 0; i < values.length; i += 1) {
    out.data[i] = values[i];
  }
  return out;
}

export function zeros<D extends DType>(dtype: D, shape: number | Shape): NdArray<D> {
  return new NdArray(dtype, toShape(shape));
}

export function full<D extends DType>(
  dtype: D,
  shape: number | Shape,
  fillValue: Element<D>,
): NdArray<D> {
  const out = new NdArray(dtype, toShape(shape));
  for (let i = 0; i < out.size; i += 1) {
    out.data[i] = fillValue;
  }
  return out;
}

/**
 * `[0, end)` in unit steps, shaped as `shape` when given. For 64-bit
 * integer kinds the values are converted to `bigint`.
 */
export function arange<D extends DType>(
  dtype: D,
  end: number,
  shape?: number | Shape,
): NdArray<D> {
  const count = Math.max(0, Math.ceil(end));
  const out = new NdArray(dtype, shape === undefined ? [count] : toShape(shape));
  if (out.size !== count) {
    throw new InvalidShapeError(
      `arange(${end}) cannot be shaped as ${formatShape(out.shape)}`,
    );
  }
  for (let i = 0; i < count; i += 1) {
    out.data[i] = fromNumber(dtype, i);
  }
  return out;
}
