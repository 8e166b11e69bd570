/**
 * Element kinds a backing array may hold.
 *
 * 64-bit integer kinds are stored in BigInt typed arrays, so their elements
 * are `bigint`; every other kind reads and writes plain numbers.
 */

export type DType =
  | "i8"
  | "i16"
  | "i32"
  | "i64"
  | "u8"
  | "u16"
  | "u32"
  | "u64"
  | "f32"
  | "f64";

export interface ElementTypes {
  i8: number;
  i16: number;
  i32: number;
  i64: bigint;
  u8: number;
  u16: number;
  u32: number;
  u64: bigint;
  f32: number;
  f64: number;
}

export type Element<D extends DType> = ElementTypes[D];

/** The part of a typed array the simulator relies on. */
export interface Storage<T> {
  readonly length: number;
  [index: number]: T;
}

type StorageConstructors = {
  [D in DType]: new (length: number) => Storage<ElementTypes[D]>;
};

const STORAGE: StorageConstructors = {
  i8: Int8Array,
  i16: Int16Array,
  i32: Int32Array,
  i64: BigInt64Array,
  u8: Uint8Array,
  u16: Uint16Array,
  u32: Uint32Array,
  u64: BigUint64Array,
  f32: Float32Array,
  f64: Float64Array,
};

const FROM_NUMBER: { [D in DType]: (value: number) => ElementTypes[D] } = {
  i8: Number,
  i16: Number,
  i32: Number,
  i64: BigInt,
  u8: Number,
  u16: Number,
  u32: Number,
  u64: BigInt,
  f32: Number,
  f64: Number,
};

export const DTYPES: readonly DType[] = Object.keys(STORAGE).filter(isDType);

export function isDType(value: string): value is DType {
  return Object.prototype.hasOwnProperty.call(STORAGE, value);
}

export function allocateStorage<D extends DType>(
  dtype: D,
  length: number,
): Storage<Element<D>> {
  return new STORAGE[dtype](length);
}

/** Convert a JS number to the element representation of `dtype`. */
export function fromNumber<D extends DType>(dtype: D, value: number): Element<D> {
  return FROM_NUMBER[dtype](value);
}
