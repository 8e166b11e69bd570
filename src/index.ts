export * from "./grid";
export { DTYPES, type DType, type Element, fromNumber, isDType } from "./core/dtype";
export {
  AsyncTileBodyError,
  GridBusyError,
  InvalidShapeError,
  OutOfRangeAccessError,
} from "./core/errors";
export {
  arange,
  type ArraySlice,
  asSlice,
  type BackingArray,
  full,
  NdArray,
  ndarray,
  zeros,
} from "./core/ndarray";
export { computeContiguousStrides, type Shape, sizeOf } from "./core/shape";
