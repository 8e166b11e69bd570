import { describe, expect, it } from "vitest";

import { DTYPES, isDType } from "../src/core/dtype";
import { InvalidShapeError, OutOfRangeAccessError } from "../src/core/errors";
import { arange, asSlice, full, NdArray, ndarray, zeros } from "../src/core/ndarray";
import { computeContiguousStrides, forEachIndex } from "../src/core/shape";

describe("NdArray", () => {
  it("uses row-major strides", () => {
    expect(computeContiguousStrides([2, 3, 4])).toEqual([12, 4, 1]);
    expect(zeros("f32", [3, 4]).strides).toEqual([4, 1]);
  });

  it("reads and writes by coordinate", () => {
    const a = arange("i32", 12, [3, 4]);
    expect(a.get([1, 2])).toBe(6);
    a.set([2, 3], -5);
    expect(a.get([2, 3])).toBe(-5);
    expect(a.data[11]).toBe(-5);
  });

  it("stores 64-bit integer kinds as bigint", () => {
    const a = arange("i64", 3);
    expect(a.toArray()).toEqual([0n, 1n, 2n]);
    a.set([0], 2n ** 40n);
    expect(a.get([0])).toBe(1099511627776n);
  });

  it("backs each kind with its typed array", () => {
    expect(zeros("u8", 2).data).toBeInstanceOf(Uint8Array);
    expect(zeros("u64", 2).data).toBeInstanceOf(BigUint64Array);
    expect(zeros("f64", 2).data).toBeInstanceOf(Float64Array);
  });

  it("wraps values the way the element kind does", () => {
    const a = ndarray("u8", [255, 256, -1]);
    expect(a.toArray()).toEqual([255, 0, 255]);
  });

  it("knows every element kind", () => {
    expect(DTYPES).toEqual(["i8", "i16", "i32", "i64", "u8", "u16", "u32", "u64", "f32", "f64"]);
    expect(isDType("f16")).toBe(false);
    expect(zeros("i16", [2, 3, 4]).rank).toBe(3);
  });

  it("fills", () => {
    expect(full("i32", 4, -1).toArray()).toEqual([-1, -1, -1, -1]);
  });

  it("rejects out-of-range indices", () => {
    const a = zeros("i32", [2, 2]);
    expect(() => a.get([2, 0])).toThrow(OutOfRangeAccessError);
    expect(() => a.get([0, -1])).toThrow(OutOfRangeAccessError);
    expect(() => a.get([0])).toThrow(InvalidShapeError);
  });

  it("rejects data that does not match the shape", () => {
    expect(() => ndarray("i32", [1, 2, 3], [2, 2])).toThrow(InvalidShapeError);
    expect(() => new NdArray("f32", [2], new Float32Array(3))).toThrow(InvalidShapeError);
    expect(() => zeros("f32", [2, -1])).toThrow(InvalidShapeError);
  });

  it("makes slices at an origin", () => {
    const a = zeros("i32", [4, 4]);
    expect(a.at([1, 2])).toEqual({ array: a, origin: [1, 2] });
    expect(a.at(3).origin).toEqual([3]);
    expect(asSlice(a).origin).toEqual([0, 0]);
  });
});

describe("forEachIndex", () => {
  it("visits row-major with linear positions", () => {
    const seen: Array<[number[], number]> = [];
    forEachIndex([2, 2], (index, linear) => seen.push([index.slice(), linear]));
    expect(seen).toEqual([
      [[0, 0], 0],
      [[0, 1], 1],
      [[1, 0], 2],
      [[1, 1], 3],
    ]);
  });

  it("visits nothing for an empty box", () => {
    let calls = 0;
    forEachIndex([3, 0], () => {
      calls += 1;
    });
    expect(calls).toBe(0);
  });
});
