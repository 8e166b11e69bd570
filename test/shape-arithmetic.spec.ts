import { describe, expect, it } from "vitest";

import { InvalidShapeError } from "../src/core/errors";
import {
  groupCount,
  groupExtent,
  groupIndices,
  groupOrigin,
  validateLaunchShapes,
} from "../src/grid/shape-arithmetic";

describe("shape arithmetic", () => {
  describe("groupCount", () => {
    it("divides evenly", () => {
      expect(groupCount([512, 1, 1], [64, 1, 1])).toEqual([8, 1, 1]);
    });

    it("rounds up ragged dimensions", () => {
      expect(groupCount([511, 1, 1], [64, 1, 1])).toEqual([8, 1, 1]);
      expect(groupCount([12], [8])).toEqual([2]);
    });

    it("gives one group when the tile is larger than the domain", () => {
      expect(groupCount([1, 16, 1], [64, 1, 1])).toEqual([1, 16, 1]);
    });

    it("rejects zero and negative components", () => {
      expect(() => groupCount([16, 0], [8, 1])).toThrow(InvalidShapeError);
      expect(() => groupCount([16], [0])).toThrow(InvalidShapeError);
      expect(() => groupCount([16], [-8])).toThrow(InvalidShapeError);
    });

    it("rejects mismatched ranks", () => {
      expect(() => groupCount([16], [8, 1])).toThrow(InvalidShapeError);
    });

    it("rejects ranks outside 1..3", () => {
      expect(() => groupCount([], [])).toThrow(InvalidShapeError);
      expect(() => groupCount([2, 2, 2, 2], [1, 1, 1, 1])).toThrow(InvalidShapeError);
    });

    it("rejects fractional components", () => {
      expect(() => groupCount([16.5], [8])).toThrow(InvalidShapeError);
    });

    it("names both shapes in the message", () => {
      expect(() => validateLaunchShapes([16, 0], [8, 1])).toThrow(
        "Invalid launch shape: global [16,0] local [8,1]",
      );
    });
  });

  describe("groupOrigin", () => {
    it("scales the group index by the local size", () => {
      expect(groupOrigin([1, 2, 0], [8, 4, 1])).toEqual([8, 8, 0]);
      expect(groupOrigin([0], [8])).toEqual([0]);
    });
  });

  describe("groupExtent", () => {
    it("is the local size for interior tiles", () => {
      expect(groupExtent([0, 0], [8, 8], [16, 16])).toEqual([8, 8]);
    });

    it("clips trailing tiles", () => {
      expect(groupExtent([8, 0], [8, 8], [12, 5])).toEqual([4, 5]);
    });
  });

  describe("groupIndices", () => {
    it("enumerates row-major, last dimension fastest", () => {
      expect([...groupIndices([2, 1, 3])]).toEqual([
        [0, 0, 0],
        [0, 0, 1],
        [0, 0, 2],
        [1, 0, 0],
        [1, 0, 1],
        [1, 0, 2],
      ]);
    });

    it("yields a single index for a one-group launch", () => {
      expect([...groupIndices([1, 1, 1])]).toEqual([[0, 0, 0]]);
    });

    it("yields independent arrays", () => {
      const indices = [...groupIndices([2])];
      indices[0][0] = 99;
      expect(indices[1]).toEqual([1]);
    });
  });
});
