import type { DType } from "../core/dtype";
import type { ArraySlice, BackingArray } from "../core/ndarray";
import type { Shape } from "../core/shape";
import {
  allocate,
  load as loadMasked,
  type MaskedBuffer,
  store as storeMasked,
} from "./masked-view";

export interface GroupCoordinates {
  groupIndex: Shape;
  workOffset: Shape;
  groupShape: Shape;
  localSize: Shape;
  globalSize: Shape;
  groupCount: Shape;
}

function frozen(shape: Shape): Shape {
  return Object.freeze(shape.slice());
}

/**
 * Per-tile handle passed to a grid body. Coordinates are fixed when the
 * driver builds the context; the context keeps nothing between tiles.
 */
export class GroupContext {
  private readonly coords: Readonly<GroupCoordinates>;

  constructor(coords: GroupCoordinates) {
    this.coords = Object.freeze({
      groupIndex: frozen(coords.groupIndex),
      workOffset: frozen(coords.workOffset),
      groupShape: frozen(coords.groupShape),
      localSize: frozen(coords.localSize),
      globalSize: frozen(coords.globalSize),
      groupCount: frozen(coords.groupCount),
    });
  }

  groupId(): Shape {
    return this.coords.groupIndex;
  }

  workOffset(): Shape {
    return this.coords.workOffset;
  }

  /** Clipped extent of this tile; smaller than localSize() on a ragged edge. */
  groupShape(): Shape {
    return this.coords.groupShape;
  }

  /** Nominal tile shape of the launch. */
  localSize(): Shape {
    return this.coords.localSize;
  }

  globalSize(): Shape {
    return this.coords.globalSize;
  }

  numGroups(): Shape {
    return this.coords.groupCount;
  }

  /**
   * Read `shape` elements starting at the slice's origin. The origin is the
   * caller's choice, usually `arr.at(ctx.workOffset())`.
   */
  load<D extends DType>(
    target: BackingArray<D> | ArraySlice<D>,
    shape: number | Shape,
  ): MaskedBuffer<D> {
    return loadMasked(target, shape);
  }

  store<D extends DType>(target: BackingArray<D> | ArraySlice<D>, buffer: MaskedBuffer<D>): void {
    storeMasked(target, buffer);
  }

  /** Scratch space of exactly `shape`; contents unspecified. */
  empty<D extends DType>(shape: number | Shape, dtype: D): MaskedBuffer<D> {
    return allocate(shape, dtype);
  }
}
