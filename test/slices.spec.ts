import { describe, expect, it } from "vitest";
import {
  getColumn,
  getColumns,
  getMajorSlice,
  getMajorSliceView,
  getRow,
  getRows,
  getSlice,
  getSliceView,
  IndexError,
  join,
  joinAlong,
  nested,
  NestedArray,
  order,
  rotate,
  select,
  ShapeError,
  subvector,
} from "../src";
import { DenseArray, plain } from "./helpers/dense";

const m = nested([
  [1, 2, 3],
  [4, 5, 6],
]);

describe("slices", () => {
  it("takes major slices", () => {
    expect(plain(getMajorSlice(m, 1))).toEqual([4, 5, 6]);
    expect(getMajorSlice(m, 0)).toBe(m.items[0]);
    expect(getMajorSliceView(m, 0)).toBe(m.items[0]);
    expect(() => getMajorSlice(m, 2)).toThrow(IndexError);
  });

  it("takes slices along inner axes", () => {
    expect(plain(getSlice(m, 1, 2))).toEqual([3, 6]);
    expect(plain(getSliceView(m, 1, 0))).toEqual([1, 4]);
    const t = nested([
      [
        [1, 2],
        [3, 4],
      ],
      [
        [5, 6],
        [7, 8],
      ],
    ]);
    expect(plain(getSlice(t, 2, 1))).toEqual([
      [2, 4],
      [6, 8],
    ]);
    expect(() => getSlice(nested([1, 2]), 1, 0)).toThrow(ShapeError);
  });

  it("slices through foreign sub-arrays", () => {
    const a = new NestedArray([
      DenseArray.of([2], [1, 2]),
      DenseArray.of([2], [3, 4]),
    ]);
    expect(plain(getSlice(a, 1, 0))).toEqual([1, 3]);
  });

  it("reads rows and columns", () => {
    expect(plain(getRow(m, 0))).toEqual([1, 2, 3]);
    expect(plain(getColumn(m, 1))).toEqual([2, 5]);
    expect(getRows(m).map(plain)).toEqual([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(getColumns(m).map((column) => column.toArray())).toEqual([
      [1, 4],
      [2, 5],
      [3, 6],
    ]);
    expect(getColumns(nested([]))).toEqual([]);
  });

  it("takes subvectors", () => {
    const v = nested([1, 2, 3, 4, 5]);
    expect(subvector(v, 1, 3).toArray()).toEqual([2, 3, 4]);
    expect(subvector(v, 5, 0).toArray()).toEqual([]);
    expect(() => subvector(v, 3, 3)).toThrow(IndexError);
    expect(() => subvector(v, -1, 2)).toThrow(IndexError);
  });
});

describe("reordering", () => {
  const v = nested([1, 2, 3, 4, 5]);

  it("rotates toward higher indices", () => {
    expect(rotate(v, 0, 2).toArray()).toEqual([4, 5, 1, 2, 3]);
    expect(rotate(v, 0, -1).toArray()).toEqual([2, 3, 4, 5, 1]);
    expect(rotate(v, 0, 7).toArray()).toEqual([4, 5, 1, 2, 3]);
    expect(rotate(v, 0, 5)).toBe(v);
    expect(rotate(nested([]), 0, 3).toArray()).toEqual([]);
  });

  it("rejects fractional rotations", () => {
    expect(() => rotate(v, 0, 2.5)).toThrow(
      "Rotation must be a whole number of places, got 2.5",
    );
    expect(() => rotate(m, 1, 0.5)).toThrow(IndexError);
    expect(v.toArray()).toEqual([1, 2, 3, 4, 5]);
  });

  it("rotates along inner axes", () => {
    expect(rotate(m, 1, 1).toArray()).toEqual([
      [3, 1, 2],
      [6, 4, 5],
    ]);
    const a = new NestedArray([DenseArray.of([3], [1, 2, 3])]);
    expect(rotate(a, 1, 1).toArray()).toEqual([[3, 1, 2]]);
  });

  it("orders along an axis", () => {
    expect(order(nested([10, 20, 30]), [2, 0, 0]).toArray()).toEqual([
      30, 10, 10,
    ]);
    expect(order(m, 1, [2, 0]).toArray()).toEqual([
      [3, 1],
      [6, 4],
    ]);
    expect(order(nested([10, 20, 30]), nested([1])).toArray()).toEqual([20]);
    expect(() => order(v, [5])).toThrow(IndexError);
  });

  it("selects by one index list per axis", () => {
    expect(select(m, [[1], [0, 2]]).toArray()).toEqual([[4, 6]]);
    expect(select(nested([7, 8, 9]), [[2, 0]]).toArray()).toEqual([9, 7]);
    expect(() => select(m, [[0]])).toThrow(
      "Array dimension does not match length of args",
    );
  });
});

describe("joining", () => {
  it("concatenates arrays of equal dimensionality", () => {
    expect(join(nested([1, 2]), [3, 4]).toArray()).toEqual([1, 2, 3, 4]);
    expect(join(nested([[1, 2]]), [[3, 4]]).toArray()).toEqual([
      [1, 2],
      [3, 4],
    ]);
    expect(join(nested([]), [1, 2]).toArray()).toEqual([1, 2]);
  });

  it("appends an array of one dimension less", () => {
    expect(join(nested([[1, 2]]), [3, 4]).toArray()).toEqual([
      [1, 2],
      [3, 4],
    ]);
    const dense = DenseArray.of([2], [3, 4]);
    const joined = join(nested([[1, 2]]), dense);
    expect(joined.items[1]).toBe(dense);
    expect(joined.toArray()).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("rejects incompatible shapes and leaves operands untouched", () => {
    const a = nested([1, 2]);
    expect(() => join(a, [[[1]]])).toThrow(
      "Joining with array of incompatible size",
    );
    expect(() => join(nested([[1, 2]]), [[3]])).toThrow(ShapeError);
    expect(() => join(nested([[1, 2]]), [3])).toThrow(ShapeError);
    expect(a.toArray()).toEqual([1, 2]);
  });

  it("joins along inner axes", () => {
    const a = nested([
      [1, 2],
      [3, 4],
    ]);
    expect(joinAlong(a, [[5], [6]], 1).toArray()).toEqual([
      [1, 2, 5],
      [3, 4, 6],
    ]);
    expect(joinAlong(a, [[5, 6]], 0).toArray()).toEqual([
      [1, 2],
      [3, 4],
      [5, 6],
    ]);
    expect(() => joinAlong(a, [[5]], 1)).toThrow(ShapeError);
  });
});
