import { describe, expect, it } from "vitest";
import {
  addRow,
  distance,
  elementMultiply,
  IndexError,
  innerProduct,
  length,
  lengthSquared,
  matrixAdd,
  matrixEquals,
  matrixMultiply,
  matrixSub,
  multiplyRow,
  nested,
  normalise,
  preScale,
  scale,
  ShapeError,
  square,
  swapRows,
  toDoubleArray,
  vectorDot,
  vectorTransform,
} from "../src";
import { DenseArray, plain } from "./helpers/dense";

describe("products", () => {
  it("computes dot products of vectors", () => {
    expect(vectorDot(nested([1, 2, 3]), [4, 5, 6])).toBe(32);
    expect(vectorDot(nested([1, 2]), DenseArray.of([2], [3, 4]))).toBe(11);
    expect(() => vectorDot(nested([1, 2]), [1, 2, 3])).toThrow(
      "Mismatched vector sizes",
    );
  });

  it("scales by a scalar operand", () => {
    expect(plain(vectorDot(nested([1, 2]), 3))).toEqual([3, 6]);
    expect(plain(vectorDot(nested([1, 2]), DenseArray.scalar(2)))).toEqual([
      2, 4,
    ]);
  });

  it("contracts higher ranks through the inner product", () => {
    expect(plain(vectorDot(nested([[1, 2], [3, 4]]), [1, 1]))).toEqual([3, 7]);
    expect(plain(innerProduct(nested([1, 2]), nested([[1, 2], [3, 4]])))).toEqual(
      [7, 10],
    );
    expect(plain(innerProduct(nested([[[1, 2]], [[3, 4]]]), nested([1, 1])))).toEqual(
      [[3], [7]],
    );
    expect(innerProduct(2, 3)).toBe(6);
    expect(() => innerProduct(nested([1, 2]), nested([1]))).toThrow(ShapeError);
  });

  it("multiplies matrices", () => {
    const a = nested([
      [1, 2],
      [3, 4],
    ]);
    expect(plain(matrixMultiply(a, [[5, 6], [7, 8]]))).toEqual([
      [19, 22],
      [43, 50],
    ]);
    expect(plain(matrixMultiply(a, [1, 1]))).toEqual([3, 7]);
    expect(plain(matrixMultiply(nested([1, 1]), a))).toEqual([4, 6]);
    expect(plain(matrixMultiply(nested([[1, 2]]), 2))).toEqual([[2, 4]]);
  });

  it("multiplies by foreign matrices", () => {
    const identity = DenseArray.of([2, 2], [1, 0, 0, 1]);
    expect(plain(matrixMultiply(nested([[1, 2], [3, 4]]), identity))).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });

  it("falls back to the inner product for other ranks", () => {
    const t = nested([[[1, 2]]]);
    expect(plain(matrixMultiply(t, [[1, 0], [0, 1]]))).toEqual([[[1, 2]]]);
  });

  it("rejects mismatched matrices", () => {
    expect(() => matrixMultiply(nested([[1, 2, 3]]), [[1, 2], [3, 4]])).toThrow(
      ShapeError,
    );
    expect(() => matrixMultiply(nested([[1, 2]]), [1, 2, 3])).toThrow(
      ShapeError,
    );
  });

  it("transforms vectors", () => {
    const rotation = nested([
      [0, -1],
      [1, 0],
    ]);
    expect(plain(vectorTransform(rotation, [1, 0]))).toEqual([0, 1]);
  });
});

describe("norms", () => {
  it("computes Euclidean length", () => {
    expect(lengthSquared(nested([3, 4]))).toBe(25);
    expect(length(nested([3, 4]))).toBe(5);
    expect(length(nested([[3], [4]]))).toBe(5);
    expect(distance(nested([1, 1]), [4, 5])).toBe(5);
  });

  it("normalises to unit length", () => {
    const [x, y] = toDoubleArray(normalise(nested([3, 4])));
    expect(x).toBeCloseTo(0.6);
    expect(y).toBeCloseTo(0.8);
  });

  it("gives NaN for a zero vector", () => {
    const values = Array.from(toDoubleArray(normalise(nested([0, 0]))));
    expect(values.every((value) => Number.isNaN(value))).toBe(true);
  });
});

describe("element-wise arithmetic", () => {
  const m = nested([
    [1, 2],
    [3, 4],
  ]);

  it("scales", () => {
    expect(scale(nested([1, 2]), 3).toArray()).toEqual([3, 6]);
    expect(preScale(2, nested([1, 2])).toArray()).toEqual([2, 4]);
  });

  it("adds and subtracts with broadcasting", () => {
    expect(matrixAdd(m, [10, 20]).toArray()).toEqual([
      [11, 22],
      [13, 24],
    ]);
    expect(matrixSub(m, 1).toArray()).toEqual([
      [0, 1],
      [2, 3],
    ]);
    expect(matrixEquals(matrixAdd(m, [[5, 6], [7, 8]]), matrixAdd(nested([[5, 6], [7, 8]]), m))).toBe(true);
    expect(() => matrixAdd(nested([1, 2]), [1, 2, 3])).toThrow(ShapeError);
  });

  it("multiplies element by element", () => {
    expect(elementMultiply(nested([1, 2]), [3, 4]).toArray()).toEqual([3, 8]);
    expect(elementMultiply(nested([1, 2]), 2).toArray()).toEqual([2, 4]);
    expect(square(nested([1, -2])).toArray()).toEqual([1, 4]);
  });
});

describe("row operations", () => {
  const m = nested([
    [1, 2],
    [3, 4],
  ]);

  it("swaps rows", () => {
    expect(swapRows(m, 0, 1).toArray()).toEqual([
      [3, 4],
      [1, 2],
    ]);
    expect(swapRows(m, 0, 0)).toBe(m);
    expect(() => swapRows(m, 0, 2)).toThrow(IndexError);
  });

  it("multiplies a row", () => {
    const out = multiplyRow(m, 1, 2);
    expect(out.toArray()).toEqual([
      [1, 2],
      [6, 8],
    ]);
    expect(out.items[0]).toBe(m.items[0]);
  });

  it("adds a multiple of one row to another", () => {
    expect(addRow(m, 0, 1, 2).toArray()).toEqual([
      [7, 10],
      [3, 4],
    ]);
    expect(m.toArray()).toEqual([
      [1, 2],
      [3, 4],
    ]);
  });
});
