import { describe, expect, it } from "vitest";
import {
  dimensionCount,
  dimensionality,
  elementCount,
  isScalar,
  isVector,
  nested,
  NestedArray,
  ShapeError,
  shape,
} from "../src";
import { DenseArray } from "./helpers/dense";

describe("shape inference", () => {
  it("reports shape, dimensionality and element count", () => {
    const m = nested([
      [1, 2, 3],
      [4, 5, 6],
    ]);
    expect(shape(m)).toEqual([2, 3]);
    expect(dimensionality(m)).toBe(2);
    expect(elementCount(m)).toBe(6);
    expect(dimensionCount(m, 0)).toBe(2);
    expect(dimensionCount(m, 1)).toBe(3);
  });

  it("treats an empty array as 1-D with shape [0]", () => {
    const empty = nested([]);
    expect(shape(empty)).toEqual([0]);
    expect(dimensionality(empty)).toBe(1);
    expect(elementCount(empty)).toBe(0);
    expect(() => dimensionCount(empty, 1)).toThrow(ShapeError);
  });

  it("gives scalars dimensionality 0", () => {
    expect(shape(5)).toEqual([]);
    expect(dimensionality(5)).toBe(0);
    expect(elementCount(5)).toBe(1);
    expect(isScalar(5)).toBe(true);
    expect(isScalar("text")).toBe(true);
    expect(isScalar(nested([1]))).toBe(false);
    expect(() => dimensionCount(7, 0)).toThrow(ShapeError);
  });

  it("recognises vectors", () => {
    expect(isVector(nested([1, 2]))).toBe(true);
    expect(isVector(nested([[1, 2]]))).toBe(false);
    expect(isVector(3)).toBe(false);
  });

  it("takes the inner shape from foreign sub-arrays", () => {
    const m = new NestedArray([
      DenseArray.of([2], [1, 2]),
      DenseArray.of([2], [3, 4]),
    ]);
    expect(shape(m)).toEqual([2, 2]);
    expect(dimensionality(m)).toBe(2);
    expect(elementCount(m)).toBe(4);
    expect(dimensionCount(m, 1)).toBe(2);
    expect(isScalar(DenseArray.of([1], [1]))).toBe(false);
  });

  it("counts a 0-d foreign leaf as a scalar level", () => {
    const m = new NestedArray([DenseArray.scalar(1), DenseArray.scalar(2)]);
    expect(shape(m)).toEqual([2]);
    expect(dimensionality(m)).toBe(1);
  });
});
