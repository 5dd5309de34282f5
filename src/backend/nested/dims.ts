import { sizeOf } from "../../core/shape";
import { ShapeError } from "../../core/errors";
import { isNDArray, type NDArray, type Shape } from "../types";
import { NestedArray } from "./array";

// Shape inference follows the first item at each level. Rectangularity is
// assumed here, never checked; see validateShape.

export function dimensionality(x: unknown): number {
  if (x instanceof NestedArray) {
    if (x.length === 0) return 1;
    return 1 + dimensionality(x.items[0]);
  }
  if (isNDArray(x)) return x.dimensionality();
  return 0;
}

export function shape(x: unknown): Shape {
  if (x instanceof NestedArray) {
    if (x.length === 0) return [0];
    return [x.length, ...shape(x.items[0])];
  }
  if (isNDArray(x)) return x.shape();
  return [];
}

export function dimensionCount(x: unknown, axis: number): number {
  if (x instanceof NestedArray) {
    if (axis === 0) return x.length;
    if (x.length === 0) {
      throw new ShapeError(`Axis ${axis} is unknown for an empty array`);
    }
    return dimensionCount(x.items[0], axis - 1);
  }
  if (isNDArray(x)) return x.dimensionCount(axis);
  throw new ShapeError(`Axis ${axis} out of range for a scalar`);
}

export function elementCount(x: unknown): number {
  if (x instanceof NestedArray) {
    if (x.length === 0) return 0;
    return x.length * elementCount(x.items[0]);
  }
  if (isNDArray(x)) return sizeOf(x.shape());
  return 1;
}

export function isArrayValue(x: unknown): x is NestedArray | NDArray {
  return x instanceof NestedArray || isNDArray(x);
}

export function isScalar(x: unknown): boolean {
  return !isArrayValue(x);
}

export function isVector(x: unknown): boolean {
  return dimensionality(x) === 1;
}
