/**
 * Foreign-aware accessors.
 *
 * Operands of nested operations may be nested arrays, arrays of another
 * backend, or scalars. Everything below reaches into them only through the
 * `NDArray` capabilities, never through their representation.
 */

import { formatShape } from "../../core/shape";
import { IndexError, ShapeError } from "../../core/errors";
import { isNDArray } from "../types";
import { NestedArray } from "./array";
import { dimensionality, shape } from "./dims";

export function checkIndex(i: number, length: number, axis: number): void {
  if (!Number.isInteger(i) || i < 0 || i >= length) {
    throw new IndexError(
      `Index ${i} out of range for axis ${axis} of length ${length}`,
    );
  }
}

export function majorSliceSeq(x: unknown): readonly unknown[] {
  if (x instanceof NestedArray) return x.items;
  if (isNDArray(x)) return x.majorSliceSeq();
  throw new ShapeError("Cannot take major slices of a scalar");
}

export function majorSlice(x: unknown, i: number): unknown {
  if (x instanceof NestedArray) {
    checkIndex(i, x.length, 0);
    return x.items[i];
  }
  if (isNDArray(x)) return x.majorSlice(i);
  throw new ShapeError("Cannot take a major slice of a scalar");
}

/** Scalar leaves in row-major order. Restartable: each iteration walks anew. */
export function elementSeq(x: unknown): Iterable<unknown> {
  if (x instanceof NestedArray) {
    if (x.length === 0) return [];
    // 1-D arrays are their own element sequence
    if (dimensionality(x.items[0]) === 0) return x.items;
    return { [Symbol.iterator]: () => walkLeaves(x) };
  }
  if (isNDArray(x)) return x.elementSeq();
  return [x];
}

function* walkLeaves(a: NestedArray): Generator<unknown> {
  for (const item of a.items) {
    yield* elementSeq(item);
  }
}

export function get0d(x: unknown): unknown {
  if (x instanceof NestedArray) {
    throw new ShapeError(`Not a 0-d array: shape ${formatShape(shape(x))}`);
  }
  if (isNDArray(x)) {
    if (x.dimensionality() !== 0) {
      throw new ShapeError(`Not a 0-d array: shape ${formatShape(x.shape())}`);
    }
    return x.get0d();
  }
  return x;
}

/** Unwraps 0-d foreign arrays; anything else is returned as is. */
export function unwrap0d(x: unknown): unknown {
  if (isNDArray(x) && x.dimensionality() === 0) return unwrap0d(x.get0d());
  return x;
}

/** Numeric value of a scalar leaf, as used by every arithmetic operation. */
export function scalarValue(x: unknown): number {
  if (typeof x === "number") return x;
  if (typeof x === "bigint") return Number(x);
  if (isNDArray(x) && x.dimensionality() === 0) return scalarValue(x.get0d());
  throw new TypeError(`Expected a numeric scalar, got ${describeValue(x)}`);
}

export function describeValue(x: unknown): string {
  if (x instanceof NestedArray || isNDArray(x)) {
    return `an array of shape ${formatShape(shape(x))}`;
  }
  if (x === null) return "null";
  return typeof x;
}
