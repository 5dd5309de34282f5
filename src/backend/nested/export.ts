import { isNDArray, type FlatBufferKind } from "../types";
import { NestedArray } from "./array";
import { elementCount, isArrayValue } from "./dims";
import { scalarValue } from "./dispatch";

interface WritableBuffer<T> {
  [index: number]: T;
  readonly length: number;
}

/**
 * Writes the leaves of `x` into `out` from `offset` in row-major order and
 * returns the next free offset. 1-D levels are copied in one pass.
 */
function copyTo<T>(
  x: unknown,
  out: WritableBuffer<T>,
  offset: number,
  convert: (value: unknown) => T,
): number {
  if (x instanceof NestedArray) {
    if (x.length > 0 && !isArrayValue(x.items[0])) {
      for (let i = 0; i < x.length; i += 1) {
        out[offset + i] = convert(x.items[i]);
      }
      return offset + x.length;
    }
    let next = offset;
    for (const item of x.items) {
      next = copyTo(item, out, next, convert);
    }
    return next;
  }
  if (isNDArray(x)) {
    let next = offset;
    for (const value of x.elementSeq()) {
      out[next] = convert(value);
      next += 1;
    }
    return next;
  }
  out[offset] = convert(x);
  return offset + 1;
}

/** Leaves as doubles, row-major. Assumes a rectangular array. */
export function toDoubleArray(m: NestedArray): Float64Array {
  const out = new Float64Array(elementCount(m));
  copyTo(m, out, 0, scalarValue);
  return out;
}

/** Leaves as they are, row-major. Assumes a rectangular array. */
export function toObjectArray(m: NestedArray): unknown[] {
  const out = new Array<unknown>(elementCount(m));
  copyTo(m, out, 0, (value) => value);
  return out;
}

export function toFlatBuffer(m: NestedArray, kind: "numeric"): Float64Array;
export function toFlatBuffer(m: NestedArray, kind: "object"): unknown[];
export function toFlatBuffer(
  m: NestedArray,
  kind: FlatBufferKind,
): Float64Array | unknown[];
export function toFlatBuffer(
  m: NestedArray,
  kind: FlatBufferKind,
): Float64Array | unknown[] {
  return kind === "numeric" ? toDoubleArray(m) : toObjectArray(m);
}
