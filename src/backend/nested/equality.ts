import type { NestedArray } from "./array";
import { coerceParam } from "./coerce";
import { dimensionCount, dimensionality } from "./dims";
import { elementSeq, majorSliceSeq, unwrap0d } from "./dispatch";

/**
 * Structural, value-based equality. Numeric leaves compare by value across
 * number and bigint.
 */
export function matrixEquals(m: NestedArray, b: unknown): boolean {
  return valueEquals(m, coerceParam(b));
}

export function valueEquals(a: unknown, b: unknown): boolean {
  const dimsA = dimensionality(a);
  const dimsB = dimensionality(b);
  if (dimsA === 0 || dimsB === 0) {
    return dimsA === dimsB && leafEquals(a, b);
  }
  if (dimsA !== dimsB) return false;
  if (dimensionCount(a, 0) !== dimensionCount(b, 0)) return false;
  if (dimsB === 1) {
    const left = Array.from(elementSeq(a));
    const right = Array.from(elementSeq(b));
    return left.every((value, i) => leafEquals(value, right[i]));
  }
  const left = majorSliceSeq(a);
  const right = majorSliceSeq(b);
  return left.every((slice, i) => valueEquals(slice, right[i]));
}

export function leafEquals(a: unknown, b: unknown): boolean {
  const x = unwrap0d(a);
  const y = unwrap0d(b);
  if (isNumeric(x) && isNumeric(y)) return x == y;
  return x === y;
}

function isNumeric(x: unknown): x is number | bigint {
  return typeof x === "number" || typeof x === "bigint";
}
