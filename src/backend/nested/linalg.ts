import { ShapeError } from "../../core/errors";
import { formatShape } from "../../core/shape";
import { NestedArray } from "./array";
import { coerceParam, computeMatrix } from "./coerce";
import { dimensionCount, dimensionality, shape } from "./dims";
import { checkIndex, elementSeq, majorSliceSeq, scalarValue } from "./dispatch";
import { elementMap, elementReduce, mapmatrix } from "./elementwise";

function numericVector(x: unknown): number[] {
  return Array.from(elementSeq(x), scalarValue);
}

function numericRows(x: unknown): number[][] {
  return majorSliceSeq(x).map(numericVector);
}

function mismatch(operation: string, a: unknown, b: unknown): ShapeError {
  return new ShapeError(
    `Incompatible shapes for ${operation}: ${formatShape(shape(a))} and ${formatShape(shape(b))}`,
  );
}

/** Multiplies every leaf of any operand by `factor`. */
export function scaleValue(x: unknown, factor: number): unknown {
  return mapmatrix((value) => value * factor, x);
}

// ============================================================================
// Products
// ============================================================================

/**
 * Dot product. Two 1-D operands give a number; a 0-d operand scales `m`;
 * other ranks contract through innerProduct.
 */
export function vectorDot(m: NestedArray, b: unknown): unknown {
  const other = coerceParam(b);
  const otherDims = dimensionality(other);
  if (otherDims === 0) return scale(m, scalarValue(other));
  if (otherDims === 1 && dimensionality(m) === 1) {
    if (other instanceof NestedArray) {
      if (other.length !== m.length) {
        throw new ShapeError("Mismatched vector sizes");
      }
      let sum = 0;
      for (let i = 0; i < m.length; i += 1) {
        sum += scalarValue(m.items[i]) * scalarValue(other.items[i]);
      }
      return sum;
    }
  }
  return innerProduct(m, other);
}

/**
 * Contracts the last axis of `a` with the first axis of `b`. Scalars scale
 * the other operand.
 */
export function innerProduct(a: unknown, b: unknown): unknown {
  const dimsA = dimensionality(a);
  const dimsB = dimensionality(b);
  if (dimsA === 0) return scaleValue(b, scalarValue(a));
  if (dimsB === 0) return scaleValue(a, scalarValue(b));
  if (dimsA > 1) {
    return new NestedArray(
      majorSliceSeq(a).map((slice) => innerProduct(slice, b)),
    );
  }
  const weights = numericVector(a);
  const slices = majorSliceSeq(b);
  if (weights.length !== slices.length) {
    throw mismatch("inner product", a, b);
  }
  let acc = computeMatrix(shape(b).slice(1), () => 0);
  for (let k = 0; k < weights.length; k += 1) {
    const weight = weights[k];
    acc = mapmatrix((sum, value) => sum + weight * value, acc, slices[k]);
  }
  return acc;
}

/**
 * Matrix product. Handles scalar, vector-matrix, matrix-vector and
 * matrix-matrix operands directly; anything else goes to innerProduct.
 */
export function matrixMultiply(m: NestedArray, a: unknown): unknown {
  const other = coerceParam(a);
  const dimsM = dimensionality(m);
  const dimsA = dimensionality(other);
  if (dimsA === 0) return scale(m, scalarValue(other));

  if (dimsM === 2 && dimsA === 2) {
    if (dimensionCount(m, 1) !== dimensionCount(other, 0)) {
      throw mismatch("matrix multiply", m, other);
    }
    const right = numericRows(other);
    const columns = dimensionCount(other, 1);
    return new NestedArray(
      numericRows(m).map((row) => {
        const out = new Array<number>(columns).fill(0);
        for (let k = 0; k < row.length; k += 1) {
          const value = row[k];
          const rightRow = right[k];
          for (let j = 0; j < columns; j += 1) {
            out[j] += value * rightRow[j];
          }
        }
        return new NestedArray(out);
      }),
    );
  }

  if (dimsM === 2 && dimsA === 1) {
    const vector = numericVector(other);
    if (dimensionCount(m, 1) !== vector.length) {
      throw mismatch("matrix multiply", m, other);
    }
    return new NestedArray(numericRows(m).map((row) => dot(row, vector)));
  }

  if (dimsM === 1 && dimsA === 2) {
    const vector = numericVector(m);
    if (vector.length !== dimensionCount(other, 0)) {
      throw mismatch("matrix multiply", m, other);
    }
    const right = numericRows(other);
    const columns = dimensionCount(other, 1);
    const out = new Array<number>(columns).fill(0);
    for (let k = 0; k < vector.length; k += 1) {
      for (let j = 0; j < columns; j += 1) {
        out[j] += vector[k] * right[k][j];
      }
    }
    return new NestedArray(out);
  }

  return innerProduct(m, other);
}

function dot(a: readonly number[], b: readonly number[]): number {
  let sum = 0;
  for (let i = 0; i < a.length; i += 1) {
    sum += a[i] * b[i];
  }
  return sum;
}

/** Applies the matrix `m` to the vector `v`. */
export function vectorTransform(m: NestedArray, v: unknown): unknown {
  return matrixMultiply(m, v);
}

// ============================================================================
// Norms
// ============================================================================

export function lengthSquared(m: NestedArray): number {
  return elementReduce(m, (acc, value) => acc + value * value, 0);
}

export function length(m: NestedArray): number {
  return Math.sqrt(lengthSquared(m));
}

/** Scales `m` to unit length. A zero vector gives NaN leaves. */
export function normalise(m: NestedArray): NestedArray {
  return scale(m, 1 / length(m));
}

/** Euclidean distance between `m` and `b`. */
export function distance(m: NestedArray, b: unknown): number {
  return length(matrixSub(m, b));
}

// ============================================================================
// Element-wise arithmetic
// ============================================================================

export function scale(m: NestedArray, factor: number): NestedArray {
  return elementMap(m, (value) => value * factor);
}

export function preScale(factor: number, m: NestedArray): NestedArray {
  return elementMap(m, (value) => factor * value);
}

export function matrixAdd(m: NestedArray, b: unknown): NestedArray {
  return elementMap(m, (x, y) => x + y, b);
}

export function matrixSub(m: NestedArray, b: unknown): NestedArray {
  return elementMap(m, (x, y) => x - y, b);
}

export function elementMultiply(m: NestedArray, a: unknown): NestedArray {
  const other = coerceParam(a);
  if (dimensionality(other) === 0) return scale(m, scalarValue(other));
  return elementMap(m, (x, y) => x * y, other);
}

export function square(m: NestedArray): NestedArray {
  return elementMap(m, (value) => value * value);
}

// ============================================================================
// Row operations
// ============================================================================

export function swapRows(m: NestedArray, i: number, j: number): NestedArray {
  checkIndex(i, m.length, 0);
  checkIndex(j, m.length, 0);
  if (i === j) return m;
  const items = m.items.slice();
  items[i] = m.items[j];
  items[j] = m.items[i];
  return new NestedArray(items);
}

export function multiplyRow(m: NestedArray, i: number, factor: number): NestedArray {
  checkIndex(i, m.length, 0);
  return m.with(i, scaleValue(m.items[i], factor));
}

/** Adds `factor` times row `j` to row `i`. */
export function addRow(
  m: NestedArray,
  i: number,
  j: number,
  factor: number,
): NestedArray {
  checkIndex(i, m.length, 0);
  checkIndex(j, m.length, 0);
  return m.with(
    i,
    mapmatrix((x, y) => x + factor * y, m.items[i], m.items[j]),
  );
}
