import { debugLog } from "../../core/debug";
import { ShapeError, ValidationError } from "../../core/errors";
import { formatShape, shapesEqual } from "../../core/shape";
import { isNDArray, type Shape } from "../types";
import { NestedArray } from "./array";
import { shape } from "./dims";

// ============================================================================
// Canonical form
// ============================================================================

function isCollection(x: unknown): x is Iterable<unknown> {
  return (
    typeof x === "object" &&
    x !== null &&
    Symbol.iterator in x &&
    typeof x[Symbol.iterator] === "function"
  );
}

/**
 * True if `x` is a scalar, or a nested array made only of nested arrays and
 * scalars whose structure matches its own declared shape at every level.
 */
export function isCanonical(x: unknown): boolean {
  if (x instanceof NestedArray) {
    return x.items.every(isCanonical) && matchesShape(x, shape(x), 0);
  }
  return !isNDArray(x) && !isCollection(x);
}

function matchesShape(x: unknown, expected: Shape, level: number): boolean {
  if (!(x instanceof NestedArray) || x.length !== expected[level]) return false;
  if (level + 1 < expected.length) {
    return x.items.every((item) => matchesShape(item, expected, level + 1));
  }
  return x.items.every((item) => !(item instanceof NestedArray));
}

/** True if sibling sub-arrays share one shape at every level. */
export function sameShapes(a: NestedArray): boolean {
  if (a.length === 0) return true;
  const first = shape(a.items[0]);
  for (const item of a.items) {
    if (!shapesEqual(shape(item), first)) return false;
    if (item instanceof NestedArray && !sameShapes(item)) return false;
  }
  return true;
}

export function validateShape(a: NestedArray): Shape {
  if (!sameShapes(a)) {
    throw new ValidationError("Inconsistent shape for nested array");
  }
  return shape(a);
}

function checkSiblingShapes(items: readonly unknown[]): void {
  if (items.length < 2) return;
  const first = shape(items[0]);
  for (let i = 1; i < items.length; i += 1) {
    const other = shape(items[i]);
    if (!shapesEqual(first, other)) {
      throw new ValidationError(
        `Can't convert to nested array: inconsistent shape (${formatShape(first)} vs ${formatShape(other)} at index ${i})`,
      );
    }
  }
}

// ============================================================================
// Coercion
// ============================================================================

/**
 * Converts any input to canonical nested form.
 *
 * Foreign arrays convert themselves through `toNestedVectors`, 0-d arrays
 * become their value, native arrays and other iterable collections become
 * nested arrays, and everything else is a scalar.
 */
export function coerce(x: unknown): unknown {
  if (x instanceof NestedArray) return convertToNestedVectors(x);
  if (isNDArray(x)) {
    if (x.dimensionality() > 0) {
      debugLog(
        "coerce",
        `converting ${x.backend} array of shape ${formatShape(x.shape())}`,
      );
      return coerce(x.toNestedVectors());
    }
    return x.get0d();
  }
  if (x === null || x === undefined) return x;
  if (isCollection(x)) {
    const items = Array.from(x, coerce);
    checkSiblingShapes(items);
    return new NestedArray(items);
  }
  return x;
}

/**
 * Returns `a` when already canonical; otherwise a copy whose items are
 * converted, reusing every item that converts to itself.
 */
export function convertToNestedVectors(a: NestedArray): NestedArray {
  if (isCanonical(a)) return a;
  let changed = false;
  const items = a.items.map((item) => {
    const converted = coerce(item);
    if (converted !== item) changed = true;
    return converted;
  });
  checkSiblingShapes(items);
  return changed ? new NestedArray(items) : a;
}

/**
 * Prepares an operand: native data is coerced, while nested and foreign
 * arrays are used as they are.
 */
export function coerceParam(x: unknown): unknown {
  if (x instanceof NestedArray || isNDArray(x)) return x;
  return coerce(x);
}

export function constructMatrix(data: unknown): unknown {
  return coerce(data);
}

/** Builds a nested array from array data. Scalar data is rejected. */
export function nested(data: unknown): NestedArray {
  const result = coerce(data);
  if (result instanceof NestedArray) return result;
  throw new ShapeError("Expected array data, got a scalar");
}

/** The value as a nested array, converting foreign arrays. */
export function asNestedArray(x: unknown): NestedArray {
  if (x instanceof NestedArray) return x;
  const converted = isNDArray(x) ? coerce(x) : undefined;
  if (converted instanceof NestedArray) return converted;
  throw new ShapeError("Axis out of range: reached a scalar");
}

// ============================================================================
// Construction
// ============================================================================

export function newVector(length: number): NestedArray {
  return new NestedArray(new Array<unknown>(length).fill(0));
}

export function newMatrix(rows: number, columns: number): NestedArray {
  // rows are immutable, so one row object can be shared
  return new NestedArray(new Array<unknown>(rows).fill(newVector(columns)));
}

export function newNd(dims: readonly number[]): NestedArray | number {
  if (dims.length === 0) return 0;
  return new NestedArray(new Array<unknown>(dims[0]).fill(newNd(dims.slice(1))));
}

/**
 * Builds an array of the given shape whose leaves are `generator(indices)`.
 * Leaves are generated in row-major order. An empty shape gives the scalar
 * `generator([])`.
 */
export function computeMatrix(
  targetShape: readonly number[],
  generator: (indices: readonly number[]) => unknown,
): unknown {
  if (targetShape.length === 0) return generator([]);
  return buildLevel(targetShape, 0, [], generator);
}

/** computeMatrix for shapes of at least one dimension. */
export function computeArray(
  targetShape: readonly number[],
  generator: (indices: readonly number[]) => unknown,
): NestedArray {
  if (targetShape.length === 0) {
    throw new ShapeError("computeArray requires at least one dimension");
  }
  return buildLevel(targetShape, 0, [], generator);
}

function buildLevel(
  targetShape: readonly number[],
  level: number,
  prefix: number[],
  generator: (indices: readonly number[]) => unknown,
): NestedArray {
  const count = targetShape[level];
  const last = level === targetShape.length - 1;
  const items = new Array<unknown>(count);
  for (let i = 0; i < count; i += 1) {
    prefix.push(i);
    items[i] = last
      ? generator(prefix.slice())
      : buildLevel(targetShape, level + 1, prefix, generator);
    prefix.pop();
  }
  return new NestedArray(items);
}
