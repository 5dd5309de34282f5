import { IndexError, ShapeError } from "../../core/errors";
import { formatShape, shapesEqual } from "../../core/shape";
import { isNDArray } from "../types";
import { NestedArray } from "./array";
import { asNestedArray, coerceParam } from "./coerce";
import { dimensionCount, dimensionality, shape } from "./dims";
import {
  elementSeq,
  majorSlice,
  majorSliceSeq,
  scalarValue,
} from "./dispatch";

/** An index list: a plain iterable of numbers, or a 1-D array. */
export type IndexList = Iterable<unknown>;

// ============================================================================
// Slices
// ============================================================================

/** The i-th top-level item. Returns the item itself, not a copy. */
export function getMajorSlice(m: NestedArray, i: number): unknown {
  return majorSlice(m, i);
}

export function getSlice(m: NestedArray, axis: number, i: number): unknown {
  if (axis === 0) return getMajorSlice(m, i);
  return new NestedArray(m.items.map((item) => sliceOf(item, axis - 1, i)));
}

export function sliceOf(x: unknown, axis: number, i: number): unknown {
  if (x instanceof NestedArray) return getSlice(x, axis, i);
  if (isNDArray(x)) return x.slice(axis, i);
  throw new ShapeError(`Axis ${axis} out of range: reached a scalar`);
}

export const getMajorSliceView = getMajorSlice;
export const getSliceView = getSlice;

export function getRow(m: NestedArray, i: number): unknown {
  return getMajorSlice(m, i);
}

export function getColumn(m: NestedArray, j: number): unknown {
  return getSlice(m, 1, j);
}

export function getRows(m: NestedArray): readonly unknown[] {
  return m.items;
}

export function getColumns(m: NestedArray): NestedArray[] {
  const count = m.length === 0 ? 0 : dimensionCount(m, 1);
  const columns = new Array<NestedArray>(count);
  for (let j = 0; j < count; j += 1) {
    columns[j] = new NestedArray(m.items.map((row) => majorSlice(row, j)));
  }
  return columns;
}

export function subvector(
  m: NestedArray,
  start: number,
  length: number,
): NestedArray {
  const end = start + length;
  if (
    !Number.isInteger(start) ||
    !Number.isInteger(length) ||
    start < 0 ||
    length < 0 ||
    end > m.length
  ) {
    throw new IndexError(
      `Subvector [${start}, ${end}) out of range for length ${m.length}`,
    );
  }
  return new NestedArray(m.items.slice(start, end));
}

// ============================================================================
// Reordering
// ============================================================================

/**
 * Circular shift along `axis`: the item at position k moves to
 * (k + places) mod length.
 */
export function rotate(m: NestedArray, axis: number, places: number): NestedArray {
  if (!Number.isInteger(places)) {
    throw new IndexError(`Rotation must be a whole number of places, got ${places}`);
  }
  if (axis === 0) {
    const count = m.length;
    const shift = count > 0 ? ((places % count) + count) % count : 0;
    if (shift === 0) return m;
    const split = count - shift;
    return new NestedArray([...m.items.slice(split), ...m.items.slice(0, split)]);
  }
  return new NestedArray(
    m.items.map((item) => rotate(asNestedArray(item), axis - 1, places)),
  );
}

export function toIndexArray(indices: IndexList): number[] {
  const values =
    indices instanceof NestedArray || isNDArray(indices)
      ? elementSeq(indices)
      : indices;
  return Array.from(values, scalarValue);
}

/** Gathers items along an axis (axis 0 when omitted). Repeats are allowed. */
export function order(m: NestedArray, indices: IndexList): NestedArray;
export function order(m: NestedArray, axis: number, indices: IndexList): NestedArray;
export function order(
  m: NestedArray,
  axisOrIndices: number | IndexList,
  indices?: IndexList,
): NestedArray {
  if (typeof axisOrIndices !== "number") {
    return orderAlong(m, 0, toIndexArray(axisOrIndices));
  }
  if (indices === undefined) {
    throw new TypeError("order along an axis requires an index list");
  }
  return orderAlong(m, axisOrIndices, toIndexArray(indices));
}

function orderAlong(m: NestedArray, axis: number, indices: number[]): NestedArray {
  if (axis === 0) {
    return new NestedArray(indices.map((i) => getMajorSlice(m, i)));
  }
  return new NestedArray(
    m.items.map((item) => orderAlong(asNestedArray(item), axis - 1, indices)),
  );
}

/**
 * Gathers by one index list per axis: the first list picks top-level items,
 * the rest are applied inside each picked item.
 */
export function select(
  m: NestedArray,
  indexLists: readonly (readonly number[])[],
): NestedArray {
  if (indexLists.length === 0) {
    throw new ShapeError("select requires at least one index list");
  }
  const [first, ...rest] = indexLists;
  if (rest.length === 0) {
    if (dimensionality(m) !== 1) {
      throw new ShapeError("Array dimension does not match length of args");
    }
    return new NestedArray(first.map((i) => getMajorSlice(m, i)));
  }
  return new NestedArray(
    first.map((i) => select(asNestedArray(getMajorSlice(m, i)), rest)),
  );
}

// ============================================================================
// Joining
// ============================================================================

/**
 * Concatenates along axis 0 when both arrays have the same dimensionality,
 * and appends `b` as a new item when it has one dimension less.
 */
export function join(m: NestedArray, b: unknown): NestedArray {
  const other = coerceParam(b);
  const dims = dimensionality(m);
  const otherDims = dimensionality(other);
  const itemShape = shape(m).slice(1);
  if (dims === otherDims) {
    const otherItemShape = shape(other).slice(1);
    if (m.length > 0 && !shapesEqual(itemShape, otherItemShape)) {
      throw incompatibleJoin(m, other);
    }
    return new NestedArray([...m.items, ...majorSliceSeq(other)]);
  }
  if (dims === otherDims + 1) {
    if (m.length > 0 && !shapesEqual(itemShape, shape(other))) {
      throw incompatibleJoin(m, other);
    }
    return new NestedArray([...m.items, other]);
  }
  throw new ShapeError("Joining with array of incompatible size");
}

function incompatibleJoin(m: NestedArray, other: unknown): ShapeError {
  return new ShapeError(
    `Joining with array of incompatible size: ${formatShape(shape(m))} and ${formatShape(shape(other))}`,
  );
}

/** Concatenates along `axis`; every other dimension must agree. */
export function joinAlong(m: NestedArray, b: unknown, axis: number): NestedArray {
  if (axis === 0) return join(m, b);
  const other = coerceParam(b);
  if (
    dimensionality(other) !== dimensionality(m) ||
    dimensionCount(other, 0) !== m.length
  ) {
    throw incompatibleJoin(m, other);
  }
  const slices = majorSliceSeq(other);
  return new NestedArray(
    m.items.map((item, i) => joinAlong(asNestedArray(item), slices[i], axis - 1)),
  );
}
