import { debugLog } from "../../core/debug";
import { IndexError, UpdateError } from "../../core/errors";
import { isNDArray } from "../types";
import { NestedArray } from "./array";
import { coerce } from "./coerce";
import { checkIndex, unwrap0d } from "./dispatch";

// ============================================================================
// Reads
// ============================================================================

export function get1d(m: NestedArray, i: number): unknown {
  checkIndex(i, m.length, 0);
  return unwrap0d(m.items[i]);
}

export function get2d(m: NestedArray, i: number, j: number): unknown {
  return unwrap0d(getNd(m, [i, j]));
}

/**
 * Descends one index per level. Returns the scalar or sub-array found; with
 * no indices, `m` itself.
 */
export function getNd(m: NestedArray, indices: readonly number[]): unknown {
  return getIn(m, indices, 0);
}

function getIn(x: unknown, indices: readonly number[], level: number): unknown {
  if (level === indices.length) return x;
  if (x instanceof NestedArray) {
    const i = indices[level];
    checkIndex(i, x.length, level);
    return getIn(x.items[i], indices, level + 1);
  }
  if (isNDArray(x)) return x.getNd(indices.slice(level));
  throw new IndexError(
    `Too many indices: ${indices.length} given, reached a scalar at axis ${level}`,
  );
}

/** Reads `indices` from any operand; scalars answer every coordinate. */
export function valueAt(
  x: unknown,
  indices: readonly number[],
  level = 0,
): unknown {
  if (level === indices.length) return x;
  if (x instanceof NestedArray) {
    const i = indices[level];
    checkIndex(i, x.length, level);
    return valueAt(x.items[i], indices, level + 1);
  }
  if (isNDArray(x)) return x.getNd(indices.slice(level));
  return x;
}

// ============================================================================
// Writes
// ============================================================================

export function set1d(m: NestedArray, i: number, value: unknown): NestedArray {
  checkIndex(i, m.length, 0);
  return m.with(i, value);
}

export function set2d(
  m: NestedArray,
  i: number,
  j: number,
  value: unknown,
): NestedArray {
  return setNd(m, [i, j], value);
}

/**
 * Returns a copy of `m` with the element at `indices` replaced. Only the
 * levels on the path are copied.
 *
 * A mutable foreign sub-array on the path is written in place and kept by
 * the result, so the write is visible to every holder of that sub-array.
 */
export function setNd(
  m: NestedArray,
  indices: readonly number[],
  value: unknown,
): NestedArray {
  if (indices.length === 0) {
    throw new UpdateError(
      "Trying to set on a nested array with insufficient indices",
    );
  }
  return setIn(m, indices, 0, value);
}

function setIn(
  m: NestedArray,
  indices: readonly number[],
  level: number,
  value: unknown,
): NestedArray {
  const i = indices[level];
  checkIndex(i, m.length, level);
  if (level === indices.length - 1) return m.with(i, value);
  return m.with(i, setChild(m.items[i], indices, level + 1, value));
}

function setChild(
  child: unknown,
  indices: readonly number[],
  level: number,
  value: unknown,
): unknown {
  if (child instanceof NestedArray) return setIn(child, indices, level, value);
  if (isNDArray(child)) {
    if (child.isMutable() && child.setNd) {
      debugLog("set", `writing through to mutable ${child.backend} sub-array`);
      child.setNd(indices.slice(level), value);
      return child;
    }
    const converted = coerce(child);
    if (converted instanceof NestedArray) {
      return setIn(converted, indices, level, value);
    }
  }
  throw new IndexError(
    `Too many indices: ${indices.length} given, reached a scalar at axis ${level}`,
  );
}

/** Nested arrays never mutate, even when some leaves do. */
export function isMutable(_m: NestedArray): boolean {
  return false;
}
