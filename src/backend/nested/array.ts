import { isNDArray } from "../types";

/**
 * Immutable N-dimensional array stored as nested ordered sequences.
 *
 * A 1-D array holds scalars; a k-D array holds (k-1)-D arrays of identical
 * shape. Items may also be arrays of other backends (see `NDArray`), which are
 * treated as opaque sub-arrays.
 *
 * The item list is frozen. Updates copy one level and share the rest.
 */
export class NestedArray implements Iterable<unknown> {
  readonly backend = "nested";
  readonly items: readonly unknown[];

  /** Takes ownership of `items`; callers must not keep a mutable reference. */
  constructor(items: unknown[]) {
    this.items = Object.freeze(items);
  }

  get length(): number {
    return this.items.length;
  }

  /** Copy with item `i` replaced; every other item is shared. */
  with(i: number, value: unknown): NestedArray {
    const items = this.items.slice();
    items[i] = value;
    return new NestedArray(items);
  }

  [Symbol.iterator](): Iterator<unknown> {
    return this.items[Symbol.iterator]();
  }

  /** Plain nested JS arrays, descending into foreign sub-arrays too. */
  toArray(): unknown[] {
    return this.items.map(toPlain);
  }
}

function toPlain(value: unknown): unknown {
  if (value instanceof NestedArray) return value.toArray();
  if (isNDArray(value)) return value.toNestedVectors();
  return value;
}
