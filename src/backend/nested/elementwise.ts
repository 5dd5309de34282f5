import { debugLog } from "../../core/debug";
import { coordinates } from "../../core/shape";
import { isNDArray, type IndexedScalarFn, type ReduceFn, type ScalarFn } from "../types";
import { valueAt } from "./access";
import { NestedArray } from "./array";
import { broadcastAll, broadcastValue } from "./broadcast";
import { coerceParam, computeMatrix } from "./coerce";
import { dimensionality, shape } from "./dims";
import { elementSeq, majorSliceSeq, scalarValue } from "./dispatch";

type LeafFn = (indices: readonly number[], values: number[]) => number;

// ============================================================================
// Generic traversal
// ============================================================================

/**
 * Applies `f` to the scalar leaves of operands of identical shape. Operands of
 * any backend are read through their element and major-slice sequences.
 */
export function mapmatrix(f: ScalarFn, m: unknown, ...others: unknown[]): unknown {
  return mapLeaves([m, ...others], [], (_indices, values) => f(...values));
}

function mapLeaves(
  operands: readonly unknown[],
  prefix: readonly number[],
  leaf: LeafFn,
): unknown {
  const dims = dimensionality(operands[0]);
  if (dims === 0) return leaf(prefix, operands.map(scalarValue));
  return mapArray(operands, prefix, leaf);
}

function mapArray(
  operands: readonly unknown[],
  prefix: readonly number[],
  leaf: LeafFn,
): NestedArray {
  if (dimensionality(operands[0]) === 1) {
    const seqs = operands.map((x) => Array.from(elementSeq(x)));
    return new NestedArray(
      seqs[0].map((_, i) =>
        leaf(
          [...prefix, i],
          seqs.map((seq) => scalarValue(seq[i])),
        ),
      ),
    );
  }
  const slices = operands.map(majorSliceSeq);
  return new NestedArray(
    slices[0].map((_, i) =>
      mapLeaves(
        slices.map((seq) => seq[i]),
        [...prefix, i],
        leaf,
      ),
    ),
  );
}

function align(m: NestedArray, others: readonly unknown[]): unknown[] {
  if (others.length === 0) return [m];
  return broadcastAll([m, ...others.map(coerceParam)]);
}

// ============================================================================
// Element maps
// ============================================================================

export function elementMap(
  m: NestedArray,
  f: ScalarFn,
  ...others: unknown[]
): NestedArray {
  return mapArray(align(m, others), [], (_indices, values) => f(...values));
}

/** Like elementMap, but `f` receives the coordinates of each leaf first. */
export function elementMapIndexed(
  m: NestedArray,
  f: IndexedScalarFn,
  ...others: unknown[]
): NestedArray {
  return mapArray(align(m, others), [], (indices, values) =>
    f(indices, ...values),
  );
}

/**
 * Maps `f` over the leaves of `m`, writing into mutable foreign sub-arrays in
 * place. The nested levels around them are rebuilt; the shape of `m` is kept,
 * so `others` are broadcast to it.
 */
export function elementMapInPlace(
  m: NestedArray,
  f: ScalarFn,
  ...others: unknown[]
): NestedArray {
  return rebuild(m, alignTo(m, others), [], (_indices, values) => f(...values));
}

export function elementMapIndexedInPlace(
  m: NestedArray,
  f: IndexedScalarFn,
  ...others: unknown[]
): NestedArray {
  return rebuild(m, alignTo(m, others), [], (indices, values) =>
    f(indices, ...values),
  );
}

function alignTo(m: NestedArray, others: readonly unknown[]): unknown[] {
  const target = shape(m);
  return others.map((x) => broadcastValue(coerceParam(x), target));
}

function rebuild(
  m: NestedArray,
  others: readonly unknown[],
  prefix: readonly number[],
  leaf: LeafFn,
): NestedArray {
  return new NestedArray(
    m.items.map((item, i) => rebuildItem(item, others, [...prefix, i], leaf)),
  );
}

function rebuildItem(
  item: unknown,
  others: readonly unknown[],
  path: readonly number[],
  leaf: LeafFn,
): unknown {
  if (item instanceof NestedArray) return rebuild(item, others, path, leaf);
  const valuesAt = (indices: readonly number[], own: unknown): number[] => [
    scalarValue(own),
    ...others.map((x) => scalarValue(valueAt(x, indices))),
  ];
  if (isNDArray(item) && item.dimensionality() > 0) {
    if (item.isMutable() && item.setNd) {
      debugLog("map", `updating mutable ${item.backend} sub-array in place`);
      for (const local of coordinates(item.shape())) {
        const indices = [...path, ...local];
        item.setNd(local, leaf(indices, valuesAt(indices, item.getNd(local))));
      }
      return item;
    }
    const source = item;
    return computeMatrix(source.shape(), (local) => {
      const indices = [...path, ...local];
      return leaf(indices, valuesAt(indices, source.getNd(local)));
    });
  }
  return leaf(path, valuesAt(path, item));
}

// ============================================================================
// Reductions
// ============================================================================

/**
 * Left fold over the leaves in row-major order. Without `init` the first leaf
 * seeds the fold, and an empty array throws rather than calling `f` with no
 * arguments, since `ReduceFn` always takes two.
 */
export function elementReduce(m: unknown, f: ReduceFn, init?: number): number {
  let started = init !== undefined;
  let acc = init ?? 0;
  for (const x of elementSeq(m)) {
    const value = scalarValue(x);
    if (started) {
      acc = f(acc, value);
    } else {
      acc = value;
      started = true;
    }
  }
  if (!started) {
    throw new TypeError("Reduce of empty array with no initial value");
  }
  return acc;
}

export function elementSum(m: unknown): number {
  return elementReduce(m, (acc, value) => acc + value, 0);
}
