import { ShapeError } from "../../core/errors";
import {
  commonShape,
  formatShape,
  isTrailingShape,
  shapesEqual,
} from "../../core/shape";
import { NestedArray } from "./array";
import { coerce, coerceParam } from "./coerce";
import { shape } from "./dims";

/**
 * Broadcasts any operand to `targetShape`. The operand's shape must equal the
 * trailing dimensions of the target; leading dimensions are added by
 * replicating it, innermost first. Replicas share one object.
 */
export function broadcastValue(x: unknown, targetShape: readonly number[]): unknown {
  const source = shape(x);
  if (targetShape.length < source.length) {
    throw new ShapeError("Can't broadcast to a lower dimensional shape");
  }
  if (!isTrailingShape(source, targetShape)) {
    throw new ShapeError(
      `Incompatible shapes, cannot broadcast shape ${formatShape(source)} to ${formatShape(targetShape)}`,
    );
  }
  let out = x;
  for (let i = targetShape.length - source.length - 1; i >= 0; i -= 1) {
    out = new NestedArray(new Array<unknown>(targetShape[i]).fill(out));
  }
  return out;
}

export function broadcast(m: NestedArray, targetShape: readonly number[]): NestedArray {
  if (shapesEqual(shape(m), targetShape)) return m;
  const out = broadcastValue(m, targetShape);
  if (out instanceof NestedArray) return out;
  // only reachable when targetShape is empty, which broadcastValue rejects
  throw new ShapeError("Can't broadcast to a lower dimensional shape");
}

/** Broadcasts `m` to the shape of `b`. */
export function broadcastLike(m: NestedArray, b: unknown): NestedArray {
  return broadcast(m, shape(b));
}

/** Coerces `b` and broadcasts it to the shape of `m`. */
export function broadcastCoerce(m: NestedArray, b: unknown): unknown {
  return broadcastValue(coerce(b), shape(m));
}

/** Brings every operand to their common shape. */
export function broadcastAll(operands: readonly unknown[]): unknown[] {
  const shapes = operands.map((x) => shape(x));
  const target = commonShape(shapes);
  if (target === undefined) {
    throw new ShapeError(
      `Incompatible shapes, cannot broadcast together: ${shapes.map(formatShape).join(", ")}`,
    );
  }
  return operands.map((x, i) =>
    shapesEqual(shapes[i], target) ? x : broadcastValue(x, target),
  );
}

/** Coerces both operands and brings them to their common shape. */
export function broadcastCompatible(a: unknown, b: unknown): [unknown, unknown] {
  const [left, right] = broadcastAll([coerceParam(a), coerceParam(b)]);
  return [left, right];
}
