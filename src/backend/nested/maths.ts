import type { MathsOpName } from "../types";
import type { NestedArray } from "./array";
import { elementMap, elementMapInPlace } from "./elementwise";

/** Rounds to the nearest integer, ties to even. */
export function roundHalfEven(x: number): number {
  if (Math.abs(x % 1) === 0.5) return 2 * Math.round(x / 2);
  return Math.round(x);
}

export const MATHS_OPS: Record<MathsOpName, (x: number) => number> = {
  abs: Math.abs,
  acos: Math.acos,
  asin: Math.asin,
  atan: Math.atan,
  cbrt: Math.cbrt,
  ceil: Math.ceil,
  cos: Math.cos,
  cosh: Math.cosh,
  exp: Math.exp,
  floor: Math.floor,
  log: Math.log,
  log10: Math.log10,
  round: roundHalfEven,
  signum: Math.sign,
  sin: Math.sin,
  sinh: Math.sinh,
  sqrt: Math.sqrt,
  tan: Math.tan,
  tanh: Math.tanh,
  toDegrees: (x) => (x * 180) / Math.PI,
  toRadians: (x) => (x * Math.PI) / 180,
};

export function isMathsOp(name: string): name is MathsOpName {
  return Object.hasOwn(MATHS_OPS, name);
}

export function maths(name: MathsOpName, m: NestedArray): NestedArray {
  const fn = MATHS_OPS[name];
  return elementMap(m, (x) => fn(x));
}

/** Like maths, but rewrites mutable foreign leaves in place. */
export function mathsInPlace(name: MathsOpName, m: NestedArray): NestedArray {
  const fn = MATHS_OPS[name];
  return elementMapInPlace(m, (x) => fn(x));
}
