/**
 * Seeded random arrays.
 *
 * Values come from a PCG32 stream (RXS-M-XS output) consumed in row-major
 * order, so equal seeds and shapes give equal arrays. Arrays are built through
 * computeArray.
 */

import type { NestedArray } from "./backend/nested/array";
import { computeArray } from "./backend/nested/coerce";

const PCG_MULTIPLIER = 747796405;
const PCG_INCREMENT = 2891336453;
const TWO_POW_32 = 4294967296;

export type SampleSize = number | readonly number[];

export class Pcg32 {
  private state: number;
  private spareGaussian: number | undefined;

  constructor(seed: number, sequence = 0) {
    const inc = ((sequence << 1) | 1) >>> 0;
    let state = inc;
    state = (state + (seed >>> 0)) >>> 0;
    state = (Math.imul(state, PCG_MULTIPLIER) + inc) >>> 0;
    this.state = state;
  }

  nextUint32(): number {
    const old = this.state;
    this.state = (Math.imul(old, PCG_MULTIPLIER) + PCG_INCREMENT) >>> 0;
    const word = Math.imul((old >>> ((old >>> 28) + 4)) ^ old, 277803737) >>> 0;
    return ((word >>> 22) ^ word) >>> 0;
  }

  /** Uniform in [0, 1). */
  nextDouble(): number {
    return this.nextUint32() / TWO_POW_32;
  }

  /** Uniform integer in [0, n). */
  nextInt(n: number): number {
    return Math.floor(this.nextDouble() * n);
  }

  /** Standard normal, by Box-Muller. Values are produced in pairs. */
  nextGaussian(): number {
    if (this.spareGaussian !== undefined) {
      const spare = this.spareGaussian;
      this.spareGaussian = undefined;
      return spare;
    }
    // (0, 1] so the log is finite
    const u1 = (this.nextUint32() + 1) / (TWO_POW_32 + 1);
    const u2 = this.nextDouble();
    const r = Math.sqrt(-2 * Math.log(u1));
    const theta = 2 * Math.PI * u2;
    this.spareGaussian = r * Math.sin(theta);
    return r * Math.cos(theta);
  }
}

function randomSeed(): number {
  return Math.floor(Math.random() * TWO_POW_32);
}

function toShape(size: SampleSize): number[] {
  const shape = typeof size === "number" ? [size] : [...size];
  for (const dim of shape) {
    if (!Number.isInteger(dim) || dim < 0) {
      throw new RangeError(`Invalid sample size: ${dim}`);
    }
  }
  return shape;
}

function sample(
  size: SampleSize,
  seed: number | undefined,
  draw: (rng: Pcg32) => number,
): NestedArray {
  const rng = new Pcg32(seed ?? randomSeed());
  return computeArray(toShape(size), () => draw(rng));
}

/** Uniform samples in [0, 1). */
export function sampleUniform(size: SampleSize, seed?: number): NestedArray {
  return sample(size, seed, (rng) => rng.nextDouble());
}

/** Standard normal samples. */
export function sampleNormal(size: SampleSize, seed?: number): NestedArray {
  return sample(size, seed, (rng) => rng.nextGaussian());
}

/** Integers drawn uniformly from [0, n). */
export function sampleRandInt(
  size: SampleSize,
  n: number,
  seed?: number,
): NestedArray {
  if (!Number.isInteger(n) || n <= 0) {
    throw new RangeError(`Upper bound must be a positive integer, got ${n}`);
  }
  return sample(size, seed, (rng) => rng.nextInt(n));
}

/** Successes in `n` trials with probability `p` each. */
export function sampleBinomial(
  size: SampleSize,
  p: number,
  n = 1,
  seed?: number,
): NestedArray {
  if (!(p >= 0 && p <= 1)) {
    throw new RangeError(`Probability must be in [0, 1], got ${p}`);
  }
  if (!Number.isInteger(n) || n < 0) {
    throw new RangeError(`Trial count must be a non-negative integer, got ${n}`);
  }
  return sample(size, seed, (rng) => {
    let successes = 0;
    for (let i = 0; i < n; i += 1) {
      if (rng.nextDouble() < p) successes += 1;
    }
    return successes;
  });
}
