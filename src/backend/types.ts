export type Shape = number[];

/** Runtime type tag of a backend ("nested", or a foreign backend's name). */
export type BackendName = string;

/** Element function applied to the scalar leaves of one or more operands. */
export type ScalarFn = (...values: number[]) => number;

/** Element function that also receives the coordinates of the leaf. */
export type IndexedScalarFn = (
  indices: readonly number[],
  ...values: number[]
) => number;

export type ReduceFn = (acc: number, value: number) => number;

export type FlatBufferKind = "numeric" | "object";

export type MathsOpName =
  | "abs"
  | "acos"
  | "asin"
  | "atan"
  | "cbrt"
  | "ceil"
  | "cos"
  | "cosh"
  | "exp"
  | "floor"
  | "log"
  | "log10"
  | "round"
  | "signum"
  | "sin"
  | "sinh"
  | "sqrt"
  | "tan"
  | "tanh"
  | "toDegrees"
  | "toRadians";

/**
 * Capability contract for array values of other backends.
 *
 * The nested backend never looks inside a foreign array: it only calls these
 * methods, which lets foreign arrays appear as leaves of a nested array or as
 * operands of its operations.
 */
export interface NDArray {
  /** Backend type tag used for dispatch. */
  readonly backend: BackendName;
  dimensionality(): number;
  shape(): Shape;
  dimensionCount(axis: number): number;
  /** Scalar leaves in row-major order. Must be restartable. */
  elementSeq(): Iterable<unknown>;
  majorSliceSeq(): readonly unknown[];
  majorSlice(i: number): unknown;
  slice(axis: number, i: number): unknown;
  /** The value of a 0-d array. */
  get0d(): unknown;
  getNd(indices: readonly number[]): unknown;
  /** Plain nested JS arrays holding the same values. */
  toNestedVectors(): unknown;
  isMutable(): boolean;
  /** In-place write. Only mutable arrays implement it. */
  setNd?(indices: readonly number[], value: unknown): void;
}

export interface BackendOps<A> {
  // Shape and dimensionality
  dimensionality(a: A): number;
  shape(a: A): Shape;
  dimensionCount(a: A, axis: number): number;
  elementCount(a: A): number;
  isScalar(a: A): boolean;
  isVector(a: A): boolean;

  // Construction
  constructMatrix(data: unknown): unknown;
  convertToNestedVectors(a: A): A;
  newVector(length: number): A;
  newMatrix(rows: number, columns: number): A;
  newNd(dims: readonly number[]): A | number;
  computeMatrix(
    shape: readonly number[],
    generator: (indices: readonly number[]) => unknown,
  ): unknown;
  validateShape(a: A): Shape;

  // Indexed access
  get1d(a: A, i: number): unknown;
  get2d(a: A, i: number, j: number): unknown;
  getNd(a: A, indices: readonly number[]): unknown;
  get0d(a: A): unknown;
  set1d(a: A, i: number, value: unknown): A;
  set2d(a: A, i: number, j: number, value: unknown): A;
  setNd(a: A, indices: readonly number[], value: unknown): A;
  isMutable(a: A): boolean;

  // Slices
  elementSeq(a: A): Iterable<unknown>;
  getMajorSliceSeq(a: A): readonly unknown[];
  getMajorSlice(a: A, i: number): unknown;
  getSlice(a: A, axis: number, i: number): unknown;
  getRow(a: A, i: number): unknown;
  getColumn(a: A, j: number): unknown;
  getRows(a: A): readonly unknown[];
  getColumns(a: A): A[];
  subvector(a: A, start: number, length: number): A;
  rotate(a: A, axis: number, places: number): A;
  order(a: A, axis: number, indices: Iterable<unknown>): A;
  join(a: A, b: unknown): A;
  joinAlong(a: A, b: unknown, axis: number): A;
  select(a: A, indexLists: readonly (readonly number[])[]): A;

  // Broadcasting
  broadcast(a: A, targetShape: readonly number[]): A;
  broadcastLike(a: A, b: unknown): A;
  broadcastCoerce(a: A, b: unknown): unknown;

  // Arithmetic
  matrixAdd(a: A, b: unknown): A;
  matrixSub(a: A, b: unknown): A;
  matrixMultiply(a: A, b: unknown): unknown;
  elementMultiply(a: A, b: unknown): A;
  vectorDot(a: A, b: unknown): unknown;
  innerProduct(a: A, b: unknown): unknown;
  vectorTransform(a: A, v: unknown): unknown;
  scale(a: A, factor: number): A;
  preScale(factor: number, a: A): A;
  length(a: A): number;
  lengthSquared(a: A): number;
  normalise(a: A): A;
  distance(a: A, b: unknown): number;
  square(a: A): A;
  swapRows(a: A, i: number, j: number): A;
  multiplyRow(a: A, i: number, factor: number): A;
  addRow(a: A, i: number, j: number, factor: number): A;
  maths(name: MathsOpName, a: A): A;
  mathsInPlace(name: MathsOpName, a: A): A;

  // Element-wise
  elementMap(a: A, f: ScalarFn, ...others: unknown[]): A;
  elementMapInPlace(a: A, f: ScalarFn, ...others: unknown[]): A;
  elementMapIndexed(a: A, f: IndexedScalarFn, ...others: unknown[]): A;
  elementMapIndexedInPlace(a: A, f: IndexedScalarFn, ...others: unknown[]): A;
  elementReduce(a: A, f: ReduceFn, init?: number): number;
  elementSum(a: A): number;

  // Export and comparison
  toDoubleArray(a: A): Float64Array;
  toObjectArray(a: A): unknown[];
  toFlatBuffer(a: A, kind: FlatBufferKind): Float64Array | unknown[];
  matrixEquals(a: A, b: unknown): boolean;
}

export interface Backend<A = unknown> {
  name: BackendName;
  /** Lowest dimensionality the backend can represent. */
  minDimensionality: number;
  ops: BackendOps<A>;
}

export function isNDArray(value: unknown): value is NDArray {
  return (
    typeof value === "object" &&
    value !== null &&
    "backend" in value &&
    typeof value.backend === "string" &&
    "dimensionality" in value &&
    typeof value.dimensionality === "function" &&
    "majorSliceSeq" in value &&
    typeof value.majorSliceSeq === "function"
  );
}
