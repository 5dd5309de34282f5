export * from "./backend/nested";
export {
  backendFor,
  backendsSupporting,
  getBackend,
  registerBackend,
} from "./backend/registry";
export {
  type Backend,
  type BackendName,
  type BackendOps,
  type FlatBufferKind,
  type IndexedScalarFn,
  isNDArray,
  type MathsOpName,
  type NDArray,
  type ReduceFn,
  type ScalarFn,
  type Shape,
} from "./backend/types";
export { isDebugEnabled, setDebugEnabled } from "./core/debug";
export {
  IndexError,
  ShapeError,
  UpdateError,
  ValidationError,
} from "./core/errors";
export {
  commonShape,
  coordinates,
  formatShape,
  isTrailingShape,
  shapesEqual,
  sizeOf,
} from "./core/shape";
export {
  Pcg32,
  type SampleSize,
  sampleBinomial,
  sampleNormal,
  sampleRandInt,
  sampleUniform,
} from "./random";
