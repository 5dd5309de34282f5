import type { Backend } from "../types";
import {
  get1d,
  get2d,
  getNd,
  isMutable,
  set1d,
  set2d,
  setNd,
} from "./access";
import type { NestedArray } from "./array";
import { broadcast, broadcastCoerce, broadcastLike } from "./broadcast";
import {
  computeMatrix,
  constructMatrix,
  convertToNestedVectors,
  newMatrix,
  newNd,
  newVector,
  validateShape,
} from "./coerce";
import {
  dimensionCount,
  dimensionality,
  elementCount,
  isScalar,
  isVector,
  shape,
} from "./dims";
import { elementSeq, get0d, majorSliceSeq } from "./dispatch";
import {
  elementMap,
  elementMapIndexed,
  elementMapIndexedInPlace,
  elementMapInPlace,
  elementReduce,
  elementSum,
} from "./elementwise";
import { matrixEquals } from "./equality";
import { toDoubleArray, toFlatBuffer, toObjectArray } from "./export";
import {
  addRow,
  distance,
  elementMultiply,
  innerProduct,
  length,
  lengthSquared,
  matrixAdd,
  matrixMultiply,
  matrixSub,
  multiplyRow,
  normalise,
  preScale,
  scale,
  square,
  swapRows,
  vectorDot,
  vectorTransform,
} from "./linalg";
import { maths, mathsInPlace } from "./maths";
import {
  getColumn,
  getColumns,
  getMajorSlice,
  getRow,
  getRows,
  getSlice,
  join,
  joinAlong,
  order,
  rotate,
  select,
  subvector,
} from "./slices";

export const nestedBackend: Backend<NestedArray> = {
  name: "nested",
  minDimensionality: 1,
  ops: {
    dimensionality,
    shape,
    dimensionCount,
    elementCount,
    isScalar,
    isVector,
    constructMatrix,
    convertToNestedVectors,
    newVector,
    newMatrix,
    newNd,
    computeMatrix,
    validateShape,
    get1d,
    get2d,
    getNd,
    get0d,
    set1d,
    set2d,
    setNd,
    isMutable,
    elementSeq,
    getMajorSliceSeq: majorSliceSeq,
    getMajorSlice,
    getSlice,
    getRow,
    getColumn,
    getRows,
    getColumns,
    subvector,
    rotate,
    order,
    join,
    joinAlong,
    select,
    broadcast,
    broadcastLike,
    broadcastCoerce,
    matrixAdd,
    matrixSub,
    matrixMultiply,
    elementMultiply,
    vectorDot,
    innerProduct,
    vectorTransform,
    scale,
    preScale,
    length,
    lengthSquared,
    normalise,
    distance,
    square,
    swapRows,
    multiplyRow,
    addRow,
    maths,
    mathsInPlace,
    elementMap,
    elementMapInPlace,
    elementMapIndexed,
    elementMapIndexedInPlace,
    elementReduce,
    elementSum,
    toDoubleArray,
    toObjectArray,
    toFlatBuffer,
    matrixEquals,
  },
};

export * from "./access";
export * from "./array";
export * from "./broadcast";
export * from "./coerce";
export * from "./dims";
export * from "./dispatch";
export * from "./elementwise";
export * from "./equality";
export * from "./export";
export * from "./linalg";
export * from "./maths";
export * from "./slices";
