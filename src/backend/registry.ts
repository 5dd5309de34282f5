import { debugLog } from "../core/debug";
import { NestedArray } from "./nested/array";
import { nestedBackend } from "./nested";
import { isNDArray, type Backend } from "./types";

const backends = new Map<string, Backend>();

registerBackend(nestedBackend);

export function getBackend(name: string): Backend | undefined {
  return backends.get(name);
}

export function registerBackend(backend: Backend): void {
  debugLog(
    "registry",
    `registered backend "${backend.name}" (min dimensionality ${backend.minDimensionality})`,
  );
  backends.set(backend.name, backend);
}

/**
 * The backend that owns `value`, found by its type tag. Scalars and values
 * of unregistered backends have none.
 */
export function backendFor(value: unknown): Backend | undefined {
  if (value instanceof NestedArray) return backends.get(value.backend);
  if (isNDArray(value)) return backends.get(value.backend);
  return undefined;
}

/** Registered backends able to represent arrays of `dims` dimensions. */
export function backendsSupporting(dims: number): Backend[] {
  return [...backends.values()].filter(
    (backend) => backend.minDimensionality <= dims,
  );
}
