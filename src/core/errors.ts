/** Operand shapes cannot be combined (join, broadcast, add, dot). */
export class ShapeError extends Error {
  name = "ShapeError";
}

/** A coordinate lies outside the array. */
export class IndexError extends Error {
  name = "IndexError";
}

/** A multi-level update ran out of indices before reaching a leaf. */
export class UpdateError extends Error {
  name = "UpdateError";
}

/** Explicit validation found a non-rectangular structure. */
export class ValidationError extends Error {
  name = "ValidationError";
}
