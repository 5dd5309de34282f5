/**
 * Pure shape helpers. No imports, so any layer can use them.
 */

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function shapesEqual(a: readonly number[], b: readonly number[]): boolean {
  if (a.length !== b.length) return false;
  for (let i = 0; i < a.length; i += 1) {
    if (a[i] !== b[i]) return false;
  }
  return true;
}

/** True if `suffix` matches the trailing dimensions of `shape`. */
export function isTrailingShape(
  suffix: readonly number[],
  shape: readonly number[],
): boolean {
  const offset = shape.length - suffix.length;
  if (offset < 0) return false;
  for (let i = 0; i < suffix.length; i += 1) {
    if (suffix[i] !== shape[offset + i]) return false;
  }
  return true;
}

/**
 * The shape every input can be broadcast to: the longest one, provided each
 * other shape matches its trailing dimensions. No size-1 stretching.
 */
export function commonShape(
  shapes: readonly (readonly number[])[],
): number[] | undefined {
  if (shapes.length === 0) return undefined;
  let longest = shapes[0];
  for (const shape of shapes) {
    if (shape.length > longest.length) longest = shape;
  }
  for (const shape of shapes) {
    if (!isTrailingShape(shape, longest)) return undefined;
  }
  return longest.slice();
}

export function formatShape(shape: readonly number[]): string {
  return `[${shape.join(", ")}]`;
}

/** Every coordinate of `shape`, in row-major order. */
export function* coordinates(shape: readonly number[]): Generator<number[]> {
  if (shape.some((dim) => dim === 0)) return;
  const index = new Array<number>(shape.length).fill(0);
  while (true) {
    yield index.slice();
    let axis = shape.length - 1;
    while (axis >= 0) {
      index[axis] += 1;
      if (index[axis] < shape[axis]) break;
      index[axis] = 0;
      axis -= 1;
    }
    if (axis < 0) return;
  }
}
