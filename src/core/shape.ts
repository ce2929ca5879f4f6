/**
 * Canonical pure shape utility functions.
 *
 * No imports; usable from the IR, the passes and the backend.
 */

/** A possibly partial shape: `null` marks a dimension whose size is unknown. */
export type PartialShape = readonly (number | null)[];

export function sizeOf(shape: readonly number[]): number {
  return shape.reduce((acc, dim) => acc * dim, 1);
}

export function broadcastShapes(a: readonly number[], b: readonly number[]): number[] {
  const outRank = Math.max(a.length, b.length);
  const out = new Array<number>(outRank);
  for (let i = 0; i < outRank; i += 1) {
    const aDim = a[a.length - 1 - i] ?? 1;
    const bDim = b[b.length - 1 - i] ?? 1;
    if (aDim !== bDim && aDim !== 1 && bDim !== 1) {
      throw new Error(`Cannot broadcast shapes [${a}] and [${b}]`);
    }
    out[outRank - 1 - i] = Math.max(aDim, bDim);
  }
  return out;
}

/**
 * True when every dimension is a known non-negative integer.
 */
export function isStaticShape(shape: PartialShape | undefined): shape is readonly number[] {
  if (!shape) return false;
  return shape.every((dim) => dim !== null && Number.isInteger(dim) && dim >= 0);
}

/**
 * Left-pad a shape with size-1 dimensions up to `rank` (numpy broadcasting rule).
 */
export function padShapeToRank(shape: readonly number[], rank: number): number[] {
  if (shape.length > rank) {
    throw new Error(`Cannot pad shape [${shape}] down to rank ${rank}`);
  }
  const padded = new Array<number>(rank - shape.length).fill(1);
  return padded.concat(shape);
}

/**
 * Row-major strides in elements; the last dimension is contiguous.
 */
export function computeStrides(shape: readonly number[]): number[] {
  const strides = new Array<number>(shape.length);
  let stride = 1;
  for (let i = shape.length - 1; i >= 0; i -= 1) {
    strides[i] = stride;
    stride *= shape[i];
  }
  return strides;
}

export function normalizeAxis(axis: number, rank: number): number {
  const normalized = axis < 0 ? rank + axis : axis;
  if (!Number.isInteger(normalized) || normalized < 0 || normalized >= rank) {
    throw new Error(`axis ${axis} out of range for rank ${rank}`);
  }
  return normalized;
}
