import { broadcastShapes, computeStrides, normalizeAxis, sizeOf } from "../../core/shape";
import type { DType } from "../../ir/types";

export type Shape = number[];

/**
 * Strided tensor with a dtype tag. Every dtype is stored as float64, so int64
 * values are exact up to 2^53; the tag only travels with the values.
 */
export class Tensor {
  readonly dtype: DType;
  readonly shape: Shape;
  readonly strides: number[];
  readonly data: Float64Array;
  readonly offset: number;
  private readonly sizeValue: number;

  constructor(
    dtype: DType,
    shape: readonly number[],
    data: Float64Array,
    strides?: readonly number[],
    offset = 0,
    validateLength = true,
  ) {
    const expected = sizeOf(shape);
    if (validateLength && expected !== data.length) {
      throw new Error(`Tensor data length ${data.length} does not match shape [${shape.join(", ")}]`);
    }
    this.dtype = dtype;
    this.shape = shape.slice();
    this.strides = (strides ?? computeStrides(shape)).slice();
    this.data = data;
    this.offset = offset;
    this.sizeValue = expected;
  }

  get size(): number {
    return this.sizeValue;
  }

  get rank(): number {
    return this.shape.length;
  }

  isContiguous(): boolean {
    return isContiguous(this);
  }

  /** Return a contiguous tensor. If already contiguous, returns self. */
  contiguous(): Tensor {
    if (isContiguous(this)) {
      return this;
    }
    const out = new Float64Array(this.size);
    const shapeStrides = computeStrides(this.shape);
    for (let i = 0; i < this.size; i++) {
      out[i] = readAtLinear(this, i, shapeStrides);
    }
    return new Tensor(this.dtype, this.shape, out);
  }

  toArray(): number[] {
    const out = new Array<number>(this.sizeValue);
    const shapeStrides = computeStrides(this.shape);
    for (let i = 0; i < this.sizeValue; i += 1) {
      out[i] = readAtLinear(this, i, shapeStrides);
    }
    return out;
  }
}

export function tensorFromArray(
  values: readonly number[] | Float64Array,
  shape: readonly number[],
  dtype: DType = "float32",
): Tensor {
  return new Tensor(dtype, shape, Float64Array.from(values));
}

// ============================================================================
// Layout
// ============================================================================

function isContiguous(tensor: Tensor): boolean {
  const expected = computeStrides(tensor.shape);
  for (let i = 0; i < tensor.shape.length; i++) {
    if (tensor.shape[i] !== 1 && tensor.strides[i] !== expected[i]) {
      return false;
    }
  }
  return true;
}

function linearOffset(
  linear: number,
  shapeStrides: readonly number[],
  strides: readonly number[],
  baseOffset: number,
): number {
  let remainder = linear;
  let offset = baseOffset;
  for (let axis = 0; axis < shapeStrides.length; axis += 1) {
    const stride = shapeStrides[axis];
    const coord = stride === 0 ? 0 : Math.floor(remainder / stride);
    remainder -= coord * stride;
    offset += coord * strides[axis];
  }
  return offset;
}

function readAtLinear(tensor: Tensor, linear: number, shapeStrides: readonly number[]): number {
  return tensor.data[linearOffset(linear, shapeStrides, tensor.strides, tensor.offset)];
}

function broadcastTo(a: Tensor, targetShape: Shape): Tensor {
  if (a.shape.length === targetShape.length && a.shape.every((dim, index) => dim === targetShape[index])) {
    return a;
  }
  if (a.shape.length > targetShape.length) {
    throw new Error("broadcast target has fewer dimensions than input");
  }

  const pad = targetShape.length - a.shape.length;
  const outStrides = new Array<number>(targetShape.length);
  for (let axis = 0; axis < targetShape.length; axis += 1) {
    const inAxis = axis - pad;
    if (inAxis < 0) {
      outStrides[axis] = 0;
      continue;
    }
    const inDim = a.shape[inAxis];
    const outDim = targetShape[axis];
    if (inDim === outDim) {
      outStrides[axis] = a.strides[inAxis];
    } else if (inDim === 1) {
      outStrides[axis] = 0;
    } else {
      throw new Error("broadcast target shape is incompatible");
    }
  }
  return new Tensor(a.dtype, targetShape, a.data, outStrides, a.offset, false);
}

/**
 * Permute dimensions: `out.shape[i] = a.shape[perm[i]]`.
 * Returns a view sharing the same data.
 */
export function permute(a: Tensor, perm: readonly number[]): Tensor {
  const rank = a.shape.length;
  if (perm.length !== rank) {
    throw new Error(`permute: perm length ${perm.length} doesn't match tensor rank ${rank}`);
  }
  const seen = new Set<number>();
  for (const d of perm) {
    if (!Number.isInteger(d) || d < 0 || d >= rank) {
      throw new Error(`permute: dimension ${d} out of range for rank ${rank}`);
    }
    if (seen.has(d)) {
      throw new Error(`permute: duplicate dimension ${d}`);
    }
    seen.add(d);
  }
  const shape = perm.map((d) => a.shape[d]);
  const strides = perm.map((d) => a.strides[d]);
  return new Tensor(a.dtype, shape, a.data, strides, a.offset, false);
}

// ============================================================================
// Elementwise
// ============================================================================

export function map(a: Tensor, fn: (value: number) => number): Tensor {
  const out = new Float64Array(a.size);
  const shapeStrides = computeStrides(a.shape);
  for (let i = 0; i < a.size; i += 1) {
    out[i] = fn(readAtLinear(a, i, shapeStrides));
  }
  return new Tensor(a.dtype, a.shape, out);
}

/** Elementwise binary op with numpy-style broadcasting. */
export function zipWith(a: Tensor, b: Tensor, fn: (x: number, y: number) => number): Tensor {
  const outShape = broadcastShapes(a.shape, b.shape);
  const aBroadcast = broadcastTo(a, outShape);
  const bBroadcast = broadcastTo(b, outShape);
  const outSize = sizeOf(outShape);
  const out = new Float64Array(outSize);
  const shapeStrides = computeStrides(outShape);
  for (let i = 0; i < outSize; i += 1) {
    out[i] = fn(readAtLinear(aBroadcast, i, shapeStrides), readAtLinear(bBroadcast, i, shapeStrides));
  }
  return new Tensor(a.dtype, outShape, out);
}

export function relu(a: Tensor): Tensor {
  return map(a, (value) => (value > 0 ? value : 0));
}

export function leakyRelu(a: Tensor, alpha: number): Tensor {
  return map(a, (value) => (value >= 0 ? value : alpha * value));
}

export function sigmoid(a: Tensor): Tensor {
  return map(a, (value) => 1 / (1 + Math.exp(-value)));
}

export function add(a: Tensor, b: Tensor): Tensor {
  return zipWith(a, b, (x, y) => x + y);
}

export function sub(a: Tensor, b: Tensor): Tensor {
  return zipWith(a, b, (x, y) => x - y);
}

export function mul(a: Tensor, b: Tensor): Tensor {
  return zipWith(a, b, (x, y) => x * y);
}

export function div(a: Tensor, b: Tensor): Tensor {
  return zipWith(a, b, (x, y) => x / y);
}

export function maximum(a: Tensor, b: Tensor): Tensor {
  return zipWith(a, b, Math.max);
}

export function minimum(a: Tensor, b: Tensor): Tensor {
  return zipWith(a, b, Math.min);
}

// ============================================================================
// Reductions
// ============================================================================

export type ReduceOptions = {
  /** Axes to reduce; undefined reduces all of them. */
  axes?: readonly number[];
  keepdims?: boolean;
};

export function sum(a: Tensor, options: ReduceOptions = {}): Tensor {
  const rank = a.shape.length;
  const reduceSet = new Set(
    options.axes === undefined ? a.shape.map((_, i) => i) : options.axes.map((axis) => normalizeAxis(axis, rank)),
  );
  const keepdims = options.keepdims ?? true;
  const keptShape = a.shape.map((dim, index) => (reduceSet.has(index) ? 1 : dim));
  const outShape = keepdims ? keptShape : a.shape.filter((_, index) => !reduceSet.has(index));

  const out = new Float64Array(sizeOf(outShape));
  const inShapeStrides = computeStrides(a.shape);
  const keptStrides = computeStrides(keptShape);
  for (let linear = 0; linear < a.size; linear += 1) {
    let remainder = linear;
    let outOffset = 0;
    for (let dim = 0; dim < rank; dim += 1) {
      const stride = inShapeStrides[dim];
      const coord = stride === 0 ? 0 : Math.floor(remainder / stride);
      remainder -= coord * stride;
      if (!reduceSet.has(dim)) {
        outOffset += coord * keptStrides[dim];
      }
    }
    out[outOffset] += readAtLinear(a, linear, inShapeStrides);
  }
  return new Tensor(a.dtype, outShape, out);
}

export function mean(a: Tensor, options: ReduceOptions = {}): Tensor {
  const total = sum(a, options);
  const count = total.size === 0 ? 0 : a.size / total.size;
  return map(total, (value) => value / count);
}

// ============================================================================
// Indexing
// ============================================================================

export function concat(tensors: readonly Tensor[], axis: number): Tensor {
  if (tensors.length === 0) {
    throw new Error("concat requires at least one tensor");
  }
  const [first] = tensors;
  const rank = first.shape.length;
  const dim = normalizeAxis(axis, rank);
  for (const t of tensors) {
    const compatible =
      t.shape.length === rank && t.shape.every((size, i) => i === dim || size === first.shape[i]);
    if (!compatible) {
      throw new Error(`concat: shape [${t.shape.join(", ")}] is incompatible with [${first.shape.join(", ")}]`);
    }
  }

  const outShape = first.shape.slice();
  outShape[dim] = tensors.reduce((acc, t) => acc + t.shape[dim], 0);
  const outer = sizeOf(first.shape.slice(0, dim));
  const inner = sizeOf(first.shape.slice(dim + 1));
  const out = new Float64Array(sizeOf(outShape));
  const parts = tensors.map((t) => t.contiguous());

  let cursor = 0;
  for (let o = 0; o < outer; o += 1) {
    for (const part of parts) {
      const chunk = part.shape[dim] * inner;
      out.set(part.data.subarray(part.offset + o * chunk, part.offset + (o + 1) * chunk), cursor);
      cursor += chunk;
    }
  }
  return new Tensor(first.dtype, outShape, out);
}

function readIndexValue(value: number, limit: number): number {
  if (!Number.isFinite(value) || Math.trunc(value) !== value) {
    throw new Error("index values must be integers");
  }
  const index = value < 0 ? value + limit : value;
  if (index < 0 || index >= limit) {
    throw new Error(`index ${value} out of range for size ${limit}`);
  }
  return index;
}

/** Take slices of `a` along axis 0: `out.shape = indices.shape ++ a.shape[1:]`. */
export function take(a: Tensor, indices: Tensor): Tensor {
  if (a.shape.length === 0) {
    throw new Error("take requires a tensor of rank >= 1");
  }
  const source = a.contiguous();
  const rowShape = a.shape.slice(1);
  const row = sizeOf(rowShape);
  const picks = indices.toArray();
  const out = new Float64Array(picks.length * row);
  picks.forEach((value, i) => {
    const index = readIndexValue(value, a.shape[0]);
    out.set(source.data.subarray(source.offset + index * row, source.offset + (index + 1) * row), i * row);
  });
  return new Tensor(a.dtype, [...indices.shape, ...rowShape], out);
}

/** The dimension vector of `a` as an int64 tensor. */
export function shapeOf(a: Tensor): Tensor {
  return new Tensor("int64", [a.shape.length], Float64Array.from(a.shape));
}
