import { describe, expect, it } from "vitest";

import {
  Tensor,
  add,
  concat,
  div,
  leakyRelu,
  maximum,
  mean,
  minimum,
  mul,
  permute,
  relu,
  shapeOf,
  sigmoid,
  sub,
  sum,
  take,
  tensorFromArray,
} from "../src/backend/cpu/numeric";

const matrix = () => tensorFromArray([1, 2, 3, 4, 5, 6], [2, 3]);

describe("Tensor", () => {
  it("checks the data length against the shape", () => {
    expect(() => new Tensor("float32", [2, 2], new Float64Array(3))).toThrow(
      "Tensor data length 3 does not match shape [2, 2]",
    );
  });

  it("treats a rank-0 tensor as one element", () => {
    const scalar = tensorFromArray([7], [], "int64");
    expect(scalar.size).toBe(1);
    expect(scalar.rank).toBe(0);
    expect(scalar.toArray()).toEqual([7]);
  });
});

describe("permute", () => {
  it("returns a strided view", () => {
    const view = permute(matrix(), [1, 0]);

    expect(view.shape).toEqual([3, 2]);
    expect(view.strides).toEqual([1, 3]);
    expect(view.isContiguous()).toBe(false);
    expect(view.toArray()).toEqual([1, 4, 2, 5, 3, 6]);
    expect(Array.from(view.contiguous().data)).toEqual([1, 4, 2, 5, 3, 6]);
  });

  it("rejects a perm of the wrong rank", () => {
    expect(() => permute(matrix(), [0])).toThrow("permute: perm length 1 doesn't match tensor rank 2");
  });
});

describe("elementwise", () => {
  it("broadcasts trailing and unit dimensions", () => {
    expect(add(matrix(), tensorFromArray([10, 20, 30], [3])).toArray()).toEqual([11, 22, 33, 14, 25, 36]);
    expect(sub(matrix(), tensorFromArray([1, 2], [2, 1])).toArray()).toEqual([0, 1, 2, 2, 3, 4]);
    expect(mul(matrix(), tensorFromArray([2], [])).toArray()).toEqual([2, 4, 6, 8, 10, 12]);
    expect(div(tensorFromArray([3, 9], [2]), tensorFromArray([3], [1])).toArray()).toEqual([1, 3]);
  });

  it("takes elementwise extremes", () => {
    const x = tensorFromArray([-1, 2], [2]);
    expect(maximum(x, tensorFromArray([0], [])).toArray()).toEqual([0, 2]);
    expect(minimum(x, tensorFromArray([0], [])).toArray()).toEqual([-1, 0]);
  });

  it("applies activations", () => {
    expect(relu(tensorFromArray([-1, 0, 2], [3])).toArray()).toEqual([0, 0, 2]);
    const leaky = leakyRelu(tensorFromArray([-1, 2], [2]), 0.1).toArray();
    expect(leaky[0]).toBeCloseTo(-0.1, 6);
    expect(leaky[1]).toBe(2);
    expect(sigmoid(tensorFromArray([0], [1])).toArray()).toEqual([0.5]);
  });

  it("rejects shapes that do not broadcast", () => {
    expect(() => add(matrix(), tensorFromArray([1, 2], [2]))).toThrow("Cannot broadcast shapes [2,3] and [2]");
  });
});

describe("reductions", () => {
  it("reduces the given axes", () => {
    const kept = sum(matrix(), { axes: [1] });
    expect(kept.shape).toEqual([2, 1]);
    expect(kept.toArray()).toEqual([6, 15]);

    const dropped = sum(matrix(), { axes: [-1], keepdims: false });
    expect(dropped.shape).toEqual([2]);
    expect(dropped.toArray()).toEqual([6, 15]);
  });

  it("reduces every axis when none are given", () => {
    const total = sum(matrix());
    expect(total.shape).toEqual([1, 1]);
    expect(total.toArray()).toEqual([21]);
  });

  it("averages and reads through views", () => {
    const averaged = mean(matrix(), { axes: [0] });
    expect(averaged.shape).toEqual([1, 3]);
    expect(averaged.toArray()).toEqual([2.5, 3.5, 4.5]);

    const columns = sum(permute(matrix(), [1, 0]), { axes: [1], keepdims: false });
    expect(columns.toArray()).toEqual([5, 7, 9]);
  });
});

describe("indexing", () => {
  it("concatenates along an axis", () => {
    const a = tensorFromArray([1, 2, 3, 4], [2, 2]);
    const b = tensorFromArray([5, 6], [2, 1]);

    const joined = concat([a, b], 1);
    expect(joined.shape).toEqual([2, 3]);
    expect(joined.toArray()).toEqual([1, 2, 5, 3, 4, 6]);
    expect(concat([a, b], -1).toArray()).toEqual([1, 2, 5, 3, 4, 6]);
    expect(() => concat([a, b], 0)).toThrow("concat: shape [2, 1] is incompatible with [2, 2]");
  });

  it("takes rows, counting negative indices from the end", () => {
    const rows = tensorFromArray([1, 2, 3, 4, 5, 6], [3, 2]);

    const picked = take(rows, tensorFromArray([2, -3], [2], "int64"));
    expect(picked.shape).toEqual([2, 2]);
    expect(picked.toArray()).toEqual([5, 6, 1, 2]);
    expect(() => take(rows, tensorFromArray([3], [1], "int64"))).toThrow("index 3 out of range for size 3");
  });

  it("reports the shape as int64", () => {
    const shape = shapeOf(permute(matrix(), [1, 0]));
    expect(shape.dtype).toBe("int64");
    expect(shape.shape).toEqual([2]);
    expect(shape.toArray()).toEqual([3, 2]);
  });
});
