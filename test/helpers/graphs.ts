import { expect } from "vitest";

import { type Feeds, executeGraph } from "../../src/backend/cpu/executor";
import { Tensor } from "../../src/backend/cpu/numeric";
import { isStaticShape, sizeOf } from "../../src/core/shape";
import type { Graph } from "../../src/ir/graph";

/** Deterministic values in [-1, 1) from a small LCG. */
export function seededValues(count: number, seed = 1): number[] {
  let state = seed >>> 0;
  const out: number[] = [];
  for (let i = 0; i < count; i += 1) {
    state = (Math.imul(state, 1664525) + 1013904223) >>> 0;
    out.push(state / 2 ** 31 - 1);
  }
  return out;
}

export function seededTensor(shape: number[], seed = 1): Tensor {
  return new Tensor("float32", shape, Float64Array.from(seededValues(sizeOf(shape), seed)));
}

/** One seeded float32 tensor per graph input; every input needs a static shape. */
export function seededFeeds(graph: Graph, seed = 1): Record<string, Tensor> {
  const feeds: Record<string, Tensor> = {};
  graph.inputs.forEach((info, i) => {
    if (!isStaticShape(info.shape)) {
      throw new Error(`input ${info.name} needs a static shape`);
    }
    feeds[info.name] = seededTensor([...info.shape], seed + i);
  });
  return feeds;
}

/**
 * Run both graphs on `feeds` and compare every output: same names, dtype and
 * shape, values within `atol + rtol * |expected|`.
 */
export function expectSameOutputs(
  before: Graph,
  after: Graph,
  feeds: Feeds,
  { rtol = 1e-7, atol = 1e-5 }: { rtol?: number; atol?: number } = {},
): void {
  const expected = executeGraph(before, feeds);
  const actual = executeGraph(after, feeds);
  expect(Object.keys(actual)).toEqual(Object.keys(expected));
  for (const [name, want] of Object.entries(expected)) {
    const got = actual[name];
    expect(got.dtype).toBe(want.dtype);
    expect(got.shape).toEqual(want.shape);
    const wantValues = want.toArray();
    const gotValues = got.toArray();
    wantValues.forEach((value, i) => {
      expect(Math.abs(gotValues[i] - value)).toBeLessThanOrEqual(atol + rtol * Math.abs(value));
    });
  }
}
