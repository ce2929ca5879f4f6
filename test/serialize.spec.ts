import { mkdtempSync, readFileSync, rmSync, writeFileSync } from "node:fs";
import { tmpdir } from "node:os";
import { join } from "node:path";
import { afterEach, describe, expect, it } from "vitest";

import { GraphFormatError } from "../src/errors";
import { makeConstantNode, makeGraph, makeNode, makeTensor, makeValueInfo } from "../src/ir/builder";
import { getNodeCount } from "../src/ir/census";
import { graphFromJSON, graphToJSON, readGraphFile, writeGraphFile } from "../src/ir/serialize";

function smallGraph() {
  return makeGraph(
    [
      makeConstantNode("c", "C", makeTensor("float32", [2], [1, 2])),
      makeNode("Add", ["X", "C"], ["Y"], {}, "add"),
    ],
    "small",
    [makeValueInfo("X", "float32", [2])],
    [makeValueInfo("Y", "float32", [2])],
    [makeValueInfo("C", "float32", [2])],
  );
}

function loopGraph() {
  const body = makeGraph(
    [
      makeNode("Transpose", ["v_in"], ["t"], { perm: [1, 0] }, "body_t"),
      makeNode("Transpose", ["t"], ["v_out"], { perm: [1, 0] }, "body_t2"),
    ],
    "body",
    [makeValueInfo("iter", "int64", []), makeValueInfo("cond", "bool", []), makeValueInfo("v_in", "float32", [null, 3])],
    [makeValueInfo("cond", "bool", []), makeValueInfo("v_out", "float32", [null, 3])],
    [makeValueInfo("t", "float32", [3, null])],
  );
  return makeGraph(
    [makeNode("Loop", ["M", "", "X"], ["R"], { body }, "loop")],
    "looped",
    [makeValueInfo("M", "int64", []), makeValueInfo("X", "float32", [null, 3])],
    [makeValueInfo("R")],
  );
}

describe("graphToJSON", () => {
  it("writes nodes, attributes and intermediate value info", () => {
    expect(graphToJSON(smallGraph())).toEqual({
      name: "small",
      inputs: [{ name: "X", dtype: "float32", shape: [2] }],
      outputs: [{ name: "Y", dtype: "float32", shape: [2] }],
      valueInfo: [{ name: "C", dtype: "float32", shape: [2] }],
      nodes: [
        {
          name: "c",
          op: "Constant",
          inputs: [],
          outputs: ["C"],
          attributes: { value: { tensor: { dtype: "float32", dims: [2], data: [1, 2] } } },
        },
        { name: "add", op: "Add", inputs: ["X", "C"], outputs: ["Y"] },
      ],
    });
  });

  it("reads back what it writes, body graphs included", () => {
    const json = graphToJSON(loopGraph());
    const parsed = graphFromJSON(JSON.parse(JSON.stringify(json)));

    expect(graphToJSON(parsed)).toEqual(json);
    expect(getNodeCount(parsed, { recursive: true })).toEqual({ Loop: 1, Transpose: 2 });
    const [body] = parsed.subgraphs();
    expect(body.graph.parent).toBe(parsed);
    expect(body.graph.getValueInfo("t")).toEqual({ name: "t", dtype: "float32", shape: [3, null] });
  });
});

describe("graphFromJSON", () => {
  const base = { name: "g", inputs: [], outputs: [] };

  it("names the path of a structural problem", () => {
    expect(() => graphFromJSON([])).toThrow("$: expected an object");
    expect(() =>
      graphFromJSON({ ...base, nodes: [{ name: "n", op: "Relu", inputs: "X", outputs: [] }] }),
    ).toThrow("$.nodes[0].inputs: expected an array");
    expect(() => graphFromJSON({ ...base, inputs: [{ name: "X", dtype: "float8" }], nodes: [] })).toThrow(
      "$.inputs[0].dtype: expected one of float16, float32, float64, int8, int16, int32, int64, uint8, bool",
    );
    expect(() => graphFromJSON({ ...base, outputs: [{ name: "Y", shape: [2, -1] }], nodes: [] })).toThrow(
      "$.outputs[0].shape[1]: expected a non-negative integer or null",
    );
  });

  it("checks tensor sizes and nested graphs", () => {
    const constant = {
      name: "c",
      op: "Constant",
      inputs: [],
      outputs: ["C"],
      attributes: { value: { tensor: { dtype: "float32", dims: [2, 2], data: [1] } } },
    };
    expect(() => graphFromJSON({ ...base, nodes: [constant] })).toThrow(GraphFormatError);
    expect(() => graphFromJSON({ ...base, nodes: [constant] })).toThrow(
      "$.nodes[0].attributes.value.tensor.data: expected 4 element(s), got 1",
    );

    const loop = { name: "l", op: "Loop", inputs: [], outputs: [], attributes: { body: { graph: { name: 1 } } } };
    expect(() => graphFromJSON({ ...base, nodes: [loop] })).toThrow(
      "$.nodes[0].attributes.body.graph.name: expected a string",
    );
  });

  it("rejects attribute objects it does not know", () => {
    const node = { name: "n", op: "Relu", inputs: [], outputs: [], attributes: { odd: { weird: true } } };
    expect(() => graphFromJSON({ ...base, nodes: [node] })).toThrow(
      '$.nodes[0].attributes.odd: expected a number, string, number array, {"tensor": ...} or {"graph": ...}',
    );
  });
});

describe("graph files", () => {
  let dir: string | undefined;

  afterEach(() => {
    if (dir) rmSync(dir, { recursive: true, force: true });
    dir = undefined;
  });

  it("writes pretty JSON and reads it back", () => {
    dir = mkdtempSync(join(tmpdir(), "tgopt-serialize-"));
    const path = join(dir, "small.json");

    writeGraphFile(path, smallGraph());

    const text = readFileSync(path, "utf8");
    expect(text.endsWith("}\n")).toBe(true);
    expect(text.startsWith('{\n  "name": "small",')).toBe(true);
    expect(graphToJSON(readGraphFile(path))).toEqual(graphToJSON(smallGraph()));
  });

  it("reports files that are not JSON", () => {
    dir = mkdtempSync(join(tmpdir(), "tgopt-serialize-"));
    const path = join(dir, "broken.json");
    writeFileSync(path, "{ not json");

    expect(() => readGraphFile(path)).toThrow(GraphFormatError);
    expect(() => readGraphFile(path)).toThrow(`${path}: invalid JSON (`);
  });
});
