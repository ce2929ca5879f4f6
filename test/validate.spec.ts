import { describe, expect, it } from "vitest";

import { MalformedGraphError } from "../src/errors";
import { makeGraph, makeNode, makeValueInfo } from "../src/ir/builder";
import type { Graph } from "../src/ir/graph";
import { assertValidGraph, validateGraph } from "../src/ir/validate";

function codes(graph: Graph): string[] {
  return validateGraph(graph).map((issue) => issue.code);
}

describe("validateGraph", () => {
  it("accepts a well-formed graph", () => {
    const graph = makeGraph(
      [
        makeNode("Transpose", ["X"], ["Y"], { perm: [1, 0] }, "t"),
        makeNode("Relu", ["Y"], ["Z"], {}, "relu"),
      ],
      "ok",
      [makeValueInfo("X", "float32", [2, 3])],
      [makeValueInfo("Z", "float32", [3, 2])],
    );
    expect(validateGraph(graph)).toEqual([]);
  });

  it("flags duplicate node names and producers", () => {
    const graph = makeGraph(
      [makeNode("Relu", ["X"], ["Y"], {}, "n"), makeNode("Neg", ["X"], ["Y"], {}, "n")],
      "dupes",
      [makeValueInfo("X")],
      [makeValueInfo("Y")],
    );
    expect(codes(graph)).toEqual(["duplicate-node-name", "duplicate-producer"]);
  });

  it("flags a node that redefines a graph input", () => {
    const graph = makeGraph(
      [makeNode("Relu", ["X"], ["X"], {}, "relu")],
      "shadow",
      [makeValueInfo("X")],
      [makeValueInfo("X")],
    );
    expect(codes(graph)).toContain("input-shadowed");
  });

  it("flags a body graph that redefines a value of its enclosing graph", () => {
    const body = makeGraph(
      [makeNode("Add", ["X", "X"], ["A"], {}, "body_add")],
      "body",
      [makeValueInfo("iter"), makeValueInfo("cond"), makeValueInfo("X")],
      [makeValueInfo("cond"), makeValueInfo("A")],
    );
    const graph = makeGraph(
      [makeNode("Neg", ["X"], ["A"], {}, "neg"), makeNode("Loop", ["M", "", "X"], ["R"], { body }, "loop")],
      "outer",
      [makeValueInfo("M"), makeValueInfo("X")],
      [makeValueInfo("R"), makeValueInfo("A")],
    );
    expect(validateGraph(graph)).toEqual([
      {
        code: "outer-shadowed",
        graph: "body",
        message: "graph input X redefines a value of an enclosing graph",
      },
      {
        code: "outer-shadowed",
        graph: "body",
        node: "body_add",
        message: "node body_add redefines A, a value of an enclosing graph",
      },
    ]);
  });

  it("flags dangling inputs and outputs", () => {
    const graph = makeGraph(
      [makeNode("Relu", ["nowhere"], ["Y"], {}, "relu")],
      "dangling",
      [],
      [makeValueInfo("Y"), makeValueInfo("Q")],
    );
    expect(validateGraph(graph)).toEqual([
      {
        code: "dangling-input",
        graph: "dangling",
        node: "relu",
        message: "node relu reads nowhere, which nothing defines",
      },
      {
        code: "dangling-output",
        graph: "dangling",
        message: "graph output Q is not produced by any node or input",
      },
    ]);
  });

  it("flags permutations that are not bijections or have the wrong rank", () => {
    const graph = makeGraph(
      [
        makeNode("Transpose", ["X"], ["A"], { perm: [0, 0] }, "not_bijective"),
        makeNode("Transpose", ["X"], ["B"], { perm: [2, 1, 0] }, "wrong_rank"),
      ],
      "perms",
      [makeValueInfo("X", "float32", [2, 3])],
      [makeValueInfo("A"), makeValueInfo("B")],
    );
    expect(codes(graph)).toEqual(["invalid-permutation", "invalid-permutation"]);
  });

  it("flags Loop arity mismatches and missing bodies", () => {
    const body = makeGraph(
      [makeNode("Identity", ["v_in"], ["v_out"], {}, "pass")],
      "body",
      [makeValueInfo("iter"), makeValueInfo("v_in")],
      [makeValueInfo("v_out")],
    );
    const graph = makeGraph(
      [
        makeNode("Loop", ["M", "", "X"], ["R1"], { body }, "bad_loop"),
        makeNode("Loop", ["M", "", "X"], ["R2"], {}, "no_body"),
        makeNode("If", ["C"], ["R3"], { then_branch: makeGraph([], "then", [], [makeValueInfo("X")]) }, "half_if"),
      ],
      "control",
      [makeValueInfo("M"), makeValueInfo("X"), makeValueInfo("C")],
      [makeValueInfo("R1"), makeValueInfo("R2"), makeValueInfo("R3")],
    );
    expect(codes(graph)).toEqual(["invalid-loop", "invalid-loop", "missing-subgraph", "missing-subgraph"]);
  });

  it("checks body graphs and names them in issues", () => {
    const body = makeGraph(
      [makeNode("Add", ["v_in", "ghost"], ["v_out"], {}, "body_add")],
      "loop_body",
      [makeValueInfo("iter"), makeValueInfo("cond"), makeValueInfo("v_in")],
      [makeValueInfo("cond"), makeValueInfo("v_out")],
    );
    const graph = makeGraph(
      [makeNode("Loop", ["M", "", "X"], ["R"], { body }, "loop")],
      "outer",
      [makeValueInfo("M"), makeValueInfo("X")],
      [makeValueInfo("R")],
    );
    expect(validateGraph(graph)).toEqual([
      {
        code: "dangling-input",
        graph: "loop_body",
        node: "body_add",
        message: "node body_add reads ghost, which nothing defines",
      },
    ]);
  });
});

describe("assertValidGraph", () => {
  it("throws every issue at once", () => {
    const graph = makeGraph(
      [makeNode("Relu", ["nowhere"], ["Y"], {}, "relu")],
      "dangling",
      [],
      [makeValueInfo("Y"), makeValueInfo("Q")],
    );

    expect(() => assertValidGraph(graph)).toThrow(MalformedGraphError);
    expect(() => assertValidGraph(graph)).toThrow(
      [
        "malformed graph (2 issues):",
        "  [dangling-input] dangling: node relu reads nowhere, which nothing defines",
        "  [dangling-output] dangling: graph output Q is not produced by any node or input",
      ].join("\n"),
    );
  });
});
