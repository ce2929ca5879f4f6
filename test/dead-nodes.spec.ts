import { describe, expect, it } from "vitest";

import { silentLogger } from "../src/core/debug";
import { makeGraph, makeNode, makeValueInfo } from "../src/ir/builder";
import { DeadNodeEliminator } from "../src/optimizer/dead-nodes";

const context = { logger: silentLogger };

describe("DeadNodeEliminator", () => {
  it("removes unread chains in one run", () => {
    const graph = makeGraph(
      [
        makeNode("Relu", ["X"], ["A"], {}, "relu"),
        makeNode("Neg", ["A"], ["B"], {}, "neg"),
        makeNode("Abs", ["X"], ["Y"], {}, "abs"),
      ],
      "chain",
      [makeValueInfo("X")],
      [makeValueInfo("Y")],
    );

    expect(new DeadNodeEliminator().run(graph, context)).toBe(2);
    expect(graph.nodes.map((node) => node.name)).toEqual(["abs"]);
  });

  it("keeps nodes whose outputs a body graph reads", () => {
    const body = makeGraph(
      [makeNode("Add", ["v_in", "A"], ["v_out"], {}, "body_add")],
      "body",
      [makeValueInfo("iter"), makeValueInfo("cond_in"), makeValueInfo("v_in")],
      [makeValueInfo("cond_in"), makeValueInfo("v_out")],
    );
    const graph = makeGraph(
      [
        makeNode("Neg", ["X"], ["A"], {}, "neg"),
        makeNode("Loop", ["M", "", "X"], ["RES"], { body }, "loop"),
      ],
      "captured",
      [makeValueInfo("M"), makeValueInfo("X")],
      [makeValueInfo("RES")],
    );

    expect(new DeadNodeEliminator().run(graph, context)).toBe(0);
    expect(graph.nodes).toHaveLength(2);
  });

  it("cleans body graphs too", () => {
    const body = makeGraph(
      [
        makeNode("Relu", ["v_in"], ["scratch"], {}, "body_dead"),
        makeNode("Neg", ["v_in"], ["v_out"], {}, "body_neg"),
      ],
      "body",
      [makeValueInfo("iter"), makeValueInfo("cond_in"), makeValueInfo("v_in")],
      [makeValueInfo("cond_in"), makeValueInfo("v_out")],
    );
    const graph = makeGraph(
      [makeNode("Loop", ["M", "", "X"], ["RES"], { body }, "loop")],
      "nested",
      [makeValueInfo("M"), makeValueInfo("X")],
      [makeValueInfo("RES")],
    );

    expect(new DeadNodeEliminator().run(graph, context)).toBe(1);
    expect(body.nodes.map((node) => node.name)).toEqual(["body_neg"]);
  });
});
