import { isPermutation } from "../core/permutation";
import { type GraphIssue, MalformedGraphError } from "../errors";
import { getGraphAttribute, getIntsAttribute } from "./attributes";
import type { Graph } from "./graph";
import type { IRNode } from "./types";

// ============================================================================
// Per-node schema checks
// ============================================================================

function checkTranspose(graph: Graph, node: IRNode, issues: GraphIssue[]): void {
  const perm = getIntsAttribute(node, "perm");
  if (!perm) return;
  if (!isPermutation(perm)) {
    issues.push({
      code: "invalid-permutation",
      graph: graph.name,
      node: node.name,
      message: `node ${node.name}: perm [${perm}] is not a permutation`,
    });
    return;
  }
  const shape = graph.getValueInfo(node.inputs[0] ?? "")?.shape;
  if (shape && shape.length !== perm.length) {
    issues.push({
      code: "invalid-permutation",
      graph: graph.name,
      node: node.name,
      message: `node ${node.name}: perm [${perm}] has rank ${perm.length} but input has rank ${shape.length}`,
    });
  }
}

/**
 * Loop: inputs (M, cond, v_initial...), body inputs (iter, cond, v...),
 * body outputs (cond, v..., scan...), node outputs (v_final..., scan...).
 */
function checkLoop(graph: Graph, node: IRNode, issues: GraphIssue[]): void {
  const body = getGraphAttribute(node, "body");
  if (!body) {
    issues.push({
      code: "missing-subgraph",
      graph: graph.name,
      node: node.name,
      message: `node ${node.name}: Loop has no body graph`,
    });
    return;
  }
  const carried = node.inputs.length - 2;
  const problems: string[] = [];
  if (carried < 0) {
    problems.push(`expected at least 2 inputs, got ${node.inputs.length}`);
  } else {
    if (body.inputNameList.length !== carried + 2) {
      problems.push(`body takes ${body.inputNameList.length} inputs, expected ${carried + 2}`);
    }
    if (body.outputNameList.length < carried + 1) {
      problems.push(`body yields ${body.outputNameList.length} outputs, expected at least ${carried + 1}`);
    } else if (node.outputs.length !== body.outputNameList.length - 1) {
      problems.push(
        `node has ${node.outputs.length} outputs, body yields ${body.outputNameList.length - 1} after the condition`,
      );
    }
  }
  for (const problem of problems) {
    issues.push({
      code: "invalid-loop",
      graph: graph.name,
      node: node.name,
      message: `node ${node.name}: ${problem}`,
    });
  }
}

function checkIf(graph: Graph, node: IRNode, issues: GraphIssue[]): void {
  for (const branch of ["then_branch", "else_branch"]) {
    if (!getGraphAttribute(node, branch)) {
      issues.push({
        code: "missing-subgraph",
        graph: graph.name,
        node: node.name,
        message: `node ${node.name}: If has no ${branch} graph`,
      });
    }
  }
}

// ============================================================================
// Graph checks
// ============================================================================

function validateScope(graph: Graph, issues: GraphIssue[]): void {
  const seenNames = new Set<string>();
  const producedBy = new Map<string, string>();

  for (const node of graph.nodes) {
    if (seenNames.has(node.name)) {
      issues.push({
        code: "duplicate-node-name",
        graph: graph.name,
        node: node.name,
        message: `node name ${node.name} is used more than once`,
      });
    }
    seenNames.add(node.name);

    for (const output of node.outputs) {
      if (output === "") continue;
      const previous = producedBy.get(output);
      if (previous !== undefined) {
        issues.push({
          code: "duplicate-producer",
          graph: graph.name,
          node: node.name,
          message: `value ${output} is produced by both ${previous} and ${node.name}`,
        });
      } else if (graph.isGraphInput(output)) {
        issues.push({
          code: "input-shadowed",
          graph: graph.name,
          node: node.name,
          message: `node ${node.name} redefines graph input ${output}`,
        });
      }
      producedBy.set(output, node.name);
    }
  }

  const outer = graph.parent;
  if (outer) {
    for (const input of graph.inputNameList) {
      if (!outer.resolve(input)) continue;
      issues.push({
        code: "outer-shadowed",
        graph: graph.name,
        message: `graph input ${input} redefines a value of an enclosing graph`,
      });
    }
    for (const node of graph.nodes) {
      for (const output of node.outputs) {
        if (output === "" || !outer.resolve(output)) continue;
        issues.push({
          code: "outer-shadowed",
          graph: graph.name,
          node: node.name,
          message: `node ${node.name} redefines ${output}, a value of an enclosing graph`,
        });
      }
    }
  }

  for (const node of graph.nodes) {
    for (const input of node.inputs) {
      if (input === "" || graph.resolve(input)) continue;
      issues.push({
        code: "dangling-input",
        graph: graph.name,
        node: node.name,
        message: `node ${node.name} reads ${input}, which nothing defines`,
      });
    }
    if (node.op === "Transpose") checkTranspose(graph, node, issues);
    if (node.op === "Loop") checkLoop(graph, node, issues);
    if (node.op === "If") checkIf(graph, node, issues);
  }

  for (const output of graph.outputNameList) {
    if (graph.resolve(output)) continue;
    issues.push({
      code: "dangling-output",
      graph: graph.name,
      message: `graph output ${output} is not produced by any node or input`,
    });
  }

  try {
    graph.topologicalOrder();
  } catch (error) {
    if (!(error instanceof MalformedGraphError)) throw error;
    issues.push(...error.issues);
  }

  for (const { graph: body } of graph.subgraphs()) {
    validateScope(body, issues);
  }
}

/**
 * Check every structural invariant of `graph` and its body graphs.
 */
export function validateGraph(graph: Graph): GraphIssue[] {
  const issues: GraphIssue[] = [];
  validateScope(graph, issues);
  return issues;
}

export function assertValidGraph(graph: Graph): void {
  const issues = validateGraph(graph);
  if (issues.length > 0) {
    throw new MalformedGraphError(issues);
  }
}
