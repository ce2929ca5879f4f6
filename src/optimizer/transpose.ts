/**
 * Transpose elimination.
 *
 * Moves Transpose nodes toward the graph outputs through transparent operators
 * (see ./handlers) so that transposes meet and cancel, merges transposes that
 * duplicate each other, and folds transposes into Shape. Every rewrite keeps
 * each declared graph output produced under its name and layout.
 *
 * Rules, tried in order for each Transpose T: x -> y with permutation p:
 *   identity-perm   p is the identity: bypass T
 *   merge           another Transpose(x) with the same p is redundant
 *   compose         a Transpose(y) consumer is rebased onto x (or cancelled)
 *   shape           Shape(y) is computed from x and permuted
 *   push            the single transparent consumer of y is rebuilt on the
 *                   pre-transpose layout and T is re-emitted after it
 */

import {
  type Permutation,
  composePermutations,
  invertPermutation,
  isIdentityPermutation,
  isPermutation,
  permutationsEqual,
  permutePartialShape,
  permuteShape,
  reversedPermutation,
} from "../core/permutation";
import { isStaticShape } from "../core/shape";
import {
  constantValue,
  getIntAttribute,
  getIntsAttribute,
  isIntsAttribute,
} from "../ir/attributes";
import { makeConstantNode, makeNode, makeTensor } from "../ir/builder";
import type { Graph } from "../ir/graph";
import type { Attributes, IRNode, TensorValue } from "../ir/types";
import { type OpCapability, getOpCapability, isShapeRewrite } from "./handlers";
import type { GraphPass, PassContext } from "./pass";
import { bypassNode, padTensorRank, permuteTensorValue, removeDisconnected } from "./rewrite";

// ============================================================================
// Permutation lookup
// ============================================================================

/**
 * Permutation applied by a Transpose node. A missing `perm` reverses the axes,
 * which needs the input rank (from value info, or `rankHint`).
 */
export function resolvePermutation(
  graph: Graph,
  node: IRNode,
  rankHint?: number,
): Permutation | undefined {
  if (node.op !== "Transpose" || node.inputs.length !== 1 || node.outputs.length !== 1) {
    return undefined;
  }
  const perm = getIntsAttribute(node, "perm");
  if (perm) {
    return isPermutation(perm) ? perm : undefined;
  }
  const rank = rankHint ?? graph.getValueInfo(node.inputs[0])?.shape?.length;
  return rank === undefined ? undefined : reversedPermutation(rank);
}

function mapAxis(axis: number, perm: Permutation): number | undefined {
  const rank = perm.length;
  const normalized = axis < 0 ? axis + rank : axis;
  if (!Number.isInteger(normalized) || normalized < 0 || normalized >= rank) {
    return undefined;
  }
  return perm[normalized];
}

/**
 * Attributes of an axis-carrying op after moving a transpose from its input to
 * its output, or undefined when the op cannot be rewritten.
 */
function remapAxisAttributes(
  node: IRNode,
  capability: Extract<OpCapability, { kind: "axes" }>,
  perm: Permutation,
): Attributes | undefined {
  if (capability.requiresKeepDims && getIntAttribute(node, "keepdims", 1) !== 1) {
    return undefined;
  }
  const raw = node.attributes[capability.attribute];
  if (raw === undefined) {
    // Reduce without axes reduces everything; Concat requires an axis.
    return capability.attribute === "axes" ? node.attributes : undefined;
  }
  if (capability.attribute === "axis") {
    if (typeof raw !== "number") return undefined;
    const axis = mapAxis(raw, perm);
    return axis === undefined ? undefined : { ...node.attributes, axis };
  }
  if (!isIntsAttribute(raw)) return undefined;
  const axes: number[] = [];
  for (const axis of raw) {
    const mapped = mapAxis(axis, perm);
    if (mapped === undefined) return undefined;
    axes.push(mapped);
  }
  return { ...node.attributes, axes };
}

function removeIfUnreferenced(graph: Graph, name: string): void {
  const node = graph.getNode(name);
  if (node) graph.removeNodeIfUnreferenced(node);
}

// ============================================================================
// Relocation planning
// ============================================================================

/** How constant operands of a relocated op are brought into the new layout. */
type ConstantPolicy = "none" | "broadcast" | "exact";

type Operand =
  | { kind: "value"; name: string }
  | { kind: "constant"; name: string; node: IRNode; permuted: TensorValue };

type RelocationPlan = {
  operands: Operand[];
  absorbed: IRNode[];
};

function planOperands(
  graph: Graph,
  transpose: IRNode,
  consumer: IRNode,
  perm: Permutation,
  policy: ConstantPolicy,
): RelocationPlan | undefined {
  const [source] = transpose.inputs;
  const [transposed] = transpose.outputs;
  const rank = perm.length;
  const inverse = invertPermutation(perm);
  const operands: Operand[] = [];
  const absorbed: IRNode[] = [];

  for (const value of consumer.inputs) {
    if (value === transposed) {
      operands.push({ kind: "value", name: source });
      continue;
    }
    if (value === "") return undefined;

    const producer = graph.producerOf(value);
    if (producer?.op === "Transpose") {
      // The sibling's own rank decides its permutation; a perm-less Transpose
      // of a lower-rank value is a different reversal.
      const siblingPerm = resolvePermutation(graph, producer);
      const siblingRank = graph.getValueInfo(producer.inputs[0])?.shape?.length;
      if (
        siblingPerm &&
        permutationsEqual(siblingPerm, perm) &&
        (siblingRank === undefined || siblingRank === rank)
      ) {
        operands.push({ kind: "value", name: producer.inputs[0] });
        absorbed.push(producer);
        continue;
      }
    }

    const literal = constantValue(producer);
    if (producer && literal && policy !== "none") {
      if (literal.dims.length > rank) return undefined;
      if (policy === "exact" && literal.dims.length !== rank) return undefined;
      operands.push({
        kind: "constant",
        name: value,
        node: producer,
        permuted: permuteTensorValue(padTensorRank(literal, rank), inverse),
      });
      continue;
    }

    // A non-constant operand without an equivalent transpose would need a
    // new transpose of its own.
    return undefined;
  }
  return { operands, absorbed };
}

// ============================================================================
// Pass
// ============================================================================

export class TransposeOptimizer implements GraphPass {
  readonly name = "transpose";

  run(graph: Graph, context: PassContext): number {
    let rewrites = 0;
    for (const scope of graph.walk()) {
      rewrites += this.optimizeScope(scope, context);
    }
    return rewrites;
  }

  private optimizeScope(graph: Graph, context: PassContext): number {
    let rewrites = 0;
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const node of graph.topologicalOrder()) {
        if (node.op !== "Transpose") continue;
        const rule = this.rewrite(graph, node);
        if (rule) {
          context.logger.debug(`${this.name}: ${rule} at ${node.name} in ${graph.name}`);
          rewrites += 1;
          progressed = true;
          break;
        }
      }
    }
    if (rewrites > 0) {
      graph.sortTopologically();
    }
    return rewrites;
  }

  private rewrite(graph: Graph, transpose: IRNode): string | undefined {
    const perm = resolvePermutation(graph, transpose);
    if (!perm || transpose.inputs[0] === "") return undefined;

    if (isIdentityPermutation(perm)) {
      return `identity-perm (${bypassNode(graph, transpose, transpose.inputs[0])})`;
    }
    return (
      this.mergeDuplicate(graph, transpose, perm) ??
      this.composeWithConsumer(graph, transpose, perm) ??
      this.rewriteShapeConsumers(graph, transpose, perm) ??
      this.pushDown(graph, transpose, perm)
    );
  }

  private mergeDuplicate(graph: Graph, transpose: IRNode, perm: Permutation): string | undefined {
    const [source] = transpose.inputs;
    const [output] = transpose.outputs;
    for (const other of graph.consumersOf(source)) {
      if (other === transpose || other.inputs[0] !== source) continue;
      const otherPerm = resolvePermutation(graph, other, perm.length);
      if (!otherPerm || !permutationsEqual(otherPerm, perm)) continue;

      const [otherOutput] = other.outputs;
      const outputIsDeclared = graph.isGraphOutput(output);
      const otherIsDeclared = graph.isGraphOutput(otherOutput);
      if (outputIsDeclared && otherIsDeclared) continue;

      const [kept, dropped] = otherIsDeclared ? [other, transpose] : [transpose, other];
      graph.replaceAllInputs(dropped.outputs[0], kept.outputs[0]);
      removeDisconnected(graph, dropped);
      return `merge ${dropped.name} into ${kept.name}`;
    }
    return undefined;
  }

  private composeWithConsumer(
    graph: Graph,
    transpose: IRNode,
    perm: Permutation,
  ): string | undefined {
    const [source] = transpose.inputs;
    const [output] = transpose.outputs;
    for (const consumer of graph.consumersOf(output)) {
      if (consumer.inputs[0] !== output) continue;
      const next = resolvePermutation(graph, consumer, perm.length);
      if (!next || next.length !== perm.length) continue;

      const composed = composePermutations(perm, next);
      let rule: string;
      if (isIdentityPermutation(composed)) {
        rule = `cancel with ${consumer.name} (${bypassNode(graph, consumer, source)})`;
      } else {
        graph.replaceNode(consumer, {
          ...consumer,
          inputs: [source],
          attributes: { ...consumer.attributes, perm: composed },
        });
        rule = `compose into ${consumer.name}`;
      }
      removeIfUnreferenced(graph, transpose.name);
      return rule;
    }
    return undefined;
  }

  private rewriteShapeConsumers(
    graph: Graph,
    transpose: IRNode,
    perm: Permutation,
  ): string | undefined {
    const [source] = transpose.inputs;
    const [output] = transpose.outputs;
    const rewritten: string[] = [];
    for (const consumer of graph.consumersOf(output)) {
      if (!isShapeRewrite(consumer.op)) continue;
      if (consumer.inputs.length !== 1 || consumer.inputs[0] !== output) continue;
      if (consumer.outputs.length !== 1) continue;
      if ("start" in consumer.attributes || "end" in consumer.attributes) continue;
      this.rewriteShape(graph, consumer, source, perm);
      rewritten.push(consumer.name);
    }
    if (rewritten.length === 0) return undefined;
    removeIfUnreferenced(graph, transpose.name);
    return `shape ${rewritten.join(", ")}`;
  }

  /**
   * Shape(Transpose(x, p)) is Shape(x) permuted by p: a literal when the shape
   * of x is static, otherwise Gather(Shape(x), p).
   */
  private rewriteShape(graph: Graph, shapeNode: IRNode, source: string, perm: Permutation): void {
    const [shapeOutput] = shapeNode.outputs;
    const sourceShape = graph.getValueInfo(source)?.shape;
    if (isStaticShape(sourceShape) && sourceShape.length === perm.length) {
      const dims = permuteShape(sourceShape, perm);
      graph.replaceNode(
        shapeNode,
        makeConstantNode(shapeNode.name, shapeOutput, makeTensor("int64", [dims.length], dims)),
      );
      return;
    }

    const unpermuted = graph.uniqueName(`${shapeOutput}_unpermuted`);
    graph.replaceNode(shapeNode, { ...shapeNode, inputs: [source], outputs: [unpermuted] });
    graph.setValueInfo({ name: unpermuted, dtype: "int64", shape: [perm.length] });
    const indices = graph.uniqueName(`${shapeNode.name}_perm`);
    graph.addNode(makeConstantNode(indices, indices, makeTensor("int64", [perm.length], perm)));
    graph.addNode(
      makeNode(
        "Gather",
        [unpermuted, indices],
        [shapeOutput],
        { axis: 0 },
        graph.uniqueName(`${shapeNode.name}_gather`),
      ),
    );
  }

  private pushDown(graph: Graph, transpose: IRNode, perm: Permutation): string | undefined {
    const [output] = transpose.outputs;
    // The transpose defines a declared output's layout; it stays where it is.
    if (graph.isGraphOutput(output)) return undefined;

    const consumers = graph.consumersOf(output);
    if (consumers.length !== 1) return undefined;
    const [consumer] = consumers;
    if (consumer.outputs.length !== 1 || !consumer.inputs.includes(output)) return undefined;

    const capability = getOpCapability(consumer.op);
    switch (capability.kind) {
      case "unary":
        if (consumer.inputs.length !== 1) return undefined;
        return this.relocate(graph, transpose, consumer, perm, "none", consumer.attributes);
      case "broadcast":
        return this.relocate(graph, transpose, consumer, perm, "broadcast", consumer.attributes);
      case "axes": {
        if (consumer.inputs.length > capability.maxInputs) return undefined;
        const attributes = remapAxisAttributes(consumer, capability, perm);
        if (!attributes) return undefined;
        const policy = capability.attribute === "axis" ? "exact" : "none";
        return this.relocate(graph, transpose, consumer, perm, policy, attributes);
      }
      case "shape":
      case "opaque":
        return undefined;
    }
  }

  /**
   * Rebuild `consumer` on the pre-transpose layout and emit the transpose after
   * it. The consumer takes over the transposed value's name and the relocated
   * transpose keeps the original node name, so only the wiring changes.
   */
  private relocate(
    graph: Graph,
    transpose: IRNode,
    consumer: IRNode,
    perm: Permutation,
    policy: ConstantPolicy,
    attributes: Attributes,
  ): string | undefined {
    const plan = planOperands(graph, transpose, consumer, perm, policy);
    if (!plan) return undefined;

    const [transposed] = transpose.outputs;
    const [consumerOutput] = consumer.outputs;
    const outputInfo = graph.getValueInfo(consumerOutput);

    const constantNames = new Map<string, string>();
    for (const operand of plan.operands) {
      if (operand.kind !== "constant" || constantNames.has(operand.name)) continue;
      const { permuted } = operand;
      const shared = graph.consumersOf(operand.name).length > 1 || graph.isGraphOutput(operand.name);
      let name = operand.name;
      if (shared) {
        name = graph.uniqueName(`${operand.name}_permuted`);
        graph.addNode(makeConstantNode(name, name, permuted));
      } else {
        graph.replaceNode(operand.node, {
          ...operand.node,
          attributes: { ...operand.node.attributes, value: permuted },
        });
      }
      graph.setValueInfo({ name, dtype: permuted.dtype, shape: permuted.dims });
      constantNames.set(operand.name, name);
    }

    const inputs = plan.operands.map((operand) =>
      operand.kind === "constant" ? (constantNames.get(operand.name) ?? operand.name) : operand.name,
    );
    const rebuilt = graph.replaceNode(consumer, { ...consumer, inputs, attributes });
    removeDisconnected(graph, transpose);
    for (const sibling of plan.absorbed) {
      removeIfUnreferenced(graph, sibling.name);
    }

    graph.replaceNode(rebuilt, { ...rebuilt, outputs: [transposed] });
    graph.addNode({
      ...transpose,
      inputs: [transposed],
      outputs: [consumerOutput],
      attributes: { ...transpose.attributes, perm: [...perm] },
    });
    if (outputInfo) {
      graph.setValueInfo({
        name: transposed,
        dtype: outputInfo.dtype,
        shape: permutePartialShape(outputInfo.shape, invertPermutation(perm)),
      });
    } else {
      graph.deleteValueInfo(transposed);
    }
    return `push through ${consumer.name}`;
  }
}
