/**
 * Rewrite steps shared by the passes.
 */

import { type Permutation, permuteShape } from "../core/permutation";
import { computeStrides, padShapeToRank, sizeOf } from "../core/shape";
import { GraphInvariantError } from "../errors";
import { makeNode } from "../ir/builder";
import type { Graph } from "../ir/graph";
import type { IRNode, TensorValue } from "../ir/types";

export type BypassOutcome = "rewired" | "renamed" | "shimmed";

/**
 * Take `node` out of the dataflow and let `replacement` stand in for its single
 * output.
 *
 * When that output is a graph output its name must survive: the producer of
 * `replacement` is renamed to it if it is a node of this graph whose value is
 * not itself an output; otherwise the node becomes `Identity(replacement)`,
 * keeping its name and output.
 */
export function bypassNode(graph: Graph, node: IRNode, replacement: string): BypassOutcome {
  const [output] = node.outputs;
  if (!graph.isGraphOutput(output)) {
    graph.replaceAllInputs(output, replacement);
    if (!graph.removeNodeIfUnreferenced(node)) {
      throw new GraphInvariantError(`node ${node.name} still referenced after rewiring ${output}`);
    }
    return "rewired";
  }

  if (graph.producerOf(replacement) && !graph.isGraphOutput(replacement)) {
    graph.replaceAllInputs(output, replacement);
    graph.removeNode(node);
    graph.renameValue(replacement, output);
    return "renamed";
  }

  graph.replaceNode(node, makeNode("Identity", [replacement], [output], {}, node.name));
  return "shimmed";
}

/**
 * Remove a node that a rewrite has just disconnected. Failing to do so means the
 * rewrite miscounted readers, which is a bug rather than a skipped rewrite.
 */
export function removeDisconnected(graph: Graph, node: IRNode): void {
  if (!graph.removeNodeIfUnreferenced(node)) {
    throw new GraphInvariantError(`node ${node.name} is still referenced after a rewrite`);
  }
}

/**
 * Transpose a literal tensor by `perm` (`out.dims[i] = dims[perm[i]]`).
 */
export function permuteTensorValue(tensor: TensorValue, perm: Permutation): TensorValue {
  const rank = perm.length;
  const outDims = permuteShape(tensor.dims, perm);
  const inStrides = computeStrides(tensor.dims);
  const outStrides = computeStrides(outDims);
  const size = sizeOf(outDims);
  const data = new Array<number>(size);
  for (let linear = 0; linear < size; linear += 1) {
    let remainder = linear;
    let offset = 0;
    for (let axis = 0; axis < rank; axis += 1) {
      const coord = Math.floor(remainder / outStrides[axis]);
      remainder -= coord * outStrides[axis];
      offset += coord * inStrides[perm[axis]];
    }
    data[linear] = tensor.data[offset];
  }
  return { dtype: tensor.dtype, dims: outDims, data };
}

/**
 * Left-pad a literal tensor with size-1 dims (same data, broadcast-equivalent).
 */
export function padTensorRank(tensor: TensorValue, rank: number): TensorValue {
  if (tensor.dims.length === rank) return tensor;
  return { ...tensor, dims: padShapeToRank(tensor.dims, rank) };
}
