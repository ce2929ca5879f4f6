/**
 * Small constructors for building graphs by hand (tests, examples, the JSON
 * loader). They only shape plain data; nothing here validates.
 */

import type { PartialShape } from "../core/shape";
import { Graph } from "./graph";
import type { AttributeValue, DType, IRNode, TensorValue, ValueInfo } from "./types";

let anonymousNodeCounter = 0;

export function makeNode(
  op: string,
  inputs: readonly string[],
  outputs: readonly string[],
  attributes: Record<string, AttributeValue> = {},
  name?: string,
): IRNode {
  anonymousNodeCounter += 1;
  return {
    name: name ?? `${op}_${anonymousNodeCounter}`,
    op,
    inputs: inputs.slice(),
    outputs: outputs.slice(),
    attributes: { ...attributes },
  };
}

export function makeTensor(
  dtype: DType,
  dims: readonly number[],
  data: readonly number[],
): TensorValue {
  return { dtype, dims: dims.slice(), data: data.slice() };
}

export function makeConstantNode(name: string, output: string, value: TensorValue): IRNode {
  return makeNode("Constant", [], [output], { value }, name);
}

export function makeValueInfo(name: string, dtype?: DType, shape?: PartialShape): ValueInfo {
  return { name, dtype, shape: shape ? shape.slice() : undefined };
}

export function makeGraph(
  nodes: readonly IRNode[],
  name: string,
  inputs: readonly ValueInfo[],
  outputs: readonly ValueInfo[],
  valueInfo: readonly ValueInfo[] = [],
): Graph {
  return new Graph({ name, nodes, inputs, outputs, valueInfo });
}
