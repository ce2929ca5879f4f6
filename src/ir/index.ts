export {
  constantValue,
  getFloatAttribute,
  getGraphAttribute,
  getIntAttribute,
  getIntsAttribute,
  getTensorAttribute,
  isGraphAttribute,
  isIntsAttribute,
  isTensorAttribute,
} from "./attributes";
export { makeConstantNode, makeGraph, makeNode, makeTensor, makeValueInfo } from "./builder";
export { type CensusOptions, countOp, getNodeCount, totalNodeCount } from "./census";
export { Graph, type GraphInit, type SubgraphRef } from "./graph";
export {
  type AttributeJSON,
  type GraphJSON,
  type NodeJSON,
  type TensorJSON,
  type ValueInfoJSON,
  graphFromJSON,
  graphToJSON,
  readGraphFile,
  writeGraphFile,
} from "./serialize";
export type {
  AttributeValue,
  Attributes,
  DType,
  IRNode,
  TensorValue,
  ValueInfo,
  ValueResolution,
} from "./types";
export { DTYPES } from "./types";
export { assertValidGraph, validateGraph } from "./validate";
