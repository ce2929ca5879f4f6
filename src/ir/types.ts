import type { PartialShape } from "../core/shape";
import type { Graph } from "./graph";

export type DType =
  | "float16"
  | "float32"
  | "float64"
  | "int8"
  | "int16"
  | "int32"
  | "int64"
  | "uint8"
  | "bool";

export const DTYPES: readonly DType[] = [
  "float16",
  "float32",
  "float64",
  "int8",
  "int16",
  "int32",
  "int64",
  "uint8",
  "bool",
];

/** A literal tensor; `data` is row-major and has `sizeOf(dims)` entries. */
export type TensorValue = {
  readonly dtype: DType;
  readonly dims: readonly number[];
  readonly data: readonly number[];
};

export type AttributeValue = number | string | readonly number[] | TensorValue | Graph;

export type Attributes = Readonly<Record<string, AttributeValue>>;

/**
 * An operator instance. Nodes are never mutated: a rewrite replaces the node
 * object inside its graph.
 */
export type IRNode = {
  readonly name: string;
  readonly op: string;
  /** Value names; `""` marks an absent optional input. */
  readonly inputs: readonly string[];
  readonly outputs: readonly string[];
  readonly attributes: Attributes;
};

export type ValueInfo = {
  readonly name: string;
  readonly dtype?: DType;
  /** `undefined` when the rank is unknown. */
  readonly shape?: PartialShape;
};

/**
 * Where a value name is defined, seen from some graph. `graph` is the defining
 * graph, which is an enclosing scope when it differs from the graph asked.
 */
export type ValueResolution =
  | { kind: "input"; graph: Graph }
  | { kind: "node"; graph: Graph; node: IRNode };
