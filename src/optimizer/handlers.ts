/**
 * Operator handler table for transpose relocation.
 *
 * Each operator type maps to a capability descriptor telling the transpose
 * pass whether (and how) a transpose on an input may be moved below the node.
 * Op types not listed are opaque.
 */

// ============================================================================
// Capability descriptors
// ============================================================================

export type OpCapability =
  /** Elementwise with a single input; acts identically on every element. */
  | { kind: "unary" }
  /** Elementwise over several inputs with numpy-style broadcasting. */
  | { kind: "broadcast" }
  /** Output is the input's dimension vector. */
  | { kind: "shape" }
  /** Acts along axes named by an attribute, which is remapped through the permutation. */
  | {
      kind: "axes";
      attribute: "axis" | "axes";
      /** Only transparent when the reduced axes are kept (`keepdims = 1`). */
      requiresKeepDims: boolean;
      /** Number of tensor inputs the op may take (extra inputs make it opaque). */
      maxInputs: number;
    }
  | { kind: "opaque" };

export type OpCapabilityKind = OpCapability["kind"];

const OPAQUE: OpCapability = { kind: "opaque" };

const UNARY_OPS = [
  "Abs",
  "Acos",
  "Asin",
  "Atan",
  "Cast",
  "Ceil",
  "Cos",
  "Elu",
  "Erf",
  "Exp",
  "Floor",
  "HardSigmoid",
  "Identity",
  "IsInf",
  "IsNaN",
  "LeakyRelu",
  "Log",
  "Neg",
  "Not",
  "Reciprocal",
  "Relu",
  "Round",
  "Selu",
  "Sigmoid",
  "Sign",
  "Sin",
  "Softplus",
  "Softsign",
  "Sqrt",
  "Tan",
  "Tanh",
  "ThresholdedRelu",
];

const BROADCAST_OPS = [
  "Add",
  "And",
  "Div",
  "Equal",
  "Greater",
  "GreaterOrEqual",
  "Less",
  "LessOrEqual",
  "Max",
  "Mean",
  "Min",
  "Mul",
  "Or",
  "Pow",
  "PRelu",
  "Sub",
  "Sum",
  "Where",
  "Xor",
];

const REDUCE_OPS = ["ReduceMax", "ReduceMean", "ReduceMin", "ReduceProd", "ReduceSum"];

const CAPABILITIES = new Map<string, OpCapability>([
  ...UNARY_OPS.map((op): [string, OpCapability] => [op, { kind: "unary" }]),
  ...BROADCAST_OPS.map((op): [string, OpCapability] => [op, { kind: "broadcast" }]),
  ["Shape", { kind: "shape" }],
  ["Concat", { kind: "axes", attribute: "axis", requiresKeepDims: false, maxInputs: Infinity }],
  ...REDUCE_OPS.map((op): [string, OpCapability] => [
    op,
    { kind: "axes", attribute: "axes", requiresKeepDims: true, maxInputs: 1 },
  ]),
]);

// ============================================================================
// Lookups
// ============================================================================

/**
 * Capability of an op type. Unknown op types are opaque.
 */
export function getOpCapability(op: string): OpCapability {
  return CAPABILITIES.get(op) ?? OPAQUE;
}

export function isUnaryTransparent(op: string): boolean {
  return getOpCapability(op).kind === "unary";
}

export function isBroadcastTransparent(op: string): boolean {
  return getOpCapability(op).kind === "broadcast";
}

export function isShapeRewrite(op: string): boolean {
  return getOpCapability(op).kind === "shape";
}

/**
 * Whether a transpose may ever be relocated across `op`.
 */
export function isTransposeTransparent(op: string): boolean {
  return getOpCapability(op).kind !== "opaque";
}

export function transparentOpTypes(): string[] {
  return [...CAPABILITIES.keys()].sort();
}
