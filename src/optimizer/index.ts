export { DeadNodeEliminator } from "./dead-nodes";
export { IdentityOptimizer } from "./identity";
export {
  type OpCapability,
  type OpCapabilityKind,
  getOpCapability,
  isBroadcastTransparent,
  isShapeRewrite,
  isTransposeTransparent,
  isUnaryTransparent,
  transparentOpTypes,
} from "./handlers";
export type { GraphPass, PassContext } from "./pass";
export {
  DEFAULT_PASS_NAMES,
  type OptimizeOptions,
  type OptimizeResult,
  PassManager,
  type PassManagerOptions,
  type PassManagerRun,
  availablePasses,
  createPass,
  defaultPasses,
  optimizeGraph,
} from "./pass-manager";
export { TransposeOptimizer, resolvePermutation } from "./transpose";
