export {
  type Permutation,
  areInversePermutations,
  composePermutations,
  identityPermutation,
  invertPermutation,
  isIdentityPermutation,
  isPermutation,
  permutationsEqual,
  permutePartialShape,
  permuteShape,
  reversedPermutation,
} from "./core/permutation";
export { type PartialShape, isStaticShape } from "./core/shape";
export { type Logger, consoleLogger, silentLogger } from "./core/debug";
export { DEFAULT_MAX_ITERATIONS, type OptimizerConfig, loadOptimizerConfig } from "./config";
export {
  GraphFormatError,
  GraphInvariantError,
  type GraphIssue,
  type GraphIssueCode,
  InvalidPermutationError,
  MalformedGraphError,
  UnsupportedOperatorError,
} from "./errors";
export * from "./ir";
export * from "./optimizer";
export { type Feeds, executeGraph } from "./backend/cpu/executor";
export { Tensor, tensorFromArray } from "./backend/cpu/numeric";
export { type CliIO, runCli } from "./cli";
