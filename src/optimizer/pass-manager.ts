import { type Logger, consoleLogger } from "../core/debug";
import { loadOptimizerConfig } from "../config";
import { GraphInvariantError } from "../errors";
import { totalNodeCount } from "../ir/census";
import type { Graph } from "../ir/graph";
import { assertValidGraph, validateGraph } from "../ir/validate";
import { DeadNodeEliminator } from "./dead-nodes";
import { IdentityOptimizer } from "./identity";
import type { GraphPass } from "./pass";
import { TransposeOptimizer } from "./transpose";

// ============================================================================
// Pass registry
// ============================================================================

const PASS_FACTORIES = new Map<string, () => GraphPass>([
  ["transpose", () => new TransposeOptimizer()],
  ["identity", () => new IdentityOptimizer()],
  ["dead-nodes", () => new DeadNodeEliminator()],
]);

export const DEFAULT_PASS_NAMES: readonly string[] = ["transpose", "identity", "dead-nodes"];

export function availablePasses(): string[] {
  return [...PASS_FACTORIES.keys()];
}

export function createPass(name: string): GraphPass {
  const factory = PASS_FACTORIES.get(name);
  if (!factory) {
    throw new Error(`unknown pass "${name}" (available: ${availablePasses().join(", ")})`);
  }
  return factory();
}

export function defaultPasses(): GraphPass[] {
  return DEFAULT_PASS_NAMES.map(createPass);
}

// ============================================================================
// Fixpoint driver
// ============================================================================

export type PassManagerOptions = {
  maxIterations: number;
  logger?: Logger;
};

export type PassManagerRun = {
  converged: boolean;
  /** Sweeps performed, including the final clean one. */
  iterations: number;
  rewrites: Record<string, number>;
  warnings: string[];
};

/**
 * Runs a fixed pipeline of passes over a graph until a full sweep applies no
 * rewrite, or `maxIterations` sweeps have run.
 */
export class PassManager {
  private readonly passes: readonly GraphPass[];
  private readonly maxIterations: number;
  private readonly logger: Logger;

  constructor(passes: readonly GraphPass[], options: PassManagerOptions) {
    if (!Number.isInteger(options.maxIterations) || options.maxIterations <= 0) {
      throw new Error(`maxIterations must be a positive integer, got ${options.maxIterations}`);
    }
    this.passes = passes;
    this.maxIterations = options.maxIterations;
    this.logger = options.logger ?? consoleLogger;
  }

  get passNames(): string[] {
    return this.passes.map((pass) => pass.name);
  }

  /** Rewrites `graph` in place. */
  run(graph: Graph): PassManagerRun {
    const rewrites: Record<string, number> = {};
    for (const pass of this.passes) rewrites[pass.name] = 0;
    const context = { logger: this.logger };

    let iterations = 0;
    while (iterations < this.maxIterations) {
      iterations += 1;
      let sweep = 0;
      for (const pass of this.passes) {
        const applied = pass.run(graph, context);
        rewrites[pass.name] += applied;
        sweep += applied;
      }
      this.logger.debug(`sweep ${iterations}: ${sweep} rewrite(s)`);
      if (sweep === 0) {
        return { converged: true, iterations, rewrites, warnings: [] };
      }
    }

    const warning = `graph ${graph.name} did not reach a fixpoint after ${this.maxIterations} iteration(s)`;
    this.logger.warn(warning);
    return { converged: false, iterations, rewrites, warnings: [warning] };
  }
}

// ============================================================================
// Entry point
// ============================================================================

export type OptimizeOptions = {
  /** Pass instances to run, in order. Takes precedence over `passNames`. */
  passes?: readonly GraphPass[];
  /** Registry names to run, in order (default: TGOPT_PASSES, else the default pipeline). */
  passNames?: readonly string[];
  /** Sweep ceiling (default: TGOPT_MAX_ITERATIONS, else 8). */
  maxIterations?: number;
  logger?: Logger;
};

export type OptimizeResult = {
  graph: Graph;
  converged: boolean;
  iterations: number;
  warnings: string[];
  stats: {
    originalNodeCount: number;
    finalNodeCount: number;
    /** Rewrites applied per pass name. */
    rewrites: Record<string, number>;
  };
};

/**
 * Optimize a copy of `graph`. The input is validated first and left untouched.
 * Node counts in `stats` include body graphs.
 */
export function optimizeGraph(graph: Graph, options: OptimizeOptions = {}): OptimizeResult {
  assertValidGraph(graph);

  const config = loadOptimizerConfig();
  const passes =
    options.passes ?? (options.passNames ?? config.passes ?? DEFAULT_PASS_NAMES).map(createPass);
  const manager = new PassManager(passes, {
    maxIterations: options.maxIterations ?? config.maxIterations,
    logger: options.logger,
  });

  const working = graph.clone();
  const run = manager.run(working);

  const issues = validateGraph(working);
  if (issues.length > 0) {
    const detail = issues.map((issue) => `[${issue.code}] ${issue.graph}: ${issue.message}`);
    throw new GraphInvariantError(`optimized graph is invalid:\n  ${detail.join("\n  ")}`);
  }

  return {
    graph: working,
    converged: run.converged,
    iterations: run.iterations,
    warnings: run.warnings,
    stats: {
      originalNodeCount: totalNodeCount(graph, { recursive: true }),
      finalNodeCount: totalNodeCount(working, { recursive: true }),
      rewrites: run.rewrites,
    },
  };
}
