/**
 * Optimizer settings read from the environment.
 *
 *   TGOPT_MAX_ITERATIONS  ceiling on pass-manager sweeps (positive integer)
 *   TGOPT_PASSES          comma-separated pass names to run, in order
 *   TGOPT_DEBUG           any non-empty value enables debug logging
 *
 * Explicit options passed to `optimizeGraph` take precedence.
 */

export const DEFAULT_MAX_ITERATIONS = 8;

export type OptimizerConfig = {
  maxIterations: number;
  /** Undefined means the default pipeline. */
  passes?: string[];
};

type Env = Record<string, string | undefined>;

function defaultEnv(): Env {
  return typeof process !== "undefined" ? process.env : {};
}

export function parsePositiveInt(raw: string, label: string): number {
  const value = Number(raw.trim());
  if (!Number.isInteger(value) || value <= 0) {
    throw new Error(`${label} must be a positive integer, got "${raw}"`);
  }
  return value;
}

export function parsePassList(raw: string): string[] {
  return raw
    .split(",")
    .map((name) => name.trim())
    .filter((name) => name.length > 0);
}

export function loadOptimizerConfig(env: Env = defaultEnv()): OptimizerConfig {
  const config: OptimizerConfig = { maxIterations: DEFAULT_MAX_ITERATIONS };
  const rawIterations = env.TGOPT_MAX_ITERATIONS;
  if (rawIterations !== undefined && rawIterations.trim() !== "") {
    config.maxIterations = parsePositiveInt(rawIterations, "TGOPT_MAX_ITERATIONS");
  }
  const rawPasses = env.TGOPT_PASSES;
  if (rawPasses !== undefined && rawPasses.trim() !== "") {
    config.passes = parsePassList(rawPasses);
  }
  return config;
}
