import yargs from "yargs";
import { parsePassList } from "./config";
import { type Logger, consoleLogger } from "./core/debug";
import { getNodeCount } from "./ir/census";
import { graphToJSON, readGraphFile, writeGraphFile } from "./ir/serialize";
import { optimizeGraph } from "./optimizer/pass-manager";

export type CliIO = {
  out(line: string): void;
  err(line: string): void;
};

const consoleIO: CliIO = {
  out: (line) => console.log(line),
  err: (line) => console.error(line),
};

function describeError(error: unknown): string {
  if (error instanceof Error) {
    return error.name === "Error" ? error.message : `${error.name}: ${error.message}`;
  }
  return String(error);
}

export function formatCensus(
  before: Readonly<Record<string, number>>,
  after: Readonly<Record<string, number>>,
): string[] {
  const ops = [...new Set([...Object.keys(before), ...Object.keys(after)])].sort();
  return ops.map((op) => `  ${op}: ${before[op] ?? 0} -> ${after[op] ?? 0}`);
}

function buildParser(argv: readonly string[]) {
  return yargs([...argv])
    .scriptName("tgopt")
    .usage("Usage: $0 <input.json> [options]")
    .parserConfiguration({
      "camel-case-expansion": true,
      "duplicate-arguments-array": false,
    })
    .strictOptions()
    .exitProcess(false)
    .demandCommand(1, "You need to provide an input graph (JSON)")
    .option("output", {
      alias: "o",
      describe: "Write the optimized graph to a file instead of stdout",
      type: "string",
    })
    .option("passes", {
      describe: "Comma-separated passes to run, in order (transpose, identity, dead-nodes)",
      type: "string",
    })
    .option("max-iterations", {
      describe: "Maximum number of pass-manager sweeps",
      type: "number",
    })
    .option("stats", {
      describe: "Print the op census before and after optimization",
      type: "boolean",
      default: false,
    })
    .fail((message, error) => {
      throw error ?? new Error(message);
    })
    .help();
}

/**
 * Run the command line on `argv` (without the node and script entries) and
 * return the exit code: 0 on success, also when the optimizer did not
 * converge, and 1 on any error.
 */
export async function runCli(argv: readonly string[], io: CliIO = consoleIO): Promise<number> {
  try {
    const args = await buildParser(argv).parseAsync();
    const [input] = args._;
    if (input === undefined) {
      // --help was printed
      return 0;
    }

    const logger: Logger = {
      debug: consoleLogger.debug,
      warn: (message) => io.err(`[tgopt] ${message}`),
    };
    const graph = readGraphFile(String(input));
    const result = optimizeGraph(graph, {
      passNames: args.passes === undefined ? undefined : parsePassList(args.passes),
      maxIterations: args.maxIterations,
      logger,
    });

    const report = args.output === undefined ? io.err : io.out;
    if (args.output === undefined) {
      io.out(JSON.stringify(graphToJSON(result.graph), null, 2));
    } else {
      writeGraphFile(args.output, result.graph);
    }

    if (args.stats) {
      const rewrites = Object.entries(result.stats.rewrites)
        .map(([name, count]) => `${name}=${count}`)
        .join(", ");
      report("census (before -> after):");
      for (const line of formatCensus(
        getNodeCount(graph, { recursive: true }),
        getNodeCount(result.graph, { recursive: true }),
      )) {
        report(line);
      }
      report(`iterations: ${result.iterations} (${result.converged ? "converged" : "not converged"})`);
      report(`rewrites: ${rewrites}`);
    }
    return 0;
  } catch (error) {
    io.err(`tgopt: ${describeError(error)}`);
    return 1;
  }
}
