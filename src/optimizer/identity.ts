import type { Graph } from "../ir/graph";
import type { IRNode } from "../ir/types";
import type { GraphPass, PassContext } from "./pass";

type IdentityRewrite = "rewired" | "renamed" | "passthrough";

/**
 * Identity elimination.
 *
 * An Identity whose output is internal is always removed. One that produces a
 * graph output is removed only when the output name can be kept: by renaming a
 * local producer to it, or, in a body graph, by binding the output slot to the
 * identity's input. Two declared outputs never collapse onto a single value,
 * and a top-level output never becomes a direct passthrough of an input.
 */
export class IdentityOptimizer implements GraphPass {
  readonly name = "identity";

  run(graph: Graph, context: PassContext): number {
    let rewrites = 0;
    for (const scope of graph.walk()) {
      rewrites += this.optimizeScope(scope, context);
    }
    return rewrites;
  }

  private optimizeScope(graph: Graph, context: PassContext): number {
    let rewrites = 0;
    let progressed = true;
    while (progressed) {
      progressed = false;
      for (const node of graph.nodes) {
        if (node.op !== "Identity") continue;
        const outcome = this.eliminate(graph, node);
        if (outcome) {
          context.logger.debug(`${this.name}: ${outcome} ${node.name} in ${graph.name}`);
          rewrites += 1;
          progressed = true;
          break;
        }
      }
    }
    return rewrites;
  }

  private eliminate(graph: Graph, node: IRNode): IdentityRewrite | undefined {
    if (node.inputs.length !== 1 || node.outputs.length !== 1) return undefined;
    const [input] = node.inputs;
    const [output] = node.outputs;
    if (input === "" || input === output) return undefined;

    if (!graph.isGraphOutput(output)) {
      graph.replaceAllInputs(output, input);
      graph.removeNode(node);
      graph.deleteValueInfo(output);
      return "rewired";
    }

    if (graph.isGraphOutput(input)) return undefined;

    if (graph.producerOf(input)) {
      graph.removeNode(node);
      graph.renameValue(input, output);
      return "renamed";
    }

    if (graph.parent === undefined) return undefined;

    graph.replaceAllInputs(output, input);
    graph.removeNode(node);
    graph.rebindOutput(output, input);
    return "passthrough";
  }
}
