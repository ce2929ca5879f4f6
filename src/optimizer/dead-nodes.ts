import type { Graph } from "../ir/graph";
import type { GraphPass, PassContext } from "./pass";

/**
 * Dead-node elimination: removes nodes none of whose outputs are read (directly
 * or by a body graph) or declared as graph outputs, until none remain.
 */
export class DeadNodeEliminator implements GraphPass {
  readonly name = "dead-nodes";

  run(graph: Graph, context: PassContext): number {
    let removed = 0;
    for (const scope of graph.walk()) {
      let progressed = true;
      while (progressed) {
        progressed = false;
        // Reverse topological order removes whole dead chains in one sweep.
        for (const node of scope.topologicalOrder().reverse()) {
          if (scope.removeNodeIfUnreferenced(node)) {
            context.logger.debug(`${this.name}: removed ${node.name} (${node.op}) in ${scope.name}`);
            removed += 1;
            progressed = true;
          }
        }
      }
    }
    return removed;
  }
}
