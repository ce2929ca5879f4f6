import type { Logger } from "../core/debug";
import type { Graph } from "../ir/graph";

export type PassContext = {
  logger: Logger;
};

/**
 * A graph rewrite. `run` rewrites the graph (and its body graphs) in place and
 * returns how many rewrites it applied; 0 means the graph was left unchanged.
 * Running a pass on its own output must apply no rewrites.
 */
export interface GraphPass {
  readonly name: string;
  run(graph: Graph, context: PassContext): number;
}
