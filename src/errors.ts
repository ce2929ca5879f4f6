export type GraphIssueCode =
  | "duplicate-node-name"
  | "duplicate-producer"
  | "input-shadowed"
  | "outer-shadowed"
  | "dangling-input"
  | "dangling-output"
  | "cycle"
  | "invalid-permutation"
  | "invalid-loop"
  | "missing-subgraph";

export type GraphIssue = {
  code: GraphIssueCode;
  /** Name of the graph (or body graph) the issue was found in. */
  graph: string;
  node?: string;
  message: string;
};

function formatIssues(issues: readonly GraphIssue[]): string {
  if (issues.length === 0) {
    return "malformed graph";
  }
  const lines = issues.map((issue) => `  [${issue.code}] ${issue.graph}: ${issue.message}`);
  return `malformed graph (${issues.length} issue${issues.length === 1 ? "" : "s"}):\n${lines.join("\n")}`;
}

export class MalformedGraphError extends Error {
  name = "MalformedGraphError";
  readonly issues: readonly GraphIssue[];

  constructor(issues: readonly GraphIssue[]) {
    super(formatIssues(issues));
    this.issues = issues;
  }
}

/** A rewrite left the graph in a state that violates an IR invariant. */
export class GraphInvariantError extends Error {
  name = "GraphInvariantError";
}

export class InvalidPermutationError extends Error {
  name = "InvalidPermutationError";
}

export class GraphFormatError extends Error {
  name = "GraphFormatError";
}

export class UnsupportedOperatorError extends Error {
  name = "UnsupportedOperatorError";
}
