/**
 * Reference interpreter for the graph IR.
 *
 * Runs a graph on the CPU numeric kernels so that a graph and its optimized
 * form can be compared on the same feeds. It favours obviousness over speed.
 */

import { reversedPermutation } from "../../core/permutation";
import { UnsupportedOperatorError } from "../../errors";
import {
  getFloatAttribute,
  getGraphAttribute,
  getIntAttribute,
  getIntsAttribute,
  getTensorAttribute,
} from "../../ir/attributes";
import type { Graph } from "../../ir/graph";
import type { IRNode } from "../../ir/types";
import {
  Tensor,
  add,
  concat,
  div,
  leakyRelu,
  map,
  maximum,
  mean,
  minimum,
  mul,
  permute,
  relu,
  shapeOf,
  sigmoid,
  sub,
  sum,
  take,
} from "./numeric";

export type Feeds = Readonly<Record<string, Tensor>>;

/** Value bindings of one graph, falling back to the enclosing graph's. */
class Scope {
  private readonly values = new Map<string, Tensor>();

  constructor(private readonly parent?: Scope) {}

  set(name: string, value: Tensor): void {
    this.values.set(name, value);
  }

  get(name: string): Tensor {
    const value = this.values.get(name) ?? this.parent?.lookup(name);
    if (!value) {
      throw new Error(`value ${name} is not defined`);
    }
    return value;
  }

  private lookup(name: string): Tensor | undefined {
    return this.values.get(name) ?? this.parent?.lookup(name);
  }
}

type Kernel = (node: IRNode, inputs: Tensor[], scope: Scope) => Tensor[];

const UNARY = new Map<string, (value: number) => number>([
  ["Abs", Math.abs],
  ["Neg", (value) => -value],
  ["Exp", Math.exp],
  ["Log", Math.log],
  ["Sqrt", Math.sqrt],
  ["Tanh", Math.tanh],
  ["Reciprocal", (value) => 1 / value],
  ["Floor", Math.floor],
  ["Ceil", Math.ceil],
]);

// Variadic ops fold left over their inputs.
const BINARY = new Map<string, (a: Tensor, b: Tensor) => Tensor>([
  ["Add", add],
  ["Sub", sub],
  ["Mul", mul],
  ["Div", div],
  ["Max", maximum],
  ["Min", minimum],
  ["Sum", add],
]);

function single(value: Tensor): Tensor[] {
  return [value];
}

function scalarOf(tensor: Tensor, what: string): number {
  if (tensor.size !== 1) {
    throw new Error(`${what} must hold a single element, got shape [${tensor.shape.join(", ")}]`);
  }
  return tensor.toArray()[0];
}

function reduceAxes(node: IRNode, inputs: Tensor[]): number[] | undefined {
  if (inputs.length > 1) return inputs[1].toArray();
  const axes = getIntsAttribute(node, "axes");
  return axes ? [...axes] : undefined;
}

function runLoop(node: IRNode, inputs: Tensor[], scope: Scope): Tensor[] {
  const body = getGraphAttribute(node, "body");
  if (!body) {
    throw new Error(`Loop ${node.name} has no body`);
  }
  const [tripCount, initialCond] = node.inputs;
  const limit = tripCount === "" ? Number.POSITIVE_INFINITY : scalarOf(inputs[0], `${node.name} trip count`);
  let cond = initialCond === "" ? true : scalarOf(inputs[1], `${node.name} condition`) !== 0;
  let carried = inputs.slice(2);
  if (body.outputNameList.length !== carried.length + 1) {
    throw new UnsupportedOperatorError(`Loop ${node.name}: scan outputs are not supported`);
  }

  for (let iteration = 0; iteration < limit && cond; iteration += 1) {
    const feeds: Record<string, Tensor> = {};
    const [iterName, condName, ...stateNames] = body.inputNameList;
    feeds[iterName] = new Tensor("int64", [], Float64Array.of(iteration));
    feeds[condName] = new Tensor("bool", [], Float64Array.of(cond ? 1 : 0));
    stateNames.forEach((name, i) => {
      feeds[name] = carried[i];
    });
    const [nextCond, ...nextState] = evaluate(body, feeds, scope);
    cond = scalarOf(nextCond, `${node.name} condition`) !== 0;
    carried = nextState;
  }
  return carried;
}

function runIf(node: IRNode, inputs: Tensor[], scope: Scope): Tensor[] {
  const branchName = scalarOf(inputs[0], `${node.name} condition`) !== 0 ? "then_branch" : "else_branch";
  const branch = getGraphAttribute(node, branchName);
  if (!branch) {
    throw new Error(`If ${node.name} has no ${branchName}`);
  }
  return evaluate(branch, {}, scope);
}

const KERNELS = new Map<string, Kernel>(Object.entries({
  Constant: (node) => {
    const value = getTensorAttribute(node, "value");
    if (!value) {
      throw new Error(`Constant ${node.name} has no value`);
    }
    return single(new Tensor(value.dtype, value.dims, Float64Array.from(value.data)));
  },
  Identity: (_node, [x]) => single(x),
  Transpose: (node, [x]) =>
    single(permute(x, getIntsAttribute(node, "perm") ?? reversedPermutation(x.rank)).contiguous()),
  Relu: (_node, [x]) => single(relu(x)),
  LeakyRelu: (node, [x]) => single(leakyRelu(x, getFloatAttribute(node, "alpha", 0.01))),
  Sigmoid: (_node, [x]) => single(sigmoid(x)),
  Shape: (_node, [x]) => single(shapeOf(x)),
  Gather: (node, [data, indices]) => {
    if (getIntAttribute(node, "axis", 0) !== 0) {
      throw new UnsupportedOperatorError(`Gather ${node.name}: only axis 0 is supported`);
    }
    return single(take(data, indices));
  },
  Concat: (node, inputs) => {
    const axis = getIntAttribute(node, "axis");
    if (axis === undefined) {
      throw new Error(`Concat ${node.name} has no axis`);
    }
    return single(concat(inputs, axis));
  },
  ReduceSum: (node, inputs) =>
    single(sum(inputs[0], { axes: reduceAxes(node, inputs), keepdims: getIntAttribute(node, "keepdims", 1) === 1 })),
  ReduceMean: (node, inputs) =>
    single(mean(inputs[0], { axes: reduceAxes(node, inputs), keepdims: getIntAttribute(node, "keepdims", 1) === 1 })),
  Loop: runLoop,
  If: runIf,
} satisfies Record<string, Kernel>));

function runNode(node: IRNode, scope: Scope): Tensor[] {
  const inputs = node.inputs.filter((name) => name !== "").map((name) => scope.get(name));

  const unary = UNARY.get(node.op);
  if (unary) return single(map(inputs[0], unary));

  const binary = BINARY.get(node.op);
  if (binary) {
    if (inputs.length === 0) {
      throw new Error(`${node.op} ${node.name} has no inputs`);
    }
    return single(inputs.slice(1).reduce(binary, inputs[0]));
  }

  const kernel = KERNELS.get(node.op);
  if (!kernel) {
    throw new UnsupportedOperatorError(`no kernel for ${node.op} (node ${node.name})`);
  }
  // Optional inputs keep their slot for control-flow ops.
  const positional = node.op === "Loop" ? loopInputs(node, scope) : inputs;
  return kernel(node, positional, scope);
}

function loopInputs(node: IRNode, scope: Scope): Tensor[] {
  const placeholder = new Tensor("bool", [], Float64Array.of(1));
  return node.inputs.map((name) => (name === "" ? placeholder : scope.get(name)));
}

function evaluate(graph: Graph, feeds: Feeds, parent?: Scope): Tensor[] {
  const scope = new Scope(parent);
  for (const name of graph.inputNameList) {
    const value = feeds[name];
    if (!value) {
      throw new Error(`missing feed for input ${name} of graph ${graph.name}`);
    }
    scope.set(name, value);
  }
  for (const node of graph.topologicalOrder()) {
    const results = runNode(node, scope);
    node.outputs.forEach((output, i) => {
      if (output === "") return;
      const value = results[i];
      if (!value) {
        throw new Error(`node ${node.name} produced no value for ${output}`);
      }
      scope.set(output, value);
    });
  }
  return graph.outputNameList.map((name) => scope.get(name));
}

/**
 * Run `graph` on `feeds` (one tensor per graph input) and return its outputs
 * keyed by output name. Body graphs read enclosing values by name.
 */
export function executeGraph(graph: Graph, feeds: Feeds): Record<string, Tensor> {
  const values = evaluate(graph, feeds);
  const outputs: Record<string, Tensor> = {};
  graph.outputNameList.forEach((name, i) => {
    outputs[name] = values[i];
  });
  return outputs;
}
