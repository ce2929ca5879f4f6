import { MalformedGraphError } from "../errors";
import type { AttributeValue, Attributes, IRNode, ValueInfo, ValueResolution } from "./types";

export type GraphInit = {
  name?: string;
  nodes?: readonly IRNode[];
  inputs?: readonly ValueInfo[];
  outputs?: readonly ValueInfo[];
  /** Type/shape information for intermediate values. */
  valueInfo?: readonly ValueInfo[];
};

export type SubgraphRef = {
  host: IRNode;
  attribute: string;
  graph: Graph;
};

type GraphIndex = {
  producers: Map<string, IRNode>;
  consumers: Map<string, IRNode[]>;
  byName: Map<string, IRNode>;
  position: Map<IRNode, number>;
};

function isSubgraph(value: AttributeValue): value is Graph {
  return value instanceof Graph;
}

function subgraphsOf(node: IRNode): SubgraphRef[] {
  const refs: SubgraphRef[] = [];
  for (const [attribute, value] of Object.entries(node.attributes)) {
    if (isSubgraph(value)) {
      refs.push({ host: node, attribute, graph: value });
    }
  }
  return refs;
}

/**
 * A dataflow graph: nodes connected by named values, with named inputs and
 * ordered outputs. Graphs held in node attributes are body graphs whose
 * `parent` is the graph owning the host node; names a body does not define are
 * looked up through the parent chain.
 *
 * Every mutation goes through the methods below, which keep producer/consumer
 * lookups consistent after each call.
 */
export class Graph {
  readonly name: string;
  private nodeList: IRNode[];
  private inputNames: string[];
  private outputNames: string[];
  private readonly infos = new Map<string, ValueInfo>();
  private parentGraph: Graph | undefined;
  private index: GraphIndex | undefined;

  constructor(init: GraphInit = {}) {
    this.name = init.name ?? "graph";
    this.nodeList = [];
    this.inputNames = [];
    this.outputNames = [];
    for (const info of init.valueInfo ?? []) this.infos.set(info.name, info);
    for (const info of init.inputs ?? []) {
      this.inputNames.push(info.name);
      this.infos.set(info.name, info);
    }
    for (const info of init.outputs ?? []) {
      this.outputNames.push(info.name);
      this.infos.set(info.name, info);
    }
    for (const node of init.nodes ?? []) {
      this.adoptSubgraphs(node);
      this.nodeList.push(node);
    }
  }

  // ==========================================================================
  // Structure
  // ==========================================================================

  get nodes(): readonly IRNode[] {
    return this.nodeList;
  }

  get inputs(): ValueInfo[] {
    return this.inputNames.map((name) => this.infos.get(name) ?? { name });
  }

  get outputs(): ValueInfo[] {
    return this.outputNames.map((name) => this.infos.get(name) ?? { name });
  }

  get inputNameList(): readonly string[] {
    return this.inputNames;
  }

  get outputNameList(): readonly string[] {
    return this.outputNames;
  }

  /** The graph owning the host node of this body graph, if any. */
  get parent(): Graph | undefined {
    return this.parentGraph;
  }

  root(): Graph {
    let graph: Graph = this;
    while (graph.parentGraph) graph = graph.parentGraph;
    return graph;
  }

  getNode(name: string): IRNode | undefined {
    return this.getIndex().byName.get(name);
  }

  hasNode(node: IRNode): boolean {
    return this.getIndex().position.has(node);
  }

  subgraphs(): SubgraphRef[] {
    return this.nodeList.flatMap(subgraphsOf);
  }

  /** This graph and every nested body graph, innermost first. */
  walk(): Graph[] {
    const out: Graph[] = [];
    for (const { graph } of this.subgraphs()) {
      out.push(...graph.walk());
    }
    out.push(this);
    return out;
  }

  // ==========================================================================
  // Queries
  // ==========================================================================

  isGraphInput(name: string): boolean {
    return this.inputNames.includes(name);
  }

  isGraphOutput(name: string): boolean {
    return this.outputNames.includes(name);
  }

  producerOf(value: string): IRNode | undefined {
    return this.getIndex().producers.get(value);
  }

  /**
   * Nodes reading `value`, in node-list order. A host node counts as a consumer
   * when one of its body graphs refers to `value` from this scope.
   */
  consumersOf(value: string): IRNode[] {
    return (this.getIndex().consumers.get(value) ?? []).slice();
  }

  isDefinedLocally(name: string): boolean {
    return this.isGraphInput(name) || this.producerOf(name) !== undefined;
  }

  resolve(name: string): ValueResolution | undefined {
    if (this.isGraphInput(name)) {
      return { kind: "input", graph: this };
    }
    const node = this.producerOf(name);
    if (node) {
      return { kind: "node", graph: this, node };
    }
    return this.parentGraph?.resolve(name);
  }

  /**
   * Names this graph (or a graph nested in it) reads without defining them:
   * the bindings it takes from enclosing scopes.
   */
  outerReferences(): Set<string> {
    const refs = new Set<string>();
    const note = (name: string) => {
      if (name !== "" && !this.isDefinedLocally(name)) refs.add(name);
    };
    for (const node of this.nodeList) {
      for (const input of node.inputs) note(input);
      for (const { graph } of subgraphsOf(node)) {
        for (const name of graph.outerReferences()) note(name);
      }
    }
    for (const output of this.outputNames) note(output);
    return refs;
  }

  getValueInfo(name: string): ValueInfo | undefined {
    return this.infos.get(name) ?? this.parentGraph?.getValueInfo(name);
  }

  /** Every value and node name used anywhere in this graph. */
  names(): Set<string> {
    const names = new Set<string>([...this.inputNames, ...this.outputNames, ...this.infos.keys()]);
    for (const node of this.nodeList) {
      names.add(node.name);
      for (const input of node.inputs) names.add(input);
      for (const output of node.outputs) names.add(output);
      for (const { graph } of subgraphsOf(node)) {
        for (const name of graph.names()) names.add(name);
      }
    }
    return names;
  }

  /** A name not used anywhere in the enclosing graph tree. */
  uniqueName(base: string): string {
    const taken = this.root().names();
    if (!taken.has(base)) return base;
    let suffix = 1;
    while (taken.has(`${base}__${suffix}`)) suffix += 1;
    return `${base}__${suffix}`;
  }

  /**
   * Nodes in dependency order, stable with respect to the node list.
   * Throws `MalformedGraphError` when the graph has a cycle.
   */
  topologicalOrder(): IRNode[] {
    const { producers, position } = this.getIndex();
    const pending = new Map<IRNode, number>();
    const dependents = new Map<IRNode, IRNode[]>();

    for (const node of this.nodeList) {
      const deps = new Set<IRNode>();
      for (const name of this.readsOf(node)) {
        const producer = producers.get(name);
        if (producer) deps.add(producer);
      }
      pending.set(node, deps.size);
      for (const dep of deps) {
        const list = dependents.get(dep);
        if (list) list.push(node);
        else dependents.set(dep, [node]);
      }
    }

    const byPosition = (a: IRNode, b: IRNode) =>
      (position.get(a) ?? 0) - (position.get(b) ?? 0);
    const ready = this.nodeList.filter((node) => pending.get(node) === 0);
    const order: IRNode[] = [];
    while (ready.length > 0) {
      ready.sort(byPosition);
      const node = ready.shift();
      if (!node) break;
      order.push(node);
      for (const dependent of dependents.get(node) ?? []) {
        const remaining = (pending.get(dependent) ?? 0) - 1;
        pending.set(dependent, remaining);
        if (remaining === 0) ready.push(dependent);
      }
    }

    if (order.length !== this.nodeList.length) {
      const stuck = this.nodeList
        .filter((node) => (pending.get(node) ?? 0) > 0)
        .map((node) => node.name);
      throw new MalformedGraphError([
        {
          code: "cycle",
          graph: this.name,
          message: `cycle through node(s) ${stuck.join(", ")}`,
        },
      ]);
    }
    return order;
  }

  // ==========================================================================
  // Mutation
  // ==========================================================================

  addNode(node: IRNode): IRNode {
    this.adoptSubgraphs(node);
    this.nodeList.push(node);
    this.invalidate();
    return node;
  }

  /** Put `next` in the node-list slot of `current`. */
  replaceNode(current: IRNode, next: IRNode): IRNode {
    const slot = this.nodeList.indexOf(current);
    if (slot === -1) {
      throw new Error(`graph ${this.name} has no node ${current.name}`);
    }
    this.adoptSubgraphs(next);
    this.nodeList[slot] = next;
    this.invalidate();
    return next;
  }

  /**
   * Drop a node without checking its outputs. Callers must have re-homed every
   * output the node produced (see `removeNodeIfUnreferenced` for the checked form).
   */
  removeNode(node: IRNode): void {
    const slot = this.nodeList.indexOf(node);
    if (slot === -1) {
      throw new Error(`graph ${this.name} has no node ${node.name}`);
    }
    this.nodeList.splice(slot, 1);
    this.invalidate();
  }

  /**
   * Remove `node` unless one of its outputs is still read or is a graph output.
   * Returns whether the node was removed.
   */
  removeNodeIfUnreferenced(node: IRNode): boolean {
    if (!this.hasNode(node)) return false;
    for (const output of node.outputs) {
      if (this.isGraphOutput(output)) return false;
      if (this.consumersOf(output).some((consumer) => consumer !== node)) return false;
    }
    this.removeNode(node);
    for (const output of node.outputs) {
      this.infos.delete(output);
    }
    return true;
  }

  /**
   * Make every reader of `oldValue` read `newValue` instead, including body
   * graphs that refer to `oldValue` from this scope. Graph outputs are not
   * touched (see `rebindOutput`).
   */
  replaceAllInputs(oldValue: string, newValue: string): void {
    if (oldValue === newValue) return;
    for (const consumer of this.consumersOf(oldValue)) {
      this.rewireConsumer(consumer, oldValue, newValue);
    }
  }

  /**
   * Rename a value everywhere it appears in this scope: its producer, its readers,
   * graph inputs/outputs, nested references and value info. `newValue` must be
   * unused.
   */
  renameValue(oldValue: string, newValue: string): void {
    if (oldValue === newValue) return;
    if (this.isDefinedLocally(newValue)) {
      throw new Error(`cannot rename ${oldValue} to ${newValue}: ${newValue} is already defined`);
    }
    const producer = this.producerOf(oldValue);
    if (producer) {
      this.replaceNode(producer, {
        ...producer,
        outputs: producer.outputs.map((output) => (output === oldValue ? newValue : output)),
      });
    }
    this.replaceAllInputs(oldValue, newValue);
    this.inputNames = this.inputNames.map((name) => (name === oldValue ? newValue : name));
    this.outputNames = this.outputNames.map((name) => (name === oldValue ? newValue : name));
    const info = this.infos.get(oldValue);
    this.infos.delete(oldValue);
    if (info && !this.infos.has(newValue)) {
      this.infos.set(newValue, { ...info, name: newValue });
    }
    this.invalidate();
  }

  /** Point every graph output slot named `oldName` at the value `newName`. */
  rebindOutput(oldName: string, newName: string): void {
    if (!this.outputNames.includes(oldName)) {
      throw new Error(`graph ${this.name} has no output ${oldName}`);
    }
    this.outputNames = this.outputNames.map((name) => (name === oldName ? newName : name));
    const info = this.infos.get(oldName);
    if (info && !this.getValueInfo(newName)) {
      this.infos.set(newName, { ...info, name: newName });
    }
    if (!this.outputNames.includes(oldName) && !this.producerOf(oldName)) {
      this.infos.delete(oldName);
    }
    this.invalidate();
  }

  setValueInfo(info: ValueInfo): void {
    this.infos.set(info.name, info);
  }

  deleteValueInfo(name: string): void {
    if (this.isGraphInput(name) || this.isGraphOutput(name)) return;
    this.infos.delete(name);
  }

  /** Reorder the node list into dependency order. */
  sortTopologically(): void {
    this.nodeList = this.topologicalOrder();
    this.invalidate();
  }

  clone(): Graph {
    return new Graph({
      name: this.name,
      inputs: this.inputs,
      outputs: this.outputs,
      valueInfo: [...this.infos.values()],
      nodes: this.nodeList.map((node) => ({
        ...node,
        attributes: this.mapSubgraphs(node, (graph) => graph.clone()),
      })),
    });
  }

  // ==========================================================================
  // Internals
  // ==========================================================================

  private replaceOuterReference(oldValue: string, newValue: string): Graph {
    if (this.isDefinedLocally(oldValue)) return this;
    for (const consumer of this.consumersOf(oldValue)) {
      this.rewireConsumer(consumer, oldValue, newValue);
    }
    if (this.outputNames.includes(oldValue)) {
      this.outputNames = this.outputNames.map((name) => (name === oldValue ? newValue : name));
      this.invalidate();
    }
    return this;
  }

  private rewireConsumer(consumer: IRNode, oldValue: string, newValue: string): void {
    const inputs = consumer.inputs.map((input) => (input === oldValue ? newValue : input));
    const attributes = this.mapSubgraphs(consumer, (graph) =>
      graph.replaceOuterReference(oldValue, newValue),
    );
    this.replaceNode(consumer, { ...consumer, inputs, attributes });
  }

  private mapSubgraphs(node: IRNode, fn: (graph: Graph) => Graph): Attributes {
    let changed = false;
    const attributes: Record<string, AttributeValue> = {};
    for (const [key, value] of Object.entries(node.attributes)) {
      if (isSubgraph(value)) {
        const mapped = fn(value);
        changed = changed || mapped !== value;
        attributes[key] = mapped;
      } else {
        attributes[key] = value;
      }
    }
    return changed ? attributes : node.attributes;
  }

  private adoptSubgraphs(node: IRNode): void {
    for (const { graph } of subgraphsOf(node)) {
      graph.parentGraph = this;
    }
  }

  /** Names a node reads, directly or through its body graphs. */
  private readsOf(node: IRNode): Set<string> {
    const reads = new Set<string>();
    for (const input of node.inputs) {
      if (input !== "") reads.add(input);
    }
    for (const { graph } of subgraphsOf(node)) {
      for (const name of graph.outerReferences()) reads.add(name);
    }
    return reads;
  }

  private invalidate(): void {
    this.index = undefined;
    // a body's outer references feed the host graph's consumer index
    this.parentGraph?.invalidate();
  }

  private getIndex(): GraphIndex {
    if (this.index) return this.index;
    const producers = new Map<string, IRNode>();
    const consumers = new Map<string, IRNode[]>();
    const byName = new Map<string, IRNode>();
    const position = new Map<IRNode, number>();
    this.nodeList.forEach((node, i) => {
      position.set(node, i);
      if (!byName.has(node.name)) byName.set(node.name, node);
      for (const output of node.outputs) {
        if (output !== "" && !producers.has(output)) producers.set(output, node);
      }
    });
    for (const node of this.nodeList) {
      for (const name of this.readsOf(node)) {
        const list = consumers.get(name);
        if (list) list.push(node);
        else consumers.set(name, [node]);
      }
    }
    this.index = { producers, consumers, byName, position };
    return this.index;
  }
}
