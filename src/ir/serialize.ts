/**
 * JSON form of the graph IR.
 *
 * Attributes serialize as plain numbers, strings and number arrays; tensors as
 * `{ "tensor": { dtype, dims, data } }` and body graphs as `{ "graph": GraphJSON }`.
 */

import { readFileSync, writeFileSync } from "node:fs";
import type { PartialShape } from "../core/shape";
import { sizeOf } from "../core/shape";
import { GraphFormatError } from "../errors";
import { isGraphAttribute, isTensorAttribute } from "./attributes";
import { Graph } from "./graph";
import { type AttributeValue, type DType, DTYPES, type IRNode, type TensorValue, type ValueInfo } from "./types";

export type ValueInfoJSON = {
  name: string;
  dtype?: DType;
  shape?: (number | null)[];
};

export type TensorJSON = {
  dtype: DType;
  dims: number[];
  data: number[];
};

export type AttributeJSON = number | string | number[] | { tensor: TensorJSON } | { graph: GraphJSON };

export type NodeJSON = {
  name: string;
  op: string;
  inputs: string[];
  outputs: string[];
  attributes?: Record<string, AttributeJSON>;
};

export type GraphJSON = {
  name: string;
  inputs: ValueInfoJSON[];
  outputs: ValueInfoJSON[];
  valueInfo?: ValueInfoJSON[];
  nodes: NodeJSON[];
};

// ============================================================================
// Graph -> JSON
// ============================================================================

function valueInfoToJSON(info: ValueInfo): ValueInfoJSON {
  const json: ValueInfoJSON = { name: info.name };
  if (info.dtype !== undefined) json.dtype = info.dtype;
  if (info.shape !== undefined) json.shape = [...info.shape];
  return json;
}

function tensorToJSON(tensor: TensorValue): TensorJSON {
  return { dtype: tensor.dtype, dims: [...tensor.dims], data: [...tensor.data] };
}

function attributeToJSON(value: AttributeValue): AttributeJSON {
  if (isGraphAttribute(value)) return { graph: graphToJSON(value) };
  if (isTensorAttribute(value)) return { tensor: tensorToJSON(value) };
  if (typeof value === "number" || typeof value === "string") return value;
  return [...value];
}

export function graphToJSON(graph: Graph): GraphJSON {
  const boundary = new Set([...graph.inputNameList, ...graph.outputNameList]);
  const valueInfo: ValueInfoJSON[] = [];
  for (const node of graph.nodes) {
    for (const output of node.outputs) {
      const info = boundary.has(output) ? undefined : graph.getValueInfo(output);
      if (info && graph.producerOf(output) === node) valueInfo.push(valueInfoToJSON(info));
    }
  }

  const json: GraphJSON = {
    name: graph.name,
    inputs: graph.inputs.map(valueInfoToJSON),
    outputs: graph.outputs.map(valueInfoToJSON),
    nodes: graph.nodes.map((node) => {
      const entry: NodeJSON = {
        name: node.name,
        op: node.op,
        inputs: [...node.inputs],
        outputs: [...node.outputs],
      };
      const keys = Object.keys(node.attributes);
      if (keys.length > 0) {
        const attributes: Record<string, AttributeJSON> = {};
        for (const key of keys) attributes[key] = attributeToJSON(node.attributes[key]);
        entry.attributes = attributes;
      }
      return entry;
    }),
  };
  if (valueInfo.length > 0) json.valueInfo = valueInfo;
  return json;
}

// ============================================================================
// JSON -> Graph
// ============================================================================

function fail(path: string, message: string): never {
  throw new GraphFormatError(`${path}: ${message}`);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function expectRecord(value: unknown, path: string): Record<string, unknown> {
  if (!isRecord(value)) fail(path, "expected an object");
  return value;
}

function expectString(value: unknown, path: string): string {
  if (typeof value !== "string") fail(path, "expected a string");
  return value;
}

function expectArray(value: unknown, path: string): unknown[] {
  if (!Array.isArray(value)) fail(path, "expected an array");
  return value;
}

function expectNumber(value: unknown, path: string): number {
  if (typeof value !== "number" || !Number.isFinite(value)) fail(path, "expected a number");
  return value;
}

function expectStrings(value: unknown, path: string): string[] {
  return expectArray(value, path).map((item, i) => expectString(item, `${path}[${i}]`));
}

function expectNumbers(value: unknown, path: string): number[] {
  return expectArray(value, path).map((item, i) => expectNumber(item, `${path}[${i}]`));
}

function expectDims(value: unknown, path: string): number[] {
  const dims = expectNumbers(value, path);
  dims.forEach((dim, i) => {
    if (!Number.isInteger(dim) || dim < 0) fail(`${path}[${i}]`, "expected a non-negative integer");
  });
  return dims;
}

function isDType(value: unknown): value is DType {
  return typeof value === "string" && DTYPES.some((dtype) => dtype === value);
}

function expectDType(value: unknown, path: string): DType {
  if (!isDType(value)) fail(path, `expected one of ${DTYPES.join(", ")}`);
  return value;
}

function parseShape(value: unknown, path: string): PartialShape {
  return expectArray(value, path).map((dim, i) => {
    if (dim === null) return null;
    const n = expectNumber(dim, `${path}[${i}]`);
    if (!Number.isInteger(n) || n < 0) fail(`${path}[${i}]`, "expected a non-negative integer or null");
    return n;
  });
}

function parseValueInfo(value: unknown, path: string): ValueInfo {
  const record = expectRecord(value, path);
  const name = expectString(record.name, `${path}.name`);
  const dtype = record.dtype === undefined ? undefined : expectDType(record.dtype, `${path}.dtype`);
  const shape = record.shape === undefined ? undefined : parseShape(record.shape, `${path}.shape`);
  return { name, dtype, shape };
}

function parseTensor(value: unknown, path: string): TensorValue {
  const record = expectRecord(value, path);
  const dtype = expectDType(record.dtype, `${path}.dtype`);
  const dims = expectDims(record.dims, `${path}.dims`);
  const data = expectNumbers(record.data, `${path}.data`);
  if (data.length !== sizeOf(dims)) {
    fail(`${path}.data`, `expected ${sizeOf(dims)} element(s), got ${data.length}`);
  }
  return { dtype, dims, data };
}

function parseAttribute(value: unknown, path: string): AttributeValue {
  if (typeof value === "number") return expectNumber(value, path);
  if (typeof value === "string") return value;
  if (Array.isArray(value)) return expectNumbers(value, path);
  const record = expectRecord(value, path);
  if ("tensor" in record) return parseTensor(record.tensor, `${path}.tensor`);
  if ("graph" in record) return parseGraph(record.graph, `${path}.graph`);
  return fail(path, 'expected a number, string, number array, {"tensor": ...} or {"graph": ...}');
}

function parseNode(value: unknown, path: string): IRNode {
  const record = expectRecord(value, path);
  const attributes: Record<string, AttributeValue> = {};
  if (record.attributes !== undefined) {
    const raw = expectRecord(record.attributes, `${path}.attributes`);
    for (const [key, attr] of Object.entries(raw)) {
      attributes[key] = parseAttribute(attr, `${path}.attributes.${key}`);
    }
  }
  return {
    name: expectString(record.name, `${path}.name`),
    op: expectString(record.op, `${path}.op`),
    inputs: expectStrings(record.inputs, `${path}.inputs`),
    outputs: expectStrings(record.outputs, `${path}.outputs`),
    attributes,
  };
}

function parseGraph(value: unknown, path: string): Graph {
  const record = expectRecord(value, path);
  const valueInfo =
    record.valueInfo === undefined
      ? []
      : expectArray(record.valueInfo, `${path}.valueInfo`).map((item, i) =>
          parseValueInfo(item, `${path}.valueInfo[${i}]`),
        );
  return new Graph({
    name: expectString(record.name, `${path}.name`),
    inputs: expectArray(record.inputs, `${path}.inputs`).map((item, i) =>
      parseValueInfo(item, `${path}.inputs[${i}]`),
    ),
    outputs: expectArray(record.outputs, `${path}.outputs`).map((item, i) =>
      parseValueInfo(item, `${path}.outputs[${i}]`),
    ),
    valueInfo,
    nodes: expectArray(record.nodes, `${path}.nodes`).map((item, i) =>
      parseNode(item, `${path}.nodes[${i}]`),
    ),
  });
}

/**
 * Build a graph from its JSON form. Structural problems raise
 * `GraphFormatError` naming the offending path (e.g. `$.nodes[2].inputs`);
 * semantic checks are left to `validateGraph`.
 */
export function graphFromJSON(json: unknown): Graph {
  return parseGraph(json, "$");
}

// ============================================================================
// Files
// ============================================================================

export function readGraphFile(path: string): Graph {
  const text = readFileSync(path, "utf8");
  let json: unknown;
  try {
    json = JSON.parse(text);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new GraphFormatError(`${path}: invalid JSON (${reason})`);
  }
  return graphFromJSON(json);
}

export function writeGraphFile(path: string, graph: Graph): void {
  writeFileSync(path, `${JSON.stringify(graphToJSON(graph), null, 2)}\n`);
}
