import { Graph } from "./graph";
import type { AttributeValue, IRNode, TensorValue } from "./types";

export function isGraphAttribute(value: AttributeValue | undefined): value is Graph {
  return value instanceof Graph;
}

export function isTensorAttribute(value: AttributeValue | undefined): value is TensorValue {
  return (
    typeof value === "object" &&
    !Array.isArray(value) &&
    !(value instanceof Graph) &&
    "dims" in value &&
    "data" in value
  );
}

export function isIntsAttribute(value: AttributeValue | undefined): value is readonly number[] {
  return Array.isArray(value) && value.every((v) => typeof v === "number");
}

export function getIntAttribute(node: IRNode, key: string): number | undefined;
export function getIntAttribute(node: IRNode, key: string, fallback: number): number;
export function getIntAttribute(
  node: IRNode,
  key: string,
  fallback?: number,
): number | undefined {
  const value = node.attributes[key];
  return typeof value === "number" ? value : fallback;
}

export function getFloatAttribute(node: IRNode, key: string, fallback: number): number {
  const value = node.attributes[key];
  return typeof value === "number" ? value : fallback;
}

export function getIntsAttribute(node: IRNode, key: string): readonly number[] | undefined {
  const value = node.attributes[key];
  return isIntsAttribute(value) ? value : undefined;
}

export function getTensorAttribute(node: IRNode, key: string): TensorValue | undefined {
  const value = node.attributes[key];
  return isTensorAttribute(value) ? value : undefined;
}

export function getGraphAttribute(node: IRNode, key: string): Graph | undefined {
  const value = node.attributes[key];
  return isGraphAttribute(value) ? value : undefined;
}

/**
 * Literal value of a `Constant` node, or undefined for any other node.
 */
export function constantValue(node: IRNode | undefined): TensorValue | undefined {
  if (!node || node.op !== "Constant" || node.inputs.length !== 0 || node.outputs.length !== 1) {
    return undefined;
  }
  return getTensorAttribute(node, "value");
}
