import type {
  RawMapping,
  RawNode,
  RawScalarValue,
  SourcePosition,
} from "@/types/zone";

export function childPath(parent: string, key: string): string {
  return parent ? `${parent}.${key}` : key;
}

export function itemPath(parent: string, index: number): string {
  return `${parent}[${index}]`;
}

/** Collapse the scalar types the parsers produce onto the tree's value types */
export function toScalarValue(value: unknown): RawScalarValue {
  if (value === null || value === undefined) return null;
  if (
    typeof value === "string" ||
    typeof value === "number" ||
    typeof value === "boolean"
  ) {
    return value;
  }
  if (typeof value === "bigint") return Number(value);
  if (value instanceof Date) return value.toISOString();
  return String(value);
}

export function emptyMapping(path: string, position: SourcePosition): RawMapping {
  return { kind: "mapping", path, position, entries: [] };
}

export function describeNode(node: RawNode): string {
  if (node.kind !== "scalar") return `a ${node.kind}`;
  if (node.value === null) return "nothing";
  if (typeof node.value === "string") return `the string '${node.value}'`;
  return `the ${typeof node.value} ${String(node.value)}`;
}
