import { parseTOML } from "toml-eslint-parser";
import type { AST } from "toml-eslint-parser";
import { DecodeError } from "./errors";
import { childPath, itemPath, toScalarValue } from "./raw-node";
import type { RawEntry, RawMapping, RawNode, SourcePosition } from "@/types/zone";

/**
 * Decode TOML into a position-annotated tree. Table headers and dotted keys
 * are folded into nested mappings; `[[array]]` tables append a mapping to a
 * sequence. AST columns are 0-based and are shifted to 1-based here.
 */
export function decodeToml(text: string): RawNode {
  let program: AST.TOMLProgram;
  try {
    program = parseTOML(text);
  } catch (err) {
    throw new DecodeError("toml", {
      path: "",
      position: errorPosition(err),
      message: err instanceof Error ? err.message : String(err),
    });
  }

  const root: RawMapping = {
    kind: "mapping",
    path: "",
    position: { line: 1, column: 1 },
    entries: [],
  };
  for (const item of program.body[0].body) {
    if (item.type === "TOMLKeyValue") {
      assign(root, item);
    } else {
      const table = openTable(root, item);
      for (const kv of item.body) assign(table, kv);
    }
  }
  return root;
}

function errorPosition(err: unknown): SourcePosition | undefined {
  if (
    typeof err === "object" &&
    err !== null &&
    "lineNumber" in err &&
    "column" in err &&
    typeof err.lineNumber === "number" &&
    typeof err.column === "number"
  ) {
    return { line: err.lineNumber, column: err.column };
  }
  return undefined;
}

function positionOf(node: {
  loc: { start: { line: number; column: number } };
}): SourcePosition {
  return { line: node.loc.start.line, column: node.loc.start.column + 1 };
}

function keyNames(key: AST.TOMLKey): string[] {
  return key.keys.map((k) => (k.type === "TOMLBare" ? k.name : k.value));
}

function findEntry(mapping: RawMapping, key: string): RawEntry | undefined {
  return mapping.entries.find((e) => e.key === key);
}

/**
 * Step into `key` below `mapping`, creating an empty mapping when the key is
 * new. Through an array of tables the walk continues in its last element.
 */
function descend(
  mapping: RawMapping,
  key: string,
  position: SourcePosition,
): RawMapping {
  const existing = findEntry(mapping, key);
  if (!existing) {
    const created: RawMapping = {
      kind: "mapping",
      path: childPath(mapping.path, key),
      position,
      entries: [],
    };
    mapping.entries.push({ key, keyPosition: position, value: created });
    return created;
  }
  let node = existing.value;
  if (node.kind === "sequence") {
    const last = node.items[node.items.length - 1];
    if (last) node = last;
  }
  if (node.kind !== "mapping") {
    throw new DecodeError("toml", {
      path: childPath(mapping.path, key),
      position,
      message: `key '${key}' is already defined as a value`,
    });
  }
  return node;
}

function openTable(root: RawMapping, table: AST.TOMLTable): RawMapping {
  const names = keyNames(table.key);
  const position = positionOf(table);
  let parent = root;
  for (const name of names.slice(0, -1)) {
    parent = descend(parent, name, position);
  }
  const last = names[names.length - 1];
  if (table.kind === "standard") return descend(parent, last, position);

  const path = childPath(parent.path, last);
  let entry = findEntry(parent, last);
  if (!entry) {
    entry = {
      key: last,
      keyPosition: position,
      value: { kind: "sequence", path, position, items: [] },
    };
    parent.entries.push(entry);
  }
  const sequence = entry.value;
  if (sequence.kind !== "sequence") {
    throw new DecodeError("toml", {
      path,
      position,
      message: `key '${last}' is already defined and is not an array of tables`,
    });
  }
  const element: RawMapping = {
    kind: "mapping",
    path: itemPath(path, sequence.items.length),
    position,
    entries: [],
  };
  sequence.items.push(element);
  return element;
}

function assign(table: RawMapping, keyValue: AST.TOMLKeyValue): void {
  const names = keyNames(keyValue.key);
  const keyPosition = positionOf(keyValue.key);
  let target = table;
  for (const name of names.slice(0, -1)) {
    target = descend(target, name, keyPosition);
  }
  const last = names[names.length - 1];
  const path = childPath(target.path, last);
  if (findEntry(target, last)) {
    throw new DecodeError("toml", {
      path,
      position: keyPosition,
      message: `duplicate key '${last}'`,
    });
  }
  target.entries.push({ key: last, keyPosition, value: convert(keyValue.value, path) });
}

function convert(node: AST.TOMLContentNode, path: string): RawNode {
  const position = positionOf(node);
  if (node.type === "TOMLValue") {
    return { kind: "scalar", path, position, value: toScalarValue(node.value) };
  }
  if (node.type === "TOMLArray") {
    return {
      kind: "sequence",
      path,
      position,
      items: node.elements.map((el, i) => convert(el, itemPath(path, i))),
    };
  }
  const mapping: RawMapping = { kind: "mapping", path, position, entries: [] };
  for (const kv of node.body) assign(mapping, kv);
  return mapping;
}
