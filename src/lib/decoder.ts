/**
 * Position-tracking decoder.
 *
 * Turns YAML or TOML text into a `RawMapping` whose nodes all know their
 * source line/column and path, then folds the two legal collection shapes
 * into one:
 *
 * - `zone` as a mapping keyed by zone name, or a list of zones with `name`
 * - `reverse` as a mapping keyed by network, a single network, or a list of
 *   networks / `{network, ...}` objects
 *
 * After this step every consumer sees `zone` and `reverse` as mappings.
 */
import { decodeToml } from "./decode-toml";
import { decodeYaml } from "./decode-yaml";
import { DecodeError } from "./errors";
import { describeNode, emptyMapping } from "./raw-node";
import type {
  InputFormat,
  RawEntry,
  RawMapping,
  RawNode,
  RawScalar,
} from "@/types/zone";

export function decodeDocument(text: string, format: InputFormat): RawMapping {
  const raw = format === "yaml" ? decodeYaml(text) : decodeToml(text);

  if (raw.kind === "scalar" && raw.value === null) {
    return emptyMapping("", raw.position);
  }
  if (raw.kind !== "mapping") {
    throw new DecodeError(format, {
      path: raw.path,
      position: raw.position,
      message: `document root must be a mapping, got ${describeNode(raw)}`,
    });
  }

  return {
    ...raw,
    entries: raw.entries.map((entry) => {
      if (entry.key === "zone") {
        return { ...entry, value: normalizeNamed(format, entry.value, "name", "zone") };
      }
      if (entry.key === "reverse") {
        return { ...entry, value: normalizeReverse(format, entry.value) };
      }
      return entry;
    }),
  };
}

/**
 * Re-key a list of mappings by one of their fields. The field is removed
 * from the element; every other node keeps its path and position.
 */
function normalizeNamed(
  format: InputFormat,
  node: RawNode,
  field: string,
  what: string,
): RawNode {
  if (node.kind !== "sequence") return node;
  return {
    kind: "mapping",
    path: node.path,
    position: node.position,
    entries: node.items.map((item) => namedEntry(format, item, field, what)),
  };
}

function namedEntry(
  format: InputFormat,
  item: RawNode,
  field: string,
  what: string,
): RawEntry {
  if (item.kind !== "mapping") {
    throw new DecodeError(format, {
      path: item.path,
      position: item.position,
      message: `each ${what} in a list must be a mapping with a '${field}' field, got ${describeNode(item)}`,
    });
  }
  const named = item.entries.find((e) => e.key === field);
  if (!named) {
    throw new DecodeError(format, {
      path: item.path,
      position: item.position,
      message: `missing field '${field}'`,
    });
  }
  if (named.value.kind !== "scalar" || typeof named.value.value !== "string") {
    throw new DecodeError(format, {
      path: named.value.path,
      position: named.value.position,
      message: `'${field}' must be a string, got ${describeNode(named.value)}`,
    });
  }
  return {
    key: named.value.value,
    keyPosition: named.value.position,
    value: { ...item, entries: item.entries.filter((e) => e !== named) },
  };
}

function normalizeReverse(format: InputFormat, node: RawNode): RawNode {
  if (node.kind === "mapping") return node;
  if (node.kind === "scalar") {
    if (node.value === null) return emptyMapping(node.path, node.position);
    return {
      kind: "mapping",
      path: node.path,
      position: node.position,
      entries: [bareNetwork(node)],
    };
  }
  return {
    kind: "mapping",
    path: node.path,
    position: node.position,
    entries: node.items.map((item) =>
      item.kind === "scalar"
        ? bareNetwork(item)
        : namedEntry(format, item, "network", "reverse network"),
    ),
  };
}

/** A network given without overrides: key is the scalar text, body empty */
function bareNetwork(node: RawScalar): RawEntry {
  return {
    key: String(node.value),
    keyPosition: node.position,
    value: emptyMapping(node.path, node.position),
  };
}
