import { LineCounter, isAlias, isMap, isScalar, isSeq, parseDocument } from "yaml";
import type { Document } from "yaml";
import { DecodeError } from "./errors";
import { childPath, itemPath, toScalarValue } from "./raw-node";
import type { RawEntry, RawNode, SourcePosition } from "@/types/zone";

/**
 * Decode YAML into a position-annotated tree. The first syntax error aborts
 * decoding; its position comes from the parser.
 */
export function decodeYaml(text: string): RawNode {
  const lineCounter = new LineCounter();
  const doc = parseDocument(text, { lineCounter, uniqueKeys: true });

  const positionAt = (offset: number): SourcePosition => {
    const { line, col } = lineCounter.linePos(offset);
    return { line, column: col };
  };

  const [first] = doc.errors;
  if (first) {
    throw new DecodeError("yaml", {
      path: "",
      position: positionAt(first.pos[0]),
      message: first.message.split("\n")[0],
    });
  }

  return convert(doc, doc.contents, "", positionAt(0), positionAt);
}

function convert(
  doc: Document,
  node: unknown,
  path: string,
  fallback: SourcePosition,
  positionAt: (offset: number) => SourcePosition,
): RawNode {
  if (isAlias(node)) {
    const target = node.resolve(doc);
    if (!target) {
      throw new DecodeError("yaml", {
        path,
        position: fallback,
        message: `unresolved alias '*${node.source}'`,
      });
    }
    return convert(doc, target, path, fallback, positionAt);
  }

  const range = isScalar(node) || isMap(node) || isSeq(node) ? node.range : null;
  const position = range ? positionAt(range[0]) : fallback;

  if (isMap(node)) {
    const entries: RawEntry[] = [];
    for (const pair of node.items) {
      if (!isScalar(pair.key)) {
        throw new DecodeError("yaml", {
          path,
          position,
          message: "mapping keys must be plain scalars",
        });
      }
      const key = String(pair.key.value);
      const keyPosition = pair.key.range ? positionAt(pair.key.range[0]) : position;
      entries.push({
        key,
        keyPosition,
        value: convert(doc, pair.value, childPath(path, key), keyPosition, positionAt),
      });
    }
    return { kind: "mapping", path, position, entries };
  }

  if (isSeq(node)) {
    return {
      kind: "sequence",
      path,
      position,
      items: node.items.map((item, i) =>
        convert(doc, item, itemPath(path, i), position, positionAt),
      ),
    };
  }

  if (isScalar(node)) {
    return { kind: "scalar", path, position, value: toScalarValue(node.value) };
  }

  // empty document or `key:` without a value
  return { kind: "scalar", path, position, value: null };
}
