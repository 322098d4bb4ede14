// src/graph/graphCompressor.ts
// Strip semantically empty data, bottom-up.

import { StructuralError } from "./errors";
import { TraversalGuard, fieldPath, indexPath } from "./traversal";
import {
  ID_FIELD,
  cloneValue,
  isEmptyValue,
  isNode,
  type GraphNode,
  type GraphValue,
} from "./types";

export interface CompressOptions {
  maxDepth?: number;
}

function compressValue(
  value: GraphValue,
  guard: TraversalGuard,
  path: string,
  depth: number
): GraphValue {
  if (isNode(value)) return compressNode(value, guard, path, depth);
  if (!Array.isArray(value)) return value;

  return guard.visit(value, depth, path, () =>
    value
      .map((element, index) => compressValue(element, guard, indexPath(path, index), depth + 1))
      .filter((element) => !isEmptyValue(element))
  );
}

function compressNode(
  node: GraphNode,
  guard: TraversalGuard,
  path: string,
  depth: number
): GraphNode {
  return guard.visit(node, depth, path, () => {
    const out: GraphNode = {};
    for (const [field, value] of Object.entries(node)) {
      // `id` survives as-is, even when blank.
      if (field === ID_FIELD) {
        out[field] = cloneValue(value);
        continue;
      }
      const compressed = compressValue(value, guard, fieldPath(path, field), depth + 1);
      if (!isEmptyValue(compressed)) out[field] = compressed;
    }
    return out;
  });
}

/**
 * Return a copy of `graph` without null, blank, zero or empty fields.
 * List elements that end up empty are dropped.
 *
 * @example
 * compressGraph({ id: 'u1', photos: [], description: '' }) // { id: 'u1' }
 */
export function compressGraph(graph: GraphNode, options: CompressOptions = {}): GraphNode {
  if (!isNode(graph)) throw new StructuralError("Graph must be an object");
  return compressNode(graph, new TraversalGuard(options.maxDepth), "$", 0);
}
