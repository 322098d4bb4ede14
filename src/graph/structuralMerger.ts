// src/graph/structuralMerger.ts
// Combine two independently produced graphs without duplicating records.
//
// The policy is fill-empty-only everywhere: a non-empty value already in the
// base is never replaced, gaps are filled from the incoming graph. Lists of
// entities are joined on a key field (default `id`). This is the join point for
// partial graphs built from different source documents.

import { createLogger } from "../observability";
import { StructuralError } from "./errors";
import { TraversalGuard, fieldPath, indexPath } from "./traversal";
import {
  cloneNode,
  cloneValue,
  isEmptyValue,
  isNode,
  isUnsafeField,
  keyString,
  type GraphNode,
  type GraphValue,
} from "./types";

const log = createLogger("graph/structural-merge");

export interface StructuralMergeOptions {
  maxDepth?: number;
}

interface MergeContext {
  keyField: string;
  guard: TraversalGuard;
  joined: number;
  appended: number;
}

/* ============= Node Merge ============= */

function mergeNodeInPlace(
  base: GraphNode,
  incoming: GraphNode,
  ctx: MergeContext,
  path: string,
  depth: number
): void {
  ctx.guard.visit(incoming, depth, path, () => {
    for (const [field, value] of Object.entries(incoming)) {
      if (isUnsafeField(field)) continue;
      const here = fieldPath(path, field);

      if (!Object.hasOwn(base, field)) {
        base[field] = cloneValue(value);
        continue;
      }

      const current = base[field];
      if (isNode(current) && isNode(value)) {
        mergeNodeInPlace(current, value, ctx, here, depth + 1);
      } else if (Array.isArray(current) && Array.isArray(value)) {
        mergeListInPlace(current, value, ctx, here, depth + 1);
      } else if (isEmptyValue(current) && !isEmptyValue(value)) {
        base[field] = cloneValue(value);
      }
    }
  });
}

/* ============= List Merge ============= */

function scalarKey(value: GraphValue): string {
  return JSON.stringify(value);
}

function mergeListInPlace(
  base: GraphValue[],
  incoming: readonly GraphValue[],
  ctx: MergeContext,
  path: string,
  depth: number
): void {
  ctx.guard.visit(incoming, depth, path, () => {
    const byKey = new Map<string, GraphNode>();
    const scalars = new Set<string>();
    const kept: GraphValue[] = [];

    // Same-key duplicates already in the base fold into the first occurrence.
    base.forEach((element, index) => {
      if (isNode(element)) {
        const key = keyString(element[ctx.keyField]);
        const first = key !== null && key.trim() !== "" ? byKey.get(key) : undefined;
        if (first) {
          mergeNodeInPlace(first, element, ctx, indexPath(path, index), depth + 1);
          ctx.joined++;
          return;
        }
        if (key !== null && key.trim() !== "") byKey.set(key, element);
      } else if (!Array.isArray(element)) {
        scalars.add(scalarKey(element));
      }
      kept.push(element);
    });
    if (kept.length !== base.length) base.splice(0, base.length, ...kept);

    incoming.forEach((element, index) => {
      const here = indexPath(path, index);

      if (isNode(element)) {
        const key = keyString(element[ctx.keyField]);
        if (key === null || key.trim() === "") {
          base.push(cloneNode(element));
          ctx.appended++;
          return;
        }
        const existing = byKey.get(key);
        if (existing) {
          mergeNodeInPlace(existing, element, ctx, here, depth + 1);
          ctx.joined++;
        } else {
          const copy = cloneNode(element);
          base.push(copy);
          byKey.set(key, copy);
          ctx.appended++;
        }
        return;
      }

      if (Array.isArray(element)) {
        base.push(cloneValue(element));
        return;
      }

      const key = scalarKey(element);
      if (!scalars.has(key)) {
        base.push(element);
        scalars.add(key);
      }
    });
  });
}

function context(keyField: string, options: StructuralMergeOptions): MergeContext {
  return {
    keyField,
    guard: new TraversalGuard(options.maxDepth),
    joined: 0,
    appended: 0,
  };
}

/* ============= Public API ============= */

/**
 * Merge two lists of entities on `keyField`. Elements with a new key are
 * appended, elements with a known key fill the gaps of the existing element,
 * elements without a key are always appended. Returns a new list.
 */
export function mergeLists(
  base: readonly GraphValue[],
  incoming: readonly GraphValue[],
  keyField = "id",
  options: StructuralMergeOptions = {}
): GraphValue[] {
  const merged = base.map((element) => cloneValue(element));
  mergeListInPlace(merged, incoming, context(keyField, options), "$", 0);
  return merged;
}

/**
 * Merge `incoming` into a copy of `base`.
 *
 * - field only in incoming: copied
 * - both objects: merged field by field
 * - both lists: mergeLists
 * - otherwise the base value stays unless it is empty
 */
export function mergeGraphs(
  base: GraphNode,
  incoming: GraphNode,
  keyField = "id",
  options: StructuralMergeOptions = {}
): GraphNode {
  if (!isNode(base) || !isNode(incoming)) {
    throw new StructuralError("Both graphs must be objects");
  }

  const merged = cloneNode(base);
  const ctx = context(keyField, options);
  mergeNodeInPlace(merged, incoming, ctx, "$", 0);

  log.debug({ joined: ctx.joined, appended: ctx.appended }, "Merged graphs");
  return merged;
}
