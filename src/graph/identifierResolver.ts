// src/graph/identifierResolver.ts
// Locate an entity in a collection from an approximate key.
//
// Matching order, first rule with a hit wins:
//   1. exact string equality
//   2. case-insensitive equality
//   3. suffix match: the candidate ends with the final token of the reference
//      ("Unit A" finds "Woodbridge Unit A", "Apt 101" finds "Woodbridge #101")
//
// Rule 3 is heuristic. Two candidates ending in the same token make the
// reference ambiguous and the resolver reports NotFound("ambiguous") instead of
// guessing.

import { NotFoundError } from "./errors";
import { isNode, keyString, type GraphNode, type GraphValue } from "./types";

/* ============= Types ============= */

export type MatchRule = "exact" | "case-insensitive" | "suffix";

export type Resolution =
  | { found: true; node: GraphNode; index: number; rule: MatchRule }
  | { found: false; error: NotFoundError };

export type SlotKind = "list" | "object" | "absent";

/** Result of `locate`: where the collection lives plus the resolution inside it */
export interface Location {
  slot: SlotKind;
  resolution: Resolution;
}

/* ============= Helpers ============= */

function lastToken(value: string): string {
  const tokens = value.trim().split(/\s+/);
  return tokens[tokens.length - 1] ?? "";
}

function candidateKey(node: GraphNode, keyField: string): string | null {
  return keyString(node[keyField]);
}

/* ============= Resolve ============= */

/**
 * Find the entity whose `keyField` matches `keyValue`.
 * Non-node elements and elements without a scalar key are skipped.
 */
export function resolve(
  collection: readonly GraphValue[],
  keyField: string,
  keyValue: string | number
): Resolution {
  const wanted = String(keyValue);
  if (wanted.trim() === "") {
    return { found: false, error: new NotFoundError(keyField, wanted, "empty-key") };
  }

  const candidates: Array<{ node: GraphNode; index: number; key: string }> = [];
  collection.forEach((element, index) => {
    if (!isNode(element)) return;
    const key = candidateKey(element, keyField);
    if (key !== null) candidates.push({ node: element, index, key });
  });

  const exact = candidates.find((c) => c.key === wanted);
  if (exact) return { found: true, node: exact.node, index: exact.index, rule: "exact" };

  const lowered = wanted.toLowerCase();
  const insensitive = candidates.find((c) => c.key.toLowerCase() === lowered);
  if (insensitive) {
    return {
      found: true,
      node: insensitive.node,
      index: insensitive.index,
      rule: "case-insensitive",
    };
  }

  const token = lastToken(wanted).toLowerCase();
  const suffixed = candidates.filter((c) => c.key.toLowerCase().endsWith(token));
  if (suffixed.length === 1) {
    const [match] = suffixed;
    return { found: true, node: match.node, index: match.index, rule: "suffix" };
  }
  if (suffixed.length > 1) {
    return {
      found: false,
      error: new NotFoundError(
        keyField,
        wanted,
        "ambiguous",
        suffixed.map((c) => c.key)
      ),
    };
  }

  return { found: false, error: new NotFoundError(keyField, wanted) };
}

/**
 * Resolve inside `container[collectionKey]`, which may hold a list of
 * entities or a single entity stored directly as an object.
 */
export function locate(
  container: GraphNode,
  collectionKey: string,
  keyField: string,
  keyValue: string | number
): Location {
  const held = container[collectionKey];

  if (Array.isArray(held)) {
    return { slot: "list", resolution: resolve(held, keyField, keyValue) };
  }
  if (isNode(held)) {
    const resolution = resolve([held], keyField, keyValue);
    return {
      slot: "object",
      resolution: resolution.found ? { ...resolution, index: -1 } : resolution,
    };
  }
  return { slot: "absent", resolution: resolve([], keyField, keyValue) };
}
