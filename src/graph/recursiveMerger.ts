// src/graph/recursiveMerger.ts
// Apply a partial-update document onto an entity, in place.
//
// Destructive and non-transactional: a StructuralError raised half-way leaves
// `target` partly updated. Callers that need atomicity merge into a copy.

import { createLogger } from "../observability";
import { StructuralError, coercionWarning, type GraphWarning } from "./errors";
import { typeNameForField } from "./naming";
import { TraversalGuard, fieldPath } from "./traversal";
import { cloneValue, isNode, isUnsafeField, type GraphNode, type GraphValue } from "./types";

const log = createLogger("graph/merger");

/* ============= Types ============= */

/**
 * Owns the mutation of one top-level patch field, e.g. appending photos
 * instead of replacing the list.
 */
export type FieldHandler = (value: GraphValue, target: GraphNode, field: string) => void;

/** Builds the initial node for a materialised child, keyed by inferred type name */
export type NodeFactory = () => GraphNode;

export interface MergeOptions {
  handlers?: Readonly<Record<string, FieldHandler>>;
  /** Fields coerced to numbers wherever they appear in the patch */
  numericFields?: Iterable<string>;
  /** Dispatch table: `Address` -> () => ({ country: 'US' }) */
  nodeFactories?: Readonly<Record<string, NodeFactory>>;
  /** Location of `target` inside its graph, used in warnings and errors */
  path?: string;
  maxDepth?: number;
}

export interface MergeOutcome {
  node: GraphNode;
  warnings: GraphWarning[];
}

/* ============= Numeric Coercion ============= */

const NUMERIC_TEXT = /^[+-]?(\d+(\.\d*)?|\.\d+)([eE][+-]?\d+)?$/;

/**
 * Parse a monetary or numeric value. Accepts numbers and numeric strings with
 * an optional leading `$` and thousands separators; returns null otherwise.
 */
export function toNumber(value: GraphValue): number | null {
  if (typeof value === "number") return Number.isFinite(value) ? value : null;
  if (typeof value !== "string") return null;

  const cleaned = value.trim().replace(/^\$/, "").replace(/,(?=\d{3}(\D|$))/g, "");
  if (!NUMERIC_TEXT.test(cleaned)) return null;
  return Number(cleaned);
}

/* ============= Built-in Handlers ============= */

/**
 * Append the patch value (one item or a list) to the target's existing list
 * instead of replacing it.
 */
export const appendItems: FieldHandler = (value, target, field) => {
  const existing = target[field];
  const items = (Array.isArray(value) ? value : [value]).map((item) => cloneValue(item));

  if (Array.isArray(existing)) {
    existing.push(...items);
  } else if (existing === null || existing === undefined) {
    target[field] = items;
  } else {
    throw new StructuralError(`Cannot append to non-list field "${field}"`);
  }
};

/* ============= Merge ============= */

interface MergeContext {
  numericFields: ReadonlySet<string>;
  nodeFactories: Readonly<Record<string, NodeFactory>>;
  guard: TraversalGuard;
  warnings: GraphWarning[];
}

function mergeLevel(
  target: GraphNode,
  patch: GraphNode,
  handlers: Readonly<Record<string, FieldHandler>>,
  ctx: MergeContext,
  path: string,
  depth: number
): void {
  ctx.guard.visit(patch, depth, path, () => {
    for (const [field, value] of Object.entries(patch)) {
      if (isUnsafeField(field)) continue;
      const here = fieldPath(path, field);
      const handler = handlers[field];

      if (handler) {
        handler(value, target, field);
        continue;
      }

      if (isNode(value)) {
        const existing = target[field];
        if (existing === null || existing === undefined) {
          const typeName = typeNameForField(field);
          const factory = ctx.nodeFactories[typeName];
          const child = factory ? factory() : {};
          target[field] = child;
          log.debug({ path: here, typeName }, "Materialised nested entity");
          mergeLevel(child, value, {}, ctx, here, depth + 1);
        } else if (isNode(existing)) {
          mergeLevel(existing, value, {}, ctx, here, depth + 1);
        } else {
          throw new StructuralError(`Cannot merge an object into non-object field "${field}"`, here);
        }
        continue;
      }

      if (ctx.numericFields.has(field) && value !== null) {
        const parsed = toNumber(value);
        if (parsed === null) {
          const warning = coercionWarning(field, here, value);
          ctx.warnings.push(warning);
          log.warn({ path: here, value }, warning.message);
          target[field] = value;
        } else {
          target[field] = parsed;
        }
        continue;
      }

      target[field] = Array.isArray(value) ? cloneValue(value) : value;
    }
  });
}

/**
 * Merge `patch` into `target` and return `target` with any coercion warnings.
 *
 * - handler registered for a field: the handler owns it (top level only)
 * - object onto existing object: recurse
 * - object onto absent/null: materialise a child node, then recurse
 * - anything else: overwrite
 */
export function mergeInto(
  target: GraphNode,
  patch: GraphNode,
  options: MergeOptions = {}
): MergeOutcome {
  if (!isNode(target) || !isNode(patch)) {
    throw new StructuralError("Merge target and patch must both be objects", options.path);
  }

  const ctx: MergeContext = {
    numericFields: new Set(options.numericFields ?? []),
    nodeFactories: options.nodeFactories ?? {},
    guard: new TraversalGuard(options.maxDepth),
    warnings: [],
  };

  mergeLevel(target, patch, options.handlers ?? {}, ctx, options.path ?? "$", 0);
  return { node: target, warnings: ctx.warnings };
}
