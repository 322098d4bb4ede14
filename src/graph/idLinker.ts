// src/graph/idLinker.ts
// Give every node an id and make flat references agree with nesting.
//
// Post-order walk over a copy of the graph:
//   - a node without an id gets a fresh one
//   - a field holding a node gets a sibling `<singular>Id`
//   - a field holding a list of nodes gets a sibling `<singular>Ids`
// Nested objects win over existing flat references, so stale references are
// overwritten rather than trusted. Running the linker twice changes nothing.

import { nanoid } from "nanoid";
import { config } from "../config";
import { createLogger } from "../observability";
import { StructuralError } from "./errors";
import { referenceField, referenceListField, singularize } from "./naming";
import { TraversalGuard, fieldPath, indexPath } from "./traversal";
import {
  ID_FIELD,
  isNode,
  isNodeList,
  keyString,
  type GraphNode,
  type GraphValue,
} from "./types";

const log = createLogger("graph/linker");

/* ============= Types ============= */

/** Receives a type hint derived from the enclosing field (`unit`, `owner`, `root`) */
export type IdGenerator = (typeHint: string) => string;

export interface LinkOptions {
  idGenerator?: IdGenerator;
  /** Leave the root node without an id */
  skipRoot?: boolean;
  rootType?: string;
  maxDepth?: number;
}

/* ============= Id Generation ============= */

export function defaultIdGenerator(typeHint: string): string {
  return `${typeHint}_${nanoid(config.graph.idLength)}`;
}

/** Deterministic generator: `unit-1`, `unit-2`, `owner-3` ... */
export function sequentialIdGenerator(start = 1): IdGenerator {
  let next = start;
  return (typeHint) => `${typeHint}-${next++}`;
}

export function hasId(node: GraphNode): boolean {
  const id = keyString(node[ID_FIELD]);
  return id !== null && id.trim() !== "";
}

/* ============= Linker ============= */

interface LinkContext {
  generate: IdGenerator;
  guard: TraversalGuard;
  assigned: number;
}

/** A reference field may only replace a scalar or a list of scalars */
function canHoldReference(existing: GraphValue | undefined): boolean {
  if (existing === undefined || existing === null) return true;
  if (isNode(existing)) return false;
  if (Array.isArray(existing)) return !existing.some((v) => isNode(v) || Array.isArray(v));
  return true;
}

function linkList(
  list: GraphValue[],
  typeHint: string,
  ctx: LinkContext,
  path: string,
  depth: number
): GraphValue[] {
  return ctx.guard.visit(list, depth, path, () =>
    list.map((element, index) => {
      const here = indexPath(path, index);
      if (isNode(element)) return linkNode(element, typeHint, ctx, here, depth + 1, true);
      if (Array.isArray(element)) return linkList(element, typeHint, ctx, here, depth + 1);
      return element;
    })
  );
}

function linkNode(
  node: GraphNode,
  typeHint: string,
  ctx: LinkContext,
  path: string,
  depth: number,
  needsId: boolean
): GraphNode {
  return ctx.guard.visit(node, depth, path, () => {
    const body: GraphNode = {};
    const references: Array<[string, GraphValue]> = [];
    const missingId = needsId && !hasId(node);

    for (const [field, value] of Object.entries(node)) {
      if (field === ID_FIELD && missingId) continue;
      const here = fieldPath(path, field);

      if (isNode(value)) {
        const child = linkNode(value, singularize(field), ctx, here, depth + 1, true);
        body[field] = child;
        references.push([referenceField(field), child[ID_FIELD]]);
      } else if (Array.isArray(value)) {
        const linked = linkList(value, singularize(field), ctx, here, depth + 1);
        body[field] = linked;
        if (isNodeList(linked)) {
          references.push([referenceListField(field), linked.map((child) => child[ID_FIELD])]);
        } else if (linked.length === 0 && Object.hasOwn(node, referenceListField(field))) {
          // emptied collection: drop stale ids
          references.push([referenceListField(field), []]);
        }
      } else {
        body[field] = value;
      }
    }

    for (const [field, value] of references) {
      if (value === undefined) continue;
      if (!canHoldReference(body[field])) {
        throw new StructuralError(`Reference field "${field}" collides with nested data`, path);
      }
      body[field] = value;
    }

    if (!missingId) return body;

    ctx.assigned++;
    return { [ID_FIELD]: ctx.generate(typeHint), ...body };
  });
}

/**
 * Return a linked copy of `graph`; the input is not modified.
 *
 * @example
 * linkIds({ owner: { name: 'Ada' } }, { skipRoot: true })
 * // { owner: { id: 'owner_V1StGXR8_Z', name: 'Ada' }, ownerId: 'owner_V1StGXR8_Z' }
 */
export function linkIds(graph: GraphNode, options: LinkOptions = {}): GraphNode {
  if (!isNode(graph)) throw new StructuralError("Graph must be an object");

  const ctx: LinkContext = {
    generate: options.idGenerator ?? defaultIdGenerator,
    guard: new TraversalGuard(options.maxDepth),
    assigned: 0,
  };

  const linked = linkNode(graph, options.rootType ?? "root", ctx, "$", 0, !options.skipRoot);
  log.debug({ assigned: ctx.assigned }, "Linked graph identifiers");
  return linked;
}
