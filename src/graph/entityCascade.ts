// src/graph/entityCascade.ts
// Update-or-create along a path of collections (property -> unit -> tenant -> lease).
//
// The walk is driven by a declarative CascadeSchema instead of one function per
// entity type. Missing ancestors are created with their identifying field and
// the foreign keys they inherit from the levels above.
//
// Nothing touches the graph until every level has been resolved or planned:
// new entities are assembled detached and attached in one step at the end, so
// an aborted cascade leaves the graph as it was.

import { createLogger } from "../observability";
import {
  CascadeAbortError,
  StructuralError,
  type GraphWarning,
  type PathSegment,
} from "./errors";
import { locate } from "./identifierResolver";
import { collectionKeyForType, typeNameForField } from "./naming";
import {
  mergeInto,
  type FieldHandler,
  type NodeFactory,
} from "./recursiveMerger";
import { fieldPath, indexPath } from "./traversal";
import { isNode, keyString, type GraphNode } from "./types";

const log = createLogger("graph/cascade");

/* ============= Schema ============= */

/** A level above in the walk, nearest last */
export interface Ancestor {
  entityType: string;
  node: GraphNode;
}

/** Foreign key copied onto a new entity from the nearest ancestor of `fromType` */
export interface InheritedKey {
  field: string;
  fromType: string;
  fromField: string;
}

/** Produces the identifier of a placeholder parent, or null when it cannot */
export type PlaceholderPolicy = (ancestors: readonly Ancestor[]) => string | null;

export interface CollectionRule {
  entityType: string;
  identifierField: string;
  /** `object`: the collection key holds a single entity instead of a list */
  storage?: "list" | "object";
  inherits?: readonly InheritedKey[];
  /**
   * Parent collection this entity must live under. When the path skips it,
   * the first existing parent is used or a placeholder is created.
   */
  requiresParent?: {
    collectionKey: string;
    placeholder: PlaceholderPolicy;
  };
}

export interface CascadeSchema {
  /** Entity type of the graph root, used for key inheritance */
  rootType: string;
  collections: Readonly<Record<string, CollectionRule>>;
  numericFields?: readonly string[];
  handlers?: Readonly<Record<string, FieldHandler>>;
  nodeFactories?: Readonly<Record<string, NodeFactory>>;
}

/* ============= I/O ============= */

export interface CreatedEntity {
  entityType: string;
  collectionKey: string;
  identifier: string | null;
  placeholder: boolean;
}

export type CascadeResult =
  | {
      ok: true;
      graph: GraphNode;
      node: GraphNode;
      created: CreatedEntity[];
      warnings: GraphWarning[];
    }
  | { ok: false; graph: GraphNode; error: CascadeAbortError };

export interface UpsertOptions {
  /** Overrides the schema's handlers for the final merge */
  handlers?: Readonly<Record<string, FieldHandler>>;
  maxDepth?: number;
}

export interface UpsertRequest {
  path: PathSegment[];
  fields: GraphNode;
}

export interface BatchUpsertResult {
  graph: GraphNode;
  success: boolean;
  results: CascadeResult[];
  failed: Array<{ index: number; error: CascadeAbortError }>;
  messages: string[];
}

/* ============= Planning ============= */

/** Where the first new entity will be attached once the plan is complete */
interface PendingAttach {
  container: GraphNode;
  collectionKey: string;
  storage: "list" | "object";
  node: GraphNode;
}

interface WalkState {
  ancestors: Ancestor[];
  /** False once the walk has descended into a detached (new) entity */
  attached: boolean;
  pending: PendingAttach | null;
  created: CreatedEntity[];
  path: string;
}

class Abort extends Error {
  readonly reason: string;

  constructor(reason: string) {
    super(reason);
    this.reason = reason;
  }
}

function ruleFor(
  schema: CascadeSchema,
  segment: PathSegment
): CollectionRule {
  const rule = schema.collections[segment.collectionKey];
  if (rule) {
    return segment.identifierField
      ? { ...rule, identifierField: segment.identifierField }
      : rule;
  }
  if (segment.identifierField) {
    return {
      entityType: typeNameForField(segment.collectionKey),
      identifierField: segment.identifierField,
    };
  }
  throw new Abort(`unknown collection key "${segment.collectionKey}"`);
}

function nearest(ancestors: readonly Ancestor[], entityType: string): GraphNode | null {
  for (let i = ancestors.length - 1; i >= 0; i--) {
    if (ancestors[i].entityType === entityType) return ancestors[i].node;
  }
  return null;
}

function buildEntity(
  rule: CollectionRule,
  identifier: string | null,
  ancestors: readonly Ancestor[],
  factories: Readonly<Record<string, NodeFactory>>
): GraphNode {
  const factory = factories[rule.entityType];
  const node: GraphNode = factory ? factory() : {};
  if (identifier !== null) node[rule.identifierField] = identifier;

  for (const key of rule.inherits ?? []) {
    const source = nearest(ancestors, key.fromType);
    const value = source ? keyString(source[key.fromField]) : null;
    if (value !== null && value.trim() !== "") node[key.field] = value;
  }
  return node;
}

function attach(
  container: GraphNode,
  collectionKey: string,
  storage: "list" | "object",
  node: GraphNode
): void {
  const held = container[collectionKey];
  if (Array.isArray(held)) {
    held.push(node);
  } else if (storage === "object") {
    container[collectionKey] = node;
  } else {
    container[collectionKey] = [node];
  }
}

/**
 * Resolve one level, or plan its creation. Returns the entity the walk
 * continues from.
 */
function step(
  state: WalkState,
  rule: CollectionRule,
  collectionKey: string,
  identifier: string | null,
  factories: Readonly<Record<string, NodeFactory>>,
  placeholder: boolean
): GraphNode {
  const parent = state.ancestors[state.ancestors.length - 1].node;
  const storage = rule.storage ?? "list";
  const held = parent[collectionKey];

  if (held !== undefined && held !== null && !Array.isArray(held) && !isNode(held)) {
    throw new Abort(`field "${collectionKey}" holds a scalar, not a collection`);
  }

  let found: GraphNode | null = null;
  let slotPath = fieldPath(state.path, collectionKey);

  if (identifier === null) {
    // Singleton slot addressed without an identifier: take whatever is there.
    if (isNode(held)) found = held;
  } else {
    const { slot, resolution } = locate(parent, collectionKey, rule.identifierField, identifier);
    if (resolution.found) {
      found = resolution.node;
      if (slot === "list") slotPath = indexPath(slotPath, resolution.index);
    } else if (resolution.error.reason === "ambiguous") {
      throw new Abort(resolution.error.message);
    } else if (slot === "object") {
      throw new Abort(
        `slot "${collectionKey}" already holds a different ${rule.entityType}`
      );
    }
  }

  if (found) {
    state.ancestors.push({ entityType: rule.entityType, node: found });
    state.path = slotPath;
    return found;
  }

  const node = buildEntity(rule, identifier, state.ancestors, factories);
  const position = Array.isArray(held) ? held.length : 0;
  if (state.attached) {
    state.pending = { container: parent, collectionKey, storage, node };
    state.attached = false;
  } else {
    attach(parent, collectionKey, storage, node);
  }
  state.created.push({
    entityType: rule.entityType,
    collectionKey,
    identifier,
    placeholder,
  });
  state.ancestors.push({ entityType: rule.entityType, node });
  state.path = storage === "list" ? indexPath(slotPath, position) : slotPath;
  return node;
}

/**
 * Walk into the parent collection a rule requires when the path skipped it:
 * reuse the first existing entity there, or create a placeholder.
 */
function ensureParent(
  schema: CascadeSchema,
  state: WalkState,
  rule: CollectionRule,
  factories: Readonly<Record<string, NodeFactory>>
): void {
  const required = rule.requiresParent;
  if (!required) return;

  const parentRule = schema.collections[required.collectionKey];
  if (!parentRule) {
    throw new Abort(`required parent collection "${required.collectionKey}" is not in the schema`);
  }
  const current = state.ancestors[state.ancestors.length - 1];
  if (current.entityType === parentRule.entityType) return;

  const held = current.node[required.collectionKey];
  const existing = Array.isArray(held) ? held.find(isNode) : isNode(held) ? held : undefined;
  if (existing) {
    const slotPath = fieldPath(state.path, required.collectionKey);
    state.ancestors.push({ entityType: parentRule.entityType, node: existing });
    state.path = Array.isArray(held) ? indexPath(slotPath, held.indexOf(existing)) : slotPath;
    return;
  }

  const name = required.placeholder(state.ancestors);
  if (name === null || name.trim() === "") {
    throw new Abort(`cannot name a placeholder ${parentRule.entityType}`);
  }
  log.info(
    { entityType: parentRule.entityType, identifier: name },
    "Creating placeholder parent"
  );
  step(state, parentRule, required.collectionKey, name, factories, true);
}

function normalizeIdentifier(segment: PathSegment): string | null {
  const { identifier } = segment;
  if (identifier === undefined || identifier === null) return null;
  const text = String(identifier).trim();
  return text === "" ? null : text;
}

/* ============= Public API ============= */

/**
 * Update-or-create the entity at the end of `path`, creating any missing
 * ancestor, then merge `fields` into it.
 *
 * @example
 * upsert(property, [
 *   { collectionKey: 'units', identifier: 'B1' },
 *   { collectionKey: 'tenants', identifier: 'Bob' },
 * ], { phone: '5550100' }, REAL_ESTATE_SCHEMA);
 */
export function upsert(
  graph: GraphNode,
  path: readonly PathSegment[],
  fields: GraphNode,
  schema: CascadeSchema,
  options: UpsertOptions = {}
): CascadeResult {
  if (!isNode(graph)) throw new StructuralError("Graph must be an object");
  if (!isNode(fields)) throw new StructuralError("Update fields must be an object");
  if (path.length === 0) throw new StructuralError("Cascade path is empty");

  const factories = schema.nodeFactories ?? {};
  const state: WalkState = {
    ancestors: [{ entityType: schema.rootType, node: graph }],
    attached: true,
    pending: null,
    created: [],
    path: "$",
  };

  let leaf: GraphNode = graph;
  for (let level = 0; level < path.length; level++) {
    const segment = path[level];
    try {
      const rule = ruleFor(schema, segment);
      const identifier = normalizeIdentifier(segment);
      if (identifier === null && (rule.storage ?? "list") === "list") {
        throw new Abort(`empty identifier for ${rule.entityType}.${rule.identifierField}`);
      }
      ensureParent(schema, state, rule, factories);
      leaf = step(state, rule, segment.collectionKey, identifier, factories, false);
    } catch (err) {
      if (!(err instanceof Abort)) throw err;
      const error = new CascadeAbortError(level, segment, err.reason);
      log.warn({ level, segment, reason: err.reason }, "Cascade aborted");
      return { ok: false, graph, error };
    }
  }

  const { warnings } = mergeInto(leaf, fields, {
    handlers: options.handlers ?? schema.handlers,
    numericFields: schema.numericFields,
    nodeFactories: factories,
    path: state.path,
    maxDepth: options.maxDepth,
  });

  if (state.pending) {
    const { container, collectionKey, storage, node } = state.pending;
    attach(container, collectionKey, storage, node);
  }

  for (const entity of state.created) {
    log.info(entity, entity.placeholder ? "Placeholder entity created" : "Entity created");
  }

  return { ok: true, graph, node: leaf, created: state.created, warnings };
}

/**
 * Apply several upserts in order. A failed request is reported and skipped;
 * requests processed before it stay applied.
 */
export function upsertMany(
  graph: GraphNode,
  requests: readonly UpsertRequest[],
  schema: CascadeSchema,
  options: UpsertOptions = {}
): BatchUpsertResult {
  const results: CascadeResult[] = [];
  const failed: BatchUpsertResult["failed"] = [];
  const messages: string[] = [];

  requests.forEach((request, index) => {
    const result = upsert(graph, request.path, request.fields, schema, options);
    results.push(result);

    const target = request.path
      .map((s) => `${s.collectionKey}${s.identifier === undefined || s.identifier === null ? "" : `[${s.identifier}]`}`)
      .join(" > ");
    if (result.ok) {
      messages.push(`Updated ${target}`);
    } else {
      failed.push({ index, error: result.error });
      messages.push(result.error.message);
    }
  });

  return { graph, success: failed.length === 0, results, failed, messages };
}

/**
 * Collection key and rule a schema declares for an entity type, falling back
 * to the plural of the type (`Inspection` -> `inspections`, identified by `id`).
 */
export function collectionFor(
  schema: CascadeSchema,
  entityType: string
): { collectionKey: string; rule: CollectionRule } {
  const wanted = entityType.toLowerCase();
  for (const [collectionKey, rule] of Object.entries(schema.collections)) {
    if (rule.entityType.toLowerCase() === wanted) return { collectionKey, rule };
  }
  return {
    collectionKey: collectionKeyForType(entityType),
    rule: { entityType, identifierField: "id" },
  };
}
