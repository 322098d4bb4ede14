// src/graph/relationshipAnalyzer.ts
// Extract directed reference edges from a (linked) graph.
//
// Pass 1 collects every node carrying an id, typed by the singular of the
// nearest enclosing field (`tenants` -> `tenant`).
// Pass 2 reads each collected node's `<x>Id` fields into edges.
//
// The analyzer never restructures anything. Its edge list is what an external
// restructuring pass has to preserve, and verifyRestructuring checks exactly that.

import { singularize } from "./naming";
import { TraversalGuard, fieldPath, indexPath } from "./traversal";
import { ID_FIELD, isNode, keyString, type GraphNode, type GraphValue } from "./types";

/* ============= Types ============= */

export interface RelationshipEdge {
  fromType: string;
  fromId: string;
  /** Reference field the edge was read from, e.g. `unitId` */
  field: string;
  toType: string;
  toId: string;
  /** True when read from a `<x>Ids` list */
  list: boolean;
}

export interface CollectedEntity {
  type: string;
  id: string;
  node: GraphNode;
  path: string;
}

export interface AnalyzeOptions {
  /** Also read `<x>Ids` list references */
  includeListReferences?: boolean;
  rootType?: string;
  maxDepth?: number;
}

export interface RestructuringCheck {
  preserved: boolean;
  missing: RelationshipEdge[];
}

/* ============= Pass 1: Collect ============= */

/**
 * Collect id-carrying nodes grouped by type. A repeated (type, id) pair keeps
 * its first position and the node seen last.
 */
export function collectEntities(
  graph: GraphNode,
  options: AnalyzeOptions = {}
): Map<string, Map<string, CollectedEntity>> {
  const byType = new Map<string, Map<string, CollectedEntity>>();
  const guard = new TraversalGuard(options.maxDepth);

  const walk = (value: GraphValue, type: string, path: string, depth: number): void => {
    if (isNode(value)) {
      guard.visit(value, depth, path, () => {
        const id = keyString(value[ID_FIELD]);
        if (id !== null && id.trim() !== "") {
          const entities = byType.get(type) ?? new Map<string, CollectedEntity>();
          entities.set(id, { type, id, node: value, path });
          byType.set(type, entities);
        }
        for (const [field, child] of Object.entries(value)) {
          walk(child, singularize(field), fieldPath(path, field), depth + 1);
        }
      });
    } else if (Array.isArray(value)) {
      guard.visit(value, depth, path, () => {
        value.forEach((element, index) => walk(element, type, indexPath(path, index), depth + 1));
      });
    }
  };

  walk(graph, options.rootType ?? "root", "$", 0);
  return byType;
}

/* ============= Pass 2: Relate ============= */

function edgesOf(entity: CollectedEntity, includeLists: boolean): RelationshipEdge[] {
  const edges: RelationshipEdge[] = [];

  for (const [field, value] of Object.entries(entity.node)) {
    if (field.length > 2 && field.endsWith("Id") && typeof value === "string" && value !== "") {
      edges.push({
        fromType: entity.type,
        fromId: entity.id,
        field,
        toType: field.slice(0, -2),
        toId: value,
        list: false,
      });
    } else if (includeLists && field.length > 3 && field.endsWith("Ids") && Array.isArray(value)) {
      for (const item of value) {
        if (typeof item !== "string" || item === "") continue;
        edges.push({
          fromType: entity.type,
          fromId: entity.id,
          field,
          toType: field.slice(0, -3),
          toId: item,
          list: true,
        });
      }
    }
  }
  return edges;
}

export function collectEdges(graph: GraphNode, options: AnalyzeOptions = {}): RelationshipEdge[] {
  const edges: RelationshipEdge[] = [];
  for (const entities of collectEntities(graph, options).values()) {
    for (const entity of entities.values()) {
      edges.push(...edgesOf(entity, options.includeListReferences ?? false));
    }
  }
  return edges;
}

export function describeEdge(edge: RelationshipEdge): string {
  return `${edge.fromType} with ID '${edge.fromId}' references ${edge.toType} with ID '${edge.toId}'`;
}

/**
 * Relationship descriptions grouped by entity type. Types without any
 * outgoing reference are left out.
 *
 * @example
 * { lease: ["lease with ID 'l1' references unit with ID 'u1'"] }
 */
export function analyzeRelationships(
  graph: GraphNode,
  options: AnalyzeOptions = {}
): Record<string, string[]> {
  const grouped: Record<string, string[]> = {};
  for (const edge of collectEdges(graph, options)) {
    (grouped[edge.fromType] ??= []).push(describeEdge(edge));
  }
  return grouped;
}

/* ============= Integrity Checks ============= */

/** Edges whose target id does not belong to any node in the graph */
export function findDanglingReferences(
  graph: GraphNode,
  options: AnalyzeOptions = {}
): RelationshipEdge[] {
  const known = new Set<string>();
  for (const entities of collectEntities(graph, options).values()) {
    for (const id of entities.keys()) known.add(id);
  }
  return collectEdges(graph, options).filter((edge) => !known.has(edge.toId));
}

function edgeKey(edge: RelationshipEdge): string {
  return `${edge.fromId}\u0000${edge.field}\u0000${edge.toId}`;
}

/**
 * Compare the edges of a graph before and after an external restructuring.
 * Edges are matched on (source id, field, target id) because moving a node
 * under a different field legitimately changes its inferred type.
 */
export function verifyRestructuring(
  before: GraphNode,
  after: GraphNode,
  options: AnalyzeOptions = {}
): RestructuringCheck {
  const remaining = new Set(collectEdges(after, options).map(edgeKey));
  const missing = collectEdges(before, options).filter((edge) => !remaining.has(edgeKey(edge)));
  return { preserved: missing.length === 0, missing };
}
