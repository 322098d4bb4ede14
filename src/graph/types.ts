// src/graph/types.ts
// Generic node model shared by every graph operation.
//
// Entities are never typed at the engine level: a property, a unit or a lease
// is a GraphNode, and the engine works from structural conventions only
// (`id`, `<x>Id`, `<x>Ids`, plural collection keys).

/* ============= Value Model ============= */

export type Scalar = string | number | boolean | null;

export type GraphValue = Scalar | GraphNode | GraphValue[];

export interface GraphNode {
  [field: string]: GraphValue;
}

/** Field holding an entity's local identifier */
export const ID_FIELD = "id";

/* ============= Guards ============= */

export function isNode(value: unknown): value is GraphNode {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

export function isNodeList(value: unknown): value is GraphNode[] {
  return Array.isArray(value) && value.length > 0 && value.every(isNode);
}

/**
 * Empty means: null/undefined, blank string, numeric zero, empty list or a
 * node without fields. Booleans are never empty.
 */
export function isEmptyValue(value: GraphValue | undefined): boolean {
  if (value === null || value === undefined) return true;
  if (typeof value === "string") return value.trim() === "";
  if (typeof value === "number") return value === 0;
  if (typeof value === "boolean") return false;
  if (Array.isArray(value)) return value.length === 0;
  return Object.keys(value).length === 0;
}

/** String form of a scalar key value; null for anything that cannot key an entity */
export function keyString(value: GraphValue | undefined): string | null {
  if (typeof value === "string") return value;
  if (typeof value === "number" && Number.isFinite(value)) return String(value);
  return null;
}

/** `__proto__` arrives from JSON.parse as an own key; assigning it would swap the prototype */
export function isUnsafeField(field: string): boolean {
  return field === "__proto__";
}

/* ============= Copying ============= */

export function cloneValue<T extends GraphValue>(value: T): T {
  return structuredClone(value);
}

export function cloneNode(node: GraphNode): GraphNode {
  return structuredClone(node);
}
