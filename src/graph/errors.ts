// src/graph/errors.ts
// Error taxonomy for graph operations.
//
// NotFoundError and CascadeAbortError are data-level outcomes and travel inside
// result objects. StructuralError is a contract violation (malformed input,
// cycle, runaway depth) and is thrown.

import type { GraphValue } from "./types";

/* ---------- Not found ---------- */

export type NotFoundReason = "no-match" | "ambiguous" | "empty-key";

/** No entity in the collection matched the reference; callers usually create one */
export class NotFoundError extends Error {
  readonly reason: NotFoundReason;
  readonly keyField: string;
  readonly keyValue: string;
  /** Key values of the colliding candidates when the reference is ambiguous */
  readonly candidates: string[];

  constructor(
    keyField: string,
    keyValue: string,
    reason: NotFoundReason = "no-match",
    candidates: string[] = []
  ) {
    const detail =
      reason === "ambiguous"
        ? `ambiguous reference ${keyField}="${keyValue}" matches ${candidates
            .map((c) => `"${c}"`)
            .join(", ")}`
        : reason === "empty-key"
          ? `empty value for key field ${keyField}`
          : `no entity with ${keyField}="${keyValue}"`;
    super(detail);
    this.name = "NotFoundError";
    this.reason = reason;
    this.keyField = keyField;
    this.keyValue = keyValue;
    this.candidates = candidates;
  }
}

/* ---------- Cascade abort ---------- */

/** One level of a cascade path: `{ collectionKey: 'units', identifier: 'B1' }` */
export interface PathSegment {
  collectionKey: string;
  identifier?: string | number | null;
  /** Overrides the schema's identifying field for this level */
  identifierField?: string;
}

/** An ancestor could not be resolved or created; nothing was attached to the graph */
export class CascadeAbortError extends Error {
  readonly level: number;
  readonly segment: PathSegment;

  constructor(level: number, segment: PathSegment, reason: string) {
    super(`Cascade aborted at level ${level} (${segment.collectionKey}): ${reason}`);
    this.name = "CascadeAbortError";
    this.level = level;
    this.segment = segment;
  }
}

/* ---------- Structural ---------- */

export class StructuralError extends Error {
  /** Dotted location of the offending value, "$" for the root */
  readonly path: string;

  constructor(message: string, path = "$") {
    super(`${message} at ${path}`);
    this.name = "StructuralError";
    this.path = path;
  }
}

/* ---------- Warnings ---------- */

/** A numeric field could not be coerced; the raw value was kept */
export interface CoercionWarning {
  kind: "coercion";
  field: string;
  path: string;
  value: GraphValue;
  message: string;
}

export type GraphWarning = CoercionWarning;

export function coercionWarning(
  field: string,
  path: string,
  value: GraphValue
): CoercionWarning {
  return {
    kind: "coercion",
    field,
    path,
    value,
    message: `Could not convert ${field} value '${String(value)}' to a number; keeping it as-is`,
  };
}
