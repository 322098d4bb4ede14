// src/graph/traversal.ts
// Depth and cycle guard shared by every recursive walk.

import { config } from "../config";
import { StructuralError } from "./errors";

export class TraversalGuard {
  private readonly active = new Set<object>();
  private readonly maxDepth: number;

  constructor(maxDepth: number = config.graph.maxDepth) {
    this.maxDepth = maxDepth;
  }

  /**
   * Run `fn` with `value` marked as being on the current path.
   * Throws StructuralError past the depth limit or when `value` is already
   * an ancestor of itself.
   */
  visit<T>(value: object, depth: number, path: string, fn: () => T): T {
    if (depth > this.maxDepth) {
      throw new StructuralError(`Nesting deeper than ${this.maxDepth} levels`, path);
    }
    if (this.active.has(value)) {
      throw new StructuralError("Cyclic reference", path);
    }
    this.active.add(value);
    try {
      return fn();
    } finally {
      this.active.delete(value);
    }
  }
}

export function fieldPath(path: string, field: string): string {
  return `${path}.${field}`;
}

export function indexPath(path: string, index: number): string {
  return `${path}[${index}]`;
}
