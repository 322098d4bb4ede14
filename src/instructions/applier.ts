// src/instructions/applier.ts
// Apply structured create/update/delete instructions to a graph.
//
// Every instruction works on a deep copy; a failed instruction returns the
// graph it was given. The collection an entity lives in is looked up by name
// anywhere in the graph (`units` may sit at the root or under `property`),
// shallowest container first.

import { createLogger } from "../observability";
import { collectionFor, type CascadeSchema, type CollectionRule } from "../graph/entityCascade";
import { StructuralError, type GraphWarning } from "../graph/errors";
import { locate } from "../graph/identifierResolver";
import { mergeInto } from "../graph/recursiveMerger";
import { cloneNode, isNode, type GraphNode } from "../graph/types";
import { REAL_ESTATE_SCHEMA } from "../schema/realEstate";
import { parseInstruction } from "./parse";
import type {
  FailedInstruction,
  Instruction,
  InstructionBatchResult,
  InstructionOutcome,
} from "./types";

const log = createLogger("instructions/applier");

/* ============= Lookup ============= */

interface Match {
  container: GraphNode;
  collectionKey: string;
  /** -1 when the collection key holds a single object */
  index: number;
  node: GraphNode;
}

type Lookup =
  | { status: "found"; match: Match }
  | { status: "missing"; containers: GraphNode[] }
  | { status: "ambiguous"; message: string };

/** Every node holding `collectionKey`, breadth-first */
function containersOf(graph: GraphNode, collectionKey: string): GraphNode[] {
  const found: GraphNode[] = [];
  const queue: GraphNode[] = [graph];
  const seen = new Set<GraphNode>();

  while (queue.length > 0) {
    const node = queue.shift();
    if (!node || seen.has(node)) continue;
    seen.add(node);

    const held = node[collectionKey];
    if (Array.isArray(held) || isNode(held)) found.push(node);

    for (const value of Object.values(node)) {
      if (isNode(value)) queue.push(value);
      else if (Array.isArray(value)) queue.push(...value.filter(isNode));
    }
  }
  return found;
}

function lookup(graph: GraphNode, collectionKey: string, instruction: Instruction): Lookup {
  const { field, value } = instruction.identifier;
  const containers = containersOf(graph, collectionKey);

  for (const container of containers) {
    const { resolution } = locate(container, collectionKey, field, value);
    if (resolution.found) {
      return {
        status: "found",
        match: { container, collectionKey, index: resolution.index, node: resolution.node },
      };
    }
    if (resolution.error.reason === "ambiguous") {
      return { status: "ambiguous", message: resolution.error.message };
    }
  }
  return { status: "missing", containers };
}

function label(instruction: Instruction): string {
  const { entityType, identifier } = instruction;
  return `${entityType} with ${identifier.field}=${identifier.value}`;
}

/* ============= Actions ============= */

function create(
  graph: GraphNode,
  instruction: Instruction,
  collectionKey: string,
  rule: CollectionRule
): InstructionOutcome {
  const found = lookup(graph, collectionKey, instruction);
  if (found.status === "found") {
    return { graph, success: false, message: `${label(instruction)} already exists`, warnings: [] };
  }
  if (found.status === "ambiguous") {
    return { graph, success: false, message: found.message, warnings: [] };
  }

  const container = found.containers[0] ?? graph;
  const entity: GraphNode = {
    [instruction.identifier.field]: instruction.identifier.value,
    ...cloneNode(instruction.fields ?? {}),
  };
  const held = container[collectionKey];

  if (Array.isArray(held)) {
    held.push(entity);
  } else if (rule.storage === "object") {
    container[collectionKey] = entity;
  } else if (isNode(held)) {
    return {
      graph,
      success: false,
      message: `${collectionKey} already holds a different ${instruction.entityType}`,
      warnings: [],
    };
  } else {
    container[collectionKey] = [entity];
  }

  return { graph, success: true, message: `Created ${label(instruction)}`, warnings: [] };
}

function update(
  graph: GraphNode,
  instruction: Instruction,
  collectionKey: string,
  schema: CascadeSchema
): InstructionOutcome {
  const found = lookup(graph, collectionKey, instruction);
  if (found.status === "ambiguous") {
    return { graph, success: false, message: found.message, warnings: [] };
  }
  if (found.status === "missing") {
    return { graph, success: false, message: `${label(instruction)} not found`, warnings: [] };
  }

  const { warnings } = mergeInto(found.match.node, instruction.fields ?? {}, {
    handlers: schema.handlers,
    numericFields: schema.numericFields,
    nodeFactories: schema.nodeFactories,
  });
  return { graph, success: true, message: `Updated ${label(instruction)}`, warnings };
}

function remove(graph: GraphNode, instruction: Instruction, collectionKey: string): InstructionOutcome {
  const found = lookup(graph, collectionKey, instruction);
  if (found.status === "ambiguous") {
    return { graph, success: false, message: found.message, warnings: [] };
  }
  if (found.status === "missing") {
    return { graph, success: false, message: `${label(instruction)} not found`, warnings: [] };
  }

  const { container, index } = found.match;
  const held = container[collectionKey];
  if (Array.isArray(held) && index >= 0) {
    held.splice(index, 1);
  } else {
    container[collectionKey] = {};
  }
  return { graph, success: true, message: `Deleted ${label(instruction)}`, warnings: [] };
}

function dispatch(
  graph: GraphNode,
  instruction: Instruction,
  collectionKey: string,
  rule: CollectionRule,
  schema: CascadeSchema
): InstructionOutcome {
  switch (instruction.action) {
    case "create":
      return create(graph, instruction, collectionKey, rule);
    case "update":
      return update(graph, instruction, collectionKey, schema);
    case "delete":
      return remove(graph, instruction, collectionKey);
  }
}

/* ============= Public API ============= */

/**
 * Apply one instruction to a copy of `graph`. On failure the original graph
 * is returned unchanged together with the reason.
 */
export function applyInstruction(
  graph: GraphNode,
  instruction: Instruction,
  schema: CascadeSchema = REAL_ESTATE_SCHEMA
): InstructionOutcome {
  const working = cloneNode(graph);
  const { collectionKey, rule } = collectionFor(schema, instruction.entityType);

  let outcome: InstructionOutcome;
  try {
    outcome = dispatch(working, instruction, collectionKey, rule, schema);
  } catch (err) {
    if (!(err instanceof StructuralError)) throw err;
    outcome = { graph: working, success: false, message: err.message, warnings: [] };
  }

  if (!outcome.success) {
    log.warn({ instruction }, outcome.message);
    return { ...outcome, graph };
  }
  log.info({ action: instruction.action, entityType: instruction.entityType }, outcome.message);
  return outcome;
}

/**
 * Apply instructions in order. Invalid or failing instructions are recorded
 * and skipped; every successful one builds on the previous result.
 */
export function applyInstructions(
  graph: GraphNode,
  instructions: readonly unknown[],
  schema: CascadeSchema = REAL_ESTATE_SCHEMA
): InstructionBatchResult {
  let current = graph;
  const failedInstructions: FailedInstruction[] = [];
  const messages: string[] = [];
  const warnings: GraphWarning[] = [];

  instructions.forEach((raw, index) => {
    let instruction: Instruction;
    try {
      instruction = parseInstruction(raw);
    } catch (err) {
      if (!(err instanceof StructuralError)) throw err;
      messages.push(`Invalid instruction ${index}: ${err.message}`);
      failedInstructions.push({ index, instruction: raw, error: err.message });
      return;
    }

    const outcome = applyInstruction(current, instruction, schema);
    messages.push(outcome.message);
    warnings.push(...outcome.warnings);
    if (outcome.success) {
      current = outcome.graph;
    } else {
      failedInstructions.push({ index, instruction, error: outcome.message });
    }
  });

  return {
    graph: current,
    success: failedInstructions.length === 0,
    failedInstructions,
    messages,
    warnings,
  };
}
