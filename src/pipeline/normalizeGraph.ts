// src/pipeline/normalizeGraph.ts
// End-to-end passes over whole graphs.
//
// normalizeGraph      link ids, then report relationships and dangling refs
// reconcileGraphs     structural merge -> link -> (compress) -> analyse
// applySourceUpdate   ask an InstructionSource about free text and fold its
//                     answer into the graph

import { createChildLogger, createLogger } from "../observability";
import { StructuralError, type GraphWarning } from "../graph/errors";
import { compressGraph } from "../graph/graphCompressor";
import { linkIds, type LinkOptions } from "../graph/idLinker";
import {
  analyzeRelationships,
  findDanglingReferences,
  type RelationshipEdge,
} from "../graph/relationshipAnalyzer";
import { mergeGraphs } from "../graph/structuralMerger";
import { isNode, type GraphNode } from "../graph/types";
import { applyInstructions } from "../instructions/applier";
import { extractNumberedInstructions } from "../instructions/parse";
import type { FailedInstruction } from "../instructions/types";
import type { CascadeSchema } from "../graph/entityCascade";
import { REAL_ESTATE_SCHEMA } from "../schema/realEstate";

const log = createLogger("pipeline");

/* ============= Types ============= */

export interface NormalizeOptions extends LinkOptions {
  includeListReferences?: boolean;
}

export interface ReconcileOptions extends NormalizeOptions {
  /** Strip empty fields after linking */
  compress?: boolean;
  /** Join key for entity lists, `id` by default */
  keyField?: string;
}

export interface NormalizedGraph {
  graph: GraphNode;
  relationships: Record<string, string[]>;
  dangling: RelationshipEdge[];
}

/**
 * What an InstructionSource may answer with. Text is read as a numbered
 * list whose lines are JSON instructions.
 */
export type SourceResponse =
  | { kind: "graph"; graph: GraphNode }
  | { kind: "instructions"; instructions: unknown[] }
  | { kind: "text"; text: string };

/** External collaborator that turns free text into graph changes */
export interface InstructionSource {
  interpret(request: { text: string; graph: GraphNode }): Promise<SourceResponse>;
}

export interface SourceUpdateResult extends NormalizedGraph {
  success: boolean;
  messages: string[];
  failedInstructions: FailedInstruction[];
  warnings: GraphWarning[];
  /** Text lines that were not structured instructions */
  unparsed: string[];
}

export interface SourceUpdateOptions extends ReconcileOptions {
  schema?: CascadeSchema;
}

/* ============= Passes ============= */

function analyse(graph: GraphNode, options: NormalizeOptions): NormalizedGraph {
  const analyzeOptions = {
    includeListReferences: options.includeListReferences,
    rootType: options.rootType,
    maxDepth: options.maxDepth,
  };
  return {
    graph,
    relationships: analyzeRelationships(graph, analyzeOptions),
    dangling: findDanglingReferences(graph, analyzeOptions),
  };
}

export function normalizeGraph(graph: GraphNode, options: NormalizeOptions = {}): NormalizedGraph {
  const result = analyse(linkIds(graph, options), options);
  if (result.dangling.length > 0) {
    log.warn({ dangling: result.dangling.length }, "Graph has references to unknown ids");
  }
  return result;
}

/**
 * Merge an independently produced graph into `base` and normalise the result.
 * Neither input is modified.
 */
export function reconcileGraphs(
  base: GraphNode,
  incoming: GraphNode,
  options: ReconcileOptions = {}
): NormalizedGraph {
  const merged = mergeGraphs(base, incoming, options.keyField ?? "id", { maxDepth: options.maxDepth });
  const linked = linkIds(merged, options);
  const graph = options.compress ? compressGraph(linked, { maxDepth: options.maxDepth }) : linked;

  const result = analyse(graph, options);
  log.info(
    {
      types: Object.keys(result.relationships).length,
      dangling: result.dangling.length,
      compressed: options.compress ?? false,
    },
    "Reconciled graphs"
  );
  return result;
}

/* ============= Instruction Source ============= */

function splitText(text: string): { instructions: unknown[]; unparsed: string[] } {
  const instructions: unknown[] = [];
  const unparsed: string[] = [];

  for (const line of extractNumberedInstructions(text)) {
    if (!line.startsWith("{")) {
      unparsed.push(line);
      continue;
    }
    try {
      instructions.push(JSON.parse(line));
    } catch (err) {
      if (!(err instanceof SyntaxError)) throw err;
      unparsed.push(line);
    }
  }
  return { instructions, unparsed };
}

/**
 * Hand `text` to the source and apply what comes back. A replacement graph is
 * reconciled with the current one; instructions are applied in order.
 */
export async function applySourceUpdate(
  graph: GraphNode,
  source: InstructionSource,
  text: string,
  options: SourceUpdateOptions = {}
): Promise<SourceUpdateResult> {
  const response = await source.interpret({ text, graph });
  const runLog = createChildLogger(log, { responseKind: response.kind });

  if (response.kind === "graph") {
    if (!isNode(response.graph)) throw new StructuralError("Source returned a graph that is not an object");
    const reconciled = reconcileGraphs(graph, response.graph, options);
    return {
      ...reconciled,
      success: true,
      messages: ["Reconciled graph returned by source"],
      failedInstructions: [],
      warnings: [],
      unparsed: [],
    };
  }

  const { instructions, unparsed } =
    response.kind === "instructions"
      ? { instructions: response.instructions, unparsed: [] }
      : splitText(response.text);

  const batch = applyInstructions(graph, instructions, options.schema ?? REAL_ESTATE_SCHEMA);
  const normalized = normalizeGraph(batch.graph, options);

  if (unparsed.length > 0) {
    runLog.warn({ unparsed: unparsed.length }, "Source text contained unstructured lines");
  }
  runLog.info(
    { applied: instructions.length - batch.failedInstructions.length, failed: batch.failedInstructions.length },
    "Applied source instructions"
  );
  return {
    ...normalized,
    success: batch.success && unparsed.length === 0,
    messages: batch.messages,
    failedInstructions: batch.failedInstructions,
    warnings: batch.warnings,
    unparsed,
  };
}
