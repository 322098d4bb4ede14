// src/index.ts
// Public API of the graph normalization engine.

export * from "./graph";
export { createRealEstateSchema, unitPlaceholderName, REAL_ESTATE_SCHEMA, type RealEstateSchemaOptions } from "./schema/realEstate";
export { parseInstruction, describeInstruction, extractNumberedInstructions } from "./instructions/parse";
export { applyInstruction, applyInstructions } from "./instructions/applier";
export * from "./instructions/types";
export {
  normalizeGraph,
  reconcileGraphs,
  applySourceUpdate,
  type NormalizeOptions,
  type ReconcileOptions,
  type NormalizedGraph,
  type SourceResponse,
  type InstructionSource,
  type SourceUpdateResult,
  type SourceUpdateOptions,
} from "./pipeline/normalizeGraph";
export { config } from "./config";
export { createLogger, logger, type LogLevel } from "./observability";
