// src/graph/index.ts
// Graph engine exports.

export * from "./types";
export * from "./errors";
export * from "./naming";
export { TraversalGuard } from "./traversal";
export { resolve, locate, type MatchRule, type Resolution, type SlotKind, type Location } from "./identifierResolver";
export { mergeInto, toNumber, appendItems, type FieldHandler, type NodeFactory, type MergeOptions, type MergeOutcome } from "./recursiveMerger";
export {
  upsert,
  upsertMany,
  collectionFor,
  type Ancestor,
  type InheritedKey,
  type PlaceholderPolicy,
  type CollectionRule,
  type CascadeSchema,
  type CreatedEntity,
  type CascadeResult,
  type UpsertOptions,
  type UpsertRequest,
  type BatchUpsertResult,
} from "./entityCascade";
export {
  linkIds,
  hasId,
  defaultIdGenerator,
  sequentialIdGenerator,
  type IdGenerator,
  type LinkOptions,
} from "./idLinker";
export {
  collectEntities,
  collectEdges,
  describeEdge,
  analyzeRelationships,
  findDanglingReferences,
  verifyRestructuring,
  type RelationshipEdge,
  type CollectedEntity,
  type AnalyzeOptions,
  type RestructuringCheck,
} from "./relationshipAnalyzer";
export { mergeGraphs, mergeLists, type StructuralMergeOptions } from "./structuralMerger";
export { compressGraph, type CompressOptions } from "./graphCompressor";
