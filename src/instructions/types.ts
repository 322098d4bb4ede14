// src/instructions/types.ts
// Structured create/update/delete instructions, the reduced form an
// Instruction Source hands to the engine.

import type { GraphWarning } from "../graph/errors";
import type { GraphNode } from "../graph/types";

export type InstructionAction = "create" | "update" | "delete";

export const INSTRUCTION_ACTIONS: readonly InstructionAction[] = ["create", "update", "delete"];

export interface EntityIdentifier {
  field: string;
  value: string | number;
}

export interface Instruction {
  action: InstructionAction;
  /** `Property`, `Unit`, `Tenant` ... */
  entityType: string;
  identifier: EntityIdentifier;
  fields?: GraphNode;
}

export interface InstructionOutcome {
  graph: GraphNode;
  success: boolean;
  message: string;
  warnings: GraphWarning[];
}

export interface FailedInstruction {
  index: number;
  instruction: unknown;
  error: string;
}

export interface InstructionBatchResult {
  graph: GraphNode;
  success: boolean;
  failedInstructions: FailedInstruction[];
  messages: string[];
  warnings: GraphWarning[];
}
