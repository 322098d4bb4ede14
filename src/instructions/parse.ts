// src/instructions/parse.ts
// Validation and text forms of structured instructions.

import { StructuralError } from "../graph/errors";
import { capitalize } from "../graph/naming";
import { isNode, type GraphValue } from "../graph/types";
import { INSTRUCTION_ACTIONS, type Instruction, type InstructionAction } from "./types";

/* ============= Validation ============= */

function isAction(value: unknown): value is InstructionAction {
  return INSTRUCTION_ACTIONS.some((action) => action === value);
}

function isNonEmptyString(value: unknown): value is string {
  return typeof value === "string" && value.trim() !== "";
}

/**
 * Validate an untyped value (usually parsed JSON) into an Instruction.
 * Throws StructuralError naming the first offending field.
 */
export function parseInstruction(raw: unknown): Instruction {
  if (!isNode(raw)) throw new StructuralError("Instruction must be an object");

  const { action, entityType, identifier, fields } = raw;
  if (!isAction(action)) {
    throw new StructuralError(`Unknown action: ${String(action)}`, "$.action");
  }
  if (!isNonEmptyString(entityType)) {
    throw new StructuralError("Missing entity type", "$.entityType");
  }
  if (!isNode(identifier)) {
    throw new StructuralError("Missing identifier", "$.identifier");
  }
  const { field, value } = identifier;
  if (!isNonEmptyString(field)) {
    throw new StructuralError("Identifier field must be a non-empty string", "$.identifier.field");
  }
  if (typeof value !== "number" && !isNonEmptyString(value)) {
    throw new StructuralError("Identifier value must be a string or number", "$.identifier.value");
  }
  if (fields !== undefined && fields !== null && !isNode(fields)) {
    throw new StructuralError("Fields must be an object", "$.fields");
  }

  const instruction: Instruction = { action, entityType, identifier: { field, value } };
  if (isNode(fields)) instruction.fields = fields;
  return instruction;
}

/* ============= Text Forms ============= */

function renderValue(value: GraphValue): string {
  return typeof value === "string" ? value : JSON.stringify(value);
}

/**
 * Natural-language rendering of a structured instruction.
 *
 * @example
 * describeInstruction({ action: 'update', entityType: 'Unit',
 *   identifier: { field: 'unitNumber', value: 'B1' }, fields: { rent: 1200 } })
 * // "Update Unit with unitNumber=B1 and set rent=1200"
 */
export function describeInstruction(instruction: Instruction): string {
  const { action, entityType, identifier, fields } = instruction;
  let text = `${capitalize(action)} ${entityType} with ${identifier.field}=${identifier.value}`;

  const entries = Object.entries(fields ?? {});
  if (entries.length > 0 && action !== "delete") {
    text += ` and set ${entries.map(([k, v]) => `${k}=${renderValue(v)}`).join(", ")}`;
  }
  return text;
}

/**
 * Pull numbered instructions ("1. Set rent for unit B1 to 1200") out of a
 * free-text response. Lines without a leading number are ignored.
 */
export function extractNumberedInstructions(text: string): string[] {
  const instructions: string[] = [];

  for (const line of text.trim().split("\n")) {
    const trimmed = line.trim();
    if (!/^\d/.test(trimmed)) continue;

    const separator = trimmed.indexOf(". ");
    if (separator === -1) continue;

    const instruction = trimmed.slice(separator + 2).trim();
    if (instruction) instructions.push(instruction);
  }

  return instructions;
}
